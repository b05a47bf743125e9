import fs from 'fs-extra';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { BuildPaths, CollectionConfig } from '../types/config';
import { GeneratorError, ErrorType } from '../types/errors';
import { ConfigValidator } from '../validators/configValidator';
import logger from '../utils/logger';

export const DEFAULT_CONFIG_PATH = 'config/config.yml';

async function readDocument(configPath: string): Promise<unknown> {
  const ext = path.extname(configPath).toLowerCase();
  if (ext === '.yml' || ext === '.yaml') {
    const raw = await fs.readFile(configPath, 'utf8');
    return parseYaml(raw);
  }
  return fs.readJson(configPath);
}

/**
 * Reads and validates a JSON or YAML config. Relative `assets_dir` and
 * `output_dir` are resolved against the config file's directory.
 */
export async function loadConfig(configPath: string = DEFAULT_CONFIG_PATH): Promise<CollectionConfig> {
  const absolutePath = path.resolve(configPath);

  if (!await fs.pathExists(absolutePath)) {
    throw new GeneratorError(
      ErrorType.CONFIG_ERROR,
      `Configuration file not found: ${absolutePath}`,
      { configPath: absolutePath }
    );
  }

  let document: unknown;
  try {
    document = await readDocument(absolutePath);
  } catch (error) {
    throw new GeneratorError(
      ErrorType.CONFIG_ERROR,
      `Failed to load configuration: ${error}`,
      { configPath: absolutePath }
    );
  }

  const config = new ConfigValidator().validate(document);
  const baseDir = path.dirname(absolutePath);

  logger.info('Configuration loaded', { configPath: absolutePath, layers: config.layers.length });

  return {
    ...config,
    assets_dir: path.resolve(baseDir, config.assets_dir),
    output_dir: path.resolve(baseDir, config.output_dir)
  };
}

export function resolveBuildPaths(config: CollectionConfig, baseDir: string = process.cwd()): BuildPaths {
  const outputDir = path.resolve(baseDir, config.output_dir);
  return {
    assetsDir: path.resolve(baseDir, config.assets_dir),
    outputDir,
    imagesDir: path.join(outputDir, 'images'),
    jsonDir: path.join(outputDir, 'json'),
    statsDir: path.join(outputDir, 'stats')
  };
}
