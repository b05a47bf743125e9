import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import sharp from 'sharp';
import { CollectionConfig } from '../../src/types/config';
import { RandomSource } from '../../src/utils/random';

export interface Rgba {
  r: number;
  g: number;
  b: number;
  alpha: number;
}

export const RED: Rgba = { r: 255, g: 0, b: 0, alpha: 1 };
export const BLUE: Rgba = { r: 0, g: 0, b: 255, alpha: 1 };
export const CLEAR: Rgba = { r: 0, g: 0, b: 0, alpha: 0 };

export async function createTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
}

export async function writePng(filePath: string, color: Rgba = RED, size: number = 4): Promise<string> {
  await fs.ensureDir(path.dirname(filePath));
  await sharp({
    create: { width: size, height: size, channels: 4, background: color }
  }).png().toFile(filePath);
  return filePath;
}

/** Placeholder asset files, for tests that never decode them. */
export async function touchFiles(dir: string, names: string[]): Promise<void> {
  await fs.ensureDir(dir);
  for (const name of names) {
    await fs.writeFile(path.join(dir, name), '');
  }
}

export async function firstPixel(image: Buffer | string): Promise<number[]> {
  const raw = await sharp(image).ensureAlpha().raw().toBuffer();
  return Array.from(raw.subarray(0, 4));
}

/** Replays the given values in order, then repeats the last one. */
export function sequenceRandom(values: number[]): RandomSource {
  let index = 0;
  return {
    next: () => {
      const value = values[Math.min(index, values.length - 1)] ?? 0;
      index++;
      return value;
    }
  };
}

export function makeConfig(overrides: Partial<CollectionConfig> = {}): CollectionConfig {
  return {
    layers: [],
    amount: 0,
    id_from_one: false,
    token_prefix: 'Test',
    description: 'Test collection',
    uri_prefix: 'ipfs://test/',
    draw_background: false,
    canvas_width: 4,
    canvas_height: 4,
    background_color: '#ffffff',
    rich_metadata: false,
    paintswap_metadata: false,
    assets_dir: 'assets',
    output_dir: 'build',
    max_duplicate_retries: 1000,
    ...overrides
  };
}
