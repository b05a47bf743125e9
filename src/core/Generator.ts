import fs from 'fs-extra';
import path from 'path';
import { BuildPaths, CollectionConfig } from '../types/config';
import { LayerCatalog, TraitCombination, ValidationResult } from '../types/traits';
import { RarityReport, RarityScore, TokenRecord } from '../types/metadata';
import { GeneratorError, ErrorType, isGeneratorError } from '../types/errors';
import { ERROR_MESSAGES, formatMessage } from '../constants/validation';
import { LayerProcessor } from './LayerProcessor';
import { TraitSelector } from './TraitSelector';
import { CombinationRegistry } from './CombinationRegistry';
import { ImageCompositor } from './ImageCompositor';
import { MetadataEmitter } from './MetadataEmitter';
import { RarityCalculator } from './RarityCalculator';
import { loadConfig, resolveBuildPaths } from '../config/loadConfig';
import { RandomSource, createSeededRandom, defaultRandom } from '../utils/random';
import logger from '../utils/logger';

export interface GeneratorOptions {
  /** Overrides the config seed */
  random?: RandomSource;
  /** Directory that relative asset and output paths resolve against */
  baseDir?: string;
}

export interface GenerationOptions {
  clean?: boolean;
  // Optional override for this run; if provided, ignores config.amount
  amountOverride?: number | undefined;
}

export interface GenerationResult {
  records: TokenRecord[];
  duplicates: number;
  notices: string[];
}

export class Generator {
  private config: CollectionConfig;
  private paths: BuildPaths;
  private layerProcessor: LayerProcessor;
  private traitSelector: TraitSelector;
  private imageCompositor: ImageCompositor;
  private metadataEmitter: MetadataEmitter;
  private rarityCalculator: RarityCalculator;

  constructor(config: CollectionConfig, options: GeneratorOptions = {}) {
    this.config = config;
    this.paths = resolveBuildPaths(config, options.baseDir);
    const random = options.random
      ?? (config.seed !== undefined ? createSeededRandom(config.seed) : defaultRandom);

    this.layerProcessor = new LayerProcessor(this.paths.assetsDir);
    this.traitSelector = new TraitSelector(random);
    this.imageCompositor = new ImageCompositor(config);
    this.metadataEmitter = new MetadataEmitter(config);
    this.rarityCalculator = new RarityCalculator(this.paths);
  }

  static async fromFile(configPath?: string, options: GeneratorOptions = {}): Promise<Generator> {
    return new Generator(await loadConfig(configPath), options);
  }

  get buildPaths(): BuildPaths {
    return this.paths;
  }

  get startEdition(): number {
    return this.config.id_from_one ? 1 : 0;
  }

  async validate(): Promise<ValidationResult> {
    logger.info('Validating layer structure...');
    return this.layerProcessor.validateStructure(this.config.layers);
  }

  async generate(options: GenerationOptions = {}): Promise<GenerationResult> {
    const amount = options.amountOverride ?? this.config.amount;
    const start = this.startEdition;
    const end = start + amount;

    logger.info('Starting collection generation', { amount, startEdition: start });

    if (options.clean) {
      await this.cleanOutput();
    }
    await this.makeDirs();
    // Stats from an earlier build describe other tokens
    await fs.remove(this.rarityCalculator.reportPath);

    const catalogs = await this.layerProcessor.loadCatalogs(this.config.layers);
    this.ensureCapacity(catalogs, amount);

    const registry = new CombinationRegistry();
    const records: TokenRecord[] = [];
    let duplicates = 0;
    let edition = start;

    while (edition < end) {
      logger.debug(`Creating token #${edition}`);
      const next = this.nextCombination(catalogs, registry, edition);
      duplicates += next.duplicates;
      records.push(await this.createToken(edition, next.combination));
      edition++;
    }

    logger.info('Collection generation completed', { generated: records.length, duplicates });

    const notices = await this.runPostProcessing(start, amount);
    return { records, duplicates, notices };
  }

  async previewTraits(count: number): Promise<TraitCombination[]> {
    const catalogs = await this.layerProcessor.loadCatalogs(this.config.layers);
    this.ensureCapacity(catalogs, count);

    const registry = new CombinationRegistry();
    const combinations: TraitCombination[] = [];

    while (combinations.length < count) {
      combinations.push(this.nextCombination(catalogs, registry, combinations.length).combination);
    }

    return combinations;
  }

  async calculateRarities(amount: number = this.config.amount): Promise<RarityReport> {
    return this.rarityCalculator.applyRichMetadata(this.startEdition, amount);
  }

  async rankRarities(amount: number = this.config.amount): Promise<RarityScore[]> {
    return this.rarityCalculator.applyRarityRank(this.startEdition, amount);
  }

  async cleanOutput(): Promise<void> {
    logger.info('Cleaning output directory', { outputDir: this.paths.outputDir });
    await fs.emptyDir(this.paths.outputDir);
  }

  private async makeDirs(): Promise<void> {
    for (const dir of [this.paths.outputDir, this.paths.imagesDir, this.paths.jsonDir]) {
      await fs.ensureDir(dir);
    }
  }

  private ensureCapacity(catalogs: readonly LayerCatalog[], requested: number): void {
    const available = this.layerProcessor.combinationSpace(catalogs);
    if (requested > available) {
      throw new GeneratorError(
        ErrorType.COLLECTION_EXHAUSTED,
        formatMessage(ERROR_MESSAGES.COLLECTION_EXHAUSTED, { requested, available }),
        { requested, available }
      );
    }
  }

  /**
   * Redraws until the registry accepts a combination. After
   * `max_duplicate_retries` duplicates in a row the draw falls back to the
   * combinations not used yet.
   */
  private nextCombination(
    catalogs: readonly LayerCatalog[],
    registry: CombinationRegistry,
    edition: number
  ): { combination: TraitCombination; duplicates: number } {
    let retries = 0;

    for (;;) {
      const combination = this.traitSelector.drawCombination(catalogs);
      if (registry.add(combination)) {
        return { combination, duplicates: retries };
      }

      retries++;
      logger.debug(`Token #${edition} already exists, re-creating token`, { retries });
      if (retries < this.config.max_duplicate_retries) {
        continue;
      }

      const unused = this.traitSelector.drawUnusedCombination(catalogs, candidate => registry.has(candidate));
      if (!unused) {
        throw new GeneratorError(
          ErrorType.COLLECTION_EXHAUSTED,
          formatMessage(ERROR_MESSAGES.DUPLICATE_RETRIES_EXCEEDED, { retries, edition }),
          { edition, retries, accepted: registry.size }
        );
      }

      logger.warn('Duplicate retry limit reached, drawing from unused combinations', { edition, retries });
      registry.add(unused);
      return { combination: unused, duplicates: retries };
    }
  }

  private async createToken(edition: number, combination: TraitCombination): Promise<TokenRecord> {
    const imagePath = path.join(this.paths.imagesDir, `${edition}.png`);
    const metadata = this.metadataEmitter.createMetadata(edition, combination);

    await this.imageCompositor.render(combination, imagePath);
    const metadataPath = await this.metadataEmitter.write(metadata, this.paths.jsonDir);

    logger.info(`Created token #${edition}`, { attributes: metadata.attributes.length });
    return { edition, combination, metadata, imagePath, metadataPath };
  }

  private async runPostProcessing(start: number, amount: number): Promise<string[]> {
    const notices: string[] = [];

    if (this.config.rich_metadata) {
      await this.rarityCalculator.applyRichMetadata(start, amount);
    }

    if (this.config.paintswap_metadata) {
      try {
        await this.rarityCalculator.applyRarityRank(start, amount);
      } catch (error) {
        if (!isGeneratorError(error, ErrorType.MISSING_RICH_METADATA)) {
          throw error;
        }
        logger.warn(error.message);
        notices.push(error.message);
      }
    }

    return notices;
  }
}
