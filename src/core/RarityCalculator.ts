import Joi from 'joi';
import fs from 'fs-extra';
import path from 'path';
import { BuildPaths } from '../types/config';
import { GeneratorError, ErrorType } from '../types/errors';
import { Attribute, RarityReport, RarityScore, TokenMetadata, TraitCounts, TraitPercentages } from '../types/metadata';
import { ERROR_MESSAGES } from '../constants/validation';
import { MetadataEmitter } from './MetadataEmitter';
import logger from '../utils/logger';

const metadataSchema = Joi.object<TokenMetadata>({
  name: Joi.string().allow('').required(),
  description: Joi.string().allow('').required(),
  image: Joi.string().allow('').required(),
  edition: Joi.number().integer().required(),
  attributes: Joi.array().items(Joi.object({
    trait_type: Joi.string().required(),
    value: Joi.string().required(),
    sub_type: Joi.string(),
    rarity: Joi.number()
  })).required(),
  rarity_score: Joi.number(),
  rank: Joi.number().integer()
});

// A token without attributes counts as fully common.
const NO_ATTRIBUTE_SCORE = 100;

// Same file stem under different sub-types is a different trait
const attributeKey = (attribute: Attribute): string =>
  attribute.sub_type !== undefined ? `${attribute.sub_type}/${attribute.value}` : attribute.value;

/**
 * Post-processing over a finished build: per-trait rarity percentages
 * ("rich metadata") and a harmonic-mean rarity rank.
 */
export class RarityCalculator {
  private paths: Pick<BuildPaths, 'jsonDir' | 'statsDir'>;

  constructor(paths: Pick<BuildPaths, 'jsonDir' | 'statsDir'>) {
    this.paths = paths;
  }

  get reportPath(): string {
    return path.join(this.paths.statsDir, 'rarity.json');
  }

  async createCounts(startEdition: number, amount: number): Promise<TraitCounts> {
    const counts: TraitCounts = {};

    for (const edition of this.editions(startEdition, amount)) {
      const metadata = await this.readMetadata(edition);
      for (const attribute of metadata.attributes) {
        const key = attributeKey(attribute);
        const typeCounts = counts[attribute.trait_type] ?? {};
        typeCounts[key] = (typeCounts[key] ?? 0) + 1;
        counts[attribute.trait_type] = typeCounts;
      }
    }

    logger.debug('Trait counts collected', { startEdition, amount, traitTypes: Object.keys(counts).length });
    return counts;
  }

  calculatePercentages(amount: number, counts: TraitCounts): TraitPercentages {
    const percentages: TraitPercentages = {};
    for (const [traitType, values] of Object.entries(counts)) {
      percentages[traitType] = Object.fromEntries(
        Object.entries(values).map(([value, count]) => [
          value,
          amount > 0 ? +((100 * count) / amount).toFixed(4) : 0
        ])
      );
    }
    return percentages;
  }

  async updateMetadata(
    startEdition: number,
    amount: number,
    counts: TraitCounts,
    percentages: TraitPercentages
  ): Promise<RarityReport> {
    for (const edition of this.editions(startEdition, amount)) {
      const metadata = await this.readMetadata(edition);
      metadata.attributes = metadata.attributes.map(attribute => ({
        ...attribute,
        rarity: percentages[attribute.trait_type]?.[attributeKey(attribute)] ?? 0
      }));
      await this.writeMetadata(metadata);
    }

    const report: RarityReport = { total: amount, traits: {} };
    for (const [traitType, values] of Object.entries(counts)) {
      report.traits[traitType] = Object.entries(values)
        .map(([value, count]) => ({ value, count, percent: percentages[traitType]?.[value] ?? 0 }))
        .sort((a, b) => a.percent - b.percent);
    }

    await fs.ensureDir(this.paths.statsDir);
    await fs.writeJson(this.reportPath, report, { spaces: 2 });

    logger.info('Rich metadata written', { total: amount, reportPath: this.reportPath });
    return report;
  }

  /** Counts, percentages and metadata rewrite in one pass. */
  async applyRichMetadata(startEdition: number, amount: number): Promise<RarityReport> {
    const counts = await this.createCounts(startEdition, amount);
    const percentages = this.calculatePercentages(amount, counts);
    return this.updateMetadata(startEdition, amount, counts, percentages);
  }

  async calculateHarmonicMeans(startEdition: number, amount: number): Promise<RarityScore[]> {
    if (!await fs.pathExists(this.reportPath)) {
      throw new GeneratorError(
        ErrorType.MISSING_RICH_METADATA,
        ERROR_MESSAGES.MISSING_RICH_METADATA,
        { reportPath: this.reportPath }
      );
    }

    const scores: RarityScore[] = [];
    for (const edition of this.editions(startEdition, amount)) {
      const metadata = await this.readMetadata(edition);
      const rarities: number[] = [];
      for (const attribute of metadata.attributes) {
        if (attribute.rarity === undefined) {
          throw new GeneratorError(
            ErrorType.MISSING_RICH_METADATA,
            ERROR_MESSAGES.MISSING_RICH_METADATA,
            { edition, traitType: attribute.trait_type }
          );
        }
        rarities.push(attribute.rarity);
      }
      scores.push({ edition, score: this.harmonicMean(rarities) });
    }

    return scores;
  }

  harmonicMean(values: readonly number[]): number {
    if (values.length === 0) {
      return NO_ATTRIBUTE_SCORE;
    }
    const reciprocalSum = values.reduce((total, value) => total + 1 / value, 0);
    return values.length / reciprocalSum;
  }

  /** Rank 1 is the rarest token (lowest harmonic mean); ties keep edition order. */
  async addRarityRank(scores: readonly RarityScore[]): Promise<RarityScore[]> {
    const ranked = [...scores].sort((a, b) => a.score - b.score || a.edition - b.edition);

    for (const [index, { edition, score }] of ranked.entries()) {
      const metadata = await this.readMetadata(edition);
      metadata.rarity_score = +score.toFixed(4);
      metadata.rank = index + 1;
      await this.writeMetadata(metadata);
    }

    logger.info('Rarity rank written', { total: ranked.length });
    return ranked;
  }

  async applyRarityRank(startEdition: number, amount: number): Promise<RarityScore[]> {
    const scores = await this.calculateHarmonicMeans(startEdition, amount);
    return this.addRarityRank(scores);
  }

  async readMetadata(edition: number): Promise<TokenMetadata> {
    const filePath = MetadataEmitter.pathFor(this.paths.jsonDir, edition);
    const document: unknown = await fs.readJson(filePath);
    const result = metadataSchema.validate(document);

    if (result.error) {
      throw new GeneratorError(
        ErrorType.FILE_ERROR,
        `Invalid metadata file ${filePath}: ${result.error.message}`,
        { filePath, edition }
      );
    }
    return result.value;
  }

  private async writeMetadata(metadata: TokenMetadata): Promise<void> {
    await fs.writeJson(MetadataEmitter.pathFor(this.paths.jsonDir, metadata.edition), metadata, { spaces: 2 });
  }

  private editions(startEdition: number, amount: number): number[] {
    return Array.from({ length: amount }, (_, index) => startEdition + index);
  }
}
