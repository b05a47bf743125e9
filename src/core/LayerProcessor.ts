import fs from 'fs-extra';
import path from 'path';
import { GeneratorError, ErrorType } from '../types/errors';
import { LayerConfig } from '../types/config';
import { Candidate, LayerCatalog, Trait, ValidationResult, noTrait } from '../types/traits';
import { VALIDATION_RULES, ERROR_MESSAGES, WARNING_MESSAGES, formatMessage } from '../constants/validation';
import logger from '../utils/logger';

const sum = (values: readonly number[]): number => values.reduce((acc, value) => acc + value, 0);

export class LayerProcessor {
  private assetsPath: string;

  constructor(assetsPath: string) {
    this.assetsPath = assetsPath;
  }

  async loadCatalogs(layers: readonly LayerConfig[]): Promise<LayerCatalog[]> {
    const catalogs: LayerCatalog[] = [];
    for (const layer of layers) {
      catalogs.push(await this.loadCatalog(layer));
    }
    return catalogs;
  }

  async loadCatalog(layer: LayerConfig): Promise<LayerCatalog> {
    const layerPath = path.join(this.assetsPath, layer.name);
    const warnings: string[] = [];
    const required = layer.required ?? true;

    let traits: Trait[] = [];
    let weights: number[] = [];

    if (layer.types) {
      for (const typeInfo of layer.types) {
        for (const [typeName, typeRarities] of Object.entries(typeInfo)) {
          const files = await this.getImageFiles(path.join(layerPath, typeName));
          traits.push(...files.map(file => this.toTrait(layer.name, file, typeName)));
          weights.push(...typeRarities);
        }
      }
    } else {
      const files = await this.getImageFiles(layerPath);
      traits = files.map(file => this.toTrait(layer.name, file));
      weights = [...(layer.rarities ?? [])];
    }

    logger.debug('Processing layer', {
      layer: layer.name,
      layerPath,
      items: traits.length,
      rarities: weights
    });

    const candidates: Candidate[] = [...traits];
    if (!required) {
      const noneWeight = VALIDATION_RULES.RARITY_TOTAL - sum(weights);
      if (noneWeight < 0) {
        warnings.push(formatMessage(WARNING_MESSAGES.NEGATIVE_NONE_WEIGHT, { layer: layer.name, weight: noneWeight }));
      }
      candidates.push(noTrait(layer.name));
      weights.push(noneWeight);
      logger.debug('Optional layer, added "None" option', { layer: layer.name, weight: noneWeight });
    }

    // Repair pairs weights with candidates by position, "None" included
    weights = this.reconcileWeights(layer.name, candidates.length, weights, warnings);

    weights = this.normalizeWeights(layer.name, weights, warnings);

    for (const warning of warnings) {
      logger.warn(warning, { layer: layer.name });
    }

    return { layer: layer.name, required, candidates, weights, warnings };
  }

  /**
   * Pads missing weights with 0 or drops extra weights so there is exactly one
   * weight per candidate.
   */
  reconcileWeights(layerName: string, candidateCount: number, weights: readonly number[], warnings: string[] = []): number[] {
    if (candidateCount === weights.length) {
      return [...weights];
    }

    warnings.push(formatMessage(WARNING_MESSAGES.WEIGHT_COUNT_MISMATCH, {
      layer: layerName,
      items: candidateCount,
      rarities: weights.length
    }));

    if (candidateCount > weights.length) {
      return [...weights, ...new Array<number>(candidateCount - weights.length).fill(0)];
    }
    return weights.slice(0, candidateCount);
  }

  /**
   * Rescales weights to `floor(weight / total * 100)` unless they already sum to
   * 100. Truncation can leave the result below 100.
   */
  normalizeWeights(layerName: string, weights: readonly number[], warnings: string[] = []): number[] {
    const total = sum(weights);

    if (total === VALIDATION_RULES.RARITY_TOTAL) {
      return [...weights];
    }

    if (total === 0) {
      warnings.push(formatMessage(WARNING_MESSAGES.ZERO_WEIGHT_TOTAL, { layer: layerName }));
      return [...weights];
    }

    warnings.push(formatMessage(WARNING_MESSAGES.WEIGHTS_NOT_NORMALIZED, { layer: layerName, total }));
    return weights.map(weight => Math.floor((weight / total) * VALIDATION_RULES.RARITY_TOTAL));
  }

  /** Number of distinct combinations reachable with positive weights. */
  combinationSpace(catalogs: readonly LayerCatalog[]): number {
    return catalogs.reduce(
      (space, catalog) => space * catalog.weights.filter(weight => weight > 0).length,
      1
    );
  }

  async validateStructure(layers: readonly LayerConfig[]): Promise<ValidationResult> {
    const errors: string[] = [];
    const warnings: string[] = [];
    const catalogs: LayerCatalog[] = [];

    if (!await fs.pathExists(this.assetsPath)) {
      throw new GeneratorError(
        ErrorType.VALIDATION_ERROR,
        formatMessage(ERROR_MESSAGES.LAYER_DIRECTORY_MISSING, { path: this.assetsPath })
      );
    }

    for (const layer of layers) {
      try {
        const catalog = await this.loadCatalog(layer);
        catalogs.push(catalog);
        warnings.push(...catalog.warnings);
        if (!catalog.weights.some(weight => weight > 0)) {
          errors.push(formatMessage(ERROR_MESSAGES.NO_SELECTABLE_TRAITS, { layer: layer.name }));
        }
      } catch (error) {
        errors.push(error instanceof Error ? error.message : String(error));
      }
    }

    const result: ValidationResult = {
      isValid: errors.length === 0,
      errors,
      warnings,
      stats: {
        totalTraits: catalogs.reduce(
          (total, catalog) => total + catalog.candidates.filter(candidate => candidate.kind === 'trait').length,
          0
        ),
        traitTypes: catalogs.map(catalog => catalog.layer),
        combinationSpace: errors.length === 0 ? this.combinationSpace(catalogs) : 0
      }
    };

    logger.info('Layer structure validation completed', {
      isValid: result.isValid,
      errorCount: errors.length,
      warningCount: warnings.length,
      totalTraits: result.stats.totalTraits,
      combinationSpace: result.stats.combinationSpace
    });

    return result;
  }

  private toTrait(type: string, filePath: string, group?: string): Trait {
    const trait: Trait = {
      kind: 'trait',
      type,
      name: path.parse(filePath).name,
      path: filePath
    };
    if (group !== undefined) {
      trait.group = group;
    }
    return trait;
  }

  private async getImageFiles(dirPath: string): Promise<string[]> {
    if (!await fs.pathExists(dirPath)) {
      throw new GeneratorError(
        ErrorType.FILE_ERROR,
        formatMessage(ERROR_MESSAGES.LAYER_DIRECTORY_MISSING, { path: dirPath }),
        { dirPath }
      );
    }

    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter(entry =>
        entry.isFile() &&
        VALIDATION_RULES.SUPPORTED_IMAGE_FORMATS.some(ext => path.extname(entry.name).toLowerCase() === ext)
      )
      .map(entry => entry.name)
      .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
      .map(name => path.join(dirPath, name));
  }
}
