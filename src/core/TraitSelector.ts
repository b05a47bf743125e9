import { GeneratorError, ErrorType } from '../types/errors';
import { Candidate, LayerCatalog, TraitCombination } from '../types/traits';
import { ERROR_MESSAGES, formatMessage } from '../constants/validation';
import { RandomSource, defaultRandom } from '../utils/random';

export class TraitSelector {
  private random: RandomSource;

  constructor(random: RandomSource = defaultRandom) {
    this.random = random;
  }

  /**
   * One full trial: an independent weighted draw for every layer, in layer order.
   */
  drawCombination(catalogs: readonly LayerCatalog[]): TraitCombination {
    return catalogs.map(catalog => this.selectCandidate(catalog));
  }

  /**
   * Weighted draw among the reachable combinations not marked by `isUsed`, each
   * weighted by the product of its per-layer weights. Walks the whole reachable
   * space, so it is only meant for when repeated trials keep hitting duplicates.
   * Returns undefined when every reachable combination is used.
   */
  drawUnusedCombination(
    catalogs: readonly LayerCatalog[],
    isUsed: (combination: TraitCombination) => boolean
  ): TraitCombination | undefined {
    const unused: TraitCombination[] = [];
    const weights: number[] = [];

    for (const { combination, weight } of this.reachableCombinations(catalogs)) {
      if (!isUsed(combination)) {
        unused.push(combination);
        weights.push(weight);
      }
    }

    if (unused.length === 0) {
      return undefined;
    }
    return this.weightedRandomSelect(unused, weights, 'combinations');
  }

  selectCandidate(catalog: LayerCatalog): Candidate {
    return this.weightedRandomSelect(catalog.candidates, catalog.weights, catalog.layer);
  }

  // Weights are relative; zero and negative weights are never picked.
  weightedRandomSelect<T>(items: readonly T[], weights: readonly number[], layer: string = 'unknown'): T {
    const reachable: Array<{ item: T; weight: number }> = [];
    items.forEach((item, index) => {
      const weight = weights[index] ?? 0;
      if (weight > 0) {
        reachable.push({ item, weight });
      }
    });

    const last = reachable[reachable.length - 1];
    if (!last) {
      throw new GeneratorError(
        ErrorType.PROCESSING_ERROR,
        formatMessage(ERROR_MESSAGES.NO_SELECTABLE_TRAITS, { layer }),
        { layer, weights: [...weights] }
      );
    }

    const totalWeight = reachable.reduce((total, entry) => total + entry.weight, 0);
    let random = this.random.next() * totalWeight;

    for (const entry of reachable) {
      random -= entry.weight;
      if (random < 0) {
        return entry.item;
      }
    }

    // Floating point leftovers land on the last reachable item
    return last.item;
  }

  private *reachableCombinations(
    catalogs: readonly LayerCatalog[],
    prefix: readonly Candidate[] = [],
    weight: number = 1
  ): Generator<{ combination: TraitCombination; weight: number }> {
    const catalog = catalogs[prefix.length];
    if (!catalog) {
      yield { combination: prefix, weight };
      return;
    }

    for (const [index, candidate] of catalog.candidates.entries()) {
      const candidateWeight = catalog.weights[index] ?? 0;
      if (candidateWeight > 0) {
        yield* this.reachableCombinations(catalogs, [...prefix, candidate], weight * candidateWeight);
      }
    }
  }
}
