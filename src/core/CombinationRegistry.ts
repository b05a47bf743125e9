import { Candidate, TraitCombination } from '../types/traits';

const candidateKey = (candidate: Candidate): string =>
  candidate.kind === 'trait' ? `${candidate.type}:${candidate.path}` : `${candidate.type}:None`;

/**
 * Set of trait combinations accepted during one run. Keys are positional, so
 * two combinations match only when every layer has the same candidate.
 */
export class CombinationRegistry {
  private usedCombinations: Set<string> = new Set();

  static keyOf(combination: TraitCombination): string {
    return JSON.stringify(combination.map(candidateKey));
  }

  has(combination: TraitCombination): boolean {
    return this.usedCombinations.has(CombinationRegistry.keyOf(combination));
  }

  /** Returns false when the combination was already present. */
  add(combination: TraitCombination): boolean {
    const key = CombinationRegistry.keyOf(combination);
    if (this.usedCombinations.has(key)) {
      return false;
    }
    this.usedCombinations.add(key);
    return true;
  }

  get size(): number {
    return this.usedCombinations.size;
  }
}
