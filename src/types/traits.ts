export interface Trait {
  kind: 'trait';
  /** Layer name the trait belongs to */
  type: string;
  /** File stem, used as the attribute value */
  name: string;
  /** Sub-type directory for nested layouts */
  group?: string;
  path: string;
}

export interface NoTrait {
  kind: 'none';
  type: string;
}

export type Candidate = Trait | NoTrait;

export type TraitCombination = readonly Candidate[];

export interface LayerCatalog {
  layer: string;
  required: boolean;
  candidates: readonly Candidate[];
  weights: readonly number[];
  warnings: readonly string[];
}

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
  stats: {
    totalTraits: number;
    traitTypes: string[];
    combinationSpace: number;
  };
}

export function isTrait(candidate: Candidate): candidate is Trait {
  return candidate.kind === 'trait';
}

export function noTrait(type: string): NoTrait {
  return { kind: 'none', type };
}
