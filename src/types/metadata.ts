import { TraitCombination } from './traits';

export interface Attribute {
  trait_type: string;
  value: string;
  sub_type?: string;
  rarity?: number;
}

export interface TokenMetadata {
  name: string;
  description: string;
  image: string;
  edition: number;
  attributes: Attribute[];
  rarity_score?: number;
  rank?: number;
}

export interface TokenRecord {
  readonly edition: number;
  readonly combination: TraitCombination;
  readonly metadata: TokenMetadata;
  readonly imagePath: string;
  readonly metadataPath: string;
}

export type TraitCounts = Record<string, Record<string, number>>;

export type TraitPercentages = Record<string, Record<string, number>>;

export interface RarityReport {
  total: number;
  traits: Record<string, Array<{ value: string; count: number; percent: number }>>;
}

export interface RarityScore {
  edition: number;
  score: number;
}
