export const VALIDATION_RULES = {
  MAX_DIMENSIONS: 16384,
  MIN_DIMENSIONS: 1,
  MAX_TOKEN_COUNT: 1000000,
  MIN_TOKEN_COUNT: 0,
  MAX_LAYER_COUNT: 50,
  SUPPORTED_IMAGE_FORMATS: ['.png', '.jpg', '.jpeg'],
  RARITY_TOTAL: 100,
  DEFAULT_MAX_DUPLICATE_RETRIES: 1000
} as const;

export const ERROR_MESSAGES = {
  CONFIG_VALIDATION_FAILED: 'Configuration validation failed: {errors}',
  LAYER_DIRECTORY_MISSING: 'Layer directory does not exist: {path}',
  NO_SELECTABLE_TRAITS: 'No traits with a positive weight in layer {layer}',
  COLLECTION_EXHAUSTED: 'Collection space exhausted: {requested} tokens requested but only {available} unique combinations exist',
  DUPLICATE_RETRIES_EXCEEDED: 'Collection space exhausted: {retries} consecutive duplicate draws for token #{edition}',
  MISSING_RICH_METADATA: 'Cannot use paintswap metadata without rich_metadata!\nPlease set it to true in the config file.'
} as const;

export const WARNING_MESSAGES = {
  WEIGHT_COUNT_MISMATCH: 'Mismatch in number of items ({items}) and rarities ({rarities}) for layer {layer}',
  WEIGHTS_NOT_NORMALIZED: 'Rarities for layer {layer} do not sum to 100 ({total}), normalizing',
  ZERO_WEIGHT_TOTAL: 'Rarities for layer {layer} sum to 0, leaving them unnormalized',
  NEGATIVE_NONE_WEIGHT: 'Optional layer {layer} rarities exceed 100, "None" weight is {weight}'
} as const;

export function formatMessage(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) =>
    key in values ? String(values[key]) : match
  );
}
