export enum ErrorType {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  PROCESSING_ERROR = 'PROCESSING_ERROR',
  FILE_ERROR = 'FILE_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  COLLECTION_EXHAUSTED = 'COLLECTION_EXHAUSTED',
  MISSING_RICH_METADATA = 'MISSING_RICH_METADATA'
}

export type ErrorContext = Record<string, unknown>;

export class GeneratorError extends Error {
  public readonly type: ErrorType;
  public readonly context?: ErrorContext;

  constructor(type: ErrorType, message: string, context?: ErrorContext) {
    super(message);
    this.name = 'GeneratorError';
    this.type = type;
    this.context = context;
  }
}

export function isGeneratorError(error: unknown, type?: ErrorType): error is GeneratorError {
  return error instanceof GeneratorError && (type === undefined || error.type === type);
}
