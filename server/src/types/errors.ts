export class SmartReplyError extends Error {
  constructor(message: string, public code?: string) {
    super(message);
    this.name = 'SmartReplyError';
  }
}

export class ExtractionFailure extends SmartReplyError {
  constructor(message: string, public cause?: unknown) {
    super(message, 'EXTRACTION_FAILURE');
    this.name = 'ExtractionFailure';
  }
}

export class ProfileStoreUnavailable extends SmartReplyError {
  constructor(public senderEmail: string, message: string, public cause?: unknown) {
    super(message, 'PROFILE_STORE_UNAVAILABLE');
    this.name = 'ProfileStoreUnavailable';
  }
}

export class LearningStoreCorrupt extends SmartReplyError {
  constructor(public filePath: string, message: string) {
    super(message, 'LEARNING_STORE_CORRUPT');
    this.name = 'LearningStoreCorrupt';
  }
}

export class CorruptFileError extends SmartReplyError {
  constructor(public filePath: string, message: string) {
    super(message, 'CORRUPT_FILE');
    this.name = 'CorruptFileError';
  }
}

export class GenerationFailure extends SmartReplyError {
  constructor(public stage: string, message: string, public cause?: unknown) {
    super(message, 'GENERATION_FAILURE');
    this.name = 'GenerationFailure';
  }
}

export class ConfigValidationError extends SmartReplyError {
  constructor(public issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'CONFIG_INVALID');
    this.name = 'ConfigValidationError';
  }
}

export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
