export type PublishStage = 'configure' | 'build' | 'sync' | 'invalidate';

export class PublishError extends Error {
  readonly stage: PublishStage;

  constructor(stage: PublishStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PublishError';
    this.stage = stage;
  }
}

export class BuildFailure extends PublishError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('build', message, options);
    this.name = 'BuildFailure';
  }
}

export class SyncFailure extends PublishError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('sync', message, options);
    this.name = 'SyncFailure';
  }
}

export class ConfigurationMissing extends PublishError {
  readonly key: string;

  constructor(key: string, message = `Parameter ${key} was not found`, options?: { cause?: unknown }) {
    super('configure', message, options);
    this.name = 'ConfigurationMissing';
    this.key = key;
  }
}

export class InvalidationFailure extends PublishError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('invalidate', message, options);
    this.name = 'InvalidationFailure';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
