export class GpuWatchError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'GpuWatchError';
  }
}

/** Telemetry unavailable for this tick. The loop skips the tick and continues. */
export class CollectionError extends GpuWatchError {
  constructor(message: string, public readonly command?: string, cause?: Error) {
    super(message, 'COLLECTION_ERROR', 'collect', cause);
    this.name = 'CollectionError';
  }
}

export class StorageError extends GpuWatchError {
  constructor(message: string, public readonly operation: string, cause?: Error) {
    super(message, 'STORAGE_ERROR', 'store', cause);
    this.name = 'StorageError';
  }
}

export type RemoteOperation = 'list' | 'patch' | 'delete' | 'append' | 'create';

export class ReconcileError extends GpuWatchError {
  constructor(
    message: string,
    public readonly operation: RemoteOperation,
    public readonly blockId?: string,
    public readonly status?: number,
    cause?: Error,
  ) {
    super(message, 'RECONCILE_ERROR', 'reconcile', cause);
    this.name = 'ReconcileError';
  }
}

export class DeliveryError extends GpuWatchError {
  constructor(message: string, public readonly channel: string, cause?: Error) {
    super(message, 'DELIVERY_ERROR', 'notify', cause);
    this.name = 'DeliveryError';
  }
}

/** Missing tooling or unusable configuration. The process exits before the loop starts. */
export class FatalConfigurationError extends GpuWatchError {
  constructor(message: string, cause?: Error, code = 'FATAL_CONFIGURATION') {
    super(message, code, 'startup', cause);
    this.name = 'FatalConfigurationError';
  }
}

export class ConfigError extends FatalConfigurationError {
  constructor(message: string, cause?: Error) {
    super(message, cause, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
