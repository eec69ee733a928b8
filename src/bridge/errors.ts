export type BridgeErrorCode =
  | 'queue_full'
  | 'queue_closed'
  | 'introspection_failed'
  | 'worker_stopped'
  | 'engine_error'
  | 'engine_fatal'
  | 'lifecycle_not_running'
  | 'lifecycle_already_started';

export class BridgeError extends Error {
  readonly code: BridgeErrorCode;

  constructor(code: BridgeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BridgeError';
    this.code = code;
  }
}

export class QueueFullError extends BridgeError {
  constructor(readonly capacity: number) {
    super('queue_full', `queue is at capacity (${capacity})`);
    this.name = 'QueueFullError';
  }
}

export class QueueClosedError extends BridgeError {
  constructor(message = 'queue is closed') {
    super('queue_closed', message);
    this.name = 'QueueClosedError';
  }
}

export class IntrospectionFailure extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('introspection_failed', message, options);
    this.name = 'IntrospectionFailure';
  }
}

export class WorkerStoppedError extends BridgeError {
  constructor(message = 'engine worker stopped') {
    super('worker_stopped', message);
    this.name = 'WorkerStoppedError';
  }
}

export class EngineError extends BridgeError {
  readonly recoverable: boolean;

  constructor(message: string, options: { recoverable?: boolean; cause?: unknown } = {}) {
    super(options.recoverable ? 'engine_error' : 'engine_fatal', message, { cause: options.cause });
    this.name = 'EngineError';
    this.recoverable = options.recoverable ?? false;
  }
}

export class EngineFatalError extends EngineError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { recoverable: false, cause: options.cause });
    this.name = 'EngineFatalError';
  }
}

export class LifecycleError extends BridgeError {
  constructor(code: 'lifecycle_not_running' | 'lifecycle_already_started', message: string) {
    super(code, message);
    this.name = 'LifecycleError';
  }
}

export const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));
