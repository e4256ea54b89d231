/**
 * Typed errors reported through the ErrorHandler
 *
 * Each carries an `errorCode` that the handler uses to pick a category.
 *
 * @module errors/EngineErrors
 */

export type EngineErrorCode =
  | 'BAD_COMMAND'
  | 'WRITE_REJECTED'
  | 'ACTION_FAILED'
  | 'MAPPING_CONFIG'
  | 'REGISTRY_CONFLICT'
  | 'INTERNAL';

export abstract class EngineError extends Error {
  abstract readonly errorCode: EngineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The typed keys form no valid command or argument
 */
export class BadCommandError extends EngineError {
  readonly errorCode = 'BAD_COMMAND';
  readonly keys: string;

  constructor(keys: string, reason: string) {
    super(`Bad command ${keys}: ${reason}`);
    this.keys = keys;
  }
}

/**
 * A write command was dispatched against a read-only surface
 */
export class WriteRejectedError extends EngineError {
  readonly errorCode = 'WRITE_REJECTED';
  readonly actionId: string;

  constructor(actionId: string) {
    super(`Cannot run ${actionId}: the editor is not writable`);
    this.actionId = actionId;
  }
}

/**
 * The host threw while executing an action
 */
export class ActionExecutionError extends EngineError {
  readonly errorCode = 'ACTION_FAILED';
  readonly actionId: string;

  constructor(actionId: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Action ${actionId} failed: ${detail}`, { cause });
    this.actionId = actionId;
  }
}

/**
 * A mapping definition cannot be applied
 */
export class MappingConfigError extends EngineError {
  readonly errorCode = 'MAPPING_CONFIG';
  readonly lineNumber: number;

  constructor(message: string, lineNumber = 0) {
    super(lineNumber > 0 ? `Line ${lineNumber}: ${message}` : message);
    this.lineNumber = lineNumber;
  }
}

/**
 * An action's key sequence collides with one already registered
 */
export class RegistryConflictError extends EngineError {
  readonly errorCode = 'REGISTRY_CONFLICT';
  readonly actionId: string;

  constructor(actionId: string, message: string) {
    super(message);
    this.actionId = actionId;
  }
}

/**
 * Unexpected failure inside the engine while handling a key
 */
export class InternalEngineError extends EngineError {
  readonly errorCode = 'INTERNAL';

  constructor(message: string, cause: unknown) {
    super(message, { cause });
  }
}
