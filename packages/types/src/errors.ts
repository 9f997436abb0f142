import type { Scratchpad } from "./agents";

export type ErrorKind =
  | "missing_variable"
  | "malformed_template"
  | "invalid_variable"
  | "key_mismatch"
  | "chain"
  | "streaming_sink"
  | "tool"
  | "unparsable_output"
  | "parse"
  | "max_iterations"
  | "timeout"
  | "cancelled";

interface PromptweaveErrorOptions {
  retryable?: boolean;
  cause?: unknown;
}

/**
 * Base class for every error raised by the orchestration core. `kind` lets
 * callers branch without `instanceof`; `retryable` separates transient
 * model failures from permanent configuration mistakes.
 */
export abstract class PromptweaveError extends Error {
  abstract readonly kind: ErrorKind;
  readonly retryable: boolean;

  protected constructor(message: string, options: PromptweaveErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.retryable = options.retryable ?? false;
  }
}

export class MissingVariableError extends PromptweaveError {
  readonly kind = "missing_variable";

  constructor(readonly variable: string) {
    super(`Missing value for template variable "${variable}".`);
  }
}

export class MalformedTemplateError extends PromptweaveError {
  readonly kind = "malformed_template";

  constructor(
    readonly template: string,
    readonly reason: string,
    readonly position?: number,
    cause?: unknown
  ) {
    super(
      position === undefined
        ? `Malformed template: ${reason}`
        : `Malformed template at position ${position}: ${reason}`,
      { cause }
    );
  }
}

export class InvalidVariableError extends PromptweaveError {
  readonly kind = "invalid_variable";

  constructor(readonly variable: string, readonly expected: string) {
    super(`Variable "${variable}" must be ${expected}.`);
  }
}

export class KeyMismatchError extends PromptweaveError {
  readonly kind = "key_mismatch";

  constructor(
    message: string,
    readonly missingKeys: readonly string[] = [],
    readonly collidingKeys: readonly string[] = [],
    readonly chainIndex?: number
  ) {
    super(message);
  }
}

/**
 * Wraps a failure raised while running a chain. Retryability follows the
 * wrapped error when it is one of ours, otherwise defaults to true since an
 * unknown error most likely came from the model adapter.
 */
export class ChainError extends PromptweaveError {
  readonly kind = "chain";

  constructor(message: string, cause: unknown) {
    super(message, {
      cause,
      retryable: isPromptweaveError(cause) ? cause.retryable : true,
    });
  }
}

export class StreamingSinkError extends PromptweaveError {
  readonly kind = "streaming_sink";

  constructor(cause: unknown, readonly deltasDelivered: number) {
    super(`Streaming sink failed after ${deltasDelivered} delta(s): ${describeCause(cause)}`, {
      cause,
    });
  }
}

export class ToolError extends PromptweaveError {
  readonly kind = "tool";

  constructor(readonly tool: string, message: string, cause?: unknown) {
    super(message, { cause });
  }
}

export class UnparsableOutputError extends PromptweaveError {
  readonly kind = "unparsable_output";

  constructor(readonly rawText: string, reason = "Could not parse model output") {
    super(`${reason}: ${rawText}`);
  }
}

export class ParseError extends PromptweaveError {
  readonly kind = "parse";

  constructor(
    readonly rawText: string,
    readonly attempts: number,
    readonly steps: Scratchpad
  ) {
    super(`Model output could not be parsed after ${attempts} attempt(s).`);
  }
}

export class MaxIterationsExceededError extends PromptweaveError {
  readonly kind = "max_iterations";

  constructor(readonly iterations: number, readonly steps: Scratchpad) {
    super(`Agent stopped after reaching the limit of ${iterations} iteration(s).`);
  }
}

export class TimeoutExceededError extends PromptweaveError {
  readonly kind = "timeout";

  constructor(
    readonly elapsedMs: number,
    readonly timeoutMs: number,
    readonly steps: Scratchpad
  ) {
    super(`Agent exceeded its time budget of ${timeoutMs}ms (elapsed ${elapsedMs}ms).`);
  }
}

export class CancelledError extends PromptweaveError {
  readonly kind = "cancelled";

  constructor(readonly reason?: unknown) {
    super(
      reason === undefined
        ? "The invocation was cancelled."
        : `The invocation was cancelled: ${describeCause(reason)}`
    );
  }
}

export function isPromptweaveError(value: unknown): value is PromptweaveError {
  return value instanceof PromptweaveError;
}

export interface SerializedError {
  message: string;
  name?: string;
  kind?: ErrorKind;
  stack?: string;
  cause?: SerializedError;
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    const serialized: SerializedError = {
      message: error.message,
      name: error.name,
    };
    if (isPromptweaveError(error)) {
      serialized.kind = error.kind;
    }
    if (error.stack) {
      serialized.stack = error.stack;
    }
    if (error.cause !== undefined) {
      serialized.cause = serializeError(error.cause);
    }
    return serialized;
  }

  return { message: describeCause(error) };
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  if (typeof cause === "string") {
    return cause;
  }
  try {
    return JSON.stringify(cause) ?? String(cause);
  } catch {
    return String(cause);
  }
}
