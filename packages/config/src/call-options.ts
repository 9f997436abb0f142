import { z } from "zod";
import type { InvocationOptions, StreamSink } from "@promptweave/types";
import { MODEL_CALL_DEFAULTS_SCHEMA } from "./schema";
import type { ModelCallDefaults } from "./types";
import { ConfigValidationError, toIssues } from "./validation/config-validator";

const isStreamSink = (value: unknown): value is StreamSink =>
  typeof value === "object" &&
  value !== null &&
  "write" in value &&
  typeof value.write === "function";

const isAbortSignal = (value: unknown): value is AbortSignal =>
  value instanceof AbortSignal;

/**
 * Unknown keys are stripped by the object schema, so callers can pass
 * options meant for other layers without tripping validation.
 */
const INVOCATION_OPTIONS_SCHEMA = MODEL_CALL_DEFAULTS_SCHEMA.extend({
  streamingSink: z
    .custom<StreamSink>(isStreamSink, "streamingSink must expose a write(delta) method")
    .optional(),
  signal: z.custom<AbortSignal>(isAbortSignal, "signal must be an AbortSignal").optional(),
  maxIterations: z
    .number()
    .int("maxIterations must be an integer")
    .positive("maxIterations must be greater than zero")
    .optional(),
  timeoutMs: z
    .number()
    .int("timeoutMs must be an integer")
    .positive("timeoutMs must be greater than zero")
    .optional(),
});

export function parseCallOptions(raw: unknown = {}): InvocationOptions {
  const result = INVOCATION_OPTIONS_SCHEMA.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigValidationError(
      "Invalid invocation options",
      toIssues(result.error.issues)
    );
  }
  return result.data;
}

/** Per-call options win over construction-time defaults. */
export function mergeCallOptions(
  defaults: ModelCallDefaults,
  overrides: InvocationOptions = {}
): InvocationOptions {
  return { ...defaults, ...overrides };
}
