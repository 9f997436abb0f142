import { z } from "zod";

export const LOG_LEVELS = [
  "silent",
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
] as const;

const positiveInt = (field: string) =>
  z
    .number()
    .int(`${field} must be an integer`)
    .positive(`${field} must be greater than zero`);

export const LOGGING_DESTINATION_SCHEMA = z.object({
  type: z.enum(["stdout", "stderr", "file"]),
  path: z.string().min(1, "path must not be empty").optional(),
  pretty: z.boolean().optional(),
  colorize: z.boolean().optional(),
});

export const LOGGING_SCHEMA = z.object({
  level: z.enum(LOG_LEVELS),
  destination: LOGGING_DESTINATION_SCHEMA.optional(),
  enableTimestamps: z.boolean().optional(),
});

export const MODEL_CALL_DEFAULTS_SCHEMA = z.object({
  maxTokens: positiveInt("maxTokens").optional(),
  temperature: z.number().min(0, "temperature must not be negative").optional(),
  topK: positiveInt("topK").optional(),
  topP: z
    .number()
    .min(0, "topP must be between 0 and 1")
    .max(1, "topP must be between 0 and 1")
    .optional(),
  seed: z.number().int("seed must be an integer").optional(),
  stopWords: z.array(z.string()).optional(),
  minLength: z.number().int("minLength must be an integer").nonnegative().optional(),
  maxLength: positiveInt("maxLength").optional(),
  repetitionPenalty: z.number().optional(),
});

export const PROMPTWEAVE_CONFIG_SCHEMA = z.object({
  logging: LOGGING_SCHEMA,
  chain: z.object({
    outputKey: z.string().min(1, "outputKey must not be empty"),
    callOptions: MODEL_CALL_DEFAULTS_SCHEMA,
  }),
  agent: z.object({
    maxIterations: positiveInt("maxIterations"),
    timeoutMs: positiveInt("timeoutMs").optional(),
    maxParseRetries: z
      .number()
      .int("maxParseRetries must be an integer")
      .nonnegative("maxParseRetries must not be negative"),
    maxToolErrors: positiveInt("maxToolErrors").optional(),
    parallelToolCalls: z.boolean(),
  }),
  memory: z.object({
    windowSize: positiveInt("windowSize"),
  }),
  retrieval: z.object({
    topK: positiveInt("topK"),
  }),
});
