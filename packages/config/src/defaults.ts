import type { PromptweaveConfig } from "./types";

export const DEFAULT_OUTPUT_KEY = "text";

export const DEFAULT_CONFIG: PromptweaveConfig = {
  logging: {
    level: "info",
    enableTimestamps: true,
  },
  chain: {
    outputKey: DEFAULT_OUTPUT_KEY,
    callOptions: {},
  },
  agent: {
    maxIterations: 10,
    maxParseRetries: 2,
    parallelToolCalls: true,
  },
  memory: {
    windowSize: 10,
  },
  retrieval: {
    topK: 4,
  },
};
