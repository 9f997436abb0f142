export type LogLevel =
  | "silent"
  | "fatal"
  | "error"
  | "warn"
  | "info"
  | "debug"
  | "trace";

export interface LoggingDestination {
  type: "stdout" | "stderr" | "file";
  path?: string;
  pretty?: boolean;
  colorize?: boolean;
}

export interface LoggingConfig {
  level: LogLevel;
  destination?: LoggingDestination;
  enableTimestamps?: boolean;
}

/** Model sampling defaults applied to every chain call. */
export interface ModelCallDefaults {
  maxTokens?: number;
  temperature?: number;
  topK?: number;
  topP?: number;
  seed?: number;
  stopWords?: string[];
  minLength?: number;
  maxLength?: number;
  repetitionPenalty?: number;
}

export interface ChainConfig {
  outputKey: string;
  callOptions: ModelCallDefaults;
}

export interface AgentConfig {
  maxIterations: number;
  timeoutMs?: number;
  /** Consecutive unparsable outputs tolerated before failing. */
  maxParseRetries: number;
  /** Consecutive tool failures tolerated; unlimited when unset. */
  maxToolErrors?: number;
  parallelToolCalls: boolean;
}

export interface MemoryConfig {
  windowSize: number;
}

export interface RetrievalConfig {
  topK: number;
}

export interface PromptweaveConfig {
  logging: LoggingConfig;
  chain: ChainConfig;
  agent: AgentConfig;
  memory: MemoryConfig;
  retrieval: RetrievalConfig;
}

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends Array<infer U>
    ? U[]
    : T[K] extends object
      ? DeepPartial<T[K]>
      : T[K];
};

export type PromptweaveConfigInput = DeepPartial<PromptweaveConfig>;

export interface ConfigModuleOptions {
  /** JSON or YAML file merged over the defaults. */
  configPath?: string;
  overrides?: PromptweaveConfigInput;
}
