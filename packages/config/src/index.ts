export * from "./types";
export { DEFAULT_CONFIG, DEFAULT_OUTPUT_KEY } from "./defaults";
export { LOG_LEVELS, PROMPTWEAVE_CONFIG_SCHEMA } from "./schema";
export { parseCallOptions, mergeCallOptions } from "./call-options";
export {
  ConfigValidator,
  ConfigValidationError,
  type ConfigIssue,
} from "./validation/config-validator";
export { ConfigStore } from "./config.store";
export { ConfigService, type ConfigFileFormat } from "./config.service";
export { ConfigModule } from "./config.module";
export { INITIAL_CONFIG_TOKEN, MODULE_OPTIONS_TOKEN } from "./config.const";
