import type { FactoryProvider } from "@nestjs/common";
import { ConfigService } from "./config.service";
import { INITIAL_CONFIG_TOKEN, MODULE_OPTIONS_TOKEN } from "./config.const";
import type { ConfigModuleOptions, PromptweaveConfig } from "./types";

export const initialConfigProvider: FactoryProvider<Promise<PromptweaveConfig>> = {
  provide: INITIAL_CONFIG_TOKEN,
  inject: [{ token: MODULE_OPTIONS_TOKEN, optional: true }],
  useFactory: async (
    moduleOptions?: ConfigModuleOptions,
  ): Promise<PromptweaveConfig> =>
    new ConfigService(undefined, moduleOptions).load(),
};
