import { Inject, Injectable, Logger, Optional } from "@nestjs/common";
import fs from "fs/promises";
import path from "path";
import yaml from "yaml";
import { ConfigStore } from "./config.store";
import { MODULE_OPTIONS_TOKEN } from "./config.const";
import { DEFAULT_CONFIG } from "./defaults";
import { mergeLayers } from "./merge";
import { ConfigValidator } from "./validation/config-validator";
import type {
  ConfigModuleOptions,
  PromptweaveConfig,
  PromptweaveConfigInput,
} from "./types";

export type ConfigFileFormat = "yaml" | "json";

/**
 * Resolves configuration from an optional JSON or YAML file and in-process
 * overrides, layered over the defaults and validated as a whole.
 */
@Injectable()
export class ConfigService {
  private readonly logger = new Logger(ConfigService.name);
  private readonly moduleOptions: ConfigModuleOptions;
  private readonly validator: ConfigValidator;

  constructor(
    @Optional()
    @Inject(ConfigStore)
    private readonly configStore?: ConfigStore,
    @Optional()
    @Inject(MODULE_OPTIONS_TOKEN)
    moduleOptions?: ConfigModuleOptions,
    @Optional()
    @Inject(ConfigValidator)
    validator?: ConfigValidator,
  ) {
    this.moduleOptions = moduleOptions ?? {};
    this.validator = validator ?? new ConfigValidator();
  }

  async load(options: ConfigModuleOptions = {}): Promise<PromptweaveConfig> {
    const configPath = options.configPath ?? this.moduleOptions.configPath;
    const fileInput = configPath ? await this.readConfigFile(configPath) : {};
    const config = this.compose(fileInput, [
      this.moduleOptions.overrides,
      options.overrides,
    ]);

    if (this.configStore) {
      this.configStore.setSnapshot(config);
      return this.configStore.getSnapshot();
    }
    return config;
  }

  compose(
    input: unknown,
    overrides: ReadonlyArray<PromptweaveConfigInput | undefined> = [],
  ): PromptweaveConfig {
    const layered = overrides.reduce<unknown>(
      (current, layer) => mergeLayers(current, layer),
      mergeLayers(structuredClone(DEFAULT_CONFIG), input ?? {}),
    );
    return this.validator.validate(layered);
  }

  async readConfigFile(filePath: string): Promise<unknown> {
    const absolutePath = path.resolve(filePath);
    const content = await fs.readFile(absolutePath, "utf-8");
    const format = this.detectFormat(absolutePath);
    this.logger.debug(`Loading ${format} configuration from ${absolutePath}`);

    if (content.trim() === "") {
      return {};
    }

    return format === "json" ? JSON.parse(content) : yaml.parse(content);
  }

  private detectFormat(filePath: string): ConfigFileFormat {
    return path.extname(filePath).toLowerCase() === ".json" ? "json" : "yaml";
  }
}
