import { ConfigurableModuleBuilder } from "@nestjs/common";
import type { ConfigModuleOptions } from "./types";

export const { ConfigurableModuleClass, MODULE_OPTIONS_TOKEN } =
  new ConfigurableModuleBuilder<ConfigModuleOptions>().build();

export const INITIAL_CONFIG_TOKEN = Symbol("PROMPTWEAVE_INITIAL_CONFIG");
