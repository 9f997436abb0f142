import { Global, Module } from "@nestjs/common";
import { ConfigService } from "./config.service";
import { ConfigStore } from "./config.store";
import { ConfigurableModuleClass } from "./config.const";
import { initialConfigProvider } from "./initial-config.provider";
import { ConfigValidator } from "./validation/config-validator";

@Global()
@Module({
  providers: [
    initialConfigProvider,
    ConfigValidator,
    ConfigStore,
    ConfigService,
  ],
  exports: [ConfigService, ConfigStore, ConfigValidator],
})
export class ConfigModule extends ConfigurableModuleClass {}
