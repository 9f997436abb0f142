import { Module } from "@nestjs/common";
import type { Provider } from "@nestjs/common";
import { LoggerService } from "./logger.service";
import { StreamRendererService } from "./stream-renderer.service";
import { createLoggerProvider } from "./logger.decorator";

const rootLoggerProvider = createLoggerProvider();

const providers: Provider[] = [
  LoggerService,
  StreamRendererService,
  rootLoggerProvider,
];

@Module({
  providers,
  exports: providers,
})
export class IoModule {}
