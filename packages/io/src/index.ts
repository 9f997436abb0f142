export {
  LoggerService,
  createSilentLogger,
  type LoggerEvent,
  type LoggerListener,
  type LogLevel,
} from "./logger.service";
export { InjectLogger, createLoggerProvider, getLoggerToken } from "./logger.decorator";
export { StreamRendererService, type RenderSinkOptions } from "./stream-renderer.service";
export { IoModule } from "./io.module";
