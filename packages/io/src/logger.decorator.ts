import { Inject } from "@nestjs/common";
import type { FactoryProvider } from "@nestjs/common";
import type { Logger } from "pino";
import { LoggerService } from "./logger.service";

const LOGGER_TOKEN_PREFIX = "PROMPTWEAVE_LOGGER";
const ROOT_LOGGER_TOKEN = Symbol.for(`${LOGGER_TOKEN_PREFIX}::root`);

export const getLoggerToken = (scope?: string): symbol =>
  scope ? Symbol.for(`${LOGGER_TOKEN_PREFIX}::${scope}`) : ROOT_LOGGER_TOKEN;

const loggerProviders = new Map<symbol, FactoryProvider<Logger>>();

/** Returns the (memoised) provider that resolves a scoped pino logger. */
export const createLoggerProvider = (scope?: string): FactoryProvider<Logger> => {
  const token = getLoggerToken(scope);
  const existing = loggerProviders.get(token);
  if (existing) {
    return existing;
  }

  const provider: FactoryProvider<Logger> = {
    provide: token,
    useFactory: (loggerService: LoggerService) => loggerService.getLogger(scope),
    inject: [LoggerService],
  };
  loggerProviders.set(token, provider);
  return provider;
};

export const InjectLogger = (scope?: string) => {
  createLoggerProvider(scope);
  return Inject(getLoggerToken(scope));
};
