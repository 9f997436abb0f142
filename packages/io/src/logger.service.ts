import { Injectable } from "@nestjs/common";
import fs from "fs";
import path from "path";
import pino, { type Logger, type LoggerOptions } from "pino";
import type { LoggingConfig, LoggingDestination } from "@promptweave/config";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace";

const LOG_LEVELS: readonly LogLevel[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
];

const DEFAULT_LOG_FILE = ".promptweave/logs/promptweave.log";

export interface LoggerEvent {
  level: LogLevel;
  scope?: string;
  args: unknown[];
}

export type LoggerListener = (event: LoggerEvent) => void;

const isLogLevel = (property: string | symbol): property is LogLevel =>
  typeof property === "string" &&
  LOG_LEVELS.some((level) => level === property);

/** A logger that drops everything; used when no logger is supplied. */
export const createSilentLogger = (): Logger => pino({ level: "silent" });

@Injectable()
export class LoggerService {
  private rootLogger: Logger | null = null;
  private rawLogger: Logger | null = null;
  private signature = "";
  private readonly listeners = new Set<LoggerListener>();
  private readonly wrapped = new WeakSet<Logger>();

  registerListener(listener: LoggerListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Rebuilds the root logger when the configuration changed since the last
   * call; otherwise returns the existing one.
   */
  configure(config?: LoggingConfig): Logger {
    const signature = JSON.stringify(config ?? {});
    if (this.rootLogger && signature === this.signature) {
      return this.rootLogger;
    }
    this.install(this.buildLogger(config));
    this.signature = signature;
    return this.ensureRoot();
  }

  getLogger(scope?: string): Logger {
    const root = this.ensureRoot();
    if (!scope) {
      return root;
    }
    const base = this.rawLogger ?? root;
    return this.wrapLogger(base.child({ scope }), scope);
  }

  withBindings(bindings: Record<string, unknown>): Logger {
    return this.getLogger().child(bindings);
  }

  private ensureRoot(): Logger {
    return this.rootLogger ?? this.install(this.buildLogger());
  }

  private install(raw: Logger): Logger {
    this.rawLogger = raw;
    this.rootLogger = this.wrapLogger(raw);
    return this.rootLogger;
  }

  private resolvePrettyTransport(
    destination?: LoggingDestination
  ): LoggerOptions["transport"] {
    const wantsPretty =
      destination?.pretty ??
      (destination?.type !== "file" && process.stdout.isTTY === true);
    if (!wantsPretty) {
      return undefined;
    }

    try {
      require.resolve("pino-pretty");
    } catch {
      return undefined;
    }

    return {
      target: "pino-pretty",
      options: {
        colorize: destination?.colorize ?? true,
        translateTime: "HH:MM:ss",
        ignore: "pid,hostname",
      },
    };
  }

  private prepareDestination(destination?: LoggingDestination) {
    switch (destination?.type) {
      case "stdout":
        return pino.destination({ fd: 1 });
      case "stderr":
        return pino.destination({ fd: 2 });
      case "file": {
        const filePath = path.resolve(destination.path ?? DEFAULT_LOG_FILE);
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        return pino.destination({ dest: filePath, sync: false });
      }
      default:
        return undefined;
    }
  }

  private buildLogger(config?: LoggingConfig): Logger {
    const destination = config?.destination;
    const options: LoggerOptions = {
      level: config?.level ?? "info",
      base: undefined,
      timestamp:
        config?.enableTimestamps === false
          ? false
          : pino.stdTimeFunctions.isoTime,
    };

    const transport = this.resolvePrettyTransport(destination);
    if (transport) {
      options.transport = transport;
      return pino(options);
    }

    const stream = this.prepareDestination(destination);
    return stream ? pino(options, stream) : pino(options);
  }

  private wrapLogger(logger: Logger, scope?: string): Logger {
    if (this.wrapped.has(logger)) {
      return logger;
    }

    const service = this;
    const proxy = new Proxy(logger, {
      get(target, property, receiver) {
        if (property === "child") {
          return (...args: Parameters<Logger["child"]>) =>
            service.wrapLogger(target.child<never>(...args), scope);
        }

        const original: unknown = Reflect.get(target, property, receiver);
        if (!isLogLevel(property) || typeof original !== "function") {
          return original;
        }

        return (...args: unknown[]) => {
          service.notify({ level: property, scope, args });
          return original.apply(target, args);
        };
      },
    });

    this.wrapped.add(proxy);
    return proxy;
  }

  private notify(event: LoggerEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}
