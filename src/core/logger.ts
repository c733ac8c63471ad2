import type { Disposable } from "../types/disposal";

/**
 * Supported log levels ordered from highest severity (`error`) to most verbose (`debug`).
 */
export type LogLevel = "error" | "warn" | "info" | "debug";

const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

/**
 * Structured representation of a single log line emitted by the {@link Logger}.
 */
export interface LogEvent {
  timestamp: string;
  level: LogLevel;
  channel: string;
  message: string;
  data?: unknown;
}

/**
 * Line-oriented destination for formatted log output.
 */
export interface LogSink {
  appendLine(line: string): void;
  dispose?(): void;
}

/**
 * Factory used to create the sink backing a named channel. Replaced in tests.
 */
export type LogSinkFactory = (channel: string) => LogSink;

const streamSinkFactory: LogSinkFactory = () => ({
  appendLine(line: string) {
    process.stderr.write(`${line}\n`);
  },
});

/**
 * Type guard for {@link LogLevel} strings.
 */
export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Maps a raw level string to a {@link LogLevel}, using `fallback` for unknown values.
 */
export function resolveLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

/**
 * Structured logger with level-based filtering and JSON serialization of
 * metadata objects.
 *
 * @remarks
 * Logger instances share sinks by channel name. Most consumers should rely on the
 * default "USP" channel to keep connection diagnostics consolidated.
 */
export class Logger {
  private static readonly channelRegistry = new Map<
    string,
    { sink: LogSink; refCount: number; isFallback: boolean }
  >();
  private static sinkFactory: LogSinkFactory = streamSinkFactory;
  private static defaultLevel: LogLevel = resolveLogLevel(process.env.USP_LOG_LEVEL, "warn");
  private static readonly logObservers = new Set<(entry: LogEvent) => void>();

  private readonly channelName: string;
  private readonly sink: LogSink;
  private readonly levelOrder: Record<LogLevel, number> = {
    error: 0,
    warn: 1,
    info: 2,
    debug: 3,
  };
  private currentLevel: LogLevel = Logger.defaultLevel;
  private disposed = false;
  private readonly useConsoleFallback: boolean;

  /**
   * Creates a logger that writes to a shared sink.
   *
   * @param name - The channel name. Loggers with matching names share the same sink instance.
   */
  constructor(name = "USP") {
    this.channelName = name;
    const registryEntry = Logger.channelRegistry.get(name);
    if (registryEntry) {
      registryEntry.refCount += 1;
      this.sink = registryEntry.sink;
      this.useConsoleFallback = registryEntry.isFallback;
      return;
    }

    const { sink, isFallback } = Logger.createSink(name);
    Logger.channelRegistry.set(name, {
      sink,
      refCount: 1,
      isFallback,
    });
    this.sink = sink;
    this.useConsoleFallback = isFallback;
  }

  /**
   * Subscribes to structured log events emitted by any {@link Logger} instance.
   * The returned {@link Disposable} removes the observer when disposed.
   */
  static onDidLog(listener: (entry: LogEvent) => void): Disposable {
    Logger.logObservers.add(listener);
    return {
      dispose: () => {
        Logger.logObservers.delete(listener);
      },
    };
  }

  /**
   * Replaces the sink factory used for channels created afterwards.
   * Existing channels keep their sink until every logger on them is disposed.
   */
  static useSinkFactory(factory: LogSinkFactory | undefined): void {
    Logger.sinkFactory = factory ?? streamSinkFactory;
  }

  /**
   * Sets the level new loggers start with.
   */
  static setDefaultLevel(level: LogLevel): void {
    Logger.defaultLevel = level;
  }

  get name(): string {
    return this.channelName;
  }

  /**
   * Updates the minimum log level that will be emitted.
   *
   * @param level - The lowest {@link LogLevel} that should be written. Messages below this level are suppressed.
   */
  setLevel(level: LogLevel) {
    this.currentLevel = level;
  }

  error(message: string, data?: unknown) {
    this.log("error", message, data);
  }

  warn(message: string, data?: unknown) {
    this.log("warn", message, data);
  }

  info(message: string, data?: unknown) {
    this.log("info", message, data);
  }

  /**
   * Logs a debug level message. Only emitted when the current level is `debug`.
   */
  debug(message: string, data?: unknown) {
    this.log("debug", message, data);
  }

  private log(level: LogLevel, message: string, data?: unknown) {
    if (this.disposed) {
      return;
    }
    const event: LogEvent = {
      timestamp: new Date().toISOString(),
      level,
      channel: this.channelName,
      message,
      data,
    };
    // Observers see every event regardless of the sink threshold.
    Logger.emitLogEvent(event);
    if (this.levelOrder[level] > this.levelOrder[this.currentLevel]) {
      return;
    }
    const formatted = this.format(event);
    try {
      this.sink.appendLine(formatted);
    } catch (error) {
      console.warn("Logger failed to append to sink; falling back to console", error);
      this.writeToConsole(level, formatted);
      return;
    }
    if (this.useConsoleFallback) {
      this.writeToConsole(level, formatted);
    }
  }

  /**
   * Formats a {@link LogEvent} into a string, including serialized metadata
   * when available. Fallback messaging is used if serialization fails.
   */
  private format(ev: LogEvent): string {
    const base = `[${ev.timestamp}] [${ev.level.toUpperCase()}] [${ev.channel}] ${ev.message}`;
    if (ev.data !== undefined) {
      try {
        return `${base} :: ${JSON.stringify(ev.data)}`;
      } catch (err) {
        return `${base} [WARN: Failed to serialize data: ${err instanceof Error ? err.message : String(err)}]`;
      }
    }
    return base;
  }

  /**
   * Releases the underlying sink once the last logger on the channel is disposed.
   */
  dispose() {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    const entry = Logger.channelRegistry.get(this.channelName);
    if (!entry) {
      return;
    }
    entry.refCount -= 1;
    if (entry.refCount <= 0) {
      Logger.channelRegistry.delete(this.channelName);
      try {
        entry.sink.dispose?.();
      } catch (error) {
        console.warn("Logger failed to dispose sink", error);
      }
    }
  }

  private static createSink(name: string): { sink: LogSink; isFallback: boolean } {
    try {
      return { sink: Logger.sinkFactory(name), isFallback: false };
    } catch (error) {
      console.warn("Logger failed to create sink; defaulting to console logging", error);
      return {
        sink: {
          appendLine() {
            /* noop */
          },
        },
        isFallback: true,
      };
    }
  }

  private writeToConsole(level: LogLevel, message: string): void {
    switch (level) {
      case "error":
        console.error(message);
        break;
      case "warn":
        console.warn(message);
        break;
      case "info":
        console.info(message);
        break;
      default:
        console.debug(message);
        break;
    }
  }

  private static emitLogEvent(event: LogEvent): void {
    if (Logger.logObservers.size === 0) {
      return;
    }
    for (const listener of Array.from(Logger.logObservers)) {
      try {
        listener(event);
      } catch (error) {
        console.warn("Logger observer threw an error and will be ignored", error);
      }
    }
  }
}
