import { LogPrinter } from "./LogPrinter";
import type { LogLevels, PrintStrategy } from "./LogPrinter";

export type { LogLevels, PrintStrategy } from "./LogPrinter";

export interface ILogInfo {
  source?: string;
  error?: unknown;
  data?: Record<string, unknown>;
  [key: string]: unknown;
}

export interface ILog {
  level: LogLevels;
  source?: string;
  message: unknown;
  timestamp: Date;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  data?: Record<string, unknown>;
  context?: Record<string, unknown>;
}

export type LogListener = (log: ILog) => void;

export interface LoggerOptions {
  printThreshold: null | LogLevels;
  printStrategy: PrintStrategy;
  useColors?: boolean;
}

export class Logger {
  private readonly printThreshold: null | LogLevels;
  private readonly printStrategy: PrintStrategy;
  private readonly useColors: boolean;
  private readonly boundContext: Record<string, unknown>;
  private readonly printer: LogPrinter;
  private readonly source?: string;
  // Children created through with() delegate listeners and printing to the root
  private rootLogger?: Logger;
  private readonly localListeners: LogListener[] = [];

  public static Severity: Readonly<Record<LogLevels, number>> = {
    trace: 0,
    debug: 1,
    info: 2,
    warn: 3,
    error: 4,
    critical: 5,
  };

  constructor(
    options: LoggerOptions,
    boundContext: Record<string, unknown> = {},
    source?: string,
    printer?: LogPrinter,
  ) {
    this.boundContext = { ...boundContext };
    this.printThreshold = options.printThreshold;
    this.printStrategy = options.printStrategy;
    this.useColors =
      typeof options.useColors === "boolean"
        ? options.useColors
        : this.detectColorSupport();
    this.source = source;
    this.printer =
      printer ??
      new LogPrinter({
        strategy: this.printStrategy,
        useColors: this.useColors,
      });
  }

  /**
   * A logger that prints nothing. Listeners still receive every log.
   */
  public static silent(): Logger {
    return new Logger({ printThreshold: null, printStrategy: "plain" });
  }

  private detectColorSupport(): boolean {
    if (process.env.NO_COLOR) return false;
    return Boolean(process.stdout?.isTTY);
  }

  /**
   * Creates a new logger instance with additional bound context
   */
  public with({
    source,
    additionalContext,
  }: {
    source?: string;
    additionalContext?: Record<string, unknown>;
  }): Logger {
    const child = new Logger(
      {
        printThreshold: this.printThreshold,
        printStrategy: this.printStrategy,
        useColors: this.useColors,
      },
      { ...this.boundContext, ...additionalContext },
      source ?? this.source,
      this.printer,
    );
    child.rootLogger = this.rootLogger ?? this;
    return child;
  }

  /**
   * Core logging method with structured LogInfo
   */
  public log(level: LogLevels, message: unknown, logInfo: ILogInfo = {}): void {
    const { source, error, data, ...context } = logInfo;

    const log: ILog = {
      level,
      message,
      source: source ?? this.source,
      timestamp: new Date(),
      error: error === undefined ? undefined : this.extractErrorInfo(error),
      data,
      context: { ...this.boundContext, ...context },
    };

    const root = this.rootLogger ?? this;
    root.triggerLogListeners(log);

    if (root.canPrint(level)) {
      root.printer.print(log);
    }
  }

  private extractErrorInfo(error: unknown): NonNullable<ILog["error"]> {
    if (error instanceof Error) {
      return {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    return {
      name: "UnknownError",
      message: String(error),
    };
  }

  public trace(message: unknown, logInfo?: ILogInfo): void {
    this.log("trace", message, logInfo);
  }

  public debug(message: unknown, logInfo?: ILogInfo): void {
    this.log("debug", message, logInfo);
  }

  public info(message: unknown, logInfo?: ILogInfo): void {
    this.log("info", message, logInfo);
  }

  public warn(message: unknown, logInfo?: ILogInfo): void {
    this.log("warn", message, logInfo);
  }

  public error(message: unknown, logInfo?: ILogInfo): void {
    this.log("error", message, logInfo);
  }

  public critical(message: unknown, logInfo?: ILogInfo): void {
    this.log("critical", message, logInfo);
  }

  /**
   * @param listener - A listener that will be triggered for every log.
   */
  public onLog(listener: LogListener): void {
    const root = this.rootLogger ?? this;
    root.localListeners.push(listener);
  }

  private canPrint(level: LogLevels): boolean {
    if (this.printThreshold === null) {
      return false;
    }
    return Logger.Severity[level] >= Logger.Severity[this.printThreshold];
  }

  private triggerLogListeners(log: ILog): void {
    for (const listener of this.localListeners) {
      try {
        listener(log);
      } catch (error) {
        // A failing listener must not break the caller's operation.
        this.printer.print({
          level: "error",
          message: "Error in log listener",
          timestamp: new Date(),
          error: this.extractErrorInfo(error),
        });
      }
    }
  }
}
