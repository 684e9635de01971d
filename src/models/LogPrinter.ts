import { safeStringify } from "./utils/safeStringify";

export type PrintStrategy = "pretty" | "plain" | "json" | "json_pretty";

export type LogLevels =
  | "trace"
  | "debug"
  | "info"
  | "warn"
  | "error"
  | "critical";

export interface PrintableLog {
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

export type ColorTheme = Record<LogLevels, string> & {
  reset: string;
  bold: string;
  dim: string;
  blue: string;
  cyan: string;
  gray: string;
};

export type LogWriter = (line: string) => void;

const COLORS: Readonly<ColorTheme> = {
  trace: "\x1b[90m",
  debug: "\x1b[36m",
  info: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
  critical: "\x1b[35m",
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
};

const NO_COLORS: Readonly<ColorTheme> = {
  trace: "",
  debug: "",
  info: "",
  warn: "",
  error: "",
  critical: "",
  reset: "",
  bold: "",
  dim: "",
  blue: "",
  cyan: "",
  gray: "",
};

const ICONS: Readonly<Record<LogLevels, string>> = {
  trace: "○",
  debug: "◆",
  info: "●",
  warn: "▲",
  error: "✕",
  critical: "█",
};

const defaultWriters = (): { log: LogWriter; error: LogWriter } => ({
  // eslint-disable-next-line no-console
  log: (line) => console.log(line),
  // eslint-disable-next-line no-console
  error: (line) => console.error(line),
});

export class LogPrinter {
  private readonly strategy: PrintStrategy;
  private readonly colors: ColorTheme;

  constructor(options: { strategy: PrintStrategy; useColors: boolean }) {
    this.strategy = options.strategy;
    // 'plain' never carries ANSI codes
    this.colors =
      options.useColors && options.strategy !== "plain"
        ? { ...COLORS }
        : { ...NO_COLORS };
  }

  public print(log: PrintableLog): void {
    if (this.strategy === "json") {
      LogPrinter.writers.log(safeStringify(this.normalizeForJson(log)));
      return;
    }

    if (this.strategy === "json_pretty") {
      LogPrinter.writers.log(safeStringify(this.normalizeForJson(log), 2));
      return;
    }

    const { level, source, message, timestamp, error, data, context } = log;
    const mainLine =
      this.strategy === "plain"
        ? [level.toUpperCase(), source ? `[${source}]` : "", this.formatMessage(message)]
            .filter(Boolean)
            .join(" ")
        : [
            this.formatTime(timestamp),
            this.formatLevel(level),
            this.formatSource(source),
            this.formatMessage(message),
          ]
            .filter(Boolean)
            .join(" ");

    const output: string[] = [mainLine];
    const details = [
      ...this.formatError(error),
      ...this.formatRecord("data", this.colors.cyan, data),
      ...this.formatRecord("context", this.colors.blue, context),
    ];
    if (details.length) {
      output.push(...details, "");
    }
    const writer = this.pickWriter(level);
    output.forEach((line) => writer(line));
  }

  private pickWriter(level: LogLevels): LogWriter {
    const toError =
      level === "warn" || level === "error" || level === "critical";
    return toError ? LogPrinter.writers.error : LogPrinter.writers.log;
  }

  private formatTime(timestamp: Date): string {
    const time = timestamp.toISOString().slice(11, 23);
    return `${this.colors.gray}${time}${this.colors.reset}`;
  }

  private formatLevel(level: LogLevels): string {
    const label = level.toUpperCase().padEnd(8);
    return `${this.colors[level]}${ICONS[level]} ${this.colors.bold}${label}${this.colors.reset}`;
  }

  private formatSource(source?: string): string {
    if (!source) return "";
    return `${this.colors.blue}[${source}]${this.colors.reset}`;
  }

  private formatMessage(message: unknown): string {
    if (typeof message === "object" && message !== null) {
      return safeStringify(message, 2);
    }
    return String(message);
  }

  private formatError(error: PrintableLog["error"]): string[] {
    if (!error) return [];
    const lines = [
      `    ${this.colors.gray}╰─${this.colors.reset} ${this.colors.error}${error.name}: ${error.message}${this.colors.reset}`,
    ];
    if (error.stack) {
      // The first stack line repeats name and message
      for (const frame of error.stack.split("\n").slice(1)) {
        const cleaned = frame.trim().replace(/^at /, "");
        lines.push(
          `       ${this.colors.gray}↳${this.colors.reset} ${this.colors.dim}${cleaned}${this.colors.reset}`,
        );
      }
    }
    return lines;
  }

  private formatRecord(
    label: string,
    color: string,
    record?: Record<string, unknown>,
  ): string[] {
    if (!record || Object.keys(record).length === 0) return [];
    const lines = [
      `    ${this.colors.gray}╰─${this.colors.reset} ${color}${label}:${this.colors.reset}`,
    ];
    for (const line of safeStringify(record, 2, { maxDepth: 3 }).split("\n")) {
      lines.push(`       ${this.colors.dim}${line}${this.colors.reset}`);
    }
    return lines;
  }

  private normalizeForJson(log: PrintableLog): Record<string, unknown> {
    return {
      ...log,
      timestamp: log.timestamp.toISOString(),
    };
  }

  private static writers = defaultWriters();

  public static setWriters(writers: Partial<{ log: LogWriter; error: LogWriter }>) {
    LogPrinter.writers = { ...LogPrinter.writers, ...writers };
  }

  public static resetWriters() {
    LogPrinter.writers = defaultWriters();
  }
}
