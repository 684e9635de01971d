#!/usr/bin/env node
import { runDemos, createDemoCodec } from "./demo";
import { createJsonHttpClient } from "./http/json-http-client";
import { EnvironmentManager } from "./models/EnvironmentManager";
import { Logger } from "./models/Logger";
import type { LogLevels, PrintStrategy } from "./models/Logger";

export const DEFAULT_API_BASE_URL = "https://jsonplaceholder.typicode.com";

const LOG_LEVELS: readonly LogLevels[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "critical",
];
const PRINT_STRATEGIES: readonly PrintStrategy[] = [
  "pretty",
  "plain",
  "json",
  "json_pretty",
];

export interface CLIOptions {
  demos: number[];
  timeoutMs?: number;
  help?: boolean;
}

export interface DemoSettings {
  baseUrl: string;
  logLevel: LogLevels;
  logStrategy: PrintStrategy;
}

const USAGE = `Usage: graph-codec-demo [options]

Options:
  --demo <n>          Run only demo n (1, 2 or 3); repeatable
  --timeout <ms>      Abort HTTP requests after ms milliseconds
  -h, --help          Show this help

Environment:
  DEMO_API_BASE_URL   Base URL of the users API (default ${DEFAULT_API_BASE_URL})
  DEMO_LOG_LEVEL      trace | debug | info | warn | error | critical
  DEMO_LOG_STRATEGY   pretty | plain | json | json_pretty`;

export function parseArgs(args: readonly string[]): CLIOptions {
  const options: CLIOptions = { demos: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case "--demo": {
        const demo = Number(args[++i]);
        if (![1, 2, 3].includes(demo)) {
          throw new Error(`--demo expects 1, 2 or 3, received "${args[i]}"`);
        }
        options.demos.push(demo);
        break;
      }
      case "--timeout": {
        const timeoutMs = Number(args[++i]);
        if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
          throw new Error(`--timeout expects milliseconds, received "${args[i]}"`);
        }
        options.timeoutMs = timeoutMs;
        break;
      }
      case "--help":
      case "-h":
        options.help = true;
        break;
      default:
        throw new Error(`Unknown option "${arg}"`);
    }
  }

  if (options.demos.length === 0) {
    options.demos = [1, 2, 3];
  }
  return options;
}

export function readSettings(env: EnvironmentManager): DemoSettings {
  return {
    baseUrl: env.get("DEMO_API_BASE_URL", "string", DEFAULT_API_BASE_URL),
    logLevel: env.oneOf("DEMO_LOG_LEVEL", LOG_LEVELS, "info"),
    logStrategy: env.oneOf("DEMO_LOG_STRATEGY", PRINT_STRATEGIES, "plain"),
  };
}

/**
 * Entry point; resolves to the process exit code.
 */
export async function main(
  argv: readonly string[] = process.argv.slice(2),
  env: EnvironmentManager = new EnvironmentManager(),
): Promise<number> {
  const options = parseArgs(argv);
  if (options.help) {
    // eslint-disable-next-line no-console
    console.log(USAGE);
    return 0;
  }

  const settings = readSettings(env);
  const logger = new Logger({
    printThreshold: settings.logLevel,
    printStrategy: settings.logStrategy,
  });
  logger.debug("Demo settings", { data: env.snapshot() });

  const codec = createDemoCodec(logger);
  const client = createJsonHttpClient({
    baseUrl: settings.baseUrl,
    codec: codec.withOptions({ writeIndented: false }),
    timeoutMs: options.timeoutMs,
    logger,
  });

  await runDemos({ codec, client, logger, demos: options.demos });
  return 0;
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      new Logger({ printThreshold: "error", printStrategy: "plain" }).critical(
        "Demo failed",
        { error },
      );
      process.exitCode = 1;
    });
}
