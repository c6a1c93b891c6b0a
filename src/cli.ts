#!/usr/bin/env node

import "dotenv/config";
import { GitHubSearchClient, type RepositorySearchApi } from "./lib/github";
import { createFileLogger, type Logger } from "./lib/logger";
import { config, MAX_PAGE_SIZE } from "./lib/config";
import { FatalError, RetryExhaustedError, ScanAbortedError, errorMessage } from "./lib/errors";
import { displayReport, saveReport } from "./lib/report";
import { checkRepositories } from "./search";
import type { RetryOptions } from "./lib/retry/retry-controller";

export interface CliOptions {
  query: string;
  maxRecords: number;
  pageSize: number;
  output: string | null;
  strict: boolean;
  logFile: string | null;
  help: boolean;
}

/**
 * Collaborators the CLI builds for itself unless given
 */
export interface CliDeps {
  api?: RepositorySearchApi;
  logger?: Logger;
  retry?: RetryOptions;
}

function parsePositiveInt(flag: string, value: string | undefined): number {
  const parsed = Number(value);
  if (value === undefined || !Number.isInteger(parsed) || parsed < 1) {
    throw new FatalError(`${flag} expects a positive integer, got ${value ?? "nothing"}`);
  }
  return parsed;
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined) {
    throw new FatalError(`${flag} expects a value`);
  }
  return value;
}

/**
 * Parse command line arguments
 */
export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    query: config.scan.defaultQuery,
    maxRecords: config.scan.maxRecords,
    pageSize: config.scan.pageSize,
    output: null,
    strict: false,
    logFile: null,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case "--query":
      case "-q":
        options.query = requireValue(arg, args[++i]);
        break;
      case "--max":
      case "--max_repos":
      case "-m":
        options.maxRecords = parsePositiveInt(arg, args[++i]);
        break;
      case "--page-size":
        options.pageSize = parsePositiveInt(arg, args[++i]);
        if (options.pageSize > MAX_PAGE_SIZE) {
          throw new FatalError(`${arg} cannot exceed ${MAX_PAGE_SIZE}`);
        }
        break;
      case "--output":
      case "-o":
        options.output = requireValue(arg, args[++i]);
        break;
      case "--strict":
        options.strict = true;
        break;
      case "--log-file":
        options.logFile = requireValue(arg, args[++i]);
        break;
      case "--help":
      case "-h":
        options.help = true;
        break;
      default:
        throw new FatalError(`Unknown option: ${arg}`);
    }
  }

  return options;
}

/**
 * Print help message
 */
function printHelp() {
  console.log(`
GitHub Repository Health Scanner

Usage:
  repo-health [options]

Options:
  -q, --query <query>      Search query (default: "${config.scan.defaultQuery}")
  -m, --max <number>       Maximum repositories to check (default: ${config.scan.maxRecords})
  --page-size <number>     Results per search page, at most ${MAX_PAGE_SIZE} (default: ${config.scan.pageSize})
  -o, --output <file>      Save results to a JSON file
  --strict                 Fail without saving when the scan ends early
  --log-file <file>        Also write JSON logs to a file
  -h, --help               Show this help message

Examples:
  repo-health --query "language:typescript stars:>500" --max 250 --output results.json
`);
}

async function logRateLimit(client: GitHubSearchClient, logger: Logger): Promise<void> {
  try {
    const rateLimit = await client.checkRateLimit();
    if (rateLimit.remaining === 0) {
      logger.warn(`Search rate limit exhausted. Resets at ${new Date(rateLimit.reset * 1000).toISOString()}`);
    }
  } catch (error) {
    logger.warn(`Could not read rate limit status: ${errorMessage(error)}`);
  }
}

async function run(options: CliOptions, logger: Logger, deps: CliDeps): Promise<number> {
  let api = deps.api;
  if (!api) {
    const client = new GitHubSearchClient({ githubToken: process.env.GITHUB_TOKEN }, { logger });
    await logRateLimit(client, logger);
    api = client;
  }

  const signal = config.timeout.scanTimeout > 0 ? AbortSignal.timeout(config.timeout.scanTimeout) : undefined;

  logger.info(`Searching repositories matching: ${options.query}`);
  const { report, summary, scan } = await checkRepositories(options.query, {
    api,
    maxRecords: options.maxRecords,
    pageSize: options.pageSize,
    retry: deps.retry,
    signal,
    logger,
  });

  displayReport(report);
  logger.info(summary, `Checked ${summary.total} of ${scan.totalCount} matching repositories`);

  const fatal = scan.failure instanceof FatalError;
  if (scan.partial) {
    const reason = scan.failure instanceof RetryExhaustedError ? "retries exhausted" : "fatal error";
    logger.warn(`Scan ended early (${reason}); report holds ${report.length} repositories`);
    if (options.strict) {
      logger.error("Strict mode: discarding partial results");
      return 1;
    }
  }

  if (options.output) {
    await saveReport(report, options.output);
  }

  if (fatal) {
    logger.error(`Scan failed: ${scan.failure?.message}`);
    return 1;
  }
  return 0;
}

/**
 * Main CLI function
 */
export async function main(argv: string[] = process.argv.slice(2), deps: CliDeps = {}): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    console.error(errorMessage(error));
    printHelp();
    return 1;
  }

  if (options.help) {
    printHelp();
    return 0;
  }

  const logger =
    deps.logger ??
    createFileLogger(options.logFile ?? undefined, process.env.LOG_LEVEL || "info", process.env.NODE_ENV !== "production");

  try {
    return await run(options, logger, deps);
  } catch (error) {
    if (error instanceof ScanAbortedError) {
      logger.error("Scan aborted before completion. Consider a smaller --max or a longer SCAN_TIMEOUT.");
    } else if (error instanceof FatalError) {
      logger.error(`Scan failed: ${error.message}`);
    } else {
      logger.error({ error: errorMessage(error) }, "Unexpected error occurred");
    }
    return 1;
  }
}

// Run if this is the main module
if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    }
  );
}
