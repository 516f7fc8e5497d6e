/*
  mcp-server-stats CLI.

  Usage:
    mcp-server-stats analyze [options]              collect, save CSV, render charts
    mcp-server-stats visualize <input-csv> [opts]   render charts from an existing CSV
    mcp-server-stats refetch <input-csv> [opts]     retry GitHub stats for incomplete rows

  Environment variables:
    - GITHUB_TOKEN: GitHub token (optional, raises the API rate limit)
    - MCP_REGISTRY_URL: registry base URL (optional)
    - GITHUB_API_URL: GitHub API base URL (optional)
    - REQUEST_TIMEOUT_MS: per-request timeout (optional, default 30000)
*/

import { Command, CommanderError, InvalidArgumentError, type OutputConfiguration } from "commander";
import {
  CliError,
  MAX_CONCURRENCY_LIMIT,
  createConsoleLogger,
  setupGracefulShutdown,
  type Logger,
} from "./common";
import { DEFAULT_MAX_CONCURRENT } from "./collect";
import {
  DEFAULT_ENHANCED_PLOT,
  DEFAULT_OUTPUT_CSV,
  DEFAULT_OUTPUT_PLOT,
  runAnalyze,
  runRefetch,
  runVisualize,
} from "./commands";

interface AnalyzeCliOptions {
  outputCsv: string;
  outputPlot: string;
  enhancedPlot: string;
  maxConcurrent: number;
  logScale: boolean;
  githubToken?: string;
  progress: boolean;
  skipEnhanced: boolean;
  verbose: boolean;
}

interface VisualizeCliOptions {
  outputPlot: string;
  enhancedPlot: string;
  logScale: boolean;
  skipEnhanced: boolean;
}

interface RefetchCliOptions {
  outputCsv?: string;
  maxConcurrent: number;
  githubToken?: string;
  progress: boolean;
  force: boolean;
  verbose: boolean;
}

export function parseConcurrency(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > MAX_CONCURRENCY_LIMIT) {
    throw new InvalidArgumentError(`Must be an integer between 1 and ${MAX_CONCURRENCY_LIMIT}.`);
  }
  return parsed;
}

/**
 * Build the command tree. Commander errors are thrown as `CommanderError`
 * instead of exiting so `run` decides the exit code.
 */
export function createProgram(output?: OutputConfiguration): Command {
  const program = new Command();

  program
    .name("mcp-server-stats")
    .description("Analyze MCP server activity vs popularity")
    .exitOverride();

  if (output) {
    program.configureOutput(output);
  }

  program
    .command("analyze")
    .alias("collect")
    .description("Fetch all registry servers and their GitHub stats, save a CSV and render charts")
    .option("-o, --output-csv <path>", "Path to save collected data CSV", DEFAULT_OUTPUT_CSV)
    .option("-p, --output-plot <path>", "Path to save the scatter plot report", DEFAULT_OUTPUT_PLOT)
    .option("-e, --enhanced-plot <path>", "Path to save the enhanced report with multiple views", DEFAULT_ENHANCED_PLOT)
    .option("-c, --max-concurrent <number>", "Maximum concurrent GitHub API requests (1-50)", parseConcurrency, DEFAULT_MAX_CONCURRENT)
    .option("-l, --log-scale", "Use log scale for the y-axis in the basic plot", false)
    .option("-t, --github-token <token>", "GitHub API token (or set GITHUB_TOKEN)")
    .option("--no-progress", "Disable progress output")
    .option("--skip-enhanced", "Skip creating the enhanced report", false)
    .option("--verbose", "Log every failed GitHub request", false)
    .action(async (options: AnalyzeCliOptions) => {
      const logger = createConsoleLogger({ quiet: !options.progress, verbose: options.verbose });
      await runAnalyze(
        {
          outputCsv: options.outputCsv,
          outputPlot: options.outputPlot,
          enhancedPlot: options.enhancedPlot,
          maxConcurrent: options.maxConcurrent,
          logScale: options.logScale,
          skipEnhanced: options.skipEnhanced,
          token: options.githubToken,
        },
        logger
      );
    });

  program
    .command("visualize")
    .description("Render charts from an existing CSV without re-fetching")
    .argument("<input-csv>", "Path to CSV file with collected data")
    .option("-p, --output-plot <path>", "Path to save the scatter plot report", DEFAULT_OUTPUT_PLOT)
    .option("-e, --enhanced-plot <path>", "Path to save the enhanced report", DEFAULT_ENHANCED_PLOT)
    .option("-l, --log-scale", "Use log scale for the y-axis in the basic plot", false)
    .option("--skip-enhanced", "Skip creating the enhanced report", false)
    .action(async (inputCsv: string, options: VisualizeCliOptions) => {
      await runVisualize(inputCsv, options, createConsoleLogger());
    });

  program
    .command("refetch")
    .description("Refetch missing GitHub stats for rows of an existing CSV")
    .argument("<input-csv>", "Path to existing CSV file with incomplete data")
    .option("-o, --output-csv <path>", "Path to save the updated CSV (defaults to overwriting the input)")
    .option("-c, --max-concurrent <number>", "Maximum concurrent GitHub API requests (1-50)", parseConcurrency, DEFAULT_MAX_CONCURRENT)
    .option("-t, --github-token <token>", "GitHub API token (or set GITHUB_TOKEN)")
    .option("--no-progress", "Disable progress output")
    .option("-f, --force", "Refetch every row with a GitHub URL, even rows with stats", false)
    .option("--verbose", "Log every failed GitHub request", false)
    .action(async (inputCsv: string, options: RefetchCliOptions) => {
      const logger = createConsoleLogger({ quiet: !options.progress, verbose: options.verbose });
      await runRefetch(
        inputCsv,
        {
          outputCsv: options.outputCsv,
          maxConcurrent: options.maxConcurrent,
          force: options.force,
          token: options.githubToken,
        },
        logger
      );
    });

  return program;
}

/**
 * Parse `argv` (without the node and script entries), run the command and
 * return the process exit code.
 */
export async function run(argv: readonly string[], logger: Logger = createConsoleLogger(), output?: OutputConfiguration): Promise<number> {
  try {
    await createProgram(output).parseAsync([...argv], { from: "user" });
    return 0;
  } catch (err) {
    // commander has already printed its own message
    if (err instanceof CommanderError) return err.exitCode;
    if (err instanceof CliError) {
      logger.error(`✗ ${err.message}`);
      return err.exitCode;
    }
    logger.error(`\n✗ Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}

if (require.main === module) {
  const logger = createConsoleLogger();
  setupGracefulShutdown(logger);
  run(process.argv.slice(2), logger).then((code) => process.exit(code));
}
