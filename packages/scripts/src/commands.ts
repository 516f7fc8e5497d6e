/*
  The three pipeline commands behind the CLI.

  - analyze:   registry -> GitHub stats -> CSV -> charts
  - visualize: CSV -> charts
  - refetch:   CSV -> GitHub stats for incomplete rows -> CSV
*/

import * as fs from "fs";
import { renderEnhancedReport, renderScatterReport, writeReport, type ActivityPoint } from "@mcp-server-stats/report";
import { CliError, type Logger } from "./common";
import { collectServerData, DEFAULT_MAX_CONCURRENT, type CollectServerDataOptions } from "./collect";
import { refetchTable, selectRowsForRefetch, type RefetchOptions } from "./refetch";
import {
  createTable,
  filterValidRows,
  readTableCsv,
  summarizeTable,
  writeTableCsv,
  type ServerRecord,
  type ValidServerRecord,
} from "./table";

export const DEFAULT_OUTPUT_CSV = "mcp_servers_data.csv";
export const DEFAULT_OUTPUT_PLOT = "mcp_activity_vs_popularity.html";
export const DEFAULT_ENHANCED_PLOT = "mcp_activity_vs_popularity_enhanced.html";

export interface PlotOptions {
  outputPlot?: string;
  enhancedPlot?: string;
  logScale?: boolean;
  skipEnhanced?: boolean;
}

export interface AnalyzeOptions extends PlotOptions, Omit<CollectServerDataOptions, "logger" | "onProgress"> {
  outputCsv?: string;
}

export interface RefetchCommandOptions extends Omit<RefetchOptions, "logger" | "onProgress"> {
  outputCsv?: string;
}

function toPoints(rows: readonly ValidServerRecord[]): ActivityPoint[] {
  return rows.map((row) => ({
    name: row.serverName,
    stars: row.stars,
    daysSinceCommit: row.daysSinceCommit,
  }));
}

async function writePlots(validRows: readonly ValidServerRecord[], options: PlotOptions, logger: Logger): Promise<void> {
  const points = toPoints(validRows);
  const outputPlot = options.outputPlot ?? DEFAULT_OUTPUT_PLOT;

  await writeReport(outputPlot, renderScatterReport(points, { useLogScale: options.logScale }));
  logger.info(`✓ Plot saved to ${outputPlot}`);

  if (!options.skipEnhanced) {
    const enhancedPlot = options.enhancedPlot ?? DEFAULT_ENHANCED_PLOT;
    await writeReport(enhancedPlot, renderEnhancedReport(points));
    logger.info(`✓ Enhanced plot saved to ${enhancedPlot}`);
  }
}

async function loadTable(inputCsv: string, logger: Logger): Promise<ServerRecord[]> {
  if (!fs.existsSync(inputCsv)) {
    throw new CliError(`File not found: ${inputCsv}`);
  }
  logger.info(`Loading data from ${inputCsv}...`);
  return readTableCsv(inputCsv);
}

export async function runAnalyze(options: AnalyzeOptions, logger: Logger): Promise<ServerRecord[]> {
  const outputCsv = options.outputCsv ?? DEFAULT_OUTPUT_CSV;

  logger.info("\nMCP Server Activity vs Popularity Analysis\n");
  logger.info("Step 1: Fetching MCP servers...");

  const { records, eligibleCount, fetchedCount } = await collectServerData({
    ...options,
    logger,
    onPage: ({ page, total }) => logger.debug("registry page", { page, total }),
    onProgress: ({ completed, total, entry, stats }) => {
      const detail = stats ? `${stats.stars} stars, ${stats.daysSinceCommit.toFixed(1)} days` : "no stats";
      logger.info(`[${completed}/${total}] ${entry.name}: ${detail}`);
    },
  });

  logger.info(`✓ Fetched GitHub stats for ${fetchedCount}/${eligibleCount} repos`);

  const table = createTable(records);
  await writeTableCsv(outputCsv, table);

  const summary = summarizeTable(table);
  logger.info(`✓ Saved data to ${outputCsv}`);
  logger.info(`Total servers: ${summary.total}`);
  logger.info(`With GitHub URLs: ${summary.withGitHub}`);
  logger.info(`With GitHub stats: ${summary.withStats}`);

  const validRows = filterValidRows(table);
  if (validRows.length === 0) {
    throw new CliError("No valid data collected for plotting");
  }

  logger.info("Creating visualizations...");
  await writePlots(validRows, options, logger);
  logger.info("\n✓ Analysis complete!");

  return table;
}

export async function runVisualize(inputCsv: string, options: PlotOptions, logger: Logger): Promise<number> {
  const rows = await loadTable(inputCsv, logger);
  const validRows = filterValidRows(rows);

  if (validRows.length === 0) {
    throw new CliError("No valid data found in CSV for plotting");
  }

  logger.info(`✓ Loaded ${validRows.length} valid data points`);
  await writePlots(validRows, options, logger);
  logger.info("\n✓ Visualizations created!");

  return validRows.length;
}

export async function runRefetch(
  inputCsv: string,
  options: RefetchCommandOptions,
  logger: Logger
): Promise<{ attempted: number; updated: number }> {
  const rows = await loadTable(inputCsv, logger);
  const outputCsv = options.outputCsv ?? inputCsv;
  logger.info(`✓ Loaded ${rows.length} rows (${summarizeTable(rows).withGitHub} with GitHub URLs)`);

  const pending = selectRowsForRefetch(rows, options.force).length;
  if (options.force) {
    logger.info(`Force mode: refetching all ${pending} rows with GitHub URLs`);
  } else {
    logger.info(`Rows with existing stats: ${summarizeTable(rows).withStats}`);
    logger.info(`Rows to refetch: ${pending}`);
  }

  if (pending === 0) {
    logger.info("✓ All rows already have GitHub stats! Nothing to refetch.");
    return { attempted: 0, updated: 0 };
  }

  const result = await refetchTable(rows, {
    ...options,
    maxConcurrent: options.maxConcurrent ?? DEFAULT_MAX_CONCURRENT,
    logger,
    onProgress: ({ completed, total, row, stats }) => {
      logger.info(`[${completed}/${total}] ${row.serverName}: ${stats ? `${stats.stars} stars` : "no stats"}`);
    },
  });

  await writeTableCsv(outputCsv, result.rows);

  const summary = summarizeTable(result.rows);
  logger.info("\n✓ Refetch complete!");
  logger.info(`  Total rows: ${summary.total}`);
  logger.info(`  Attempted to refetch: ${result.attempted}`);
  logger.info(`  Successfully updated: ${result.updated}`);
  logger.info(`  Failed: ${result.attempted - result.updated}`);
  logger.info(`  Total with stats now: ${summary.withStats}/${summary.total}`);
  logger.info(`  Updated CSV saved to: ${outputCsv}`);

  return { attempted: result.attempted, updated: result.updated };
}
