import * as fs from "fs";
import * as path from "path";
import type { ReactElement, ReactNode } from "react";
import { renderToStaticMarkup } from "react-dom/server";
import { ActivityScatter, ChartPanel, DistributionChart, SummaryPanel, chartColors } from "./charts";
import { histogram, summarize, type ActivityPoint } from "./stats";

export const DEFAULT_TITLE = "MCP Server Activity vs Popularity";
export const HISTOGRAM_BINS = 50;

export interface ScatterReportOptions {
  title?: string;
  useLogScale?: boolean;
  width?: number;
  height?: number;
}

export interface EnhancedReportOptions {
  title?: string;
  width?: number;
  height?: number;
}

function ReportDocument({ title, children }: { title: string; children: ReactNode }) {
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <title>{title}</title>
      </head>
      <body style={{ fontFamily: "Helvetica, Arial, sans-serif", margin: 24, color: "#222222" }}>
        <h1 style={{ fontSize: 20 }}>{title}</h1>
        {children}
      </body>
    </html>
  );
}

function toHtml(element: ReactElement): string {
  return `<!DOCTYPE html>\n${renderToStaticMarkup(element)}\n`;
}

export function renderScatterReport(points: readonly ActivityPoint[], options: ScatterReportOptions = {}): string {
  const summary = summarize(points);
  const title = options.title ?? DEFAULT_TITLE;

  return toHtml(
    <ReportDocument title={title}>
      <ActivityScatter
        points={points}
        width={options.width ?? 1200}
        height={options.height ?? 800}
        useLogScale={options.useLogScale}
      />
      <SummaryPanel summary={summary} />
    </ReportDocument>
  );
}

/**
 * 2x2 grid: linear scatter, log scatter, star distribution, activity
 * distribution.
 */
export function renderEnhancedReport(points: readonly ActivityPoint[], options: EnhancedReportOptions = {}): string {
  const summary = summarize(points);
  const title = options.title ?? DEFAULT_TITLE;
  const width = Math.floor((options.width ?? 1400) / 2);
  const height = Math.floor((options.height ?? 1000) / 2);

  return toHtml(
    <ReportDocument title={title}>
      <div style={{ display: "grid", gridTemplateColumns: `repeat(2, ${width}px)`, gap: 16 }}>
        <ChartPanel title="Linear Scale">
          <ActivityScatter points={points} width={width} height={height} compact />
        </ChartPanel>
        <ChartPanel title="Log Scale">
          <ActivityScatter points={points} width={width} height={height} useLogScale compact />
        </ChartPanel>
        <ChartPanel title="Star Distribution">
          <DistributionChart
            bins={histogram(points.map((p) => p.stars), HISTOGRAM_BINS)}
            width={width}
            height={height}
            xLabel="Stars"
            color={chartColors.stars}
          />
        </ChartPanel>
        <ChartPanel title="Activity Distribution">
          <DistributionChart
            bins={histogram(points.map((p) => p.daysSinceCommit), HISTOGRAM_BINS)}
            width={width}
            height={height}
            xLabel="Days Since Commit"
            color={chartColors.activity}
          />
        </ChartPanel>
      </div>
      <SummaryPanel summary={summary} />
    </ReportDocument>
  );
}

export async function writeReport(filePath: string, html: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  await fs.promises.writeFile(filePath, html, "utf8");
}
