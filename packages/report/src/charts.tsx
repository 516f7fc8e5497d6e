import type { ReactNode } from "react";
import { Bar, BarChart, CartesianGrid, Scatter, ScatterChart, XAxis, YAxis } from "recharts";
import { formatSummary, type ActivityPoint, type ActivitySummary, type HistogramBin } from "./stats";

export const chartColors = {
  linear: "hsl(260, 60%, 40%)",
  log: "hsl(330, 70%, 50%)",
  stars: "hsl(200, 70%, 65%)",
  activity: "hsl(15, 80%, 65%)",
};

type ActivityScatterProps = {
  points: readonly ActivityPoint[];
  width: number;
  height: number;
  useLogScale?: boolean;
  color?: string;
  compact?: boolean;
};

export function ActivityScatter({ points, width, height, useLogScale = false, color, compact = false }: ActivityScatterProps) {
  // log axis cannot place zero-star repositories
  const data = useLogScale ? points.filter((p) => p.stars > 0) : [...points];
  const xLabel = compact ? "Days Since Commit" : "Days Since Most Recent Commit";
  const yLabel = useLogScale
    ? compact
      ? "Stars (log scale)"
      : "GitHub Stars (Popularity, log scale)"
    : compact
      ? "Stars"
      : "GitHub Stars (Popularity)";

  return (
    <ScatterChart width={width} height={height} margin={{ top: 20, right: 30, bottom: 40, left: 40 }}>
      <CartesianGrid strokeDasharray="3 3" strokeOpacity={0.3} />
      <XAxis
        type="number"
        dataKey="daysSinceCommit"
        name="Days since commit"
        label={{ value: xLabel, position: "insideBottom", offset: -20 }}
      />
      <YAxis
        type="number"
        dataKey="stars"
        name="Stars"
        scale={useLogScale ? "log" : "linear"}
        domain={useLogScale ? ["dataMin", "dataMax"] : [0, "auto"]}
        allowDataOverflow={useLogScale}
        label={{ value: yLabel, angle: -90, position: "insideLeft", offset: -20 }}
      />
      <Scatter
        data={data}
        fill={color ?? (useLogScale ? chartColors.log : chartColors.linear)}
        fillOpacity={0.6}
        stroke="#000000"
        strokeWidth={0.5}
        isAnimationActive={false}
      />
    </ScatterChart>
  );
}

type DistributionChartProps = {
  bins: readonly HistogramBin[];
  width: number;
  height: number;
  xLabel: string;
  color: string;
};

function formatBinEdge(value: number): string {
  return Math.abs(value) >= 10 ? value.toFixed(0) : value.toFixed(1);
}

export function DistributionChart({ bins, width, height, xLabel, color }: DistributionChartProps) {
  const data = bins.map((bin) => ({
    label: `${formatBinEdge(bin.start)}-${formatBinEdge(bin.end)}`,
    count: bin.count,
  }));

  return (
    <BarChart width={width} height={height} data={data} margin={{ top: 20, right: 30, bottom: 40, left: 40 }}>
      <CartesianGrid strokeDasharray="3 3" strokeOpacity={0.3} vertical={false} />
      <XAxis dataKey="label" label={{ value: xLabel, position: "insideBottom", offset: -20 }} />
      <YAxis allowDecimals={false} label={{ value: "Count", angle: -90, position: "insideLeft", offset: -20 }} />
      <Bar dataKey="count" fill={color} isAnimationActive={false} />
    </BarChart>
  );
}

export function SummaryPanel({ summary }: { summary: ActivitySummary }) {
  return (
    <ul
      className="summary"
      style={{
        listStyle: "none",
        margin: 0,
        padding: "8px 12px",
        border: "1px solid #cccccc",
        borderRadius: 6,
        fontSize: 12,
        display: "inline-block",
      }}
    >
      {formatSummary(summary).map((line) => (
        <li key={line}>{line}</li>
      ))}
    </ul>
  );
}

export function ChartPanel({ title, children }: { title: string; children: ReactNode }) {
  return (
    <section className="chart-panel">
      <h2 style={{ fontSize: 14, margin: "0 0 4px" }}>{title}</h2>
      {children}
    </section>
  );
}
