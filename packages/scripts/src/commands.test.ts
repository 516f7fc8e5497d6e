import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { CliError, silentLogger } from "./common";
import { runAnalyze, runRefetch, runVisualize } from "./commands";
import { formatTableCsv, readTableCsv, type ServerRecord } from "./table";

const API = "https://api.github.test";
const REGISTRY = "https://registry.test/v0";
const NOW = Date.parse("2025-11-15T00:00:00Z");

function jsonResponse(payload: unknown, status = 200): Response {
  return new Response(JSON.stringify(payload), { status, headers: { "content-type": "application/json" } });
}

function requestUrl(input: string | URL | Request): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}

// registry serves `servers` on one page; acme/repo-N on GitHub has N stars
function fakeNetwork(servers: Array<{ name: string; url?: string }>) {
  return vi.fn<typeof fetch>(async (input) => {
    const url = requestUrl(input);
    if (url.startsWith(REGISTRY)) {
      return jsonResponse({
        servers: servers.map((s) => ({
          server: { name: s.name, version: "1.0.0", repository: s.url ? { url: s.url } : undefined },
        })),
        metadata: { count: servers.length },
      });
    }
    const match = url.match(/\/repos\/acme\/repo-(\d+)/);
    if (!match) return jsonResponse({ message: "Not Found" }, 404);
    if (url.includes("/commits")) {
      return jsonResponse([{ commit: { author: { date: "2025-11-05T00:00:00Z" } } }]);
    }
    return jsonResponse({ stargazers_count: Number(match[1]) });
  });
}

function row(serverName: string, stars: number | null, githubUrl: string | null): ServerRecord {
  return {
    serverName,
    serverVersion: "1.0.0",
    githubUrl,
    stars,
    daysSinceCommit: stars === null ? null : 4,
    lastCommitDate: stars === null ? null : "2025-11-11T00:00:00Z",
  };
}

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "mcp-commands-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("runVisualize", () => {
  test("fails on a missing input file", async () => {
    const missing = path.join(dir, "nope.csv");

    const run = runVisualize(missing, {}, silentLogger);

    await expect(run).rejects.toBeInstanceOf(CliError);
    await expect(run).rejects.toThrow(`File not found: ${missing}`);
  });

  test("fails when no row has stats", async () => {
    const input = path.join(dir, "empty.csv");
    fs.writeFileSync(input, formatTableCsv([row("a", null, "https://github.com/acme/a")]));

    await expect(runVisualize(input, {}, silentLogger)).rejects.toThrow("No valid data found in CSV for plotting");
  });

  test("writes the scatter and enhanced reports", async () => {
    const input = path.join(dir, "data.csv");
    fs.writeFileSync(input, formatTableCsv([row("a", 12, null), row("b", null, null), row("c", 300, null)]));
    const outputPlot = path.join(dir, "plot.html");
    const enhancedPlot = path.join(dir, "nested", "enhanced.html");

    const count = await runVisualize(input, { outputPlot, enhancedPlot }, silentLogger);

    expect(count).toBe(2);
    expect(fs.readFileSync(outputPlot, "utf8").startsWith("<!DOCTYPE html>\n")).toBe(true);
    expect(fs.readFileSync(enhancedPlot, "utf8").startsWith("<!DOCTYPE html>\n")).toBe(true);
  });

  test("skips the enhanced report on request", async () => {
    const input = path.join(dir, "data.csv");
    fs.writeFileSync(input, formatTableCsv([row("a", 12, null)]));
    const outputPlot = path.join(dir, "plot.html");
    const enhancedPlot = path.join(dir, "enhanced.html");

    await runVisualize(input, { outputPlot, enhancedPlot, skipEnhanced: true, logScale: true }, silentLogger);

    expect(fs.existsSync(outputPlot)).toBe(true);
    expect(fs.existsSync(enhancedPlot)).toBe(false);
  });
});

describe("runRefetch", () => {
  test("leaves a complete table untouched", async () => {
    const input = path.join(dir, "data.csv");
    const original = formatTableCsv([row("a", 12, "https://github.com/acme/repo-12")]);
    fs.writeFileSync(input, original);
    const fetchImpl = fakeNetwork([]);

    const result = await runRefetch(input, { fetchImpl, baseUrl: API }, silentLogger);

    expect(result).toEqual({ attempted: 0, updated: 0 });
    expect(fs.readFileSync(input, "utf8")).toBe(original);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  test("fills missing stats into a separate output file", async () => {
    const input = path.join(dir, "data.csv");
    const output = path.join(dir, "updated.csv");
    const original = formatTableCsv([
      row("known", 50, "https://github.com/acme/repo-50"),
      row("pending", null, "https://github.com/acme/repo-8"),
      row("lost", null, "https://github.com/acme/lost"),
    ]);
    fs.writeFileSync(input, original);

    const result = await runRefetch(
      input,
      { outputCsv: output, fetchImpl: fakeNetwork([]), baseUrl: API, now: () => NOW },
      silentLogger
    );

    expect(result).toEqual({ attempted: 2, updated: 1 });
    expect(fs.readFileSync(input, "utf8")).toBe(original);
    const updated = await readTableCsv(output);
    expect(updated.map((r) => [r.serverName, r.stars, r.daysSinceCommit])).toEqual([
      ["known", 50, 4],
      ["pending", 8, 10],
      ["lost", null, null],
    ]);
  });
});

describe("runAnalyze", () => {
  test("collects, saves a sorted CSV and renders reports", async () => {
    const outputCsv = path.join(dir, "servers.csv");
    const outputPlot = path.join(dir, "plot.html");
    const enhancedPlot = path.join(dir, "enhanced.html");
    const fetchImpl = fakeNetwork([
      { name: "small", url: "https://github.com/acme/repo-3" },
      { name: "elsewhere", url: "https://gitlab.com/acme/repo-1" },
      { name: "big", url: "https://github.com/acme/repo-900" },
    ]);

    const logger = { ...silentLogger, info: vi.fn() };

    const table = await runAnalyze(
      { outputCsv, outputPlot, enhancedPlot, registryUrl: REGISTRY, baseUrl: API, fetchImpl, now: () => NOW },
      logger
    );

    expect(table.map((r) => [r.serverName, r.stars])).toEqual([
      ["big", 900],
      ["small", 3],
      ["elsewhere", null],
    ]);
    expect(await readTableCsv(outputCsv)).toEqual(table);
    expect(fs.existsSync(outputPlot)).toBe(true);
    expect(fs.existsSync(enhancedPlot)).toBe(true);
    expect(logger.info).toHaveBeenCalledWith("Total servers: 3");
    expect(logger.info).toHaveBeenCalledWith("With GitHub URLs: 2");
    expect(logger.info).toHaveBeenCalledWith("With GitHub stats: 2");
  });

  test("saves the CSV but fails when nothing can be plotted", async () => {
    const outputCsv = path.join(dir, "servers.csv");
    const outputPlot = path.join(dir, "plot.html");
    const fetchImpl = fakeNetwork([{ name: "no-repo" }]);

    await expect(
      runAnalyze({ outputCsv, outputPlot, registryUrl: REGISTRY, baseUrl: API, fetchImpl }, silentLogger)
    ).rejects.toThrow("No valid data collected for plotting");
    expect((await readTableCsv(outputCsv)).map((r) => r.serverName)).toEqual(["no-repo"]);
    expect(fs.existsSync(outputPlot)).toBe(false);
  });
});
