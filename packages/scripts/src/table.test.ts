import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { runShutdownCleanups, silentLogger } from "./common";
import {
  createTable,
  filterValidRows,
  formatTableCsv,
  readTableCsv,
  summarizeTable,
  writeTableCsv,
  type ServerRecord,
} from "./table";

function record(serverName: string, stars: number | null, overrides: Partial<ServerRecord> = {}): ServerRecord {
  return {
    serverName,
    serverVersion: "1.0.0",
    githubUrl: `https://github.com/acme/${serverName}`,
    stars,
    daysSinceCommit: stars === null ? null : 3,
    lastCommitDate: stars === null ? null : "2025-11-12T00:00:00Z",
    ...overrides,
  };
}

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "mcp-table-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("createTable", () => {
  test("sorts by stars descending with missing stars last and ties in input order", () => {
    const rows = [record("a", 10), record("b", null), record("c", 50), record("d", 10), record("e", null)];

    const table = createTable(rows);

    expect(table.map((r) => r.serverName)).toEqual(["c", "a", "d", "b", "e"]);
    expect(createTable(table)).toEqual(table);
    // input untouched
    expect(rows.map((r) => r.serverName)).toEqual(["a", "b", "c", "d", "e"]);
  });

  test("filterValidRows keeps only rows with stars and days", () => {
    const rows = [record("a", 10), record("b", null), record("c", 0)];
    const valid = filterValidRows(rows);

    expect(valid.map((r) => r.serverName)).toEqual(["a", "c"]);
    expect(filterValidRows(valid)).toEqual(valid);
    expect(summarizeTable(rows)).toEqual({ total: 3, withGitHub: 3, withStats: 2 });
  });
});

describe("formatTableCsv", () => {
  test("quotes strings, leaves numbers bare and missing values empty", () => {
    const csv = formatTableCsv([
      {
        serverName: "io.example/alpha",
        serverVersion: "1.0.0",
        githubUrl: "https://github.com/acme/alpha",
        stars: 42,
        daysSinceCommit: 2.5,
        lastCommitDate: "2025-11-12T12:00:00Z",
      },
      record('say "hi", ok', null, { serverVersion: "0.1", githubUrl: null }),
    ]);

    expect(csv).toBe(
      "server_name,server_version,github_url,stars,days_since_commit,last_commit_date\n" +
        '"io.example/alpha","1.0.0","https://github.com/acme/alpha",42,2.5,"2025-11-12T12:00:00Z"\n' +
        '"say ""hi"", ok","0.1",,,,\n'
    );
  });
});

describe("CSV persistence", () => {
  test("round-trips a table through disk", async () => {
    const file = path.join(dir, "table.csv");
    const rows = createTable([
      record("alpha", 7, { daysSinceCommit: 12.25 }),
      record('quoted "name", with comma', null, { githubUrl: null }),
      record("beta", 120),
    ]);

    await writeTableCsv(file, rows);

    expect(await readTableCsv(file)).toEqual(rows);
    expect(fs.readdirSync(dir)).toEqual(["table.csv"]);
  });

  test("replaces an existing file", async () => {
    const file = path.join(dir, "table.csv");
    await writeTableCsv(file, [record("old", 1)]);
    await writeTableCsv(file, [record("new", 2)]);

    expect((await readTableCsv(file)).map((r) => r.serverName)).toEqual(["new"]);
  });

  test("an interrupt before the rename removes the temporary file", async () => {
    const file = path.join(dir, "table.csv");
    const realRename = fs.promises.rename;
    let beforeInterrupt: string[] = [];
    let afterInterrupt: string[] = [];
    vi.spyOn(fs.promises, "rename").mockImplementation(async (from, to) => {
      beforeInterrupt = fs.readdirSync(dir);
      runShutdownCleanups(silentLogger);
      afterInterrupt = fs.readdirSync(dir);
      return realRename(from, to);
    });

    await expect(writeTableCsv(file, [record("a", 1)])).rejects.toThrow("ENOENT");

    expect(beforeInterrupt).toEqual([`.table.csv.${process.pid}.tmp`]);
    expect(afterInterrupt).toEqual([]);
    expect(fs.existsSync(file)).toBe(false);
  });

  test("treats a partial stats triple as missing", async () => {
    const file = path.join(dir, "partial.csv");
    fs.writeFileSync(
      file,
      "server_name,server_version,github_url,stars,days_since_commit,last_commit_date\n" + '"x","1",,5,,\n'
    );

    expect(await readTableCsv(file)).toEqual([
      { serverName: "x", serverVersion: "1", githubUrl: null, stars: null, daysSinceCommit: null, lastCommitDate: null },
    ]);
  });

  test("rejects a file without the expected columns", async () => {
    const file = path.join(dir, "other.csv");
    fs.writeFileSync(file, "server_name,server_version\n\"x\",\"1\"\n");

    await expect(readTableCsv(file)).rejects.toThrow(
      `CSV file ${file} is missing columns: github_url, stars, days_since_commit, last_commit_date`
    );
  });

  test("reports the line of an unparseable number", async () => {
    const file = path.join(dir, "bad.csv");
    fs.writeFileSync(
      file,
      "server_name,server_version,github_url,stars,days_since_commit,last_commit_date\n" +
        '"x","1","https://github.com/a/b",abc,1.0,"2025-01-01"\n'
    );

    await expect(readTableCsv(file)).rejects.toThrow('Invalid stars value "abc" on line 2');
  });
});
