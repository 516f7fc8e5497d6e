/*
  Collect registry entries and their GitHub stats.

  - Fetch every server from the MCP registry
  - Split entries into GitHub-hosted and the rest
  - Fetch stats for GitHub-hosted entries, at most `maxConcurrent` at a time
  - Produce exactly one ServerRecord per registry entry
*/

import { assertConcurrency, silentLogger } from "./common";
import { fetchRepoStatsFromUrl, isGitHubUrl, type FetchStatsOptions, type RepoStats } from "./github";
import { fetchAllServers, type FetchAllOptions, type RegistryEntry } from "./registry";
import type { ServerRecord } from "./table";

export const DEFAULT_MAX_CONCURRENT = 10;

/**
 * Counting semaphore. Waiters are admitted in the order they called
 * `acquire()`.
 */
export class AdmissionGate {
  private readonly limit: number;
  private inFlight = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error(`AdmissionGate limit must be a positive integer, got ${limit}`);
    }
    this.limit = limit;
  }

  get active(): number {
    return this.inFlight;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  acquire(): Promise<void> {
    if (this.inFlight < this.limit) {
      this.inFlight++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // slot passes straight to the next waiter, inFlight is unchanged
      next();
      return;
    }
    if (this.inFlight === 0) {
      throw new Error("AdmissionGate released more times than acquired");
    }
    this.inFlight--;
  }
}

export interface MapBoundedOptions<T, R> {
  onError: (item: T, err: unknown) => R;
  onSettled?: (result: R, item: T) => void;
}

/**
 * Run `worker` over `items` with at most `limit` tasks alive at once. A slot is
 * taken before each task is created, so pending work never piles up as task
 * objects. Results come back in submission order; `onSettled` sees completion
 * order.
 */
export async function mapBounded<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  options: MapBoundedOptions<T, R>
): Promise<R[]> {
  const gate = new AdmissionGate(limit);
  const results = new Array<R>(items.length);
  const tasks: Promise<void>[] = [];

  for (let i = 0; i < items.length; i++) {
    await gate.acquire();
    const item = items[i];

    tasks.push(
      (async () => {
        let result: R;
        try {
          result = await worker(item, i);
        } catch (err) {
          result = options.onError(item, err);
        } finally {
          gate.release();
        }
        results[i] = result;
        options.onSettled?.(result, item);
      })()
    );
  }

  await Promise.all(tasks);
  return results;
}

export interface CollectProgress {
  completed: number;
  total: number;
  entry: RegistryEntry;
  stats: RepoStats | null;
}

export interface CollectOptions extends FetchStatsOptions {
  maxConcurrent?: number;
  onProgress?: (progress: CollectProgress) => void;
}

export interface CollectResult {
  records: ServerRecord[];
  eligibleCount: number;
  fetchedCount: number;
}

export function toRecord(entry: RegistryEntry, stats: RepoStats | null): ServerRecord {
  return {
    serverName: entry.name,
    serverVersion: entry.version,
    githubUrl: isGitHubUrl(entry.repositoryUrl) ? entry.repositoryUrl : null,
    stars: stats ? stats.stars : null,
    daysSinceCommit: stats ? stats.daysSinceCommit : null,
    lastCommitDate: stats ? stats.lastCommitDate : null,
  };
}

export async function collectRecords(
  entries: readonly RegistryEntry[],
  options: CollectOptions = {}
): Promise<CollectResult> {
  const maxConcurrent = options.maxConcurrent ?? DEFAULT_MAX_CONCURRENT;
  assertConcurrency(maxConcurrent);
  const logger = options.logger ?? silentLogger;

  const eligible = entries.filter((entry) => isGitHubUrl(entry.repositoryUrl));
  const ineligible = entries.filter((entry) => !isGitHubUrl(entry.repositoryUrl));

  let completed = 0;
  const stats = await mapBounded(
    eligible,
    maxConcurrent,
    (entry) => fetchRepoStatsFromUrl(entry.repositoryUrl, options),
    {
      onError: (entry, err) => {
        logger.warn(`Unexpected error collecting ${entry.name}: ${err instanceof Error ? err.message : String(err)}`);
        return null;
      },
      onSettled: (result, entry) => {
        completed++;
        options.onProgress?.({ completed, total: eligible.length, entry, stats: result });
      },
    }
  );

  const records = [
    ...eligible.map((entry, i) => toRecord(entry, stats[i])),
    ...ineligible.map((entry) => toRecord(entry, null)),
  ];
  const fetchedCount = stats.filter((result) => result !== null).length;

  return { records, eligibleCount: eligible.length, fetchedCount };
}

export interface CollectServerDataOptions extends CollectOptions {
  pageSize?: number;
  maxPages?: number;
  registryUrl?: string;
  onPage?: FetchAllOptions["onPage"];
}

export async function collectServerData(options: CollectServerDataOptions = {}): Promise<CollectResult> {
  const entries = await fetchAllServers({
    pageSize: options.pageSize,
    maxPages: options.maxPages,
    baseUrl: options.registryUrl,
    fetchImpl: options.fetchImpl,
    timeoutMs: options.timeoutMs,
    logger: options.logger,
    onPage: options.onPage,
  });
  options.logger?.info(`✓ Found ${entries.length} servers`);
  return collectRecords(entries, options);
}
