/*
  Refetch GitHub stats for rows of an existing table.

  Without `force`, only rows that have a GitHub URL but no stats are retried.
  With `force`, every row with a GitHub URL is refetched. Successful results
  are merged back into the row they came from; everything else is left as is.
*/

import { assertConcurrency, silentLogger } from "./common";
import { DEFAULT_MAX_CONCURRENT, mapBounded } from "./collect";
import { fetchRepoStatsFromUrl, type FetchStatsOptions, type RepoStats } from "./github";
import type { ServerRecord } from "./table";

export interface RefetchProgress {
  completed: number;
  total: number;
  row: ServerRecord;
  stats: RepoStats | null;
}

export interface RefetchOptions extends FetchStatsOptions {
  force?: boolean;
  maxConcurrent?: number;
  onProgress?: (progress: RefetchProgress) => void;
}

export interface RefetchResult {
  rows: ServerRecord[];
  attempted: number;
  updated: number;
}

export function selectRowsForRefetch(rows: readonly ServerRecord[], force = false): number[] {
  const indices: number[] = [];
  rows.forEach((row, index) => {
    if (row.githubUrl === null) return;
    if (force || row.stars === null || row.daysSinceCommit === null) {
      indices.push(index);
    }
  });
  return indices;
}

export async function refetchTable(rows: readonly ServerRecord[], options: RefetchOptions = {}): Promise<RefetchResult> {
  const maxConcurrent = options.maxConcurrent ?? DEFAULT_MAX_CONCURRENT;
  assertConcurrency(maxConcurrent);
  const logger = options.logger ?? silentLogger;

  const indices = selectRowsForRefetch(rows, options.force);
  const updatedRows = [...rows];
  let completed = 0;

  const results = await mapBounded(
    indices,
    maxConcurrent,
    (index) => fetchRepoStatsFromUrl(rows[index].githubUrl, options),
    {
      onError: (index, err) => {
        logger.warn(`Unexpected error refetching ${rows[index].serverName}: ${err instanceof Error ? err.message : String(err)}`);
        return null;
      },
      onSettled: (stats, index) => {
        completed++;
        options.onProgress?.({ completed, total: indices.length, row: rows[index], stats });
      },
    }
  );

  let updated = 0;
  results.forEach((stats, i) => {
    if (!stats) return;
    const index = indices[i];
    updatedRows[index] = {
      ...updatedRows[index],
      stars: stats.stars,
      daysSinceCommit: stats.daysSinceCommit,
      lastCommitDate: stats.lastCommitDate,
    };
    updated++;
  });

  return { rows: updatedRows, attempted: indices.length, updated };
}
