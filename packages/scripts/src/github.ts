/*
  GitHub REST client for repository popularity and activity.

  For one repository:
  - GET /repos/{owner}/{repo}                     -> stargazers_count
  - GET /repos/{owner}/{repo}/commits?per_page=1  -> newest commit author date

  Every failure (not found, forbidden, rate limited, empty repository, timeout,
  malformed payload) resolves to `null`. Nothing here throws to the caller.
*/

import { z } from "zod";
import {
  DEFAULT_TIMEOUT_MS,
  GITHUB_API_BASE_URL,
  githubHeaders,
  resolveFetch,
  resolveGithubToken,
  silentLogger,
  type RequestOptions,
} from "./common";

const GITHUB_HOSTS = new Set(["github.com", "www.github.com"]);
const MS_PER_DAY = 86_400_000;

const repoResponseSchema = z.object({
  stargazers_count: z.number().int().nonnegative(),
  default_branch: z.string().nullish(),
  pushed_at: z.string().nullish(),
});

const commitsResponseSchema = z.array(
  z.object({
    commit: z.object({
      author: z.object({ date: z.string() }),
    }),
  })
);

export interface RepoRef {
  owner: string;
  repo: string;
}

export interface RepoStats extends RepoRef {
  stars: number;
  lastCommitDate: string;
  daysSinceCommit: number;
}

export interface FetchStatsOptions extends RequestOptions {
  token?: string | null;
  baseUrl?: string;
  now?: () => number;
}

function parseUrl(url: string): URL | null {
  try {
    return new URL(url);
  } catch {
    return null;
  }
}

export function isGitHubUrl(url: string | null | undefined): url is string {
  if (!url) return false;
  const parsed = parseUrl(url.trim());
  return parsed !== null && GITHUB_HOSTS.has(parsed.hostname.toLowerCase());
}

/**
 * Extract owner and repository name from a GitHub repository URL.
 *
 * Accepts `https://github.com/owner/repo` (or `www.github.com`), with an
 * optional `.git` suffix and trailing slash. Anything else (another host, a deeper path such as
 * `/owner/repo/tree/main`, a bare `/owner`) yields `null`.
 */
export function parseGitHubUrl(url: string | null | undefined): RepoRef | null {
  if (!url || !isGitHubUrl(url)) return null;

  const parsed = parseUrl(url.trim());
  if (!parsed || (parsed.protocol !== "https:" && parsed.protocol !== "http:")) return null;

  const segments = parsed.pathname.replace(/\/$/, "").split("/").slice(1);
  if (segments.length !== 2) return null;

  const [owner, rawRepo] = segments;
  const repo = rawRepo.replace(/\.git$/, "");
  if (!owner || !repo) return null;

  return { owner, repo };
}

export function daysSince(isoDate: string, now: number): number | null {
  const then = Date.parse(isoDate);
  if (Number.isNaN(then)) return null;
  return Math.max(0, now - then) / MS_PER_DAY;
}

export async function fetchRepoStats(ref: RepoRef, options: FetchStatsOptions = {}): Promise<RepoStats | null> {
  const logger = options.logger ?? silentLogger;
  const fullName = `${ref.owner}/${ref.repo}`;
  const baseUrl = options.baseUrl ?? GITHUB_API_BASE_URL;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  try {
    const fetchImpl = resolveFetch(options.fetchImpl);
    const headers = githubHeaders(resolveGithubToken(options.token));

    const repoRes = await fetchImpl(`${baseUrl}/repos/${fullName}`, {
      headers,
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (repoRes.status === 404 || repoRes.status === 403) {
      logger.debug("repository unavailable", { repo: fullName, status: repoRes.status });
      return null;
    }
    if (!repoRes.ok) {
      logger.debug("repository request failed", { repo: fullName, status: repoRes.status });
      return null;
    }

    const meta = repoResponseSchema.parse(await repoRes.json());

    const commitsRes = await fetchImpl(`${baseUrl}/repos/${fullName}/commits?per_page=1`, {
      headers,
      signal: AbortSignal.timeout(timeoutMs),
    });

    // 409: repository exists but has no commits yet
    if (!commitsRes.ok) {
      logger.debug("commit history unavailable", { repo: fullName, status: commitsRes.status });
      return null;
    }

    const commits = commitsResponseSchema.parse(await commitsRes.json());
    if (commits.length === 0) {
      logger.debug("no commits found", { repo: fullName });
      return null;
    }

    const lastCommitDate = commits[0].commit.author.date;
    const days = daysSince(lastCommitDate, (options.now ?? Date.now)());
    if (days === null) {
      logger.debug("unparseable commit date", { repo: fullName, date: lastCommitDate });
      return null;
    }

    return {
      owner: ref.owner,
      repo: ref.repo,
      stars: meta.stargazers_count,
      lastCommitDate,
      daysSinceCommit: days,
    };
  } catch (err) {
    logger.debug("stats fetch error", {
      repo: fullName,
      error: err instanceof Error ? err.message : String(err),
    });
    return null;
  }
}

export async function fetchRepoStatsFromUrl(
  url: string | null | undefined,
  options: FetchStatsOptions = {}
): Promise<RepoStats | null> {
  const ref = parseGitHubUrl(url);
  if (!ref) return null;
  return fetchRepoStats(ref, options);
}
