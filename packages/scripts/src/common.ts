/*
  Common utilities for the MCP server data collection scripts.

  This file contains the shared configuration, GitHub request headers, logging
  and shutdown handling used by the registry pager, the stats fetcher and the
  CLI commands.
*/

import dotenv from "dotenv";

dotenv.config();

// Endpoint configuration
export const REGISTRY_BASE_URL =
  process.env.MCP_REGISTRY_URL || "https://registry.modelcontextprotocol.io/v0";

export const GITHUB_API_BASE_URL = process.env.GITHUB_API_URL || "https://api.github.com";

export const DEFAULT_TIMEOUT_MS = parsePositiveInt(process.env.REQUEST_TIMEOUT_MS, 30_000);

export const USER_AGENT = "mcp-server-stats/1.0";

export const MAX_CONCURRENCY_LIMIT = 50;

export type Logger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string, err?: unknown) => void;
  debug: (message: string, meta?: Record<string, unknown>) => void;
};

// Options shared by everything that talks HTTP
export interface RequestOptions {
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * User-facing failure. The CLI prints the message and exits with `exitCode`
 * instead of dumping a stack trace.
 */
export class CliError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = "CliError";
    this.exitCode = exitCode;
  }
}

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const value = parseInt(raw, 10);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

export function createConsoleLogger(options: { quiet?: boolean; verbose?: boolean } = {}): Logger {
  return {
    info: (message) => {
      if (!options.quiet) console.log(message);
    },
    warn: (message) => console.warn(message),
    error: (message, err) => {
      if (err === undefined) {
        console.error(message);
      } else {
        console.error(message, err);
      }
    },
    debug: (message, meta) => {
      if (options.verbose) console.debug(`[debug] ${message}`, meta ?? {});
    },
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};

/**
 * Explicit token first, then GITHUB_TOKEN from the environment. Read on every
 * call so a token exported after start-up is still picked up.
 */
export function resolveGithubToken(explicit?: string | null): string | undefined {
  const token = explicit || process.env.GITHUB_TOKEN;
  return token ? token.trim() || undefined : undefined;
}

export function githubHeaders(token?: string): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: "application/vnd.github.v3+json",
    "User-Agent": USER_AGENT,
  };

  if (token) {
    headers.Authorization = `token ${token}`;
  }

  return headers;
}

export function resolveFetch(fetchImpl?: typeof fetch): typeof fetch {
  if (fetchImpl) return fetchImpl;
  if (typeof globalThis.fetch !== "function") {
    throw new Error("Fetch API is not available in this environment");
  }
  return globalThis.fetch.bind(globalThis);
}

export function assertConcurrency(maxConcurrent: number): void {
  if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1 || maxConcurrent > MAX_CONCURRENCY_LIMIT) {
    throw new Error(`maxConcurrent must be an integer between 1 and ${MAX_CONCURRENCY_LIMIT}, got ${maxConcurrent}`);
  }
}

const shutdownCleanups = new Set<() => void>();

/**
 * Register synchronous cleanup to run if the process is interrupted. Returns
 * a function that unregisters it.
 */
export function onShutdown(cleanup: () => void): () => void {
  shutdownCleanups.add(cleanup);
  return () => {
    shutdownCleanups.delete(cleanup);
  };
}

export function runShutdownCleanups(logger: Logger): void {
  for (const cleanup of shutdownCleanups) {
    try {
      cleanup();
    } catch (err) {
      logger.error("Cleanup failed during shutdown", err);
    }
  }
  shutdownCleanups.clear();
}

// Graceful shutdown handler
export function setupGracefulShutdown(logger: Logger): void {
  process.on("SIGINT", () => {
    logger.warn("\n⚠ Interrupted by user");
    runShutdownCleanups(logger);
    process.exit(130);
  });

  process.on("SIGTERM", () => {
    logger.warn("\nReceived SIGTERM, shutting down...");
    runShutdownCleanups(logger);
    process.exit(143);
  });
}
