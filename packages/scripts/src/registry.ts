/*
  MCP registry client.

  Pages through `GET <registry>/servers?limit=N&cursor=C` following
  `metadata.nextCursor` until the registry stops returning one.
*/

import { z } from "zod";
import {
  DEFAULT_TIMEOUT_MS,
  REGISTRY_BASE_URL,
  USER_AGENT,
  resolveFetch,
  silentLogger,
  type RequestOptions,
} from "./common";

export const DEFAULT_PAGE_SIZE = 100;

// Hard stop for a registry that keeps handing out cursors.
export const DEFAULT_MAX_PAGES = 1000;

const repositorySchema = z.object({
  url: z.string().nullish(),
  source: z.string().nullish(),
});

const serverEntrySchema = z.object({
  server: z.object({
    name: z.string(),
    description: z.string().nullish(),
    version: z.string(),
    repository: repositorySchema.nullish(),
  }),
});

const registryResponseSchema = z.object({
  servers: z.array(serverEntrySchema),
  metadata: z.object({
    nextCursor: z.string().nullish(),
    count: z.number().int().nonnegative(),
  }),
});

export type RegistryResponse = z.infer<typeof registryResponseSchema>;

export interface RegistryEntry {
  name: string;
  version: string;
  repositoryUrl: string | null;
}

export interface RegistryPage {
  entries: RegistryEntry[];
  nextCursor: string | null;
}

export interface FetchPageOptions extends RequestOptions {
  limit?: number;
  cursor?: string | null;
  baseUrl?: string;
}

export interface FetchAllOptions extends RequestOptions {
  pageSize?: number;
  maxPages?: number;
  baseUrl?: string;
  onPage?: (progress: { page: number; pageCount: number; total: number }) => void;
}

function toEntry(item: RegistryResponse["servers"][number]): RegistryEntry {
  const url = item.server.repository?.url?.trim();
  return {
    name: item.server.name,
    version: item.server.version,
    repositoryUrl: url ? url : null,
  };
}

export async function fetchServersPage(options: FetchPageOptions = {}): Promise<RegistryPage> {
  const fetchImpl = resolveFetch(options.fetchImpl);
  const url = new URL(`${options.baseUrl ?? REGISTRY_BASE_URL}/servers`);
  url.searchParams.set("limit", String(options.limit ?? DEFAULT_PAGE_SIZE));
  if (options.cursor) {
    url.searchParams.set("cursor", options.cursor);
  }

  const res = await fetchImpl(url.toString(), {
    headers: { Accept: "application/json", "User-Agent": USER_AGENT },
    signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
  });

  if (!res.ok) {
    const text = await res.text();
    throw new Error(`Registry API error ${res.status}: ${text}`);
  }

  const parsed = registryResponseSchema.safeParse(await res.json());
  if (!parsed.success) {
    throw new Error(`Malformed registry response: ${parsed.error.message}`);
  }

  return {
    entries: parsed.data.servers.map(toEntry),
    nextCursor: parsed.data.metadata.nextCursor || null,
  };
}

/**
 * Fetch every registry entry, in page order. A failure on any page rejects the
 * whole call; entries already fetched are discarded.
 */
export async function fetchAllServers(options: FetchAllOptions = {}): Promise<RegistryEntry[]> {
  const logger = options.logger ?? silentLogger;
  const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
  const entries: RegistryEntry[] = [];
  const seenCursors = new Set<string>();
  let cursor: string | null = null;
  let page = 0;

  do {
    if (page >= maxPages) {
      throw new Error(`Registry pagination exceeded ${maxPages} pages; aborting`);
    }

    const result: RegistryPage = await fetchServersPage({
      limit: options.pageSize ?? DEFAULT_PAGE_SIZE,
      cursor,
      baseUrl: options.baseUrl,
      fetchImpl: options.fetchImpl,
      timeoutMs: options.timeoutMs,
    });

    page++;
    entries.push(...result.entries);
    options.onPage?.({ page, pageCount: result.entries.length, total: entries.length });
    logger.debug("fetched registry page", { page, count: result.entries.length, total: entries.length });

    cursor = result.nextCursor;
    if (cursor !== null) {
      if (seenCursors.has(cursor)) {
        throw new Error(`Registry returned cursor "${cursor}" twice; aborting pagination`);
      }
      seenCursors.add(cursor);
    }
  } while (cursor !== null);

  return entries;
}
