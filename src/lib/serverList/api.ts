import {
  SERVER_LIST_GAME,
  SERVER_LIST_MAX_PAGES,
  SERVER_LIST_PAGE_SIZE,
  SERVER_LIST_SORT,
  SERVER_LIST_STATUS,
  SERVER_LIST_TIMEOUT_MS,
  SERVER_LIST_URL,
} from "../constants";
import type { Listing, PlayerRange, ServerRecord } from "../../types";
import { eligibleRecords, parseServerListResponse } from "./normalize";

export type ServerListErrorCode = "HTTP_ERROR" | "TIMEOUT" | "NETWORK_ERROR" | "MALFORMED_PAYLOAD";

export class ServerListError extends Error {
  status: number;
  code: ServerListErrorCode;

  constructor(message: string, status: number, code: ServerListErrorCode) {
    super(message);
    this.name = "ServerListError";
    this.status = status;
    this.code = code;
  }
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface FetchServerListingOptions {
  fetchImpl?: FetchLike;
  baseUrl?: string;
  maxPages?: number;
  timeoutMs?: number;
}

interface ServerListPage {
  records: ServerRecord[];
  next: string | null;
}

export function buildFirstPageUrl(range: PlayerRange, baseUrl: string = SERVER_LIST_URL): string {
  const params = new URLSearchParams({
    "filter[game]": SERVER_LIST_GAME,
    "filter[status]": SERVER_LIST_STATUS,
    "page[size]": String(SERVER_LIST_PAGE_SIZE),
    sort: SERVER_LIST_SORT,
    "filter[players][min]": String(range.min),
    "filter[players][max]": String(range.max),
  });
  return `${baseUrl}?${params.toString()}`;
}

async function fetchPage(url: string, fetchImpl: FetchLike, timeoutMs: number): Promise<ServerListPage> {
  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  try {
    let response: Response;
    try {
      response = await fetchImpl(url, {
        method: "GET",
        signal: controller.signal,
        headers: { accept: "application/json" },
      });
    } catch (error: unknown) {
      if (timedOut) {
        throw new ServerListError(`Server list timeout after ${timeoutMs}ms`, 408, "TIMEOUT");
      }
      throw new ServerListError(
        error instanceof Error ? error.message : "Unknown server list failure",
        0,
        "NETWORK_ERROR"
      );
    }

    if (!response.ok) {
      throw new ServerListError(`Server list error ${response.status}`, response.status, "HTTP_ERROR");
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch {
      throw new ServerListError("Server list body is not JSON", response.status, "MALFORMED_PAYLOAD");
    }

    const page = parseServerListResponse(payload);
    if (!page) {
      throw new ServerListError("Server list payload has unexpected shape", response.status, "MALFORMED_PAYLOAD");
    }

    return {
      records: eligibleRecords(page),
      next: page.links?.next || null,
    };
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Walks the paginated listing for the given player range, keeping EU servers only.
 *
 * Stops after `maxPages` requests or when the cursor runs out. Any page failure
 * ends pagination and the records gathered so far are returned; this never rejects
 * because of the remote source.
 */
export async function fetchServerListing(
  range: PlayerRange,
  options: FetchServerListingOptions = {}
): Promise<Listing> {
  const fetchImpl: FetchLike = options.fetchImpl ?? ((input, init) => fetch(input, init));
  const maxPages = options.maxPages ?? SERVER_LIST_MAX_PAGES;
  const timeoutMs = options.timeoutMs ?? SERVER_LIST_TIMEOUT_MS;

  const servers: ServerRecord[] = [];
  let nextUrl: string | null = buildFirstPageUrl(range, options.baseUrl);
  let pagesFetched = 0;

  while (nextUrl && pagesFetched < maxPages) {
    pagesFetched++;
    try {
      const page = await fetchPage(nextUrl, fetchImpl, timeoutMs);
      servers.push(...page.records);
      nextUrl = page.next;
    } catch (error: unknown) {
      if (!(error instanceof ServerListError)) throw error;
      console.warn("[ServerList] Pagination stopped", {
        page: pagesFetched,
        status: error.status,
        code: error.code,
        message: error.message,
        kept: servers.length,
      });
      break;
    }
  }

  return servers;
}
