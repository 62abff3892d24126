import { EU_COUNTRIES, UNKNOWN_COUNTRY, UNKNOWN_MAP, UNKNOWN_MODE } from "../constants";
import type { ServerRecord } from "../../types";
import type {
  ServerListAttributes,
  ServerListDetails,
  ServerListEntry,
  ServerListResponse,
} from "./types";

const EU_SET: ReadonlySet<string> = new Set(EU_COUNTRIES);

export function isEuCountry(country: string): boolean {
  return EU_SET.has(country);
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isCount(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function optionalString(value: unknown): string | null | undefined {
  if (value === undefined || value === null) return value;
  return typeof value === "string" ? value : undefined;
}

function parseDetails(value: unknown): ServerListDetails | null {
  if (!isObject(value)) return null;
  return {
    map: optionalString(value.map),
    gameMode: optionalString(value.gameMode),
  };
}

function parseEntry(value: unknown): ServerListEntry | null {
  if (!isObject(value) || !isObject(value.attributes)) return null;
  const attrs = value.attributes;
  if (typeof attrs.name !== "string" || !isCount(attrs.players) || !isCount(attrs.maxPlayers)) {
    return null;
  }
  return {
    attributes: {
      name: attrs.name,
      players: attrs.players,
      maxPlayers: attrs.maxPlayers,
      details: parseDetails(attrs.details),
      country: optionalString(attrs.country),
    },
  };
}

/**
 * Validates one listing page. Returns null when the page is malformed:
 * not an object, no `data` array, or any entry missing a required attribute.
 */
export function parseServerListResponse(payload: unknown): ServerListResponse | null {
  if (!isObject(payload) || !Array.isArray(payload.data)) return null;

  const data: ServerListEntry[] = [];
  for (const raw of payload.data) {
    const entry = parseEntry(raw);
    if (!entry) return null;
    data.push(entry);
  }

  const links = isObject(payload.links) ? { next: optionalString(payload.links.next) } : null;
  return { data, links };
}

export function toServerRecord(attrs: ServerListAttributes): ServerRecord {
  return Object.freeze({
    name: attrs.name,
    players: attrs.players,
    maxPlayers: attrs.maxPlayers,
    map: attrs.details?.map ?? UNKNOWN_MAP,
    mode: attrs.details?.gameMode ?? UNKNOWN_MODE,
    country: attrs.country ?? UNKNOWN_COUNTRY,
  });
}

/** Records of one page that pass the country allow-list. */
export function eligibleRecords(page: ServerListResponse): ServerRecord[] {
  const out: ServerRecord[] = [];
  for (const entry of page.data) {
    const record = toServerRecord(entry.attributes);
    if (isEuCountry(record.country)) out.push(record);
  }
  return out;
}
