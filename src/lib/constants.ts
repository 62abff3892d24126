// ─── Listing source ─────────────────────────────────────────
const listingConfig = {
  baseUrl: "https://api.battlemetrics.com/servers",
  game: "squad",
  status: "online",
  pageSize: 100,
  sort: "-players",
  maxPages: 5,
  timeoutMs: 5_000,
} as const;

export const SERVER_LIST_URL = listingConfig.baseUrl;
export const SERVER_LIST_GAME = listingConfig.game;
export const SERVER_LIST_STATUS = listingConfig.status;
export const SERVER_LIST_PAGE_SIZE = listingConfig.pageSize;
export const SERVER_LIST_SORT = listingConfig.sort;
export const SERVER_LIST_MAX_PAGES = listingConfig.maxPages;
export const SERVER_LIST_TIMEOUT_MS = listingConfig.timeoutMs;

// Post-filter applied to every record; not user configurable.
export const EU_COUNTRIES = [
  "DE", "FR", "PL", "GB", "UA", "NL", "CZ", "SK", "IT",
  "ES", "AT", "BE", "DK", "SE", "NO", "FI", "IE", "TR",
] as const;

export const UNKNOWN_MAP = "Unknown";
export const UNKNOWN_MODE = "Unknown";
export const UNKNOWN_COUNTRY = "??";

// ─── Player range ───────────────────────────────────────────
export const PLAYER_RANGE_MIN = 0;
export const PLAYER_RANGE_MAX = 100;
export const DEFAULT_MIN_PLAYERS = 60;
export const DEFAULT_MAX_PLAYERS = 100;

// ─── Reel & spin ────────────────────────────────────────────
export const ROW_HEIGHT = 80;
export const REEL_VIEWPORT_HEIGHT = 320;
export const TARGET_SCROLL_ROWS = 100;
/** Extra rows rendered past the scroll target. */
export const REEL_TAIL_ROWS = 10;
export const MIN_SPIN_LOOPS = 3;
export const SPIN_MIN_SECONDS = 10;
export const SPIN_MAX_SECONDS = 15;
export const LANDING_JITTER = 30;
export const BRAKING_POWER = 7;
/** Remaining distance under which a spin counts as converged. */
export const SETTLE_EPSILON = 0.5;

// ─── Click sound ────────────────────────────────────────────
export const CLICK_SAMPLE_RATE = 44_100;
export const CLICK_DURATION_MS = 20;
export const CLICK_GAIN = 3;
export const CLICK_SMOOTHING = 0.85;
