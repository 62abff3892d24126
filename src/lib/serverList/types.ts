// Wire shapes of the BattleMetrics `/servers` listing (JSON:API).

export interface ServerListDetails {
  map?: string | null;
  gameMode?: string | null;
}

export interface ServerListAttributes {
  name: string;
  players: number;
  maxPlayers: number;
  details?: ServerListDetails | null;
  country?: string | null;
}

export interface ServerListEntry {
  attributes: ServerListAttributes;
}

export interface ServerListLinks {
  next?: string | null;
}

export interface ServerListResponse {
  data: ServerListEntry[];
  links?: ServerListLinks | null;
}
