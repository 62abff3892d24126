export interface ServerRecord {
  readonly name: string;
  readonly players: number;
  readonly maxPlayers: number;
  readonly map: string;
  readonly mode: string;
  readonly country: string;
}

/** One fetch cycle's result. Replaced wholesale, never edited. */
export type Listing = readonly ServerRecord[];

export interface PlayerRange {
  min: number;
  max: number;
}

export interface SpinPlan {
  readonly winner: ServerRecord;
  readonly winnerIndex: number;
  readonly loops: number;
  readonly virtualTargetRow: number;
  readonly durationSeconds: number;
  readonly startOffset: number;
  readonly targetOffset: number;
}

export type RoulettePhase =
  | 'idle'
  | 'loading'
  | 'spinning'
  | 'settled';
