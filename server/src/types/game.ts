export type Marker = '1' | '2';
export type Cell = '0' | Marker;

export type RoomStatus = 'waiting' | 'in_progress' | 'finished';

export type JoinMode = 'PLAYER' | 'VIEWER';

/**
 * A live client link as seen by the game core. `id` is assigned by the
 * server on accept and is the key every registry uses.
 */
export interface Connection {
  readonly id: number;
  send(frame: string): void;
}

export interface PlayerSeat {
  connection: Connection;
  username: string;
}

export type MatchOutcome =
  | { kind: 'win'; winner: string }
  | { kind: 'draw' }
  | { kind: 'forfeit'; winner: string };

export interface FinishedMatch {
  room: string;
  players: [string, string];
  board: string;
  outcome: MatchOutcome;
  startedAt: number;
  endedAt: number;
}
