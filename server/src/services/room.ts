import { encodeEvent, type ServerEvent } from '../protocol/codec';
import type { Cell, Connection, FinishedMatch, Marker, MatchOutcome, PlayerSeat, RoomStatus } from '../types/game';
import { boardToString, cellIndex, createBoard, hasLine, isBoardFull } from './gameService';

export const MAX_PLAYERS = 2;

export interface RoomHooks {
  /**
   * Called once when the room reaches its terminal state. `match` is null
   * when a waiting room was abandoned before a match began.
   */
  onFinished?: (room: Room, match: FinishedMatch | null) => void;
}

/**
 * One named room and the match it hosts. Players are seated in join order:
 * the first seat plays marker 1 and always moves first.
 */
export class Room {
  readonly name: string;
  private readonly players: PlayerSeat[] = [];
  private readonly viewers = new Map<number, Connection>();
  private readonly board: Cell[] = createBoard();
  private currentTurn: PlayerSeat | null = null;
  private state: RoomStatus = 'waiting';
  private startedAt: number | null = null;

  constructor(name: string, private readonly hooks: RoomHooks = {}) {
    this.name = name;
  }

  get status(): RoomStatus {
    return this.state;
  }

  get boardString(): string {
    return boardToString(this.board);
  }

  get playerNames(): string[] {
    return this.players.map((p) => p.username);
  }

  get viewerCount(): number {
    return this.viewers.size;
  }

  get currentTurnUsername(): string | null {
    return this.currentTurn?.username ?? null;
  }

  isFull(): boolean {
    return this.players.length === MAX_PLAYERS;
  }

  hasPlayer(connection: Connection): boolean {
    return this.seatOf(connection) !== undefined;
  }

  hasViewer(connection: Connection): boolean {
    return this.viewers.has(connection.id);
  }

  hasMember(connection: Connection): boolean {
    return this.hasPlayer(connection) || this.hasViewer(connection);
  }

  addPlayer(connection: Connection, username: string): boolean {
    if (this.state !== 'waiting' || this.isFull()) return false;
    this.players.push({ connection, username });
    if (this.isFull()) {
      const [first, second] = this.players;
      this.currentTurn = first;
      this.state = 'in_progress';
      this.startedAt = Date.now();
      this.broadcast({ type: 'begin', player1: first.username, player2: second.username });
    }
    return true;
  }

  addViewer(connection: Connection): boolean {
    if (this.state === 'finished') return false;
    this.viewers.set(connection.id, connection);
    if (this.state === 'in_progress' && this.currentTurn) {
      const opponent = this.opponentOf(this.currentTurn);
      connection.send(encodeEvent({
        type: 'in_progress',
        currentTurn: this.currentTurn.username,
        opponent: opponent.username,
      }));
    }
    return true;
  }

  removeViewer(connection: Connection): void {
    this.viewers.delete(connection.id);
  }

  /** Coordinates are validated by the caller. */
  place(connection: Connection, column: number, row: number): void {
    if (this.state === 'finished') {
      connection.send(encodeEvent({ type: 'game_over' }));
      return;
    }
    const seat = this.seatOf(connection);
    if (!seat || seat !== this.currentTurn) {
      // Out-of-turn moves are not an error: everyone just gets the board again.
      this.broadcastBoard();
      return;
    }

    const marker = this.markerOf(seat);
    this.board[cellIndex(column, row)] = marker;

    if (hasLine(this.board, marker)) {
      this.finish({ kind: 'win', winner: seat.username });
    } else if (isBoardFull(this.board)) {
      this.finish({ kind: 'draw' });
    } else {
      this.currentTurn = this.opponentOf(seat);
      this.broadcastBoard();
    }
  }

  forfeit(connection: Connection): void {
    if (this.state === 'finished') {
      connection.send(encodeEvent({ type: 'game_over' }));
      return;
    }
    const seat = this.seatOf(connection);
    if (!seat) return;
    if (this.state === 'waiting') {
      this.broadcast({ type: 'game_over' });
      this.finish(null);
      return;
    }
    this.finish({ kind: 'forfeit', winner: this.opponentOf(seat).username });
  }

  /** Sends the current board to a single member. */
  sendBoard(connection: Connection): void {
    connection.send(encodeEvent({ type: 'board_status', board: this.boardString }));
  }

  private seatOf(connection: Connection): PlayerSeat | undefined {
    return this.players.find((p) => p.connection.id === connection.id);
  }

  private opponentOf(seat: PlayerSeat): PlayerSeat {
    const other = this.players.find((p) => p !== seat);
    if (!other) throw new Error(`Room ${this.name} has no opponent for ${seat.username}`);
    return other;
  }

  private markerOf(seat: PlayerSeat): Marker {
    return this.players[0] === seat ? '1' : '2';
  }

  private broadcastBoard(): void {
    this.broadcast({ type: 'board_status', board: this.boardString });
  }

  private broadcast(event: ServerEvent): void {
    const frame = encodeEvent(event);
    for (const p of this.players) p.connection.send(frame);
    for (const v of this.viewers.values()) v.send(frame);
  }

  private finish(outcome: MatchOutcome | null): void {
    let match: FinishedMatch | null = null;
    if (outcome) {
      const board = this.boardString;
      this.broadcast(outcome.kind === 'draw'
        ? { type: 'game_end', board, kind: 'draw' }
        : { type: 'game_end', board, kind: outcome.kind, winner: outcome.winner });
      const [first, second] = this.players;
      const endedAt = Date.now();
      match = {
        room: this.name,
        players: [first.username, second.username],
        board,
        outcome,
        startedAt: this.startedAt ?? endedAt,
        endedAt,
      };
    }
    this.state = 'finished';
    this.currentTurn = null;
    this.players.length = 0;
    this.viewers.clear();
    this.hooks.onFinished?.(this, match);
  }
}
