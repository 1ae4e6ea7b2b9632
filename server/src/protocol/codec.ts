import type { JoinMode } from '../types/game';

export const FIELD_SEPARATOR = ':';
export const MAX_FRAME_BYTES = 8192;
export const UNKNOWN_COMMAND = 'Unknown command';

// ---- Client -> server ----

export type Command =
  | { type: 'login'; malformed: false; username: string; password: string }
  | { type: 'login'; malformed: true }
  | { type: 'register'; malformed: false; username: string; password: string }
  | { type: 'register'; malformed: true }
  | { type: 'roomlist'; mode: JoinMode | null }
  | { type: 'create'; malformed: false; name: string }
  | { type: 'create'; malformed: true }
  | { type: 'join'; malformed: false; room: string; mode: JoinMode }
  | { type: 'join'; malformed: true }
  | { type: 'place'; malformed: false; column: number; row: number }
  | { type: 'place'; malformed: true }
  | { type: 'forfeit' }
  | { type: 'unknown'; keyword: string };

function parseMode(raw: string | undefined): JoinMode | null {
  const upper = raw?.toUpperCase();
  return upper === 'PLAYER' || upper === 'VIEWER' ? upper : null;
}

function parseCoordinate(raw: string): number | null {
  return /^[0-2]$/.test(raw) ? Number(raw) : null;
}

export function decodeCommand(frame: string): Command {
  const [keyword, ...args] = frame.trim().split(FIELD_SEPARATOR);
  switch (keyword) {
    case 'LOGIN':
      if (args.length !== 2) return { type: 'login', malformed: true };
      return { type: 'login', malformed: false, username: args[0], password: args[1] };
    case 'REGISTER':
      if (args.length !== 2) return { type: 'register', malformed: true };
      return { type: 'register', malformed: false, username: args[0], password: args[1] };
    case 'ROOMLIST':
      return { type: 'roomlist', mode: args.length === 1 ? parseMode(args[0]) : null };
    case 'CREATE':
      if (args.length !== 1) return { type: 'create', malformed: true };
      return { type: 'create', malformed: false, name: args[0] };
    case 'JOIN': {
      const mode = parseMode(args[1]);
      if (args.length !== 2 || !mode) return { type: 'join', malformed: true };
      return { type: 'join', malformed: false, room: args[0], mode };
    }
    case 'PLACE': {
      if (args.length !== 2) return { type: 'place', malformed: true };
      const column = parseCoordinate(args[0]);
      const row = parseCoordinate(args[1]);
      if (column === null || row === null) return { type: 'place', malformed: true };
      return { type: 'place', malformed: false, column, row };
    }
    case 'FORFEIT':
      return { type: 'forfeit' };
    default:
      return { type: 'unknown', keyword };
  }
}

/**
 * Accumulates raw socket chunks and yields complete newline-terminated
 * frames. A partial frame that grows past MAX_FRAME_BYTES is dropped and
 * reported as an empty frame, which decodes to an unknown command.
 */
export class FrameDecoder {
  private buffer = '';

  push(chunk: Buffer | string): string[] {
    this.buffer += typeof chunk === 'string' ? chunk : chunk.toString('ascii');
    const frames: string[] = [];
    let nl = this.buffer.indexOf('\n');
    while (nl !== -1) {
      const line = this.buffer.slice(0, nl).replace(/\r$/, '');
      this.buffer = this.buffer.slice(nl + 1);
      if (line.length > 0) frames.push(line);
      nl = this.buffer.indexOf('\n');
    }
    if (this.buffer.length > MAX_FRAME_BYTES) {
      this.buffer = '';
      frames.push('');
    }
    return frames;
  }

  get pending(): number {
    return this.buffer.length;
  }
}

// ---- Server -> client ----

const LOGIN_STATUSES = [0, 1, 2, 3] as const;
const REGISTER_STATUSES = [0, 1, 2, 3, 4] as const;
const CREATE_STATUSES = [0, 1, 2, 3, 4] as const;
const JOIN_STATUSES = [0, 1, 2, 3, 4] as const;

export type LoginStatus = (typeof LOGIN_STATUSES)[number];
export type RegisterStatus = (typeof REGISTER_STATUSES)[number];
export type CreateStatus = (typeof CREATE_STATUSES)[number];
export type JoinStatus = (typeof JOIN_STATUSES)[number];

export type GameEndKind = 'win' | 'draw' | 'forfeit';

export type ServerEvent =
  | { type: 'login_ack'; status: LoginStatus }
  | { type: 'register_ack'; status: RegisterStatus }
  | { type: 'roomlist_ack'; status: 0; rooms: string[] }
  | { type: 'roomlist_ack'; status: 1 }
  | { type: 'create_ack'; status: CreateStatus }
  | { type: 'join_ack'; status: JoinStatus }
  | { type: 'begin'; player1: string; player2: string }
  | { type: 'in_progress'; currentTurn: string; opponent: string }
  | { type: 'board_status'; board: string }
  | { type: 'game_end'; board: string; kind: 'win' | 'forfeit'; winner: string }
  | { type: 'game_end'; board: string; kind: 'draw' }
  | { type: 'game_over' }
  | { type: 'bad_auth' }
  | { type: 'no_room' }
  | { type: 'unknown_command' };

const GAME_END_CODES: Record<GameEndKind, number> = { win: 0, draw: 1, forfeit: 2 };

function pickStatus<T extends number>(statuses: readonly T[], code: number): T | undefined {
  return statuses.find((s) => s === code);
}

function frame(...fields: (string | number)[]): string {
  return fields.join(FIELD_SEPARATOR) + '\n';
}

export function encodeEvent(event: ServerEvent): string {
  switch (event.type) {
    case 'login_ack':
      return frame('LOGIN', 'ACKSTATUS', event.status);
    case 'register_ack':
      return frame('REGISTER', 'ACKSTATUS', event.status);
    case 'roomlist_ack':
      return event.status === 0
        ? frame('ROOMLIST', 'ACKSTATUS', 0, event.rooms.join(','))
        : frame('ROOMLIST', 'ACKSTATUS', 1);
    case 'create_ack':
      return frame('CREATE', 'ACKSTATUS', event.status);
    case 'join_ack':
      return frame('JOIN', 'ACKSTATUS', event.status);
    case 'begin':
      return frame('BEGIN', event.player1, event.player2);
    case 'in_progress':
      return frame('INPROGRESS', event.currentTurn, event.opponent);
    case 'board_status':
      return frame('BOARDSTATUS', event.board);
    case 'game_end':
      return event.kind === 'draw'
        ? frame('GAMEEND', event.board, GAME_END_CODES.draw)
        : frame('GAMEEND', event.board, GAME_END_CODES[event.kind], event.winner);
    case 'game_over':
      return frame('GAMEEND');
    case 'bad_auth':
      return frame('BADAUTH');
    case 'no_room':
      return frame('NOROOM');
    case 'unknown_command':
      return frame(UNKNOWN_COMMAND);
  }
}

/**
 * Client-side decoding of one server frame (trailing newline optional).
 * Returns null for frames that do not match any known event shape.
 */
export function decodeServerEvent(raw: string): ServerEvent | null {
  const text = raw.replace(/\r?\n$/, '');
  if (text === UNKNOWN_COMMAND) return { type: 'unknown_command' };
  const parts = text.split(FIELD_SEPARATOR);
  const [head] = parts;

  if (parts[1] === 'ACKSTATUS') {
    const code = Number(parts[2]);
    switch (head) {
      case 'LOGIN': {
        const status = pickStatus(LOGIN_STATUSES, code);
        return status === undefined ? null : { type: 'login_ack', status };
      }
      case 'REGISTER': {
        const status = pickStatus(REGISTER_STATUSES, code);
        return status === undefined ? null : { type: 'register_ack', status };
      }
      case 'ROOMLIST':
        if (code === 1) return { type: 'roomlist_ack', status: 1 };
        if (code !== 0) return null;
        return { type: 'roomlist_ack', status: 0, rooms: parts[3] ? parts[3].split(',') : [] };
      case 'CREATE': {
        const status = pickStatus(CREATE_STATUSES, code);
        return status === undefined ? null : { type: 'create_ack', status };
      }
      case 'JOIN': {
        const status = pickStatus(JOIN_STATUSES, code);
        return status === undefined ? null : { type: 'join_ack', status };
      }
      default:
        return null;
    }
  }

  switch (head) {
    case 'BEGIN':
      return parts.length === 3 ? { type: 'begin', player1: parts[1], player2: parts[2] } : null;
    case 'INPROGRESS':
      return parts.length === 3 ? { type: 'in_progress', currentTurn: parts[1], opponent: parts[2] } : null;
    case 'BOARDSTATUS':
      return parts.length === 2 ? { type: 'board_status', board: parts[1] } : null;
    case 'GAMEEND': {
      if (parts.length === 1) return { type: 'game_over' };
      const board = parts[1];
      if (parts[2] === '1' && parts.length === 3) return { type: 'game_end', board, kind: 'draw' };
      if ((parts[2] === '0' || parts[2] === '2') && parts.length === 4) {
        return { type: 'game_end', board, kind: parts[2] === '0' ? 'win' : 'forfeit', winner: parts[3] };
      }
      return null;
    }
    case 'BADAUTH':
      return parts.length === 1 ? { type: 'bad_auth' } : null;
    case 'NOROOM':
      return parts.length === 1 ? { type: 'no_room' } : null;
    default:
      return null;
  }
}
