import type { Connection, FinishedMatch, JoinMode } from '../types/game';
import { Room } from './room';

export const DEFAULT_MAX_ROOMS = 256;
export const MAX_ROOM_NAME_LENGTH = 20;

const ROOM_NAME_RE = /^[A-Za-z0-9 _-]+$/;

export type RoomDirectoryErrorCode = 'INVALID_NAME' | 'DUPLICATE_NAME' | 'DIRECTORY_FULL';

export class RoomDirectoryError extends Error {
  readonly code: RoomDirectoryErrorCode;

  constructor(code: RoomDirectoryErrorCode, message: string) {
    super(message);
    this.name = 'RoomDirectoryError';
    this.code = code;
  }
}

export function isValidRoomName(name: string): boolean {
  return name.length <= MAX_ROOM_NAME_LENGTH && ROOM_NAME_RE.test(name);
}

export interface RoomDirectoryOptions {
  maxRooms?: number;
  /** Fired after a finished room has been removed. */
  onMatchFinished?: (match: FinishedMatch) => void;
}

export class RoomDirectory {
  private readonly rooms = new Map<string, Room>();
  private readonly maxRooms: number;
  private readonly onMatchFinished?: (match: FinishedMatch) => void;

  constructor(opts: RoomDirectoryOptions = {}) {
    this.maxRooms = opts.maxRooms ?? DEFAULT_MAX_ROOMS;
    this.onMatchFinished = opts.onMatchFinished;
  }

  create(name: string, owner: Connection, ownerUsername: string): Room {
    if (!isValidRoomName(name)) {
      throw new RoomDirectoryError('INVALID_NAME', `Invalid room name: "${name}"`);
    }
    if (this.rooms.has(name)) {
      throw new RoomDirectoryError('DUPLICATE_NAME', `Room already exists: ${name}`);
    }
    if (this.rooms.size >= this.maxRooms) {
      throw new RoomDirectoryError('DIRECTORY_FULL', `Room limit of ${this.maxRooms} reached`);
    }
    const room = new Room(name, {
      onFinished: (finished, match) => {
        this.remove(finished.name);
        if (match) this.onMatchFinished?.(match);
      },
    });
    this.rooms.set(name, room);
    room.addPlayer(owner, ownerUsername);
    return room;
  }

  get(name: string): Room | undefined {
    return this.rooms.get(name);
  }

  list(mode: JoinMode): string[] {
    const names: string[] = [];
    for (const room of this.rooms.values()) {
      if (mode === 'VIEWER' || !room.isFull()) names.push(room.name);
    }
    return names.sort();
  }

  findContaining(connection: Connection): Room | undefined {
    for (const room of this.rooms.values()) {
      if (room.hasPlayer(connection)) return room;
    }
    return undefined;
  }

  findViewing(connection: Connection): Room[] {
    return Array.from(this.rooms.values()).filter((r) => r.hasViewer(connection));
  }

  remove(name: string): void {
    this.rooms.delete(name);
  }

  all(): Room[] {
    return Array.from(this.rooms.values()).sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  get size(): number {
    return this.rooms.size;
  }
}
