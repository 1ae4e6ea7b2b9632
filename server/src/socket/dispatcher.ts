import { encodeEvent, type Command, type CreateStatus, type ServerEvent } from '../protocol/codec';
import type { AuthService } from '../services/authService';
import { RoomDirectoryError, type RoomDirectory, type RoomDirectoryErrorCode } from '../services/roomDirectory';
import type { SessionRegistry } from '../services/sessionRegistry';
import type { Connection } from '../types/game';

const CREATE_FAILURES: Record<RoomDirectoryErrorCode, CreateStatus> = {
  INVALID_NAME: 1,
  DUPLICATE_NAME: 2,
  DIRECTORY_FULL: 3,
};

export interface DispatcherDeps {
  sessions: SessionRegistry;
  rooms: RoomDirectory;
  auth: AuthService;
}

/**
 * Routes decoded commands to the session registry, room directory and rooms.
 * Every room mutation happens synchronously inside a single `dispatch` call;
 * only the credential checks await.
 */
export class CommandDispatcher {
  private readonly sessions: SessionRegistry;
  private readonly rooms: RoomDirectory;
  private readonly auth: AuthService;

  constructor(deps: DispatcherDeps) {
    this.sessions = deps.sessions;
    this.rooms = deps.rooms;
    this.auth = deps.auth;
  }

  async dispatch(connection: Connection, command: Command): Promise<void> {
    switch (command.type) {
      case 'login':
        return this.handleLogin(connection, command);
      case 'register':
        return this.handleRegister(connection, command);
      case 'roomlist':
        return this.handleRoomList(connection, command);
      case 'create':
        return this.handleCreate(connection, command);
      case 'join':
        return this.handleJoin(connection, command);
      case 'place':
        return this.handlePlace(connection, command);
      case 'forfeit':
        return this.handleForfeit(connection);
      case 'unknown':
        return reply(connection, { type: 'unknown_command' });
      default: {
        const unhandled: never = command;
        throw new Error(`Unhandled command: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  /** Implicit forfeit for a player in a running match, then session cleanup. */
  disconnect(connection: Connection): void {
    this.rooms.findContaining(connection)?.forfeit(connection);
    for (const room of this.rooms.findViewing(connection)) {
      room.removeViewer(connection);
    }
    this.sessions.remove(connection);
  }

  private async handleLogin(connection: Connection, command: Extract<Command, { type: 'login' }>) {
    if (command.malformed) return reply(connection, { type: 'login_ack', status: 3 });
    const status = await this.auth.login(command.username, command.password);
    if (status === 0) this.sessions.authenticate(connection, command.username);
    reply(connection, { type: 'login_ack', status });
  }

  private async handleRegister(connection: Connection, command: Extract<Command, { type: 'register' }>) {
    if (command.malformed) return reply(connection, { type: 'register_ack', status: 2 });
    const status = await this.auth.register(command.username, command.password);
    reply(connection, { type: 'register_ack', status });
  }

  private handleRoomList(connection: Connection, command: Extract<Command, { type: 'roomlist' }>) {
    if (!this.requireAuth(connection)) return;
    if (!command.mode) return reply(connection, { type: 'roomlist_ack', status: 1 });
    reply(connection, { type: 'roomlist_ack', status: 0, rooms: this.rooms.list(command.mode) });
  }

  private handleCreate(connection: Connection, command: Extract<Command, { type: 'create' }>) {
    const username = this.requireAuth(connection);
    if (!username) return;
    if (command.malformed) return reply(connection, { type: 'create_ack', status: 4 });
    // A connection holds at most one player seat.
    if (this.rooms.findContaining(connection)) return reply(connection, { type: 'create_ack', status: 4 });
    try {
      this.rooms.create(command.name, connection, username);
    } catch (err) {
      if (err instanceof RoomDirectoryError) {
        return reply(connection, { type: 'create_ack', status: CREATE_FAILURES[err.code] });
      }
      throw err;
    }
    reply(connection, { type: 'create_ack', status: 0 });
  }

  private handleJoin(connection: Connection, command: Extract<Command, { type: 'join' }>) {
    const username = this.requireAuth(connection);
    if (!username) return;
    if (command.malformed) return reply(connection, { type: 'join_ack', status: 3 });

    const room = this.rooms.get(command.room);
    if (!room) return reply(connection, { type: 'join_ack', status: 1 });
    if (room.hasMember(connection)) return reply(connection, { type: 'join_ack', status: 4 });

    if (command.mode === 'PLAYER') {
      if (this.rooms.findContaining(connection)) return reply(connection, { type: 'join_ack', status: 4 });
      if (room.isFull()) return reply(connection, { type: 'join_ack', status: 2 });
      // Ack first: the second player's join broadcasts BEGIN.
      reply(connection, { type: 'join_ack', status: 0 });
      room.addPlayer(connection, username);
      return;
    }
    reply(connection, { type: 'join_ack', status: 0 });
    room.addViewer(connection);
  }

  private handlePlace(connection: Connection, command: Extract<Command, { type: 'place' }>) {
    if (!this.requireAuth(connection)) return;
    const room = this.rooms.findContaining(connection);
    if (!room) return reply(connection, { type: 'no_room' });
    if (command.malformed) return room.sendBoard(connection);
    room.place(connection, command.column, command.row);
  }

  private handleForfeit(connection: Connection) {
    if (!this.requireAuth(connection)) return;
    const room = this.rooms.findContaining(connection);
    if (!room) return reply(connection, { type: 'no_room' });
    room.forfeit(connection);
  }

  /** Returns the session's username, or sends BADAUTH and returns undefined. */
  private requireAuth(connection: Connection): string | undefined {
    const username = this.sessions.usernameOf(connection);
    if (username === undefined) reply(connection, { type: 'bad_auth' });
    return username;
  }
}

function reply(connection: Connection, event: ServerEvent): void {
  connection.send(encodeEvent(event));
}
