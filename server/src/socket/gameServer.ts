import { createServer, type AddressInfo, type Server } from 'net';
import { decodeCommand, FrameDecoder } from '../protocol/codec';
import type { SessionRegistry } from '../services/sessionRegistry';
import type { Connection } from '../types/game';
import type { CommandDispatcher } from './dispatcher';

/** The parts of a net.Socket the loop touches. */
export interface ClientSocket {
  readonly destroyed: boolean;
  readonly remoteAddress?: string;
  on(event: 'data', listener: (chunk: Buffer) => void): unknown;
  on(event: 'end' | 'close', listener: () => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  write(data: string): boolean;
  end(): unknown;
  destroy(): void;
}

class SocketConnection implements Connection {
  private open = true;

  constructor(readonly id: number, private readonly socket: ClientSocket) {}

  send(frame: string): void {
    if (this.open && !this.socket.destroyed) this.socket.write(frame);
  }

  /**
   * Stops further sends. A graceful close ends the socket so frames already
   * written still flush; otherwise it is destroyed.
   */
  close(graceful: boolean): void {
    this.open = false;
    if (graceful) this.socket.end();
    else this.socket.destroy();
  }
}

interface Client {
  connection: SocketConnection;
  socket: ClientSocket;
  decoder: FrameDecoder;
  // Commands for one connection run strictly one after another
  queue: Promise<void>;
  closed: boolean;
}

type ReadyKind = 'data' | 'end' | 'close' | 'error';

/**
 * The connection loop. Node delivers readiness as socket events; each kind
 * maps to one handler below, and every command a client sends is queued
 * behind that client's previous command.
 */
export class GameServer {
  private readonly server: Server;
  private readonly clients = new Map<number, Client>();
  private nextId = 1;

  private readonly handlers: {
    data: (client: Client, chunk: Buffer) => void;
    end: (client: Client) => void;
    close: (client: Client) => void;
    error: (client: Client, err: Error) => void;
  } = {
    data: (client, chunk) => this.onData(client, chunk),
    end: (client) => this.drop(client, 'end'),
    close: (client) => this.drop(client, 'close'),
    error: (client, err) => {
      console.warn(`[server] socket error on #${client.connection.id}:`, err.message);
      this.drop(client, 'error');
    },
  };

  constructor(
    private readonly dispatcher: CommandDispatcher,
    private readonly sessions: SessionRegistry
  ) {
    this.server = createServer((socket) => {
      socket.setNoDelay(true);
      this.accept(socket);
    });
  }

  listen(port: number, host = '0.0.0.0'): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(port, host, () => {
        this.server.off('error', reject);
        const address = this.server.address();
        if (!address || typeof address === 'string') {
          reject(new Error('Server is not listening on a TCP port'));
          return;
        }
        resolve(address);
      });
    });
  }

  accept(socket: ClientSocket): Connection {
    const connection = new SocketConnection(this.nextId++, socket);
    const client: Client = { connection, socket, decoder: new FrameDecoder(), queue: Promise.resolve(), closed: false };
    this.clients.set(connection.id, client);
    this.sessions.register(connection);
    console.log(`[server] connected: #${connection.id} ${socket.remoteAddress ?? ''}`.trimEnd());

    socket.on('data', (chunk) => this.ready('data', client, chunk));
    socket.on('end', () => this.ready('end', client));
    socket.on('close', () => this.ready('close', client));
    socket.on('error', (err) => this.ready('error', client, err));
    return connection;
  }

  /** Resolves once every queued command has been handled. */
  async settled(): Promise<void> {
    await Promise.all(Array.from(this.clients.values(), (c) => c.queue));
  }

  get connectionCount(): number {
    return this.clients.size;
  }

  async close(): Promise<void> {
    for (const client of this.clients.values()) {
      client.closed = true;
      client.connection.close(false);
    }
    this.clients.clear();
    if (!this.server.listening) return;
    await new Promise<void>((resolve, reject) => {
      this.server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private ready(kind: 'data', client: Client, chunk: Buffer): void;
  private ready(kind: 'end' | 'close', client: Client): void;
  private ready(kind: 'error', client: Client, err: Error): void;
  private ready(kind: ReadyKind, client: Client, payload?: Buffer | Error): void {
    if (client.closed) return;
    switch (kind) {
      case 'data':
        if (payload instanceof Buffer) this.handlers.data(client, payload);
        return;
      case 'error':
        if (payload instanceof Error) this.handlers.error(client, payload);
        return;
      default:
        this.handlers[kind](client);
    }
  }

  private onData(client: Client, chunk: Buffer): void {
    for (const frame of client.decoder.push(chunk)) {
      if (frame === '') {
        console.warn(`[server] discarded oversize frame from #${client.connection.id}`);
      }
      const command = decodeCommand(frame);
      this.enqueue(client, () => this.dispatcher.dispatch(client.connection, command));
    }
  }

  private drop(client: Client, reason: ReadyKind): void {
    client.closed = true;
    this.enqueue(client, () => {
      // Close first so the forfeit broadcast skips the departed connection.
      client.connection.close(reason === 'end');
      this.dispatcher.disconnect(client.connection);
      this.clients.delete(client.connection.id);
      console.log(`[server] disconnected: #${client.connection.id} reason=${reason}`);
    });
  }

  private enqueue(client: Client, task: () => Promise<void> | void): void {
    client.queue = client.queue.then(task).catch((err) => {
      console.error(`[dispatch] command failed for #${client.connection.id}`, err);
    });
  }
}
