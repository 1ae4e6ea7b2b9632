import { EventEmitter } from 'events';
import type { Connection } from '../src/types/game';

export class FakeConnection implements Connection {
  readonly frames: string[] = [];

  constructor(readonly id: number) {}

  send(frame: string): void {
    this.frames.push(frame);
  }

  /** Returns the frames received since the last call and forgets them. */
  take(): string[] {
    return this.frames.splice(0, this.frames.length);
  }
}

export class FakeSocket extends EventEmitter {
  destroyed = false;
  ended = false;
  remoteAddress = '127.0.0.1';
  readonly written: string[] = [];

  write(data: string): boolean {
    this.written.push(data);
    return true;
  }

  /** Half-closes; the peer's close event arrives later, if at all. */
  end(): void {
    this.ended = true;
  }

  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.emit('close');
  }

  receive(text: string): void {
    this.emit('data', Buffer.from(text, 'ascii'));
  }
}
