import { describe, expect, it, vi } from 'vitest';
import { isValidRoomName, RoomDirectory, RoomDirectoryError } from '../src/services/roomDirectory';
import { FakeConnection } from './helpers';

function expectCreateError(fn: () => unknown, code: RoomDirectoryError['code']) {
  try {
    fn();
  } catch (err) {
    expect(err).toBeInstanceOf(RoomDirectoryError);
    if (err instanceof RoomDirectoryError) expect(err.code).toBe(code);
    return;
  }
  throw new Error(`expected ${code}`);
}

describe('isValidRoomName', () => {
  it('allows letters, digits, dash, underscore and space up to 20 characters', () => {
    expect(isValidRoomName('Arena')).toBe(true);
    expect(isValidRoomName('my room_1-b')).toBe(true);
    expect(isValidRoomName('a'.repeat(20))).toBe(true);
    expect(isValidRoomName('a'.repeat(21))).toBe(false);
    expect(isValidRoomName('')).toBe(false);
    expect(isValidRoomName('café')).toBe(false);
    expect(isValidRoomName('a,b')).toBe(false);
  });
});

describe('RoomDirectory', () => {
  it('creates a waiting room with the owner as first player', () => {
    const rooms = new RoomDirectory();
    const owner = new FakeConnection(1);
    const room = rooms.create('Arena', owner, 'A');
    expect(room.status).toBe('waiting');
    expect(room.playerNames).toEqual(['A']);
    expect(rooms.get('Arena')).toBe(room);
    expect(rooms.findContaining(owner)).toBe(room);
  });

  it('rejects invalid and duplicate names', () => {
    const rooms = new RoomDirectory();
    rooms.create('Arena', new FakeConnection(1), 'A');
    expectCreateError(() => rooms.create('Bad:Name', new FakeConnection(2), 'B'), 'INVALID_NAME');
    expectCreateError(() => rooms.create('Arena', new FakeConnection(2), 'B'), 'DUPLICATE_NAME');
    expect(rooms.size).toBe(1);
  });

  it('stops at the room limit', () => {
    const rooms = new RoomDirectory({ maxRooms: 2 });
    rooms.create('one', new FakeConnection(1), 'A');
    rooms.create('two', new FakeConnection(2), 'B');
    expectCreateError(() => rooms.create('three', new FakeConnection(3), 'C'), 'DIRECTORY_FULL');
  });

  it('defaults to 256 rooms', () => {
    const rooms = new RoomDirectory();
    for (let i = 0; i < 256; i++) rooms.create(`room${i}`, new FakeConnection(i + 1), `u${i}`);
    expectCreateError(() => rooms.create('extra', new FakeConnection(999), 'x'), 'DIRECTORY_FULL');
  });

  it('lists recruiting rooms for players and every room for viewers, sorted', () => {
    const rooms = new RoomDirectory();
    rooms.create('Zoo', new FakeConnection(1), 'A');
    const full = rooms.create('Arena', new FakeConnection(2), 'B');
    full.addPlayer(new FakeConnection(3), 'C');
    rooms.create('Mid', new FakeConnection(4), 'D');
    expect(rooms.list('PLAYER')).toEqual(['Mid', 'Zoo']);
    expect(rooms.list('VIEWER')).toEqual(['Arena', 'Mid', 'Zoo']);
  });

  it('removes a room once its match finishes and reports the match', () => {
    const onMatchFinished = vi.fn();
    const rooms = new RoomDirectory({ onMatchFinished });
    const a = new FakeConnection(1);
    const b = new FakeConnection(2);
    const room = rooms.create('Arena', a, 'A');
    room.addPlayer(b, 'B');
    room.forfeit(b);
    expect(rooms.get('Arena')).toBeUndefined();
    expect(rooms.list('VIEWER')).toEqual([]);
    expect(rooms.findContaining(a)).toBeUndefined();
    expect(onMatchFinished).toHaveBeenCalledTimes(1);
    expect(onMatchFinished.mock.calls[0][0]).toMatchObject({ outcome: { kind: 'forfeit', winner: 'A' } });
  });

  it('drops an abandoned waiting room without reporting a match', () => {
    const onMatchFinished = vi.fn();
    const rooms = new RoomDirectory({ onMatchFinished });
    const a = new FakeConnection(1);
    rooms.create('Lobby', a, 'A').forfeit(a);
    expect(rooms.size).toBe(0);
    expect(onMatchFinished).not.toHaveBeenCalled();
    // The name is free again
    expect(rooms.create('Lobby', new FakeConnection(2), 'B').playerNames).toEqual(['B']);
  });

  it('finds rooms a connection is viewing', () => {
    const rooms = new RoomDirectory();
    const viewer = new FakeConnection(9);
    const one = rooms.create('one', new FakeConnection(1), 'A');
    rooms.create('two', new FakeConnection(2), 'B');
    one.addViewer(viewer);
    expect(rooms.findViewing(viewer)).toEqual([one]);
    expect(rooms.findContaining(viewer)).toBeUndefined();
  });

  it('treats removal of a missing room as a no-op', () => {
    const rooms = new RoomDirectory();
    rooms.remove('ghost');
    expect(rooms.size).toBe(0);
  });
});
