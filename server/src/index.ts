import http from 'http';
import { env } from './config/env';
import { createStatusApp } from './app';
import { closeDb, ensureDb } from './lib/db';
import { ensureSchema } from './lib/schema';
import { MatchesRepo } from './repositories/matchesRepo';
import { UsersRepo } from './repositories/usersRepo';
import { AuthService } from './services/authService';
import { RoomDirectory } from './services/roomDirectory';
import { SessionRegistry } from './services/sessionRegistry';
import { CommandDispatcher } from './socket/dispatcher';
import { GameServer } from './socket/gameServer';

const db = env.databaseUrl ? ensureDb : null;

const users = new UsersRepo(db);
const matches = new MatchesRepo(db);
const sessions = new SessionRegistry();
const rooms = new RoomDirectory({
  maxRooms: env.maxRooms,
  onMatchFinished: (match) => {
    matches.saveCompletedMatch(match).catch((err) => {
      console.error('[matches] save match failed', err);
    });
  },
});
const auth = new AuthService(users, env.bcryptRounds);
const dispatcher = new CommandDispatcher({ sessions, rooms, auth });
const gameServer = new GameServer(dispatcher, sessions);
const statusServer = http.createServer(createStatusApp({ rooms, sessions, matches }));

async function start() {
  if (db) {
    try {
      await ensureSchema();
    } catch (err) {
      console.error('[schema] failed to ensure schema', err);
    }
  }

  const address = await gameServer.listen(env.port);
  console.log(`[server] game server listening on port ${address.port}`);

  if (env.statusPort > 0) {
    statusServer.listen(env.statusPort, () => {
      console.log(`[status] listening on http://localhost:${env.statusPort}`);
    });
  }
}

async function shutdown() {
  console.log('[server] shutting down');
  statusServer.close();
  await gameServer.close();
  if (db) await closeDb();
}

process.once('SIGINT', () => {
  shutdown().catch((err) => {
    console.error('[server] shutdown failed', err);
    process.exitCode = 1;
  });
});

start().catch((err) => {
  console.error('[server] failed to start', err);
  process.exitCode = 1;
});

export { gameServer, statusServer };
