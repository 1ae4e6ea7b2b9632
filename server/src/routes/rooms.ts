import { Router } from 'express';
import type { MatchesRepo } from '../repositories/matchesRepo';
import type { RoomDirectory } from '../services/roomDirectory';
import type { SessionRegistry } from '../services/sessionRegistry';

export interface StatusDeps {
  rooms: RoomDirectory;
  sessions: SessionRegistry;
  matches: MatchesRepo;
}

export function createRoomsRouter({ rooms, sessions, matches }: StatusDeps) {
  const router = Router();

  router.get('/rooms', (_req, res) => {
    res.json({
      rooms: rooms.all().map((r) => ({
        name: r.name,
        status: r.status,
        players: r.playerNames,
        viewers: r.viewerCount,
      })),
      sessions: sessions.size,
    });
  });

  // GET /matches?limit=10
  router.get('/matches', async (req, res) => {
    try {
      const limit = Math.max(1, Math.min(50, Number(req.query.limit ?? 10) || 10));
      const recent = await matches.recentMatches(limit);
      res.json({ matches: recent });
    } catch (err) {
      console.error('[status] matches error', err);
      res.status(500).json({ error: 'matches_error' });
    }
  });

  return router;
}
