import { z } from 'zod';
import type { DbProvider } from '../lib/db';
import type { FinishedMatch } from '../types/game';

const MAX_RECENT = 50;

export interface MatchRow {
  room: string;
  player1: string;
  player2: string;
  board: string;
  outcome: 'win' | 'draw' | 'forfeit';
  winner: string | null;
  started_at: string; // ISO
  ended_at: string; // ISO
}

const matchRow = z.object({
  room: z.string(),
  player1: z.string(),
  player2: z.string(),
  board: z.string(),
  outcome: z.enum(['win', 'draw', 'forfeit']),
  winner: z.string().nullable(),
  started_at: z.coerce.date().transform((d) => d.toISOString()),
  ended_at: z.coerce.date().transform((d) => d.toISOString()),
});

function toRow(match: FinishedMatch): MatchRow {
  return {
    room: match.room,
    player1: match.players[0],
    player2: match.players[1],
    board: match.board,
    outcome: match.outcome.kind,
    winner: match.outcome.kind === 'draw' ? null : match.outcome.winner,
    started_at: new Date(match.startedAt).toISOString(),
    ended_at: new Date(match.endedAt).toISOString(),
  };
}

export class MatchesRepo {
  // Newest first; always kept so the status API works without a database
  private readonly recentMem: MatchRow[] = [];

  constructor(private readonly db: DbProvider | null = null) {}

  async saveCompletedMatch(match: FinishedMatch): Promise<void> {
    const row = toRow(match);
    this.recentMem.unshift(row);
    while (this.recentMem.length > MAX_RECENT) this.recentMem.pop();
    if (!this.db) return;

    const db = await this.db();
    await db.query(
      `insert into matches (room, player1, player2, board, outcome, winner, started_at, ended_at)
       values ($1, $2, $3, $4, $5, $6, to_timestamp($7/1000.0), to_timestamp($8/1000.0))`,
      [row.room, row.player1, row.player2, row.board, row.outcome, row.winner, match.startedAt, match.endedAt]
    );
  }

  async recentMatches(limit = 10): Promise<MatchRow[]> {
    const n = Math.max(1, Math.min(MAX_RECENT, limit));
    if (this.db) {
      try {
        const db = await this.db();
        const { rows } = await db.query(
          `select room, player1, player2, board, outcome, winner, started_at, ended_at
             from matches
            order by ended_at desc
            limit $1`,
          [n]
        );
        return z.array(matchRow).parse(rows);
      } catch (err) {
        console.warn('[matches] query failed, using memory list:', err instanceof Error ? err.message : err);
      }
    }
    return this.recentMem.slice(0, n);
  }
}
