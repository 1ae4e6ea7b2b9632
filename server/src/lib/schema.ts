import { ensureDb } from './db';

export async function ensureSchema() {
  const db = await ensureDb();
  await db.query(`
    create table if not exists players (
      username text primary key,
      password_hash text not null,
      created_at timestamptz not null default now()
    );

    create table if not exists matches (
      id bigserial primary key,
      room text not null,
      player1 text not null,
      player2 text not null,
      board char(9) not null,
      outcome text not null, -- 'win' | 'draw' | 'forfeit'
      winner text,
      started_at timestamptz not null,
      ended_at timestamptz not null
    );

    create index if not exists idx_matches_ended_at on matches(ended_at desc);
    create index if not exists idx_matches_player1 on matches(player1);
    create index if not exists idx_matches_player2 on matches(player2);
  `);
}
