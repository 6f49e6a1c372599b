import type { Pool } from 'pg';
import { getPool } from '@board/shared';
import { logger } from '@board/observability';

export const BOARD_SCHEMA = `
create table if not exists users (
  identifier uuid primary key,
  display_name text not null,
  is_admin boolean not null default false,
  created_at timestamptz not null default now(),
  updated_at timestamptz not null default now()
);

create table if not exists posts (
  id serial primary key,
  title text not null,
  content text not null,
  author text not null default 'Anonymous',
  owner_id uuid references users(identifier) on delete set null,
  resolved boolean not null default false,
  private boolean not null default false,
  created_at timestamptz not null default now(),
  updated_at timestamptz not null default now()
);

create index if not exists idx_posts_created on posts (created_at desc);
create index if not exists idx_posts_owner on posts (owner_id);

create table if not exists comments (
  id serial primary key,
  post_id int not null references posts(id) on delete cascade,
  content text not null,
  author text not null default 'Anonymous',
  owner_id uuid references users(identifier) on delete set null,
  created_at timestamptz not null default now(),
  updated_at timestamptz not null default now()
);

create index if not exists idx_comments_post on comments (post_id, created_at);

create table if not exists tags (
  id serial primary key,
  name text not null unique
);

create table if not exists post_tags (
  post_id int not null references posts(id) on delete cascade,
  tag_id int not null references tags(id) on delete cascade,
  position int not null default 0,
  primary key (post_id, tag_id)
);

create table if not exists sessions (
  id uuid primary key,
  identifier uuid not null,
  display_name text not null,
  is_admin boolean not null default false,
  created_at timestamptz not null default now(),
  expires_at timestamptz not null
);

create index if not exists idx_sessions_expires on sessions (expires_at);
`;

export const migrate = async (pool: Pool): Promise<void> => {
  await pool.query(BOARD_SCHEMA);
};

if (require.main === module) {
  const pool = getPool('board');
  migrate(pool)
    .then(async () => {
      logger.info('board migrations applied');
      await pool.end();
    })
    .catch((err: unknown) => {
      logger.error('board migrations failed', { err });
      process.exit(1);
    });
}
