import type { Pool } from 'pg';
import { likePattern, SqlParams, type SqlQuery } from '@board/shared';
import type {
  BoardStore,
  CommentRecord,
  NewComment,
  NewPost,
  PostFilters,
  PostPatch,
  PostSummary,
  TagRecord,
  UpsertOutcome,
  UserUpsert,
} from './types';

type UserRow = {
  identifier: string;
  display_name: string;
  is_admin: boolean;
  created_at: Date;
  updated_at: Date;
  inserted: boolean;
};

type PostRow = {
  id: number;
  title: string;
  content: string;
  author: string;
  owner_id: string | null;
  resolved: boolean;
  private: boolean;
  created_at: Date;
  updated_at: Date;
  tags: string[] | null;
  comment_count: number;
};

type CommentRow = {
  id: number;
  post_id: number;
  content: string;
  author: string;
  owner_id: string | null;
  created_at: Date;
  updated_at: Date;
};

type TagRow = {
  id: number;
  name: string;
  inserted: boolean;
};

const POST_SUMMARY_SELECT = `select p.id, p.title, p.content, p.author, p.owner_id, p.resolved, p.private,
  p.created_at, p.updated_at,
  array(
    select t.name from post_tags pt join tags t on t.id = pt.tag_id
    where pt.post_id = p.id order by pt.position
  ) as tags,
  (select count(*)::int from comments c where c.post_id = p.id) as comment_count
from posts p`;

const tagMatch = (placeholder: string) =>
  `exists (select 1 from post_tags pt join tags t on t.id = pt.tag_id where pt.post_id = p.id and t.name ilike ${placeholder})`;

/**
 * `q` matches title, content, author or any tag name. The field filters are
 * ANDed on top of it.
 */
export const buildPostListQuery = (filters: PostFilters): SqlQuery => {
  const params = new SqlParams();
  const where: string[] = [];

  if (filters.q) {
    const q = params.add(likePattern(filters.q));
    where.push(`(p.title ilike ${q} or p.content ilike ${q} or p.author ilike ${q} or ${tagMatch(q)})`);
  }
  if (filters.title) where.push(`p.title ilike ${params.add(likePattern(filters.title))}`);
  if (filters.content) where.push(`p.content ilike ${params.add(likePattern(filters.content))}`);
  if (filters.author) where.push(`p.author ilike ${params.add(likePattern(filters.author))}`);
  if (filters.tag) where.push(tagMatch(params.add(likePattern(filters.tag))));
  if (filters.resolved !== undefined) where.push(`p.resolved = ${params.add(filters.resolved)}`);

  const clause = where.length ? `\nwhere ${where.join('\n  and ')}` : '';
  return {
    text: `${POST_SUMMARY_SELECT}${clause}\norder by p.created_at desc, p.id desc`,
    values: params.values,
  };
};

export const buildPostUpdateQuery = (id: number, patch: PostPatch): SqlQuery => {
  const params = new SqlParams();
  const sets: string[] = [];
  if (patch.title !== undefined) sets.push(`title = ${params.add(patch.title)}`);
  if (patch.content !== undefined) sets.push(`content = ${params.add(patch.content)}`);
  if (patch.author !== undefined) sets.push(`author = ${params.add(patch.author)}`);
  if (patch.resolved !== undefined) sets.push(`resolved = ${params.add(patch.resolved)}`);
  if (patch.private !== undefined) sets.push(`private = ${params.add(patch.private)}`);
  sets.push('updated_at = now()');
  return {
    text: `update posts set ${sets.join(', ')} where id = ${params.add(id)} returning id`,
    values: params.values,
  };
};

const toPostSummary = (row: PostRow): PostSummary => ({
  id: row.id,
  title: row.title,
  content: row.content,
  author: row.author,
  ownerId: row.owner_id,
  resolved: row.resolved,
  private: row.private,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
  tags: row.tags ?? [],
  commentCount: row.comment_count,
});

const toComment = (row: CommentRow): CommentRecord => ({
  id: row.id,
  postId: row.post_id,
  content: row.content,
  author: row.author,
  ownerId: row.owner_id,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
});

export class PgBoardStore implements BoardStore {
  constructor(private readonly pool: Pool) {}

  async upsertUser(user: UserUpsert): Promise<UpsertOutcome> {
    // xmax is 0 only for a row this statement inserted.
    const res = await this.pool.query<UserRow>(
      `insert into users (identifier, display_name, is_admin)
       values ($1, $2, $3)
       on conflict (identifier) do update
         set display_name = excluded.display_name, is_admin = excluded.is_admin, updated_at = now()
       returning identifier, display_name, is_admin, created_at, updated_at, (xmax = 0) as inserted`,
      [user.identifier, user.displayName, user.isAdmin],
    );
    const row = res.rows[0];
    if (!row) throw new Error('user upsert returned no row');
    return {
      user: {
        identifier: row.identifier,
        displayName: row.display_name,
        isAdmin: row.is_admin,
        createdAt: row.created_at,
        updatedAt: row.updated_at,
      },
      created: row.inserted,
    };
  }

  async findPost(id: number): Promise<PostSummary | null> {
    const res = await this.pool.query<PostRow>(`${POST_SUMMARY_SELECT}\nwhere p.id = $1`, [id]);
    const row = res.rows[0];
    return row ? toPostSummary(row) : null;
  }

  async listPosts(filters: PostFilters): Promise<PostSummary[]> {
    const query = buildPostListQuery(filters);
    const res = await this.pool.query<PostRow>(query.text, query.values);
    return res.rows.map(toPostSummary);
  }

  async createPost(post: NewPost): Promise<PostSummary> {
    const res = await this.pool.query<{ id: number }>(
      `insert into posts (title, content, author, owner_id, resolved, private)
       values ($1, $2, $3, $4, $5, $6)
       returning id`,
      [post.title, post.content, post.author, post.ownerId, post.resolved, post.private],
    );
    const row = res.rows[0];
    if (!row) throw new Error('post insert returned no row');
    await this.attachTags(row.id, post.tags);
    const created = await this.findPost(row.id);
    if (!created) throw new Error(`post ${row.id} vanished after insert`);
    return created;
  }

  async updatePost(id: number, patch: PostPatch): Promise<PostSummary | null> {
    const query = buildPostUpdateQuery(id, patch);
    const res = await this.pool.query<{ id: number }>(query.text, query.values);
    if (!res.rowCount) return null;
    if (patch.tags !== undefined) {
      await this.pool.query('delete from post_tags where post_id = $1', [id]);
      await this.attachTags(id, patch.tags);
    }
    return this.findPost(id);
  }

  async deletePost(id: number): Promise<boolean> {
    const res = await this.pool.query('delete from posts where id = $1', [id]);
    return (res.rowCount ?? 0) > 0;
  }

  async listComments(postId: number): Promise<CommentRecord[]> {
    const res = await this.pool.query<CommentRow>(
      `select id, post_id, content, author, owner_id, created_at, updated_at
       from comments where post_id = $1 order by created_at asc, id asc`,
      [postId],
    );
    return res.rows.map(toComment);
  }

  async createComment(comment: NewComment): Promise<CommentRecord> {
    const res = await this.pool.query<CommentRow>(
      `insert into comments (post_id, content, author, owner_id)
       values ($1, $2, $3, $4)
       returning id, post_id, content, author, owner_id, created_at, updated_at`,
      [comment.postId, comment.content, comment.author, comment.ownerId],
    );
    const row = res.rows[0];
    if (!row) throw new Error('comment insert returned no row');
    return toComment(row);
  }

  async listTags(): Promise<TagRecord[]> {
    const res = await this.pool.query<TagRecord>('select id, name from tags order by name asc');
    return res.rows;
  }

  async getOrCreateTag(name: string): Promise<{ tag: TagRecord; created: boolean }> {
    // The no-op update makes `returning` yield the existing row on conflict.
    const res = await this.pool.query<TagRow>(
      `insert into tags (name) values ($1)
       on conflict (name) do update set name = excluded.name
       returning id, name, (xmax = 0) as inserted`,
      [name],
    );
    const row = res.rows[0];
    if (!row) throw new Error('tag upsert returned no row');
    return { tag: { id: row.id, name: row.name }, created: row.inserted };
  }

  private async attachTags(postId: number, names: string[]): Promise<void> {
    let position = 0;
    for (const name of names) {
      const { tag } = await this.getOrCreateTag(name);
      await this.pool.query(
        `insert into post_tags (post_id, tag_id, position) values ($1, $2, $3)
         on conflict (post_id, tag_id) do nothing`,
        [postId, tag.id, position],
      );
      position += 1;
    }
  }
}
