import type { PostInput, SessionIdentity } from '@board/shared';

export type UserRecord = {
  identifier: string;
  displayName: string;
  isAdmin: boolean;
  createdAt: Date;
  updatedAt: Date;
};

export type UserUpsert = {
  identifier: string;
  displayName: string;
  isAdmin: boolean;
};

export type UpsertOutcome = {
  user: UserRecord;
  created: boolean;
};

export type PostRecord = {
  id: number;
  title: string;
  content: string;
  author: string;
  ownerId: string | null;
  resolved: boolean;
  private: boolean;
  createdAt: Date;
  updatedAt: Date;
};

export type PostSummary = PostRecord & {
  tags: string[];
  commentCount: number;
};

export type CommentRecord = {
  id: number;
  postId: number;
  content: string;
  author: string;
  ownerId: string | null;
  createdAt: Date;
  updatedAt: Date;
};

export type TagRecord = {
  id: number;
  name: string;
};

export type PostFilters = {
  q?: string;
  title?: string;
  content?: string;
  author?: string;
  tag?: string;
  resolved?: boolean;
};

export type NewPost = {
  title: string;
  content: string;
  author: string;
  ownerId: string | null;
  tags: string[];
  resolved: boolean;
  private: boolean;
};

// Absent keys are left unchanged; `tags` replaces the whole set.
export type PostPatch = PostInput;

export type NewComment = {
  postId: number;
  content: string;
  author: string;
  ownerId: string | null;
};

/**
 * Persistence the board needs. Every write is a single atomic statement per
 * row; tag attachment is a separate write from the post row.
 */
export interface BoardStore {
  upsertUser(user: UserUpsert): Promise<UpsertOutcome>;
  findPost(id: number): Promise<PostSummary | null>;
  listPosts(filters: PostFilters): Promise<PostSummary[]>;
  createPost(post: NewPost): Promise<PostSummary>;
  updatePost(id: number, patch: PostPatch): Promise<PostSummary | null>;
  deletePost(id: number): Promise<boolean>;
  listComments(postId: number): Promise<CommentRecord[]>;
  createComment(comment: NewComment): Promise<CommentRecord>;
  listTags(): Promise<TagRecord[]>;
  getOrCreateTag(name: string): Promise<{ tag: TagRecord; created: boolean }>;
}

export interface SessionStore {
  get(sessionId: string): Promise<SessionIdentity | null>;
  set(sessionId: string, identity: SessionIdentity): Promise<void>;
}
