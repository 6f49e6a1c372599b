import { AccessDeniedError, type IdentityContext } from '@board/shared';

export const PRIVATE_POST_PLACEHOLDER = 'This post is private.';

/**
 * The fields of a post the policy reads. Any loaded post row satisfies it.
 */
export type GuardedPost = {
  private: boolean;
  ownerId: string | null;
};

export type PostAction = 'view' | 'update' | 'delete' | 'comment';

/**
 * Public posts are open to everyone. A private post is open to its owner and
 * to administrators; a private post without an owner is open to administrators
 * only.
 */
export const canAccess = (post: GuardedPost, subject: IdentityContext): boolean => {
  if (!post.private) return true;
  if (!subject) return false;
  if (subject.isAdmin) return true;
  return post.ownerId !== null && post.ownerId === subject.identifier;
};

const DENIED_MESSAGES: Record<PostAction, string> = {
  view: 'You do not have permission to view this post.',
  update: 'You do not have permission to edit this post.',
  delete: 'You do not have permission to delete this post.',
  comment: 'You do not have permission to comment on this post.',
};

export const assertCanAccess = (post: GuardedPost, subject: IdentityContext, action: PostAction): void => {
  if (!canAccess(post, subject)) {
    throw new AccessDeniedError(DENIED_MESSAGES[action]);
  }
};

export type ListedPost = GuardedPost & {
  title: string;
  content: string;
  tags: string[];
};

// Listings reveal that a private thread exists, never what it says.
export const redactForListing = <T extends ListedPost>(post: T, subject: IdentityContext): T => {
  if (canAccess(post, subject)) return post;
  return { ...post, title: PRIVATE_POST_PLACEHOLDER, content: '', tags: [] };
};
