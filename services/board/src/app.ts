import Fastify, { type FastifyError } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import {
  ANONYMOUS_AUTHOR,
  AuthenticationRequiredError,
  coerceBoolean,
  createErrorBody,
  ensureCorrelationId,
  escapeHtml,
  GENERIC_SERVER_ERROR,
  type IdentityContext,
  isAppError,
  MAX_TAG_LENGTH,
  NotFoundError,
  sanitizeCommentInput,
  sanitizeNewPost,
  sanitizePostPatch,
  sanitizeText,
  signSessionToken,
  unwrap,
  validatePayloadSize,
  ValidationError,
} from '@board/shared';
import { assertCanAccess, redactForListing } from '@board/security';
import { projectToSession, reconcile } from './identity';
import { newSessionId, resolveSession } from './session';
import type { BoardStore, CommentRecord, PostFilters, PostSummary, SessionStore, UserRecord } from './types';

declare module 'fastify' {
  interface FastifyRequest {
    identity: IdentityContext;
    sessionId: string | null;
  }
}

export type BoardAppOptions = {
  store: BoardStore;
  sessions: SessionStore;
  sessionSecret: string;
  sessionTtlSeconds: number;
  bodyLimit?: number;
  logger?: boolean | { level: string };
};

type PostParams = { id: string };

type ListQuery = Record<string, string | string[] | undefined>;

const serializeUser = (user: UserRecord) => ({
  identifier: user.identifier,
  display_name: user.displayName,
  is_admin: user.isAdmin,
  created_at: user.createdAt.toISOString(),
  updated_at: user.updatedAt.toISOString(),
});

const serializePost = (post: PostSummary) => ({
  id: post.id,
  title: post.title,
  content: post.content,
  author: post.author,
  owner_id: post.ownerId,
  tags: post.tags,
  resolved: post.resolved,
  private: post.private,
  comment_count: post.commentCount,
  created_at: post.createdAt.toISOString(),
  updated_at: post.updatedAt.toISOString(),
});

const serializeComment = (comment: CommentRecord) => ({
  id: comment.id,
  post_id: comment.postId,
  content: comment.content,
  author: comment.author,
  owner_id: comment.ownerId,
  created_at: comment.createdAt.toISOString(),
  updated_at: comment.updatedAt.toISOString(),
});

const parsePostId = (raw: string): number => {
  const id = /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new NotFoundError('Post not found.');
  }
  return id;
};

const firstValue = (value: string | string[] | undefined): string | undefined =>
  Array.isArray(value) ? value[0] : value;

// Stored text is escaped, so filter values are escaped the same way before matching.
const parseFilters = (query: ListQuery): PostFilters => {
  const filters: PostFilters = {};
  for (const key of ['q', 'title', 'content', 'author', 'tag'] as const) {
    const value = firstValue(query[key]);
    if (value) filters[key] = escapeHtml(value);
  }
  const resolved = firstValue(query.resolved);
  if (resolved) filters.resolved = coerceBoolean(resolved, false);
  return filters;
};

const authorFor = (explicit: string | undefined, identity: IdentityContext): string =>
  explicit ?? identity?.displayName ?? ANONYMOUS_AUTHOR;

export const buildApp = (options: BoardAppOptions) => {
  const { store, sessions } = options;

  const app = Fastify({
    logger: options.logger ?? true,
    bodyLimit: options.bodyLimit ?? 1024 * 1024,
  });

  app.decorateRequest('identity', null);
  app.decorateRequest('sessionId', null);

  app.addHook('onRequest', async (request) => {
    const correlationId = ensureCorrelationId(request.headers['x-correlation-id']);
    request.headers['x-correlation-id'] = correlationId;
    request.log = request.log.child({ correlationId });

    const resolved = await resolveSession(sessions, request.headers.authorization, options.sessionSecret);
    request.sessionId = resolved.sessionId;
    request.identity = resolved.identity;
  });

  // Size is checked on the raw bytes, before anything is parsed.
  app.removeContentTypeParser('application/json');
  app.addContentTypeParser('application/json', { parseAs: 'buffer' }, (_request, body: Buffer, done) => {
    const size = validatePayloadSize(body);
    if (!size.ok) {
      done(new ValidationError(size.error.field, size.error.message), undefined);
      return;
    }
    if (body.length === 0) {
      done(null, {});
      return;
    }
    try {
      done(null, JSON.parse(body.toString('utf8')));
    } catch {
      done(new ValidationError('body', 'request body is not valid JSON.'), undefined);
    }
  });

  app.setErrorHandler((err: FastifyError, request, reply) => {
    const correlationId = ensureCorrelationId(request.headers['x-correlation-id']);
    if (isAppError(err)) {
      if (err.statusCode === 404) {
        request.log.info({ error: err.message }, err.name);
      } else {
        request.log.warn({ error: err.message, field: err.field }, err.name);
      }
      return reply.status(err.statusCode).send(createErrorBody(err.message, err.field, correlationId));
    }
    if (err.statusCode !== undefined && err.statusCode >= 400 && err.statusCode < 500) {
      request.log.warn({ error: err.message, code: err.code }, 'request rejected');
      return reply.status(err.statusCode).send(createErrorBody(err.message, undefined, correlationId));
    }
    request.log.error({ err }, 'unhandled error');
    return reply.status(500).send(createErrorBody(GENERIC_SERVER_ERROR, undefined, correlationId));
  });

  app.register(swagger, {
    openapi: {
      info: { title: 'Support Board Service', version: '0.1.0' },
    },
  });
  app.register(swaggerUi, { routePrefix: '/docs', uiConfig: { docExpansion: 'list' } });

  app.get('/healthz', async () => ({ ok: true }));
  app.get('/readyz', async () => ({ ready: true }));

  app.post('/api/users/sync', async (request, reply) => {
    const { user, created } = await reconcile(store, request.body);
    const sessionId = request.sessionId ?? newSessionId();
    await projectToSession(sessions, sessionId, user);
    const accessToken = signSessionToken({ sid: sessionId }, {
      secret: options.sessionSecret,
      ttlSeconds: options.sessionTtlSeconds,
    });
    request.log.info({ identifier: user.identifier, created }, 'identity reconciled');
    reply.status(created ? 201 : 200);
    return { user: serializeUser(user), access_token: accessToken };
  });

  app.get('/api/users/me', async (request) => {
    const identity = request.identity;
    if (!identity) {
      throw new AuthenticationRequiredError('Not signed in.');
    }
    return {
      identifier: identity.identifier,
      display_name: identity.displayName,
      is_admin: identity.isAdmin,
    };
  });

  app.get<{ Querystring: ListQuery }>('/api/posts', async (request) => {
    const posts = await store.listPosts(parseFilters(request.query));
    const visible = posts.map((post) => serializePost(redactForListing(post, request.identity)));
    return { posts: visible, count: visible.length };
  });

  app.post('/api/posts', async (request, reply) => {
    const input = unwrap(sanitizeNewPost(request.body));
    const identity = request.identity;
    if (input.private && !identity) {
      throw new AuthenticationRequiredError('Sign in to create a private post.');
    }
    const post = await store.createPost({
      title: input.title,
      content: input.content,
      author: authorFor(input.author, identity),
      ownerId: identity?.identifier ?? null,
      tags: input.tags,
      resolved: input.resolved,
      private: input.private,
    });
    reply.status(201);
    return serializePost(post);
  });

  app.get<{ Params: PostParams }>('/api/posts/:id', async (request) => {
    const post = await store.findPost(parsePostId(request.params.id));
    if (!post) throw new NotFoundError('Post not found.');
    assertCanAccess(post, request.identity, 'view');
    const comments = await store.listComments(post.id);
    return { ...serializePost(post), comments: comments.map(serializeComment) };
  });

  app.put<{ Params: PostParams }>('/api/posts/:id', async (request) => {
    const patch = unwrap(sanitizePostPatch(request.body));
    const id = parsePostId(request.params.id);
    const post = await store.findPost(id);
    if (!post) throw new NotFoundError('Post not found.');
    assertCanAccess(post, request.identity, 'update');
    if (patch.private && !request.identity) {
      throw new AuthenticationRequiredError('Sign in to make a post private.');
    }
    const updated = await store.updatePost(id, patch);
    if (!updated) throw new NotFoundError('Post not found.');
    return serializePost(updated);
  });

  app.delete<{ Params: PostParams }>('/api/posts/:id', async (request) => {
    const id = parsePostId(request.params.id);
    const post = await store.findPost(id);
    if (!post) throw new NotFoundError('Post not found.');
    assertCanAccess(post, request.identity, 'delete');
    const removed = await store.deletePost(id);
    if (!removed) throw new NotFoundError('Post not found.');
    return { success: true, message: 'Post deleted.' };
  });

  app.post<{ Params: PostParams }>('/api/posts/:id/comments', async (request, reply) => {
    const input = unwrap(sanitizeCommentInput(request.body));
    const post = await store.findPost(parsePostId(request.params.id));
    if (!post) throw new NotFoundError('Post not found.');
    const identity = request.identity;
    assertCanAccess(post, identity, 'comment');
    const comment = await store.createComment({
      postId: post.id,
      content: input.content,
      author: authorFor(input.author, identity),
      ownerId: identity?.identifier ?? null,
    });
    reply.status(201);
    return serializeComment(comment);
  });

  app.get('/api/tags', async () => {
    const tags = await store.listTags();
    return { tags: tags.map((t) => ({ id: t.id, name: t.name })) };
  });

  app.post('/api/tags', async (request, reply) => {
    const body = request.body;
    const raw = typeof body === 'object' && body !== null && 'name' in body ? body.name : undefined;
    const name = unwrap(sanitizeText(raw, MAX_TAG_LENGTH, 'name'));
    const { tag, created } = await store.getOrCreateTag(name);
    reply.status(created ? 201 : 200);
    return { id: tag.id, name: tag.name };
  });

  return app;
};

export type BoardApp = ReturnType<typeof buildApp>;
