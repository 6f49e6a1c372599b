import { ValidationError } from './errors';

export const MAX_TITLE_LENGTH = 200;
export const MAX_CONTENT_LENGTH = 10000;
export const MAX_AUTHOR_LENGTH = 50;
export const MAX_TAG_LENGTH = 50;
export const MAX_TAGS_COUNT = 10;
export const MAX_PAYLOAD_BYTES = 50 * 1024;

export const ANONYMOUS_AUTHOR = 'Anonymous';

export type ValidationFailure = {
  field: string;
  message: string;
};

export type Result<T> = { ok: true; value: T } | { ok: false; error: ValidationFailure };

export const ok = <T>(value: T): Result<T> => ({ ok: true, value });

export const fail = <T = never>(field: string, message: string): Result<T> => ({
  ok: false,
  error: { field, message },
});

/**
 * Unwraps a result at the request boundary, turning a failure into a thrown
 * `ValidationError`.
 */
export const unwrap = <T>(result: Result<T>): T => {
  if (!result.ok) {
    throw new ValidationError(result.error.field, result.error.message);
  }
  return result.value;
};

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;',
};

export const escapeHtml = (value: string): string => value.replace(/[&<>"']/g, (c) => HTML_ESCAPES[c] ?? c);

const HTML_UNESCAPES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#x27;': "'",
};

export const unescapeHtml = (value: string): string =>
  value.replace(/&(?:amp|lt|gt|quot|#x27);/g, (entity) => HTML_UNESCAPES[entity] ?? entity);

// Code points, so an astral character counts once.
const charLength = (value: string): number => [...value].length;

/**
 * Trims, length-checks and HTML-escapes a free-text field. This is the only
 * XSS defence; every free-text field goes through it before persistence.
 * Length is measured on the trimmed input, before escaping.
 */
export const sanitizeText = (value: unknown, maxLength: number, field: string, allowEmpty = false): Result<string> => {
  if (value === undefined || value === null) {
    return allowEmpty ? ok('') : fail(field, `${field} is required.`);
  }
  if (typeof value !== 'string') {
    return fail(field, `${field} must be a string.`);
  }
  const trimmed = value.trim();
  if (!trimmed && !allowEmpty) {
    return fail(field, `${field} is required.`);
  }
  if (charLength(trimmed) > maxLength) {
    return fail(field, `${field} cannot exceed ${maxLength} characters.`);
  }
  return ok(escapeHtml(trimmed));
};

/**
 * Non-string entries are rejected rather than skipped. Blank entries are
 * dropped; duplicates are kept and collapse later in the tag upsert.
 */
export const sanitizeTagList = (tags: unknown): Result<string[]> => {
  if (tags === undefined || tags === null) return ok([]);
  if (!Array.isArray(tags)) {
    return fail('tags', 'tags must be an array.');
  }
  if (tags.length > MAX_TAGS_COUNT) {
    return fail('tags', `tags cannot contain more than ${MAX_TAGS_COUNT} entries.`);
  }
  const out: string[] = [];
  for (const tag of tags) {
    if (typeof tag !== 'string') {
      return fail('tags', 'each tag must be a string.');
    }
    const trimmed = tag.trim();
    if (!trimmed) continue;
    if (charLength(trimmed) > MAX_TAG_LENGTH) {
      return fail('tags', `each tag cannot exceed ${MAX_TAG_LENGTH} characters.`);
    }
    out.push(escapeHtml(trimmed));
  }
  return ok(out);
};

export const validatePayloadSize = (body: Buffer | string): Result<void> => {
  const size = typeof body === 'string' ? Buffer.byteLength(body, 'utf8') : body.byteLength;
  if (size > MAX_PAYLOAD_BYTES) {
    return fail('body', `request body is too large (max ${MAX_PAYLOAD_BYTES / 1024}KB).`);
  }
  return ok(undefined);
};

export const coerceBoolean = (value: unknown, fallback = false): boolean => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const lowered = value.trim().toLowerCase();
    if (lowered === 'true') return true;
    if (lowered === 'false') return false;
  }
  return fallback;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export type PostInput = {
  title?: string;
  content?: string;
  author?: string;
  tags?: string[];
  resolved?: boolean;
  private?: boolean;
};

export type NewPostInput = {
  title: string;
  content: string;
  author?: string;
  tags: string[];
  resolved: boolean;
  private: boolean;
};

export type CommentInput = {
  content: string;
  author?: string;
};

const sanitizeOptionalFields = (body: Record<string, unknown>, input: PostInput): Result<PostInput> => {
  if ('author' in body) {
    const author = sanitizeText(body.author, MAX_AUTHOR_LENGTH, 'author', true);
    if (!author.ok) return author;
    if (author.value) input.author = author.value;
  }
  if ('tags' in body) {
    const tags = sanitizeTagList(body.tags);
    if (!tags.ok) return tags;
    input.tags = tags.value;
  }
  if ('resolved' in body) input.resolved = coerceBoolean(body.resolved);
  if ('private' in body) input.private = coerceBoolean(body.private);
  return ok(input);
};

export const sanitizeNewPost = (body: unknown): Result<NewPostInput> => {
  if (!isRecord(body)) return fail('body', 'request body must be a JSON object.');
  const title = sanitizeText(body.title, MAX_TITLE_LENGTH, 'title');
  if (!title.ok) return title;
  const content = sanitizeText(body.content, MAX_CONTENT_LENGTH, 'content');
  if (!content.ok) return content;
  const rest = sanitizeOptionalFields(body, {});
  if (!rest.ok) return rest;
  return ok({
    title: title.value,
    content: content.value,
    ...(rest.value.author ? { author: rest.value.author } : {}),
    tags: rest.value.tags ?? [],
    resolved: rest.value.resolved ?? false,
    private: rest.value.private ?? false,
  });
};

/**
 * Only the keys present are checked. A blank title or content means
 * "unchanged" and is left out of the patch.
 */
export const sanitizePostPatch = (body: unknown): Result<PostInput> => {
  if (!isRecord(body)) return fail('body', 'request body must be a JSON object.');
  const patch: PostInput = {};
  if ('title' in body) {
    const title = sanitizeText(body.title, MAX_TITLE_LENGTH, 'title', true);
    if (!title.ok) return title;
    if (title.value) patch.title = title.value;
  }
  if ('content' in body) {
    const content = sanitizeText(body.content, MAX_CONTENT_LENGTH, 'content', true);
    if (!content.ok) return content;
    if (content.value) patch.content = content.value;
  }
  return sanitizeOptionalFields(body, patch);
};

export const sanitizeCommentInput = (body: unknown): Result<CommentInput> => {
  if (!isRecord(body)) return fail('body', 'request body must be a JSON object.');
  const content = sanitizeText(body.content, MAX_CONTENT_LENGTH, 'content');
  if (!content.ok) return content;
  const author = sanitizeText(body.author, MAX_AUTHOR_LENGTH, 'author', true);
  if (!author.ok) return author;
  return ok(author.value ? { content: content.value, author: author.value } : { content: content.value });
};
