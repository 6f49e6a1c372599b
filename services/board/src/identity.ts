import { z } from 'zod';
import {
  type AppError,
  coerceBoolean,
  IdentifierFormatError,
  sanitizeText,
  type SessionIdentity,
  unwrap,
  ValidationError,
} from '@board/shared';
import type { BoardStore, SessionStore, UpsertOutcome, UserRecord } from './types';

/**
 * Any 128-bit UUID in its usual spellings: hyphenated or not, optionally
 * braced or prefixed with `urn:uuid:`. The version nibble is not checked.
 */
export const canonicalUuid = (value: string): string | null => {
  const hex = value
    .trim()
    .replace(/^urn:uuid:/i, '')
    .replace(/^\{(.*)\}$/, '$1')
    .replace(/-/g, '')
    .toLowerCase();
  if (!/^[0-9a-f]{32}$/.test(hex)) return null;
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
};

/**
 * Identity record as delivered by the local identity helper.
 */
export const identityPayloadSchema = z.object({
  identifier: z.string().transform((value, ctx) => {
    const canonical = canonicalUuid(value);
    if (!canonical) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'identifier must be a valid UUID' });
      return z.NEVER;
    }
    return canonical;
  }),
  display_name: z.string({
    required_error: 'display_name is required.',
    invalid_type_error: 'display_name must be a string.',
  }),
  is_admin: z.union([z.boolean(), z.string()]).nullish(),
});

const payloadError = (error: z.ZodError, payload: unknown): AppError => {
  if (error.issues.some((issue) => issue.path[0] === 'identifier')) {
    const received =
      typeof payload === 'object' && payload !== null && 'identifier' in payload ? payload.identifier : undefined;
    return new IdentifierFormatError(received);
  }
  const issue = error.issues[0];
  const field = issue?.path[0];
  if (issue && typeof field === 'string') {
    const message = issue.code === z.ZodIssueCode.invalid_union ? `${field} must be a boolean.` : issue.message;
    return new ValidationError(field, message);
  }
  return new ValidationError('body', 'identity payload must be a JSON object.');
};

/**
 * Upserts the helper-supplied identity into the user table. The helper is the
 * source of truth for display name and admin flag, so both are overwritten on
 * every call. Nothing is written when the payload is malformed.
 */
export const reconcile = async (store: BoardStore, payload: unknown): Promise<UpsertOutcome> => {
  const parsed = identityPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw payloadError(parsed.error, payload);
  }
  // Display names carry no length cap.
  const displayName = unwrap(sanitizeText(parsed.data.display_name, Number.POSITIVE_INFINITY, 'display_name'));
  const isAdmin = coerceBoolean(parsed.data.is_admin, false);
  return store.upsertUser({ identifier: parsed.data.identifier, displayName, isAdmin });
};

export const toSessionIdentity = (user: UserRecord): SessionIdentity => ({
  identifier: user.identifier,
  displayName: user.displayName,
  isAdmin: user.isAdmin,
});

export const projectToSession = async (sessions: SessionStore, sessionId: string, user: UserRecord): Promise<void> => {
  await sessions.set(sessionId, toSessionIdentity(user));
};
