import { v4 as uuidv4 } from 'uuid';

export type ErrorBody = {
  error: string;
  field?: string;
  correlationId?: string;
};

export const createErrorBody = (error: string, field?: string, correlationId?: string): ErrorBody => ({
  error,
  ...(field ? { field } : {}),
  ...(correlationId ? { correlationId } : {}),
});

export const ensureCorrelationId = (existing?: string | string[]): string => {
  if (Array.isArray(existing)) {
    return existing[0] ?? uuidv4();
  }
  return existing ?? uuidv4();
};

/**
 * Identity projected into a server-side session. `null` is the anonymous caller.
 */
export type SessionIdentity = {
  identifier: string;
  displayName: string;
  isAdmin: boolean;
};

export type IdentityContext = SessionIdentity | null;

export * from './persistence';
export * from './auth';
export * from './errors';
export * from './sanitize';
