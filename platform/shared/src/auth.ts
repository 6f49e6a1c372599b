import jwt from 'jsonwebtoken';

const DEFAULT_SESSION_TTL_SECONDS = 14 * 24 * 60 * 60;

export type SessionTokenPayload = {
  // session id; the identity itself lives server-side.
  sid: string;
};

export type SessionTokenOptions = {
  secret: string;
  ttlSeconds?: number;
};

export const signSessionToken = (payload: SessionTokenPayload, options: SessionTokenOptions): string =>
  jwt.sign(payload, options.secret, {
    expiresIn: options.ttlSeconds ?? DEFAULT_SESSION_TTL_SECONDS,
  });

export const verifySessionToken = (token: string, secret: string): SessionTokenPayload | null => {
  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, secret);
  } catch {
    return null;
  }
  if (typeof decoded === 'string') return null;
  const sid: unknown = decoded.sid;
  return typeof sid === 'string' && sid.length > 0 ? { sid } : null;
};

export const bearerToken = (header: string | string[] | undefined): string | null => {
  const value = Array.isArray(header) ? header[0] : header;
  if (!value) return null;
  const match = /^Bearer\s+(.+)$/i.exec(value.trim());
  return match?.[1] ?? null;
};
