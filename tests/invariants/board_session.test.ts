/**
 * Board Session Tests
 *
 * Session tokens carry only a session id. Resolution must fall back to the
 * anonymous caller for anything it cannot verify.
 *
 * Run: node --import tsx --test tests/invariants/board_session.test.ts
 */

import { describe, it } from 'node:test';
import * as assert from 'node:assert';
import jwt from 'jsonwebtoken';
import { validate as isUuid } from 'uuid';
import { bearerToken, signSessionToken, verifySessionToken } from '@board/shared';
import { newSessionId, resolveSession } from '../../services/board/src/session';
import { MemorySessionStore } from '../support/memory_store';

const SECRET = 'test-secret';
const SESSION_ID = '5f0c3f4e-6b1d-4c2a-9e7f-0a1b2c3d4e5f';
const IDENTITY = { identifier: 'a3bb189e-8bf9-4888-9912-ace4e6543002', displayName: 'Kim', isAdmin: false };

describe('Board Session', () => {
  describe('session tokens', () => {
    it('round-trips the session id', () => {
      const token = signSessionToken({ sid: SESSION_ID }, { secret: SECRET, ttlSeconds: 60 });
      assert.deepStrictEqual(verifySessionToken(token, SECRET), { sid: SESSION_ID });
    });

    it('rejects tokens signed with another secret', () => {
      const token = signSessionToken({ sid: SESSION_ID }, { secret: 'other-secret' });
      assert.strictEqual(verifySessionToken(token, SECRET), null);
    });

    it('rejects expired and malformed tokens', () => {
      const expired = signSessionToken({ sid: SESSION_ID }, { secret: SECRET, ttlSeconds: -10 });
      assert.strictEqual(verifySessionToken(expired, SECRET), null);
      assert.strictEqual(verifySessionToken('not.a.token', SECRET), null);
    });

    it('rejects tokens without a session id', () => {
      assert.strictEqual(verifySessionToken(jwt.sign({ user: 'x' }, SECRET), SECRET), null);
      assert.strictEqual(verifySessionToken(jwt.sign({ sid: 42 }, SECRET), SECRET), null);
    });
  });

  describe('bearerToken', () => {
    it('extracts the token from the authorization header', () => {
      assert.strictEqual(bearerToken('Bearer abc'), 'abc');
      assert.strictEqual(bearerToken('bearer  abc '), 'abc');
      assert.strictEqual(bearerToken(['Bearer first', 'Bearer second']), 'first');
    });

    it('returns null for other schemes and empty headers', () => {
      assert.strictEqual(bearerToken('Basic abc'), null);
      assert.strictEqual(bearerToken('Bearer'), null);
      assert.strictEqual(bearerToken(''), null);
      assert.strictEqual(bearerToken(undefined), null);
    });
  });

  describe('resolveSession', () => {
    it('resolves a valid token to its projected identity', async () => {
      const sessions = new MemorySessionStore();
      await sessions.set(SESSION_ID, IDENTITY);
      const token = signSessionToken({ sid: SESSION_ID }, { secret: SECRET });

      assert.deepStrictEqual(await resolveSession(sessions, `Bearer ${token}`, SECRET), {
        sessionId: SESSION_ID,
        identity: IDENTITY,
      });
    });

    it('keeps the session id but no identity when nothing is projected yet', async () => {
      const token = signSessionToken({ sid: SESSION_ID }, { secret: SECRET });
      assert.deepStrictEqual(await resolveSession(new MemorySessionStore(), `Bearer ${token}`, SECRET), {
        sessionId: SESSION_ID,
        identity: null,
      });
    });

    it('treats forged, non-UUID and missing tokens as anonymous', async () => {
      const sessions = new MemorySessionStore();
      await sessions.set(SESSION_ID, IDENTITY);
      await sessions.set('abc', IDENTITY);
      const forged = signSessionToken({ sid: SESSION_ID }, { secret: 'other-secret' });
      const notUuid = signSessionToken({ sid: 'abc' }, { secret: SECRET });

      for (const header of [`Bearer ${forged}`, `Bearer ${notUuid}`, undefined]) {
        assert.deepStrictEqual(await resolveSession(sessions, header, SECRET), { sessionId: null, identity: null });
      }
    });
  });

  it('issues UUID session ids', () => {
    const first = newSessionId();
    assert.ok(isUuid(first));
    assert.notStrictEqual(first, newSessionId());
  });
});
