/**
 * Board Post Query Tests
 *
 * Search filters and partial updates are assembled into parameterised SQL.
 * User input must only ever appear in the bound values.
 *
 * Run: node --import tsx --test tests/invariants/board_post_query.test.ts
 */

import { describe, it } from 'node:test';
import * as assert from 'node:assert';
import { likePattern } from '@board/shared';
import { buildPostListQuery, buildPostUpdateQuery } from '../../services/board/src/store';

const whereClause = (text: string): string => {
  const start = text.indexOf('\nwhere ');
  const end = text.indexOf('\norder by');
  return start === -1 ? '' : text.slice(start + 1, end);
};

describe('Board Post Query', () => {
  describe('likePattern', () => {
    it('wraps the needle and escapes wildcards', () => {
      assert.strictEqual(likePattern('django'), '%django%');
      assert.strictEqual(likePattern('50%_off'), '%50\\%\\_off%');
      assert.strictEqual(likePattern('a\\b'), '%a\\\\b%');
    });
  });

  describe('buildPostListQuery', () => {
    it('lists everything newest first without filters', () => {
      const query = buildPostListQuery({});
      assert.strictEqual(whereClause(query.text), '');
      assert.ok(query.text.endsWith('\norder by p.created_at desc, p.id desc'));
      assert.deepStrictEqual(query.values, []);
    });

    it('matches q against title, content, author and tags with one parameter', () => {
      const query = buildPostListQuery({ q: 'django' });
      assert.strictEqual(
        whereClause(query.text),
        'where (p.title ilike $1 or p.content ilike $1 or p.author ilike $1 or ' +
          'exists (select 1 from post_tags pt join tags t on t.id = pt.tag_id where pt.post_id = p.id and t.name ilike $1))',
      );
      assert.deepStrictEqual(query.values, ['%django%']);
    });

    it('ANDs field filters in a fixed order', () => {
      const query = buildPostListQuery({ author: 'kim', title: 'help', resolved: false });
      assert.strictEqual(whereClause(query.text), 'where p.title ilike $1\n  and p.author ilike $2\n  and p.resolved = $3');
      assert.deepStrictEqual(query.values, ['%help%', '%kim%', false]);
    });

    it('filters by tag name', () => {
      const query = buildPostListQuery({ tag: 'db', content: 'index' });
      assert.strictEqual(
        whereClause(query.text),
        'where p.content ilike $1\n  and ' +
          'exists (select 1 from post_tags pt join tags t on t.id = pt.tag_id where pt.post_id = p.id and t.name ilike $2)',
      );
      assert.deepStrictEqual(query.values, ['%index%', '%db%']);
    });

    it('keeps hostile input out of the statement text', () => {
      const query = buildPostListQuery({ q: "'; drop table posts; --" });
      assert.ok(!query.text.includes('drop table'));
      assert.deepStrictEqual(query.values, ["%'; drop table posts; --%"]);
    });
  });

  describe('buildPostUpdateQuery', () => {
    it('sets only the supplied fields and always bumps updated_at', () => {
      const query = buildPostUpdateQuery(4, { title: 'new', resolved: true });
      assert.strictEqual(
        query.text,
        'update posts set title = $1, resolved = $2, updated_at = now() where id = $3 returning id',
      );
      assert.deepStrictEqual(query.values, ['new', true, 4]);
    });

    it('ignores tags, which live in their own table', () => {
      const query = buildPostUpdateQuery(9, { tags: ['a'], private: false });
      assert.strictEqual(query.text, 'update posts set private = $1, updated_at = now() where id = $2 returning id');
      assert.deepStrictEqual(query.values, [false, 9]);
    });

    it('still touches updated_at for an empty patch', () => {
      const query = buildPostUpdateQuery(1, {});
      assert.strictEqual(query.text, 'update posts set updated_at = now() where id = $1 returning id');
      assert.deepStrictEqual(query.values, [1]);
    });
  });
});
