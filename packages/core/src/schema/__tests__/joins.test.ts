import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { collectAliases, extractJoinConditions, normalizeSqlText } from '../joins.js';

describe('extractJoinConditions', () => {
  it('resolves aliases from FROM and JOIN clauses', () => {
    const joins = extractJoinConditions(
      "SELECT t.Name FROM Track t JOIN Album AS al ON t.AlbumId = al.AlbumId WHERE t.Name = 'x' LIMIT 5",
    );
    assert.equal(joins.length, 1);
    assert.deepEqual(joins[0], {
      leftTable: 'Track',
      leftColumn: 'AlbumId',
      rightTable: 'Album',
      rightColumn: 'AlbumId',
      text: 'Track.AlbumId = Album.AlbumId',
      original: 't.AlbumId = al.AlbumId',
    });
  });

  it('finds implicit joins in WHERE', () => {
    const joins = extractJoinConditions(
      'SELECT c.FirstName FROM Customer c, Invoice i WHERE c.CustomerId = i.CustomerId LIMIT 10',
    );
    assert.deepEqual(
      joins.map((j) => j.text),
      ['Customer.CustomerId = Invoice.CustomerId'],
    );
  });

  it('handles quoted identifiers', () => {
    const joins = extractJoinConditions(
      'SELECT "t"."Name" FROM "Track" "t" JOIN "Album" "a" ON "t"."AlbumId" = "a"."AlbumId" LIMIT 1',
    );
    assert.deepEqual(
      joins.map((j) => j.text),
      ['Track.AlbumId = Album.AlbumId'],
    );
  });

  it('ignores equalities inside literals and comments', () => {
    const sql = [
      'SELECT Name FROM Artist -- a.x = b.y',
      "WHERE Name = 'a.b = c.d' /* e.f = g.h */ LIMIT 3",
    ].join('\n');
    assert.deepEqual(extractJoinConditions(sql), []);
  });

  it('skips comparisons on a single table and duplicate conditions', () => {
    const joins = extractJoinConditions(
      'SELECT e.FirstName FROM Employee e JOIN Customer c ON c.SupportRepId = e.EmployeeId ' +
        'WHERE e.EmployeeId = e.ReportsTo AND c.SupportRepId = e.EmployeeId LIMIT 5',
    );
    assert.deepEqual(
      joins.map((j) => j.text),
      ['Customer.SupportRepId = Employee.EmployeeId'],
    );
  });
});

describe('collectAliases', () => {
  it('maps schema-qualified tables to their bare names', () => {
    const aliases = collectAliases('SELECT t.Name FROM main.Track t JOIN Album ON Track.AlbumId = Album.AlbumId');
    assert.equal(aliases.get('t'), 'Track');
    assert.equal(aliases.get('track'), 'Track');
    assert.equal(aliases.get('album'), 'Album');
    assert.equal(aliases.has('on'), false);
  });
});

describe('normalizeSqlText', () => {
  it('blanks literals and unquotes identifiers', () => {
    assert.equal(normalizeSqlText(`SELECT "a" FROM [b] WHERE c = 'it''s'`), "SELECT a FROM b WHERE c = ''");
  });
});
