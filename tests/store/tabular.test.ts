import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import {
  REQUIRED_HEADERS,
  columnLetter,
  countRows,
  loadExistingIds,
  setupStore,
  toRow,
} from '../../src/store/tabular.js';
import type { SqlSheetStore } from '../../src/store/sql-sheet.js';
import { createTestStore } from '../helpers.js';

describe('setupStore', () => {
  let store: SqlSheetStore;

  beforeEach(async () => {
    store = await createTestStore();
  });

  it('creates a missing store with the header row', async () => {
    const result = await setupStore(store);

    assert.deepEqual(result, { created: true, addedHeaders: [...REQUIRED_HEADERS] });
    assert.deepEqual(await store.readAllValues(), [[...REQUIRED_HEADERS]]);
  });

  it('writes the header into an existing empty store', async () => {
    await store.create();
    const result = await setupStore(store);

    assert.equal(result.created, false);
    assert.deepEqual(await store.readAllValues(), [[...REQUIRED_HEADERS]]);
  });

  it('adds exactly the missing column at the next free position', async () => {
    await store.create();
    await store.appendRows([
      ['Review_Id', 'App_Name', 'Review_Date', 'Rating', 'Review_Text'],
      ['id1', 'Alpha', '2025-07-10 10:00:00', '4', 'kept as is'],
    ]);

    const result = await setupStore(store);

    assert.deepEqual(result.addedHeaders, ['Inserted_On']);
    assert.deepEqual(await store.readAllValues(), [
      ['Review_Id', 'App_Name', 'Review_Date', 'Rating', 'Review_Text', 'Inserted_On'],
      ['id1', 'Alpha', '2025-07-10 10:00:00', '4', 'kept as is'],
    ]);
  });

  it('leaves a complete store alone', async () => {
    await setupStore(store);
    const result = await setupStore(store);

    assert.deepEqual(result, { created: false, addedHeaders: [] });
    assert.equal(await countRows(store), 1);
  });
});

describe('store helpers', () => {
  it('loads ids without the header and counts the header as a row', async () => {
    const store = await createTestStore();
    await setupStore(store);
    await store.appendRows([
      ['id1', 'Alpha', '2025-07-10 10:00:00', 4, '2025-07-20 11:30:00', 'first'],
      ['id2', 'Beta', '2025-07-11 10:00:00', 2, '2025-07-20 11:30:00', 'second'],
    ]);

    assert.deepEqual([...(await loadExistingIds(store))], ['id1', 'id2']);
    assert.equal(await countRows(store), 3);
  });

  it('serialises a record in header order', () => {
    assert.deepEqual(toRow({
      id: 'abc',
      appName: 'Alpha',
      reviewDate: '2025-07-10 10:00:00',
      rating: 3,
      insertedOn: '2025-07-20 11:30:00',
      text: 'body',
    }), ['abc', 'Alpha', '2025-07-10 10:00:00', 3, '2025-07-20 11:30:00', 'body']);
  });

  it('converts column numbers to A1 letters', () => {
    assert.equal(columnLetter(1), 'A');
    assert.equal(columnLetter(26), 'Z');
    assert.equal(columnLetter(27), 'AA');
    assert.equal(columnLetter(52), 'AZ');
    assert.equal(columnLetter(703), 'AAA');
    assert.throws(() => columnLetter(0), RangeError);
  });
});
