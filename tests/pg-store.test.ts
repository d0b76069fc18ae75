import { describe, expect, it } from 'vitest';
import { PgStore, SCHEMA_SQL } from '../src/services/pg-store.js';
import { CategoryNotFoundError, DuplicateSlugError, StorageFailureError } from '../src/errors.js';
import { FakeSqlExecutor, pgError } from './helpers/fake-sql.js';

const createdAt = new Date('2024-05-01T12:00:00.000Z');

const pictureRow = {
  id: 7,
  owner_id: 'user-1',
  category_id: 2,
  filename: '11111111-1111-1111-1111-111111111111.jpg',
  original_filename: 'beach.jpg',
  thumbnail: '11111111-1111-1111-1111-111111111111.thumb.jpg',
  episode: 3,
  created_at: createdAt,
};

/**
 * PgStore against an in-process SQL executor; no database is contacted
 */
describe('PgStore', () => {
  it('creates the schema once', async () => {
    const db = new FakeSqlExecutor();
    const store = new PgStore(db);

    await store.initialize();
    await store.initialize();

    expect(db.calls).toHaveLength(1);
    expect(db.calls[0].sql).toBe(SCHEMA_SQL.replace(/\s+/g, ' ').trim());
  });

  it('inserts a category and maps the row', async () => {
    const db = new FakeSqlExecutor().respond(/^INSERT INTO categories/, () => [
      { id: 4, slug: 'anime', name: 'Anime' },
    ]);
    const store = new PgStore(db);

    const category = await store.createCategory({ name: 'Anime', slug: 'anime' });

    expect(category).toEqual({ id: 4, slug: 'anime', name: 'Anime' });
    expect(db.calls[0].params).toEqual(['anime', 'Anime']);
  });

  it('maps a unique violation to DuplicateSlugError', async () => {
    const db = new FakeSqlExecutor().respond(/^INSERT INTO categories/, () => {
      throw pgError('23505', 'duplicate key value violates unique constraint "categories_slug_key"');
    });
    const store = new PgStore(db);

    await expect(store.createCategory({ name: 'Anime', slug: 'anime' })).rejects.toBeInstanceOf(DuplicateSlugError);
  });

  it('builds a partial category update', async () => {
    const db = new FakeSqlExecutor().respond(/^UPDATE categories/, () => [{ id: 4, slug: 'anime', name: 'Animation' }]);
    const store = new PgStore(db);

    const updated = await store.updateCategory(4, { name: 'Animation' });

    expect(updated).toEqual({ id: 4, slug: 'anime', name: 'Animation' });
    expect(db.calls[0]).toEqual({
      sql: 'UPDATE categories SET name = $1 WHERE id = $2 RETURNING *',
      params: ['Animation', 4],
    });
  });

  it('looks categories up by the requested column', async () => {
    const db = new FakeSqlExecutor();
    const store = new PgStore(db);

    await store.findCategories({ by: 'name', value: 'Anime' });
    await store.findCategories({ by: 'slug', value: 'anime' });

    expect(db.calls.map((call) => call.sql)).toEqual([
      'SELECT * FROM categories WHERE name = $1 ORDER BY id',
      'SELECT * FROM categories WHERE slug = $1 ORDER BY id',
    ]);
  });

  it('upserts normalized keywords in one transaction', async () => {
    let nextId = 10;
    const db = new FakeSqlExecutor().respond(/^INSERT INTO keywords/, (params) => [
      { id: nextId++, slug: params[0], name: params[1] },
    ]);
    const store = new PgStore(db);

    const keywords = await store.upsertKeywords(['Sunset', 'sunset', 'Beach']);

    expect(keywords).toEqual([
      { id: 10, slug: 'sunset', name: 'Sunset' },
      { id: 11, slug: 'beach', name: 'Beach' },
    ]);
    expect(db.transactions).toEqual({ begun: 1, committed: 1, rolledBack: 0 });
    expect(db.calls[0].sql).toContain('ON CONFLICT (slug) DO UPDATE');
  });

  it('skips the transaction for an empty keyword list', async () => {
    const db = new FakeSqlExecutor();
    expect(await new PgStore(db).upsertKeywords([])).toEqual([]);
    expect(db.transactions.begun).toBe(0);
  });

  it('inserts a picture with its keyword links and reads it back', async () => {
    const db = new FakeSqlExecutor()
      .respond(/^INSERT INTO pictures \(/, () => [{ id: 7 }])
      .respond(/^SELECT \* FROM pictures WHERE id = \$1/, () => [pictureRow])
      .respond(/FROM pictures_keywords pk/, () => [
        { picture_id: 7, id: 10, slug: 'sunset', name: 'Sunset' },
        { picture_id: 7, id: 11, slug: 'beach', name: 'Beach' },
      ]);
    const store = new PgStore(db);

    const picture = await store.createPicture({
      ownerId: 'user-1',
      categoryId: 2,
      filename: pictureRow.filename,
      originalFilename: 'beach.jpg',
      thumbnail: pictureRow.thumbnail,
      episode: 3,
      keywordIds: [10, 11, 10],
    });

    expect(picture).toEqual({
      id: 7,
      ownerId: 'user-1',
      categoryId: 2,
      filename: pictureRow.filename,
      originalFilename: 'beach.jpg',
      thumbnail: pictureRow.thumbnail,
      episode: 3,
      keywords: [
        { id: 10, slug: 'sunset', name: 'Sunset' },
        { id: 11, slug: 'beach', name: 'Beach' },
      ],
      createdAt: '2024-05-01T12:00:00.000Z',
    });
    expect(db.statements(/^INSERT INTO pictures_keywords/).map((call) => call.params)).toEqual([
      [7, 10],
      [7, 11],
    ]);
    expect(db.transactions).toEqual({ begun: 1, committed: 1, rolledBack: 0 });
  });

  it('rolls back and reports a missing category on a foreign key violation', async () => {
    const db = new FakeSqlExecutor().respond(/^INSERT INTO pictures \(/, () => {
      throw pgError('23503', 'insert or update on table "pictures" violates foreign key constraint');
    });
    const store = new PgStore(db);

    await expect(
      store.createPicture({
        ownerId: null,
        categoryId: 99,
        filename: pictureRow.filename,
        originalFilename: null,
        thumbnail: pictureRow.thumbnail,
        episode: null,
        keywordIds: [],
      })
    ).rejects.toBeInstanceOf(CategoryNotFoundError);
    expect(db.transactions).toEqual({ begun: 1, committed: 0, rolledBack: 1 });
  });

  it('fails when the inserted picture cannot be read back', async () => {
    const db = new FakeSqlExecutor().respond(/^INSERT INTO pictures \(/, () => [{ id: 7 }]);
    const store = new PgStore(db);

    await expect(
      store.createPicture({
        ownerId: null,
        categoryId: null,
        filename: pictureRow.filename,
        originalFilename: null,
        thumbnail: pictureRow.thumbnail,
        episode: null,
        keywordIds: [],
      })
    ).rejects.toBeInstanceOf(StorageFailureError);
  });

  it('deletes keyword links before the picture row', async () => {
    const db = new FakeSqlExecutor().respond(/^DELETE FROM pictures WHERE/, () => [{ id: 7 }]);
    const store = new PgStore(db);

    expect(await store.deletePicture(7)).toBe(true);
    expect(db.calls.map((call) => call.sql)).toEqual([
      'DELETE FROM pictures_keywords WHERE picture_id = $1',
      'DELETE FROM pictures WHERE id = $1',
    ]);
    expect(db.transactions.committed).toBe(1);
  });

  it('reports a delete of an unknown picture', async () => {
    expect(await new PgStore(new FakeSqlExecutor()).deletePicture(7)).toBe(false);
  });

  it('counts with a category and episode filter', async () => {
    const db = new FakeSqlExecutor().respond(/^SELECT COUNT/, () => [{ total: '25' }]);
    const store = new PgStore(db);

    expect(await store.countPictures({ categoryId: 2, episode: 5 })).toBe(25);
    expect(db.calls[0]).toEqual({
      sql: 'SELECT COUNT(*) AS total FROM pictures WHERE category_id = $1 AND episode = $2',
      params: [2, 5],
    });
  });

  it('pages newest first with offset and limit placeholders after the filter', async () => {
    const db = new FakeSqlExecutor();
    const store = new PgStore(db);

    expect(await store.listPictures({ categoryId: 2 }, { offset: 20, limit: 10 })).toEqual([]);
    expect(db.calls[0]).toEqual({
      sql: 'SELECT * FROM pictures WHERE category_id = $1 ORDER BY id DESC OFFSET $2 LIMIT $3',
      params: [2, 20, 10],
    });
  });

  it('loads keywords for a page with a single join query', async () => {
    const second = { ...pictureRow, id: 8 };
    const db = new FakeSqlExecutor()
      .respond(/^SELECT \* FROM pictures ORDER BY/, () => [second, pictureRow])
      .respond(/FROM pictures_keywords pk/, () => [{ picture_id: 8, id: 10, slug: 'sunset', name: 'Sunset' }]);
    const store = new PgStore(db);

    const pictures = await store.listPictures({}, { offset: 0, limit: 2 });

    expect(pictures.map((picture) => [picture.id, picture.keywords.length])).toEqual([
      [8, 1],
      [7, 0],
    ]);
    expect(db.statements(/FROM pictures_keywords pk/)).toEqual([
      expect.objectContaining({ params: [[8, 7]] }),
    ]);
  });

  it('walks pictures after a cursor starting from zero', async () => {
    const db = new FakeSqlExecutor();
    await new PgStore(db).listPicturesAfter(null, 50);

    expect(db.calls[0]).toEqual({
      sql: 'SELECT * FROM pictures WHERE id > $1 ORDER BY id LIMIT $2',
      params: [0, 50],
    });
  });
});
