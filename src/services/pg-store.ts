import {
  closePool,
  createPoolExecutor,
  getPool,
  isForeignKeyViolation,
  isUniqueViolation,
  type SqlExecutor,
} from '../db.js';
import { CategoryNotFoundError, DuplicateSlugError, StorageFailureError } from '../errors.js';
import { normalizeKeywords, type CatalogStore } from '../store.js';
import type {
  Category,
  CategoryLookup,
  Keyword,
  NewCategory,
  NewPicture,
  Picture,
  PictureFilter,
} from '../models.js';

// Database row types (snake_case as returned by PostgreSQL)
type DbCategory = {
  id: number;
  slug: string;
  name: string;
};

type DbKeyword = {
  id: number;
  slug: string;
  name: string;
};

type DbPicture = {
  id: number;
  owner_id: string | null;
  category_id: number | null;
  filename: string;
  original_filename: string | null;
  thumbnail: string;
  episode: number | null;
  created_at: Date;
};

type DbPictureKeyword = DbKeyword & { picture_id: number };

/**
 * Schema SQL for creating all required tables
 * Safe to run on every startup
 */
export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS categories (
  id SERIAL PRIMARY KEY,
  slug TEXT NOT NULL UNIQUE,
  name TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS keywords (
  id SERIAL PRIMARY KEY,
  slug TEXT NOT NULL UNIQUE,
  name TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS pictures (
  id SERIAL PRIMARY KEY,
  owner_id TEXT,
  category_id INTEGER REFERENCES categories(id) ON DELETE RESTRICT,
  filename TEXT NOT NULL,
  original_filename TEXT,
  thumbnail TEXT NOT NULL,
  episode INTEGER CHECK (episode > 0),
  created_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW()
);

CREATE TABLE IF NOT EXISTS pictures_keywords (
  picture_id INTEGER NOT NULL REFERENCES pictures(id) ON DELETE CASCADE,
  keyword_id INTEGER NOT NULL REFERENCES keywords(id),
  PRIMARY KEY (picture_id, keyword_id)
);

CREATE INDEX IF NOT EXISTS idx_categories_name ON categories(name);
CREATE INDEX IF NOT EXISTS idx_pictures_category_episode ON pictures(category_id, episode);
`;

const LOOKUP_COLUMNS: Record<CategoryLookup['by'], string> = {
  id: 'id',
  name: 'name',
  slug: 'slug',
};

/**
 * PgStore - PostgreSQL-backed catalog store
 * Implements the same interface as MemoryStore for drop-in replacement
 */
export class PgStore implements CatalogStore {
  private initialized = false;
  private readonly db: SqlExecutor;

  constructor(db?: SqlExecutor) {
    this.db = db ?? createPoolExecutor(getPool());
  }

  /**
   * Initialize the database schema
   * This should be called once on application startup
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    await this.db.query(SCHEMA_SQL);
    this.initialized = true;
  }

  async close(): Promise<void> {
    await closePool();
    this.initialized = false;
  }

  // ===== Categories =====

  async createCategory(category: NewCategory): Promise<Category> {
    try {
      const result = await this.db.query<DbCategory>(
        'INSERT INTO categories (slug, name) VALUES ($1, $2) RETURNING *',
        [category.slug, category.name]
      );
      return this.mapCategoryFromDb(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) throw new DuplicateSlugError('category', category.slug);
      throw error;
    }
  }

  async updateCategory(id: number, updates: Partial<NewCategory>): Promise<Category | null> {
    const setClauses: string[] = [];
    const params: unknown[] = [];
    let paramIndex = 1;

    if (updates.name !== undefined) {
      setClauses.push(`name = $${paramIndex++}`);
      params.push(updates.name);
    }
    if (updates.slug !== undefined) {
      setClauses.push(`slug = $${paramIndex++}`);
      params.push(updates.slug);
    }

    if (setClauses.length === 0) {
      const [existing] = await this.findCategories({ by: 'id', value: id });
      return existing ?? null;
    }

    params.push(id);

    try {
      const result = await this.db.query<DbCategory>(
        `UPDATE categories SET ${setClauses.join(', ')} WHERE id = $${paramIndex} RETURNING *`,
        params
      );
      return result.rowCount ? this.mapCategoryFromDb(result.rows[0]) : null;
    } catch (error) {
      if (isUniqueViolation(error) && updates.slug !== undefined) {
        throw new DuplicateSlugError('category', updates.slug);
      }
      throw error;
    }
  }

  async findCategories(lookup: CategoryLookup): Promise<Category[]> {
    const result = await this.db.query<DbCategory>(
      `SELECT * FROM categories WHERE ${LOOKUP_COLUMNS[lookup.by]} = $1 ORDER BY id`,
      [lookup.value]
    );
    return result.rows.map((row) => this.mapCategoryFromDb(row));
  }

  async listCategories(): Promise<Category[]> {
    const result = await this.db.query<DbCategory>('SELECT * FROM categories ORDER BY name, id');
    return result.rows.map((row) => this.mapCategoryFromDb(row));
  }

  // ===== Keywords =====

  async upsertKeywords(names: string[]): Promise<Keyword[]> {
    const normalized = normalizeKeywords(names);
    if (normalized.length === 0) return [];

    return this.db.transaction(async (tx) => {
      const keywords: Keyword[] = [];
      for (const { slug, name } of normalized) {
        // The no-op update makes RETURNING yield the existing row on conflict
        const result = await tx.query<DbKeyword>(
          `INSERT INTO keywords (slug, name) VALUES ($1, $2)
           ON CONFLICT (slug) DO UPDATE SET slug = EXCLUDED.slug
           RETURNING *`,
          [slug, name]
        );
        keywords.push(this.mapKeywordFromDb(result.rows[0]));
      }
      return keywords;
    });
  }

  // ===== Pictures =====

  async createPicture(picture: NewPicture): Promise<Picture> {
    const keywordIds = Array.from(new Set(picture.keywordIds));

    const id = await this.insertPicture(picture, keywordIds);

    const created = await this.getPicture(id);
    if (!created) {
      throw new StorageFailureError(`Picture ${id} could not be read back after insert`);
    }
    return created;
  }

  private async insertPicture(picture: NewPicture, keywordIds: number[]): Promise<number> {
    try {
      return await this.db.transaction(async (tx) => {
        const inserted = await tx.query<{ id: number }>(
          `INSERT INTO pictures (owner_id, category_id, filename, original_filename, thumbnail, episode)
           VALUES ($1, $2, $3, $4, $5, $6)
           RETURNING id`,
          [
            picture.ownerId,
            picture.categoryId,
            picture.filename,
            picture.originalFilename,
            picture.thumbnail,
            picture.episode,
          ]
        );
        const pictureId = inserted.rows[0].id;

        for (const keywordId of keywordIds) {
          await tx.query(
            'INSERT INTO pictures_keywords (picture_id, keyword_id) VALUES ($1, $2)',
            [pictureId, keywordId]
          );
        }

        return pictureId;
      });
    } catch (error) {
      if (isForeignKeyViolation(error) && picture.categoryId !== null) {
        throw new CategoryNotFoundError(String(picture.categoryId));
      }
      throw error;
    }
  }

  async getPicture(id: number): Promise<Picture | null> {
    const result = await this.db.query<DbPicture>('SELECT * FROM pictures WHERE id = $1', [id]);
    if (!result.rowCount) return null;

    const [picture] = await this.attachKeywords(result.rows);
    return picture;
  }

  async deletePicture(id: number): Promise<boolean> {
    return this.db.transaction(async (tx) => {
      await tx.query('DELETE FROM pictures_keywords WHERE picture_id = $1', [id]);
      const result = await tx.query('DELETE FROM pictures WHERE id = $1', [id]);
      return (result.rowCount ?? 0) > 0;
    });
  }

  async updatePictureThumbnail(id: number, thumbnail: string): Promise<Picture | null> {
    const result = await this.db.query<DbPicture>(
      'UPDATE pictures SET thumbnail = $1 WHERE id = $2 RETURNING *',
      [thumbnail, id]
    );
    if (!result.rowCount) return null;

    const [picture] = await this.attachKeywords(result.rows);
    return picture;
  }

  async countPictures(filter: PictureFilter = {}): Promise<number> {
    const { where, params } = this.buildFilter(filter);
    const result = await this.db.query<{ total: string }>(
      `SELECT COUNT(*) AS total FROM pictures${where}`,
      params
    );
    return Number(result.rows[0].total);
  }

  async listPictures(filter: PictureFilter, range: { offset: number; limit: number }): Promise<Picture[]> {
    const { where, params } = this.buildFilter(filter);
    params.push(range.offset, range.limit);

    const result = await this.db.query<DbPicture>(
      `SELECT * FROM pictures${where}
       ORDER BY id DESC
       OFFSET $${params.length - 1} LIMIT $${params.length}`,
      params
    );
    return this.attachKeywords(result.rows);
  }

  async listPicturesAfter(afterId: number | null, limit: number): Promise<Picture[]> {
    const result = await this.db.query<DbPicture>(
      'SELECT * FROM pictures WHERE id > $1 ORDER BY id LIMIT $2',
      [afterId ?? 0, limit]
    );
    return this.attachKeywords(result.rows);
  }

  // ===== Helpers =====

  private buildFilter(filter: PictureFilter): { where: string; params: unknown[] } {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filter.categoryId !== undefined) {
      params.push(filter.categoryId);
      conditions.push(`category_id = $${params.length}`);
    }
    if (filter.episode !== undefined) {
      params.push(filter.episode);
      conditions.push(`episode = $${params.length}`);
    }

    return {
      where: conditions.length > 0 ? ' WHERE ' + conditions.join(' AND ') : '',
      params,
    };
  }

  /**
   * One explicit join query for the keywords of a batch of pictures
   */
  private async attachKeywords(rows: DbPicture[]): Promise<Picture[]> {
    if (rows.length === 0) return [];

    const result = await this.db.query<DbPictureKeyword>(
      `SELECT pk.picture_id, k.id, k.slug, k.name
       FROM pictures_keywords pk
       JOIN keywords k ON k.id = pk.keyword_id
       WHERE pk.picture_id = ANY($1::int[])
       ORDER BY k.id`,
      [rows.map((row) => row.id)]
    );

    const byPicture = new Map<number, Keyword[]>();
    for (const row of result.rows) {
      const list = byPicture.get(row.picture_id) ?? [];
      list.push(this.mapKeywordFromDb(row));
      byPicture.set(row.picture_id, list);
    }

    return rows.map((row) => this.mapPictureFromDb(row, byPicture.get(row.id) ?? []));
  }

  private mapCategoryFromDb(row: DbCategory): Category {
    return { id: row.id, slug: row.slug, name: row.name };
  }

  private mapKeywordFromDb(row: DbKeyword): Keyword {
    return { id: row.id, slug: row.slug, name: row.name };
  }

  private mapPictureFromDb(row: DbPicture, keywords: Keyword[]): Picture {
    return {
      id: row.id,
      ownerId: row.owner_id,
      categoryId: row.category_id,
      filename: row.filename,
      originalFilename: row.original_filename,
      thumbnail: row.thumbnail,
      episode: row.episode,
      keywords,
      createdAt: row.created_at.toISOString(),
    };
  }
}
