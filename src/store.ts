import { slugify } from './lib/slug.js';
import { AmbiguousCategoryError, CategoryNotFoundError, DuplicateSlugError, ValidationError } from './errors.js';
import type {
  Category,
  CategoryLookup,
  Keyword,
  NewCategory,
  NewPicture,
  Picture,
  PictureFilter,
} from './models.js';

/**
 * Catalog persistence. MemoryStore and PgStore both implement it.
 * Every mutating call commits all of its row and junction changes or none.
 */
export interface CatalogStore {
  createCategory(category: NewCategory): Promise<Category>;
  updateCategory(id: number, updates: Partial<NewCategory>): Promise<Category | null>;
  findCategories(lookup: CategoryLookup): Promise<Category[]>;
  listCategories(): Promise<Category[]>;
  upsertKeywords(names: string[]): Promise<Keyword[]>;
  createPicture(picture: NewPicture): Promise<Picture>;
  getPicture(id: number): Promise<Picture | null>;
  deletePicture(id: number): Promise<boolean>;
  updatePictureThumbnail(id: number, thumbnail: string): Promise<Picture | null>;
  countPictures(filter?: PictureFilter): Promise<number>;
  listPictures(filter: PictureFilter, range: { offset: number; limit: number }): Promise<Picture[]>;
  listPicturesAfter(afterId: number | null, limit: number): Promise<Picture[]>;
  initialize?(): Promise<void>;
  close?(): Promise<void>;
}

/**
 * Category references are tried as an exact name first, then as a slug
 */
const CATEGORY_REFERENCE_ORDER = ['name', 'slug'] as const;

export async function resolveCategory(store: CatalogStore, reference: string): Promise<Category> {
  for (const by of CATEGORY_REFERENCE_ORDER) {
    const matches = await store.findCategories({ by, value: reference });
    if (matches.length > 1) {
      throw new AmbiguousCategoryError(reference, matches.length);
    }
    if (matches.length === 1) {
      return matches[0];
    }
  }
  throw new CategoryNotFoundError(reference);
}

/**
 * Slug each keyword name and keep the first name seen per slug
 */
export function normalizeKeywords(names: string[]): Array<{ slug: string; name: string }> {
  const bySlug = new Map<string, string>();
  for (const raw of names) {
    const name = raw.trim();
    const slug = slugify(name);
    if (!slug) {
      throw new ValidationError(`Keyword "${raw}" has no usable characters`, 'keyword_invalid');
    }
    if (!bySlug.has(slug)) bySlug.set(slug, name);
  }
  return Array.from(bySlug, ([slug, name]) => ({ slug, name }));
}

interface StoredPicture extends Omit<Picture, 'keywords'> {
  keywordIds: number[];
}

export class MemoryStore implements CatalogStore {
  categories = new Map<number, Category>();
  keywords = new Map<number, Keyword>();
  pictures = new Map<number, StoredPicture>();

  private nextCategoryId = 1;
  private nextKeywordId = 1;
  private nextPictureId = 1;

  async createCategory(category: NewCategory): Promise<Category> {
    this.assertSlugFree(category.slug);
    const created: Category = { id: this.nextCategoryId++, ...category };
    this.categories.set(created.id, created);
    return { ...created };
  }

  async updateCategory(id: number, updates: Partial<NewCategory>): Promise<Category | null> {
    const category = this.categories.get(id);
    if (!category) return null;

    if (updates.slug !== undefined && updates.slug !== category.slug) {
      this.assertSlugFree(updates.slug);
    }

    const updated: Category = { ...category, ...updates };
    this.categories.set(id, updated);
    return { ...updated };
  }

  async findCategories(lookup: CategoryLookup): Promise<Category[]> {
    const all = Array.from(this.categories.values());
    const matches = all.filter((category) => category[lookup.by] === lookup.value);
    return matches.map((category) => ({ ...category }));
  }

  async listCategories(): Promise<Category[]> {
    return Array.from(this.categories.values())
      .sort((a, b) => a.name.localeCompare(b.name) || a.id - b.id)
      .map((category) => ({ ...category }));
  }

  async upsertKeywords(names: string[]): Promise<Keyword[]> {
    const result: Keyword[] = [];
    for (const { slug, name } of normalizeKeywords(names)) {
      let keyword = Array.from(this.keywords.values()).find((k) => k.slug === slug);
      if (!keyword) {
        keyword = { id: this.nextKeywordId++, slug, name };
        this.keywords.set(keyword.id, keyword);
      }
      result.push({ ...keyword });
    }
    return result;
  }

  async createPicture(picture: NewPicture): Promise<Picture> {
    if (picture.categoryId !== null && !this.categories.has(picture.categoryId)) {
      throw new CategoryNotFoundError(String(picture.categoryId));
    }

    const stored: StoredPicture = {
      id: this.nextPictureId++,
      ownerId: picture.ownerId,
      categoryId: picture.categoryId,
      filename: picture.filename,
      originalFilename: picture.originalFilename,
      thumbnail: picture.thumbnail,
      episode: picture.episode,
      keywordIds: Array.from(new Set(picture.keywordIds)),
      createdAt: new Date().toISOString(),
    };
    this.pictures.set(stored.id, stored);
    return this.hydrate(stored);
  }

  async getPicture(id: number): Promise<Picture | null> {
    const stored = this.pictures.get(id);
    return stored ? this.hydrate(stored) : null;
  }

  async deletePicture(id: number): Promise<boolean> {
    return this.pictures.delete(id);
  }

  async updatePictureThumbnail(id: number, thumbnail: string): Promise<Picture | null> {
    const stored = this.pictures.get(id);
    if (!stored) return null;

    const updated = { ...stored, thumbnail };
    this.pictures.set(id, updated);
    return this.hydrate(updated);
  }

  async countPictures(filter: PictureFilter = {}): Promise<number> {
    return this.filterPictures(filter).length;
  }

  async listPictures(filter: PictureFilter, range: { offset: number; limit: number }): Promise<Picture[]> {
    const pictures = this.filterPictures(filter);

    // Newest first by insertion order; ids only grow
    pictures.sort((a, b) => b.id - a.id);

    return pictures
      .slice(range.offset, range.offset + range.limit)
      .map((stored) => this.hydrate(stored));
  }

  async listPicturesAfter(afterId: number | null, limit: number): Promise<Picture[]> {
    return Array.from(this.pictures.values())
      .filter((stored) => afterId === null || stored.id > afterId)
      .sort((a, b) => a.id - b.id)
      .slice(0, limit)
      .map((stored) => this.hydrate(stored));
  }

  private filterPictures(filter: PictureFilter): StoredPicture[] {
    let pictures = Array.from(this.pictures.values());

    if (filter.categoryId !== undefined) {
      pictures = pictures.filter((picture) => picture.categoryId === filter.categoryId);
    }
    if (filter.episode !== undefined) {
      pictures = pictures.filter((picture) => picture.episode === filter.episode);
    }

    return pictures;
  }

  private assertSlugFree(slug: string): void {
    for (const category of this.categories.values()) {
      if (category.slug === slug) throw new DuplicateSlugError('category', slug);
    }
  }

  private hydrate(stored: StoredPicture): Picture {
    const { keywordIds, ...picture } = stored;
    const keywords = keywordIds.flatMap((id) => {
      const keyword = this.keywords.get(id);
      return keyword ? [{ ...keyword }] : [];
    });
    return { ...picture, keywords };
  }
}
