import { CategoryNotFoundError, EmptyCatalogError, PageOutOfRangeError, ValidationError } from '../errors.js';
import type { CatalogStore } from '../store.js';
import type { Category, Picture, PictureFilter, PictureListPage } from '../models.js';

export interface ListQuery {
  category?: string;
  episode?: number;
  page?: number;
}

/**
 * Returns an integer in [0, max)
 */
export type RandomIndex = (max: number) => number;

const defaultRandomIndex: RandomIndex = (max) => Math.floor(Math.random() * max);

/**
 * Listing Engine
 * Filters by category slug and episode, orders newest first, paginates
 */
export class ListingService {
  constructor(
    private readonly store: CatalogStore,
    private readonly pageSize: number,
    private readonly randomIndex: RandomIndex = defaultRandomIndex
  ) {
    if (!Number.isInteger(pageSize) || pageSize < 1) {
      throw new ValidationError(`Page size must be a positive integer, got ${pageSize}`);
    }
  }

  async list(query: ListQuery = {}): Promise<PictureListPage> {
    const page = query.page ?? 1;
    if (!Number.isInteger(page) || page < 1) {
      throw new ValidationError(`Page must be a positive integer, got ${page}`, 'page_invalid');
    }
    if (query.episode !== undefined && query.category === undefined) {
      throw new ValidationError('An episode filter needs a category', 'episode_without_category');
    }

    let category: Category | null = null;
    const filter: PictureFilter = {};

    if (query.category !== undefined) {
      const [match] = await this.store.findCategories({ by: 'slug', value: query.category });
      if (!match) throw new CategoryNotFoundError(query.category);
      category = match;
      filter.categoryId = match.id;
      if (query.episode !== undefined) filter.episode = query.episode;
    }

    const total = await this.store.countPictures(filter);
    const totalPages = Math.ceil(total / this.pageSize);
    const offset = (page - 1) * this.pageSize;

    // An empty first page is valid; only a start past the last match fails
    if (offset > total) {
      throw new PageOutOfRangeError(page, totalPages);
    }

    const items = await this.store.listPictures(filter, { offset, limit: this.pageSize });

    return {
      items,
      page,
      pageSize: this.pageSize,
      total,
      totalPages,
      category,
      episode: filter.episode ?? null,
    };
  }

  /**
   * Uniformly random picture from the whole catalog
   */
  async random(): Promise<Picture> {
    const total = await this.store.countPictures();
    if (total === 0) throw new EmptyCatalogError();

    const index = this.randomIndex(total);
    const [picture] = await this.store.listPictures({}, { offset: index, limit: 1 });

    // A concurrent delete can shrink the catalog between the two reads
    if (!picture) {
      const [latest] = await this.store.listPictures({}, { offset: 0, limit: 1 });
      if (!latest) throw new EmptyCatalogError();
      return latest;
    }
    return picture;
  }
}
