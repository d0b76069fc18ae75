/**
 * Catalog Engine
 * The only component that sequences work across the catalog store and the
 * content store. Create writes artifacts before the row and removes them if
 * the row fails; delete removes the row before the artifacts and tolerates a
 * leftover file.
 */

import { z } from 'zod';
import { extensionOf, sanitizeFilename, slugify } from '../lib/slug.js';
import {
  CategoryNotFoundError,
  ForbiddenError,
  MissingArtifactError,
  PictureNotFoundError,
  ValidationError,
} from '../errors.js';
import { normalizeKeywords, resolveCategory, type CatalogStore } from '../store.js';
import type { ArtifactStore, ImageSource } from './artifact-store.js';
import type { ListingService, ListQuery } from './listing.service.js';
import type { UnresolvedCategoryPolicy } from '../config.js';
import type {
  Category,
  ConsistencyReport,
  DeletePictureResult,
  Picture,
  PictureListPage,
  RegenerationReport,
  RequestContext,
} from '../models.js';

export interface CatalogEngineOptions {
  unresolvedCategory: UnresolvedCategoryPolicy;
  requireOwner: boolean;
}

export interface UploadPictureInput {
  source: ImageSource;
  originalFilename?: string;
  extension?: string;
  category?: string;
  episode?: number;
  keywords?: string[];
}

export interface CategoryInput {
  name: string;
  slug?: string;
}

const uploadMetadataSchema = z.object({
  originalFilename: z.string().max(255).optional(),
  category: z.string().trim().optional(),
  episode: z.number().int().positive().optional(),
  keywords: z.array(z.string()).max(50).default([]),
});

const categorySchema = z.object({
  name: z.string().trim().min(1),
  slug: z.string().trim().optional(),
});

const DEFAULT_SWEEP_BATCH = 100;

export class CatalogEngine {
  constructor(
    private readonly store: CatalogStore,
    private readonly artifacts: ArtifactStore,
    private readonly listing: ListingService,
    private readonly options: CatalogEngineOptions
  ) {}

  // ===== Pictures =====

  async uploadPicture(input: UploadPictureInput, context: RequestContext = {}): Promise<Picture> {
    // Everything below up to artifacts.store has no side effects
    const extension = input.extension ?? extensionOf(input.originalFilename ?? '');
    if (!extension) {
      throw new ValidationError('Upload has no file extension', 'extension_missing');
    }
    this.artifacts.assertExtensionAllowed(extension);

    const metadata = parseOrThrow(uploadMetadataSchema, {
      originalFilename: input.originalFilename,
      category: input.category,
      episode: input.episode,
      keywords: input.keywords,
    });

    const ownerId = context.ownerId ?? null;
    if (this.options.requireOwner && !ownerId) {
      throw new ValidationError('An owner identity is required to upload', 'owner_required');
    }

    const category = metadata.category ? await this.resolveUploadCategory(metadata.category) : null;
    const keywordNames = metadata.keywords.map((name) => name.trim()).filter(Boolean);
    // Rejects unsluggable keywords before any file is written
    normalizeKeywords(keywordNames);

    const originalFilename = metadata.originalFilename ? sanitizeFilename(metadata.originalFilename) || null : null;

    const stored = await this.artifacts.store(input.source, extension);

    try {
      const keywords = await this.store.upsertKeywords(keywordNames);
      const picture = await this.store.createPicture({
        ownerId,
        categoryId: category?.id ?? null,
        filename: stored.filename,
        originalFilename,
        thumbnail: stored.thumbnail,
        episode: metadata.episode ?? null,
        keywordIds: keywords.map((keyword) => keyword.id),
      });

      console.log(`[Catalog] Stored picture ${picture.id} (${picture.filename}, ${stored.width}x${stored.height} thumbnail)`);
      return picture;
    } catch (error) {
      await this.discardArtifacts(stored.filename, stored.thumbnail);
      throw error;
    }
  }

  async deletePicture(id: number, context: RequestContext = {}): Promise<DeletePictureResult> {
    const picture = await this.getPicture(id);

    if (this.options.requireOwner && picture.ownerId !== null && picture.ownerId !== context.ownerId) {
      throw new ForbiddenError(`Picture ${id} belongs to another owner`);
    }

    const deleted = await this.store.deletePicture(id);
    if (!deleted) throw new PictureNotFoundError(id);

    try {
      await this.artifacts.delete(picture.filename, picture.thumbnail);
    } catch (error) {
      // The row is gone; a leftover file is picked up by sweepOrphans()
      console.error(`[Catalog] Picture ${id} deleted but its artifacts remain:`, error);
      return { id, artifactsRemoved: false };
    }

    console.log(`[Catalog] Deleted picture ${id}`);
    return { id, artifactsRemoved: true };
  }

  async getPicture(id: number): Promise<Picture> {
    const picture = await this.store.getPicture(id);
    if (!picture) throw new PictureNotFoundError(id);
    return picture;
  }

  /**
   * Artifact name of a picture's original or thumbnail, checked to exist
   */
  async getPictureFile(id: number, variant: 'original' | 'thumbnail'): Promise<{ picture: Picture; name: string }> {
    const picture = await this.getPicture(id);
    const name = variant === 'thumbnail' ? picture.thumbnail : picture.filename;
    if (!(await this.artifacts.exists(name))) {
      throw new MissingArtifactError(name);
    }
    return { picture, name };
  }

  list(query: ListQuery = {}): Promise<PictureListPage> {
    return this.listing.list(query);
  }

  random(): Promise<Picture> {
    return this.listing.random();
  }

  // ===== Categories =====

  /**
   * Create a category, or update the one whose slug is `target`
   */
  async addOrEditCategory(input: CategoryInput, target?: string): Promise<Category> {
    const data = parseOrThrow(categorySchema, input);
    const slug = slugify(data.slug || data.name);
    if (!slug) {
      throw new ValidationError(`"${data.slug || data.name}" does not produce a usable slug`, 'slug_invalid');
    }

    if (target === undefined) {
      const category = await this.store.createCategory({ name: data.name, slug });
      console.log(`[Catalog] Created category ${category.slug} (${category.id})`);
      return category;
    }

    const [existing] = await this.store.findCategories({ by: 'slug', value: target });
    if (!existing) throw new CategoryNotFoundError(target);

    const updated = await this.store.updateCategory(existing.id, { name: data.name, slug });
    if (!updated) throw new CategoryNotFoundError(target);

    console.log(`[Catalog] Updated category ${existing.slug} -> ${updated.slug}`);
    return updated;
  }

  listCategories(): Promise<Category[]> {
    return this.store.listCategories();
  }

  // ===== Maintenance =====

  /**
   * Rebuild one picture's thumbnail from its stored original
   */
  async regenerateThumbnail(id: number): Promise<Picture> {
    const picture = await this.getPicture(id);
    return this.rebuildThumbnail(picture);
  }

  /**
   * Id-ascending thumbnail sweep. Passing the returned `lastId` as `after`
   * resumes an interrupted run; pictures without an original are skipped.
   */
  async regenerateThumbnails(options: { after?: number | null; batchSize?: number } = {}): Promise<RegenerationReport> {
    const batchSize = options.batchSize ?? DEFAULT_SWEEP_BATCH;
    const report: RegenerationReport = { processed: 0, regenerated: 0, skipped: [], lastId: options.after ?? null };

    for (;;) {
      const batch = await this.store.listPicturesAfter(report.lastId, batchSize);
      if (batch.length === 0) break;

      for (const picture of batch) {
        try {
          await this.rebuildThumbnail(picture);
          report.regenerated++;
        } catch (error) {
          if (!(error instanceof MissingArtifactError)) throw error;
          console.warn(`[Catalog] Skipping picture ${picture.id}: original ${picture.filename} is missing`);
          report.skipped.push(picture.id);
        }
        report.processed++;
        report.lastId = picture.id;
      }
    }

    console.log(
      `[Catalog] Thumbnail sweep done: ${report.regenerated} regenerated, ${report.skipped.length} skipped`
    );
    return report;
  }

  /**
   * Find rows whose files are missing and files that no row references
   */
  async audit(): Promise<ConsistencyReport> {
    const referenced = new Set<string>();
    const danglingPictures: ConsistencyReport['danglingPictures'] = [];

    let after: number | null = null;
    for (;;) {
      const batch = await this.store.listPicturesAfter(after, DEFAULT_SWEEP_BATCH);
      if (batch.length === 0) break;

      for (const picture of batch) {
        const missing: string[] = [];
        for (const name of [picture.filename, picture.thumbnail]) {
          referenced.add(name);
          if (!(await this.artifacts.exists(name))) missing.push(name);
        }
        if (missing.length > 0) danglingPictures.push({ id: picture.id, missing });
        after = picture.id;
      }
    }

    const orphanArtifacts = (await this.artifacts.list()).filter((name) => !referenced.has(name));
    return { danglingPictures, orphanArtifacts };
  }

  /**
   * Delete content-store files that no picture references
   */
  async sweepOrphans(): Promise<string[]> {
    const { orphanArtifacts } = await this.audit();
    for (const name of orphanArtifacts) {
      await this.artifacts.remove(name);
    }
    if (orphanArtifacts.length > 0) {
      console.log(`[Catalog] Removed ${orphanArtifacts.length} orphan artifacts`);
    }
    return orphanArtifacts;
  }

  // ===== Helpers =====

  private async resolveUploadCategory(reference: string): Promise<Category | null> {
    try {
      return await resolveCategory(this.store, reference);
    } catch (error) {
      if (error instanceof CategoryNotFoundError && this.options.unresolvedCategory === 'uncategorized') {
        console.warn(`[Catalog] Category "${reference}" not found; storing picture as uncategorized`);
        return null;
      }
      throw error;
    }
  }

  private async rebuildThumbnail(picture: Picture): Promise<Picture> {
    const thumbnail = await this.artifacts.regenerate(picture.filename);
    if (thumbnail === picture.thumbnail) return picture;

    const updated = await this.store.updatePictureThumbnail(picture.id, thumbnail);
    if (!updated) throw new PictureNotFoundError(picture.id);

    await this.artifacts.remove(picture.thumbnail);
    return updated;
  }

  private async discardArtifacts(filename: string, thumbnail: string): Promise<void> {
    try {
      await this.artifacts.delete(filename, thumbnail);
    } catch (cleanupError) {
      console.error(`[Catalog] Could not remove orphaned artifacts ${filename}, ${thumbnail}:`, cleanupError);
    }
  }
}

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(`${issue.path.join('.') || 'input'}: ${issue.message}`);
  }
  return result.data;
}
