/**
 * Image Artifact Manager
 * Owns the flat content-store directory: originals are written verbatim as
 * `<uuid>.<ext>`, thumbnails as `<uuid>.thumb.<ext>`.
 */

import path from 'node:path';
import { randomUUID } from 'node:crypto';
import { mkdir, readFile, readdir, rm, stat, writeFile } from 'node:fs/promises';
import type { Readable } from 'node:stream';
import sharp from 'sharp';
import {
  ExtensionRejectedError,
  MissingArtifactError,
  StorageFailureError,
  UnsupportedFormatError,
  ValidationError,
} from '../errors.js';
import type { StoredArtifacts } from '../models.js';

export type ImageSource = Buffer | Readable;

export interface ArtifactStoreConfig {
  root: string;
  allowedExtensions: string[];
  maxWidth: number;
  maxHeight: number;
  quality?: number;
}

type ThumbnailFormat = 'jpeg' | 'png' | 'webp';

/**
 * Thumbnail encoding per original extension; anything else becomes png
 */
const THUMBNAIL_FORMATS: Record<string, { format: ThumbnailFormat; extension: string }> = {
  jpg: { format: 'jpeg', extension: 'jpg' },
  jpeg: { format: 'jpeg', extension: 'jpeg' },
  png: { format: 'png', extension: 'png' },
  webp: { format: 'webp', extension: 'webp' },
};

const FALLBACK_THUMBNAIL = { format: 'png', extension: 'png' } as const;

const ARTIFACT_NAME = /^([0-9a-f-]{36})(\.thumb)?\.([a-z0-9]+)$/;

export class ArtifactStore {
  private readonly allowed: Set<string>;

  constructor(private readonly config: ArtifactStoreConfig) {
    this.allowed = new Set(config.allowedExtensions.map((ext) => ext.toLowerCase()));
  }

  get root(): string {
    return this.config.root;
  }

  async initialize(): Promise<void> {
    await mkdir(this.config.root, { recursive: true });
  }

  /**
   * Extension check with no side effects; callers run it before reading uploads
   */
  assertExtensionAllowed(extension: string): string {
    const normalized = extension.replace(/^\./, '').toLowerCase();
    if (!this.allowed.has(normalized)) {
      throw new ExtensionRejectedError(extension);
    }
    return normalized;
  }

  async store(source: ImageSource, extension: string): Promise<StoredArtifacts> {
    const ext = this.assertExtensionAllowed(extension);
    const data = await toBuffer(source);

    try {
      await sharp(data).metadata();
    } catch (error) {
      throw new UnsupportedFormatError(error);
    }

    const id = randomUUID();
    const filename = `${id}.${ext}`;

    await this.write(filename, data);

    try {
      const thumb = await this.writeThumbnail(id, ext, data, false);
      return { filename, ...thumb };
    } catch (error) {
      await this.removeQuietly(filename);
      throw error;
    }
  }

  /**
   * Remove both artifacts. Files that are already gone count as removed.
   */
  async delete(filename: string, thumbnail: string): Promise<void> {
    await this.remove(filename);
    await this.remove(thumbnail);
  }

  async remove(name: string): Promise<void> {
    const target = this.resolvePath(name);
    try {
      await rm(target, { force: true });
    } catch (error) {
      throw new StorageFailureError(`Failed to delete artifact "${name}"`, { cause: error });
    }
  }

  /**
   * Re-derive the thumbnail from the stored original, replacing the old file
   */
  async regenerate(filename: string): Promise<string> {
    const match = ARTIFACT_NAME.exec(filename);
    if (!match || match[2]) {
      throw new ValidationError(`"${filename}" is not an original artifact name`, 'artifact_name_invalid');
    }
    const [, id, , ext] = match;

    let data: Buffer;
    try {
      data = await readFile(this.resolvePath(filename));
    } catch (error) {
      if (isMissingFile(error)) throw new MissingArtifactError(filename);
      throw new StorageFailureError(`Failed to read artifact "${filename}"`, { cause: error });
    }

    const { thumbnail } = await this.writeThumbnail(id, ext, data, true);
    return thumbnail;
  }

  async exists(name: string): Promise<boolean> {
    try {
      const info = await stat(this.resolvePath(name));
      return info.isFile();
    } catch (error) {
      if (isMissingFile(error)) return false;
      throw new StorageFailureError(`Failed to inspect artifact "${name}"`, { cause: error });
    }
  }

  /**
   * Every artifact-shaped file name in the content store
   */
  async list(): Promise<string[]> {
    const entries = await readdir(this.config.root, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && ARTIFACT_NAME.test(entry.name))
      .map((entry) => entry.name)
      .sort();
  }

  resolvePath(name: string): string {
    if (!name || path.basename(name) !== name || name === '.' || name === '..') {
      throw new ValidationError(`"${name}" is not a plain artifact name`, 'artifact_name_invalid');
    }
    return path.join(this.config.root, name);
  }

  private async writeThumbnail(
    id: string,
    ext: string,
    data: Buffer,
    replace: boolean
  ): Promise<{ thumbnail: string; width: number; height: number }> {
    const target = THUMBNAIL_FORMATS[ext] ?? FALLBACK_THUMBNAIL;
    const thumbnail = `${id}.thumb.${target.extension}`;

    let rendered: { data: Buffer; info: sharp.OutputInfo };
    try {
      rendered = await sharp(data)
        .rotate()
        .resize({
          width: this.config.maxWidth,
          height: this.config.maxHeight,
          fit: 'inside',
          withoutEnlargement: true,
        })
        .toFormat(target.format, target.format === 'png' ? {} : { quality: this.config.quality ?? 85 })
        .toBuffer({ resolveWithObject: true });
    } catch (error) {
      throw new UnsupportedFormatError(error);
    }

    await this.write(thumbnail, rendered.data, replace);
    return { thumbnail, width: rendered.info.width, height: rendered.info.height };
  }

  private async write(name: string, data: Buffer, replace: boolean = false): Promise<void> {
    try {
      await writeFile(this.resolvePath(name), data, { flag: replace ? 'w' : 'wx' });
    } catch (error) {
      throw new StorageFailureError(`Failed to write artifact "${name}"`, { cause: error });
    }
  }

  private async removeQuietly(name: string): Promise<void> {
    try {
      await rm(this.resolvePath(name), { force: true });
    } catch (error) {
      console.error(`[Artifacts] Could not remove partial artifact ${name}:`, error);
    }
  }
}

async function toBuffer(source: ImageSource): Promise<Buffer> {
  if (Buffer.isBuffer(source)) return source;

  const chunks: Buffer[] = [];
  try {
    for await (const chunk of source) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
  } catch (error) {
    throw new StorageFailureError('Failed to read upload stream', { cause: error });
  }
  return Buffer.concat(chunks);
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
