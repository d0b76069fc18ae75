/**
 * Catalog error taxonomy
 * Every failure the catalog reports carries a stable code and an HTTP status
 */

export class CatalogError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CatalogError';
  }
}

/**
 * Rejected before any side effect (bad extension, malformed field)
 */
export class ValidationError extends CatalogError {
  constructor(message: string, code: string = 'validation_failed') {
    super(message, code, 400);
    this.name = 'ValidationError';
  }
}

export class ExtensionRejectedError extends ValidationError {
  constructor(public readonly extension: string) {
    super(`File extension "${extension}" is not allowed`, 'extension_rejected');
    this.name = 'ExtensionRejectedError';
  }
}

/**
 * Reported to the caller for disambiguation
 */
export class ConflictError extends CatalogError {
  constructor(message: string, code: string = 'conflict') {
    super(message, code, 409);
    this.name = 'ConflictError';
  }
}

export class DuplicateSlugError extends ConflictError {
  constructor(
    public readonly entity: 'category' | 'keyword',
    public readonly slug: string
  ) {
    super(`A ${entity} with slug "${slug}" already exists`, 'slug_taken');
    this.name = 'DuplicateSlugError';
  }
}

export class AmbiguousCategoryError extends ConflictError {
  constructor(
    public readonly reference: string,
    public readonly matches: number
  ) {
    super(`${matches} categories are named "${reference}"; use the slug instead`, 'category_ambiguous');
    this.name = 'AmbiguousCategoryError';
  }
}

export class NotFoundError extends CatalogError {
  constructor(message: string, code: string = 'not_found') {
    super(message, code, 404);
    this.name = 'NotFoundError';
  }
}

export class PictureNotFoundError extends NotFoundError {
  constructor(public readonly pictureId: number) {
    super(`Picture ${pictureId} does not exist`, 'picture_not_found');
    this.name = 'PictureNotFoundError';
  }
}

export class CategoryNotFoundError extends NotFoundError {
  constructor(public readonly reference: string) {
    super(`Category "${reference}" does not exist`, 'category_not_found');
    this.name = 'CategoryNotFoundError';
  }
}

export class PageOutOfRangeError extends NotFoundError {
  constructor(
    public readonly page: number,
    public readonly totalPages: number
  ) {
    super(`Page ${page} is out of range (${totalPages} pages)`, 'page_out_of_range');
    this.name = 'PageOutOfRangeError';
  }
}

export class EmptyCatalogError extends NotFoundError {
  constructor() {
    super('The catalog has no pictures', 'catalog_empty');
    this.name = 'EmptyCatalogError';
  }
}

export class MissingArtifactError extends NotFoundError {
  constructor(public readonly artifact: string) {
    super(`Artifact "${artifact}" is missing from the content store`, 'artifact_missing');
    this.name = 'MissingArtifactError';
  }
}

export class ForbiddenError extends CatalogError {
  constructor(message: string) {
    super(message, 'forbidden', 403);
    this.name = 'ForbiddenError';
  }
}

/**
 * Startup refused; the process cannot run with this configuration
 */
export class ConfigurationError extends CatalogError {
  constructor(message: string) {
    super(message, 'configuration_invalid', 500);
    this.name = 'ConfigurationError';
  }
}

/**
 * Fatal for the current request; compensating cleanup runs before it propagates
 */
export class StorageFailureError extends CatalogError {
  constructor(message: string, options?: { cause?: unknown; code?: string; statusCode?: number }) {
    super(message, options?.code ?? 'storage_failure', options?.statusCode ?? 500, { cause: options?.cause });
    this.name = 'StorageFailureError';
  }
}

export class UnsupportedFormatError extends StorageFailureError {
  constructor(cause?: unknown) {
    super('Upload could not be decoded as an image', { cause, code: 'unsupported_format', statusCode: 415 });
    this.name = 'UnsupportedFormatError';
  }
}
