export interface Category {
  id: number;
  slug: string;
  name: string;
}

export interface Keyword {
  id: number;
  slug: string;
  name: string;
}

/**
 * A stored picture. `filename` and `thumbnail` are generated artifact names,
 * `originalFilename` is the sanitized client name kept for display only.
 */
export interface Picture {
  id: number;
  ownerId: string | null;
  categoryId: number | null;
  filename: string;
  originalFilename: string | null;
  thumbnail: string;
  episode: number | null;
  keywords: Keyword[];
  createdAt: string;
}

export interface NewCategory {
  name: string;
  slug: string;
}

export interface NewPicture {
  ownerId: string | null;
  categoryId: number | null;
  filename: string;
  originalFilename: string | null;
  thumbnail: string;
  episode: number | null;
  keywordIds: number[];
}

/**
 * Tagged category lookup; resolution tries these in a fixed order
 */
export type CategoryLookup =
  | { by: 'id'; value: number }
  | { by: 'name'; value: string }
  | { by: 'slug'; value: string };

export interface PictureFilter {
  categoryId?: number;
  episode?: number;
}

export interface PictureListPage {
  items: Picture[];
  page: number;
  pageSize: number;
  total: number;
  totalPages: number;
  category: Category | null;
  episode: number | null;
}

/**
 * Identity of the caller, passed explicitly into every engine operation
 */
export interface RequestContext {
  ownerId?: string;
}

export interface StoredArtifacts {
  filename: string;
  thumbnail: string;
  width: number;
  height: number;
}

export interface DeletePictureResult {
  id: number;
  artifactsRemoved: boolean;
}

export interface RegenerationReport {
  processed: number;
  regenerated: number;
  skipped: number[];
  lastId: number | null;
}

export interface ConsistencyReport {
  danglingPictures: Array<{ id: number; missing: string[] }>;
  orphanArtifacts: string[];
}
