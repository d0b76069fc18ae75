import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createApp } from '../src/app.js';
import type { CatalogConfig } from '../src/config.js';
import { makeJpeg, makeTempDir, removeTempDir } from './helpers/images.js';

const BOUNDARY = '----picture-catalog-test';

interface FilePart {
  filename: string;
  contentType: string;
  data: Buffer;
}

function multipart(fields: Record<string, string>, file?: FilePart): { payload: Buffer; headers: Record<string, string> } {
  const chunks: Buffer[] = [];
  for (const [name, value] of Object.entries(fields)) {
    chunks.push(
      Buffer.from(`--${BOUNDARY}\r\nContent-Disposition: form-data; name="${name}"\r\n\r\n${value}\r\n`)
    );
  }
  if (file) {
    chunks.push(
      Buffer.from(
        `--${BOUNDARY}\r\nContent-Disposition: form-data; name="image"; filename="${file.filename}"\r\n` +
          `Content-Type: ${file.contentType}\r\n\r\n`
      ),
      file.data,
      Buffer.from('\r\n')
    );
  }
  chunks.push(Buffer.from(`--${BOUNDARY}--\r\n`));

  return {
    payload: Buffer.concat(chunks),
    headers: { 'content-type': `multipart/form-data; boundary=${BOUNDARY}` },
  };
}

describe('Picture catalog API', () => {
  let root: string;
  let config: CatalogConfig;
  let image: Buffer;

  beforeEach(async () => {
    root = await makeTempDir();
    image = await makeJpeg(400, 300);
    config = {
      port: 0,
      host: '127.0.0.1',
      contentRoot: root,
      allowedExtensions: ['jpg', 'jpeg', 'png'],
      thumbnail: { maxWidth: 200, maxHeight: 200, quality: 85 },
      pageSize: 2,
      unresolvedCategory: 'reject',
      requireOwner: false,
      maxUploadBytes: 5 * 1024 * 1024,
      redis: { host: 'localhost', port: 6379 },
    };
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('reports health', async () => {
    const app = await createApp({ config });

    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json().status).toBe('ok');
    await app.close();
  });

  it('creates, lists and edits categories', async () => {
    const app = await createApp({ config });

    const created = await app.inject({ method: 'POST', url: '/categories', payload: { name: 'Anime Classics' } });
    expect(created.statusCode).toBe(201);
    expect(created.json()).toEqual({ id: 1, name: 'Anime Classics', slug: 'anime-classics' });

    const duplicate = await app.inject({ method: 'POST', url: '/categories', payload: { name: 'anime classics' } });
    expect(duplicate.statusCode).toBe(409);
    expect(duplicate.json().error).toBe('slug_taken');

    const edited = await app.inject({
      method: 'PUT',
      url: '/categories/anime-classics',
      payload: { name: 'Anime', slug: 'anime' },
    });
    expect(edited.statusCode).toBe(200);
    expect(edited.json()).toEqual({ id: 1, name: 'Anime', slug: 'anime' });

    const listed = await app.inject({ method: 'GET', url: '/categories' });
    expect(listed.json()).toEqual({ items: [{ id: 1, name: 'Anime', slug: 'anime' }] });
    await app.close();
  });

  it('rejects a category without a name', async () => {
    const app = await createApp({ config });

    const res = await app.inject({ method: 'POST', url: '/categories', payload: { slug: 'x' } });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('validation_failed');
    await app.close();
  });

  it('uploads, lists, serves and deletes a picture', async () => {
    const app = await createApp({ config });
    await app.inject({ method: 'POST', url: '/categories', payload: { name: 'Anime' } });

    const form = multipart(
      { category: 'Anime', episode: '3', keywords: 'Sunset, beach ,' },
      { filename: 'beach.jpg', contentType: 'image/jpeg', data: image }
    );
    const upload = await app.inject({
      method: 'POST',
      url: '/pictures',
      payload: form.payload,
      headers: { ...form.headers, 'x-owner-id': 'user-1' },
    });
    expect(upload.statusCode).toBe(201);
    const picture = upload.json();
    expect(picture).toMatchObject({
      id: 1,
      ownerId: 'user-1',
      categoryId: 1,
      episode: 3,
      originalFilename: 'beach.jpg',
    });
    expect(picture.keywords.map((k: { slug: string }) => k.slug)).toEqual(['sunset', 'beach']);

    const listed = await app.inject({ method: 'GET', url: '/pictures?category=anime&episode=3' });
    expect(listed.statusCode).toBe(200);
    expect(listed.json()).toMatchObject({ total: 1, totalPages: 1, page: 1, episode: 3 });

    const original = await app.inject({ method: 'GET', url: '/pictures/1/image' });
    expect(original.statusCode).toBe(200);
    expect(original.headers['content-type']).toBe('image/jpeg');
    expect(original.rawPayload).toEqual(image);

    const thumb = await app.inject({ method: 'GET', url: '/pictures/1/image?thumb' });
    expect(thumb.statusCode).toBe(200);
    expect(thumb.headers['content-type']).toBe('image/jpeg');

    const removed = await app.inject({ method: 'DELETE', url: '/pictures/1' });
    expect(removed.json()).toEqual({ id: 1, artifactsRemoved: true });

    const gone = await app.inject({ method: 'GET', url: '/pictures/1' });
    expect(gone.statusCode).toBe(404);
    expect(gone.json().error).toBe('picture_not_found');
    await app.close();
  });

  it('rejects an upload with a disallowed extension', async () => {
    const app = await createApp({ config });

    const res = await app.inject({
      method: 'POST',
      url: '/pictures',
      ...multipart({}, { filename: 'notes.txt', contentType: 'text/plain', data: Buffer.from('hello') }),
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('extension_rejected');
    await app.close();
  });

  it('rejects an upload without an image part', async () => {
    const app = await createApp({ config });

    const res = await app.inject({ method: 'POST', url: '/pictures', ...multipart({ category: 'Anime' }) });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('image_required');
    await app.close();
  });

  it('rejects an upload to an unknown category', async () => {
    const app = await createApp({ config });

    const res = await app.inject({
      method: 'POST',
      url: '/pictures',
      ...multipart({ category: 'Nowhere' }, { filename: 'a.jpg', contentType: 'image/jpeg', data: image }),
    });

    expect(res.statusCode).toBe(404);
    expect(res.json().error).toBe('category_not_found');
    await app.close();
  });

  it('maps listing errors to statuses', async () => {
    const app = await createApp({ config });

    const empty = await app.inject({ method: 'GET', url: '/pictures' });
    expect(empty.statusCode).toBe(200);
    expect(empty.json()).toMatchObject({ items: [], total: 0 });

    const outOfRange = await app.inject({ method: 'GET', url: '/pictures?page=2' });
    expect(outOfRange.statusCode).toBe(404);
    expect(outOfRange.json().error).toBe('page_out_of_range');

    const random = await app.inject({ method: 'GET', url: '/pictures/random' });
    expect(random.statusCode).toBe(404);
    expect(random.json().error).toBe('catalog_empty');

    const badId = await app.inject({ method: 'GET', url: '/pictures/abc' });
    expect(badId.statusCode).toBe(400);
    expect(badId.json().error).toBe('validation_failed');

    const episodeOnly = await app.inject({ method: 'GET', url: '/pictures?episode=2' });
    expect(episodeOnly.statusCode).toBe(400);
    expect(episodeOnly.json().error).toBe('episode_without_category');
    await app.close();
  });

  it('returns a random picture with an injected source', async () => {
    const app = await createApp({ config, randomIndex: () => 0 });

    for (const name of ['a.jpg', 'b.jpg']) {
      await app.inject({
        method: 'POST',
        url: '/pictures',
        ...multipart({}, { filename: name, contentType: 'image/jpeg', data: image }),
      });
    }

    const res = await app.inject({ method: 'GET', url: '/pictures/random' });
    expect(res.statusCode).toBe(200);
    expect(res.json().id).toBe(2);
    await app.close();
  });
});
