import Fastify, { type FastifyRequest } from 'fastify';
import multipart from '@fastify/multipart';
import fastifyStatic from '@fastify/static';
import { z, ZodError } from 'zod';
import { loadConfig, type CatalogConfig } from './config.js';
import { createCatalog, type Catalog, type CatalogOverrides } from './catalog.js';
import { CatalogError, ValidationError } from './errors.js';
import type { RequestContext } from './models.js';

export interface AppOptions extends CatalogOverrides {
  config?: CatalogConfig;
}

const idParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

const slugParamsSchema = z.object({
  slug: z.string().min(1),
});

const listQuerySchema = z.object({
  category: z.string().min(1).optional(),
  episode: z.coerce.number().int().positive().optional(),
  page: z.coerce.number().int().positive().default(1),
});

const imageQuerySchema = z.object({
  thumb: z.string().optional(),
});

const categoryBodySchema = z.object({
  name: z.string().min(1),
  slug: z.string().optional(),
});

const uploadFieldsSchema = z.object({
  category: z.string().optional(),
  episode: z
    .string()
    .trim()
    .transform((value) => (value === '' ? undefined : value))
    .pipe(z.coerce.number().int().positive().optional())
    .optional(),
  keywords: z
    .string()
    .transform((value) => value.split(',').map((keyword) => keyword.trim()).filter(Boolean))
    .optional(),
});

/**
 * The caller's identity comes from the x-owner-id header set by the fronting proxy
 */
function contextFrom(request: FastifyRequest): RequestContext {
  const header = request.headers['x-owner-id'];
  const ownerId = Array.isArray(header) ? header[0] : header;
  return ownerId ? { ownerId } : {};
}

export async function createApp(options: AppOptions = {}) {
  const app = Fastify({ logger: false });

  const config = options.config ?? loadConfig();
  const catalog: Catalog = await createCatalog(config, options);
  const { engine } = catalog;

  await app.register(multipart, {
    limits: {
      fileSize: config.maxUploadBytes,
      files: 1,
    },
  });

  // Only reply.sendFile is used; artifact names are resolved by the engine
  await app.register(fastifyStatic, {
    root: catalog.artifacts.root,
    serve: false,
  });

  app.addHook('onClose', async () => {
    await catalog.close();
  });

  app.setErrorHandler((error, _request, reply) => {
    if (error instanceof CatalogError) {
      return reply.status(error.statusCode).send({ error: error.code, message: error.message });
    }
    if (error instanceof ZodError) {
      return reply.status(400).send({ error: 'validation_failed', issues: error.issues });
    }
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ error: error.code ?? 'bad_request', message: error.message });
    }

    console.error('[HTTP] Unhandled error:', error);
    return reply.status(500).send({ error: 'internal_error' });
  });

  // Health check endpoint
  app.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  // ===== Categories =====

  app.get('/categories', async () => {
    return { items: await engine.listCategories() };
  });

  app.post('/categories', async (request, reply) => {
    const payload = categoryBodySchema.parse(request.body);
    const category = await engine.addOrEditCategory(payload);
    return reply.status(201).send(category);
  });

  app.put('/categories/:slug', async (request) => {
    const { slug } = slugParamsSchema.parse(request.params);
    const payload = categoryBodySchema.parse(request.body);
    return engine.addOrEditCategory(payload, slug);
  });

  // ===== Pictures =====

  app.get('/pictures', async (request) => {
    const query = listQuerySchema.parse(request.query);
    return engine.list(query);
  });

  app.get('/pictures/random', async () => {
    return engine.random();
  });

  app.post('/pictures', async (request, reply) => {
    if (!request.isMultipart()) {
      throw new ValidationError('Expected a multipart/form-data upload', 'multipart_required');
    }

    const fields: Record<string, string> = {};
    let upload: { data: Buffer; filename: string } | null = null;

    for await (const part of request.parts()) {
      if (part.type === 'file') {
        const data = await part.toBuffer();
        if (part.fieldname === 'image' && !upload) {
          upload = { data, filename: part.filename };
        }
      } else {
        fields[part.fieldname] = String(part.value);
      }
    }

    if (!upload) {
      throw new ValidationError('The "image" file field is required', 'image_required');
    }

    const metadata = uploadFieldsSchema.parse(fields);
    const picture = await engine.uploadPicture(
      {
        source: upload.data,
        originalFilename: upload.filename,
        category: metadata.category,
        episode: metadata.episode,
        keywords: metadata.keywords,
      },
      contextFrom(request)
    );

    return reply.status(201).send(picture);
  });

  app.get('/pictures/:id', async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    return engine.getPicture(id);
  });

  app.get('/pictures/:id/image', async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const { thumb } = imageQuerySchema.parse(request.query);
    const { name } = await engine.getPictureFile(id, thumb === undefined ? 'original' : 'thumbnail');
    return reply.sendFile(name);
  });

  app.delete('/pictures/:id', async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    return engine.deletePicture(id, contextFrom(request));
  });

  return app;
}
