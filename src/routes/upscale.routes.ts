import type { FastifyInstance } from 'fastify';
import { BadRequestError } from '../utils/errors.js';
import { decodeBase64Image } from '../utils/base64.js';
import { parseScale, type UpscaleService } from '../services/upscale.service.js';
import {
  base64UpscaleRequestSchema,
  binaryUpscaleQuerySchema,
  type ScaleFactor,
} from '../types/upscale.types.js';

export interface UpscaleRoutesOptions {
  upscaleService: UpscaleService;
  /** Scale used when the request names none */
  defaultScale: ScaleFactor;
}

const UNSAFE_FILENAME_CHARS = /[^\w.\- ]/g;

/**
 * Filename for Content-Disposition, restricted to header-safe characters
 */
export function downloadFilename(original: string): string {
  const base = original.replace(UNSAFE_FILENAME_CHARS, '_') || 'image.png';
  return `upscaled_${base}`;
}

/**
 * Upscale routes
 */
export async function upscaleRoutes(
  fastify: FastifyInstance,
  options: UpscaleRoutesOptions
): Promise<void> {
  const { upscaleService, defaultScale } = options;

  /**
   * POST /upscale/binary?scale=<n> - multipart upload, PNG download.
   * The content type is checked before the scale.
   */
  fastify.post(
    '/upscale/binary',
    {
      schema: {
        description: 'Upscale an uploaded image (multipart field "file") and return a PNG',
        tags: ['Upscale'],
        consumes: ['multipart/form-data'],
      },
    },
    async (request, reply) => {
      const file = await request.file();
      if (!file) {
        throw new BadRequestError('No file uploaded', 'MISSING_FILE');
      }
      if (!file.mimetype.startsWith('image/')) {
        throw new BadRequestError('File must be an image', 'INVALID_FILE_TYPE');
      }

      const query = binaryUpscaleQuerySchema.parse(request.query);
      const scale = parseScale(query.scale ?? defaultScale);

      const bytes = await file.toBuffer();
      const result = await upscaleService.processImage(bytes, scale);

      return reply
        .type('image/png')
        .header('Content-Disposition', `attachment; filename=${downloadFilename(file.filename)}`)
        .header('X-Upscale-Engine', result.engine)
        .send(result.png);
    }
  );

  /**
   * POST /upscale/base64 - JSON in, JSON out
   */
  fastify.post(
    '/upscale/base64',
    {
      schema: {
        description: 'Upscale a base64-encoded image',
        tags: ['Upscale'],
        body: {
          type: 'object',
          required: ['image'],
          properties: {
            image: { type: 'string', description: 'Base64-encoded image' },
            scale: { type: 'integer', description: '2, 4 or 8' },
          },
        },
        response: {
          200: {
            type: 'object',
            properties: {
              upscaled_image: { type: 'string' },
            },
          },
        },
      },
    },
    async (request, reply) => {
      const body = base64UpscaleRequestSchema.parse(request.body);
      const scale = parseScale(body.scale ?? defaultScale);

      const bytes = decodeBase64Image(body.image);
      const result = await upscaleService.processImage(bytes, scale);

      return reply.send({ upscaled_image: result.png.toString('base64') });
    }
  );
}
