import { describe, it, expect } from 'vitest';
import sharp from 'sharp';
import { createRgbImage, decodeImage, encodePng, resizeRgb } from './image-codec.service.js';
import { BadRequestError } from '../utils/errors.js';

describe('image-codec', () => {
  describe('createRgbImage', () => {
    it('should reject a buffer that does not match the dimensions', () => {
      expect(() => createRgbImage(Buffer.alloc(10), 2, 2)).toThrow(RangeError);
    });

    it('should reject zero dimensions', () => {
      expect(() => createRgbImage(Buffer.alloc(0), 0, 4)).toThrow('Invalid image dimensions: 0x4');
    });
  });

  describe('decodeImage', () => {
    it('should drop the alpha channel', async () => {
      const png = await sharp(Buffer.from([10, 20, 30, 255, 40, 50, 60, 255]), {
        raw: { width: 2, height: 1, channels: 4 },
      })
        .png()
        .toBuffer();

      const image = await decodeImage(png);

      expect(image.width).toBe(2);
      expect(image.height).toBe(1);
      expect(image.channels).toBe(3);
      expect([...image.data]).toEqual([10, 20, 30, 40, 50, 60]);
    });

    it('should expand greyscale to three channels', async () => {
      const png = await sharp(Buffer.from([7, 200]), {
        raw: { width: 1, height: 2, channels: 1 },
      })
        .png()
        .toBuffer();

      const image = await decodeImage(png);

      expect([...image.data]).toEqual([7, 7, 7, 200, 200, 200]);
    });

    it('should reject bytes that are not an image', async () => {
      const error = await decodeImage(Buffer.from('definitely not an image')).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BadRequestError);
      expect(error).toMatchObject({ statusCode: 400, code: 'INVALID_IMAGE' });
    });
  });

  describe('encodePng', () => {
    it('should produce a lossless PNG', async () => {
      const image = createRgbImage(Buffer.from([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]), 2, 2);

      const png = await encodePng(image);
      const decoded = await decodeImage(png);

      expect((await sharp(png).metadata()).format).toBe('png');
      expect([...decoded.data]).toEqual([...image.data]);
    });
  });

  describe('resizeRgb', () => {
    it('should resize to the exact requested dimensions', async () => {
      const image = createRgbImage(Buffer.alloc(3 * 2 * 3, 128), 3, 2);

      const resized = await resizeRgb(image, 7, 5);

      expect(resized.width).toBe(7);
      expect(resized.height).toBe(5);
      expect(resized.data.length).toBe(7 * 5 * 3);
    });

    it('should return the same image when dimensions already match', async () => {
      const image = createRgbImage(Buffer.alloc(12), 2, 2);

      expect(await resizeRgb(image, 2, 2)).toBe(image);
    });
  });
});
