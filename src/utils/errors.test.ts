import { describe, it, expect } from 'vitest';
import {
  AppError,
  BadRequestError,
  ValidationError,
  EngineError,
  ProcessingFailedError,
  toError,
} from './errors.js';

describe('errors', () => {
  describe('AppError', () => {
    it('should create error with all properties', () => {
      const error = new AppError('Test message', 400, 'TEST_CODE', true);

      expect(error.message).toBe('Test message');
      expect(error.statusCode).toBe(400);
      expect(error.code).toBe('TEST_CODE');
      expect(error.isOperational).toBe(true);
      expect(error.stack).toBeDefined();
    });

    it('should default isOperational to true', () => {
      const error = new AppError('Test', 500, 'TEST');
      expect(error.isOperational).toBe(true);
    });
  });

  describe('BadRequestError', () => {
    it('should create 400 error with default message', () => {
      const error = new BadRequestError();

      expect(error.statusCode).toBe(400);
      expect(error.message).toBe('Bad request');
      expect(error.code).toBe('BAD_REQUEST');
    });

    it('should accept custom message and code', () => {
      const error = new BadRequestError('Scale must be 2, 4, or 8', 'INVALID_SCALE');
      expect(error.message).toBe('Scale must be 2, 4, or 8');
      expect(error.code).toBe('INVALID_SCALE');
    });
  });

  describe('ValidationError', () => {
    it('should create 422 error with details', () => {
      const details = { field: 'image', message: 'Required' };
      const error = new ValidationError('Validation failed', details);

      expect(error.statusCode).toBe(422);
      expect(error.code).toBe('VALIDATION_ERROR');
      expect(error.details).toEqual(details);
    });
  });

  describe('EngineError', () => {
    it('should prefix the message with the engine id', () => {
      const error = new EngineError('binary', 'exited with code 1');

      expect(error.message).toBe('binary: exited with code 1');
      expect(error.code).toBe('ENGINE_ERROR');
      expect(error.engine).toBe('binary');
      expect(error).toBeInstanceOf(AppError);
    });

    it('should keep the original error', () => {
      const originalError = new Error('spawn ENOENT');
      const error = new EngineError('binary', 'failed to start', originalError);

      expect(error.originalError).toBe(originalError);
    });
  });

  describe('ProcessingFailedError', () => {
    it('should create a non-operational 500 error', () => {
      const error = new ProcessingFailedError('interpolation failed');

      expect(error.statusCode).toBe(500);
      expect(error.message).toBe('Image processing failed: interpolation failed');
      expect(error.code).toBe('PROCESSING_FAILED');
      expect(error.isOperational).toBe(false);
    });
  });

  describe('toError', () => {
    it('should return Error instances unchanged', () => {
      const error = new Error('boom');
      expect(toError(error)).toBe(error);
    });

    it('should wrap non-Error values', () => {
      expect(toError('boom').message).toBe('boom');
    });
  });
});
