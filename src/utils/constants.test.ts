/**
 * Constants Utility Tests
 */

import { describe, it, expect } from 'vitest';
import { APP_VERSION, APP_NAME } from './constants.js';

describe('constants utility', () => {
  describe('APP_VERSION', () => {
    it('should be a valid semver string', () => {
      expect(APP_VERSION).toMatch(/^\d+\.\d+\.\d+/);
    });

    it('should match package.json version', () => {
      expect(APP_VERSION).toBe('1.0.0');
    });
  });

  describe('APP_NAME', () => {
    it('should match package.json name', () => {
      expect(APP_NAME).toBe('image-upscaler');
    });
  });
});
