/**
 * Application Constants
 *
 * Version and name are read from package.json.
 */

import { createRequire } from 'module';
import { z } from 'zod';

const require = createRequire(import.meta.url);

const packageSchema = z.object({
  name: z.string(),
  version: z.string(),
});

const pkg = packageSchema.parse(require('../../package.json'));

/**
 * Application version from package.json
 */
export const APP_VERSION = pkg.version;

/**
 * Application name from package.json
 */
export const APP_NAME = pkg.name;
