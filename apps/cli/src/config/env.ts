/**
 * Environment Loading
 *
 * Imported before anything that reads process.env at load time (the logger).
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

// Get monorepo root
const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../..');

// The working directory's .env wins over the repository's
dotenvConfig();
dotenvConfig({ path: resolve(monorepoRoot, '.env') });
