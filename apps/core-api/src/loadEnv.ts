/**
 * Environment loader. Must be imported FIRST in index.ts so process.env is
 * populated before any config is parsed.
 *
 * Production: env vars injected by the platform, no files needed.
 * Local dev: .env.local then .env from the working directory or the repo root.
 */
import { config } from 'dotenv';
import { existsSync } from 'fs';
import { join } from 'path';

if (process.env.NODE_ENV !== 'production') {
  const repoRoot = join(__dirname, '../../..');
  const paths = ['.env.local', '.env', join(repoRoot, '.env.local'), join(repoRoot, '.env')];
  for (const p of paths) {
    if (existsSync(p)) config({ path: p });
  }
}
