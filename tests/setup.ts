import { config } from 'dotenv';
import { existsSync } from 'fs';
import { resolve } from 'path';

// Optional local overrides; values from vitest.config.ts win
const envFile = resolve(process.cwd(), '.env.test');
if (existsSync(envFile)) {
  config({ path: envFile, override: false });
}
