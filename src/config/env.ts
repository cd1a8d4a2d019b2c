import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';

/**
 * Load .env from the working directory or its parent so settings are picked
 * up whether the library runs from a package directory or a repo root.
 */
export function loadEnv(): void {
  const cwd = process.cwd();
  const candidates = [
    path.join(cwd, '.env'),
    path.join(cwd, '..', '.env'),
  ];

  for (const envPath of candidates) {
    if (fs.existsSync(envPath)) {
      const result = dotenv.config({ path: envPath });
      if (result.error) {
        throw result.error;
      }
      return;
    }
  }
}
