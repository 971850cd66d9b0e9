import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(resolve(__dirname, '..', 'package.json'), 'utf-8')));

export const VERSION: string = pkg.version;
