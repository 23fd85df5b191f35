import { readFileSync } from 'node:fs';
import type { z } from 'zod';

/**
 * Read and validate a JSON file from the package's `data/` directory.
 * Resolved relative to this module so it works from `src/` and `dist/`.
 */
export function readDataFile<T>(name: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
    const url = new URL(`../../data/${name}`, import.meta.url);
    const raw: unknown = JSON.parse(readFileSync(url, 'utf-8'));
    return schema.parse(raw);
}
