import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { DocumentInput, TreeNodeInput } from '../types/index.js';

const treeNodeInput: z.ZodType<TreeNodeInput> = z.lazy(() =>
    z.object({
        title: z.string(),
        summary: z.string().optional(),
        pageStart: z.number().int(),
        pageEnd: z.number().int(),
        children: z.array(treeNodeInput).optional(),
        sections: z.array(z.number().int().nonnegative()).optional(),
    })
);

const documentInput = z.object({
    id: z.string().min(1),
    domain: z.string().min(1),
    title: z.string(),
    pageCount: z.number().int().positive(),
    sections: z
        .array(
            z.object({
                title: z.string(),
                text: z.string(),
                pageStart: z.number().int(),
                pageEnd: z.number().int(),
            })
        )
        .min(1),
    tree: treeNodeInput.optional(),
});

/**
 * An ingestion manifest: either `{ "documents": [...] }` or a bare array.
 */
export const manifestSchema = z.preprocess(
    (value) => (Array.isArray(value) ? { documents: value } : value),
    z.object({ documents: z.array(documentInput) })
);

export function parseManifest(raw: unknown): DocumentInput[] {
    const result = manifestSchema.safeParse(raw);
    if (!result.success) {
        const issue = result.error.issues[0];
        const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
        throw new Error(`Invalid manifest${where}: ${issue?.message ?? 'unknown error'}`);
    }
    return result.data.documents;
}

export function loadManifest(path: string): DocumentInput[] {
    return parseManifest(JSON.parse(readFileSync(path, 'utf-8')));
}
