import { z } from 'zod';
import { InvalidTreeOptionsError } from './errors';
import { type TreeLogger, loggerFromEnv } from './logger';

function isTreeLogger(value: unknown): value is TreeLogger {
    return typeof value === 'object' && value !== null && 'debug' in value && typeof value.debug === 'function';
}

export const treeOptionsSchema = z.object({
    dimensions: z.number().int().min(1, 'A tree needs at least one dimension'),
    maximumEntries: z.number().int().min(2, 'Branch nodes need room for at least two children').default(8),
    maximumLeafEntries: z.number().int().min(1, 'Leaf nodes need room for at least one value').optional(),
    minimumSplitFraction: z.number().gt(0).max(0.5).default(0.25),
    logger: z.custom<TreeLogger>(isTreeLogger, 'Logger must provide a debug method').optional()
});

export type TreeOptions = z.input<typeof treeOptionsSchema>;

export interface ResolvedTreeOptions {
    dimensions: number;
    /** Capacity of branch nodes. */
    maximumEntries: number;
    /** Capacity of leaf nodes. */
    maximumLeafEntries: number;
    /** Lower bound on the share of entries each half of a split receives. */
    minimumSplitFraction: number;
    logger: TreeLogger;
}

export function resolveOptions(options: TreeOptions): ResolvedTreeOptions {
    const result = treeOptionsSchema.safeParse(options);
    if (!result.success) {
        throw new InvalidTreeOptionsError(
            result.error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'options'}: ${issue.message}`)
        );
    }
    const { dimensions, maximumEntries, maximumLeafEntries, minimumSplitFraction, logger } = result.data;
    return {
        dimensions,
        maximumEntries,
        maximumLeafEntries: maximumLeafEntries ?? maximumEntries,
        minimumSplitFraction,
        logger: logger ?? loggerFromEnv()
    };
}

/** Smallest number of entries either half of a split of a full node may hold. */
export function minimumSplitCount(capacity: number, minimumSplitFraction: number): number {
    return Math.max(1, Math.floor(minimumSplitFraction * capacity));
}
