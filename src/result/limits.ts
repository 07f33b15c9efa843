import {z} from 'zod';

/**
 * Hard bounds applied while building a result tree
 */
export type ResultLimits = {
	maxDepth: number;
	maxStringLength: number;
	maxEnumerableLength: number;
};

export const DEFAULT_LIMITS: Readonly<ResultLimits> = Object.freeze({
	maxDepth: 5,
	maxStringLength: 10000,
	maxEnumerableLength: 10000,
});

const limitsSchema = z.object({
	maxDepth: z.number().int().positive(),
	maxStringLength: z.number().int().positive(),
	maxEnumerableLength: z.number().int().positive(),
});

/**
 * Merges caller overrides onto the defaults
 * @throws ZodError when a limit is not a positive integer
 */
export function resolveLimits(overrides: Partial<ResultLimits> = {}): ResultLimits {
	return limitsSchema.parse({...DEFAULT_LIMITS, ...overrides});
}
