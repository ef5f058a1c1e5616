/**
 * Zod Validation Schemas
 * Centralized input validation for polyhedron construction and configuration
 */
import { z, ZodError } from 'zod';
import { MAX_SUBDIVISIONS } from '../../shared/goldbergConfig';

// ============================================
// Construction Schemas
// ============================================

export const SubdivisionLevelSchema = z.number()
    .int('subdivisions must be an integer')
    .min(1, 'subdivisions must be at least 1')
    .max(MAX_SUBDIVISIONS, `subdivisions must be at most ${MAX_SUBDIVISIONS}`);

export const RadiusSchema = z.number()
    .finite('radius must be finite')
    .positive('radius must be positive');

// ============================================
// Environment Schemas
// ============================================

const flag = z.enum(['1', 'true', '0', 'false']).transform(v => v === '1' || v === 'true');

export const GoldbergEnvSchema = z.object({
    NODE_ENV: z.string().optional(),
    GOLDBERG_DEFAULT_RADIUS: z.coerce.number().finite().positive().optional(),
    GOLDBERG_DEBUG_CHECKS: flag.optional(),
    GOLDBERG_CONVERGENCE_TOLERANCE: z.coerce.number().finite().positive().optional(),
    GOLDBERG_MAX_ITERATIONS: z.coerce.number().int().positive().optional(),
    VERBOSE_LOGS: flag.optional()
});

export type GoldbergEnv = z.infer<typeof GoldbergEnvSchema>;

/**
 * Format Zod errors into a flat field/message list
 */
export function formatZodErrors(error: ZodError, root: string = 'value'): { field: string; message: string }[] {
    return error.issues.map(issue => ({
        field: issue.path.join('.') || root,
        message: issue.message
    }));
}
