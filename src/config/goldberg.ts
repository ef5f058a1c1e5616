import dotenv from 'dotenv';
import { GoldbergEnvSchema, GoldbergEnv, formatZodErrors } from '../schemas';
import { GOLDBERG_DEFAULTS } from '../../shared/goldbergConfig';

dotenv.config(); // Load environment variables from .env in the working directory

export interface GoldbergConfig {
    /** Radius used by resolvedPositions when the caller passes none */
    defaultRadius: number;
    /**
     * Precondition checks on packed keys and averaging weights. Defaults to on
     * unless NODE_ENV=production; with them off, malformed weights or keys give
     * undefined results instead of an error.
     */
    debugChecks: boolean;
    convergenceTolerance: number;
    maxIterations: number;
    // Toggle verbose logs with VERBOSE_LOGS=1 or VERBOSE_LOGS=true in environment
    verboseLogs: boolean;
}

/**
 * Parse Goldberg settings from an environment map. Invalid entries are
 * reported and replaced by their defaults.
 */
export function loadGoldbergConfig(env: NodeJS.ProcessEnv = process.env): GoldbergConfig {
    const raw: Record<string, string | undefined> = { ...env };
    let result = GoldbergEnvSchema.safeParse(raw);

    if (!result.success) {
        console.warn('⚠️  [GoldbergConfig] Ignoring invalid settings:', formatZodErrors(result.error, 'env'));
        for (const issue of result.error.issues) {
            delete raw[String(issue.path[0])];
        }
        result = GoldbergEnvSchema.safeParse(raw);
    }

    const parsed: GoldbergEnv = result.success ? result.data : {};

    return {
        defaultRadius: parsed.GOLDBERG_DEFAULT_RADIUS ?? GOLDBERG_DEFAULTS.RADIUS,
        debugChecks: parsed.GOLDBERG_DEBUG_CHECKS ?? parsed.NODE_ENV !== 'production',
        convergenceTolerance: parsed.GOLDBERG_CONVERGENCE_TOLERANCE ?? GOLDBERG_DEFAULTS.CONVERGENCE_TOLERANCE,
        maxIterations: parsed.GOLDBERG_MAX_ITERATIONS ?? GOLDBERG_DEFAULTS.MAX_ITERATIONS,
        verboseLogs: parsed.VERBOSE_LOGS ?? false
    };
}

const goldbergConfig: GoldbergConfig = loadGoldbergConfig();

export default goldbergConfig;
