/**
 * Goldberg Polyhedron Configuration Constants
 * 
 * Shared constants for polyhedron generation and spherical placement.
 */

export const GOLDBERG_DEFAULTS = {
    /** Sphere radius applied to resolved positions */
    RADIUS: 1,

    /** Largest subdivision level whose packed keys (N² triangles << 5) stay below 2^31 */
    MAX_SUBDIVISIONS: 8191,

    /** Spherical averaging stops once the tangent step is shorter than this */
    CONVERGENCE_TOLERANCE: 1e-6,

    /** Hard cap on spherical averaging iterations */
    MAX_ITERATIONS: 100,

    /** Allowed drift of a weight sum away from 1 */
    WEIGHT_EPSILON: 1e-9,
} as const;

/** Icosahedron counts: the seed every polyhedron is subdivided from */
export const SEED_VERTICES = 12;
export const SEED_EDGES = 30;
export const SEED_FACES = 20;

// Convenience exports
export const MAX_SUBDIVISIONS = GOLDBERG_DEFAULTS.MAX_SUBDIVISIONS;
export const WEIGHT_EPSILON = GOLDBERG_DEFAULTS.WEIGHT_EPSILON;
