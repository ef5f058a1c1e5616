/**
 * Type definitions for environment variables
 */

declare global {
  namespace NodeJS {
    interface ProcessEnv {
      NODE_ENV?: 'development' | 'production' | 'test';

      // Polyhedron
      GOLDBERG_DEFAULT_RADIUS?: string;
      GOLDBERG_DEBUG_CHECKS?: string;
      GOLDBERG_CONVERGENCE_TOLERANCE?: string;
      GOLDBERG_MAX_ITERATIONS?: string;

      // Logging
      VERBOSE_LOGS?: string;

      // Optional
      [key: string]: string | undefined;
    }
  }
}

export {};
