// Library entry point
export * from './core/goldberg';
export {
    InvalidSubdivisionLevelError,
    InvalidRadiusError,
    MalformedWeightsError,
    InvalidPackedIndexError,
    ConvergenceError,
    MeshLayoutError,
    ErrorSeverity,
    logError
} from './utils/errorHandler';
export { loadGoldbergConfig } from './config/goldberg';
export type { GoldbergConfig } from './config/goldberg';
export type { ErrorSeverityType } from './utils/errorHandler';
