/**
 * Weighted spherical averages of points on the unit sphere
 */
import * as THREE from 'three';
import goldbergConfig from '../../config/goldberg';
import { WEIGHT_EPSILON } from '../../../shared/goldbergConfig';
import { ConvergenceError, MalformedWeightsError } from '../../utils/errorHandler';

export interface SphericalAverageOptions {
    tolerance?: number;
    maxIterations?: number;
}

/**
 * Log map at q: tangent vector at q pointing towards p whose length is the angle between them
 */
export function sphereLn(q: THREE.Vector3, p: THREE.Vector3, target: THREE.Vector3 = new THREE.Vector3()): THREE.Vector3 {
    const angle = p.angleTo(q);
    const k = angle === 0 ? 1 : angle / Math.sin(angle);
    return target.copy(q).multiplyScalar(-Math.cos(angle)).add(p).multiplyScalar(k);
}

/**
 * Exp map at q: walks the great circle from q along the tangent vector dp
 */
export function sphereExp(q: THREE.Vector3, dp: THREE.Vector3, target: THREE.Vector3 = new THREE.Vector3()): THREE.Vector3 {
    const angle = dp.length();
    const k = angle === 0 ? 1 : Math.sin(angle) / angle;
    return target.copy(q).multiplyScalar(Math.cos(angle)).addScaledVector(dp, k);
}

function checkWeights(weights: readonly number[], points: readonly THREE.Vector3[]): void {
    if (weights.length !== points.length || weights.length === 0) {
        throw new MalformedWeightsError(`Expected one weight per point, got ${weights.length} weights for ${points.length} points`, weights);
    }
    if (weights.some(w => !Number.isFinite(w) || w < 0)) {
        throw new MalformedWeightsError('Weights must be finite and non-negative', weights);
    }
    const total = weights.reduce((sum, w) => sum + w, 0);
    if (Math.abs(total - 1) > WEIGHT_EPSILON) {
        throw new MalformedWeightsError(`Weights must sum to 1, got ${total}`, weights);
    }
}

/**
 * Weighted spherical average of unit vectors using the local linear
 * convergence iteration of Buss and Fillmore, "Spherical Averages and
 * Applications to Spherical Splines and Interpolation" (2001).
 *
 * Points must be unit length and weights non-negative with sum 1. The weight
 * check only runs with debug checks on; otherwise bad weights give an
 * undefined result.
 */
export function sphericalAverage(
    weights: readonly number[],
    points: readonly THREE.Vector3[],
    options: SphericalAverageOptions = {}
): THREE.Vector3 {
    const tolerance = options.tolerance ?? goldbergConfig.convergenceTolerance;
    const maxIterations = options.maxIterations ?? goldbergConfig.maxIterations;

    if (goldbergConfig.debugChecks) {
        checkWeights(weights, points);
    }

    const q = new THREE.Vector3();
    for (let i = 0; i < points.length; i++) {
        q.addScaledVector(points[i], weights[i]);
    }
    q.normalize();

    const u = new THREE.Vector3();
    const step = new THREE.Vector3();

    for (let iteration = 1; iteration <= maxIterations; iteration++) {
        u.set(0, 0, 0);
        for (let i = 0; i < points.length; i++) {
            u.addScaledVector(sphereLn(q, points[i], step), weights[i]);
        }

        sphereExp(q, u, step);
        q.copy(step);

        if (u.length() < tolerance) {
            return q;
        }
    }

    throw new ConvergenceError(`Spherical average did not converge within ${maxIterations} iterations`, maxIterations);
}

/**
 * Shorthand for sphericalAverage([w1, w2, w3], [p1, p2, p3])
 */
export function sphericalAverage3(
    w1: number, p1: THREE.Vector3,
    w2: number, p2: THREE.Vector3,
    w3: number, p3: THREE.Vector3,
    options?: SphericalAverageOptions
): THREE.Vector3 {
    return sphericalAverage([w1, w2, w3], [p1, p2, p3], options);
}
