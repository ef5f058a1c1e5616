/**
 * Goldberg polyhedron public API
 */
import * as THREE from 'three';
import GoldbergPolyhedron from './GoldbergPolyhedron';
import { resolvedPositions as placeVertices } from './placement';
import { PackedIndex } from './PackedIndex';
import goldbergConfig from '../../config/goldberg';
import { withErrorLogging, ErrorSeverity } from '../../utils/errorHandler';

/**
 * Build GP(N, 0) by subdividing each icosahedron face N times per edge
 */
export function construct(subdivisions: number): GoldbergPolyhedron {
    return withErrorLogging(
        () => new GoldbergPolyhedron(subdivisions),
        'Goldberg.construct',
        ErrorSeverity.MEDIUM,
        { subdivisions }
    );
}

/**
 * Every vertex of the polyhedron on the sphere of the given radius, keyed by packed index
 */
export function resolvedPositions(
    polyhedron: GoldbergPolyhedron,
    radius: number = goldbergConfig.defaultRadius
): Map<PackedIndex, THREE.Vector3> {
    return withErrorLogging(
        () => placeVertices(polyhedron, radius),
        'Goldberg.resolvedPositions',
        ErrorSeverity.MEDIUM,
        { subdivisions: polyhedron.subdivisions, radius }
    );
}

export { GoldbergPolyhedron };
export { adjacency, faceIndexOf } from './adjacency';
export { meshVertices, meshFaces, meshTriangles, meshNormals } from './mesh';
export { pack, unpack, face, vertex, assertSeedFace } from './PackedIndex';
export { sphericalAverage, sphericalAverage3 } from './sphericalAverage';
export { default as SubdividedTriangle } from './SubdividedTriangle';
export { default as Seed, icosahedron } from './Seed';

export type { PackedIndex } from './PackedIndex';
export type { PolyhedronFace } from './faceAssembly';
export type { Point3, MeshFace } from './mesh';
export type { SphericalAverageOptions } from './sphericalAverage';
export type { LatticeVertex, LatticeTriangle, BarycentricPoint, VertexLocation } from './SubdividedTriangle';
export type { BaseFace, FaceSymmetry, Corners } from './Seed';
