/**
 * Spherical placement of the polyhedron vertices
 */
import * as THREE from 'three';
import GoldbergPolyhedron from './GoldbergPolyhedron';
import { icosahedron } from './Seed';
import { pack, PackedIndex } from './PackedIndex';
import { sphericalAverage, SphericalAverageOptions } from './sphericalAverage';
import { toWeights } from './SubdividedTriangle';
import { RadiusSchema } from '../../schemas';
import goldbergConfig from '../../config/goldberg';
import { InvalidRadiusError } from '../../utils/errorHandler';

/**
 * Position of every packed key on the sphere of the given radius.
 *
 * Only the five base faces are averaged directly; the other fifteen are rigid
 * rotations of a base face, and rotation commutes with spherical averaging.
 */
export function resolvedPositions(
    polyhedron: GoldbergPolyhedron,
    radius: number = goldbergConfig.defaultRadius,
    options: SphericalAverageOptions = {}
): Map<PackedIndex, THREE.Vector3> {
    const result = RadiusSchema.safeParse(radius);
    if (!result.success) {
        throw new InvalidRadiusError(radius, result.error.issues.map(i => i.message).join('; '));
    }

    const lattice = polyhedron.lattice;
    const positions = new Map<PackedIndex, THREE.Vector3>();
    const base = new Map<number, THREE.Vector3[]>();

    for (const { id, corners } of icosahedron.baseFaces()) {
        const points = lattice.triangles.map((_, t) =>
            sphericalAverage(toWeights(lattice.centroid(t)), corners, options).multiplyScalar(result.data)
        );
        base.set(id, points);
        points.forEach((p, t) => positions.set(pack(id, t), p));
    }

    for (const { id, baseId, rotation } of icosahedron.symmetries()) {
        const points = base.get(baseId) ?? [];
        points.forEach((p, t) => positions.set(pack(id, t), p.clone().applyQuaternion(rotation)));
    }

    return positions;
}
