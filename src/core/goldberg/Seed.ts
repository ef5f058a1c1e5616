/**
 * Seed icosahedron and the rotations relating its faces
 */
import * as THREE from 'three';

/** Golden ratio */
const PHI = (1 + Math.sqrt(5)) / 2;

/**
 * Icosahedron vertices (±1, 0, ±φ) and cyclic permutations, projected to the unit sphere.
 * 0 and 3 are the poles the face rings are arranged around.
 */
const VERTICES: readonly THREE.Vector3[] = [
    new THREE.Vector3(1, 0, PHI),
    new THREE.Vector3(1, 0, -PHI),
    new THREE.Vector3(-1, 0, PHI),
    new THREE.Vector3(-1, 0, -PHI),
    new THREE.Vector3(PHI, 1, 0),
    new THREE.Vector3(PHI, -1, 0),
    new THREE.Vector3(-PHI, 1, 0),
    new THREE.Vector3(-PHI, -1, 0),
    new THREE.Vector3(0, PHI, 1),
    new THREE.Vector3(0, PHI, -1),
    new THREE.Vector3(0, -PHI, 1),
    new THREE.Vector3(0, -PHI, -1)
].map(v => v.normalize());

/**
 * Faces as (u, v, w) vertex ids, in four rings of five. Neighbouring faces
 * meet along fixed edges (see faceAssembly.ts), so the order matters.
 * Every face is wound clockwise seen from outside (u . (v x w) < 0); face
 * assembly relies on this to emit counterclockwise polyhedron faces.
 */
const FACES: readonly (readonly [number, number, number])[] = [
    // Top
    [0, 5, 10],
    [0, 10, 2],
    [0, 2, 8],
    [0, 8, 4],
    [0, 4, 5],
    // Upper middle
    [11, 10, 5],
    [7, 2, 10],
    [6, 8, 2],
    [9, 4, 8],
    [1, 5, 4],
    // Lower middle
    [10, 11, 7],
    [2, 7, 6],
    [8, 6, 9],
    [4, 9, 1],
    [5, 1, 11],
    // Bottom
    [3, 7, 11],
    [3, 6, 7],
    [3, 9, 6],
    [3, 1, 9],
    [3, 11, 1]
];

/** Faces whose subdivisions are placed directly; one per column of the ring layout */
const BASE_FACE_IDS: readonly number[] = [0, 1, 2, 3, 4];

export type Corners = readonly [THREE.Vector3, THREE.Vector3, THREE.Vector3];

export interface BaseFace {
    readonly id: number;
    readonly corners: Corners;
}

export interface FaceSymmetry {
    readonly id: number;
    readonly baseId: number;
    /** Maps each corner of the base face onto the same corner of face `id` */
    readonly rotation: THREE.Quaternion;
}

function cornersOf(id: number): Corners {
    const [u, v, w] = FACES[id];
    return [VERTICES[u].clone(), VERTICES[v].clone(), VERTICES[w].clone()];
}

/**
 * Rotation R with R * base[k] = target[k]; both corner sets come from the same
 * solid so R is orthogonal.
 */
function rotationBetween(base: Corners, target: Corners): THREE.Quaternion {
    const from = new THREE.Matrix4().makeBasis(base[0], base[1], base[2]);
    const to = new THREE.Matrix4().makeBasis(target[0], target[1], target[2]);
    const rotation = to.multiply(from.invert());
    return new THREE.Quaternion().setFromRotationMatrix(rotation).normalize();
}

const BASE_FACES: readonly BaseFace[] = BASE_FACE_IDS.map(id => ({ id, corners: cornersOf(id) }));

// Each face shares a column (id mod 5) with exactly one base face
const SYMMETRIES: readonly FaceSymmetry[] = FACES
    .map((_, id) => id)
    .filter(id => !BASE_FACE_IDS.includes(id))
    .map(id => {
        const baseId = id % BASE_FACE_IDS.length;
        return { id, baseId, rotation: rotationBetween(cornersOf(baseId), cornersOf(id)) };
    });

class Seed {
    static readonly VERTEX_COUNT = VERTICES.length;
    static readonly FACE_COUNT = FACES.length;

    vertices(): THREE.Vector3[] {
        return VERTICES.map(v => v.clone());
    }

    faceVertexIds(id: number): readonly [number, number, number] {
        return FACES[id];
    }

    face(id: number): Corners {
        return cornersOf(id);
    }

    baseFaces(): BaseFace[] {
        return BASE_FACES.map(({ id, corners }) => ({
            id,
            corners: [corners[0].clone(), corners[1].clone(), corners[2].clone()]
        }));
    }

    symmetries(): FaceSymmetry[] {
        return SYMMETRIES.map(({ id, baseId, rotation }) => ({ id, baseId, rotation: rotation.clone() }));
    }
}

const icosahedron = new Seed();

export { icosahedron };
export default Seed;
