/**
 * Mesh Export
 * Flat vertex, index and normal buffers for uploading the polyhedron to a renderer.
 *
 * Faces do not share mesh vertices: every face gets its own copy of its
 * corners so each can carry a flat normal. Pentagons come first, which puts
 * 60 pentagon vertices at the start of the buffer followed by groups of six.
 */
import * as THREE from 'three';
import GoldbergPolyhedron from './GoldbergPolyhedron';
import { PackedIndex } from './PackedIndex';
import { SEED_VERTICES } from '../../../shared/goldbergConfig';
import { InvalidPackedIndexError, MeshLayoutError } from '../../utils/errorHandler';

export type Point3 = [number, number, number];

/** Mesh vertex indices of one face, in winding order */
export type MeshFace = readonly number[];

const PENTAGON_VERTICES = SEED_VERTICES * 5;

// Largest Uint16 value is kept free as a primitive restart marker
const UINT16_LIMIT = 65535;

export function meshVertices(polyhedron: GoldbergPolyhedron, positions: ReadonlyMap<PackedIndex, THREE.Vector3>): Point3[] {
    const vertices: Point3[] = [];
    for (const face of polyhedron.faces) {
        for (const key of face.vertices) {
            const p = positions.get(key);
            if (!p) {
                throw new InvalidPackedIndexError(`No position for packed index ${key}`, key);
            }
            vertices.push([p.x, p.y, p.z]);
        }
    }
    return vertices;
}

export function meshFaces(polyhedron: GoldbergPolyhedron): MeshFace[] {
    const faces: MeshFace[] = [];
    let next = 0;
    for (const face of polyhedron.faces) {
        const start = next;
        faces.push(face.vertices.map((_, k) => start + k));
        next += face.vertices.length;
    }
    return faces;
}

/**
 * Fan triangulation of every face from its first corner
 */
export function meshTriangles(polyhedron: GoldbergPolyhedron): Uint16Array | Uint32Array {
    const indices = polyhedron.meshVertexCount < UINT16_LIMIT
        ? new Uint16Array(polyhedron.meshTriangleCount * 3)
        : new Uint32Array(polyhedron.meshTriangleCount * 3);

    let i = 0;
    for (const face of meshFaces(polyhedron)) {
        for (let k = 1; k + 1 < face.length; k++) {
            indices[i++] = face[0];
            indices[i++] = face[k];
            indices[i++] = face[k + 1];
        }
    }
    return indices;
}

function pentagonNormal(p: THREE.Vector3[]): THREE.Vector3 {
    const a = new THREE.Vector3().subVectors(p[2], p[0]);
    const b = new THREE.Vector3().subVectors(p[3], p[0]);
    return a.cross(b).normalize();
}

// Hexagons sit over the sphere closely enough that alternate corners give the radial direction
function hexagonNormal(p: THREE.Vector3[]): THREE.Vector3 {
    return new THREE.Vector3().add(p[0]).add(p[2]).add(p[4]).normalize();
}

/**
 * One flat normal per face, repeated for each of its vertices
 */
export function meshNormals(vertices: readonly Point3[]): Point3[] {
    if (vertices.length < PENTAGON_VERTICES || (vertices.length - PENTAGON_VERTICES) % 6 !== 0) {
        throw new MeshLayoutError(
            `Expected ${PENTAGON_VERTICES} pentagon vertices followed by groups of 6, got ${vertices.length}`,
            vertices.length
        );
    }

    const normals: Point3[] = [];
    const emit = (start: number, size: number, normalOf: (p: THREE.Vector3[]) => THREE.Vector3) => {
        const corners = vertices.slice(start, start + size).map(([x, y, z]) => new THREE.Vector3(x, y, z));
        const n = normalOf(corners);
        for (let k = 0; k < size; k++) {
            normals.push([n.x, n.y, n.z]);
        }
    };

    for (let start = 0; start < PENTAGON_VERTICES; start += 5) {
        emit(start, 5, pentagonNormal);
    }
    for (let start = PENTAGON_VERTICES; start < vertices.length; start += 6) {
        emit(start, 6, hexagonNormal);
    }
    return normals;
}
