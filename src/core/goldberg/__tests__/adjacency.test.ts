import { adjacency, faceIndexOf } from '../adjacency';
import GoldbergPolyhedron from '../GoldbergPolyhedron';
import SubdividedTriangle from '../SubdividedTriangle';

const pairKey = (a: number, b: number) => `${Math.min(a, b)}-${Math.max(a, b)}`;

/**
 * Faces are neighbours when two consecutive corners of one are consecutive corners of the other
 */
function bruteForceAdjacency(polyhedron: GoldbergPolyhedron): Set<string> {
    const owners = new Map<string, number[]>();
    polyhedron.faces.forEach((face, i) => {
        const corners = face.vertices;
        corners.forEach((a, k) => {
            const key = pairKey(a, corners[(k + 1) % corners.length]);
            owners.set(key, [...(owners.get(key) ?? []), i]);
        });
    });

    const pairs = new Set<string>();
    for (const faces of owners.values()) {
        if (faces.length === 2) pairs.add(pairKey(faces[0], faces[1]));
    }
    return pairs;
}

describe('adjacency', () => {
    test.each([1, 2, 3, 4, 5])('matches the brute force neighbours for N = %i', n => {
        const polyhedron = new GoldbergPolyhedron(n);
        const pairs = adjacency(polyhedron);
        const keys = new Set(pairs.map(([a, b]) => pairKey(a, b)));

        expect(pairs).toHaveLength(30 * n * n);
        expect(keys.size).toBe(pairs.length);
        expect(keys).toEqual(bruteForceAdjacency(polyhedron));
    });

    test('each face has one neighbour per side', () => {
        const polyhedron = new GoldbergPolyhedron(3);
        const degree = new Array<number>(polyhedron.faceCount).fill(0);
        for (const [a, b] of adjacency(polyhedron)) {
            degree[a]++;
            degree[b]++;
        }
        expect(degree).toEqual(polyhedron.faces.map(f => f.vertices.length));
    });

    test('no face neighbours itself', () => {
        expect(adjacency(new GoldbergPolyhedron(4)).some(([a, b]) => a === b)).toBe(false);
    });

    test('N = 1 has the 30 dodecahedron edges', () => {
        expect(adjacency(new GoldbergPolyhedron(1))).toHaveLength(30);
    });

    describe('faceIndexOf', () => {
        test('corners map to pentagons', () => {
            expect(faceIndexOf(new SubdividedTriangle(2), 1, 2)).toBe(2);
        });

        test('seed edge vertices map to edge faces', () => {
            expect(faceIndexOf(new SubdividedTriangle(4), 1, 1)).toBe(32);
        });

        test('interior vertices map to face faces', () => {
            expect(faceIndexOf(new SubdividedTriangle(3), 11, 5)).toBe(83);
            const lattice = new SubdividedTriangle(4);
            expect(faceIndexOf(lattice, 0, 6)).toBe(102);
            expect(faceIndexOf(lattice, 1, 7)).toBe(106);
            expect(faceIndexOf(lattice, 2, 10)).toBe(110);
        });

        test('shared lattice vertices agree across seed faces', () => {
            // The u corner of every top face is the north pole pentagon
            const lattice = new SubdividedTriangle(3);
            const u = lattice.vertexIndexUnchecked({ x: 3, y: 0, z: 0 });
            expect([0, 1, 2, 3, 4].map(f => faceIndexOf(lattice, f, u))).toEqual([0, 0, 0, 0, 0]);
        });
    });
});
