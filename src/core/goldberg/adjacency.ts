/**
 * Face adjacency of a Goldberg polyhedron.
 *
 * Every polyhedron face surrounds one lattice vertex of some seed face, so two
 * faces are neighbours exactly when their lattice vertices share a lattice
 * edge. Lattice vertices on seed edges and corners are shared by several seed
 * faces; faceIndexOf maps each copy to the one face that owns it.
 */
import SubdividedTriangle from './SubdividedTriangle';
import GoldbergPolyhedron from './GoldbergPolyhedron';
import { SEED_EDGES, SEED_FACES, SEED_VERTICES } from '../../../shared/goldbergConfig';

// Corner lookups by ring (face id / 5), each entry a function of the face id
const CORNER_U: readonly ((f: number) => number)[] = [
    () => 0,
    f => 7 + f % 5,
    f => 2 + f % 5,
    () => 1
];

const CORNER_V: readonly ((f: number) => number)[] = [
    f => 2 + (f + 4) % 5,
    f => 2 + f % 5,
    f => 7 + f % 5,
    f => 7 + (f + 1) % 5
];

const CORNER_W: readonly ((f: number) => number)[] = [
    f => 2 + f,
    f => 2 + (f + 4) % 5,
    f => 7 + (f + 1) % 5,
    f => 7 + f % 5
];

// Seed edge ordinal by ring; position along the edge is added separately
const EDGE_UV: readonly ((f: number) => number)[] = [
    f => (f + 4) % 5,
    f => 10 + f % 5,
    f => 10 + f % 5,
    f => 25 + f % 5
];

const EDGE_VW: readonly ((f: number) => number)[] = [
    f => 5 + f,
    f => 5 + f % 5,
    f => 20 + f % 5,
    f => 20 + f % 5
];

const EDGE_WU: readonly ((f: number) => number)[] = [
    f => f,
    f => 15 + (f + 4) % 5,
    f => 15 + f % 5,
    f => 25 + (f + 4) % 5
];

const CORNERS = { u: CORNER_U, v: CORNER_V, w: CORNER_W };
const EDGES = { uv: EDGE_UV, vw: EDGE_VW, wu: EDGE_WU };

/**
 * Index into the face list of the face surrounding lattice vertex i of seed face f
 */
export function faceIndexOf(lattice: SubdividedTriangle, f: number, i: number): number {
    const n = lattice.n;
    const ring = Math.floor(f / 5);
    const perEdge = n - 1;
    const perFace = (n - 1) * Math.max(n - 2, 0) / 2;
    // Edge positions start at 1, so edge faces begin right after the pentagons
    const edgeBase = SEED_VERTICES - 1;

    const vertex = lattice.vertex(i);
    const location = lattice.classify(vertex);

    if (location.kind === 'corner') {
        return CORNERS[location.corner][ring](f);
    }
    if (location.kind === 'edge') {
        // Even rings count along the edge from one end, odd rings from the other
        const position = {
            uv: ring % 2 === 0 ? vertex.x : vertex.y,
            vw: ring % 2 === 0 ? vertex.z : vertex.y,
            wu: ring % 2 === 0 ? vertex.x : vertex.z
        }[location.edge];
        return edgeBase + EDGES[location.edge][ring](f) * perEdge + position;
    }
    return SEED_VERTICES + SEED_EDGES * perEdge + f * perFace + lattice.interiorIndexUnchecked(vertex);
}

/**
 * Undirected face adjacency pairs, each reported once in no particular order
 */
export function adjacency(polyhedron: GoldbergPolyhedron): [number, number][] {
    const lattice = polyhedron.lattice;
    const neighbours = new Map<number, Set<number>>();
    const pairs: [number, number][] = [];

    for (const [a, b] of lattice.vertexAdjacency()) {
        for (let f = 0; f < SEED_FACES; f++) {
            const p = faceIndexOf(lattice, f, a);
            const q = faceIndexOf(lattice, f, b);
            const lo = Math.min(p, q);
            const hi = Math.max(p, q);

            let seen = neighbours.get(lo);
            if (!seen) {
                seen = new Set<number>();
                neighbours.set(lo, seen);
            }
            if (!seen.has(hi)) {
                seen.add(hi);
                pairs.push([p, q]);
            }
        }
    }

    return pairs;
}
