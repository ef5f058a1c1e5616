/**
 * Face Assembly
 * Stitches the 20 subdivided seed faces into pentagons and hexagons
 *
 * Seed faces are grouped in rings: top 0..5, upper middle 5..10,
 * lower middle 10..15, bottom 15..20. Rings meet along these edges:
 *
 *   top - top:       wu - uv
 *   top - upper:     vw - vw
 *   upper - lower:   uv - uv
 *   lower - upper:   wu - wu
 *   lower - bottom:  vw - vw
 *   bottom - bottom: uv - wu
 */
import SubdividedTriangle from './SubdividedTriangle';
import { pack, PackedIndex } from './PackedIndex';

type Pentagon = readonly [PackedIndex, PackedIndex, PackedIndex, PackedIndex, PackedIndex];
type Hexagon = readonly [PackedIndex, PackedIndex, PackedIndex, PackedIndex, PackedIndex, PackedIndex];

/**
 * Face of the polyhedron: packed keys of its corners, counterclockwise seen from outside
 */
export type PolyhedronFace =
    | { readonly kind: 'pentagon'; readonly vertices: Pentagon }
    | { readonly kind: 'hexagon'; readonly vertices: Hexagon };

type Pair = readonly [number, number];
type Window = readonly [Pair, Pair, Pair];

function zip(a: readonly number[], b: readonly number[]): Pair[] {
    const length = Math.min(a.length, b.length);
    return Array.from({ length }, (_, i): Pair => [a[i], b[i]]);
}

/**
 * Windows of three consecutive pairs, advancing two pairs at a time
 */
function windows(pairs: readonly Pair[]): Window[] {
    const out: Window[] = [];
    for (let i = 0; i + 2 < pairs.length; i += 2) {
        out.push([pairs[i], pairs[i + 1], pairs[i + 2]]);
    }
    return out;
}

function reversed(values: readonly number[]): number[] {
    return [...values].reverse();
}

function pentagon(...corners: [number, number][]): PolyhedronFace {
    const [a, b, c, d, e] = corners.map(([f, i]) => pack(f, i));
    return { kind: 'pentagon', vertices: [a, b, c, d, e] };
}

function hexagon(faceA: number, faceB: number, [[a0, b0], [a1, b1], [a2, b2]]: Window): PolyhedronFace {
    return {
        kind: 'hexagon',
        vertices: [
            pack(faceA, a0),
            pack(faceA, a1),
            pack(faceA, a2),
            pack(faceB, b2),
            pack(faceB, b1),
            pack(faceB, b0)
        ]
    };
}

function range(start: number, end: number): number[] {
    return Array.from({ length: end - start }, (_, i) => start + i);
}

/**
 * One pentagon per icosahedron vertex, built from the corner triangles of the five faces around it
 */
export function vertexFaces(template: SubdividedTriangle): PolyhedronFace[] {
    const u = template.u();
    const v = template.v();
    const w = template.w();

    const poles = [
        pentagon([4, u], [3, u], [2, u], [1, u], [0, u]),
        pentagon([15, u], [16, u], [17, u], [18, u], [19, u])
    ];

    const upper = range(5, 10).map(f => pentagon(
        [f - 5, w],
        [(f + 1) % 5, v],
        [5 + (f + 1) % 5, w],
        [f + 5, u],
        [f, v]
    ));

    const lower = range(10, 15).map(f => pentagon(
        [f + 5, w],
        [15 + (f + 4) % 5, v],
        [10 + (f + 4) % 5, w],
        [f - 5, u],
        [f, v]
    ));

    return [...poles, ...upper, ...lower];
}

/**
 * N - 1 hexagons straddling each of the 30 icosahedron edges
 */
export function edgeFaces(template: SubdividedTriangle): PolyhedronFace[] {
    const uv = template.uv();
    const vw = template.vw();
    const wu = template.wu();

    const families: { pairs: Pair[]; runs: Window[] }[] = [
        // top - top
        { pairs: range(0, 5).map((f): Pair => [f, (f + 1) % 5]), runs: windows(zip(wu, reversed(uv))) },
        // top - upper middle
        { pairs: range(0, 5).map((f): Pair => [f, f + 5]), runs: windows(zip(vw, reversed(vw))) },
        // upper middle - lower middle
        { pairs: range(5, 10).map((f): Pair => [f, f + 5]), runs: windows(zip(uv, reversed(uv))) },
        // lower middle - upper middle
        { pairs: range(10, 15).map((f): Pair => [f, 5 + (f + 1) % 5]), runs: windows(zip(wu, reversed(wu))) },
        // lower middle - bottom
        { pairs: range(10, 15).map((f): Pair => [f, f + 5]), runs: windows(zip(vw, reversed(vw))) },
        // bottom - bottom
        { pairs: range(15, 20).map((f): Pair => [f, 15 + (f + 1) % 5]), runs: windows(zip(uv, reversed(wu))) }
    ];

    const faces: PolyhedronFace[] = [];
    for (const { pairs, runs } of families) {
        for (const [faceA, faceB] of pairs) {
            for (const run of runs) {
                faces.push(hexagon(faceA, faceB, run));
            }
        }
    }
    return faces;
}

/**
 * One hexagon per interior lattice vertex of every seed face, grouped by seed face
 */
export function faceFaces(template: SubdividedTriangle): PolyhedronFace[] {
    const runs: Window[] = [];
    for (let i = 0; i + 1 < template.n; i++) {
        const r1 = template.row(i);
        const r2 = template.row(i + 1);
        runs.push(...windows(zip(r1.slice(1, r1.length - 1), r2)));
    }

    const faces: PolyhedronFace[] = [];
    for (let f = 0; f < 20; f++) {
        for (const run of runs) {
            faces.push(hexagon(f, f, run));
        }
    }
    return faces;
}

/**
 * All faces: vertex faces, then edge faces, then face faces
 */
export function assembleFaces(template: SubdividedTriangle): PolyhedronFace[] {
    return [
        ...vertexFaces(template),
        ...edgeFaces(template),
        ...faceFaces(template)
    ];
}
