/**
 * SubdividedTriangle.ts
 * Integer barycentric lattice of one icosahedron face split N times per edge
 */
import { SubdivisionLevelSchema, formatZodErrors } from '../../schemas';
import { InvalidSubdivisionLevelError } from '../../utils/errorHandler';

/**
 * Lattice point with x + y + z = N; its position on the face is (x, y, z) / N
 */
export interface LatticeVertex {
    readonly x: number;
    readonly y: number;
    readonly z: number;
}

/**
 * Three lattice vertex indices
 */
export interface LatticeTriangle {
    readonly u: number;
    readonly v: number;
    readonly w: number;
}

/**
 * Rational barycentric point: (x, y, z) / denominator
 */
export interface BarycentricPoint extends LatticeVertex {
    readonly denominator: number;
}

/**
 * Where a lattice vertex sits on the parent triangle
 */
export type VertexLocation =
    | { kind: 'corner'; corner: 'u' | 'v' | 'w' }
    | { kind: 'edge'; edge: 'uv' | 'vw' | 'wu' }
    | { kind: 'interior' };

export function toWeights(point: BarycentricPoint): [number, number, number] {
    return [point.x / point.denominator, point.y / point.denominator, point.z / point.denominator];
}

/**
 * Vertex list is the subset of [0,n]^3 with x + y + z = n in lexicographic order;
 * z is implied by x and y.
 */
function vertexIndexAt(n: number, x: number, y: number): number {
    return x * (2 * (n + 1) + 1 - x) / 2 + y;
}

class SubdividedTriangle {
    public readonly n: number;
    public readonly vertices: readonly LatticeVertex[];
    public readonly triangles: readonly LatticeTriangle[];

    static vertexCount(n: number): number {
        return (n + 1) * (n + 2) / 2;
    }

    static triangleCount(n: number): number {
        return n * n;
    }

    /** Upward triangles, with x of u one greater than x of v and w */
    static upwardCount(n: number): number {
        return n * (n + 1) / 2;
    }

    static downwardCount(n: number): number {
        return n * (n - 1) / 2;
    }

    /** Every lattice edge borders exactly one upward triangle */
    static edgeCount(n: number): number {
        return SubdividedTriangle.upwardCount(n) * 3;
    }

    constructor(n: number) {
        const result = SubdivisionLevelSchema.safeParse(n);
        if (!result.success) {
            throw new InvalidSubdivisionLevelError(n, formatZodErrors(result.error, 'subdivisions'));
        }
        this.n = result.data;

        const vertices: LatticeVertex[] = [];
        for (let x = 0; x <= n; x++) {
            for (let y = 0; y <= n - x; y++) {
                vertices.push({ x, y, z: n - x - y });
            }
        }

        const triangles: LatticeTriangle[] = [];
        for (const p of vertices) {
            if (p.x > 0 && p.y < n && p.z < n) {
                triangles.push({
                    u: vertexIndexAt(n, p.x, p.y),
                    v: vertexIndexAt(n, p.x - 1, p.y + 1),
                    w: vertexIndexAt(n, p.x - 1, p.y)
                });
            }
        }
        for (const p of vertices) {
            if (p.x < n && p.y > 0 && p.z > 0) {
                triangles.push({
                    u: vertexIndexAt(n, p.x, p.y),
                    v: vertexIndexAt(n, p.x + 1, p.y - 1),
                    w: vertexIndexAt(n, p.x + 1, p.y)
                });
            }
        }

        this.vertices = vertices;
        this.triangles = triangles;
    }

    get vertexCount(): number {
        return SubdividedTriangle.vertexCount(this.n);
    }

    get triangleCount(): number {
        return SubdividedTriangle.triangleCount(this.n);
    }

    private get upwardCount(): number {
        return SubdividedTriangle.upwardCount(this.n);
    }

    private get downwardCount(): number {
        return SubdividedTriangle.downwardCount(this.n);
    }

    vertex(i: number): LatticeVertex {
        return this.vertices[i];
    }

    triangle(i: number): LatticeTriangle {
        return this.triangles[i];
    }

    upwardTriangles(): readonly LatticeTriangle[] {
        return this.triangles.slice(0, this.upwardCount);
    }

    downwardTriangles(): readonly LatticeTriangle[] {
        return this.triangles.slice(this.upwardCount);
    }

    /**
     * Index of a lattice vertex, or undefined when the coordinates are off the lattice
     */
    vertexIndex(v: LatticeVertex): number | undefined {
        if (v.x < 0 || v.y < 0 || v.z < 0 || v.x + v.y + v.z !== this.n) {
            return undefined;
        }
        return this.vertexIndexUnchecked(v);
    }

    vertexIndexUnchecked(v: LatticeVertex): number {
        return vertexIndexAt(this.n, v.x, v.y);
    }

    /**
     * Index of an interior vertex among interior vertices only, or undefined on the boundary
     */
    interiorIndex(v: LatticeVertex): number | undefined {
        if (v.x <= 0 || v.y <= 0 || v.z <= 0) {
            return undefined;
        }
        return this.interiorIndexUnchecked(v);
    }

    interiorIndexUnchecked(v: LatticeVertex): number {
        return vertexIndexAt(this.n - 3, v.x - 1, v.y - 1);
    }

    classify(v: LatticeVertex): VertexLocation {
        if (v.y === 0 && v.z === 0) return { kind: 'corner', corner: 'u' };
        if (v.x === 0 && v.z === 0) return { kind: 'corner', corner: 'v' };
        if (v.x === 0 && v.y === 0) return { kind: 'corner', corner: 'w' };
        if (v.z === 0) return { kind: 'edge', edge: 'uv' };
        if (v.x === 0) return { kind: 'edge', edge: 'vw' };
        if (v.y === 0) return { kind: 'edge', edge: 'wu' };
        return { kind: 'interior' };
    }

    /**
     * Centroid of triangle i with denominator 3N
     */
    centroid(i: number): BarycentricPoint {
        const t = this.triangles[i];
        const a = this.vertices[t.u];
        const b = this.vertices[t.v];
        const c = this.vertices[t.w];
        return {
            x: a.x + b.x + c.x,
            y: a.y + b.y + c.y,
            z: a.z + b.z + c.z,
            denominator: 3 * this.n
        };
    }

    private upwardRow(i: number): number[] {
        if (i >= this.n) return [];
        const k = this.n - i;
        const start = this.upwardCount - k * (k + 1) / 2;
        return Array.from({ length: k }, (_, j) => start + j);
    }

    private downwardRow(i: number): number[] {
        if (i >= this.n - 1) return [];
        const k = this.n - 1 - i;
        const start = this.upwardCount + this.downwardCount - k * (k + 1) / 2;
        return Array.from({ length: k }, (_, j) => start + j);
    }

    /**
     * Triangles with a vertex at x = i, sorted by increasing centroid y.
     * Upward and downward triangles alternate.
     */
    row(i: number): number[] {
        const up = this.upwardRow(i);
        const down = this.downwardRow(i);
        const row: number[] = [];
        for (let j = 0; j < up.length; j++) {
            row.push(up[j]);
            if (j < down.length) row.push(down[j]);
        }
        return row;
    }

    /** Corner triangle at u = (N, 0, 0) */
    u(): number {
        return this.upwardCount - 1;
    }

    /** Corner triangle at v = (0, N, 0) */
    v(): number {
        return this.n - 1;
    }

    /** Corner triangle at w = (0, 0, N) */
    w(): number {
        return 0;
    }

    /**
     * Triangles touching the uv edge (z = 0), from u towards v
     */
    uv(): number[] {
        const edge = new Array<number>(2 * this.n - 1);
        for (let i = 0; i < this.n; i++) {
            edge[2 * i] = this.upwardCount - i * (i + 1) / 2 - 1;
        }
        for (let i = 0; i < this.n - 1; i++) {
            edge[2 * i + 1] = this.triangleCount - i * (i + 1) / 2 - 1;
        }
        return edge;
    }

    /**
     * Triangles touching the vw edge (x = 0), from v towards w
     */
    vw(): number[] {
        const edge = new Array<number>(2 * this.n - 1);
        for (let i = 0; i < this.n; i++) {
            edge[2 * i] = this.n - 1 - i;
        }
        for (let i = 0; i < this.n - 1; i++) {
            edge[2 * i + 1] = this.upwardCount + this.n - 2 - i;
        }
        return edge;
    }

    /**
     * Triangles touching the wu edge (y = 0), from w towards u
     */
    wu(): number[] {
        const edge = new Array<number>(2 * this.n - 1);
        for (let i = 0; i < this.n; i++) {
            const k = this.n - 1 - i;
            edge[2 * i] = this.upwardCount - (k + 1) * (k + 2) / 2;
        }
        for (let i = 1; i < this.n; i++) {
            const k = this.n - 1 - i;
            edge[2 * i - 1] = this.triangleCount - (k + 1) * (k + 2) / 2;
        }
        return edge;
    }

    /**
     * Undirected vertex edges taken from the triangle list, each reported once
     */
    vertexAdjacency(): [number, number][] {
        const seen = new Set<number>();
        const edges: [number, number][] = [];
        const count = this.vertexCount;

        for (const t of this.triangles) {
            for (const [a, b] of [[t.u, t.v], [t.v, t.w], [t.w, t.u]]) {
                const lo = Math.min(a, b);
                const hi = Math.max(a, b);
                const key = lo * count + hi;
                if (!seen.has(key)) {
                    seen.add(key);
                    edges.push([lo, hi]);
                }
            }
        }

        return edges;
    }
}

export default SubdividedTriangle;
