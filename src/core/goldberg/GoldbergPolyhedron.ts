/**
 * GoldbergPolyhedron.ts
 * Face list of the Goldberg polyhedron GP(N, 0), assembled once from the lattice
 */
import SubdividedTriangle from './SubdividedTriangle';
import { assembleFaces, PolyhedronFace } from './faceAssembly';
import goldbergConfig from '../../config/goldberg';
import { SEED_EDGES, SEED_FACES, SEED_VERTICES } from '../../../shared/goldbergConfig';

class GoldbergPolyhedron {
    public readonly lattice: SubdividedTriangle;
    public readonly faces: readonly PolyhedronFace[];

    /**
     * 12 pentagons, N - 1 hexagons per seed edge and one hexagon per interior
     * lattice vertex of each seed face
     */
    static faceCount(n: number): number {
        return SEED_VERTICES + SEED_EDGES * (n - 1) + SEED_FACES * (n - 1) * Math.max(n - 2, 0) / 2;
    }

    constructor(subdivisions: number) {
        const start = Date.now();
        this.lattice = new SubdividedTriangle(subdivisions);
        this.faces = Object.freeze(assembleFaces(this.lattice));

        if (goldbergConfig.verboseLogs) {
            console.log(`🌐 [Goldberg] Built GP(${subdivisions},0): ${this.pentagonCount} pentagons, ${this.hexagonCount} hexagons in ${Date.now() - start}ms`);
        }
    }

    get subdivisions(): number {
        return this.lattice.n;
    }

    get faceCount(): number {
        return this.faces.length;
    }

    get pentagonCount(): number {
        return this.faces.filter(f => f.kind === 'pentagon').length;
    }

    get hexagonCount(): number {
        return this.faces.filter(f => f.kind === 'hexagon').length;
    }

    /** One mesh vertex per face corner */
    get meshVertexCount(): number {
        return this.faces.reduce((sum, f) => sum + f.vertices.length, 0);
    }

    /** Fan triangulation: k - 2 triangles per face with k corners */
    get meshTriangleCount(): number {
        return this.faces.reduce((sum, f) => sum + f.vertices.length - 2, 0);
    }

    /** Number of distinct polyhedron vertices, one per lattice triangle per seed face */
    get vertexCount(): number {
        return SEED_FACES * this.lattice.triangleCount;
    }
}

export default GoldbergPolyhedron;
