import { resolvedPositions } from '../placement';
import { resolvedPositions as resolvePublic } from '..';
import GoldbergPolyhedron from '../GoldbergPolyhedron';
import { icosahedron } from '../Seed';
import { pack } from '../PackedIndex';
import { sphericalAverage } from '../sphericalAverage';
import { toWeights } from '../SubdividedTriangle';
import { InvalidRadiusError } from '../../../utils/errorHandler';

const INV_SQRT3 = 1 / Math.sqrt(3);

describe('resolvedPositions', () => {
    test('covers every packed key', () => {
        const polyhedron = new GoldbergPolyhedron(3);
        const positions = resolvedPositions(polyhedron);
        expect(positions.size).toBe(180);
        for (const face of polyhedron.faces) {
            face.vertices.forEach(key => expect(positions.has(key)).toBe(true));
        }
    });

    test('places every vertex on the sphere of the given radius', () => {
        const positions = resolvedPositions(new GoldbergPolyhedron(4), 2.5);
        for (const p of positions.values()) {
            expect(p.length()).toBeCloseTo(2.5, 9);
        }
    });

    test('derived faces agree with direct averaging', () => {
        const polyhedron = new GoldbergPolyhedron(4);
        const lattice = polyhedron.lattice;
        const positions = resolvedPositions(polyhedron);

        for (const { id } of icosahedron.symmetries()) {
            const corners = icosahedron.face(id);
            lattice.triangles.forEach((_, t) => {
                const direct = sphericalAverage(toWeights(lattice.centroid(t)), corners);
                const rotated = positions.get(pack(id, t));
                expect(rotated).toBeDefined();
                if (rotated) {
                    expect(rotated.x).toBeCloseTo(direct.x, 6);
                    expect(rotated.y).toBeCloseTo(direct.y, 6);
                    expect(rotated.z).toBeCloseTo(direct.z, 6);
                }
            });
        }
    });

    test('centre of a derived face at N = 2', () => {
        // Downward triangle 3 has the centroid (1/3, 1/3, 1/3)
        const p = resolvedPositions(new GoldbergPolyhedron(2)).get(pack(7, 3));
        expect(p?.x).toBeCloseTo(-INV_SQRT3, 9);
        expect(p?.y).toBeCloseTo(INV_SQRT3, 9);
        expect(p?.z).toBeCloseTo(INV_SQRT3, 9);
    });

    test('callers cannot move the seed under later placements', () => {
        icosahedron.baseFaces()[0].corners[0].set(0, 0, 1);

        const p = resolvedPositions(new GoldbergPolyhedron(1)).get(pack(0, 0));
        expect(p?.x).toBeCloseTo(INV_SQRT3, 9);
        expect(p?.y).toBeCloseTo(-INV_SQRT3, 9);
        expect(p?.z).toBeCloseTo(INV_SQRT3, 9);
    });

    test('rejects radii that are not positive and finite', () => {
        const polyhedron = new GoldbergPolyhedron(1);
        for (const radius of [0, -1, NaN, Infinity]) {
            expect(() => resolvedPositions(polyhedron, radius)).toThrow(InvalidRadiusError);
        }
        expect(() => resolvedPositions(polyhedron, 0)).toThrow('Invalid radius 0: radius must be positive');
    });

    describe('public entry point', () => {
        let warnSpy: jest.SpyInstance;

        beforeEach(() => {
            warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        });

        afterEach(() => {
            warnSpy.mockRestore();
        });

        test('defaults to the configured radius', () => {
            const positions = resolvePublic(new GoldbergPolyhedron(1));
            expect(positions.size).toBe(20);
            const p = positions.get(pack(0, 0));
            expect(p?.length()).toBeCloseTo(1, 9);
            expect(p?.x).toBeCloseTo(INV_SQRT3, 9);
            expect(p?.y).toBeCloseTo(-INV_SQRT3, 9);
            expect(warnSpy).not.toHaveBeenCalled();
        });

        test('logs rejected radii', () => {
            expect(() => resolvePublic(new GoldbergPolyhedron(1), -2)).toThrow(InvalidRadiusError);
            expect(warnSpy).toHaveBeenCalledWith(
                '⚠️  [WARNING] Goldberg.resolvedPositions:',
                expect.objectContaining({ field: 'radius', radius: -2, subdivisions: 1 })
            );
        });
    });
});
