/**
 * Packed index: one integer key for a (seed face, lattice triangle) pair.
 *
 * The low 5 bits hold the seed face id and the remaining bits the lattice
 * index, so keys sort by lattice index first and can be used directly as
 * dense array or Map keys.
 */
import goldbergConfig from '../../config/goldberg';
import { InvalidPackedIndexError } from '../../utils/errorHandler';
import { SEED_FACES } from '../../../shared/goldbergConfig';

export type PackedIndex = number;

const FACE_BITS = 5;
const FACE_MASK = (1 << FACE_BITS) - 1;

/** Largest key pack() can return: keys live in the positive 32-bit integers */
const MAX_KEY = 0x7fffffff;

/** Number of face slots a packed key can address */
export const FACE_SLOTS = 1 << FACE_BITS;

export function pack(face: number, vertex: number): PackedIndex {
    if (goldbergConfig.debugChecks) {
        if (!Number.isInteger(face) || face < 0 || face >= FACE_SLOTS) {
            throw new InvalidPackedIndexError(`Face id ${face} does not fit in ${FACE_BITS} bits`, face);
        }
        if (!Number.isInteger(vertex) || vertex < 0 || vertex > (MAX_KEY >> FACE_BITS)) {
            throw new InvalidPackedIndexError(`Lattice index ${vertex} cannot be packed`, vertex);
        }
    }
    return (vertex << FACE_BITS) | face;
}

export function face(index: PackedIndex): number {
    return index & FACE_MASK;
}

export function vertex(index: PackedIndex): number {
    return index >> FACE_BITS;
}

export function unpack(index: PackedIndex): { face: number; vertex: number } {
    if (goldbergConfig.debugChecks && (!Number.isInteger(index) || index < 0 || index > MAX_KEY)) {
        throw new InvalidPackedIndexError(`Packed index ${index} was not produced by pack()`, index);
    }
    return { face: face(index), vertex: vertex(index) };
}

/**
 * Reject keys whose face slot is not one of the icosahedron's faces
 */
export function assertSeedFace(index: PackedIndex): void {
    const f = face(index);
    if (f >= SEED_FACES) {
        throw new InvalidPackedIndexError(`Packed index ${index} names face ${f}, but the seed has ${SEED_FACES} faces`, index);
    }
}
