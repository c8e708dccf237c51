import { describe, expect, test } from 'vitest';
import { buildTree, CodecError, codec, type Face, face, frame, type Obb, obb, type Tree, tree } from '../../src';

const sameFace = (a: Face, b: Face) => face.equals(a, b);
const sameObb = (a: Obb, b: Obb) => obb.equals(a, b);

/** decode and return the thrown CodecError */
const decodeError = (buffer: number[]): CodecError => {
    try {
        codec.decode(buffer);
    } catch (error) {
        if (error instanceof CodecError) return error;
        throw error;
    }
    throw new Error('expected decode to fail');
};

const numberCodec: codec.PayloadCodec<number> = {
    stride: 1,
    write: (out, value) => {
        out.push(value);
    },
    read: (buffer, offset) => buffer[offset],
};

const numberCodecs: codec.TreeCodecs<number, number> = { node: numberCodec, leaf: numberCodec };

describe('codec', () => {
    test('single leaf layout', () => {
        const t = tree.leaf<Obb, Face>(face.create([1, 2, 3], [4, 5, 6], [7, 8, 9]));
        expect(codec.encode(t)).toEqual([codec.FORMAT_VERSION, 1, codec.TAG_LEAF, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    });

    test('pre-order layout of a generic tree', () => {
        const t = tree.node<number, number>(5, tree.leaf(1), tree.node(6, tree.leaf(2), tree.leaf(3)));
        const buffer = codec.encodeTree(t, numberCodecs);

        expect(buffer).toEqual([1, 5, 1, 5, 0, 1, 1, 6, 0, 2, 0, 3]);
        expect(tree.equals(codec.decodeTree(buffer, numberCodecs), t, Object.is, Object.is)).toBe(true);
    });

    test('round-trips a built tree', () => {
        const t = buildTree(face.boxFaces([3, 2, 1]));
        const buffer = codec.encode(t);

        // header, 11 nodes of tag + 10, 12 leaves of tag + 9
        expect(buffer).toHaveLength(2 + 11 * 11 + 12 * 10);
        expect(tree.equals(codec.decode(buffer), t, sameObb, sameFace)).toBe(true);
    });

    test('preserves -0, NaN and infinities', () => {
        const t = tree.node<Obb, Face>(
            obb.create([-0, Number.NaN, 1], frame.create([Number.POSITIVE_INFINITY, 0, -0])),
            tree.leaf(face.create([-0, 0, 0], [Number.NaN, 1, 2], [3, Number.NEGATIVE_INFINITY, 4])),
            tree.leaf(face.create([0, 0, 0], [1, 0, 0], [0, 1, 0])),
        );
        const buffer = codec.encode(t);
        const decoded = codec.decode(buffer);

        expect(decoded.type).toBe(tree.TreeType.NODE);
        if (decoded.type !== tree.TreeType.NODE || decoded.left.type !== tree.TreeType.LEAF) return;

        expect(Object.is(decoded.payload.halfExtents[0], -0)).toBe(true);
        expect(decoded.payload.halfExtents[1]).toBeNaN();
        expect(decoded.payload.frame.position[0]).toBe(Number.POSITIVE_INFINITY);
        expect(Object.is(decoded.payload.frame.position[2], -0)).toBe(true);
        expect(Object.is(decoded.left.payload.p[0], -0)).toBe(true);
        expect(decoded.left.payload.q[0]).toBeNaN();
        expect(decoded.left.payload.r[1]).toBe(Number.NEGATIVE_INFINITY);

        const again = codec.encode(decoded);
        expect(again).toHaveLength(buffer.length);
        again.forEach((value, i) => expect(Object.is(value, buffer[i])).toBe(true));
    });

    test('decodes a chain deeper than the call stack', () => {
        const length = 100_000;
        let chain = tree.leaf<number, number>(-1);
        for (let i = 0; i < length; i++) {
            chain = tree.node(i, tree.leaf(i), chain);
        }

        const decoded = codec.decodeTree(codec.encodeTree(chain, numberCodecs), numberCodecs);

        let item = decoded;
        let depth = 0;
        while (item.type === tree.TreeType.NODE) {
            if (item.payload !== length - 1 - depth || item.left.type !== tree.TreeType.LEAF) break;
            item = item.right;
            depth++;
        }
        expect(depth).toBe(length);
        expect(item).toEqual(tree.leaf(-1));
    });

    describe('malformed input', () => {
        const leafBuffer = codec.encode(tree.leaf<Obb, Face>(face.create([0, 0, 0], [1, 0, 0], [0, 1, 0])));

        test('shorter than the header', () => {
            expect(decodeError([1]).offset).toBe(0);
        });

        test('unsupported version', () => {
            const error = decodeError([2, ...leafBuffer.slice(1)]);
            expect(error.offset).toBe(0);
            expect(error.message).toBe('unsupported format version 2, expected 1 (at offset 0)');
        });

        test('invalid item count', () => {
            expect(decodeError([1, 0, ...leafBuffer.slice(2)]).offset).toBe(1);
            expect(decodeError([1, 1.5, ...leafBuffer.slice(2)]).offset).toBe(1);
        });

        test('unknown tag', () => {
            const error = decodeError([1, 1, 7, ...leafBuffer.slice(3)]);
            expect(error.offset).toBe(2);
            expect(error.name).toBe('CodecError');
        });

        test('truncated payload', () => {
            expect(decodeError(leafBuffer.slice(0, -1)).offset).toBe(3);
        });

        test('missing child', () => {
            const nodeOnly = [1, 3, codec.TAG_NODE, ...new Array<number>(10).fill(0)];
            expect(decodeError(nodeOnly).offset).toBe(13);
        });

        test('trailing data', () => {
            expect(decodeError([...leafBuffer, 0]).offset).toBe(leafBuffer.length);
        });

        test('item count does not match', () => {
            expect(decodeError([1, 2, ...leafBuffer.slice(2)]).offset).toBe(1);
        });
    });
});
