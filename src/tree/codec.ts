import * as face from '../geometry/face';
import type { Face } from '../geometry/face';
import * as obb from '../geometry/obb';
import type { Obb } from '../geometry/obb';
import * as frame from '../math/frame';
import * as tree from './tree';
import type { Tree } from './tree';
import { TreeType } from './tree';

/*
 * Flat pre-order encoding of a tree:
 *
 *   [FORMAT_VERSION, itemCount, tag, ...payload, tag, ...payload, ...]
 *
 * Each item is its tag followed by the fixed-stride fields of its payload; a node is followed
 * by its left subtree, then its right subtree. Numbers are stored as they are, so decoding
 * restores every value exactly (including -0 and NaN).
 */

export const FORMAT_VERSION = 1;

export const TAG_LEAF = TreeType.LEAF;
export const TAG_NODE = TreeType.NODE;

const HEADER_SIZE = 2;

/** thrown when a buffer cannot be decoded; `offset` is where decoding stopped */
export class CodecError extends Error {
    readonly offset: number;

    constructor(message: string, offset: number) {
        super(`${message} (at offset ${offset})`);
        this.name = 'CodecError';
        this.offset = offset;
    }
}

/** fixed-size serialization of one payload type */
export type PayloadCodec<T> = {
    /** number of buffer entries one payload occupies */
    stride: number;
    /** append exactly `stride` numbers describing `value` */
    write: (out: number[], value: T) => void;
    /** read a payload from the `stride` numbers starting at `offset` */
    read: (buffer: ArrayLike<number>, offset: number) => T;
};

export type TreeCodecs<N, L> = {
    node: PayloadCodec<N>;
    leaf: PayloadCodec<L>;
};

export function encodeTree<N, L>(t: Tree<N, L>, codecs: TreeCodecs<N, L>): number[] {
    const out: number[] = [FORMAT_VERSION, 0];
    let itemCount = 0;

    const stack: Tree<N, L>[] = [t];
    while (stack.length > 0) {
        const item = stack.pop();
        if (item === undefined) break;
        itemCount++;

        out.push(item.type);
        if (item.type === TreeType.LEAF) {
            codecs.leaf.write(out, item.payload);
        } else {
            codecs.node.write(out, item.payload);
            stack.push(item.right, item.left);
        }
    }

    out[1] = itemCount;
    return out;
}

type DecodeState = {
    offset: number;
    remaining: number;
};

/** a decoded node still waiting for one or both of its children */
type PendingNode<N, L> = {
    payload: N;
    left: Tree<N, L> | undefined;
};

export function decodeTree<N, L>(buffer: ArrayLike<number>, codecs: TreeCodecs<N, L>): Tree<N, L> {
    if (buffer.length < HEADER_SIZE) {
        throw new CodecError(`buffer of length ${buffer.length} is shorter than the header`, 0);
    }
    if (buffer[0] !== FORMAT_VERSION) {
        throw new CodecError(`unsupported format version ${buffer[0]}, expected ${FORMAT_VERSION}`, 0);
    }
    const itemCount = buffer[1];
    if (!Number.isInteger(itemCount) || itemCount < 1) {
        throw new CodecError(`invalid item count ${itemCount}`, 1);
    }

    const state: DecodeState = { offset: HEADER_SIZE, remaining: itemCount };
    const pending: PendingNode<N, L>[] = [];
    let result: Tree<N, L> | undefined;

    while (result === undefined) {
        const offset = state.offset;
        if (offset >= buffer.length) {
            throw new CodecError('unexpected end of buffer, expected an item tag', offset);
        }
        if (state.remaining === 0) {
            throw new CodecError('more items than the header declares', offset);
        }
        state.remaining--;

        const tag = buffer[offset];
        if (tag === TAG_NODE) {
            pending.push({ payload: readPayload(buffer, codecs.node, state), left: undefined });
            continue;
        }
        if (tag !== TAG_LEAF) {
            throw new CodecError(`unknown item tag ${tag}`, offset);
        }

        // a finished subtree becomes the left child of the innermost pending node, or completes it
        let completed: Tree<N, L> | undefined = tree.leaf<N, L>(readPayload(buffer, codecs.leaf, state));
        while (completed !== undefined) {
            const parent = pending.pop();
            if (parent === undefined) {
                result = completed;
                break;
            }
            if (parent.left === undefined) {
                parent.left = completed;
                pending.push(parent);
                completed = undefined;
            } else {
                completed = tree.node(parent.payload, parent.left, completed);
            }
        }
    }

    if (state.remaining !== 0) {
        throw new CodecError(`header declares ${itemCount} items, decoded ${itemCount - state.remaining}`, 1);
    }
    if (state.offset !== buffer.length) {
        throw new CodecError(`${buffer.length - state.offset} trailing entries`, state.offset);
    }

    return result;
}

function readPayload<T>(buffer: ArrayLike<number>, codec: PayloadCodec<T>, state: DecodeState): T {
    const start = state.offset + 1;
    if (start + codec.stride > buffer.length) {
        throw new CodecError(`unexpected end of buffer, payload needs ${codec.stride} entries`, start);
    }
    state.offset = start + codec.stride;
    return codec.read(buffer, start);
}

/* body tree payloads */

// obb layout
const OFFSET_HALF_EXTENTS = 0;
const OFFSET_POSITION = 3;
const OFFSET_QUATERNION = 6;
const OBB_STRIDE = 10;

export const obbCodec: PayloadCodec<Obb> = {
    stride: OBB_STRIDE,
    write: (out, value) => {
        const { halfExtents, frame: f } = value;
        out.push(halfExtents[0], halfExtents[1], halfExtents[2]);
        out.push(f.position[0], f.position[1], f.position[2]);
        out.push(f.quaternion[0], f.quaternion[1], f.quaternion[2], f.quaternion[3]);
    },
    read: (buffer, offset) => {
        const h = offset + OFFSET_HALF_EXTENTS;
        const p = offset + OFFSET_POSITION;
        const q = offset + OFFSET_QUATERNION;
        return obb.create(
            [buffer[h], buffer[h + 1], buffer[h + 2]],
            frame.create([buffer[p], buffer[p + 1], buffer[p + 2]], [buffer[q], buffer[q + 1], buffer[q + 2], buffer[q + 3]]),
        );
    },
};

// face layout: p, q, r
const FACE_STRIDE = 9;

export const faceCodec: PayloadCodec<Face> = {
    stride: FACE_STRIDE,
    write: (out, value) => {
        out.push(value.p[0], value.p[1], value.p[2]);
        out.push(value.q[0], value.q[1], value.q[2]);
        out.push(value.r[0], value.r[1], value.r[2]);
    },
    read: (buffer, offset) =>
        face.create(
            [buffer[offset], buffer[offset + 1], buffer[offset + 2]],
            [buffer[offset + 3], buffer[offset + 4], buffer[offset + 5]],
            [buffer[offset + 6], buffer[offset + 7], buffer[offset + 8]],
        ),
};

const bodyTreeCodecs: TreeCodecs<Obb, Face> = { node: obbCodec, leaf: faceCodec };

/** encode a body tree */
export function encode(t: Tree<Obb, Face>): number[] {
    return encodeTree(t, bodyTreeCodecs);
}

/**
 * decode a body tree written by {@link encode}
 * @throws CodecError on malformed input
 */
export function decode(buffer: ArrayLike<number>): Tree<Obb, Face> {
    return decodeTree(buffer, bodyTreeCodecs);
}
