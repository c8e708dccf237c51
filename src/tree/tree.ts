import { assertNever } from '../utils/assert';

export enum TreeType {
    LEAF = 0,
    NODE = 1,
}

/** terminal item holding a leaf payload (a face, for body trees) */
export type Leaf<L> = {
    readonly type: TreeType.LEAF;
    readonly payload: L;
};

/** internal item holding a node payload (a box, for body trees) and exactly two children */
export type Node<N, L> = {
    readonly type: TreeType.NODE;
    readonly payload: N;
    readonly left: Tree<N, L>;
    readonly right: Tree<N, L>;
};

/**
 * Binary tree with one payload type on internal nodes and another on leaves.
 *
 * Never empty at the type level. Trees are built once and never mutated; "changing" a tree
 * means building a new one.
 */
export type Tree<N, L> = Leaf<L> | Node<N, L>;

export function leaf<N, L>(payload: L): Tree<N, L> {
    return { type: TreeType.LEAF, payload };
}

export function node<N, L>(payload: N, left: Tree<N, L>, right: Tree<N, L>): Tree<N, L> {
    return { type: TreeType.NODE, payload, left, right };
}

export function isLeaf<N, L>(tree: Tree<N, L>): tree is Leaf<L> {
    return tree.type === TreeType.LEAF;
}

export function isNode<N, L>(tree: Tree<N, L>): tree is Node<N, L> {
    return tree.type === TreeType.NODE;
}

export function countLeaves<N, L>(tree: Tree<N, L>): number {
    return tree.type === TreeType.LEAF ? 1 : countLeaves(tree.left) + countLeaves(tree.right);
}

/** number of items (nodes and leaves) */
export function countItems<N, L>(tree: Tree<N, L>): number {
    return tree.type === TreeType.LEAF ? 1 : 1 + countItems(tree.left) + countItems(tree.right);
}

/** number of edges on the longest root-to-leaf path; a single leaf has depth 0 */
export function depth<N, L>(tree: Tree<N, L>): number {
    return tree.type === TreeType.LEAF ? 0 : 1 + Math.max(depth(tree.left), depth(tree.right));
}

/** leaf payloads, left to right */
export function leaves<N, L>(tree: Tree<N, L>, out: L[] = []): L[] {
    if (tree.type === TreeType.LEAF) {
        out.push(tree.payload);
    } else {
        leaves(tree.left, out);
        leaves(tree.right, out);
    }
    return out;
}

/** structural equality, comparing payloads with the given functions */
export function equals<N, L>(
    a: Tree<N, L>,
    b: Tree<N, L>,
    nodeEquals: (a: N, b: N) => boolean,
    leafEquals: (a: L, b: L) => boolean,
): boolean {
    switch (a.type) {
        case TreeType.LEAF:
            return b.type === TreeType.LEAF && leafEquals(a.payload, b.payload);
        case TreeType.NODE:
            return (
                b.type === TreeType.NODE &&
                nodeEquals(a.payload, b.payload) &&
                equals(a.left, b.left, nodeEquals, leafEquals) &&
                equals(a.right, b.right, nodeEquals, leafEquals)
            );
        default:
            return assertNever(a, 'unknown tree type');
    }
}
