import type { Tree } from '../tree/tree';
import { TreeType } from '../tree/tree';

/**
 * Pairwise overlap tests used to prune a simultaneous traversal of two trees.
 *
 * The first argument always comes from the first tree, the second from the second tree.
 * Node tests only gate descent: a `false` prunes the pair, a `true` means the children may
 * still overlap. Only `leafLeaf` decides a collision.
 */
export type CollidePredicates<N, L> = {
    nodeNode: (a: N, b: N) => boolean;
    leafLeaf: (a: L, b: L) => boolean;
    nodeLeaf: (a: N, b: L) => boolean;
    leafNode: (a: L, b: N) => boolean;
};

/**
 * True iff some leaf of `a` and some leaf of `b` satisfy `leafLeaf`, visiting only pairs whose
 * enclosing nodes pass their gate.
 *
 * Children are visited left before right; for two nodes the pairs are tried in the order
 * (left, left), (left, right), (right, left), (right, right), stopping at the first hit.
 */
export function collideRecurse<N, L>(a: Tree<N, L>, b: Tree<N, L>, predicates: CollidePredicates<N, L>): boolean {
    if (a.type === TreeType.LEAF) {
        if (b.type === TreeType.LEAF) {
            return predicates.leafLeaf(a.payload, b.payload);
        }
        return (
            predicates.leafNode(a.payload, b.payload) &&
            (collideRecurse(a, b.left, predicates) || collideRecurse(a, b.right, predicates))
        );
    }

    if (b.type === TreeType.LEAF) {
        return (
            predicates.nodeLeaf(a.payload, b.payload) &&
            (collideRecurse(a.left, b, predicates) || collideRecurse(a.right, b, predicates))
        );
    }

    return (
        predicates.nodeNode(a.payload, b.payload) &&
        (collideRecurse(a.left, b.left, predicates) ||
            collideRecurse(a.left, b.right, predicates) ||
            collideRecurse(a.right, b.left, predicates) ||
            collideRecurse(a.right, b.right, predicates))
    );
}

/** called for every pair of subtrees found to collide, deepest pairs first */
export type OnHit<N, L> = (a: Tree<N, L>, b: Tree<N, L>) => void;

/**
 * Same gates as {@link collideRecurse} but without stopping at the first hit: every child pair
 * is explored, and `onHit` is called for each pair (leaf pairs and the node pairs above them)
 * that resolves to true.
 *
 * @returns the same value {@link collideRecurse} would return
 */
export function collideRecurseAll<N, L>(
    a: Tree<N, L>,
    b: Tree<N, L>,
    predicates: CollidePredicates<N, L>,
    onHit: OnHit<N, L>,
): boolean {
    let hit: boolean;

    if (a.type === TreeType.LEAF) {
        if (b.type === TreeType.LEAF) {
            hit = predicates.leafLeaf(a.payload, b.payload);
        } else if (!predicates.leafNode(a.payload, b.payload)) {
            hit = false;
        } else {
            const left = collideRecurseAll(a, b.left, predicates, onHit);
            const right = collideRecurseAll(a, b.right, predicates, onHit);
            hit = left || right;
        }
    } else if (b.type === TreeType.LEAF) {
        if (!predicates.nodeLeaf(a.payload, b.payload)) {
            hit = false;
        } else {
            const left = collideRecurseAll(a.left, b, predicates, onHit);
            const right = collideRecurseAll(a.right, b, predicates, onHit);
            hit = left || right;
        }
    } else if (!predicates.nodeNode(a.payload, b.payload)) {
        hit = false;
    } else {
        const ll = collideRecurseAll(a.left, b.left, predicates, onHit);
        const lr = collideRecurseAll(a.left, b.right, predicates, onHit);
        const rl = collideRecurseAll(a.right, b.left, predicates, onHit);
        const rr = collideRecurseAll(a.right, b.right, predicates, onHit);
        hit = ll || lr || rl || rr;
    }

    if (hit) onHit(a, b);

    return hit;
}
