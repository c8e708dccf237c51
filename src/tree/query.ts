import type { Tree } from './tree';
import { TreeType } from './tree';

/**
 * Pre-order numbering of a tree's items: the root is 0, a node is followed by its whole left
 * subtree, then its right subtree. Ids are stable for a given tree, so they can label items
 * across queries (e.g. collision hits and drawables).
 */
export type TreeIndex<N, L> = {
    /** item → pre-order id */
    ids: Map<Tree<N, L>, number>;
    /** pre-order id → item */
    items: Tree<N, L>[];
};

export function createTreeIndex<N, L>(tree: Tree<N, L>): TreeIndex<N, L> {
    const index: TreeIndex<N, L> = { ids: new Map(), items: [] };

    const stack: Tree<N, L>[] = [tree];
    while (stack.length > 0) {
        const item = stack.pop();
        if (item === undefined) break;

        index.ids.set(item, index.items.length);
        index.items.push(item);

        if (item.type === TreeType.NODE) {
            stack.push(item.right, item.left);
        }
    }

    return index;
}

export type NodeDrawable<N> = {
    kind: 'node';
    id: number;
    depth: number;
    obb: N;
};

export type LeafDrawable<L> = {
    kind: 'leaf';
    id: number;
    depth: number;
    face: L;
};

/** a tree item to render, tagged with its pre-order id and its depth (root is 0) */
export type Drawable<N, L> = NodeDrawable<N> | LeafDrawable<L>;

/** every item at depth `<= maxDepth`, in pre-order */
export function getDrawables<N, L>(tree: Tree<N, L>, maxDepth = Infinity): Drawable<N, L>[] {
    const out: Drawable<N, L>[] = [];
    collectDrawables(tree, 0, maxDepth, { next: 0 }, out);
    return out;
}

function collectDrawables<N, L>(
    item: Tree<N, L>,
    depth: number,
    maxDepth: number,
    counter: { next: number },
    out: Drawable<N, L>[],
): void {
    const id = counter.next++;

    if (item.type === TreeType.LEAF) {
        if (depth <= maxDepth) out.push({ kind: 'leaf', id, depth, face: item.payload });
        return;
    }

    if (depth <= maxDepth) out.push({ kind: 'node', id, depth, obb: item.payload });

    // ids keep counting below the cutoff so they match createTreeIndex
    collectDrawables(item.left, depth + 1, maxDepth, counter, out);
    collectDrawables(item.right, depth + 1, maxDepth, counter, out);
}

/** the drawables whose ids are in `hits`, in their original order */
export function filterDrawables<N, L>(drawables: Drawable<N, L>[], hits: ReadonlySet<number>): Drawable<N, L>[] {
    return drawables.filter((drawable) => hits.has(drawable.id));
}
