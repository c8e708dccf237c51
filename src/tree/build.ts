import { type Vec3, vec3 } from 'mathcat';
import * as face from '../geometry/face';
import type { Face } from '../geometry/face';
import * as obb from '../geometry/obb';
import type { Obb } from '../geometry/obb';
import { type BuildSettings, createDefaultBuildSettings, DEFAULT_SPLIT_EPSILON } from '../settings';
import { assert } from '../utils/assert';
import { createLogger } from '../utils/logger';
import * as tree from './tree';
import type { Tree } from './tree';

const log = createLogger('build');

/** a value to partition, located by the centroid that gets projected onto the split axis */
export type SplitItem<T> = {
    value: T;
    centroid: Vec3;
};

/** the two halves of a split; input order is preserved inside each half */
export type SplitResult<T> = {
    first: T[];
    second: T[];
};

/**
 * Partition `items` around the median of their centroids projected onto `axis`.
 *
 * - the boundary index is `N / 2` for even `N` and `ceil(N / 2)` for odd `N`, so an odd count
 *   puts the extra item in the first half
 * - the median value is the projection at that boundary in sorted order
 * - items below the median, or within `epsilon` of it, go to `first`; the rest go to `second`
 * - a group tied with the median is never split: if it would leave `second` empty (the median
 *   ties with the largest projection) the whole tied group goes to `second` instead
 *
 * The result classifies membership only: each half keeps the input order.
 *
 * @returns null when the projections carry no separating information along `axis`, i.e. when
 * they all lie within `epsilon` of each other
 */
export function projectAndSplit<T>(axis: Vec3, items: SplitItem<T>[], epsilon = DEFAULT_SPLIT_EPSILON): SplitResult<T> | null {
    assert(items.length > 0, 'projectAndSplit requires at least one item');

    const projections = items.map((item) => vec3.dot(item.centroid, axis));

    let min = Infinity;
    let max = -Infinity;
    for (const p of projections) {
        if (p < min) min = p;
        if (p > max) max = p;
    }
    if (!(max - min >= epsilon)) return null;

    const sorted = [...projections].sort((a, b) => a - b);
    const boundary = Math.ceil(items.length / 2);
    const median = sorted[boundary - 1];

    const tiedWithMedian = (p: number) => Math.abs(p - median) < epsilon;

    const split = partition(items, projections, (p) => p < median || tiedWithMedian(p));
    if (split.second.length > 0) return split;

    const tiesLast = partition(items, projections, (p) => p < median && !tiedWithMedian(p));
    if (tiesLast.first.length > 0 && tiesLast.second.length > 0) return tiesLast;

    // projections spread wider than epsilon, yet all within epsilon of the median
    return null;
}

function partition<T>(items: SplitItem<T>[], projections: number[], inFirst: (projection: number) => boolean): SplitResult<T> {
    const first: T[] = [];
    const second: T[] = [];
    for (let i = 0; i < items.length; i++) {
        if (inFirst(projections[i])) {
            first.push(items[i].value);
        } else {
            second.push(items[i].value);
        }
    }
    return { first, second };
}

/** first `ceil(N / 2)` values, then the rest */
export function splitByIndex<T>(values: T[]): SplitResult<T> {
    const boundary = Math.ceil(values.length / 2);
    return { first: values.slice(0, boundary), second: values.slice(boundary) };
}

/**
 * Build an OBB tree over `faces`.
 *
 * Each internal node carries a box fitted around all faces below it. Faces are split at the
 * projected median of their centroids along the node box's axes, longest axis first; when
 * no axis separates the centroids (coplanar or coincident faces) the list is split by index.
 * The faces are copied, so the tree owns its geometry.
 *
 * @throws if `faces` is empty
 */
export function buildTree(faces: Face[], settings?: Partial<BuildSettings>): Tree<Obb, Face> {
    assert(faces.length > 0, 'buildTree requires at least one face');

    const resolved: BuildSettings = { ...createDefaultBuildSettings(), ...settings };
    const owned = faces.map(face.clone);

    const state: BuildState = { settings: resolved, depthLimited: false };
    const result = buildRecursive(owned, state, 0);

    if (state.depthLimited) {
        log.warn(`reached maxDepth ${resolved.maxDepth}, deeper faces were split by index`, { operation: 'buildTree' });
    }
    log.info(`built tree over ${owned.length} faces`, {
        operation: 'buildTree',
        data: { depth: tree.depth(result), items: tree.countItems(result) },
    });

    return result;
}

type BuildState = {
    settings: BuildSettings;
    depthLimited: boolean;
};

function buildRecursive(faces: Face[], state: BuildState, depth: number): Tree<Obb, Face> {
    if (faces.length === 1) {
        return tree.leaf<Obb, Face>(faces[0]);
    }

    const { settings } = state;
    const box = obb.fitFaces(faces);

    if (depth >= settings.maxDepth) {
        state.depthLimited = true;
    }
    const spatial = depth < settings.maxDepth ? splitAlongBoxAxes(faces, box, settings.splitEpsilon) : null;
    if (spatial === null) {
        log.debug(`no separating axis for ${faces.length} faces at depth ${depth}, splitting by index`, {
            operation: 'buildTree',
        });
    }
    const { first, second } = spatial ?? splitByIndex(faces);

    return tree.node(box, buildRecursive(first, state, depth + 1), buildRecursive(second, state, depth + 1));
}

const _split_axis = /* @__PURE__ */ vec3.create();

function splitAlongBoxAxes(faces: Face[], box: Obb, epsilon: number): SplitResult<Face> | null {
    const items: SplitItem<Face>[] = faces.map((f) => ({ value: f, centroid: face.centroid(vec3.create(), f) }));

    // longest axis first, ties keep axis order
    const order = [0, 1, 2].sort((a, b) => box.halfExtents[b] - box.halfExtents[a]);

    for (const axisIndex of order) {
        obb.axis(_split_axis, box, axisIndex);
        const split = projectAndSplit(_split_axis, items, epsilon);
        if (split !== null) return split;
    }

    return null;
}

export type BuildStats = {
    /** number of leaves, equal to the face count */
    leafCount: number;
    /** number of internal nodes */
    nodeCount: number;
    /** longest root-to-leaf path */
    depth: number;
};

export function getBuildStats<N, L>(t: Tree<N, L>): BuildStats {
    const leafCount = tree.countLeaves(t);
    return {
        leafCount,
        nodeCount: tree.countItems(t) - leafCount,
        depth: tree.depth(t),
    };
}
