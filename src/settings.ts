/** settings for building an OBB tree from faces */
export type BuildSettings = {
    /**
     * Two centroid projections closer than this are treated as equal when splitting.
     * Unit: body-local length
     * @default 1e-6
     */
    splitEpsilon: number;

    /**
     * Depth past which the builder stops looking for a spatial split and splits the face
     * list by index. Keeps pathological inputs from building very deep trees.
     * @default 64
     */
    maxDepth: number;
};

/** settings for collision queries */
export type CollideSettings = {
    /**
     * Gap along a separating axis that must be exceeded before two shapes are considered
     * disjoint; also the minimum length of a candidate axis.
     * Unit: body-local length
     * @default 1e-6
     */
    epsilon: number;
};

export const DEFAULT_SPLIT_EPSILON = 1e-6;
export const DEFAULT_MAX_BUILD_DEPTH = 64;
export const DEFAULT_COLLIDE_EPSILON = 1e-6;

export function createDefaultBuildSettings(): BuildSettings {
    return {
        splitEpsilon: DEFAULT_SPLIT_EPSILON,
        maxDepth: DEFAULT_MAX_BUILD_DEPTH,
    };
}

export function createDefaultCollideSettings(): CollideSettings {
    return {
        epsilon: DEFAULT_COLLIDE_EPSILON,
    };
}
