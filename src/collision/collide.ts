import type { Body } from '../body/body';
import * as face from '../geometry/face';
import type { Face } from '../geometry/face';
import * as obb from '../geometry/obb';
import type { Obb } from '../geometry/obb';
import * as frame from '../math/frame';
import type { Frame } from '../math/frame';
import { type CollideSettings, createDefaultCollideSettings } from '../settings';
import { createTreeIndex } from '../tree/query';
import { type CollidePredicates, collideRecurse, collideRecurseAll } from './collide-recurse';
import { faceVsFace, faceVsObb, obbVsFace, obbVsObb } from './predicates';

const _obbB = /* @__PURE__ */ obb.create([0, 0, 0]);
const _faceB = /* @__PURE__ */ face.create([0, 0, 0], [0, 0, 0], [0, 0, 0]);

/**
 * Predicates for traversing two body trees, with the second tree's payloads mapped into the
 * first tree's local space by `relative` (the pose of B in A's local space).
 */
export function createCollidePredicates(relative: Frame, settings?: Partial<CollideSettings>): CollidePredicates<Obb, Face> {
    const { epsilon } = { ...createDefaultCollideSettings(), ...settings };
    const rel = frame.clone(relative);

    return {
        nodeNode: (a, b) => obbVsObb(a, obb.transform(_obbB, b, rel), epsilon),
        leafLeaf: (a, b) => faceVsFace(a, face.transform(_faceB, b, rel), epsilon),
        nodeLeaf: (a, b) => obbVsFace(a, face.transform(_faceB, b, rel), epsilon),
        leafNode: (a, b) => faceVsObb(a, obb.transform(_obbB, b, rel), epsilon),
    };
}

function predicatesFor(bodyA: Body, bodyB: Body, settings?: Partial<CollideSettings>): CollidePredicates<Obb, Face> {
    return createCollidePredicates(frame.relative(frame.identity(), bodyA.frame, bodyB.frame), settings);
}

/** true iff some face of `bodyA` overlaps some face of `bodyB` at their current frames */
export function collide(bodyA: Body, bodyB: Body, settings?: Partial<CollideSettings>): boolean {
    return collideRecurse(bodyA.tree, bodyB.tree, predicatesFor(bodyA, bodyB, settings));
}

export type CollideHitsResult = {
    colliding: boolean;
    /** pre-order ids of `bodyA`'s tree items that took part in a colliding pair */
    a: Set<number>;
    /** pre-order ids of `bodyB`'s tree items that took part in a colliding pair */
    b: Set<number>;
};

/**
 * Like {@link collide}, but explores every colliding pair and reports which items of each
 * tree were involved, for highlighting.
 */
export function collideHits(bodyA: Body, bodyB: Body, settings?: Partial<CollideSettings>): CollideHitsResult {
    const indexA = createTreeIndex(bodyA.tree);
    const indexB = createTreeIndex(bodyB.tree);
    const result: CollideHitsResult = { colliding: false, a: new Set(), b: new Set() };

    result.colliding = collideRecurseAll(bodyA.tree, bodyB.tree, predicatesFor(bodyA, bodyB, settings), (subA, subB) => {
        const idA = indexA.ids.get(subA);
        const idB = indexB.ids.get(subB);
        if (idA !== undefined) result.a.add(idA);
        if (idB !== undefined) result.b.add(idB);
    });

    return result;
}
