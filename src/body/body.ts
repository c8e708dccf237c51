import { type Quat, type Vec3, vec3 } from 'mathcat';
import * as face from '../geometry/face';
import type { Face } from '../geometry/face';
import * as obb from '../geometry/obb';
import type { Obb } from '../geometry/obb';
import * as frame from '../math/frame';
import type { Frame } from '../math/frame';
import type { BuildSettings } from '../settings';
import { buildTree } from '../tree/build';
import * as tree from '../tree/tree';
import type { Tree } from '../tree/tree';

/**
 * A rigid body: an OBB tree over the body's faces in body-local coordinates, placed in the
 * world by `frame`.
 *
 * Bodies are values. Moving a body returns a new body that shares the (immutable) tree with
 * the original.
 */
export type Body = {
    readonly frame: Frame;
    readonly tree: Tree<Obb, Face>;
};

export type BodySettings = {
    /** body-local faces, at least one */
    faces: Face[];
    /** @default [0, 0, 0] */
    position?: Vec3;
    /** @default [0, 0, 0, 1] */
    quaternion?: Quat;
    buildSettings?: Partial<BuildSettings>;
};

/** build a body from its faces; the tree is built once here */
export function create(settings: BodySettings): Body {
    return {
        frame: frame.create(settings.position, settings.quaternion),
        tree: buildTree(settings.faces, settings.buildSettings),
    };
}

/** wrap an already built tree, e.g. one restored with `decode` */
export function fromTree(bodyTree: Tree<Obb, Face>, bodyFrame?: Frame): Body {
    return {
        frame: bodyFrame ? frame.clone(bodyFrame) : frame.identity(),
        tree: bodyTree,
    };
}

/**
 * A body that collides with nothing. Its tree is a node holding a box with negative extents
 * over two degenerate faces, so every traversal is pruned at the root.
 */
export function createEmpty(bodyFrame?: Frame): Body {
    const origin = vec3.create();
    const sentinel = tree.node<Obb, Face>(
        obb.createEmpty(),
        tree.leaf(face.create(origin, origin, origin)),
        tree.leaf(face.create(origin, origin, origin)),
    );
    return fromTree(sentinel, bodyFrame);
}

/** a copy of `body` placed at `bodyFrame` */
export function withFrame(body: Body, bodyFrame: Frame): Body {
    return { frame: frame.clone(bodyFrame), tree: body.tree };
}

const _translate_delta = /* @__PURE__ */ frame.identity();

/** move the body by `offset`, expressed in the reference space */
export function translate(body: Body, offset: Vec3): Body {
    vec3.copy(_translate_delta.position, offset);
    return { frame: frame.extrinsic(frame.identity(), body.frame, _translate_delta), tree: body.tree };
}

/**
 * Rotate the body about its own origin by `angle` radians around `axis`, expressed in the
 * reference space. The body's position does not change.
 */
export function rotate(body: Body, axis: Vec3, angle: number): Body {
    const rotation = frame.fromAxisAngle(axis, angle);
    const out = frame.extrinsic(frame.identity(), body.frame, rotation);
    vec3.copy(out.position, body.frame.position);
    return { frame: out, tree: body.tree };
}
