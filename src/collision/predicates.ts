import { type Vec3, vec3 } from 'mathcat';
import type { Face } from '../geometry/face';
import * as obb from '../geometry/obb';
import type { Obb } from '../geometry/obb';
import { DEFAULT_COLLIDE_EPSILON } from '../settings';

/*
 * Separating-axis tests between boxes and triangles.
 *
 * Both shapes must be given in one common frame. On each candidate axis the projections are
 * compared; a gap larger than `epsilon` separates the shapes, so touching shapes count as
 * overlapping. A candidate axis built as `u × v` is skipped when `|u × v| < epsilon |u| |v|`
 * (near-parallel edges, normals of degenerate triangles), so the cutoff follows the size of
 * the shapes and not their units. If no axis separates, the shapes overlap.
 */

const _axis = /* @__PURE__ */ vec3.create();

/**
 * normalizes `axis` in place, returns false when it is too short to use; `scale` is the
 * product of the lengths of the vectors it was crossed from
 */
function normalizeAxis(axis: Vec3, scale: number, epsilon: number): boolean {
    const length = vec3.length(axis);
    if (!(length > 0 && length >= epsilon * scale)) return false;
    vec3.scale(axis, axis, 1 / length);
    return true;
}

/** projection radius of a box onto a unit axis */
function boxRadius(axes: Vec3[], halfExtents: Vec3, axis: Vec3): number {
    return (
        halfExtents[0] * Math.abs(vec3.dot(axes[0], axis)) +
        halfExtents[1] * Math.abs(vec3.dot(axes[1], axis)) +
        halfExtents[2] * Math.abs(vec3.dot(axes[2], axis))
    );
}

/* box vs box */

const _obbVsObb_axesA = /* @__PURE__ */ [vec3.create(), vec3.create(), vec3.create()];
const _obbVsObb_axesB = /* @__PURE__ */ [vec3.create(), vec3.create(), vec3.create()];
const _obbVsObb_offset = /* @__PURE__ */ vec3.create();

function obbsSeparatedOnAxis(a: Obb, b: Obb, axis: Vec3, epsilon: number): boolean {
    if (!normalizeAxis(axis, 1, epsilon)) return false;
    const distance = Math.abs(vec3.dot(_obbVsObb_offset, axis));
    const radiusA = boxRadius(_obbVsObb_axesA, a.halfExtents, axis);
    const radiusB = boxRadius(_obbVsObb_axesB, b.halfExtents, axis);
    return distance > radiusA + radiusB + epsilon;
}

/**
 * Box vs box overlap on 15 candidate axes: the 3 face normals of each box and the 9 cross
 * products of their axes.
 */
export function obbVsObb(a: Obb, b: Obb, epsilon = DEFAULT_COLLIDE_EPSILON): boolean {
    const axesA = _obbVsObb_axesA;
    const axesB = _obbVsObb_axesB;
    for (let i = 0; i < 3; i++) {
        obb.axis(axesA[i], a, i);
        obb.axis(axesB[i], b, i);
    }
    vec3.subtract(_obbVsObb_offset, b.frame.position, a.frame.position);

    for (let i = 0; i < 3; i++) {
        if (obbsSeparatedOnAxis(a, b, vec3.copy(_axis, axesA[i]), epsilon)) return false;
    }
    for (let i = 0; i < 3; i++) {
        if (obbsSeparatedOnAxis(a, b, vec3.copy(_axis, axesB[i]), epsilon)) return false;
    }
    for (let i = 0; i < 3; i++) {
        for (let j = 0; j < 3; j++) {
            if (obbsSeparatedOnAxis(a, b, vec3.cross(_axis, axesA[i], axesB[j]), epsilon)) return false;
        }
    }

    return true;
}

/* box vs triangle */

const _obbVsFace_axes = /* @__PURE__ */ [vec3.create(), vec3.create(), vec3.create()];
const _obbVsFace_vertices = /* @__PURE__ */ [vec3.create(), vec3.create(), vec3.create()];
const _obbVsFace_edges = /* @__PURE__ */ [vec3.create(), vec3.create(), vec3.create()];
const _obbVsFace_edgeLengths = /* @__PURE__ */ [0, 0, 0];

function obbFaceSeparatedOnAxis(box: Obb, axis: Vec3, scale: number, epsilon: number): boolean {
    if (!normalizeAxis(axis, scale, epsilon)) return false;

    const radius = boxRadius(_obbVsFace_axes, box.halfExtents, axis);

    // triangle vertices are relative to the box center
    const v = _obbVsFace_vertices;
    const p0 = vec3.dot(v[0], axis);
    const p1 = vec3.dot(v[1], axis);
    const p2 = vec3.dot(v[2], axis);
    const min = Math.min(p0, p1, p2);
    const max = Math.max(p0, p1, p2);

    return min > radius + epsilon || max < -radius - epsilon;
}

/**
 * Box vs triangle overlap on 13 candidate axes: the 3 box axes, the triangle normal and the
 * 9 cross products of triangle edges with box axes.
 */
export function obbVsFace(box: Obb, face: Face, epsilon = DEFAULT_COLLIDE_EPSILON): boolean {
    const axes = _obbVsFace_axes;
    const v = _obbVsFace_vertices;
    const e = _obbVsFace_edges;

    for (let i = 0; i < 3; i++) {
        obb.axis(axes[i], box, i);
    }

    vec3.subtract(v[0], face.p, box.frame.position);
    vec3.subtract(v[1], face.q, box.frame.position);
    vec3.subtract(v[2], face.r, box.frame.position);

    vec3.subtract(e[0], v[1], v[0]);
    vec3.subtract(e[1], v[2], v[1]);
    vec3.subtract(e[2], v[0], v[2]);

    const lengths = _obbVsFace_edgeLengths;
    for (let i = 0; i < 3; i++) {
        lengths[i] = vec3.length(e[i]);
    }

    for (let i = 0; i < 3; i++) {
        if (obbFaceSeparatedOnAxis(box, vec3.copy(_axis, axes[i]), 1, epsilon)) return false;
    }

    if (obbFaceSeparatedOnAxis(box, vec3.cross(_axis, e[0], e[1]), lengths[0] * lengths[1], epsilon)) return false;

    for (let i = 0; i < 3; i++) {
        for (let j = 0; j < 3; j++) {
            if (obbFaceSeparatedOnAxis(box, vec3.cross(_axis, e[i], axes[j]), lengths[i], epsilon)) return false;
        }
    }

    return true;
}

/** argument-swapped {@link obbVsFace} */
export function faceVsObb(face: Face, box: Obb, epsilon = DEFAULT_COLLIDE_EPSILON): boolean {
    return obbVsFace(box, face, epsilon);
}

/* triangle vs triangle */

const _faceVsFace_edgesA = /* @__PURE__ */ [vec3.create(), vec3.create(), vec3.create()];
const _faceVsFace_edgesB = /* @__PURE__ */ [vec3.create(), vec3.create(), vec3.create()];
const _faceVsFace_lengthsA = /* @__PURE__ */ [0, 0, 0];
const _faceVsFace_lengthsB = /* @__PURE__ */ [0, 0, 0];
const _faceVsFace_normalA = /* @__PURE__ */ vec3.create();
const _faceVsFace_normalB = /* @__PURE__ */ vec3.create();
const _faceVsFace_normalCross = /* @__PURE__ */ vec3.create();

function facesSeparatedOnAxis(a: Face, b: Face, axis: Vec3, scale: number, epsilon: number): boolean {
    if (!normalizeAxis(axis, scale, epsilon)) return false;

    const a0 = vec3.dot(a.p, axis);
    const a1 = vec3.dot(a.q, axis);
    const a2 = vec3.dot(a.r, axis);
    const b0 = vec3.dot(b.p, axis);
    const b1 = vec3.dot(b.q, axis);
    const b2 = vec3.dot(b.r, axis);

    const minA = Math.min(a0, a1, a2);
    const maxA = Math.max(a0, a1, a2);
    const minB = Math.min(b0, b1, b2);
    const maxB = Math.max(b0, b1, b2);

    return minA > maxB + epsilon || minB > maxA + epsilon;
}

function setEdges(out: Vec3[], lengths: number[], face: Face): void {
    vec3.subtract(out[0], face.q, face.p);
    vec3.subtract(out[1], face.r, face.q);
    vec3.subtract(out[2], face.p, face.r);
    for (let i = 0; i < 3; i++) {
        lengths[i] = vec3.length(out[i]);
    }
}

/**
 * Triangle vs triangle overlap on both face normals and the 9 edge cross products.
 *
 * When the normals are parallel those 11 axes cannot separate two triangles lying in the same
 * plane, so the in-plane edge normals (`normal × edge`, 6 more axes) are tested as well.
 */
export function faceVsFace(a: Face, b: Face, epsilon = DEFAULT_COLLIDE_EPSILON): boolean {
    const edgesA = _faceVsFace_edgesA;
    const edgesB = _faceVsFace_edgesB;
    const lengthsA = _faceVsFace_lengthsA;
    const lengthsB = _faceVsFace_lengthsB;
    setEdges(edgesA, lengthsA, a);
    setEdges(edgesB, lengthsB, b);

    const normalA = vec3.cross(_faceVsFace_normalA, edgesA[0], edgesA[1]);
    const normalB = vec3.cross(_faceVsFace_normalB, edgesB[0], edgesB[1]);
    const normalScaleA = lengthsA[0] * lengthsA[1];
    const normalScaleB = lengthsB[0] * lengthsB[1];

    if (facesSeparatedOnAxis(a, b, vec3.copy(_axis, normalA), normalScaleA, epsilon)) return false;
    if (facesSeparatedOnAxis(a, b, vec3.copy(_axis, normalB), normalScaleB, epsilon)) return false;

    for (let i = 0; i < 3; i++) {
        for (let j = 0; j < 3; j++) {
            const scale = lengthsA[i] * lengthsB[j];
            if (facesSeparatedOnAxis(a, b, vec3.cross(_axis, edgesA[i], edgesB[j]), scale, epsilon)) return false;
        }
    }

    const normalsUsable = normalizeAxis(normalA, normalScaleA, epsilon) && normalizeAxis(normalB, normalScaleB, epsilon);
    if (normalsUsable && vec3.length(vec3.cross(_faceVsFace_normalCross, normalA, normalB)) < epsilon) {
        for (let i = 0; i < 3; i++) {
            if (facesSeparatedOnAxis(a, b, vec3.cross(_axis, normalA, edgesA[i]), lengthsA[i], epsilon)) return false;
            if (facesSeparatedOnAxis(a, b, vec3.cross(_axis, normalA, edgesB[i]), lengthsB[i], epsilon)) return false;
        }
    }

    return true;
}
