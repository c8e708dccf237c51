import { type Mat3, mat3, quat, type Vec3, vec3 } from 'mathcat';
import { decomposeSymmetric } from '../math/eigen';
import * as frame from '../math/frame';
import type { Frame } from '../math/frame';
import { assert } from '../utils/assert';
import * as face from './face';
import type { Face } from './face';

/**
 * Oriented bounding box: half-extents along the three local axes of `frame`.
 *
 * In a body's tree every box frame is expressed directly in body-local coordinates,
 * never relative to the parent node.
 */
export type Obb = {
    halfExtents: Vec3;
    frame: Frame;
};

/**
 * Half-extent used by the sentinel box of an empty body. Negative extents make every
 * separating-axis test report a gap, so the sentinel overlaps nothing.
 */
export const EMPTY_HALF_EXTENT = -1e30;

export function create(halfExtents: Vec3, boxFrame?: Frame): Obb {
    return {
        halfExtents: vec3.clone(halfExtents),
        frame: boxFrame ? frame.clone(boxFrame) : frame.identity(),
    };
}

/** a box that overlaps nothing */
export function createEmpty(): Obb {
    return create([EMPTY_HALF_EXTENT, EMPTY_HALF_EXTENT, EMPTY_HALF_EXTENT]);
}

export function clone(obb: Obb): Obb {
    return create(obb.halfExtents, obb.frame);
}

/** exact component-wise comparison */
export function equals(a: Obb, b: Obb): boolean {
    return (
        a.halfExtents[0] === b.halfExtents[0] &&
        a.halfExtents[1] === b.halfExtents[1] &&
        a.halfExtents[2] === b.halfExtents[2] &&
        frame.equals(a.frame, b.frame)
    );
}

const UNIT_AXES: readonly Vec3[] = [
    [1, 0, 0],
    [0, 1, 0],
    [0, 0, 1],
];

/** unit direction of local axis `index` (0, 1, 2) in the box's reference space */
export function axis(out: Vec3, obb: Obb, index: number): Vec3 {
    return frame.transformDirection(out, obb.frame, UNIT_AXES[index]);
}

/** the 8 corners in the box's reference space; corner i takes the + side of axis k when bit k of i is set */
export function corners(obb: Obb): Vec3[] {
    const out: Vec3[] = [];
    const [hx, hy, hz] = obb.halfExtents;
    for (let i = 0; i < 8; i++) {
        const local: Vec3 = [i & 1 ? hx : -hx, i & 2 ? hy : -hy, i & 4 ? hz : -hz];
        out.push(frame.transformPoint(vec3.create(), obb.frame, local));
    }
    return out;
}

/** re-express `obb` in another space: `out.frame = transform ∘ obb.frame` */
export function transform(out: Obb, obb: Obb, transform: Frame): Obb {
    vec3.copy(out.halfExtents, obb.halfExtents);
    frame.multiply(out.frame, transform, obb.frame);
    return out;
}

const _containsPoint_local = /* @__PURE__ */ vec3.create();

export function containsPoint(obb: Obb, point: Vec3, epsilon = 0): boolean {
    const local = frame.inverseTransformPoint(_containsPoint_local, obb.frame, point);
    return (
        Math.abs(local[0]) <= obb.halfExtents[0] + epsilon &&
        Math.abs(local[1]) <= obb.halfExtents[1] + epsilon &&
        Math.abs(local[2]) <= obb.halfExtents[2] + epsilon
    );
}

const _fit_covariance = /* @__PURE__ */ mat3.create();
const _fit_vectors = /* @__PURE__ */ mat3.create();
const _fit_values = /* @__PURE__ */ vec3.create();
const _fit_basis = /* @__PURE__ */ mat3.create();
const _fit_mean = /* @__PURE__ */ vec3.create();
const _fit_centroid = /* @__PURE__ */ vec3.create();
const _fit_x = /* @__PURE__ */ vec3.create();
const _fit_y = /* @__PURE__ */ vec3.create();
const _fit_z = /* @__PURE__ */ vec3.create();
const _fit_axis = /* @__PURE__ */ vec3.create();
const _fit_center = /* @__PURE__ */ vec3.create();

/**
 * Fit a near-minimal box around `faces`.
 *
 * The box axes are the principal axes of the faces' area-weighted covariance (treating each
 * triangle as a uniform lamina); when every face is degenerate the plain vertex covariance is
 * used instead. Extents come from projecting every vertex onto those axes.
 */
export function fitFaces(faces: Face[]): Obb {
    assert(faces.length > 0, 'fitFaces requires at least one face');

    computeCovariance(_fit_covariance, faces);
    decomposeSymmetric(_fit_covariance, _fit_vectors, _fit_values);

    // right-handed orthonormal basis from the first two principal axes
    vec3.set(_fit_x, _fit_vectors[0], _fit_vectors[1], _fit_vectors[2]);
    vec3.normalize(_fit_x, _fit_x);
    vec3.set(_fit_y, _fit_vectors[3], _fit_vectors[4], _fit_vectors[5]);
    vec3.scaleAndAdd(_fit_y, _fit_y, _fit_x, -vec3.dot(_fit_y, _fit_x));
    vec3.normalize(_fit_y, _fit_y);
    vec3.cross(_fit_z, _fit_x, _fit_y);

    // biome-ignore format: readability
    mat3.set(
        _fit_basis,
        _fit_x[0], _fit_x[1], _fit_x[2],
        _fit_y[0], _fit_y[1], _fit_y[2],
        _fit_z[0], _fit_z[1], _fit_z[2],
    );

    const out = create([0, 0, 0]);
    quat.fromMat3(out.frame.quaternion, _fit_basis);
    quat.normalize(out.frame.quaternion, out.frame.quaternion);

    vec3.zero(_fit_center);
    for (let i = 0; i < 3; i++) {
        axis(_fit_axis, out, i);

        let min = Infinity;
        let max = -Infinity;
        for (const f of faces) {
            for (const v of [f.p, f.q, f.r]) {
                const d = vec3.dot(v, _fit_axis);
                if (d < min) min = d;
                if (d > max) max = d;
            }
        }

        out.halfExtents[i] = (max - min) * 0.5;
        vec3.scaleAndAdd(_fit_center, _fit_center, _fit_axis, (min + max) * 0.5);
    }
    vec3.copy(out.frame.position, _fit_center);

    return out;
}

function computeCovariance(out: Mat3, faces: Face[]): void {
    let totalArea = 0;
    for (const f of faces) {
        totalArea += face.area(f);
    }

    let xx = 0;
    let xy = 0;
    let xz = 0;
    let yy = 0;
    let yz = 0;
    let zz = 0;
    vec3.zero(_fit_mean);

    if (totalArea > Number.EPSILON) {
        // second moments of uniform triangular laminae
        for (const f of faces) {
            const w = face.area(f) / totalArea;
            const c = face.centroid(_fit_centroid, f);
            vec3.scaleAndAdd(_fit_mean, _fit_mean, c, w);

            const k = w / 12;
            xx += k * (9 * c[0] * c[0] + f.p[0] * f.p[0] + f.q[0] * f.q[0] + f.r[0] * f.r[0]);
            xy += k * (9 * c[0] * c[1] + f.p[0] * f.p[1] + f.q[0] * f.q[1] + f.r[0] * f.r[1]);
            xz += k * (9 * c[0] * c[2] + f.p[0] * f.p[2] + f.q[0] * f.q[2] + f.r[0] * f.r[2]);
            yy += k * (9 * c[1] * c[1] + f.p[1] * f.p[1] + f.q[1] * f.q[1] + f.r[1] * f.r[1]);
            yz += k * (9 * c[1] * c[2] + f.p[1] * f.p[2] + f.q[1] * f.q[2] + f.r[1] * f.r[2]);
            zz += k * (9 * c[2] * c[2] + f.p[2] * f.p[2] + f.q[2] * f.q[2] + f.r[2] * f.r[2]);
        }
    } else {
        const w = 1 / (faces.length * 3);
        for (const f of faces) {
            for (const v of [f.p, f.q, f.r]) {
                vec3.scaleAndAdd(_fit_mean, _fit_mean, v, w);
                xx += w * v[0] * v[0];
                xy += w * v[0] * v[1];
                xz += w * v[0] * v[2];
                yy += w * v[1] * v[1];
                yz += w * v[1] * v[2];
                zz += w * v[2] * v[2];
            }
        }
    }

    const m = _fit_mean;
    // biome-ignore format: readability
    mat3.set(
        out,
        xx - m[0] * m[0], xy - m[0] * m[1], xz - m[0] * m[2],
        xy - m[0] * m[1], yy - m[1] * m[1], yz - m[1] * m[2],
        xz - m[0] * m[2], yz - m[1] * m[2], zz - m[2] * m[2],
    );
}
