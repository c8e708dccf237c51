import { type Vec3, vec3 } from 'mathcat';
import * as frame from '../math/frame';
import type { Frame } from '../math/frame';
import { assert } from '../utils/assert';

/**
 * A flat triangle with vertices `p`, `q`, `r`.
 *
 * Degenerate triangles (coincident or collinear vertices) are allowed; their normal is
 * the zero vector and the predicates classify them without dividing by it.
 */
export type Face = {
    p: Vec3;
    q: Vec3;
    r: Vec3;
};

/** create a face, copying the given vertices */
export function create(p: Vec3, q: Vec3, r: Vec3): Face {
    return { p: vec3.clone(p), q: vec3.clone(q), r: vec3.clone(r) };
}

export function clone(face: Face): Face {
    return create(face.p, face.q, face.r);
}

export function copy(out: Face, face: Face): Face {
    vec3.copy(out.p, face.p);
    vec3.copy(out.q, face.q);
    vec3.copy(out.r, face.r);
    return out;
}

/** exact component-wise comparison */
export function equals(a: Face, b: Face): boolean {
    return vertexEquals(a.p, b.p) && vertexEquals(a.q, b.q) && vertexEquals(a.r, b.r);
}

function vertexEquals(a: Vec3, b: Vec3): boolean {
    return a[0] === b[0] && a[1] === b[1] && a[2] === b[2];
}

export function centroid(out: Vec3, face: Face): Vec3 {
    out[0] = (face.p[0] + face.q[0] + face.r[0]) / 3;
    out[1] = (face.p[1] + face.q[1] + face.r[1]) / 3;
    out[2] = (face.p[2] + face.q[2] + face.r[2]) / 3;
    return out;
}

const _normal_pq = /* @__PURE__ */ vec3.create();
const _normal_pr = /* @__PURE__ */ vec3.create();

/** unnormalized face normal, `(q - p) × (r - p)`; its length is twice the area */
export function normal(out: Vec3, face: Face): Vec3 {
    vec3.subtract(_normal_pq, face.q, face.p);
    vec3.subtract(_normal_pr, face.r, face.p);
    return vec3.cross(out, _normal_pq, _normal_pr);
}

const _area_normal = /* @__PURE__ */ vec3.create();

export function area(face: Face): number {
    return vec3.length(normal(_area_normal, face)) * 0.5;
}

/** map the vertices of `face` through `transform` (local → reference) */
export function transform(out: Face, face: Face, transform: Frame): Face {
    frame.transformPoint(out.p, transform, face.p);
    frame.transformPoint(out.q, transform, face.q);
    frame.transformPoint(out.r, transform, face.r);
    return out;
}

/**
 * Build faces from a flat position buffer `[x0, y0, z0, x1, ...]`.
 * With `indices`, every three indices form a face; without, every three vertices do.
 * Trailing vertices or indices that do not complete a triangle are ignored.
 */
export function fromPositions(positions: ArrayLike<number>, indices?: ArrayLike<number>): Face[] {
    const vertexCount = Math.floor(positions.length / 3);
    const faces: Face[] = [];

    const vertex = (i: number): Vec3 => {
        assert(i >= 0 && i < vertexCount, `vertex index ${i} out of range [0, ${vertexCount})`);
        return [positions[i * 3], positions[i * 3 + 1], positions[i * 3 + 2]];
    };

    if (indices && indices.length > 0) {
        const count = Math.floor(indices.length / 3);
        for (let i = 0; i < count; i++) {
            faces.push({ p: vertex(indices[i * 3]), q: vertex(indices[i * 3 + 1]), r: vertex(indices[i * 3 + 2]) });
        }
    } else {
        const count = Math.floor(vertexCount / 3);
        for (let i = 0; i < count; i++) {
            faces.push({ p: vertex(i * 3), q: vertex(i * 3 + 1), r: vertex(i * 3 + 2) });
        }
    }

    return faces;
}

// corner i has sign bits (x, y, z) = (i & 1, i & 2, i & 4)
// biome-ignore format: readability
const BOX_INDICES = [
    0, 6, 2, 0, 4, 6, // -x
    1, 7, 5, 1, 3, 7, // +x
    0, 5, 4, 0, 1, 5, // -y
    2, 7, 3, 2, 6, 7, // +y
    0, 3, 1, 0, 2, 3, // -z
    4, 7, 6, 4, 5, 7, // +z
];

/** the 12 faces of an axis-aligned box centered on the origin, wound outward */
export function boxFaces(halfExtents: Vec3): Face[] {
    const positions: number[] = [];
    for (let i = 0; i < 8; i++) {
        positions.push(
            i & 1 ? halfExtents[0] : -halfExtents[0],
            i & 2 ? halfExtents[1] : -halfExtents[1],
            i & 4 ? halfExtents[2] : -halfExtents[2],
        );
    }
    return fromPositions(positions, BOX_INDICES);
}
