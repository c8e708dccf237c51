import { type Quat, quat, type Vec3, vec3 } from 'mathcat';

/**
 * A rigid transform: a position and a unit quaternion orientation.
 *
 * Maps local coordinates into a reference space: `reference = quaternion * local + position`.
 * Frames are treated as values; every operation writes into an `out` frame and returns it,
 * so callers that want immutability simply pass a fresh frame.
 */
export type Frame = {
    position: Vec3;
    quaternion: Quat;
};

/** create a frame, defaults to the identity frame */
export function create(position?: Vec3, quaternion?: Quat): Frame {
    return {
        position: position ? vec3.clone(position) : vec3.create(),
        quaternion: quaternion ? quat.clone(quaternion) : quat.create(),
    };
}

/** create the identity frame */
export function identity(): Frame {
    return create();
}

/** create a frame rotated by `angle` radians about `axis`, optionally translated */
export function fromAxisAngle(axis: Vec3, angle: number, position?: Vec3): Frame {
    const frame = create(position);
    const unitAxis = vec3.normalize(vec3.create(), axis);
    quat.setAxisAngle(frame.quaternion, unitAxis, angle);
    return frame;
}

export function clone(frame: Frame): Frame {
    return create(frame.position, frame.quaternion);
}

export function copy(out: Frame, frame: Frame): Frame {
    vec3.copy(out.position, frame.position);
    quat.copy(out.quaternion, frame.quaternion);
    return out;
}

/** exact component-wise comparison */
export function equals(a: Frame, b: Frame): boolean {
    return (
        a.position[0] === b.position[0] &&
        a.position[1] === b.position[1] &&
        a.position[2] === b.position[2] &&
        a.quaternion[0] === b.quaternion[0] &&
        a.quaternion[1] === b.quaternion[1] &&
        a.quaternion[2] === b.quaternion[2] &&
        a.quaternion[3] === b.quaternion[3]
    );
}

const _multiply_position = /* @__PURE__ */ vec3.create();
const _multiply_quaternion = /* @__PURE__ */ quat.create();

/**
 * Compose two frames: `out = a ∘ b`.
 * Transforming a point by `out` is the same as transforming it by `b`, then by `a`.
 * `out` may alias `a` or `b`.
 */
export function multiply(out: Frame, a: Frame, b: Frame): Frame {
    vec3.transformQuat(_multiply_position, b.position, a.quaternion);
    vec3.add(_multiply_position, _multiply_position, a.position);
    quat.multiply(_multiply_quaternion, a.quaternion, b.quaternion);
    quat.normalize(_multiply_quaternion, _multiply_quaternion);

    vec3.copy(out.position, _multiply_position);
    quat.copy(out.quaternion, _multiply_quaternion);
    return out;
}

/**
 * Apply `delta` in the reference space, after `frame`: `out = delta ∘ frame`.
 * A translation delta moves the frame along reference axes; a rotation delta spins it
 * about the reference origin.
 */
export function extrinsic(out: Frame, frame: Frame, delta: Frame): Frame {
    return multiply(out, delta, frame);
}

/**
 * Apply `delta` in the local space of `frame`: `out = frame ∘ delta`.
 * A translation delta moves the frame along its own axes; a rotation delta spins it
 * about its own origin.
 */
export function intrinsic(out: Frame, frame: Frame, delta: Frame): Frame {
    return multiply(out, frame, delta);
}

/** `out = frame⁻¹`. `out` may alias `frame` */
export function invert(out: Frame, frame: Frame): Frame {
    quat.conjugate(out.quaternion, frame.quaternion);
    vec3.negate(out.position, frame.position);
    vec3.transformQuat(out.position, out.position, out.quaternion);
    return out;
}

const _relative_inverse = /* @__PURE__ */ create();

/** the pose of `b` expressed in the local space of `a`: `out = a⁻¹ ∘ b` */
export function relative(out: Frame, a: Frame, b: Frame): Frame {
    invert(_relative_inverse, a);
    return multiply(out, _relative_inverse, b);
}

/** local point → reference space */
export function transformPoint(out: Vec3, frame: Frame, point: Vec3): Vec3 {
    vec3.transformQuat(out, point, frame.quaternion);
    return vec3.add(out, out, frame.position);
}

/** local direction → reference space (rotation only) */
export function transformDirection(out: Vec3, frame: Frame, direction: Vec3): Vec3 {
    return vec3.transformQuat(out, direction, frame.quaternion);
}

const _inverse_quaternion = /* @__PURE__ */ quat.create();

/** reference point → local space */
export function inverseTransformPoint(out: Vec3, frame: Frame, point: Vec3): Vec3 {
    quat.conjugate(_inverse_quaternion, frame.quaternion);
    vec3.subtract(out, point, frame.position);
    return vec3.transformQuat(out, out, _inverse_quaternion);
}

/** reference direction → local space */
export function inverseTransformDirection(out: Vec3, frame: Frame, direction: Vec3): Vec3 {
    quat.conjugate(_inverse_quaternion, frame.quaternion);
    return vec3.transformQuat(out, direction, _inverse_quaternion);
}
