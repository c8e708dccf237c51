import { describe, expect, test } from 'vitest';
import { frame } from '../../src';
import { expectVec3Close } from '../helpers';

describe('frame', () => {
    test('create copies its inputs and defaults to identity', () => {
        const position: [number, number, number] = [1, 2, 3];
        const f = frame.create(position);
        position[0] = 100;

        expect(f.position).toEqual([1, 2, 3]);
        expect(f.quaternion).toEqual([0, 0, 0, 1]);
        expect(frame.equals(frame.identity(), frame.create())).toBe(true);
    });

    test('fromAxisAngle rotates points about the axis', () => {
        const f = frame.fromAxisAngle([0, 0, 1], Math.PI / 2);
        expectVec3Close(frame.transformPoint([0, 0, 0], f, [1, 0, 0]), [0, 1, 0]);
    });

    test('fromAxisAngle accepts a non-unit axis', () => {
        const f = frame.fromAxisAngle([0, 0, 2], Math.PI / 2, [0, 0, 5]);
        expectVec3Close(frame.transformPoint([0, 0, 0], f, [1, 0, 0]), [0, 1, 5]);
    });

    test('multiply applies the right frame first', () => {
        const translation = frame.create([1, 0, 0]);
        const rotation = frame.fromAxisAngle([0, 0, 1], Math.PI / 2);

        const translateAfterRotate = frame.multiply(frame.identity(), translation, rotation);
        expectVec3Close(frame.transformPoint([0, 0, 0], translateAfterRotate, [1, 0, 0]), [1, 1, 0]);

        const rotateAfterTranslate = frame.multiply(frame.identity(), rotation, translation);
        expectVec3Close(frame.transformPoint([0, 0, 0], rotateAfterTranslate, [1, 0, 0]), [0, 2, 0]);
    });

    test('multiply may write into one of its inputs', () => {
        const a = frame.fromAxisAngle([1, 0, 0], 0.3, [1, 2, 3]);
        const b = frame.fromAxisAngle([0, 1, 0], -0.7, [-4, 0, 2]);

        const expected = frame.multiply(frame.identity(), a, b);
        frame.multiply(a, a, b);

        expectVec3Close(a.position, expected.position);
        for (let i = 0; i < 4; i++) {
            expect(a.quaternion[i]).toBeCloseTo(expected.quaternion[i], 12);
        }
    });

    test('invert undoes the frame', () => {
        const f = frame.fromAxisAngle([1, 1, 0], 1.1, [3, -2, 7]);
        const inverse = frame.invert(frame.identity(), f);

        const point: [number, number, number] = [0.5, -1.5, 2];
        const there = frame.transformPoint([0, 0, 0], f, point);
        expectVec3Close(frame.transformPoint([0, 0, 0], inverse, there), point);
        expectVec3Close(frame.inverseTransformPoint([0, 0, 0], f, there), point);
    });

    test('relative expresses b in the local space of a', () => {
        const a = frame.fromAxisAngle([1, 0, 0], -Math.PI / 2, [0, 10, 0]);
        const b = frame.fromAxisAngle([0, 1, 0], Math.PI / 2, [10, 0, 0]);
        const rel = frame.relative(frame.identity(), a, b);

        // b's local (0, 10, 0) is world (10, 10, 0), which is a's local (10, 0, 0)
        expectVec3Close(frame.transformPoint([0, 0, 0], rel, [0, 10, 0]), [10, 0, 0]);
    });

    test('extrinsic translation moves along reference axes, intrinsic along local axes', () => {
        const f = frame.fromAxisAngle([0, 0, 1], Math.PI / 2);
        const delta = frame.create([1, 0, 0]);

        expectVec3Close(frame.extrinsic(frame.identity(), f, delta).position, [1, 0, 0]);
        expectVec3Close(frame.intrinsic(frame.identity(), f, delta).position, [0, 1, 0]);
    });

    test('directions ignore the position', () => {
        const f = frame.fromAxisAngle([0, 0, 1], Math.PI / 2, [5, 5, 5]);
        const direction = frame.transformDirection([0, 0, 0], f, [1, 0, 0]);
        expectVec3Close(direction, [0, 1, 0]);
        expectVec3Close(frame.inverseTransformDirection([0, 0, 0], f, direction), [1, 0, 0]);
    });

    test('equals compares exactly', () => {
        const a = frame.create([1, 2, 3]);
        expect(frame.equals(a, frame.clone(a))).toBe(true);
        expect(frame.equals(a, frame.create([1, 2, 3.0000001]))).toBe(false);
    });
});
