import type { Vec3 } from 'mathcat';
import { expect } from 'vitest';
import { type Face, face } from '../src';

export const expectVec3Close = (actual: Vec3, expected: Vec3, digits = 6) => {
    expect(actual[0]).toBeCloseTo(expected[0], digits);
    expect(actual[1]).toBeCloseTo(expected[1], digits);
    expect(actual[2]).toBeCloseTo(expected[2], digits);
};

/** a face with every vertex at `point` */
export const pointFace = (point: Vec3): Face => face.create(point, point, point);

