import { describe, expect, test } from 'vitest';
import { body, buildTree, face, frame, tree } from '../../src';
import { expectVec3Close } from '../helpers';

describe('body', () => {
    const faces = face.boxFaces([1, 1, 1]);

    test('create builds the tree and copies the frame', () => {
        const position: [number, number, number] = [1, 2, 3];
        const b = body.create({ faces, position });
        position[0] = 100;

        expect(tree.countLeaves(b.tree)).toBe(12);
        expect(b.frame.position).toEqual([1, 2, 3]);
        expect(b.frame.quaternion).toEqual([0, 0, 0, 1]);
    });

    test('fromTree defaults to the identity frame', () => {
        const t = buildTree(faces);
        const b = body.fromTree(t);
        expect(b.tree).toBe(t);
        expect(frame.equals(b.frame, frame.identity())).toBe(true);
    });

    test('translate returns a new body sharing the tree', () => {
        const original = body.create({ faces, position: [1, 0, 0] });
        const moved = body.translate(original, [0, 2, 0]);

        expect(moved).not.toBe(original);
        expect(moved.tree).toBe(original.tree);
        expect(moved.frame.position).toEqual([1, 2, 0]);
        expect(original.frame.position).toEqual([1, 0, 0]);
    });

    test('translate moves along reference axes', () => {
        const rotated = body.create({ faces, quaternion: frame.fromAxisAngle([0, 0, 1], Math.PI / 2).quaternion });
        const moved = body.translate(rotated, [1, 0, 0]);

        expectVec3Close(moved.frame.position, [1, 0, 0]);
        for (let i = 0; i < 4; i++) {
            expect(moved.frame.quaternion[i]).toBeCloseTo(rotated.frame.quaternion[i], 12);
        }
    });

    test('rotate spins about the body origin', () => {
        const original = body.create({ faces, position: [5, 0, 0] });
        const rotated = body.rotate(original, [0, 0, 1], Math.PI / 2);

        expect(rotated.frame.position).toEqual([5, 0, 0]);
        expectVec3Close(frame.transformPoint([0, 0, 0], rotated.frame, [1, 0, 0]), [5, 1, 0]);
        expect(original.frame.quaternion).toEqual([0, 0, 0, 1]);
        expect(rotated.tree).toBe(original.tree);
    });

    test('rotations compose in the reference space', () => {
        const once = body.rotate(body.create({ faces }), [0, 0, 1], Math.PI / 2);
        const twice = body.rotate(once, [1, 0, 0], Math.PI / 2);

        // +x goes to +y, then +y goes to +z
        expectVec3Close(frame.transformPoint([0, 0, 0], twice.frame, [1, 0, 0]), [0, 0, 1]);
    });

    test('withFrame copies the frame', () => {
        const f = frame.create([0, 0, 7]);
        const b = body.withFrame(body.create({ faces }), f);
        f.position[2] = 0;
        expect(b.frame.position).toEqual([0, 0, 7]);
    });

    test('createEmpty', () => {
        const empty = body.createEmpty(frame.create([1, 1, 1]));
        expect(tree.countLeaves(empty.tree)).toBe(2);
        expect(empty.frame.position).toEqual([1, 1, 1]);
    });
});
