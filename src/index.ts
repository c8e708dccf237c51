/** @module obbvh */

export type { Frame } from './math/frame';
export * as frame from './math/frame';
export * from './math/eigen';

export type { Face } from './geometry/face';
export * as face from './geometry/face';
export type { Obb } from './geometry/obb';
export * as obb from './geometry/obb';

export type { Leaf, Node, Tree } from './tree/tree';
export { TreeType } from './tree/tree';
export * as tree from './tree/tree';
export * from './tree/build';
export * as codec from './tree/codec';
export { CodecError } from './tree/codec';
export * from './tree/query';

export type { Body, BodySettings } from './body/body';
export * as body from './body/body';

export * from './collision/predicates';
export * from './collision/collide-recurse';
export * from './collision/collide';

export * from './settings';
export * from './utils/logger';
export { assert, assertNever } from './utils/assert';
