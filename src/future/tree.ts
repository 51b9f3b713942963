/**
 * @fileoverview Recursive visitor over nested argument and result trees.
 *
 * Containers are arrays, `Map`s and plain records (prototype
 * `Object.prototype` or `null`). Everything else, Futures included, is a
 * leaf. The same walker finds the Futures inside call arguments,
 * substitutes their values and builds per-leaf views of results.
 *
 * @module future/tree
 */

import { Future, isFuture } from './future';

/**
 * Path from the root to a leaf: array indices, record keys and Map keys.
 */
export type TreePath = readonly unknown[];

/**
 * Check if a value is a plain record (object literal or `Object.create(null)`).
 */
export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Check if a value is one of the recognized containers.
 */
export function isContainer(value: unknown): boolean {
  return Array.isArray(value) || value instanceof Map || isPlainRecord(value);
}

/**
 * Yield `[path, leaf]` for every leaf, depth first, in container order.
 * Empty containers contribute nothing.
 */
export function* iterateTree(tree: unknown, prefix: TreePath = []): Generator<[TreePath, unknown]> {
  if (Array.isArray(tree)) {
    for (let i = 0; i < tree.length; i++) {
      yield* iterateTree(tree[i], [...prefix, i]);
    }
  } else if (tree instanceof Map) {
    for (const [key, value] of tree) {
      yield* iterateTree(value, [...prefix, key]);
    }
  } else if (isPlainRecord(tree)) {
    for (const key of Object.keys(tree)) {
      yield* iterateTree(tree[key], [...prefix, key]);
    }
  } else {
    yield [prefix, tree];
  }
}

/**
 * Rebuild the tree with fresh containers, replacing each leaf by
 * `fn(path, leaf)`. Records keep a null prototype if they had one.
 */
export function transformTree(fn: (path: TreePath, leaf: unknown) => unknown, tree: unknown, prefix: TreePath = []): unknown {
  if (Array.isArray(tree)) {
    return tree.map((item: unknown, i) => transformTree(fn, item, [...prefix, i]));
  }
  if (tree instanceof Map) {
    const out = new Map<unknown, unknown>();
    for (const [key, value] of tree) {
      out.set(key, transformTree(fn, value, [...prefix, key]));
    }
    return out;
  }
  if (isPlainRecord(tree)) {
    const out: Record<string, unknown> = Object.getPrototypeOf(tree) === null ? Object.create(null) : {};
    for (const key of Object.keys(tree)) {
      out[key] = transformTree(fn, tree[key], [...prefix, key]);
    }
    return out;
  }
  return fn(prefix, tree);
}

/**
 * Copy every container of the tree; leaves are kept by reference.
 */
export function copyTree(tree: unknown): unknown {
  return transformTree((_path, leaf) => leaf, tree);
}

/**
 * Freeze every container of the tree in place. Map contents stay mutable.
 */
export function freezeTree<T>(tree: T): T {
  if (Array.isArray(tree)) {
    tree.forEach((item: unknown) => freezeTree(item));
    Object.freeze(tree);
  } else if (tree instanceof Map) {
    tree.forEach((value: unknown) => freezeTree(value));
  } else if (isPlainRecord(tree)) {
    Object.values(tree).forEach(value => freezeTree(value));
    Object.freeze(tree);
  }
  return tree;
}

/**
 * Select the subtree at `path`.
 *
 * @throws Error when a segment does not exist
 */
export function getTree(tree: unknown, path: TreePath): unknown {
  let node = tree;
  for (const key of path) {
    if (Array.isArray(node) && typeof key === 'number' && key >= 0 && key < node.length) {
      node = node[key];
    } else if (node instanceof Map && node.has(key)) {
      node = node.get(key);
    } else if (isPlainRecord(node) && typeof key === 'string' && Object.prototype.hasOwnProperty.call(node, key)) {
      node = node[key];
    } else {
      throw new Error(`Path segment ${String(key)} not found in tree`);
    }
  }
  return node;
}

/**
 * Distinct Futures found in the given trees, in order of first appearance.
 */
export function collectFutures(...trees: unknown[]): Future<unknown>[] {
  const seen = new Set<Future<unknown>>();
  for (const tree of trees) {
    for (const [, leaf] of iterateTree(tree)) {
      if (isFuture(leaf)) {
        seen.add(leaf);
      }
    }
  }
  return [...seen];
}
