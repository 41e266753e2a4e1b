import { describe, it, expect, vi } from 'vitest';
import { StackForestBuilder } from '../builder/stack-builder.js';
import { BuilderFinishedError } from '../errors.js';
import type { TreeNode } from '../types.js';

function names(nodes: readonly TreeNode[]): string[] {
  return nodes.map((node) => node.name);
}

describe('StackForestBuilder', () => {
  it('should attach each item to the deepest shallower open ancestor', () => {
    const builder = new StackForestBuilder();
    builder.insertAll([
      { depth: 0, name: 'root' },
      { depth: 1, name: 'a' },
      { depth: 2, name: 'a1' },
      { depth: 1, name: 'b' },
    ]);
    const [root] = builder.finish();

    expect(names(root?.children ?? [])).toEqual(['a', 'b']);
    expect(names(root?.children[0]?.children ?? [])).toEqual(['a1']);
    expect(root?.children[1]?.children).toEqual([]);
  });

  it('should clamp the stored depth when levels are skipped', () => {
    const builder = new StackForestBuilder();
    builder.insert({ depth: 0, name: 'root' });
    const skipped = builder.insert({ depth: 3, name: 'far' });
    const sibling = builder.insert({ depth: 3, name: 'next' });

    expect(skipped.depth).toBe(1);
    expect(sibling.depth).toBe(1);
    expect(names(builder.finish()[0]?.children ?? [])).toEqual(['far', 'next']);
  });

  it('should start a new root for items at or above the first depth', () => {
    const builder = new StackForestBuilder();
    builder.insertAll([
      { depth: 2, name: 'first' },
      { depth: 3, name: 'child' },
      { depth: 1, name: 'second' },
    ]);
    const forest = builder.finish();

    expect(names(forest)).toEqual(['first', 'second']);
    expect(forest.every((root) => root.depth === 0)).toBe(true);
  });

  it('should fire onFolder once when a node gets its first child', () => {
    const onFolder = vi.fn<(node: TreeNode) => void>();
    const builder = new StackForestBuilder({ onFolder });
    builder.insertAll([
      { depth: 0, name: 'root' },
      { depth: 1, name: 'a' },
      { depth: 1, name: 'b' },
      { depth: 2, name: 'b1' },
    ]);

    expect(onFolder).toHaveBeenCalledTimes(2);
    expect(onFolder.mock.calls.map(([node]) => node.name)).toEqual(['root', 'b']);
  });

  it('should report running node counts', () => {
    const counts: number[] = [];
    const builder = new StackForestBuilder({ onNode: (_node, count) => counts.push(count) });
    builder.insertAll([
      { depth: 0, name: 'root' },
      { depth: 1, name: 'a' },
      { depth: 1, name: 'b' },
    ]);

    expect(counts).toEqual([1, 2, 3]);
    expect(builder.size).toBe(3);
    expect(builder.openDepth).toBe(2);
  });

  it('should reject inserts after finish', () => {
    const builder = new StackForestBuilder();
    builder.insert({ depth: 0, name: 'root' });
    builder.finish();

    expect(() => builder.insert({ depth: 1, name: 'late' })).toThrow(BuilderFinishedError);
    expect(builder.openDepth).toBe(0);
  });
});
