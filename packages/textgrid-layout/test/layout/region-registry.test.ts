import { describe, it, expect } from 'vitest';
import { RegionRegistry, lookupRegion } from '../../src/layout/region-registry';
import type { Region } from '../../src/types';

const region = (name: string, row: number, col: number): Region => ({
  name,
  row,
  col,
  width: 1,
  height: 1,
  constraints: '',
});

describe('RegionRegistry', () => {
  it('should keep regions in insertion order', () => {
    const registry = new RegionRegistry([region('b', 0, 0), region('a', 0, 1), region('c', 1, 0)]);

    expect(registry.size).toBe(3);
    expect(registry.names()).toEqual(['b', 'a', 'c']);
    expect([...registry].map((r) => r.name)).toEqual(['b', 'a', 'c']);
  });

  it('should look up by exact name', () => {
    const registry = new RegionRegistry([region('Name', 0, 0)]);

    expect(registry.get('Name')).toEqual(region('Name', 0, 0));
    expect(registry.get('name')).toBeUndefined();
    expect(registry.has('Name')).toBe(true);
    expect(registry.has('name')).toBe(false);
  });

  it('should return undefined rather than throw for an absent name', () => {
    const registry = new RegionRegistry([region('a', 0, 0)]);

    expect(() => registry.get('nobody')).not.toThrow();
    expect(lookupRegion(registry, 'nobody')).toBeUndefined();
  });

  it('should resolve a repeated name to its first occurrence', () => {
    const registry = new RegionRegistry([region('a', 0, 0), region('a', 2, 5)]);

    expect(registry.size).toBe(2);
    expect(registry.get('a')?.row).toBe(0);
    expect(registry.get('a')?.col).toBe(0);
  });

  it('should freeze descriptors and not track later changes to the input', () => {
    const input = { name: 'a', row: 0, col: 0, width: 1, height: 1, constraints: '' };
    const registry = new RegionRegistry([input]);
    input.width = 7;

    const stored = registry.get('a');
    expect(stored?.width).toBe(1);
    expect(Object.isFrozen(stored)).toBe(true);
  });

  it('should return a fresh array from toArray', () => {
    const registry = new RegionRegistry([region('a', 0, 0)]);
    const array = registry.toArray();
    array.pop();

    expect(registry.size).toBe(1);
  });

  it('should serialize to an array of regions', () => {
    const registry = new RegionRegistry([region('a', 0, 0)]);

    expect(JSON.parse(JSON.stringify(registry))).toEqual([region('a', 0, 0)]);
  });
});
