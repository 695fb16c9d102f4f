/**
 * Region Registry
 * Read-only, insertion-ordered collection of the regions parsed from one layout.
 */

import type { Region } from '../types/region';

export class RegionRegistry implements Iterable<Region> {
  private readonly regions: readonly Region[];
  private readonly byName: ReadonlyMap<string, Region>;

  constructor(regions: Iterable<Region>) {
    const frozen: Region[] = [];
    const byName = new Map<string, Region>();

    for (const region of regions) {
      const copy = Object.freeze({ ...region });
      frozen.push(copy);
      // First occurrence of a name wins
      if (!byName.has(copy.name)) {
        byName.set(copy.name, copy);
      }
    }

    this.regions = Object.freeze(frozen);
    this.byName = byName;
  }

  /**
   * Look up a region by exact name. Returns undefined when the layout has no such region.
   */
  get(name: string): Region | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  get size(): number {
    return this.regions.length;
  }

  /**
   * Region names in layout order
   */
  names(): string[] {
    return this.regions.map((region) => region.name);
  }

  toArray(): Region[] {
    return [...this.regions];
  }

  toJSON(): Region[] {
    return this.toArray();
  }

  [Symbol.iterator](): Iterator<Region> {
    return this.regions[Symbol.iterator]();
  }
}

/**
 * Look up a region, treating an absent name as "not found" rather than an error
 */
export function lookupRegion(registry: RegionRegistry, name: string): Region | undefined {
  return registry.get(name);
}
