/**
 * GridPlacer - Placement Builder
 *
 * Combines default constraints, a parsed layout, and per-region overrides
 * into the row, column and constraint record each region should be given.
 */

import type { ConstraintPart, ConstraintRecord } from './types';
import { DERIVED_WEIGHT_DIVISOR } from './types/layout-constants';
import type { Region } from './types/region';
import { parseLayout, RegionRegistry } from './layout';
import {
  WEIGHT_X_MNEMONICS,
  WEIGHT_Y_MNEMONICS,
  applyConstraints,
  buildConstraintString,
  copyConstraintRecord,
  createConstraintRecord,
  parseConstraints,
  tokenizeConstraints,
} from './constraint';
import { LayoutError, LayoutErrorCode } from './errors';
import { isDebugEnabled } from './utils/debug';

export interface Placement {
  /** Region name, when placed from a layout */
  name?: string;
  row: number;
  col: number;
  constraints: ConstraintRecord;
}

export class GridPlacer {
  private defaults: ConstraintRecord;
  private layout: RegionRegistry | undefined;

  /**
   * @param defaults - Default constraints, given as whole strings, names and
   * values, or any mix ("weightx 1.0", "anchor", "nw", "ipadx", 4)
   *
   * @example
   * ```typescript
   * const placer = new GridPlacer('weightx 1.0 weighty 0.0', 'inset_top 5', 'fill', 'xy');
   * placer.parseLayout('{name + value}{ok - cancel}');
   * const { row, col, constraints } = placer.place('value', 'anchor w');
   * ```
   */
  constructor(...defaults: ConstraintPart[]) {
    this.defaults = parseConstraints(createConstraintRecord(), ...defaults);
    this.layout = undefined;
  }

  /**
   * Update the defaults used by every later placement
   */
  updateDefaults(...constraints: ConstraintPart[]): void {
    parseConstraints(this.defaults, ...constraints);
  }

  getDefaults(): ConstraintRecord {
    return copyConstraintRecord(this.defaults);
  }

  /**
   * Parse a layout string; later calls to place() resolve names against it
   */
  parseLayout(layout: string): RegionRegistry {
    this.layout = parseLayout(layout);
    return this.layout;
  }

  getLayout(): RegionRegistry | undefined {
    return this.layout;
  }

  /**
   * Place at an explicit cell, using the defaults plus the given overrides
   */
  placeAt(row: number, col: number, ...constraints: ConstraintPart[]): Placement {
    const record = parseConstraints(copyConstraintRecord(this.defaults), ...constraints);
    return { row, col, constraints: record };
  }

  /**
   * Place a region from the last parsed layout. Constraints are applied in
   * order: defaults, the region's embedded constraints, the given overrides,
   * then the grid size from the layout. Weights not set explicitly are
   * derived from the grid size.
   *
   * @throws LayoutError when no layout has been parsed or the name is not in it
   */
  place(name: string, ...constraints: ConstraintPart[]): Placement {
    if (!this.layout) {
      throw new LayoutError(LayoutErrorCode.LAYOUT_NOT_PARSED, 'No layout string has been parsed', {
        context: { region: name },
      });
    }

    const region = this.layout.get(name);
    if (!region) {
      throw new LayoutError(LayoutErrorCode.REGION_NOT_FOUND, `No region named ${name} in layout string`, {
        context: { region: name },
      });
    }

    const merged = withGridSizeAndWeights(region, buildConstraintString(region.constraints, ...constraints));

    if (isDebugEnabled()) {
      console.log(`[Placer] ${name} -> ${merged}`);
    }

    const record = applyConstraints(copyConstraintRecord(this.defaults), merged);
    return { name, row: region.row, col: region.col, constraints: record };
  }
}

/**
 * Append the region's grid size, and weights of size / 100 for any axis
 * whose weight the constraint string does not already set
 */
function withGridSizeAndWeights(region: Region, constraints: string): string {
  const names = tokenizeConstraints(constraints)
    .filter((_, index) => index % 2 === 0)
    .map((name) => name.toLowerCase());

  const parts: ConstraintPart[] = [constraints, 'gridwidth', region.width, 'gridheight', region.height];

  if (!names.some((name) => WEIGHT_X_MNEMONICS.has(name))) {
    parts.push('weightx', region.width / DERIVED_WEIGHT_DIVISOR);
  }
  if (!names.some((name) => WEIGHT_Y_MNEMONICS.has(name))) {
    parts.push('weighty', region.height / DERIVED_WEIGHT_DIVISOR);
  }

  return buildConstraintString(...parts);
}
