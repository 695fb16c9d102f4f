/**
 * Grid Layout Parser
 *
 * Interprets a 2D text layout such as
 *
 *   {c1                  + + c2}
 *   {c3:wx1,wy2,i*5,fxy  + c4 +}
 *   {|                   - - c5}
 *   {|                   - c6 +}
 *
 * into the row, column, width and height of every named region.
 * `{` and `}` delimit rows, `+` (or `<`) widens the region to the left,
 * `|` (or `^`) lengthens the nearest region above, and `-` fills a cell.
 * Nonsensical layouts produce odd geometry but are never rejected.
 */

import type { IdentifierToken, Region } from '../types/region';
import { EMBEDDED_SPEC_SEPARATOR } from '../types/layout-constants';
import { LayoutError, LayoutErrorCode, isLayoutError } from '../errors';
import { splitEmbedded } from '../constraint/embedded-splitter';
import { isDebugEnabled } from '../utils/debug';
import { tokenizeLayout } from './tokenizer';
import { RegionRegistry } from './region-registry';

type MutableRegion = { -readonly [K in keyof Region]: Region[K] };

interface ParseState {
  row: number;
  col: number;
  /** Region created by the latest identifier in the current row */
  current: MutableRegion | null;
  regions: MutableRegion[];
}

/**
 * Parse a layout string into a registry of regions.
 *
 * @throws LayoutError when the layout is missing or an embedded constraint
 * spec cannot be split
 *
 * @example
 * ```typescript
 * const registry = parseLayout('{c1 + + c2}');
 * registry.get('c1'); // { name: 'c1', row: 0, col: 0, width: 3, height: 1, constraints: '' }
 * ```
 */
export function parseLayout(layout: string | null | undefined): RegionRegistry {
  if (layout === null || layout === undefined) {
    throw new LayoutError(LayoutErrorCode.LAYOUT_INPUT_MISSING, 'No layout string given');
  }

  const state: ParseState = { row: 0, col: 0, current: null, regions: [] };

  for (const token of tokenizeLayout(layout)) {
    switch (token.type) {
      case 'rowStart':
        state.col = 0;
        break;

      case 'rowEnd':
        state.current = null;
        state.row++;
        break;

      case 'horizontalExtend':
        if (state.current) {
          state.current.width++;
          if (isDebugEnabled()) {
            console.log(`[Layout] Widened ${state.current.name} to ${state.current.width}`);
          }
        }
        state.col++;
        break;

      case 'verticalExtend': {
        const above = findRegionAbove(state.regions, state.row, state.col);
        if (above) {
          above.height++;
          if (isDebugEnabled()) {
            console.log(`[Layout] Lengthened ${above.name} to ${above.height}`);
          }
        }
        state.col++;
        break;
      }

      case 'filler':
        state.col++;
        break;

      case 'identifier': {
        const region = createRegion(token, state.row, state.col);
        state.regions.push(region);
        state.current = region;
        state.col++;
        if (isDebugEnabled()) {
          console.log(`[Layout] Region ${region.name} at row ${region.row}, col ${region.col}`);
        }
        break;
      }
    }
  }

  return new RegionRegistry(state.regions);
}

/**
 * Create a 1x1 region from an identifier, splitting any embedded spec
 */
function createRegion(token: IdentifierToken, row: number, col: number): MutableRegion {
  const [name, spec = ''] = token.text.split(EMBEDDED_SPEC_SEPARATOR);

  let constraints = '';
  try {
    constraints = splitEmbedded(spec);
  } catch (error) {
    if (isLayoutError(error)) {
      throw error.withContext({ region: name, offset: token.offset });
    }
    throw error;
  }

  return { name, row, col, width: 1, height: 1, constraints };
}

/**
 * Find the region whose top-left cell is in the given column, searching the
 * rows above `row` from nearest to farthest
 */
function findRegionAbove(regions: readonly MutableRegion[], row: number, col: number): MutableRegion | undefined {
  for (let r = row - 1; r >= 0; r--) {
    const found = regions.find((region) => region.row === r && region.col === col);
    if (found) return found;
  }
  return undefined;
}
