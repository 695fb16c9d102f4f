/**
 * Layout Language Constants and Mappings
 */

import type { AnchorDirection, ConstraintRecord, FillMode, Insets } from './constraints';
import type { StructuralTokenType } from './region';

// ============================================================================
// Grid Layout Characters
// ============================================================================

/**
 * Structural characters of the grid layout language.
 * `^` and `<` are older spellings of `|` and `+`.
 */
export const STRUCTURAL_CHARS: Readonly<Record<string, StructuralTokenType>> = {
  '{': 'rowStart',
  '}': 'rowEnd',
  '|': 'verticalExtend',
  '^': 'verticalExtend',
  '+': 'horizontalExtend',
  '<': 'horizontalExtend',
  '-': 'filler',
};

/** Separates a region name from its embedded constraint spec */
export const EMBEDDED_SPEC_SEPARATOR = ':';

/** Separates the entries of an embedded constraint spec */
export const EMBEDDED_ENTRY_SEPARATOR = ',';

// ============================================================================
// Anchor and Fill Keywords
// ============================================================================

export const ANCHOR_SYNONYMS: Readonly<Record<AnchorDirection, readonly string[]>> = {
  center: ['center', 'ctr', 'c'],
  north: ['north', 'n', 'top'],
  south: ['south', 's', 'bot', 'bottom'],
  east: ['east', 'e', 'right', 'r'],
  west: ['west', 'w', 'left', 'l'],
  northeast: ['northeast', 'ne', 'topright', 'tr'],
  northwest: ['northwest', 'nw', 'topleft', 'tl'],
  southeast: ['southeast', 'se', 'bottomright', 'br'],
  southwest: ['southwest', 'sw', 'bottomleft', 'bl'],
} as const;

export const FILL_SYNONYMS: Readonly<Record<FillMode, readonly string[]>> = {
  none: ['none', 'neither', 'n'],
  horizontal: ['horizontal', 'h', 'x'],
  vertical: ['vertical', 'v', 'y'],
  both: ['both', 'all', 'xy', 'yx', 'hv', 'vh'],
} as const;

// ============================================================================
// Defaults
// ============================================================================

/**
 * Frozen throughout; records are built from copies of it
 */
export const DEFAULT_CONSTRAINTS: Readonly<Omit<ConstraintRecord, 'insets'>> & {
  readonly insets: Readonly<Insets>;
} = Object.freeze({
  gridwidth: 1,
  gridheight: 1,
  weightx: 0,
  weighty: 0,
  anchor: 'center',
  fill: 'none',
  ipadx: 0,
  ipady: 0,
  insets: Object.freeze({ top: 0, bottom: 0, left: 0, right: 0 }),
});

/**
 * Divisor applied to a region's grid size to derive its weight when the
 * caller gives none, so larger regions take proportionally more space.
 */
export const DERIVED_WEIGHT_DIVISOR = 100;
