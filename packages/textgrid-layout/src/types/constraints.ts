/**
 * Constraint Record Types
 * Typed layout parameters produced by the constraint interpreter.
 */

// ============================================================================
// Enumerated Values
// ============================================================================

export const ANCHOR_DIRECTIONS = [
  'center',
  'north',
  'south',
  'east',
  'west',
  'northeast',
  'northwest',
  'southeast',
  'southwest',
] as const;

export type AnchorDirection = (typeof ANCHOR_DIRECTIONS)[number];

export const FILL_MODES = ['none', 'horizontal', 'vertical', 'both'] as const;

export type FillMode = (typeof FILL_MODES)[number];

/**
 * A numeric code given in place of a keyword. Passed through unvalidated
 * so callers can use codes from their own presentation layer.
 */
export interface RawCode {
  kind: 'raw';
  value: number;
}

export type Anchor = AnchorDirection | RawCode;

export type Fill = FillMode | RawCode;

// ============================================================================
// Constraint Record
// ============================================================================

export interface Insets {
  top: number;
  bottom: number;
  left: number;
  right: number;
}

/**
 * A fully populated set of layout parameters for one region.
 * Interpreter calls only overwrite the fields named in their input.
 */
export interface ConstraintRecord {
  /** Number of grid columns spanned */
  gridwidth: number;
  /** Number of grid rows spanned */
  gridheight: number;
  weightx: number;
  weighty: number;
  anchor: Anchor;
  fill: Fill;
  /** Internal horizontal padding */
  ipadx: number;
  /** Internal vertical padding */
  ipady: number;
  insets: Insets;
}

/**
 * A single constraint argument as accepted by the variadic APIs:
 * whole constraint strings, bare names, or numeric values.
 */
export type ConstraintPart = string | number | null | undefined;

// ============================================================================
// Type Guards
// ============================================================================

export function isRawCode(value: Anchor | Fill): value is RawCode {
  return typeof value === 'object' && value.kind === 'raw';
}
