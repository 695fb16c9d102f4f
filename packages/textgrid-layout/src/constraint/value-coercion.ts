/**
 * Value Coercion
 * Converts raw constraint value strings into typed values.
 */

import {
  ANCHOR_DIRECTIONS,
  FILL_MODES,
  type Anchor,
  type AnchorDirection,
  type Fill,
  type FillMode,
  isRawCode,
} from '../types/constraints';
import { ANCHOR_SYNONYMS, FILL_SYNONYMS } from '../types/layout-constants';
import { LayoutError, LayoutErrorCode } from '../errors';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Keyword -> enum lookups built once from the synonym tables
 */
const ANCHOR_KEYWORDS = invertSynonyms(ANCHOR_DIRECTIONS, ANCHOR_SYNONYMS);
const FILL_KEYWORDS = invertSynonyms(FILL_MODES, FILL_SYNONYMS);

function invertSynonyms<T extends string>(
  targets: readonly T[],
  table: Readonly<Record<T, readonly string[]>>
): Map<string, T> {
  const keywords = new Map<string, T>();
  for (const target of targets) {
    for (const synonym of table[target]) {
      keywords.set(synonym, target);
    }
  }
  return keywords;
}

/**
 * Parse a plain integer (optional sign, decimal digits), or undefined
 */
function parseInteger(value: string): number | undefined {
  if (!INTEGER_PATTERN.test(value)) return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}

/**
 * Convert an integer constraint value
 * @param name - The mnemonic being set, reported on failure
 */
export function toInt(name: string, value: string): number {
  const parsed = parseInteger(value);
  if (parsed === undefined) {
    throw new LayoutError(
      LayoutErrorCode.CONSTRAINT_VALUE_INVALID,
      `Invalid numeric value {${value}} for constraint ${name}: expected an integer`,
      { context: { name, value } }
    );
  }
  return parsed;
}

/**
 * Convert a floating-point constraint value
 * @param name - The mnemonic being set, reported on failure
 */
export function toFloat(name: string, value: string): number {
  if (!FLOAT_PATTERN.test(value)) {
    throw new LayoutError(
      LayoutErrorCode.CONSTRAINT_VALUE_INVALID,
      `Invalid numeric value {${value}} for constraint ${name}: expected a number`,
      { context: { name, value } }
    );
  }
  return Number.parseFloat(value);
}

/**
 * Resolve an anchor keyword (case-insensitive) or raw integer code
 */
export function toAnchor(value: string): Anchor {
  const raw = parseInteger(value);
  if (raw !== undefined) {
    return { kind: 'raw', value: raw };
  }

  const direction = ANCHOR_KEYWORDS.get(value.toLowerCase());
  if (!direction) {
    throw new LayoutError(
      LayoutErrorCode.ANCHOR_VALUE_UNKNOWN,
      `Unknown anchor value {${value}}`,
      { context: { name: 'anchor', value } }
    );
  }
  return direction;
}

/**
 * Resolve a fill keyword (case-insensitive) or raw integer code
 */
export function toFill(value: string): Fill {
  const raw = parseInteger(value);
  if (raw !== undefined) {
    return { kind: 'raw', value: raw };
  }

  const mode = FILL_KEYWORDS.get(value.toLowerCase());
  if (!mode) {
    throw new LayoutError(
      LayoutErrorCode.FILL_VALUE_UNKNOWN,
      `Unknown fill value {${value}}`,
      { context: { name: 'fill', value } }
    );
  }
  return mode;
}

export function formatAnchor(anchor: Anchor): AnchorDirection | number {
  return isRawCode(anchor) ? anchor.value : anchor;
}

export function formatFill(fill: Fill): FillMode | number {
  return isRawCode(fill) ? fill.value : fill;
}
