/**
 * Constraint Parser
 * Interprets canonical "name value name value ..." strings into a constraint record.
 */

import type { ConstraintPart, ConstraintRecord } from '../types/constraints';
import { LayoutError, LayoutErrorCode } from '../errors';
import { isDebugEnabled } from '../utils/debug';
import { findSetter } from './mnemonic-table';

/**
 * Collapse a mix of constraint strings, names and values into one string
 * with exactly one space between tokens. Null and undefined parts are skipped.
 *
 * @example
 * ```typescript
 * buildConstraintString('one 1 two 2', 'three', 3, 'four   4.0 ');
 * // => 'one 1 two 2 three 3 four 4.0'
 * ```
 */
export function buildConstraintString(...parts: ConstraintPart[]): string {
  return parts
    .filter((part): part is string | number => part !== null && part !== undefined)
    .flatMap((part) => tokenizeConstraints(String(part)))
    .join(' ');
}

/**
 * Split a canonical constraint string on runs of whitespace
 */
export function tokenizeConstraints(constraints: string): string[] {
  const trimmed = constraints.trim();
  return trimmed.length === 0 ? [] : trimmed.split(/\s+/);
}

/**
 * Apply a canonical constraint string to a record in place.
 * Only the fields named in the string change. Pairs are applied in order,
 * so a failing pair leaves the pairs before it applied.
 *
 * @returns The same record, for chaining
 */
export function applyConstraints(record: ConstraintRecord, constraints: string): ConstraintRecord {
  const tokens = tokenizeConstraints(constraints);

  if (tokens.length % 2 !== 0) {
    throw new LayoutError(
      LayoutErrorCode.CONSTRAINT_PAIR_INCOMPLETE,
      `Incomplete constraint pair in {${constraints}}: constraint ${tokens[tokens.length - 1]} has no value`,
      { context: { input: constraints, name: tokens[tokens.length - 1] } }
    );
  }

  for (let i = 0; i < tokens.length; i += 2) {
    interpretConstraint(record, tokens[i], tokens[i + 1]);
  }

  return record;
}

/**
 * Apply a single constraint name and value. Both are matched case-insensitively.
 */
export function interpretConstraint(record: ConstraintRecord, name: string, value: string): void {
  const mnemonic = name.toLowerCase();
  const setter = findSetter(mnemonic);

  if (!setter) {
    throw new LayoutError(
      LayoutErrorCode.CONSTRAINT_NAME_UNKNOWN,
      `Unknown constraint name: ${mnemonic}`,
      { context: { name: mnemonic, value } }
    );
  }

  setter(record, value.toLowerCase(), mnemonic);

  if (isDebugEnabled()) {
    console.log(`[Constraint] ${mnemonic} = ${value}`);
  }
}

/**
 * Build a constraint string from variadic parts and apply it to the record
 */
export function parseConstraints(record: ConstraintRecord, ...parts: ConstraintPart[]): ConstraintRecord {
  return applyConstraints(record, buildConstraintString(...parts));
}
