/**
 * Embedded Constraint Splitter
 *
 * A layout identifier may carry constraints after a colon, written as
 * comma-separated name+value entries with nothing between name and value:
 *
 *   comp1:wx1,wy2,p*5
 *
 * This module turns the part after the colon into the canonical
 * "wx 1 wy 2 p* 5" form read by the constraint parser.
 */

import { EMBEDDED_ENTRY_SEPARATOR } from '../types/layout-constants';
import { LayoutError, LayoutErrorCode } from '../errors';
import { findPrefixMnemonic } from './mnemonic-table';

/**
 * Split one run-together entry such as "wx1.0" into its name and value.
 * The name keeps the spelling used in the entry.
 */
export function splitConstraintToken(token: string): [name: string, value: string] {
  const mnemonic = findPrefixMnemonic(token);

  if (mnemonic === undefined) {
    throw new LayoutError(
      LayoutErrorCode.EMBEDDED_CONSTRAINT_UNRECOGNIZED,
      `Could not interpret embedded constraint {${token}}`,
      { context: { input: token } }
    );
  }

  return [token.slice(0, mnemonic.length), token.slice(mnemonic.length)];
}

/**
 * Convert an embedded spec ("wx1,wy2,i*5,fxy") to canonical form
 * ("wx 1 wy 2 i* 5 f xy"). An empty spec yields an empty string, and an
 * entry with no value contributes only its name.
 */
export function splitEmbedded(spec: string): string {
  if (spec.length === 0) return '';

  return spec
    .split(EMBEDDED_ENTRY_SEPARATOR)
    .flatMap((entry) => splitConstraintToken(entry))
    .filter((part) => part.length > 0)
    .join(' ');
}
