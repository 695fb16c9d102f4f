/**
 * Constraint Language Module
 * Embedded-spec splitting and canonical constraint interpretation.
 */

export {
  applyConstraints,
  interpretConstraint,
  parseConstraints,
  buildConstraintString,
  tokenizeConstraints,
} from './constraint-parser';

export { splitEmbedded, splitConstraintToken } from './embedded-splitter';

export { createConstraintRecord, copyConstraintRecord } from './constraint-record';

export { toInt, toFloat, toAnchor, toFill, formatAnchor, formatFill } from './value-coercion';

export {
  MNEMONIC_TABLE,
  WEIGHT_X_MNEMONICS,
  WEIGHT_Y_MNEMONICS,
  findSetter,
  findPrefixMnemonic,
  type MnemonicEntry,
  type ConstraintSetter,
} from './mnemonic-table';
