/**
 * Mnemonic Table
 *
 * The single ordered list of constraint names shared by the embedded-spec
 * splitter and the interpreter. The splitter takes the first entry that
 * prefixes a token, so longer names sharing a prefix with a shorter one
 * (weightx / wx, inset_top / it) are listed ahead of it.
 */

import type { ConstraintRecord } from '../types/constraints';
import { toAnchor, toFill, toFloat, toInt } from './value-coercion';

/**
 * Updates one or more fields of a record from a raw value string
 * @param name - The mnemonic as written, for error messages
 */
export type ConstraintSetter = (record: ConstraintRecord, value: string, name: string) => void;

export interface MnemonicEntry {
  readonly mnemonic: string;
  readonly apply: ConstraintSetter;
}

// ============================================================================
// Field Setters
// ============================================================================

const setGridWidth: ConstraintSetter = (record, value, name) => {
  record.gridwidth = toInt(name, value);
};

const setGridHeight: ConstraintSetter = (record, value, name) => {
  record.gridheight = toInt(name, value);
};

const setWeightX: ConstraintSetter = (record, value, name) => {
  record.weightx = toFloat(name, value);
};

const setWeightY: ConstraintSetter = (record, value, name) => {
  record.weighty = toFloat(name, value);
};

const setWeights: ConstraintSetter = (record, value, name) => {
  record.weightx = record.weighty = toFloat(name, value);
};

const setAnchor: ConstraintSetter = (record, value) => {
  record.anchor = toAnchor(value);
};

const setFill: ConstraintSetter = (record, value) => {
  record.fill = toFill(value);
};

const setPadX: ConstraintSetter = (record, value, name) => {
  record.ipadx = toInt(name, value);
};

const setPadY: ConstraintSetter = (record, value, name) => {
  record.ipady = toInt(name, value);
};

const setPads: ConstraintSetter = (record, value, name) => {
  record.ipadx = record.ipady = toInt(name, value);
};

const setInsetTop: ConstraintSetter = (record, value, name) => {
  record.insets.top = toInt(name, value);
};

const setInsetBottom: ConstraintSetter = (record, value, name) => {
  record.insets.bottom = toInt(name, value);
};

const setInsetLeft: ConstraintSetter = (record, value, name) => {
  record.insets.left = toInt(name, value);
};

const setInsetRight: ConstraintSetter = (record, value, name) => {
  record.insets.right = toInt(name, value);
};

const setInsets: ConstraintSetter = (record, value, name) => {
  const inset = toInt(name, value);
  record.insets = { top: inset, bottom: inset, left: inset, right: inset };
};

// ============================================================================
// Table
// ============================================================================

export const MNEMONIC_TABLE: readonly MnemonicEntry[] = Object.freeze([
  { mnemonic: 'gridwidth', apply: setGridWidth },
  { mnemonic: 'width', apply: setGridWidth },
  { mnemonic: 'wd', apply: setGridWidth },
  { mnemonic: 'gridheight', apply: setGridHeight },
  { mnemonic: 'height', apply: setGridHeight },
  { mnemonic: 'ht', apply: setGridHeight },
  { mnemonic: 'weightx', apply: setWeightX },
  { mnemonic: 'wx', apply: setWeightX },
  { mnemonic: 'weighty', apply: setWeightY },
  { mnemonic: 'wy', apply: setWeightY },
  { mnemonic: 'w*', apply: setWeights },
  { mnemonic: 'weight*', apply: setWeights },
  { mnemonic: 'anchor', apply: setAnchor },
  { mnemonic: 'a', apply: setAnchor },
  { mnemonic: 'fill', apply: setFill },
  { mnemonic: 'f', apply: setFill },
  { mnemonic: 'ipadx', apply: setPadX },
  { mnemonic: 'px', apply: setPadX },
  { mnemonic: 'ipady', apply: setPadY },
  { mnemonic: 'py', apply: setPadY },
  { mnemonic: 'ipad*', apply: setPads },
  { mnemonic: 'p*', apply: setPads },
  { mnemonic: 'inset_top', apply: setInsetTop },
  { mnemonic: 'insets_top', apply: setInsetTop },
  { mnemonic: 'it', apply: setInsetTop },
  { mnemonic: 'inset_bottom', apply: setInsetBottom },
  { mnemonic: 'insets_bottom', apply: setInsetBottom },
  { mnemonic: 'ib', apply: setInsetBottom },
  { mnemonic: 'inset_left', apply: setInsetLeft },
  { mnemonic: 'insets_left', apply: setInsetLeft },
  { mnemonic: 'il', apply: setInsetLeft },
  { mnemonic: 'inset_right', apply: setInsetRight },
  { mnemonic: 'insets_right', apply: setInsetRight },
  { mnemonic: 'ir', apply: setInsetRight },
  { mnemonic: 'insets*', apply: setInsets },
  { mnemonic: 'inset*', apply: setInsets },
  { mnemonic: 'i*', apply: setInsets },
]);

const SETTERS_BY_MNEMONIC: ReadonlyMap<string, ConstraintSetter> = new Map(
  MNEMONIC_TABLE.map((entry) => [entry.mnemonic, entry.apply])
);

/**
 * Look up the setter for a lower-cased mnemonic
 */
export function findSetter(mnemonic: string): ConstraintSetter | undefined {
  return SETTERS_BY_MNEMONIC.get(mnemonic);
}

/**
 * First mnemonic in table order that prefixes the (lower-cased) token
 */
export function findPrefixMnemonic(token: string): string | undefined {
  const lowered = token.toLowerCase();
  return MNEMONIC_TABLE.find((entry) => lowered.startsWith(entry.mnemonic))?.mnemonic;
}

/**
 * Mnemonics that set weightx, weighty, or both
 */
export const WEIGHT_X_MNEMONICS: ReadonlySet<string> = new Set(
  MNEMONIC_TABLE.filter((e) => e.apply === setWeightX || e.apply === setWeights).map((e) => e.mnemonic)
);

export const WEIGHT_Y_MNEMONICS: ReadonlySet<string> = new Set(
  MNEMONIC_TABLE.filter((e) => e.apply === setWeightY || e.apply === setWeights).map((e) => e.mnemonic)
);
