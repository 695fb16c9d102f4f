/**
 * Constraint record construction and copying
 */

import type { ConstraintRecord } from '../types/constraints';
import { DEFAULT_CONSTRAINTS } from '../types/layout-constants';

/**
 * Create a fully populated record from the library defaults, with any
 * given fields overridden.
 */
export function createConstraintRecord(overrides?: Partial<ConstraintRecord>): ConstraintRecord {
  const base = copyConstraintRecord(DEFAULT_CONSTRAINTS);
  if (!overrides) return base;

  return {
    ...base,
    ...overrides,
    insets: { ...base.insets, ...overrides.insets },
  };
}

/**
 * Deep copy, so the result can be updated without touching the source
 */
export function copyConstraintRecord(from: Readonly<ConstraintRecord>): ConstraintRecord {
  return {
    ...from,
    anchor: typeof from.anchor === 'object' ? { ...from.anchor } : from.anchor,
    fill: typeof from.fill === 'object' ? { ...from.fill } : from.fill,
    insets: { ...from.insets },
  };
}
