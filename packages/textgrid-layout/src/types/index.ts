/**
 * Public type exports
 */

export type {
  AnchorDirection,
  FillMode,
  RawCode,
  Anchor,
  Fill,
  Insets,
  ConstraintRecord,
  ConstraintPart,
} from './constraints';

export { ANCHOR_DIRECTIONS, FILL_MODES, isRawCode } from './constraints';

export type {
  Region,
  StructuralTokenType,
  StructuralToken,
  IdentifierToken,
  LayoutToken,
} from './region';

export { isIdentifierToken } from './region';

export {
  STRUCTURAL_CHARS,
  EMBEDDED_SPEC_SEPARATOR,
  EMBEDDED_ENTRY_SEPARATOR,
  ANCHOR_SYNONYMS,
  FILL_SYNONYMS,
  DEFAULT_CONSTRAINTS,
  DERIVED_WEIGHT_DIVISOR,
} from './layout-constants';
