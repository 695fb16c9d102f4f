/**
 * textgrid-layout
 *
 * Parse 2D text grid layouts and compact constraint strings into typed
 * placement data
 *
 * @example
 * ```typescript
 * import { GridPlacer } from 'textgrid-layout';
 *
 * const placer = new GridPlacer('fill xy', 'insets*', 2);
 * placer.parseLayout(`
 *   {title:an  +      +      }
 *   {list      editor +      }
 *   {|         status:fx +   }
 * `);
 *
 * const { row, col, constraints } = placer.place('editor', 'wx 3');
 * ```
 */

// Placement
export { GridPlacer, type Placement } from './grid-placer';

// Grid layout language
export { parseLayout, tokenizeLayout, isTerminatingChar, RegionRegistry, lookupRegion } from './layout';

// Constraint language
export {
  applyConstraints,
  interpretConstraint,
  parseConstraints,
  buildConstraintString,
  tokenizeConstraints,
  splitEmbedded,
  splitConstraintToken,
  createConstraintRecord,
  copyConstraintRecord,
  toInt,
  toFloat,
  toAnchor,
  toFill,
  formatAnchor,
  formatFill,
  MNEMONIC_TABLE,
  type MnemonicEntry,
  type ConstraintSetter,
} from './constraint';

// Errors
export { LayoutError, LayoutErrorCode, isLayoutError, type LayoutErrorContext } from './errors';

// Types
export type {
  AnchorDirection,
  FillMode,
  RawCode,
  Anchor,
  Fill,
  Insets,
  ConstraintRecord,
  ConstraintPart,
  Region,
  StructuralTokenType,
  StructuralToken,
  IdentifierToken,
  LayoutToken,
} from './types';

// Constants and guards
export {
  ANCHOR_DIRECTIONS,
  FILL_MODES,
  ANCHOR_SYNONYMS,
  FILL_SYNONYMS,
  DEFAULT_CONSTRAINTS,
  STRUCTURAL_CHARS,
  isRawCode,
  isIdentifierToken,
} from './types';
