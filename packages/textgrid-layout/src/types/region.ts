/**
 * Region Types
 * Output of the grid layout parser.
 */

/**
 * A named rectangular area of the grid
 */
export interface Region {
  readonly name: string;
  /** Zero-based row of the top-left cell */
  readonly row: number;
  /** Zero-based column of the top-left cell */
  readonly col: number;
  /** Number of columns spanned */
  readonly width: number;
  /** Number of rows spanned */
  readonly height: number;
  /**
   * Canonical "name value ..." string split from an embedded `name:spec`
   * suffix, or an empty string.
   */
  readonly constraints: string;
}

// ============================================================================
// Layout Tokens
// ============================================================================

export type StructuralTokenType =
  | 'rowStart'
  | 'rowEnd'
  | 'verticalExtend'
  | 'horizontalExtend'
  | 'filler';

export interface StructuralToken {
  type: StructuralTokenType;
  /** Offset of the token in the layout string */
  offset: number;
}

export interface IdentifierToken {
  type: 'identifier';
  text: string;
  offset: number;
}

export type LayoutToken = StructuralToken | IdentifierToken;

export function isIdentifierToken(token: LayoutToken): token is IdentifierToken {
  return token.type === 'identifier';
}
