/**
 * Layout Tokenizer
 * Single left-to-right scan of a grid layout string.
 */

import type { LayoutToken } from '../types/region';
import { STRUCTURAL_CHARS } from '../types/layout-constants';

const WHITESPACE = /\s/;

/**
 * True for characters that end an identifier: whitespace or any structural character
 */
export function isTerminatingChar(char: string): boolean {
  return WHITESPACE.test(char) || Object.hasOwn(STRUCTURAL_CHARS, char);
}

/**
 * Lazily yield the tokens of a layout string. Whitespace only separates
 * tokens; structural characters are single-character tokens and everything
 * else is read greedily as an identifier.
 */
export function* tokenizeLayout(layout: string): Generator<LayoutToken, void, undefined> {
  let index = 0;

  while (index < layout.length) {
    const char = layout[index];

    if (WHITESPACE.test(char)) {
      index++;
      continue;
    }

    if (Object.hasOwn(STRUCTURAL_CHARS, char)) {
      yield { type: STRUCTURAL_CHARS[char], offset: index };
      index++;
      continue;
    }

    const start = index;
    while (index < layout.length && !isTerminatingChar(layout[index])) {
      index++;
    }
    yield { type: 'identifier', text: layout.slice(start, index), offset: start };
  }
}
