import { describe, it, expect } from 'vitest';
import { splitConstraintToken, splitEmbedded } from '../../src/constraint/embedded-splitter';
import { LayoutErrorCode } from '../../src/errors';
import { catchError } from '../helpers/catch-error';

describe('embedded-splitter', () => {
  describe('splitConstraintToken', () => {
    it.each([
      'gridwidth',
      'width',
      'wd',
      'gridheight',
      'height',
      'ht',
      'weightx',
      'wx',
      'weighty',
      'wy',
      'w*',
      'weight*',
      'anchor',
      'a',
      'fill',
      'f',
      'ipadx',
      'px',
      'ipady',
      'py',
      'ipad*',
      'p*',
      'inset_top',
      'insets_top',
      'it',
      'inset_bottom',
      'insets_bottom',
      'ib',
      'inset_left',
      'insets_left',
      'il',
      'inset_right',
      'insets_right',
      'ir',
      'insets*',
      'inset*',
      'i*',
    ])('should split %s42 into its full name and value', (mnemonic) => {
      expect(splitConstraintToken(`${mnemonic}42`)).toEqual([mnemonic, '42']);
    });

    it('should split keyword values', () => {
      expect(splitConstraintToken('fxy')).toEqual(['f', 'xy']);
      expect(splitConstraintToken('anw')).toEqual(['a', 'nw']);
      expect(splitConstraintToken('anchornw')).toEqual(['anchor', 'nw']);
    });

    it('should keep the original case of the name', () => {
      expect(splitConstraintToken('WeightX1.5')).toEqual(['WeightX', '1.5']);
    });

    it('should allow an empty value', () => {
      expect(splitConstraintToken('wx')).toEqual(['wx', '']);
    });

    it('should fail when no name prefixes the entry', () => {
      const error = catchError(() => splitConstraintToken('zz1'));

      expect(error).toMatchObject({
        code: LayoutErrorCode.EMBEDDED_CONSTRAINT_UNRECOGNIZED,
        message: 'Could not interpret embedded constraint {zz1}',
        context: { input: 'zz1' },
      });
    });
  });

  describe('splitEmbedded', () => {
    it('should convert a comma-separated spec to canonical form', () => {
      expect(splitEmbedded('wx1,wy2,i*5,fxy')).toBe('wx 1 wy 2 i* 5 f xy');
    });

    it('should handle a single entry', () => {
      expect(splitEmbedded('p*5')).toBe('p* 5');
    });

    it('should emit only the name for an entry with no value', () => {
      expect(splitEmbedded('wx')).toBe('wx');
      expect(splitEmbedded('wx,wy1')).toBe('wx wy 1');
      expect(splitEmbedded('wy1,wx')).toBe('wy 1 wx');
    });

    it('should return an empty string for an empty spec', () => {
      expect(splitEmbedded('')).toBe('');
    });

    it('should fail on an empty entry between commas', () => {
      expect(catchError(() => splitEmbedded('wx1,,wy2'))).toMatchObject({
        code: LayoutErrorCode.EMBEDDED_CONSTRAINT_UNRECOGNIZED,
        context: { input: '' },
      });
    });
  });
});
