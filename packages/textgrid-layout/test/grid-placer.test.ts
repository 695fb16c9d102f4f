import { describe, it, expect, beforeEach } from 'vitest';
import { GridPlacer } from '../src/grid-placer';
import { createConstraintRecord } from '../src/constraint';
import { LayoutErrorCode } from '../src/errors';
import { catchError } from './helpers/catch-error';

const LAYOUT = `
  {c1                  +   +   c2}
  {c3:wx1,wy2,i*5,fxy  +   c4  + }
  {|                   -   -   c5}
  {|                   -   c6  + }
`;

describe('GridPlacer', () => {
  describe('defaults', () => {
    it('should use the library defaults when given none', () => {
      expect(new GridPlacer().getDefaults()).toEqual(createConstraintRecord());
    });

    it('should accept defaults as strings, names and values', () => {
      const placer = new GridPlacer(
        'weightx 1.0 weighty 0.0',
        'inset_top 5', 'inset_bottom', 5,
        'anchor center', 'fill', 'xy'
      );

      expect(placer.getDefaults()).toEqual(
        createConstraintRecord({
          weightx: 1,
          weighty: 0,
          anchor: 'center',
          fill: 'both',
          insets: { top: 5, bottom: 5, left: 0, right: 0 },
        })
      );
    });

    it('should hand out copies of the defaults', () => {
      const placer = new GridPlacer();
      placer.getDefaults().weightx = 9;

      expect(placer.getDefaults().weightx).toBe(0);
    });

    it('should apply updates to later placements', () => {
      const placer = new GridPlacer('fill xy');
      placer.updateDefaults('anchor nw');

      expect(placer.placeAt(0, 0).constraints).toMatchObject({ anchor: 'northwest', fill: 'both' });
    });
  });

  describe('placeAt', () => {
    it('should place at the given cell with the defaults', () => {
      const placer = new GridPlacer('ipadx 4');

      expect(placer.placeAt(0, 2)).toEqual({
        row: 0,
        col: 2,
        constraints: createConstraintRecord({ ipadx: 4 }),
      });
    });

    it('should apply overrides without changing the defaults', () => {
      const placer = new GridPlacer('weightx 1');
      const placement = placer.placeAt(0, 3, 'weightx', 4.0, 'fill horizontal');

      expect(placement.constraints.weightx).toBe(4);
      expect(placement.constraints.fill).toBe('horizontal');
      expect(placer.getDefaults().weightx).toBe(1);
      expect(placer.getDefaults().fill).toBe('none');
    });
  });

  describe('place', () => {
    let placer: GridPlacer;

    beforeEach(() => {
      placer = new GridPlacer('weightx 1.0 anchor s');
      placer.parseLayout(LAYOUT);
    });

    it('should fail before any layout is parsed', () => {
      expect(catchError(() => new GridPlacer().place('c1'))).toMatchObject({
        code: LayoutErrorCode.LAYOUT_NOT_PARSED,
        message: 'No layout string has been parsed',
      });
    });

    it('should fail for a name missing from the layout', () => {
      expect(catchError(() => placer.place('nobody'))).toMatchObject({
        code: LayoutErrorCode.REGION_NOT_FOUND,
        context: { region: 'nobody' },
      });
    });

    it('should keep the parsed layout', () => {
      expect(placer.getLayout()?.names()).toEqual(['c1', 'c2', 'c3', 'c4', 'c5', 'c6']);
    });

    it('should take position and grid size from the layout and derive weights from it', () => {
      const placement = placer.place('c1');

      expect(placement.name).toBe('c1');
      expect(placement.row).toBe(0);
      expect(placement.col).toBe(0);
      expect(placement.constraints.gridwidth).toBe(3);
      expect(placement.constraints.gridheight).toBe(1);
      expect(placement.constraints.weightx).toBeCloseTo(0.03, 10);
      expect(placement.constraints.weighty).toBeCloseTo(0.01, 10);
      expect(placement.constraints.anchor).toBe('south');
    });

    it('should apply embedded constraints from the layout', () => {
      const { row, col, constraints } = placer.place('c3');

      expect(row).toBe(1);
      expect(col).toBe(0);
      expect(constraints).toEqual(
        createConstraintRecord({
          gridwidth: 2,
          gridheight: 3,
          weightx: 1,
          weighty: 2,
          anchor: 'south',
          fill: 'both',
          insets: { top: 5, bottom: 5, left: 5, right: 5 },
        })
      );
    });

    it('should let caller constraints override embedded ones', () => {
      const { constraints } = placer.place('c3', 'fill none', 'wy', 0.5);

      expect(constraints.fill).toBe('none');
      expect(constraints.weightx).toBe(1);
      expect(constraints.weighty).toBe(0.5);
    });

    it('should always take grid size from the layout', () => {
      const { constraints } = placer.place('c2', 'gridwidth 9 ht 4');

      expect(constraints.gridwidth).toBe(1);
      expect(constraints.gridheight).toBe(1);
    });

    it('should keep explicit weights given with w*', () => {
      const { constraints } = placer.place('c4', 'w* 7');

      expect(constraints.gridwidth).toBe(2);
      expect(constraints.weightx).toBe(7);
      expect(constraints.weighty).toBe(7);
    });

    it('should recognise weight names in any case and derive only the missing axis', () => {
      const { constraints } = placer.place('c6', 'WX', 3);

      expect(constraints.weightx).toBe(3);
      expect(constraints.weighty).toBeCloseTo(0.01, 10);
    });

    it('should not count a weight name used as a value', () => {
      const { constraints } = placer.place('c5', 'anchor', 'e');

      expect(constraints.anchor).toBe('east');
      expect(constraints.weightx).toBeCloseTo(0.01, 10);
    });

    it('should leave the defaults untouched', () => {
      placer.place('c3', 'ipadx 8');

      expect(placer.getDefaults()).toEqual(createConstraintRecord({ weightx: 1, anchor: 'south' }));
    });

    it('should resolve names against the most recent layout', () => {
      placer.parseLayout('{solo}');

      expect(placer.place('solo').constraints.gridwidth).toBe(1);
      expect(catchError(() => placer.place('c1'))).toMatchObject({ code: LayoutErrorCode.REGION_NOT_FOUND });
    });
  });
});
