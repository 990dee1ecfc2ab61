import { expect } from 'chai';

import { adjustViewport, showingLine, visibleRows } from '../../src/lib/viewport';

describe('viewport', () => {
  describe('adjustViewport', () => {
    it('should scroll down just enough to show the cursor', () => {
      expect(adjustViewport(5, 0, 3, 10)).to.deep.equal({ cursor: 5, top: 3 });
    });

    it('should scroll up to the cursor', () => {
      expect(adjustViewport(1, 3, 3, 10)).to.deep.equal({ cursor: 1, top: 1 });
    });

    it('should clamp the cursor into the list', () => {
      expect(adjustViewport(20, 0, 3, 10)).to.deep.equal({ cursor: 9, top: 7 });
      expect(adjustViewport(-4, 2, 3, 10)).to.deep.equal({ cursor: 0, top: 0 });
    });

    it('should not leave empty rows after the list shrinks', () => {
      expect(adjustViewport(4, 4, 3, 5)).to.deep.equal({ cursor: 4, top: 2 });
    });

    it('should reset on an empty list', () => {
      expect(adjustViewport(3, 2, 3, 0)).to.deep.equal({ cursor: 0, top: 0 });
    });

    it('should keep the cursor visible for every position', () => {
      const rows = 4;
      let top = 0;
      for (let cursor = 0; cursor < 25; cursor++) {
        const view = adjustViewport(cursor, top, rows, 25);
        top = view.top;
        expect(view.top).to.be.at.most(view.cursor);
        expect(view.cursor).to.be.at.most(view.top + rows - 1);
      }
      for (let cursor = 24; cursor >= 0; cursor -= 3) {
        const view = adjustViewport(cursor, top, rows, 25);
        top = view.top;
        expect(view.top).to.be.at.most(view.cursor);
        expect(view.cursor).to.be.at.most(view.top + rows - 1);
      }
    });
  });

  describe('visibleRows', () => {
    it('should keep a footer row when the list overflows', () => {
      expect(visibleRows(10, 5)).to.equal(10);
      expect(visibleRows(10, 10)).to.equal(10);
      expect(visibleRows(10, 20)).to.equal(9);
    });

    it('should always give at least one row', () => {
      expect(visibleRows(1, 5)).to.equal(1);
      expect(visibleRows(0, 0)).to.equal(1);
    });
  });

  it('showingLine should describe the visible slice', () => {
    expect(showingLine(0, 9, 20)).to.equal('Showing 1-9 of 20 entries');
    expect(showingLine(15, 9, 20)).to.equal('Showing 16-20 of 20 entries');
  });
});
