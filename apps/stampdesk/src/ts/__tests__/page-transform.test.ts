/**
 * Tests for page reorder/duplicate/delete and stamp remapping
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import { access, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

import { PageCollectionError, PdfInspectionError } from '../errors';
import {
  applyPageOrder,
  buildPageOrder,
  identityOrder,
  isIdentityOrder,
  isTransformOutput,
  movePage,
  remapStamps,
  transformPages,
} from '../page-transform';
import { collectPages, inspectPdf, validatePageOrder } from '../pdf-backend';
import { counterIds, makeDocument, makeStamp, makeWorkDir, removeWorkDir, writePdf } from './fixtures';

const settings = { tempPrefix: 'stampdesk-transform-test-' };

// ============================================================
// Page orders
// ============================================================

describe('buildPageOrder', () => {
  it('deletes a page', () => {
    expect(buildPageOrder({ type: 'delete', page: 2 }, 4)).toEqual([1, 3, 4]);
  });

  it('duplicates a page in place', () => {
    expect(buildPageOrder({ type: 'duplicate', page: 2 }, 3)).toEqual([1, 2, 2, 3]);
  });

  it('pastes a copied page after the target', () => {
    expect(buildPageOrder({ type: 'paste', page: 3, copied: 1 }, 3)).toEqual([1, 2, 3, 1]);
  });

  it('leaves the order alone for the identity action', () => {
    expect(buildPageOrder({ type: 'identity' }, 3)).toEqual([1, 2, 3]);
  });

  it('identity order counts from 1', () => {
    expect(identityOrder(3)).toEqual([1, 2, 3]);
    expect(identityOrder(0)).toEqual([]);
  });
});

describe('movePage', () => {
  it('moves an entry and leaves the input alone', () => {
    const order = [1, 2, 3, 4];
    expect(movePage(order, 0, 2)).toEqual([2, 3, 1, 4]);
    expect(movePage(order, 3, 0)).toEqual([4, 1, 2, 3]);
    expect(order).toEqual([1, 2, 3, 4]);
  });

  it('rejects indices outside the order', () => {
    expect(() => movePage([1, 2], 0, 2)).toThrow(PageCollectionError);
    expect(() => movePage([1, 2], -1, 0)).toThrow(PageCollectionError);
  });

  it('always yields a permutation', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 20 }).chain((n) =>
          fc.tuple(fc.constant(n), fc.nat({ max: n - 1 }), fc.nat({ max: n - 1 }))
        ),
        ([n, from, to]) => {
          const moved = movePage(identityOrder(n), from, to);
          expect([...moved].sort((a, b) => a - b)).toEqual(identityOrder(n));
        }
      )
    );
  });
});

describe('isIdentityOrder', () => {
  it('recognises untouched orders', () => {
    expect(isIdentityOrder([1, 2, 3])).toBe(true);
    expect(isIdentityOrder([1, 3, 2])).toBe(false);
    expect(isIdentityOrder([1, 2, 2])).toBe(false);
  });
});

describe('validatePageOrder', () => {
  it('rejects an empty order', () => {
    expect(() => validatePageOrder([], 3)).toThrow('A page order must keep at least one page');
  });

  it('rejects pages that do not exist', () => {
    expect(() => validatePageOrder([1, 4], 3)).toThrow('Page 4 does not exist (document has 3 pages)');
    expect(() => validatePageOrder([0], 3)).toThrow(PageCollectionError);
  });
});

// ============================================================
// Stamp remapping
// ============================================================

describe('remapStamps', () => {
  it('keeps geometry and page numbers for the identity order, with fresh ids', () => {
    const stamps = [makeStamp({ id: 'a', pageNum: 1 }), makeStamp({ id: 'b', pageNum: 2, x: 300 })];
    const remapped = remapStamps(stamps, [1, 2], counterIds('new'));

    expect(remapped).toEqual([
      { ...stamps[0], id: 'new-1' },
      { ...stamps[1], id: 'new-2' },
    ]);
  });

  it('fans a stamp out to every copy of a duplicated page', () => {
    const stamp = makeStamp({ id: 'seal', pageNum: 3, x: 12, y: 34 });
    // page 3 at positions 2 and 5
    const remapped = remapStamps([stamp], [1, 2, 3, 4, 5, 3]);

    expect(remapped).toHaveLength(2);
    expect(remapped.map((s) => s.pageNum)).toEqual([3, 6]);
    expect(remapped[0].id).not.toBe(remapped[1].id);
    expect(remapped.every((s) => s.id !== 'seal')).toBe(true);
    for (const s of remapped) {
      expect({ x: s.x, y: s.y, width: s.width, height: s.height, image: s.image }).toEqual({
        x: 12,
        y: 34,
        width: 105,
        height: 56,
        image: stamp.image,
      });
    }
  });

  it('drops stamps on deleted pages', () => {
    const stamps = [makeStamp({ id: 'a', pageNum: 1 }), makeStamp({ id: 'b', pageNum: 2 })];
    const remapped = remapStamps(stamps, [2], counterIds());
    expect(remapped).toEqual([{ ...stamps[1], id: 'id-1', pageNum: 1 }]);
  });

  it('follows a reversed order', () => {
    const stamps = [makeStamp({ id: 'a', pageNum: 1 }), makeStamp({ id: 'b', pageNum: 3 })];
    const remapped = remapStamps(stamps, [3, 2, 1], counterIds());
    expect(remapped.map((s) => [s.x, s.pageNum])).toEqual([
      [50, 1],
      [50, 3],
    ]);
    expect(remapped.map((s) => s.id)).toEqual(['id-1', 'id-2']);
  });

  it('only produces page numbers valid for the new page count', () => {
    fc.assert(
      fc.property(
        fc.array(fc.integer({ min: 1, max: 6 }), { minLength: 1, maxLength: 12 }),
        fc.array(fc.integer({ min: 1, max: 6 }), { maxLength: 8 }),
        (order, pages) => {
          const stamps = pages.map((pageNum, i) => makeStamp({ id: `s${i}`, pageNum }));
          const remapped = remapStamps(stamps, order);
          const expected = order.reduce((sum, p) => sum + pages.filter((q) => q === p).length, 0);

          expect(remapped).toHaveLength(expected);
          for (const s of remapped) {
            expect(s.pageNum).toBeGreaterThanOrEqual(1);
            expect(s.pageNum).toBeLessThanOrEqual(order.length);
          }
        }
      )
    );
  });
});

// ============================================================
// PDF transforms
// ============================================================

describe('collectPages', () => {
  let dir: string;
  let source: string;

  beforeEach(async () => {
    dir = await makeWorkDir();
    source = await writePdf(join(dir, 'source.pdf'), [
      [100, 100],
      [200, 200],
      [300, 300],
    ]);
  });

  afterEach(async () => {
    await removeWorkDir(dir);
  });

  it('writes pages in the requested order with repeats and omissions', async () => {
    const output = join(dir, 'out.pdf');
    await collectPages(source, output, [3, 1, 3]);

    const pages = await inspectPdf(output);
    expect(pages.map((p) => p.width)).toEqual([300, 100, 300]);
  });

  it('rejects an out-of-range page before writing', async () => {
    const output = join(dir, 'out.pdf');
    await expect(collectPages(source, output, [1, 4])).rejects.toThrow(PageCollectionError);
    await expect(inspectPdf(output)).rejects.toThrow(PdfInspectionError);
  });

  it('transformPages writes a new temp file and leaves the source untouched', async () => {
    const output = await transformPages(source, [2], settings.tempPrefix);
    try {
      expect(output).not.toBe(source);
      expect(output).toContain('stampdesk-transform-test-mod_');
      expect((await inspectPdf(output)).map((p) => p.width)).toEqual([200]);
      expect(await inspectPdf(source)).toHaveLength(3);
    } finally {
      await rm(output, { force: true });
    }
  });
});

describe('isTransformOutput', () => {
  it('only claims files written by a transform', () => {
    const prefix = settings.tempPrefix;
    expect(isTransformOutput(join(tmpdir(), `${prefix}mod_1_abcd1234_a.pdf`), prefix)).toBe(true);
    expect(isTransformOutput(join(tmpdir(), 'a.pdf'), prefix)).toBe(false);
    expect(isTransformOutput(join('/inbox', `${prefix}mod_1_abcd1234_a.pdf`), prefix)).toBe(false);
  });
});

describe('applyPageOrder', () => {
  let dir: string;
  let source: string;

  beforeEach(async () => {
    dir = await makeWorkDir();
    source = await writePdf(join(dir, 'source.pdf'), [
      [100, 100],
      [200, 200],
      [300, 300],
    ]);
  });

  afterEach(async () => {
    await removeWorkDir(dir);
  });

  it('replaces the path and remaps stamps after writing', async () => {
    const doc = makeDocument({
      path: source,
      stamps: [makeStamp({ id: 'a', pageNum: 1 }), makeStamp({ id: 'b', pageNum: 2 })],
    });

    const result = await applyPageOrder(doc, [2, 2, 3], settings, counterIds('new'));
    try {
      expect(result.pageCount).toBe(3);
      expect(result.droppedStamps).toBe(1);
      expect(doc.path).toBe(result.path);
      expect(doc.pageCount).toBe(3);
      expect(doc.stamps.map((s) => [s.id, s.pageNum])).toEqual([
        ['new-1', 1],
        ['new-2', 2],
      ]);
      expect((await inspectPdf(result.path)).map((p) => p.width)).toEqual([200, 200, 300]);
    } finally {
      await rm(result.path, { force: true });
    }
  });

  it('removes the output of an earlier transform once it is replaced', async () => {
    const doc = makeDocument({ path: source });

    const first = await applyPageOrder(doc, [3, 2, 1], settings);
    const second = await applyPageOrder(doc, [1, 2], settings);
    try {
      await expect(access(first.path)).rejects.toThrow();
      expect((await inspectPdf(second.path)).map((p) => p.width)).toEqual([300, 200]);
      expect(await inspectPdf(source)).toHaveLength(3);
    } finally {
      await rm(first.path, { force: true });
      await rm(second.path, { force: true });
    }
  });

  it('leaves the document unchanged when the transform fails', async () => {
    const stamps = [makeStamp({ id: 'a', pageNum: 1 })];
    const doc = makeDocument({ path: source, stamps, status: 'completed' });

    await expect(applyPageOrder(doc, [], settings)).rejects.toThrow(PageCollectionError);

    expect(doc.path).toBe(source);
    expect(doc.stamps).toBe(stamps);
    expect(doc.status).toBe('completed');
  });
});
