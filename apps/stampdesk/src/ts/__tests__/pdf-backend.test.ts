import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { access, writeFile } from 'fs/promises';
import { join } from 'path';

import { FileSystemError, PdfInspectionError, WatermarkPlacementError } from '../errors';
import { addImageWatermark, getPageCount, inspectPdf } from '../pdf-backend';
import { makePng, makeWorkDir, removeWorkDir, writePdf } from './fixtures';

describe('pdf backend', () => {
  let dir: string;
  let source: string;
  let image: string;

  beforeEach(async () => {
    dir = await makeWorkDir();
    source = await writePdf(join(dir, 'source.pdf'), [
      [612, 792],
      [842, 595],
    ]);
    image = join(dir, 'stamp.png');
    await writeFile(image, await makePng(40, 20));
  });

  afterEach(async () => {
    await removeWorkDir(dir);
  });

  describe('inspectPdf', () => {
    it('reads every page size in order', async () => {
      expect(await inspectPdf(source)).toEqual([
        { width: 612, height: 792 },
        { width: 842, height: 595 },
      ]);
      expect(await getPageCount(source)).toBe(2);
    });

    it('rejects a PDF without pages', async () => {
      const empty = await writePdf(join(dir, 'empty.pdf'), []);
      await expect(inspectPdf(empty)).rejects.toThrow(/No page dimensions found/);
    });

    it('rejects files that are not PDFs', async () => {
      const bogus = join(dir, 'bogus.pdf');
      await writeFile(bogus, 'hello');
      await expect(inspectPdf(bogus)).rejects.toThrow(PdfInspectionError);
    });
  });

  describe('addImageWatermark', () => {
    it('writes a new file and keeps the page set', async () => {
      const output = join(dir, 'out.pdf');
      await addImageWatermark(source, output, image, { x: 10, y: 20, scale: 0.25, page: 2 });
      expect(await inspectPdf(output)).toHaveLength(2);
    });

    it('rejects a page outside the document', async () => {
      const output = join(dir, 'out.pdf');
      await expect(
        addImageWatermark(source, output, image, { x: 0, y: 0, scale: 1, page: 3 })
      ).rejects.toThrow('Placement page 3 is outside the document (1-2)');
      await expect(access(output)).rejects.toThrow();
    });

    it('rejects a non-positive scale', async () => {
      await expect(
        addImageWatermark(source, join(dir, 'out.pdf'), image, { x: 0, y: 0, scale: 0, page: 1 })
      ).rejects.toThrow(WatermarkPlacementError);
    });

    it('reports a missing stamp image as a file system error', async () => {
      await expect(
        addImageWatermark(source, join(dir, 'out.pdf'), join(dir, 'gone.png'), {
          x: 0,
          y: 0,
          scale: 1,
          page: 1,
        })
      ).rejects.toThrow(FileSystemError);
    });
  });
});
