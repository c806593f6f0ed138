/**
 * Test fixtures: scratch directories, PDFs and images built in-process
 */

import { mkdtemp, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { PDFDocument } from 'pdf-lib';
import sharp from 'sharp';

import type { DocumentRecord, Stamp } from '../types';

export async function makeWorkDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'stampdesk-test-'));
}

export async function removeWorkDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Write a PDF with one blank page per entry of `sizes` (width, height in points)
 */
export async function writePdf(path: string, sizes: Array<[number, number]>): Promise<string> {
  const doc = await PDFDocument.create();
  for (const size of sizes) {
    doc.addPage(size);
  }
  await writeFile(path, await doc.save());
  return path;
}

/**
 * Solid opaque PNG
 */
export function makePng(width: number, height: number): Promise<Buffer> {
  return sharp({
    create: { width, height, channels: 4, background: { r: 20, g: 40, b: 160, alpha: 1 } },
  })
    .png()
    .toBuffer();
}

export function makeJpeg(width: number, height: number): Promise<Buffer> {
  return sharp({
    create: { width, height, channels: 3, background: { r: 200, g: 30, b: 30 } },
  })
    .jpeg()
    .toBuffer();
}

export function makeWebp(width: number, height: number): Promise<Buffer> {
  return sharp({
    create: { width, height, channels: 3, background: { r: 0, g: 120, b: 0 } },
  })
    .webp()
    .toBuffer();
}

export function toDataUrl(bytes: Buffer, mime = 'image/png'): string {
  return `data:${mime};base64,${bytes.toString('base64')}`;
}

/**
 * Entries in the OS temp dir whose names start with `prefix`
 */
export async function tempEntriesWithPrefix(prefix: string): Promise<string[]> {
  return (await readdir(tmpdir())).filter((name) => name.startsWith(prefix));
}

/**
 * Sequential ids: id-1, id-2, ...
 */
export function counterIds(prefix = 'id'): () => string {
  let n = 0;
  return () => `${prefix}-${++n}`;
}

export function makeDocument(overrides: Partial<DocumentRecord> = {}): DocumentRecord {
  return {
    id: 'doc-1',
    name: 'contract.pdf',
    path: '/tmp/contract.pdf',
    stamps: [],
    status: 'pending',
    selected: true,
    ...overrides,
  };
}

export function makeStamp(overrides: Partial<Stamp> = {}): Stamp {
  return {
    id: 'stamp-1',
    image: 'data:image/png;base64,AAAA',
    x: 50,
    y: 50,
    width: 105,
    height: 56,
    pageNum: 1,
    ...overrides,
  };
}
