import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { partialPathFor, resolveTarget, sanitizeFilename } from '../src/acquisition/filename.js';
import { hasPdfMagic, isPlausiblePdf, verifyPdfFile } from '../src/acquisition/pdf-check.js';
import { pdfBytes } from './support/helpers.js';

const PDF_HEAD = new Uint8Array([0x25, 0x50, 0x44, 0x46]);

describe('sanitizeFilename', () => {
  it('replaces characters that are illegal in paths and truncates', () => {
    expect(sanitizeFilename('My/Paper:Title*?"<>|', 10)).toBe('My_Paper_T');
  });

  it('collapses whitespace and trims after truncation', () => {
    expect(sanitizeFilename('  a   b  ', 10)).toBe('a b');
    expect(sanitizeFilename('abc def', 4)).toBe('abc');
  });

  it('counts characters rather than UTF-16 units', () => {
    expect(sanitizeFilename('图像识别方法综述', 4)).toBe('图像识别');
  });
});

describe('resolveTarget', () => {
  it('prefers the title, then the DOI, then a timestamp', () => {
    expect(resolveTarget({ title: 'A: B', doi: '10.1/x' }, '/data', 50).filepath).toBe(join('/data', 'A_ B.pdf'));
    expect(resolveTarget({ doi: '10.1/x' }, '/data', 50)).toEqual({
      stem: '10.1_x',
      directory: '/data',
      filepath: join('/data', '10.1_x.pdf')
    });
    expect(resolveTarget({}, '/data', 50, () => new Date(1700000000000)).stem).toBe('document_1700000000000');
  });

  it('stages downloads beside the target', () => {
    expect(partialPathFor('/data/a.pdf')).toBe('/data/a.pdf.part');
  });
});

describe('isPlausiblePdf', () => {
  const other = new Uint8Array([0x3c, 0x68, 0x74, 0x6d]);

  it('accepts a large payload that declares or looks like a PDF', () => {
    expect(isPlausiblePdf({ size: 2000, contentType: 'application/pdf', head: other }, 1000)).toBe(true);
    expect(isPlausiblePdf({ size: 2000, contentType: 'application/octet-stream', head: PDF_HEAD }, 1000)).toBe(true);
  });

  it('rejects small payloads and HTML', () => {
    expect(isPlausiblePdf({ size: 1000, contentType: 'application/pdf', head: PDF_HEAD }, 1000)).toBe(false);
    expect(isPlausiblePdf({ size: 5000, contentType: 'text/html', head: other }, 1000)).toBe(false);
  });

  it('needs the full signature', () => {
    expect(hasPdfMagic(PDF_HEAD.subarray(0, 3))).toBe(false);
  });
});

describe('verifyPdfFile', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'pdf-check-test-'));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('reports the size of a file with the PDF signature', async () => {
    const path = join(workDir, 'ok.pdf');
    await writeFile(path, pdfBytes(1234));
    expect(await verifyPdfFile(path)).toEqual({ ok: true, size: 1234 });
  });

  it('explains each rejection', async () => {
    const empty = join(workDir, 'empty.pdf');
    const html = join(workDir, 'login.pdf');
    await writeFile(empty, '');
    await writeFile(html, '<html></html>');

    expect(await verifyPdfFile(join(workDir, 'missing.pdf'))).toEqual({ ok: false, reason: 'file does not exist' });
    expect(await verifyPdfFile(empty)).toEqual({ ok: false, reason: 'file is empty' });
    expect(await verifyPdfFile(html)).toEqual({ ok: false, reason: 'file does not start with the PDF signature' });
  });
});
