import { open, type FileHandle } from 'node:fs/promises';

const PDF_MAGIC = [0x25, 0x50, 0x44, 0x46];

export const hasPdfMagic = (head: Uint8Array): boolean =>
  head.length >= PDF_MAGIC.length && PDF_MAGIC.every((byte, index) => head[index] === byte);

export interface PayloadProbe {
  size: number;
  contentType: string | null;
  head: Uint8Array;
}

/** A payload is a plausible PDF when it is larger than `minBytes` and either declares or starts like one. */
export const isPlausiblePdf = (probe: PayloadProbe, minBytes: number): boolean =>
  probe.size > minBytes && ((probe.contentType ?? '').toLowerCase().includes('pdf') || hasPdfMagic(probe.head));

export type FileCheck = { ok: true; size: number } | { ok: false; reason: string };

export const verifyPdfFile = async (path: string): Promise<FileCheck> => {
  let handle: FileHandle;
  try {
    handle = await open(path, 'r');
  } catch {
    return { ok: false, reason: 'file does not exist' };
  }

  try {
    const { size } = await handle.stat();
    if (size === 0) {
      return { ok: false, reason: 'file is empty' };
    }

    const head = new Uint8Array(PDF_MAGIC.length);
    const { bytesRead } = await handle.read(head, 0, head.length, 0);
    if (!hasPdfMagic(head.subarray(0, bytesRead))) {
      return { ok: false, reason: 'file does not start with the PDF signature' };
    }

    return { ok: true, size };
  } finally {
    await handle.close();
  }
};
