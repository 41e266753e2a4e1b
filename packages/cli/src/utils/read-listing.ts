/**
 * Listing file reader.
 *
 * `tree` output saved from a Windows console is often in the console code
 * page rather than UTF-8, so each configured encoding is tried in turn with
 * a strict decoder.
 */

import { readFile } from 'node:fs/promises';

/** Result of reading a listing file */
export type ReadListingResult =
  | { status: 'ok'; lines: string[]; encoding: string }
  | { status: 'empty' }
  | { status: 'decode-failed'; tried: string[] };

/**
 * Decode raw bytes into listing lines.
 */
export function decodeListing(bytes: Uint8Array, encodings: readonly string[]): ReadListingResult {
  if (bytes.length === 0) {
    return { status: 'empty' };
  }

  for (const encoding of encodings) {
    const text = tryDecode(bytes, encoding);
    if (text === undefined) {
      continue;
    }
    if (text.trim() === '') {
      return { status: 'empty' };
    }
    return { status: 'ok', lines: splitLines(text), encoding };
  }

  return { status: 'decode-failed', tried: [...encodings] };
}

/**
 * Read and decode a listing file. File system errors propagate.
 */
export async function readListingFile(filePath: string, encodings: readonly string[]): Promise<ReadListingResult> {
  const bytes = await readFile(filePath);
  return decodeListing(bytes, encodings);
}

function tryDecode(bytes: Uint8Array, encoding: string): string | undefined {
  try {
    // ignoreBOM: false strips a leading byte order mark
    return new TextDecoder(encoding, { fatal: true, ignoreBOM: false }).decode(bytes);
  } catch {
    return undefined;
  }
}

function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/).map((line) => line.trimEnd());
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}
