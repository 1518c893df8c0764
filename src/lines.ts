/**
 * Line Sources
 *
 * Turns a file or an in-memory document into trimmed lines. File lines are
 * decoded one at a time: UTF-8 when the bytes are valid UTF-8, Latin-1
 * otherwise, so a stray byte only affects its own line.
 */

import * as fs from 'fs';
import iconv from 'iconv-lite';

const NEWLINE = 0x0a;

/**
 * Decode one line of bytes, falling back to Latin-1 for invalid UTF-8
 */
export function decodeLine(bytes: Buffer): string {
  const utf8 = bytes.toString('utf-8');
  if (Buffer.from(utf8, 'utf-8').equals(bytes)) {
    return utf8;
  }
  return iconv.decode(bytes, 'latin1');
}

/**
 * Split a buffer on newline bytes
 */
export function* splitLineBuffers(buffer: Buffer): Generator<Buffer> {
  let start = 0;
  while (start < buffer.length) {
    const end = buffer.indexOf(NEWLINE, start);
    if (end === -1) {
      yield buffer.subarray(start);
      return;
    }
    yield buffer.subarray(start, end);
    start = end + 1;
  }
}

export function* yieldLinesFromFile(filePath: string): Generator<string> {
  const buffer = fs.readFileSync(filePath);
  for (const bytes of splitLineBuffers(buffer)) {
    yield decodeLine(bytes).trim();
  }
}

export function* yieldLinesFromText(text: string): Generator<string> {
  for (const line of text.split('\n')) {
    yield line.trim();
  }
}
