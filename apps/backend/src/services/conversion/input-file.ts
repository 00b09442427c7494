import { createReadStream } from 'fs';
import { writeFile } from 'fs/promises';
import path from 'path';
import { createInterface } from 'readline';

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;
const FALLBACK_FILENAME = 'upload.jsonl';

/** Input problems the caller can fix; reported as 400 without entering the retry loop. */
export class RequestInputError extends Error {
  readonly status = 400;

  constructor(message: string) {
    super(message);
    this.name = 'RequestInputError';
  }
}

/**
 * Reduce a client-supplied filename to a safe basename: ASCII letters, digits,
 * `_`, `.` and `-`, with whitespace collapsed to `_`.
 */
export function sanitizeFilename(filename: string): string {
  const ascii = filename.normalize('NFKD').replace(/[^\x20-\x7e]/g, '');
  const flattened = ascii.replace(/[\\/]/g, ' ').trim().split(/\s+/).join('_');
  const cleaned = flattened.replace(/[^A-Za-z0-9_.-]/g, '').replace(/^[._]+|[._]+$/g, '');
  return cleaned || FALLBACK_FILENAME;
}

export function filenameStem(filename: string): string {
  return path.parse(filename).name || path.parse(FALLBACK_FILENAME).name;
}

export function decodeBase64Content(content: string): Buffer {
  const compact = content.replace(/\s+/g, '');
  if (!BASE64_PATTERN.test(compact)) {
    throw new RequestInputError('Error decoding base64 content: Invalid base64-encoded string');
  }
  return Buffer.from(compact, 'base64');
}

export async function saveInputFile(content: Buffer, workDir: string): Promise<string> {
  const inputPath = path.join(workDir, 'input.jsonl');
  await writeFile(inputPath, content);
  return inputPath;
}

/** First line of the file, trimmed; empty string for an empty file. */
export async function readFirstLine(filePath: string): Promise<string> {
  const stream = createReadStream(filePath, { encoding: 'utf-8' });
  const lines = createInterface({ input: stream, crlfDelay: Infinity });
  try {
    for await (const line of lines) {
      return line.trim();
    }
    return '';
  } finally {
    lines.close();
    stream.destroy();
  }
}
