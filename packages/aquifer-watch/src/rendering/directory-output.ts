/**
 * Directory output location
 *
 * Artifacts land flat in one directory. Artifact names are mapped to file
 * names reversibly, so distinct names never share a file.
 */

import { mkdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type { OutputLocation } from './sink.js';

const PLAIN_CHAR = /^[A-Za-z0-9.-]$/;

const utf8 = new TextEncoder();

function percentEncode(char: string): string {
  const bytes = Array.from(utf8.encode(char));
  return bytes.map((byte) => `%${byte.toString(16).toUpperCase().padStart(2, '0')}`).join('');
}

/**
 * File name for an artifact name
 *
 * `/` becomes `_`; letters, digits, `.` and `-` are kept; every other
 * character (`_` and `%` included) and a leading `.` are percent-encoded as
 * UTF-8. `heads/Zona 1/head-delta` + `.svg` gives
 * `heads_Zona%201_head-delta.svg`.
 *
 * @throws {RangeError} For an empty name
 */
export function artifactFileName(name: string, extension: string): string {
  if (name.length === 0) {
    throw new RangeError('Artifact name is empty');
  }

  let stem = '';
  for (const char of name) {
    if (char === '/') {
      stem += '_';
    } else if (PLAIN_CHAR.test(char) && !(stem.length === 0 && char === '.')) {
      stem += char;
    } else {
      stem += percentEncode(char);
    }
  }
  return `${stem}${extension}`;
}

export class DirectoryOutput implements OutputLocation {
  readonly directory: string;

  constructor(directory: string) {
    this.directory = resolve(directory);
  }

  async prepare(): Promise<void> {
    await mkdir(this.directory, { recursive: true });
  }

  resolve(fileName: string): string {
    return join(this.directory, fileName);
  }
}
