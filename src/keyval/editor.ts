import { closeSync, existsSync, openSync, readFileSync, writeFileSync } from 'node:fs';
import type { KeyMatch } from '../config/schema.js';
import { InvalidEntryError } from './types.js';
import type { EditResult, KeyMatchOptions } from './types.js';

const LINE_BREAK = /[\r\n]/;

function assertValidKey(key: string): void {
  if (key === '') {
    throw new InvalidEntryError('Key must not be empty');
  }
  if (LINE_BREAK.test(key)) {
    throw new InvalidEntryError('Key must not contain a line break');
  }
}

/**
 * Create the file if it does not exist yet, leaving existing content alone
 */
function touchFile(file: string): void {
  closeSync(openSync(file, 'a'));
}

interface FileLines {
  lines: string[];
  /** Line ending written back, `\r\n` when the file already uses it */
  eol: string;
}

function readLines(file: string): FileLines {
  const content = readFileSync(file, 'utf8');
  const eol = content.includes('\r\n') ? '\r\n' : '\n';
  if (content === '') {
    return { lines: [], eol };
  }
  const lines = content.split(eol);
  // Trailing newline terminates the last line, it does not start a new one
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return { lines, eol };
}

function writeLines(file: string, { lines, eol }: FileLines): void {
  const content = lines.length > 0 ? `${lines.join(eol)}${eol}` : '';
  writeFileSync(file, content, 'utf8');
}

function matchesKey(line: string, key: string, match: KeyMatch): boolean {
  if (match === 'prefix') {
    return line.startsWith(key);
  }
  // A key ending in `=` is already the `key=` form
  if (key.endsWith('=')) {
    return line.startsWith(key);
  }
  if (key.includes('=')) {
    return line === key;
  }
  return line === key || line.startsWith(`${key}=`);
}

/**
 * Set `key=value` in a line-oriented config file.
 *
 * Every line starting with `key=` is replaced; when there is none the pair is
 * appended. The file is created if missing.
 *
 * @example
 * addOrEditKeyValPair('/etc/pihole/setupVars.conf', 'BLOCKING_ENABLED', 'true');
 */
export function addOrEditKeyValPair(file: string, key: string, value: string): EditResult {
  assertValidKey(key);
  if (key.includes('=')) {
    throw new InvalidEntryError(`Key must not contain "=": ${key}`);
  }
  if (LINE_BREAK.test(value)) {
    throw new InvalidEntryError(`Value for ${key} must not contain a line break`);
  }

  touchFile(file);

  const entry = `${key}=${value}`;
  const { lines, eol } = readLines(file);

  if (lines.some(line => line.startsWith(`${key}=`))) {
    writeLines(file, { lines: lines.map(line => (line.startsWith(`${key}=`) ? entry : line)), eol });
    return 'updated';
  }

  writeLines(file, { lines: [...lines, entry], eol });
  return 'added';
}

/**
 * Append a bare key line unless a matching line is already present.
 * The key is written unchanged and may itself contain `=`.
 * Returns whether the key was added.
 *
 * @example
 * addKey('/etc/dnsmasq.d/01-pihole.conf', 'log-queries');
 */
export function addKey(file: string, key: string, options: KeyMatchOptions = {}): boolean {
  assertValidKey(key);
  const match = options.match ?? 'prefix';

  touchFile(file);

  const { lines, eol } = readLines(file);
  if (lines.some(line => matchesKey(line, key, match))) {
    return false;
  }

  writeLines(file, { lines: [...lines, key], eol });
  return true;
}

/**
 * Delete every line matching a key. Returns the number of lines removed;
 * a missing file counts as zero and is not created.
 *
 * @example
 * removeKey('/etc/pihole/setupVars.conf', 'PIHOLE_DNS_1');
 */
export function removeKey(file: string, key: string, options: KeyMatchOptions = {}): number {
  assertValidKey(key);
  const match = options.match ?? 'prefix';

  if (!existsSync(file)) {
    return 0;
  }

  const { lines, eol } = readLines(file);
  const kept = lines.filter(line => !matchesKey(line, key, match));
  const removed = lines.length - kept.length;

  if (removed > 0) {
    writeLines(file, { lines: kept, eol });
  }
  return removed;
}
