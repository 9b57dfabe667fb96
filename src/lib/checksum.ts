import * as crypto from 'crypto';
import * as fs from 'fs';
import { InstallerError } from '../installers/types';

const MANIFEST_LINE = /^([0-9a-fA-F]{64}) [ *](.+)$/;

/**
 * SHA-256 of a file as lowercase hex
 */
export async function computeSha256(filePath: string): Promise<string> {
  const hash = crypto.createHash('sha256');
  for await (const chunk of fs.createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

/**
 * Parse `sha256sum` output into name → digest. Blank lines are skipped;
 * any other line that is not `<digest>  <name>` makes the manifest invalid.
 */
export function parseChecksumManifest(content: string): Map<string, string> {
  const entries = new Map<string, string>();
  const lines = content.split(/\r?\n/);

  lines.forEach((line, index) => {
    if (line.trim() === '') return;
    const match = line.match(MANIFEST_LINE);
    if (!match) {
      throw new InstallerError(`Malformed checksum manifest (line ${index + 1})`, 'ChecksumMismatch', [
        'This release may be incomplete or corrupted'
      ]);
    }
    const name = match[2].trim().replace(/^\.\//, '');
    entries.set(name, match[1].toLowerCase());
  });

  return entries;
}

export function expectedDigestFor(content: string, fileName: string): string {
  const digest = parseChecksumManifest(content).get(fileName);
  if (digest === undefined) {
    throw new InstallerError(`Checksum manifest has no entry for ${fileName}`, 'ChecksumMismatch', [
      'This release may be incomplete or corrupted'
    ]);
  }
  return digest;
}

export interface ChecksumResult {
  expected: string;
  actual: string;
}

/**
 * Throws ChecksumMismatch unless the file hashes to the manifest's digest
 * for exactly `fileName`
 */
export async function verifyChecksum(filePath: string, fileName: string, manifest: string): Promise<ChecksumResult> {
  const expected = expectedDigestFor(manifest, fileName);
  const actual = await computeSha256(filePath);

  if (actual !== expected) {
    throw new InstallerError(`Checksum verification failed for ${fileName}`, 'ChecksumMismatch', [
      'The downloaded file may be corrupted or tampered with',
      `Expected: ${expected}`,
      `Actual:   ${actual}`
    ]);
  }
  return { expected, actual };
}
