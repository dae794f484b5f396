/**
 * @fileoverview Content fingerprints for cached directories.
 *
 * A fingerprint is the first 8 bytes of a SHA-256 over a canonical stream built
 * while walking the directory:
 *
 *   for each entry, depth first, siblings ordered by the raw bytes of their names:
 *     u64 length + relative path ("/" separated, raw name bytes)
 *     tag byte (file, directory, symlink, other)
 *     file:    u64 size + contents
 *     symlink: u64 length + link target
 *
 * Permissions, ownership and timestamps are not part of the stream.
 */

import { createHash, Hash } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';

import { pathExists } from './path-utils';
import { Ignores } from './segments';

const ENTRY_TAG = {
  FILE: 0x01,
  DIRECTORY: 0x02,
  SYMLINK: 0x03,
  OTHER: 0x04,
} as const;

const READ_CHUNK_SIZE = 1024 * 1024;

const PATH_SEPARATOR = Buffer.from(path.sep, 'utf8');
const RELATIVE_SEPARATOR = Buffer.from('/', 'utf8');

function encodeLength(length: number): Buffer {
  const encoded = Buffer.alloc(8);
  encoded.writeBigUInt64BE(BigInt(length));
  return encoded;
}

function absorbBytes(hash: Hash, bytes: Buffer): void {
  hash.update(encodeLength(bytes.length));
  hash.update(bytes);
}

function joinBytes(parts: readonly Buffer[], separator: Buffer): Buffer {
  return Buffer.concat(parts.flatMap((part, index) => (index === 0 ? [part] : [separator, part])));
}

async function absorbFile(hash: Hash, filePath: Buffer): Promise<void> {
  const handle = await fs.open(filePath, 'r');
  try {
    const { size } = await handle.stat();
    hash.update(encodeLength(size));

    const buffer = Buffer.alloc(READ_CHUNK_SIZE);
    let totalBytesRead = 0;
    for (;;) {
      const { bytesRead } = await handle.read(buffer, 0, buffer.length, null);
      if (bytesRead === 0) {
        break;
      }
      hash.update(buffer.subarray(0, bytesRead));
      totalBytesRead += bytesRead;
    }

    if (totalBytesRead !== size) {
      throw new Error(`File ${filePath.toString('utf8')} changed size while it was being fingerprinted`);
    }
  } finally {
    await handle.close();
  }
}

// Names stay raw bytes end to end: decoding them would break paths that are not valid UTF-8.
async function absorbDirectory(
  hash: Hash,
  directoryPath: Buffer,
  relativeParts: readonly Buffer[],
  depth: number,
  ignores: Ignores
): Promise<void> {
  const names = await fs.readdir(directoryPath, { encoding: 'buffer' });
  names.sort(Buffer.compare);

  const childDepth = depth + 1;
  for (const name of names) {
    if (ignores.matches(childDepth, name)) {
      continue;
    }

    const childParts = [...relativeParts, name];
    const childPath = Buffer.concat([directoryPath, PATH_SEPARATOR, name]);
    absorbBytes(hash, joinBytes(childParts, RELATIVE_SEPARATOR));

    const stats = await fs.lstat(childPath);
    if (stats.isDirectory()) {
      hash.update(Buffer.of(ENTRY_TAG.DIRECTORY));
      await absorbDirectory(hash, childPath, childParts, childDepth, ignores);
    } else if (stats.isFile()) {
      hash.update(Buffer.of(ENTRY_TAG.FILE));
      await absorbFile(hash, childPath);
    } else if (stats.isSymbolicLink()) {
      hash.update(Buffer.of(ENTRY_TAG.SYMLINK));
      absorbBytes(hash, await fs.readlink(childPath, { encoding: 'buffer' }));
    } else {
      hash.update(Buffer.of(ENTRY_TAG.OTHER));
    }
  }
}

/**
 * Computes the fingerprint of a directory tree.
 * A missing directory has the same fingerprint as an empty one.
 *
 * @param root - Absolute path of the directory to fingerprint
 * @param ignores - Entries to leave out, addressed by depth and name
 * @returns Unsigned 64-bit digest
 */
export async function fingerprintDirectory(root: string, ignores: Ignores): Promise<bigint> {
  const hash = createHash('sha256');
  if (await pathExists(root)) {
    await absorbDirectory(hash, Buffer.from(path.resolve(root), 'utf8'), [], 0, ignores);
  }
  return hash.digest().readBigUInt64BE(0);
}

/**
 * Renders a fingerprint as 16 lowercase hex digits for log output.
 */
export function formatFingerprint(fingerprint: bigint): string {
  return fingerprint.toString(16).padStart(16, '0');
}
