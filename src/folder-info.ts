/**
 * @fileoverview Sidecar records carrying a segment's path and fingerprint from the
 * restore phase to the save phase.
 */

import * as TOML from '@iarna/toml';
import * as crypto from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';

import { hasErrorCode, SerializationError } from './errors';
import { folderInfoPath } from './path-utils';
import { Segment } from './segments';

const MAX_FINGERPRINT = 2n ** 64n - 1n;

/**
 * Snapshot of a cached folder taken at the end of the restore phase.
 */
export type FolderInfo = {
  readonly path: string;
  readonly fingerprint: bigint;
};

/**
 * Serializes a record as TOML. The fingerprint is written as a decimal string
 * because TOML integers are signed 64-bit.
 */
export function serializeFolderInfo(info: FolderInfo): string {
  if (info.fingerprint < 0n || info.fingerprint > MAX_FINGERPRINT) {
    throw new SerializationError(`Fingerprint ${info.fingerprint} is not an unsigned 64-bit integer`);
  }
  return TOML.stringify({
    path: info.path,
    fingerprint: info.fingerprint.toString(10),
  });
}

function parseToml(content: string, source: string): ReturnType<typeof TOML.parse> {
  try {
    return TOML.parse(content);
  } catch (error) {
    throw new SerializationError(`Cached folder info at ${source} is not valid TOML`, { cause: error });
  }
}

/**
 * Parses a record produced by {@link serializeFolderInfo}.
 *
 * @param content - TOML document
 * @param source - Where the document came from, for error messages
 * @throws SerializationError when the document is not a valid record
 */
export function parseFolderInfo(content: string, source: string): FolderInfo {
  const { path: folderPath, fingerprint } = parseToml(content, source);
  if (typeof folderPath !== 'string') {
    throw new SerializationError(`Cached folder info at ${source} has no string "path" field`);
  }
  if (typeof fingerprint !== 'string' || !/^\d+$/.test(fingerprint)) {
    throw new SerializationError(`Cached folder info at ${source} has no decimal "fingerprint" field`);
  }

  const value = BigInt(fingerprint);
  if (value > MAX_FINGERPRINT) {
    throw new SerializationError(`Cached folder info at ${source} has a fingerprint wider than 64 bits`);
  }
  return { path: folderPath, fingerprint: value };
}

/**
 * Writes the sidecar record of a segment. The content goes to a temporary file
 * next to the target first and is renamed into place.
 */
export async function writeFolderInfo(segment: Segment, info: FolderInfo): Promise<void> {
  const targetPath = folderInfoPath(segment);
  const serialized = serializeFolderInfo(info);

  await fs.mkdir(path.dirname(targetPath), { recursive: true });
  const temporaryPath = `${targetPath}.${crypto.randomBytes(4).toString('hex')}.tmp`;
  try {
    await fs.writeFile(temporaryPath, serialized, 'utf8');
    await fs.rename(temporaryPath, targetPath);
  } catch (error) {
    await fs.rm(temporaryPath, { force: true });
    throw error;
  }
}

/**
 * Reads the sidecar record of a segment.
 *
 * @returns The record, or undefined when no sidecar file exists
 */
export async function readFolderInfo(segment: Segment): Promise<FolderInfo | undefined> {
  const sourcePath = folderInfoPath(segment);
  let content: string;
  try {
    content = await fs.readFile(sourcePath, 'utf8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return undefined;
    }
    throw error;
  }
  return parseFolderInfo(content, sourcePath);
}
