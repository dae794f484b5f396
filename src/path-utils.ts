/**
 * @fileoverview Path resolution for the Cargo home and the sidecar directory.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

import { hasErrorCode } from './errors';
import { Segment } from './segments';

/**
 * Location of the sidecar records, relative to the user's home directory.
 */
const FOLDER_INFO_DIRECTORY = ['.cache', 'github-rust-actions', 'cached_folder_info'] as const;

/**
 * Resolves the Cargo home the same way Cargo does: `CARGO_HOME` when set
 * (relative values are taken from the working directory), `~/.cargo` otherwise.
 *
 * @returns Absolute path of the Cargo home
 */
export function findCargoHome(): string {
  const override = process.env.CARGO_HOME;
  if (override) {
    return path.resolve(override);
  }
  return path.join(os.homedir(), '.cargo');
}

/**
 * Computes the absolute folder of a segment inside the Cargo home.
 */
export function findSegmentPath(segment: Segment): string {
  return path.join(findCargoHome(), ...segment.relativePath);
}

/**
 * Computes the sidecar file of a segment, `{home}/.cache/github-rust-actions/cached_folder_info/{short}.toml`.
 */
export function folderInfoPath(segment: Segment): string {
  return path.join(os.homedir(), ...FOLDER_INFO_DIRECTORY, `${segment.shortName}.toml`);
}

/**
 * Checks whether anything exists at the given path, without following a trailing symlink.
 *
 * @param targetPath - Path to check
 * @returns True when an entry exists, false when the path is absent
 */
export async function pathExists(targetPath: string): Promise<boolean> {
  try {
    await fs.lstat(targetPath);
    return true;
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return false;
    }
    throw error;
  }
}
