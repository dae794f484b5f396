import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { findCargoHome, findSegmentPath, folderInfoPath, pathExists } from '../src/path-utils';
import { findSegmentByShortName, Segment } from '../src/segments';
import { HOME_ENV_KEYS, snapshotEnv } from './helpers/env';

function segment(shortName: string): Segment {
  const found = findSegmentByShortName(shortName);
  if (!found) throw new Error(`missing segment ${shortName}`);
  return found;
}

describe('path-utils', () => {
  let restoreEnv: () => void;
  let homeDir: string;

  beforeEach(() => {
    restoreEnv = snapshotEnv(HOME_ENV_KEYS);
    homeDir = fs.mkdtempSync(path.join(os.tmpdir(), 'path-utils-'));
    process.env.HOME = homeDir;
    process.env.USERPROFILE = homeDir;
    delete process.env.CARGO_HOME;
  });

  afterEach(() => {
    restoreEnv();
    fs.rmSync(homeDir, { recursive: true, force: true });
  });

  describe('findCargoHome', () => {
    it('should default to .cargo in the user home', () => {
      expect(findCargoHome()).toBe(path.join(homeDir, '.cargo'));
    });

    it('should use CARGO_HOME when set', () => {
      process.env.CARGO_HOME = '/opt/cargo';
      expect(findCargoHome()).toBe('/opt/cargo');
    });

    it('should resolve a relative CARGO_HOME against the working directory', () => {
      process.env.CARGO_HOME = 'local-cargo';
      expect(findCargoHome()).toBe(path.resolve(process.cwd(), 'local-cargo'));
    });

    it('should ignore an empty CARGO_HOME', () => {
      process.env.CARGO_HOME = '';
      expect(findCargoHome()).toBe(path.join(homeDir, '.cargo'));
    });
  });

  describe('findSegmentPath', () => {
    it('should join the relative path of each segment onto the Cargo home', () => {
      process.env.CARGO_HOME = '/opt/cargo';
      expect(findSegmentPath(segment('indices'))).toBe(path.join('/opt/cargo', 'registry', 'index'));
      expect(findSegmentPath(segment('crates'))).toBe(path.join('/opt/cargo', 'registry', 'cache'));
      expect(findSegmentPath(segment('git-repos'))).toBe(path.join('/opt/cargo', 'git', 'db'));
    });
  });

  describe('folderInfoPath', () => {
    it('should place sidecars under the user home regardless of CARGO_HOME', () => {
      process.env.CARGO_HOME = '/opt/cargo';
      expect(folderInfoPath(segment('git-repos'))).toBe(
        path.join(homeDir, '.cache', 'github-rust-actions', 'cached_folder_info', 'git-repos.toml')
      );
    });
  });

  describe('pathExists', () => {
    it('should report existing files and directories', async () => {
      const filePath = path.join(homeDir, 'file.txt');
      fs.writeFileSync(filePath, 'content');

      await expect(pathExists(homeDir)).resolves.toBe(true);
      await expect(pathExists(filePath)).resolves.toBe(true);
    });

    it('should report missing paths', async () => {
      await expect(pathExists(path.join(homeDir, 'missing'))).resolves.toBe(false);
    });

    it('should report a dangling symlink as existing', async () => {
      const linkPath = path.join(homeDir, 'dangling');
      fs.symlinkSync(path.join(homeDir, 'nowhere'), linkPath);

      await expect(pathExists(linkPath)).resolves.toBe(true);
    });

    it('should propagate errors other than a missing entry', async () => {
      const filePath = path.join(homeDir, 'file.txt');
      fs.writeFileSync(filePath, 'content');

      await expect(pathExists(path.join(filePath, 'child'))).rejects.toMatchObject({ code: 'ENOTDIR' });
    });
  });
});
