/**
 * FsFileLister Tests
 *
 * Runs against a temp directory created per test.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { FsFileLister } from './fs_file_lister';
import { FileListerError } from '../file_lister';

describe('FsFileLister', () => {
  let tempDir: string;
  let lister: FsFileLister;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'dcoguard-file-lister-'));
    lister = new FsFileLister({ cwd: tempDir });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function createFile(relativePath: string, content: string = '') {
    const fullPath = path.join(tempDir, relativePath);
    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    await fs.writeFile(fullPath, content, 'utf-8');
  }

  describe('list()', () => {
    it('[EARS-FL01] should list matching files sorted and relative to cwd', async () => {
      await createFile('src/b.py');
      await createFile('src/a.py');
      await createFile('README.md');

      expect(await lister.list(['**/*.py'])).toEqual(['src/a.py', 'src/b.py']);
    });

    it('[EARS-FL02] should exclude ignored patterns', async () => {
      await createFile('src/a.py');
      await createFile('.venv/lib/site.py');

      expect(await lister.list(['**/*.py'], { ignore: ['.venv/**'] })).toEqual(['src/a.py']);
    });

    it('[EARS-FL03] should reject traversal in patterns', async () => {
      await expect(lister.list(['../**/*.py'])).rejects.toThrow(FileListerError);
    });
  });

  describe('read() / write() / exists()', () => {
    it('[EARS-FL04] should round-trip content', async () => {
      await createFile('tool.sh', 'echo hi\n');

      await lister.write('tool.sh', '# header\necho hi\n');

      expect(await lister.read('tool.sh')).toBe('# header\necho hi\n');
      expect(await lister.exists('tool.sh')).toBe(true);
    });

    it('[EARS-FL05] should throw FILE_NOT_FOUND for missing files', async () => {
      await expect(lister.read('missing.py')).rejects.toMatchObject({
        name: 'FileListerError',
        code: 'FILE_NOT_FOUND',
        filePath: 'missing.py',
      });
      expect(await lister.exists('missing.py')).toBe(false);
    });

    it('[EARS-FL06] should reject absolute paths', async () => {
      await expect(lister.read(path.join(tempDir, 'x.py'))).rejects.toMatchObject({ code: 'INVALID_PATH' });
    });

    it('[EARS-FL07] should report WRITE_ERROR when the parent directory is missing', async () => {
      await expect(lister.write('no/such/dir/file.py', 'x')).rejects.toMatchObject({ code: 'WRITE_ERROR' });
    });
  });
});
