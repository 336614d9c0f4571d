import { promises as fsPromises } from 'node:fs';
import { readdir, readFile, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { OutputService } from './output.service';
import { OutputWriteError } from './output.errors';
import { createTempDir, removeTempDir } from '../../test/utils/test-helpers';

describe('OutputService', () => {
  let service: OutputService;
  let tempDir: string;

  beforeEach(async () => {
    service = new OutputService();
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  it('should write every file and return the targets', async () => {
    const a = path.join(tempDir, 'a.csv');
    const b = path.join(tempDir, 'b.csv');

    const written = await service.publish([
      { path: a, content: 'x\n1\n' },
      { path: b, content: 'y\n2\n' },
    ]);

    expect(written).toEqual([a, b]);
    expect(await readFile(a, 'utf-8')).toBe('x\n1\n');
    expect(await readFile(b, 'utf-8')).toBe('y\n2\n');
    expect((await readdir(tempDir)).sort()).toEqual(['a.csv', 'b.csv']);
  });

  it('should replace existing outputs without leaving backups', async () => {
    const a = path.join(tempDir, 'a.csv');
    await writeFile(a, 'old\n');

    await service.publish([{ path: a, content: 'new\n' }]);

    expect(await readFile(a, 'utf-8')).toBe('new\n');
    expect(await readdir(tempDir)).toEqual(['a.csv']);
  });

  it('should create missing parent directories', async () => {
    const nested = path.join(tempDir, 'out', 'daily', 'a.csv');

    await service.publish([{ path: nested, content: 'x\n' }]);

    expect(await readFile(nested, 'utf-8')).toBe('x\n');
  });

  it('should leave previous outputs untouched when staging fails', async () => {
    const a = path.join(tempDir, 'a.csv');
    await writeFile(a, 'old\n');
    // A regular file where a directory is needed makes mkdir fail
    const blocker = path.join(tempDir, 'blocker');
    await writeFile(blocker, '');

    await expect(
      service.publish([
        { path: a, content: 'new\n' },
        { path: path.join(blocker, 'b.csv'), content: 'y\n' },
      ]),
    ).rejects.toThrow(OutputWriteError);

    expect(await readFile(a, 'utf-8')).toBe('old\n');
    expect((await readdir(tempDir)).sort()).toEqual(['a.csv', 'blocker']);
  });

  it('should restore previous outputs when a swap fails', async () => {
    const a = path.join(tempDir, 'a.csv');
    const b = path.join(tempDir, 'b.csv');
    await writeFile(a, 'old a\n');
    await writeFile(b, 'old b\n');

    const realRename = fsPromises.rename;
    const renameSpy = jest
      .spyOn(fsPromises, 'rename')
      .mockImplementation(async (from, to) => {
        if (String(from).endsWith('.tmp') && to === b) {
          throw new Error('disk full');
        }
        return realRename(from, to);
      });

    try {
      await expect(
        service.publish([
          { path: a, content: 'new a\n' },
          { path: b, content: 'new b\n' },
        ]),
      ).rejects.toThrow('Failed to publish output files: disk full');
    } finally {
      renameSpy.mockRestore();
    }

    expect(await readFile(a, 'utf-8')).toBe('old a\n');
    expect(await readFile(b, 'utf-8')).toBe('old b\n');
    expect((await readdir(tempDir)).sort()).toEqual(['a.csv', 'b.csv']);
  });
});
