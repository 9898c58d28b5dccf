import { stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ensureDirectories } from '@core/bootstrap.ts';
import { BootstrapError } from '@core/errors.ts';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { makeTempRoot, removeTempRoot } from '../helpers/tempRoot.ts';

describe('ensureDirectories', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempRoot();
  });

  afterEach(async () => {
    await removeTempRoot(root);
  });

  it('creates nested directories', async () => {
    const dirs = [join(root, 'config'), join(root, 'reports', 'screenshots')];

    await ensureDirectories(dirs);

    for (const dir of dirs) {
      expect((await stat(dir)).isDirectory()).toBe(true);
    }
  });

  it('leaves existing directories and their files alone', async () => {
    const data = join(root, 'data');
    await ensureDirectories([data]);
    await writeFile(join(data, 'keep.json'), '{}');

    await ensureDirectories([data, data]);

    expect((await stat(join(data, 'keep.json'))).isFile()).toBe(true);
  });

  it('fails with BootstrapError when a file is in the way', async () => {
    const blocked = join(root, 'reports');
    await writeFile(blocked, 'not a directory');

    await expect(ensureDirectories([join(blocked, 'nested')])).rejects.toBeInstanceOf(
      BootstrapError
    );
  });
});
