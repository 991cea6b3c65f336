import { mkdir, writeFile } from 'node:fs/promises';
import { delimiter, join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { makeTempDir, removeDir } from '../../__tests__/helpers.js';
import { TerminalSession } from '../../core/session.js';
import { Completer } from '../completer.js';

describe('Completer', () => {
  let root: string;
  let completer: Completer;

  beforeEach(async () => {
    root = await makeTempDir();
    const work = join(root, 'work');
    const bin = join(root, 'bin');
    await mkdir(join(work, 'alps'), { recursive: true });
    await mkdir(bin);
    await writeFile(join(work, 'alpha.txt'), '');
    await writeFile(join(work, 'beta'), '');
    await writeFile(join(work, '.secret'), '');
    await writeFile(join(work, 'alps', 'inner.txt'), '');
    for (const tool of ['lsblk', 'mytool', 'ls']) {
      await writeFile(join(bin, tool), '');
    }

    completer = new Completer({
      session: new TerminalSession({ cwd: work, home: work }),
      commandNames: () => ['cd', 'ls', 'pwd'],
      pathEnv: () => [bin, join(root, 'missing-bin'), ''].join(delimiter)
    });
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('completes builtins first, then PATH executables, without duplicates', async () => {
    expect(await completer.complete('l')).toEqual([['ls', 'lsblk'], 'l']);
  });

  it('completes executables found only on PATH', async () => {
    expect(await completer.complete('my')).toEqual([['mytool'], 'my']);
  });

  it('offers nothing for an unknown prefix', async () => {
    expect(await completer.complete('zz')).toEqual([[], 'zz']);
  });

  it('completes paths for later tokens and marks directories', async () => {
    expect(await completer.complete('cat al')).toEqual([['alpha.txt', 'alps/'], 'al']);
  });

  it('hides dotfiles unless the prefix starts with a dot', async () => {
    expect(await completer.complete('cat ')).toEqual([['alpha.txt', 'alps/', 'beta'], '']);
    expect(await completer.complete('cat .s')).toEqual([['.secret'], '.s']);
  });

  it('keeps the typed directory part', async () => {
    expect(await completer.complete('cat alps/')).toEqual([['alps/inner.txt'], 'alps/']);
    expect(await completer.complete('cd ~/al')).toEqual([['~/alpha.txt', '~/alps/'], '~/al']);
  });

  it('offers nothing inside a missing directory', async () => {
    expect(await completer.complete('cat nowhere/x')).toEqual([[], 'nowhere/x']);
  });
});
