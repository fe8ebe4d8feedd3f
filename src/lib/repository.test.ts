import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RevisionError } from './errors.js';
import { GitRepository, newFileDiff, parseMetadata } from './repository.js';
import { parseRevisionSpec } from './revision.js';

const mocks = vi.hoisted(() => ({
  git: {
    checkIsRepo: vi.fn(),
    raw: vi.fn(),
  },
}));

vi.mock('simple-git', () => ({
  default: vi.fn(() => mocks.git),
}));

const SHA_A = '1111111111111111111111111111111111111111';
const SHA_B = '2222222222222222222222222222222222222222';

type RawHandler = (args: string[]) => string | Error;

function gitResponds(handler: RawHandler) {
  mocks.git.raw.mockImplementation(async (args: string[]) => {
    const result = handler(args);
    if (result instanceof Error) throw result;
    return result;
  });
}

describe('GitRepository', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'revdoc-repo-'));
    mocks.git.checkIsRepo.mockResolvedValue(true);
    mocks.git.raw.mockReset();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('lists a range oldest first with a diff per commit', async () => {
    gitResponds((args) => {
      if (args[0] === 'rev-parse') return `${args[2] === 'v1^{commit}' ? SHA_A : SHA_B}\n`;
      if (args[0] === 'rev-list') return `${SHA_A}\n${SHA_B}\n`;
      if (args[0] === 'show') return `\ndiff --git a.ts a.ts\n+change in ${args.at(-3)}\n`;
      return new Error(`unexpected git ${args.join(' ')}`);
    });

    const refs = await new GitRepository(dir).resolveCommits(parseRevisionSpec('v1..v2'), ['src']);

    expect(refs).toEqual([
      { id: SHA_A, diff: `diff --git a.ts a.ts\n+change in ${SHA_A}\n` },
      { id: SHA_B, diff: `diff --git a.ts a.ts\n+change in ${SHA_B}\n` },
    ]);
    expect(mocks.git.raw).toHaveBeenCalledWith(['rev-list', '--reverse', 'v1..v2', '--', 'src']);
  });

  it('returns nothing for an empty range', async () => {
    gitResponds((args) => (args[0] === 'rev-parse' ? `${SHA_A}\n` : ''));

    const refs = await new GitRepository(dir).resolveCommits(parseRevisionSpec('v1..v1'), []);
    expect(refs).toEqual([]);
  });

  it('rejects a revision git cannot resolve', async () => {
    gitResponds(() => new Error("fatal: Needed a single revision"));

    const pending = new GitRepository(dir).resolveCommits(parseRevisionSpec('nope'), []);
    await expect(pending).rejects.toBeInstanceOf(RevisionError);
    await expect(pending).rejects.toThrow('Invalid revision "nope": fatal: Needed a single revision');
  });

  it('rejects outside a git repository', async () => {
    mocks.git.checkIsRepo.mockResolvedValue(false);

    await expect(
      new GitRepository(dir).resolveCommits(parseRevisionSpec('HEAD'), [])
    ).rejects.toThrow('is not inside a git repository');
  });

  it('combines tracked changes and untracked files for the working tree', async () => {
    await writeFile(join(dir, 'notes.txt'), 'hello\nworld\n', 'utf-8');
    gitResponds((args) => {
      if (args[0] === 'diff') return 'diff --git app.ts app.ts\n-old\n+new\n';
      if (args[0] === 'ls-files') return 'notes.txt\n';
      return new Error(`unexpected git ${args.join(' ')}`);
    });

    const [ref] = await new GitRepository(dir).resolveCommits(parseRevisionSpec(''), []);

    expect(ref).toEqual({
      id: 'working-tree',
      diff: [
        'diff --git app.ts app.ts',
        '-old',
        '+new',
        'diff --git notes.txt notes.txt',
        'new file mode 100644',
        '--- /dev/null',
        '+++ notes.txt',
        '@@ -0,0 +1,2 @@',
        '+hello',
        '+world',
      ].join('\n'),
    });
  });

  it('uses the index for staged changes', async () => {
    gitResponds((args) => (args[0] === 'diff' ? '+staged line\n' : new Error('unexpected')));

    const [ref] = await new GitRepository(dir).resolveCommits(parseRevisionSpec('--cached'), [
      'docs',
    ]);

    expect(ref).toEqual({ id: 'staged', diff: '+staged line\n' });
    expect(mocks.git.raw).toHaveBeenCalledWith([
      'diff',
      '--cached',
      '--no-color',
      '--no-prefix',
      '--unified=3',
      '--',
      'docs',
    ]);
  });

  it('reads commit metadata', async () => {
    gitResponds(() => `${SHA_A}\u00001111111\u0000Ada\u00002024-04-01T10:00:00+02:00\u0000Add parser\n\nBody\n`);

    await expect(new GitRepository(dir).getMetadata(SHA_A)).resolves.toEqual({
      id: SHA_A,
      shortId: '1111111',
      author: 'Ada',
      date: '2024-04-01',
      message: 'Add parser\n\nBody',
    });
  });

  it('reports no tag when describe fails', async () => {
    gitResponds(() => new Error('fatal: No names found'));

    await expect(new GitRepository(dir).latestTag()).resolves.toBeUndefined();
    await expect(new GitRepository(dir).currentBranch()).resolves.toBe('');
  });

  it('reads the latest tag and branch', async () => {
    gitResponds((args) => (args[0] === 'describe' ? 'v1.2.0\n' : 'main\n'));

    await expect(new GitRepository(dir).latestTag()).resolves.toBe('v1.2.0');
    await expect(new GitRepository(dir).currentBranch()).resolves.toBe('main');
  });
});

describe('newFileDiff', () => {
  it('renders an empty file as a header only', () => {
    expect(newFileDiff('empty.txt', '')).toBe(
      'diff --git empty.txt empty.txt\nnew file mode 100644\n--- /dev/null\n+++ empty.txt'
    );
  });
});

describe('parseMetadata', () => {
  it('tolerates a missing message', () => {
    expect(parseMetadata(`${SHA_B}\u00002222222\u0000Lin\u00002024-01-02T00:00:00Z\u0000`)).toEqual({
      id: SHA_B,
      shortId: '2222222',
      author: 'Lin',
      date: '2024-01-02',
      message: '',
    });
  });
});
