import { describe, it, expect, afterEach } from 'vitest';
import { MemoryRevisionSource, MemorySandbox, GitSandbox, isGitAvailable } from './index.js';

describe('MemoryRevisionSource', () => {
  it('diffs the working tree against a base revision', () => {
    const source = new MemoryRevisionSource({
      head: { 'a.txt': 'one', 'b.txt': 'two' },
      working: { 'a.txt': 'one!', 'c.txt': 'three' }
    });

    expect(source.changedPaths('HEAD')).toEqual([
      { status: 'modified', path: 'a.txt' },
      { status: 'deleted', path: 'b.txt' },
      { status: 'added', path: 'c.txt' }
    ]);
    expect(source.readAt('HEAD', 'b.txt')).toBe('two');
    expect(source.readWorking('b.txt')).toBeNull();
  });

  it('keeps the index separate from the working tree', () => {
    const source = new MemoryRevisionSource({ head: { 'a.txt': 'one' } });
    source.writeWorking('a.txt', 'edited');
    expect(source.stagedPaths()).toEqual([]);

    source.stage('a.txt');
    expect(source.stagedPaths()).toEqual([{ status: 'modified', path: 'a.txt' }]);
    expect(source.readStaged('a.txt')).toBe('edited');

    source.unstage('a.txt');
    expect(source.readStaged('a.txt')).toBe('one');
  });

  it('knows only the revisions it was given or committed', () => {
    const source = new MemoryRevisionSource({ head: {}, refs: { 'origin/main': { 'x.md': 'x' } } });
    expect(source.verifyRef('origin/main')).toBe(true);
    expect(source.verifyRef('nope')).toBe(false);
    expect(() => source.readAt('nope', 'x.md')).toThrow('unknown revision: nope');

    source.writeWorking('y.md', 'y');
    source.stage('y.md');
    source.commitIndex('release');
    expect(source.readAt('release', 'y.md')).toBe('y');
  });
});

describe('MemorySandbox', () => {
  it('tracks committed files until they are removed and committed again', () => {
    const sandbox = new MemorySandbox();
    sandbox.write('leak.txt', 'content');
    sandbox.stage('leak.txt');
    sandbox.commit('add');
    expect(sandbox.source.trackedPaths()).toEqual(['leak.txt']);

    sandbox.remove('leak.txt');
    sandbox.stage('leak.txt');
    sandbox.commit('remove');
    expect(sandbox.source.trackedPaths()).toEqual([]);
  });
});

describe.skipIf(!isGitAvailable())('GitSandbox', () => {
  let sandbox: GitSandbox | undefined;

  afterEach(() => {
    sandbox?.destroy();
    sandbox = undefined;
  });

  it('reads staged, committed and working content through git', () => {
    sandbox = new GitSandbox();
    sandbox.write('docs/note.md', 'first\n');
    sandbox.stage('docs/note.md');
    expect(sandbox.source.stagedPaths()).toEqual([{ status: 'added', path: 'docs/note.md' }]);
    sandbox.commit('seed');

    expect(sandbox.source.verifyRef('HEAD')).toBe(true);
    expect(sandbox.source.trackedPaths()).toEqual(['docs/note.md']);

    sandbox.write('docs/note.md', 'first\nsecond\n');
    expect(sandbox.source.changedPaths('HEAD')).toEqual([{ status: 'modified', path: 'docs/note.md' }]);
    expect(sandbox.source.readAt('HEAD', 'docs/note.md')).toBe('first\n');
    expect(sandbox.source.readWorking('docs/note.md')).toBe('first\nsecond\n');
    expect(sandbox.source.readAt('HEAD', 'missing.md')).toBeNull();
  });

  it('unstages a change back to the committed version', () => {
    sandbox = new GitSandbox();
    sandbox.write('a.txt', 'one\n');
    sandbox.stage('a.txt');
    sandbox.commit('seed');

    sandbox.write('a.txt', 'two\n');
    sandbox.stage('a.txt');
    expect(sandbox.source.readStaged('a.txt')).toBe('two\n');
    sandbox.unstage('a.txt');
    expect(sandbox.source.stagedPaths()).toEqual([]);
  });
});
