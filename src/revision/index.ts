// Revision Sources - read governed files from a base revision, the index and the working tree

import { readFileSync, existsSync, writeFileSync, mkdirSync, mkdtempSync, rmSync, statSync } from 'fs';
import { join, dirname } from 'path';
import { spawnSync } from 'child_process';
import { tmpdir } from 'os';

export type ChangeKind = 'added' | 'modified' | 'deleted';

export interface ChangedPath {
  status: ChangeKind;
  path: string;
}

export interface RevisionSource {
  readonly root: string;
  verifyRef(ref: string): boolean;
  // Base revision compared with the working tree
  changedPaths(baseRef: string): ChangedPath[];
  readAt(ref: string, path: string): string | null;
  readWorking(path: string): string | null;
  // Paths in the index
  trackedPaths(): string[];
  // Index compared with HEAD
  stagedPaths(): ChangedPath[];
  readStaged(path: string): string | null;
}

export class GitCommandError extends Error {
  public readonly args: string[];
  public readonly status: number | null;

  constructor(args: string[], status: number | null, stderr: string) {
    super(`git ${args.join(' ')} failed (status ${status ?? 'signal'}): ${stderr.trim()}`);
    this.name = 'GitCommandError';
    this.args = args;
    this.status = status;
  }
}

function toChangeKind(code: string): ChangeKind {
  if (code.startsWith('A')) return 'added';
  if (code.startsWith('D')) return 'deleted';
  return 'modified';
}

function parseNameStatus(output: string): ChangedPath[] {
  const changes: ChangedPath[] = [];
  for (const line of output.split('\n')) {
    if (!line.trim()) continue;
    const [code, ...rest] = line.split('\t');
    const path = rest.join('\t');
    if (path) {
      changes.push({ status: toChangeKind(code), path });
    }
  }
  return changes;
}

export class GitRevisionSource implements RevisionSource {
  readonly root: string;

  constructor(root: string) {
    this.root = root;
  }

  private git(args: string[], allowFailure = false): { ok: boolean; stdout: string } {
    const result = spawnSync('git', ['-C', this.root, ...args], {
      encoding: 'utf-8',
      timeout: 60000,
      maxBuffer: 50 * 1024 * 1024
    });
    if (result.error) {
      throw result.error;
    }
    const ok = result.status === 0;
    if (!ok && !allowFailure) {
      throw new GitCommandError(args, result.status, result.stderr ?? '');
    }
    return { ok, stdout: result.stdout ?? '' };
  }

  verifyRef(ref: string): boolean {
    return this.git(['rev-parse', '--verify', '--quiet', `${ref}^{commit}`], true).ok;
  }

  changedPaths(baseRef: string): ChangedPath[] {
    return parseNameStatus(this.git(['diff', '--name-status', '--no-renames', baseRef, '--']).stdout);
  }

  readAt(ref: string, path: string): string | null {
    const result = this.git(['show', `${ref}:${path}`], true);
    return result.ok ? result.stdout : null;
  }

  readWorking(path: string): string | null {
    const fullPath = join(this.root, path);
    if (!existsSync(fullPath) || !statSync(fullPath).isFile()) {
      return null;
    }
    return readFileSync(fullPath, 'utf-8');
  }

  trackedPaths(): string[] {
    return this.git(['ls-files', '-z']).stdout.split('\0').filter(Boolean);
  }

  stagedPaths(): ChangedPath[] {
    return parseNameStatus(this.git(['diff', '--cached', '--name-status', '--no-renames', '--']).stdout);
  }

  readStaged(path: string): string | null {
    const result = this.git(['show', `:${path}`], true);
    return result.ok ? result.stdout : null;
  }
}

export type FileTree = Record<string, string>;

export interface MemoryTreeInit {
  head: FileTree;
  index?: FileTree;
  working?: FileTree;
  refs?: Record<string, FileTree>;
}

function diffTrees(base: Map<string, string>, target: Map<string, string>): ChangedPath[] {
  const changes: ChangedPath[] = [];
  const paths = new Set([...base.keys(), ...target.keys()]);
  for (const path of [...paths].sort()) {
    const before = base.get(path);
    const after = target.get(path);
    if (before === undefined && after !== undefined) {
      changes.push({ status: 'added', path });
    } else if (before !== undefined && after === undefined) {
      changes.push({ status: 'deleted', path });
    } else if (before !== after) {
      changes.push({ status: 'modified', path });
    }
  }
  return changes;
}

// In-process stand-in for a repository: named commits, an index and a working tree
export class MemoryRevisionSource implements RevisionSource {
  readonly root: string;
  private commits = new Map<string, Map<string, string>>();
  private index: Map<string, string>;
  private working: Map<string, string>;

  constructor(init: MemoryTreeInit, root = '<memory>') {
    this.root = root;
    const head = new Map(Object.entries(init.head));
    this.commits.set('HEAD', head);
    for (const [ref, tree] of Object.entries(init.refs ?? {})) {
      this.commits.set(ref, new Map(Object.entries(tree)));
    }
    this.index = new Map(Object.entries(init.index ?? init.head));
    this.working = new Map(Object.entries(init.working ?? init.index ?? init.head));
  }

  verifyRef(ref: string): boolean {
    return this.commits.has(ref);
  }

  changedPaths(baseRef: string): ChangedPath[] {
    return diffTrees(this.commit(baseRef), this.working);
  }

  readAt(ref: string, path: string): string | null {
    return this.commit(ref).get(path) ?? null;
  }

  readWorking(path: string): string | null {
    return this.working.get(path) ?? null;
  }

  trackedPaths(): string[] {
    return [...this.index.keys()].sort();
  }

  stagedPaths(): ChangedPath[] {
    return diffTrees(this.commit('HEAD'), this.index);
  }

  readStaged(path: string): string | null {
    return this.index.get(path) ?? null;
  }

  writeWorking(path: string, content: string): void {
    this.working.set(path, content);
  }

  removeWorking(path: string): void {
    this.working.delete(path);
  }

  stage(path: string): void {
    const content = this.working.get(path);
    if (content === undefined) {
      this.index.delete(path);
    } else {
      this.index.set(path, content);
    }
  }

  unstage(path: string): void {
    const committed = this.commit('HEAD').get(path);
    if (committed === undefined) {
      this.index.delete(path);
    } else {
      this.index.set(path, committed);
    }
  }

  commitIndex(ref = 'HEAD'): void {
    this.commits.set(ref, new Map(this.index));
  }

  private commit(ref: string): Map<string, string> {
    const tree = this.commits.get(ref);
    if (!tree) {
      throw new Error(`unknown revision: ${ref}`);
    }
    return tree;
  }
}

// Ephemeral repository used by self-tests that must stage and commit files
export interface Sandbox {
  readonly source: RevisionSource;
  write(path: string, content: string): void;
  remove(path: string): void;
  stage(path: string): void;
  unstage(path: string): void;
  commit(message: string): void;
  destroy(): void;
}

export class MemorySandbox implements Sandbox {
  private tree = new MemoryRevisionSource({ head: {} }, '<sandbox>');

  get source(): RevisionSource {
    return this.tree;
  }

  write(path: string, content: string): void {
    this.tree.writeWorking(path, content);
  }

  remove(path: string): void {
    this.tree.removeWorking(path);
  }

  stage(path: string): void {
    this.tree.stage(path);
  }

  unstage(path: string): void {
    this.tree.unstage(path);
  }

  commit(_message: string): void {
    this.tree.commitIndex();
  }

  destroy(): void {
    this.tree = new MemoryRevisionSource({ head: {} }, '<sandbox>');
  }
}

export function isGitAvailable(): boolean {
  try {
    const result = spawnSync('git', ['--version'], { encoding: 'utf-8', timeout: 5000 });
    return result.status === 0;
  } catch {
    return false;
  }
}

// Throwaway git working copy under the OS temp dir
export class GitSandbox implements Sandbox {
  readonly dir: string;
  readonly source: GitRevisionSource;

  constructor() {
    this.dir = mkdtempSync(join(tmpdir(), 'governor-sandbox-'));
    this.source = new GitRevisionSource(this.dir);
    this.run(['init', '-q']);
  }

  private run(args: string[]): void {
    const result = spawnSync('git', [
      '-C', this.dir,
      '-c', 'user.name=governor-sandbox',
      '-c', 'user.email=sandbox@localhost',
      '-c', 'commit.gpgsign=false',
      ...args
    ], { encoding: 'utf-8', timeout: 30000 });
    if (result.error) {
      throw result.error;
    }
    if (result.status !== 0) {
      throw new GitCommandError(args, result.status, result.stderr ?? '');
    }
  }

  write(path: string, content: string): void {
    const fullPath = join(this.dir, path);
    mkdirSync(dirname(fullPath), { recursive: true });
    writeFileSync(fullPath, content);
  }

  remove(path: string): void {
    rmSync(join(this.dir, path), { force: true });
  }

  stage(path: string): void {
    this.run(['add', '-A', '--', path]);
  }

  unstage(path: string): void {
    if (this.source.verifyRef('HEAD')) {
      this.run(['reset', '-q', 'HEAD', '--', path]);
    } else {
      this.run(['rm', '-q', '--cached', '--', path]);
    }
  }

  commit(message: string): void {
    this.run(['commit', '-q', '--allow-empty', '-m', message]);
  }

  destroy(): void {
    rmSync(this.dir, { recursive: true, force: true });
  }
}
