import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, readFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { ConfigLoader, DEFAULT_CONFIG, loadConfig, resolveRepoPath, writeStarterConfig } from './index.js';
import { ConfigurationError } from '../errors.js';

describe('ConfigLoader', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'governor-config-'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('uses defaults rooted at the base path when no file exists', () => {
    const config = loadConfig(dir, {});
    expect(config.rootDir).toBe(dir);
    expect(config.editAuthority.authorizedRole).toBe('qa_fixer');
    expect(config.ledgers.handoffLog).toBe(DEFAULT_CONFIG.ledgers.handoffLog);
  });

  it('merges file sections over the defaults', () => {
    writeFileSync(join(dir, 'governor.config.json'), JSON.stringify({
      name: 'demo',
      editAuthority: { authorizedRole: 'release_fixer' },
      appendOnly: { rowKeys: { 'extra.csv': ['id'] } }
    }));

    const config = loadConfig(dir, {});
    expect(config.name).toBe('demo');
    expect(config.editAuthority.authorizedRole).toBe('release_fixer');
    expect(config.editAuthority.provenancePattern).toBe(DEFAULT_CONFIG.editAuthority.provenancePattern);
    expect(config.appendOnly.rowKeys['extra.csv']).toEqual(['id']);
    expect(config.appendOnly.rowKeys['decision_log.csv']).toEqual(['decision_id']);
  });

  it('merges stage output settings and validates the information URI', () => {
    writeFileSync(join(dir, 'governor.config.json'), JSON.stringify({
      informationUri: 'https://git.example.test/pipeline',
      stageOutput: { requiredSections: ['## Verdict'] }
    }));

    const config = loadConfig(dir, {});
    expect(config.informationUri).toBe('https://git.example.test/pipeline');
    expect(config.stageOutput).toEqual({ outputColumn: 'output_file', requiredSections: ['## Verdict'] });

    writeFileSync(join(dir, 'governor.config.json'), JSON.stringify({ informationUri: 'not a uri' }));
    expect(() => loadConfig(dir, {})).toThrow(ConfigurationError);
  });

  it('takes the editor role from the environment only', () => {
    writeFileSync(join(dir, '.governorrc.json'), JSON.stringify({ editorRole: 'qa_fixer' }));
    expect(loadConfig(dir, {}).editorRole).toBeUndefined();
    expect(loadConfig(dir, { EDITOR_ROLE: ' qa_fixer ' }).editorRole).toBe('qa_fixer');
  });

  it('applies report and database overrides from the environment', () => {
    const config = loadConfig(dir, { GOVERNOR_REPORT: 'out/report.json', GOVERNOR_DB: ':memory:' });
    expect(config.reportPath).toBe('out/report.json');
    expect(config.databasePath).toBe(':memory:');
  });

  it('rejects malformed JSON', () => {
    writeFileSync(join(dir, 'governor.config.json'), '{ not json');
    expect(() => loadConfig(dir, {})).toThrow(ConfigurationError);
  });

  it('rejects a section that is not an object', () => {
    writeFileSync(join(dir, 'governor.config.json'), JSON.stringify({ secrets: ['x'] }));
    try {
      loadConfig(dir, {});
      expect.fail('expected a configuration error');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (err instanceof ConfigurationError) {
        expect(err.details).toEqual(['secrets']);
        expect(err.exitCode).toBe(2);
      }
    }
  });

  it('fails schema validation on wrongly typed values', () => {
    writeFileSync(join(dir, 'governor.config.json'), JSON.stringify({ secrets: { maxFileBytes: 'big' } }));
    expect(() => loadConfig(dir, {})).toThrow('Configuration validation failed');
  });

  it('reports semantic problems from validate()', () => {
    const loader = new ConfigLoader();
    const config = loader.getConfig();
    config.editAuthority.authorizedRole = ' ';
    config.editAuthority.provenancePattern = '(unclosed';
    config.invariants.signoffRoles = ['technical_owner', 'technical_owner'];

    expect(loader.validate()).toEqual([
      'editAuthority.authorizedRole is required',
      'editAuthority.provenancePattern is not a valid regular expression: (unclosed',
      'invariants.signoffRoles must name two distinct roles'
    ]);
  });

  it('does not share state with DEFAULT_CONFIG', () => {
    const loader = new ConfigLoader();
    loader.getConfig().secrets.allowPatterns.push('MUTATED');
    expect(DEFAULT_CONFIG.secrets.allowPatterns).not.toContain('MUTATED');
  });

  it('resolves relative repository paths against the root', () => {
    const config = loadConfig(dir, {});
    expect(resolveRepoPath(config, 'a/b.csv')).toBe(join(dir, 'a/b.csv'));
    expect(resolveRepoPath(config, '/abs/file')).toBe('/abs/file');
  });

  it('writes a starter config that loads cleanly and refuses to overwrite it', () => {
    const target = writeStarterConfig(dir);
    const written: unknown = JSON.parse(readFileSync(target, 'utf-8'));
    expect(written).toMatchObject({ name: 'my-pipeline', version: '1.0' });
    expect(written).not.toHaveProperty('rootDir');

    expect(loadConfig(dir, {}).name).toBe('my-pipeline');
    expect(() => writeStarterConfig(dir)).toThrow('governor.config.json already exists');
  });
});
