// Secret Scanner - staged or tracked content must not carry credentials

import type { RevisionSource } from '../revision/index.js';
import type { GovernorConfig } from '../config/index.js';
import type { SecretFinding, SecretScope } from '../types/governance.js';
import { ConfigurationError, SecretExposure } from '../errors.js';
import { passOutcome, type GateOutcome } from '../gate/outcome.js';

export const SECRET_SCAN_RULE = 'SECRET-SCAN';

// Command-line scope argument; tracked when omitted
export function parseSecretScope(value: string | undefined): SecretScope {
  if (value === undefined) return 'tracked';
  if (value === 'staged' || value === 'tracked') return value;
  throw new ConfigurationError(SECRET_SCAN_RULE, `unknown scan scope '${value}'; expected staged or tracked`);
}

export interface SecretPattern {
  name: string;
  regex: RegExp;
}

export const SECRET_PATTERNS: SecretPattern[] = [
  { name: 'AWS Access Key', regex: /AKIA[0-9A-Z]{16}/g },
  { name: 'Google API Key', regex: /AIza[0-9A-Za-z_-]{35}/g },
  { name: 'GitHub Token', regex: /gh[pousr]_[A-Za-z0-9]{36,255}/g },
  { name: 'GitLab Token', regex: /glpat-[A-Za-z0-9_-]{20,}/g },
  { name: 'Slack Token', regex: /xox[baprs]-[A-Za-z0-9-]+/g },
  { name: 'Stripe Live Key', regex: /sk_live_[A-Za-z0-9]{24,}/g },
  { name: 'Private Key', regex: /-----BEGIN ((RSA|OPENSSH|EC|DSA|ENCRYPTED) )?PRIVATE KEY-----/g },
  // Only the keyword is case-insensitive
  { name: 'Credential Assignment', regex: /([Aa][Pp][Ii][_-]?[Kk][Ee][Yy]|[Ss][Ee][Cc][Rr][Ee][Tt]|[Tt][Oo][Kk][Ee][Nn]|[Pp][Aa][Ss][Ss][Ww][Oo][Rr][Dd])\s*[:=]\s*["'`]?[A-Za-z0-9_./+\-=]{20,}/g }
];

export interface SecretScanResult {
  scope: SecretScope;
  filesScanned: number;
  findings: SecretFinding[];
  // Set when the scope had nothing to scan
  skipped?: string;
}

function maskSecret(line: string, match: string): string {
  const masked = line.replace(match, `${match.slice(0, 4)}***MASKED***`);
  return masked.replace(/(['"])[^'"]{8,}(['"])/g, '$1***MASKED***$2');
}

export class SecretScanner {
  private allow: RegExp | null;
  private maxFileBytes: number;

  constructor(config: GovernorConfig, private source: RevisionSource) {
    const allow = config.secrets.allowPatterns;
    this.allow = allow.length > 0 ? new RegExp(`(${allow.join('|')})`, 'i') : null;
    this.maxFileBytes = config.secrets.maxFileBytes;
  }

  isAllowListed(line: string): boolean {
    return this.allow !== null && this.allow.test(line);
  }

  // First matching pattern per line, allow-listed lines skipped
  scanContent(scope: SecretScope, file: string, content: string): SecretFinding[] {
    if (content.includes('\0') || Buffer.byteLength(content, 'utf-8') > this.maxFileBytes) {
      return [];
    }

    const findings: SecretFinding[] = [];
    const lines = content.split('\n');
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i];
      if (this.isAllowListed(line)) continue;

      for (const pattern of SECRET_PATTERNS) {
        pattern.regex.lastIndex = 0;
        const match = pattern.regex.exec(line);
        if (match) {
          findings.push({
            scope,
            file,
            line: i + 1,
            matched_pattern: pattern.name,
            snippet: maskSecret(line.trim(), match[0])
          });
          break;
        }
      }
    }
    return findings;
  }

  scan(scope: SecretScope): SecretScanResult {
    let paths: string[];
    let read: (path: string) => string | null;

    if (scope === 'staged') {
      const staged = this.source.stagedPaths().filter(change => change.status !== 'deleted');
      if (staged.length === 0) {
        return { scope, filesScanned: 0, findings: [], skipped: 'no staged changes' };
      }
      paths = staged.map(change => change.path);
      read = path => this.source.readStaged(path);
    } else {
      paths = this.source.trackedPaths();
      read = path => this.source.readWorking(path);
    }

    const findings: SecretFinding[] = [];
    let filesScanned = 0;
    for (const path of paths) {
      const content = read(path);
      if (content === null) continue;
      filesScanned++;
      findings.push(...this.scanContent(scope, path, content));
    }

    console.log(`[SCAN] ${scope} scope: ${filesScanned} file(s), ${findings.length} finding(s)`);
    return { scope, filesScanned, findings };
  }

  check(scope: SecretScope): GateOutcome {
    const result = this.scan(scope);
    if (result.skipped) {
      return passOutcome(SECRET_SCAN_RULE, `${result.skipped}; ${scope} scope clean`);
    }
    if (result.findings.length > 0) {
      throw new SecretExposure(
        SECRET_SCAN_RULE,
        `potential secrets detected in ${scope} scope; findings=${result.findings.length}`,
        result.findings.map(f => `${f.file}:${f.line} ${f.matched_pattern} ${f.snippet}`)
      );
    }
    return passOutcome(SECRET_SCAN_RULE, `no secrets detected in ${scope} scope; files_scanned=${result.filesScanned}`);
  }
}
