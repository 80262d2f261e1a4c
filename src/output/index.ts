// Output Format Generators
// Supports: SARIF 2.1.0, JUnit XML, console table

import type { GateReport } from '../types/governance.js';

// ============ SARIF 2.1.0 Format ============
// Static Analysis Results Interchange Format
// Used by GitHub Code Scanning, VS Code, etc.

export interface SARIFRule {
  id: string;
  name: string;
  shortDescription: {
    text: string;
  };
  defaultConfiguration?: {
    level: 'none' | 'note' | 'warning' | 'error';
  };
  properties?: {
    tags?: string[];
  };
}

export interface SARIFResult {
  ruleId: string;
  level: 'none' | 'note' | 'warning' | 'error';
  message: {
    text: string;
  };
  locations?: Array<{
    physicalLocation: {
      artifactLocation: {
        uri: string;
        uriBaseId?: string;
      };
    };
  }>;
}

export interface SARIFRun {
  tool: {
    driver: {
      name: string;
      informationUri?: string;
      version: string;
      rules: SARIFRule[];
    };
  };
  results: SARIFResult[];
  invocations?: Array<{
    executionSuccessful: boolean;
    endTimeUtc?: string;
  }>;
}

export interface SARIFReport {
  $schema: string;
  version: '2.1.0';
  runs: SARIFRun[];
}

export const TOOL_NAME = 'pipeline-governor';
export const TOOL_VERSION = '0.1.0';

// Failed checks become error results anchored at the artifact they govern
// informationUri is emitted only when the project configures one
export function toSARIF(
  report: GateReport,
  ruleRefs: Record<string, string> = {},
  informationUri?: string
): SARIFReport {
  const rules: SARIFRule[] = report.checks.map(check => ({
    id: check.id,
    name: check.id.toLowerCase().replace(/[^a-z0-9]+/g, '-'),
    shortDescription: { text: `Governance gate ${check.id}` },
    defaultConfiguration: { level: 'error' },
    properties: { tags: ['governance'] }
  }));

  const results: SARIFResult[] = report.checks
    .filter(check => check.status === 'fail')
    .map(check => {
      const uri = ruleRefs[check.id];
      return {
        ruleId: check.id,
        level: 'error',
        message: { text: check.message },
        locations: uri
          ? [{ physicalLocation: { artifactLocation: { uri, uriBaseId: '%SRCROOT%' } } }]
          : undefined
      };
    });

  return {
    $schema: 'https://json.schemastore.org/sarif-2.1.0.json',
    version: '2.1.0',
    runs: [{
      tool: {
        driver: {
          name: TOOL_NAME,
          ...(informationUri ? { informationUri } : {}),
          version: TOOL_VERSION,
          rules
        }
      },
      results,
      invocations: [{
        executionSuccessful: report.overall === 'pass',
        endTimeUtc: report.generated_at_utc
      }]
    }]
  };
}

// ============ JUnit XML Format ============

export function toJUnit(report: GateReport): string {
  const failures = report.checks.filter(check => check.status === 'fail').length;

  let xml = `<?xml version="1.0" encoding="UTF-8"?>
<testsuites name="Governance Gates" tests="${report.checks.length}" failures="${failures}" time="0">
  <testsuite name="${escapeXml(report.base_ref ?? 'HEAD')}" tests="${report.checks.length}" failures="${failures}">
`;

  for (const check of report.checks) {
    xml += `    <testcase name="${escapeXml(check.id)}" classname="governance">\n`;
    if (check.status === 'fail') {
      xml += `      <failure message="${escapeXml(check.message)}" type="${escapeXml(check.id)}"/>\n`;
    } else {
      xml += `      <system-out>${escapeXml(check.message)}</system-out>\n`;
    }
    xml += `    </testcase>\n`;
  }

  xml += `  </testsuite>
</testsuites>`;

  return xml;
}

function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

// ============ Console Table ============

export type Colorize = (color: 'green' | 'red' | 'dim' | 'bold', text: string) => string;

const plain: Colorize = (_color, text) => text;

export function renderConsole(report: GateReport, colorize: Colorize = plain): string[] {
  const width = Math.max(8, ...report.checks.map(check => check.id.length));
  const lines = report.checks.map(check => {
    const status = check.status === 'pass' ? colorize('green', 'PASS') : colorize('red', 'FAIL');
    return `  ${status}  ${check.id.padEnd(width)}  ${colorize('dim', check.message)}`;
  });
  const failed = report.checks.filter(check => check.status === 'fail').length;
  const overall = report.overall === 'pass' ? colorize('green', 'PASS') : colorize('red', 'FAIL');
  lines.push('');
  lines.push(`  ${colorize('bold', 'overall')} ${overall}  (${report.checks.length - failed}/${report.checks.length} checks passed)`);
  return lines;
}
