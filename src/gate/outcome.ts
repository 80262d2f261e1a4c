// Gate outcomes - the PASS/FAIL result every validator produces

import { GovernanceError } from '../errors.js';

export interface GateOutcome {
  ruleId: string;
  passed: boolean;
  // 0 when passed
  exitCode: number;
  message: string;
  details: string[];
}

export function passOutcome(ruleId: string, message: string, details: string[] = []): GateOutcome {
  return { ruleId, passed: true, exitCode: 0, message, details };
}

export function failOutcome(error: GovernanceError): GateOutcome {
  return {
    ruleId: error.ruleId,
    passed: false,
    exitCode: error.exitCode,
    message: error.message,
    details: error.details
  };
}

// Anything thrown while a check runs becomes a failed outcome; never a stack trace
export function outcomeFromError(ruleId: string, err: unknown, fallbackExitCode = 1): GateOutcome {
  if (err instanceof GovernanceError) {
    return failOutcome(err);
  }
  const message = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
  return { ruleId, passed: false, exitCode: fallbackExitCode, message, details: [] };
}

export function formatOutcome(outcome: GateOutcome): { stdout: string[]; stderr: string[] } {
  if (outcome.passed) {
    return {
      stdout: [`PASS[${outcome.ruleId}] ${outcome.message}`, ...outcome.details.map(d => `DETAIL[${outcome.ruleId}] ${d}`)],
      stderr: []
    };
  }
  return {
    stdout: [],
    stderr: [`FAIL[${outcome.ruleId}] ${outcome.message}`, ...outcome.details.map(d => `DETAIL[${outcome.ruleId}] ${d}`)]
  };
}
