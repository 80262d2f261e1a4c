// Governance Errors - one class per rule family, each with a stable exit code

export const EXIT_CODES = {
  configuration: 2,
  unknownTeam: 27,
  ordering: 29,
  integrity: 30,
  authority: 31,
  harness: 32,
  secret: 33,
  requestIdPolicy: 34,
  requestIdUniqueness: 41,
  runStateSync: 43,
  releaseGates: 44,
  invariant: 45,
  pipelineMode: 46,
  stageOutput: 47
} as const;

export class GovernanceError extends Error {
  public readonly ruleId: string;
  public readonly exitCode: number;
  public readonly details: string[];

  constructor(ruleId: string, exitCode: number, message: string, details: string[] = []) {
    super(message);
    this.name = 'GovernanceError';
    this.ruleId = ruleId;
    this.exitCode = exitCode;
    this.details = details;
  }
}

// Missing or empty registry/policy input; validation cannot proceed
export class ConfigurationError extends GovernanceError {
  constructor(ruleId: string, message: string, details: string[] = []) {
    super(ruleId, EXIT_CODES.configuration, message, details);
    this.name = 'ConfigurationError';
  }
}

export class UnknownTeamError extends GovernanceError {
  constructor(ruleId: string, message: string) {
    super(ruleId, EXIT_CODES.unknownTeam, message);
    this.name = 'UnknownTeamError';
  }
}

export class OrderingViolation extends GovernanceError {
  constructor(ruleId: string, message: string) {
    super(ruleId, EXIT_CODES.ordering, message);
    this.name = 'OrderingViolation';
  }
}

export class IntegrityViolation extends GovernanceError {
  constructor(ruleId: string, message: string, details: string[] = []) {
    super(ruleId, EXIT_CODES.integrity, message, details);
    this.name = 'IntegrityViolation';
  }
}

export class AuthorityViolation extends GovernanceError {
  constructor(ruleId: string, message: string) {
    super(ruleId, EXIT_CODES.authority, message);
    this.name = 'AuthorityViolation';
  }
}

export class SecretExposure extends GovernanceError {
  constructor(ruleId: string, message: string, details: string[] = []) {
    super(ruleId, EXIT_CODES.secret, message, details);
    this.name = 'SecretExposure';
  }
}

export class InvariantFailure extends GovernanceError {
  constructor(ruleId: string, message: string, details: string[] = []) {
    super(ruleId, EXIT_CODES.invariant, message, details);
    this.name = 'InvariantFailure';
  }
}

// Request-id, run-state, stage-output, pipeline-mode and release-gate rules
export class PolicyViolation extends GovernanceError {
  constructor(ruleId: string, exitCode: number, message: string, details: string[] = []) {
    super(ruleId, exitCode, message, details);
    this.name = 'PolicyViolation';
  }
}
