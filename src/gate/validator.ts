// Schema Validator - Strict validation with fail-closed behavior

import AjvModule from 'ajv';
import addFormatsModule from 'ajv-formats';
import type { ErrorObject, ValidateFunction } from 'ajv';
import { governorConfigSchema } from '../schemas/config.schema.js';
import { gateReportSchema } from '../schemas/report.schema.js';
import type { GovernorConfig } from '../config/index.js';
import type { GateReport } from '../types/governance.js';

// Handle ESM/CJS interop
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

export class SchemaValidationError extends Error {
  public readonly errors: ErrorObject[];

  constructor(message: string, errors: ErrorObject[]) {
    super(message);
    this.name = 'SchemaValidationError';
    this.errors = errors;
  }

  // One line per ajv error: "<path> <message>"
  describe(): string[] {
    return this.errors.map(err => `${err.instancePath || '/'} ${err.message ?? 'is invalid'}`);
  }
}

export class SchemaValidator {
  private validateConfig: ValidateFunction<GovernorConfig>;
  private validateReport: ValidateFunction<GateReport>;

  constructor() {
    const ajv = new Ajv({
      strict: true,
      allErrors: true,
      verbose: true
    });
    addFormats(ajv);

    this.validateConfig = ajv.compile<GovernorConfig>(governorConfigSchema);
    this.validateReport = ajv.compile<GateReport>(gateReportSchema);
  }

  // Fail-closed: throws on invalid configuration
  assertValidConfig(data: unknown): asserts data is GovernorConfig {
    if (!this.validateConfig(data)) {
      throw new SchemaValidationError(
        'Configuration validation failed',
        this.validateConfig.errors ?? []
      );
    }
  }

  // Fail-closed: throws on invalid report
  assertValidReport(data: unknown): asserts data is GateReport {
    if (!this.validateReport(data)) {
      throw new SchemaValidationError(
        'Report validation failed',
        this.validateReport.errors ?? []
      );
    }
  }

  isValidReport(data: unknown): data is GateReport {
    return this.validateReport(data);
  }

  getConfigErrors(data: unknown): ErrorObject[] {
    this.validateConfig(data);
    return this.validateConfig.errors ?? [];
  }
}
