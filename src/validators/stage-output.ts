// Stage output format - every registered team output file carries the required sections

import { field } from '../ledger/csv.js';
import type { LedgerStore } from '../ledger/store.js';
import type { GovernorConfig } from '../config/index.js';
import { EXIT_CODES, PolicyViolation } from '../errors.js';
import { passOutcome, type GateOutcome } from '../gate/outcome.js';

export const STAGE_OUTPUT_RULE = 'STAGE-OUTPUT-FORMAT';

export interface StageOutputResult {
  checked: number;
  errors: string[];
}

export class StageOutputValidator {
  private registryPath: string;
  private outputColumn: string;
  private requiredSections: string[];

  constructor(config: GovernorConfig, private store: LedgerStore) {
    this.registryPath = config.ledgers.teamRegistry;
    this.outputColumn = config.stageOutput.outputColumn;
    this.requiredSections = config.stageOutput.requiredSections;
  }

  evaluate(): StageOutputResult {
    const registry = this.store.requireTable(STAGE_OUTPUT_RULE, this.registryPath);
    const source = this.store.revisionSource;

    let checked = 0;
    const errors: string[] = [];
    for (const row of registry.rows) {
      const team = field(row, 'team_id');
      const outputFile = field(row, this.outputColumn);
      if (!team || !outputFile) continue;

      const content = source.readWorking(outputFile);
      if (content === null) {
        errors.push(`${team}: missing output file ${outputFile}`);
        continue;
      }
      checked++;
      for (const section of this.requiredSections) {
        if (!content.includes(section)) {
          errors.push(`${team}: ${outputFile} missing section '${section}'`);
        }
      }
    }
    return { checked, errors };
  }

  check(): GateOutcome {
    const { checked, errors } = this.evaluate();
    if (errors.length > 0) {
      throw new PolicyViolation(
        STAGE_OUTPUT_RULE,
        EXIT_CODES.stageOutput,
        'required output-format sections missing',
        errors
      );
    }
    return passOutcome(STAGE_OUTPUT_RULE, `validated required sections for ${checked} stage output file(s)`);
  }
}
