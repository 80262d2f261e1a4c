// Edit-Authority Enforcer - only the authorized role may touch executable assets, with provenance

import { extname } from 'path';
import { matchesAny } from '../revision/glob.js';
import type { ChangedPath, RevisionSource } from '../revision/index.js';
import type { GovernorConfig } from '../config/index.js';
import type { ExecutableAssetEdit } from '../types/governance.js';
import { AuthorityViolation, ConfigurationError } from '../errors.js';
import { passOutcome, type GateOutcome } from '../gate/outcome.js';

export const EDIT_AUTHORITY_RULE = 'EDIT-AUTHORITY';

export const UNCLAIMED_ROLE = '(unclaimed)';

export interface AuthorityFinding {
  kind: 'unauthorized_editor' | 'missing_provenance';
  path: string;
  editorRole: string;
  message: string;
}

export interface EditAuthorityResult {
  edits: ExecutableAssetEdit[];
  violation: AuthorityFinding | null;
}

export class EditAuthorityEnforcer {
  private settings: GovernorConfig['editAuthority'];
  private provenance: RegExp;

  constructor(config: GovernorConfig, private source: RevisionSource) {
    this.settings = config.editAuthority;
    this.provenance = new RegExp(config.editAuthority.provenancePattern);
  }

  isGoverned(path: string): boolean {
    return matchesAny(path, this.settings.governedPaths);
  }

  isExecutableAsset(path: string): boolean {
    return this.settings.executableExtensions.includes(extname(path).toLowerCase())
      || matchesAny(path, this.settings.executablePaths);
  }

  isExempt(path: string): boolean {
    return matchesAny(path, this.settings.exemptPaths);
  }

  governedAssets(changes: ChangedPath[]): ChangedPath[] {
    return changes.filter(c => this.isGoverned(c.path) && this.isExecutableAsset(c.path) && !this.isExempt(c.path));
  }

  // The role is a caller-supplied claim; an absent claim is treated as unauthorized
  evaluate(baseRef: string, editorRole: string | undefined): EditAuthorityResult {
    if (!this.source.verifyRef(baseRef)) {
      throw new ConfigurationError(EDIT_AUTHORITY_RULE, `invalid base ref: ${baseRef}`);
    }

    const role = editorRole?.trim() || UNCLAIMED_ROLE;
    const edits: ExecutableAssetEdit[] = [];

    for (const change of this.governedAssets(this.source.changedPaths(baseRef))) {
      if (role !== this.settings.authorizedRole) {
        edits.push({ path: change.path, editor_role: role, has_provenance_reference: false });
        return {
          edits,
          violation: {
            kind: 'unauthorized_editor',
            path: change.path,
            editorRole: role,
            message: `editor role '${role}' may not modify executable asset ${change.path}; authorized role: ${this.settings.authorizedRole}`
          }
        };
      }

      // Deleted assets carry no content to hold a reference
      const content = change.status === 'deleted' ? null : this.source.readWorking(change.path);
      if (content === null) {
        edits.push({ path: change.path, editor_role: role, has_provenance_reference: false });
        continue;
      }

      const hasReference = this.provenance.test(content);
      edits.push({ path: change.path, editor_role: role, has_provenance_reference: hasReference });
      if (!hasReference) {
        return {
          edits,
          violation: {
            kind: 'missing_provenance',
            path: change.path,
            editorRole: role,
            message: `missing provenance reference (${this.settings.provenancePattern}) in ${change.path}`
          }
        };
      }
    }

    return { edits, violation: null };
  }

  check(baseRef: string, editorRole: string | undefined): GateOutcome {
    const result = this.evaluate(baseRef, editorRole);
    if (result.violation) {
      throw new AuthorityViolation(EDIT_AUTHORITY_RULE, result.violation.message);
    }
    return passOutcome(
      EDIT_AUTHORITY_RULE,
      `edit authority valid against ${baseRef}; executable assets touched=${result.edits.length}`
    );
  }
}
