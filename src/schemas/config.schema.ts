// Strict JSON Schema for the merged governor configuration

const stringList = { type: 'array', items: { type: 'string', minLength: 1 } } as const;

export const governorConfigSchema = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  type: 'object',
  required: [
    'version', 'rootDir', 'reportPath', 'summaryPath', 'databasePath', 'doctrineRef',
    'ledgers', 'phaseOrder', 'appendOnly', 'editAuthority', 'secrets', 'requestIds',
    'stageOutput', 'releaseGates', 'invariants'
  ],
  additionalProperties: false,
  properties: {
    version: { type: 'string', minLength: 1 },
    name: { type: 'string' },
    rootDir: { type: 'string', minLength: 1 },
    reportPath: { type: 'string', minLength: 1 },
    summaryPath: { type: 'string', minLength: 1 },
    databasePath: { type: 'string', minLength: 1 },
    doctrineRef: { type: 'string', minLength: 1 },
    informationUri: { type: 'string', format: 'uri' },
    editorRole: { type: 'string' },
    ledgers: {
      type: 'object',
      required: [
        'teamRegistry', 'handoffLog', 'decisionLog', 'changeRequestQueue', 'runRegistry',
        'runModeRegistry', 'budgetEnvelopes', 'releaseGateLog', 'gateExceptions'
      ],
      additionalProperties: false,
      properties: {
        teamRegistry: { type: 'string', minLength: 1 },
        handoffLog: { type: 'string', minLength: 1 },
        decisionLog: { type: 'string', minLength: 1 },
        changeRequestQueue: { type: 'string', minLength: 1 },
        runRegistry: { type: 'string', minLength: 1 },
        runModeRegistry: { type: 'string', minLength: 1 },
        budgetEnvelopes: { type: 'string', minLength: 1 },
        releaseGateLog: { type: 'string', minLength: 1 },
        gateExceptions: { type: 'string', minLength: 1 }
      }
    },
    phaseOrder: {
      type: 'object',
      required: ['blockDecisionMarker'],
      additionalProperties: false,
      properties: {
        blockDecisionMarker: { type: 'string', minLength: 1 }
      }
    },
    appendOnly: {
      type: 'object',
      required: ['scopes', 'rowKeys'],
      additionalProperties: false,
      properties: {
        scopes: { ...stringList, minItems: 1 },
        rowKeys: {
          type: 'object',
          additionalProperties: stringList
        }
      }
    },
    editAuthority: {
      type: 'object',
      required: [
        'authorizedRole', 'governedPaths', 'executableExtensions', 'executablePaths',
        'exemptPaths', 'provenancePattern'
      ],
      additionalProperties: false,
      properties: {
        authorizedRole: { type: 'string', minLength: 1 },
        governedPaths: stringList,
        executableExtensions: { type: 'array', items: { type: 'string', pattern: '^\\.[A-Za-z0-9]+$' } },
        executablePaths: stringList,
        exemptPaths: stringList,
        provenancePattern: { type: 'string', minLength: 1 }
      }
    },
    secrets: {
      type: 'object',
      required: ['allowPatterns', 'maxFileBytes'],
      additionalProperties: false,
      properties: {
        allowPatterns: stringList,
        maxFileBytes: { type: 'integer', minimum: 1 }
      }
    },
    requestIds: {
      type: 'object',
      required: ['teamCodes'],
      additionalProperties: false,
      properties: {
        teamCodes: { type: 'array', minItems: 1, items: { type: 'string', pattern: '^[A-Z0-9]+$' } }
      }
    },
    stageOutput: {
      type: 'object',
      required: ['outputColumn', 'requiredSections'],
      additionalProperties: false,
      properties: {
        outputColumn: { type: 'string', minLength: 1 },
        requiredSections: { ...stringList, minItems: 1 }
      }
    },
    releaseGates: {
      type: 'object',
      required: ['mandatoryGates', 'exceptionApproverRoles', 'budgetFields'],
      additionalProperties: false,
      properties: {
        mandatoryGates: stringList,
        exceptionApproverRoles: stringList,
        budgetFields: stringList
      }
    },
    invariants: {
      type: 'object',
      required: [
        'escalationSlaHours', 'containmentSlaMinutes', 'decisionOwnerRoles', 'signoffRoles',
        'safeModeRestrictedActions', 'lineageDimensions'
      ],
      additionalProperties: false,
      properties: {
        escalationSlaHours: { type: 'number', exclusiveMinimum: 0 },
        containmentSlaMinutes: { type: 'number', exclusiveMinimum: 0 },
        decisionOwnerRoles: { ...stringList, minItems: 1 },
        signoffRoles: { ...stringList, minItems: 2 },
        safeModeRestrictedActions: stringList,
        lineageDimensions: { ...stringList, minItems: 1 }
      }
    }
  }
} as const;
