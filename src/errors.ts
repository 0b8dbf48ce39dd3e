/**
 * Error classes raised by the rule graph, flow builder and state engine.
 * Every error carries a stable `code` so callers can branch without
 * `instanceof` checks across package boundaries.
 */

export type RuleFlowErrorCode =
  | 'DUPLICATE_LABEL'
  | 'DUPLICATE_NAME'
  | 'UNKNOWN_CHILD'
  | 'RULE_NOT_IN_SET'
  | 'FLOW_FROZEN'
  | 'FLOW_INVALID'
  | 'ILLEGAL_TRANSITION'
  | 'INVALID_POSITION'
  | 'HOOK_FAILURE'
  | 'NODE_NOT_REMOVABLE'
  | 'DUPLICATE_NODE_ID'
  | 'INVALID_RECORD';

export class RuleFlowError extends Error {
  constructor(
    public readonly code: RuleFlowErrorCode,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'RuleFlowError';
  }
}

export class DuplicateLabelError extends RuleFlowError {
  constructor(public readonly label: string) {
    super('DUPLICATE_LABEL', `Rule "${label}" is already defined`);
    this.name = 'DuplicateLabelError';
  }
}

export class DuplicateNameError extends RuleFlowError {
  constructor(public readonly ruleSetName: string) {
    super('DUPLICATE_NAME', `RuleSet "${ruleSetName}" already exists`);
    this.name = 'DuplicateNameError';
  }
}

export class UnknownChildError extends RuleFlowError {
  constructor(
    public readonly child: string,
    public readonly parent?: string
  ) {
    super(
      'UNKNOWN_CHILD',
      parent === undefined
        ? `Rule "${child}" is not defined`
        : `Rule "${parent}" references undefined child rule "${child}"`
    );
    this.name = 'UnknownChildError';
  }
}

export class RuleNotInSetError extends RuleFlowError {
  constructor(
    public readonly rule: string,
    public readonly ruleSetName: string
  ) {
    super(
      'RULE_NOT_IN_SET',
      `Rule "${rule}" is not part of RuleSet "${ruleSetName}"`
    );
    this.name = 'RuleNotInSetError';
  }
}

export class FlowFrozenError extends RuleFlowError {
  constructor(public readonly flowId: string) {
    super('FLOW_FROZEN', `Flow "${flowId}" is in use and can no longer change`);
    this.name = 'FlowFrozenError';
  }
}

/**
 * A single reason a flow failed validation
 */
export type FlowViolation =
  | { kind: 'no-root' }
  | { kind: 'illegal-edge'; from: string; to: string }
  | { kind: 'unreachable-node'; node: string };

export class FlowInvalidError extends RuleFlowError {
  constructor(
    public readonly flowId: string,
    public readonly violations: readonly FlowViolation[]
  ) {
    super(
      'FLOW_INVALID',
      `Flow "${flowId}" failed validation: ${violations
        .map((v) => v.kind)
        .join(', ')}`
    );
    this.name = 'FlowInvalidError';
  }
}

export class IllegalTransitionError extends RuleFlowError {
  constructor(
    public readonly from: string,
    public readonly to: string,
    reason?: string
  ) {
    super(
      'ILLEGAL_TRANSITION',
      `Transition "${from}" -> "${to}" is not allowed` +
        (reason ? `: ${reason}` : '')
    );
    this.name = 'IllegalTransitionError';
  }
}

export class InvalidPositionError extends RuleFlowError {
  constructor(
    public readonly node: string,
    reason = 'is not an active position'
  ) {
    super('INVALID_POSITION', `Node "${node}" ${reason}`);
    this.name = 'InvalidPositionError';
  }
}

export type HookPhase = 'enter' | 'exit';

export class HookFailureError extends RuleFlowError {
  constructor(
    public readonly phase: HookPhase,
    public readonly node: string,
    cause: unknown
  ) {
    super(
      'HOOK_FAILURE',
      `on${phase === 'enter' ? 'Enter' : 'Exit'} hook failed for node "${node}": ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      { cause }
    );
    this.name = 'HookFailureError';
  }
}

export class NodeNotRemovableError extends RuleFlowError {
  constructor(
    public readonly node: string,
    reason: string
  ) {
    super('NODE_NOT_REMOVABLE', `Node "${node}" cannot be removed: ${reason}`);
    this.name = 'NodeNotRemovableError';
  }
}

export class DuplicateNodeIdError extends RuleFlowError {
  constructor(
    public readonly node: string,
    public readonly flowId: string
  ) {
    super(
      'DUPLICATE_NODE_ID',
      `Flow "${flowId}" already has a node with id "${node}"`
    );
    this.name = 'DuplicateNodeIdError';
  }
}

export class RecordError extends RuleFlowError {
  constructor(
    public readonly recordType: string,
    detail: string,
    options?: ErrorOptions
  ) {
    super('INVALID_RECORD', `Invalid ${recordType} record: ${detail}`, options);
    this.name = 'RecordError';
  }
}
