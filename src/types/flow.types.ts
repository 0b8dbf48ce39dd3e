import type { FlowViolation } from '../errors';

export type CreateFlowOptions = {
  /** Defaults to a random UUID */
  id?: string;
  /** Human readable name, defaults to the id */
  name?: string;
};

export type AddNodeOptions = {
  /**
   * Whether a state may start at this node.
   * Defaults to `true` for the first node of a flow, `false` otherwise.
   */
  isStart?: boolean;
  /** Explicit node id, generated (`n1`, `n2`, ...) when omitted */
  id?: string;
};

/**
 * Result of {@link Flow.validate}
 */
export type FlowValidation =
  | { ok: true }
  | { ok: false; violations: FlowViolation[] };
