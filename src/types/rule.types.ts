import type { HookPhase } from '../errors';
import type { FlowNode } from '../flow';
import type { FlowState } from '../state';
import type { RuleNode } from '../rule-graph';

/**
 * What a hook sees when a position is entered or left
 */
export type HookContext = {
  /** The flow node being entered or left */
  node: FlowNode;
  /** The rule the node instantiates */
  rule: RuleNode;
  /** The state performing the transition */
  state: FlowState;
  phase: HookPhase;
};

export type RuleHook = (context: HookContext) => void;

/**
 * Behaviour attached to a rule. Both hooks are optional; a throwing hook
 * aborts the transition that invoked it.
 */
export type RuleHooks = {
  onEnter?: RuleHook;
  onExit?: RuleHook;
};

export type DefineRuleOptions = {
  /** Human readable name, defaults to the label */
  displayName?: string;
  hooks?: RuleHooks;
};
