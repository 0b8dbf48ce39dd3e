/**
 * History event recorded when a position becomes active
 */
export const ENTER = 'enter' as const;

/**
 * History event recorded when a position is left or pruned
 */
export const EXIT = 'exit' as const;

/**
 * Default MongoDB collection names used by the MongoDB storage adapter
 */
export const DEFAULT_COLLECTIONS = {
  ruleSets: 'rule_flow_rule_sets',
  flows: 'rule_flow_flows',
  snapshots: 'rule_flow_state_snapshots',
} as const;
