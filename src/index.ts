/**
 * Rule Flow
 *
 * Declare the legal shapes of a process once as a rule graph, let users
 * compose concrete workflows within those rules, and run them as a state
 * machine with several positions active at once.
 *
 * @packageDocumentation
 */

export * from './constants';
export * from './errors';
export * from './logger';
export * from './graph-utils';

// Rules
export * from './rule-graph';
export * from './rule-set';
export type * from './types/rule.types';

// Flows and states
export * from './flow';
export type * from './types/flow.types';
export * from './state';
export type * from './types/state.types';

// Records, options and visualization
export * from './schema/records';
export * from './schema/options';
export * from './export/cytoscape';

// State manager and persistence
export * from './state-manager';
export * from './persistence/storage-adapter';
export * from './persistence/memory-adapter';
export * from './persistence/mongo-adapter';
