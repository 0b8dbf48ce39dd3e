/**
 * Storage adapter interface for rule sets, flows and versioned state snapshots
 */

import type {
  FlowRecord,
  RuleSetRecord,
  StateRecord,
} from '../schema/records';

/**
 * Snapshot of a state at a point in time
 */
export interface StateSnapshot {
  /** Id of the state */
  stateId: string;
  /** Id of the flow the state runs */
  flowId: string;
  /** Version number (increments with each save) */
  version: number;
  /** Timestamp when snapshot was created */
  timestamp: Date;
  /** Serialized state */
  record: StateRecord;
}

/**
 * Abstract storage adapter interface
 * Implement this interface to create custom storage backends
 */
export abstract class StorageAdapter {
  /**
   * Insert or replace a rule set record, keyed by name
   */
  abstract saveRuleSet(record: RuleSetRecord): Promise<void>;

  /**
   * @returns The record or null if not found
   */
  abstract loadRuleSet(name: string): Promise<RuleSetRecord | null>;

  /**
   * Insert or replace a flow record, keyed by id
   */
  abstract saveFlow(record: FlowRecord): Promise<void>;

  /**
   * @returns The record or null if not found
   */
  abstract loadFlow(flowId: string): Promise<FlowRecord | null>;

  abstract deleteFlow(flowId: string): Promise<void>;

  /**
   * Save a new snapshot version for a state
   */
  abstract saveSnapshot(snapshot: StateSnapshot): Promise<void>;

  /**
   * Load a specific snapshot version or the latest if version not specified
   * @returns The snapshot or null if not found
   */
  abstract loadSnapshot(
    stateId: string,
    version?: number
  ): Promise<StateSnapshot | null>;

  /**
   * Load the snapshots of a state
   * @param limit Optional limit on number of versions to return
   * @returns Array of snapshots ordered by version (newest first)
   */
  abstract loadHistory(
    stateId: string,
    limit?: number
  ): Promise<StateSnapshot[]>;

  /**
   * Delete all snapshots for a state
   */
  abstract deleteState(stateId: string): Promise<void>;

  /**
   * Prune old snapshots, keeping only the most recent N versions
   */
  abstract pruneHistory(stateId: string, keepLast: number): Promise<void>;

  abstract getSnapshotCount(stateId: string): Promise<number>;

  /**
   * @returns True if the state has at least one snapshot
   */
  abstract stateExists(stateId: string): Promise<boolean>;
}
