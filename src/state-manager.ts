/**
 * State manager for persisting rule sets, flows and versioned state snapshots
 */

import type { Flow } from './flow';
import { consoleLogger, Logger } from './logger';
import { MemoryStorageAdapter } from './persistence/memory-adapter';
import { StateSnapshot, StorageAdapter } from './persistence/storage-adapter';
import type { RuleRegistry } from './rule-graph';
import type { RuleSet } from './rule-set';
import {
  restoreFlow,
  restoreRuleSet,
  restoreState,
  serializeFlow,
  serializeRuleSet,
  serializeState,
} from './schema/records';
import type { FlowState } from './state';
import type { StateOptions } from './types/state.types';

export type StateManagerOptions = {
  /** Storage adapter to use (defaults to in-memory) */
  adapter?: StorageAdapter;
  logger?: Logger;
};

/**
 * Saves and loads engine objects through a storage adapter.
 * States are stored as numbered snapshots so earlier versions stay loadable.
 */
export class StateManager {
  private adapter: StorageAdapter;
  private logger: Logger;
  private versionCounters: Map<string, number> = new Map();

  constructor(options: StateManagerOptions = {}) {
    this.adapter = options.adapter || new MemoryStorageAdapter();
    this.logger = options.logger || consoleLogger;
  }

  async saveRuleSet(ruleSet: RuleSet): Promise<void> {
    await this.adapter.saveRuleSet(serializeRuleSet(ruleSet));
  }

  /**
   * Load a rule set record and attach it to `registry`
   * @returns null when nothing is stored under that name
   */
  async loadRuleSet(
    name: string,
    registry: RuleRegistry
  ): Promise<RuleSet | null> {
    const record = await this.adapter.loadRuleSet(name);
    return record ? restoreRuleSet(record, registry) : null;
  }

  async saveFlow(flow: Flow): Promise<void> {
    await this.adapter.saveFlow(serializeFlow(flow));
  }

  /**
   * Load a flow, resolving its rule set from `registry` or from storage
   * @returns null when the flow is not stored
   */
  async loadFlow(flowId: string, registry: RuleRegistry): Promise<Flow | null> {
    const record = await this.adapter.loadFlow(flowId);
    if (!record) return null;

    const ruleSet =
      registry.getRuleSet(record.ruleSet) ??
      (await this.loadRuleSet(record.ruleSet, registry));
    if (!ruleSet) {
      throw new Error(
        `Flow "${flowId}" references unknown rule set "${record.ruleSet}"`
      );
    }

    return restoreFlow(record, ruleSet);
  }

  async deleteFlow(flowId: string): Promise<void> {
    await this.adapter.deleteFlow(flowId);
  }

  /**
   * Save a new snapshot of a state
   * Automatically increments version number, continuing from storage
   */
  async save(state: FlowState): Promise<number> {
    if (!this.versionCounters.has(state.id)) {
      await this.initializeVersionCounter(state.id);
    }
    const currentVersion = this.versionCounters.get(state.id) || 0;
    const newVersion = currentVersion + 1;
    this.versionCounters.set(state.id, newVersion);

    const snapshot: StateSnapshot = {
      stateId: state.id,
      flowId: state.flow.id,
      version: newVersion,
      timestamp: new Date(),
      record: serializeState(state),
    };

    await this.adapter.saveSnapshot(snapshot);
    this.logger.debug('state saved', { state: state.id, version: newVersion });
    return newVersion;
  }

  /**
   * Load a specific snapshot version or the latest
   */
  async loadSnapshot(
    stateId: string,
    version?: number
  ): Promise<StateSnapshot | null> {
    const snapshot = await this.adapter.loadSnapshot(stateId, version);

    if (snapshot) {
      const currentMax = this.versionCounters.get(stateId) || 0;
      this.versionCounters.set(stateId, Math.max(currentMax, snapshot.version));
    }

    return snapshot;
  }

  /**
   * Restore a state on `flow` from its latest (or a given) snapshot.
   * No hooks run.
   */
  async load(
    stateId: string,
    flow: Flow,
    version?: number,
    options: Omit<StateOptions, 'id' | 'allowRepeats'> = {}
  ): Promise<FlowState | null> {
    const snapshot = await this.loadSnapshot(stateId, version);
    if (!snapshot) {
      return null;
    }
    return restoreState(snapshot.record, flow, {
      logger: this.logger,
      ...options,
    });
  }

  /**
   * Snapshots of a state, newest first
   */
  async getHistory(stateId: string, limit?: number): Promise<StateSnapshot[]> {
    return await this.adapter.loadHistory(stateId, limit);
  }

  /**
   * Delete all snapshots for a state
   */
  async delete(stateId: string): Promise<void> {
    await this.adapter.deleteState(stateId);
    this.versionCounters.delete(stateId);
  }

  /**
   * Prune old snapshots, keeping only the most recent N versions
   */
  async pruneHistory(stateId: string, keepLast: number): Promise<void> {
    await this.adapter.pruneHistory(stateId, keepLast);
  }

  async getSnapshotCount(stateId: string): Promise<number> {
    return await this.adapter.getSnapshotCount(stateId);
  }

  async exists(stateId: string): Promise<boolean> {
    return await this.adapter.stateExists(stateId);
  }

  getAdapter(): StorageAdapter {
    return this.adapter;
  }

  /**
   * Initialize version counter from storage
   * Useful when manager is recreated
   */
  async initializeVersionCounter(stateId: string): Promise<void> {
    const latest = await this.adapter.loadSnapshot(stateId);
    if (latest) {
      this.versionCounters.set(stateId, latest.version);
    }
  }
}
