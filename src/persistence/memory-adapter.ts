/**
 * In-memory storage adapter for development and testing
 * Data is lost when the process ends
 */

import type {
  FlowRecord,
  RuleSetRecord,
  StateRecord,
} from '../schema/records';
import { StorageAdapter, StateSnapshot } from './storage-adapter';

const copy = <T>(value: T): T => structuredClone(value);

/**
 * Memory-based storage adapter backed by Maps.
 * Records are cloned on the way in and out so callers never share them.
 */
export class MemoryStorageAdapter extends StorageAdapter {
  private ruleSets: Map<string, RuleSetRecord> = new Map();
  private flows: Map<string, FlowRecord> = new Map();
  private snapshots: Map<string, StateSnapshot[]> = new Map();

  async saveRuleSet(record: RuleSetRecord): Promise<void> {
    this.ruleSets.set(record.name, copy(record));
  }

  async loadRuleSet(name: string): Promise<RuleSetRecord | null> {
    const record = this.ruleSets.get(name);
    return record ? copy(record) : null;
  }

  async saveFlow(record: FlowRecord): Promise<void> {
    this.flows.set(record.id, copy(record));
  }

  async loadFlow(flowId: string): Promise<FlowRecord | null> {
    const record = this.flows.get(flowId);
    return record ? copy(record) : null;
  }

  async deleteFlow(flowId: string): Promise<void> {
    this.flows.delete(flowId);
  }

  async saveSnapshot(snapshot: StateSnapshot): Promise<void> {
    const stateSnapshots = this.snapshots.get(snapshot.stateId) || [];

    stateSnapshots.push({
      ...snapshot,
      timestamp: new Date(snapshot.timestamp),
      record: copy<StateRecord>(snapshot.record),
    });

    this.snapshots.set(snapshot.stateId, stateSnapshots);
  }

  async loadSnapshot(
    stateId: string,
    version?: number
  ): Promise<StateSnapshot | null> {
    const stateSnapshots = this.snapshots.get(stateId);

    if (!stateSnapshots || stateSnapshots.length === 0) {
      return null;
    }

    if (version !== undefined) {
      const snapshot = stateSnapshots.find((s) => s.version === version);
      return snapshot ? copy(snapshot) : null;
    }

    const latest = stateSnapshots.reduce((a, b) =>
      b.version > a.version ? b : a
    );
    return copy(latest);
  }

  async loadHistory(stateId: string, limit?: number): Promise<StateSnapshot[]> {
    const stateSnapshots = this.snapshots.get(stateId) || [];

    // Newest first
    const sorted = [...stateSnapshots].sort((a, b) => b.version - a.version);

    if (limit !== undefined && limit > 0) {
      return sorted.slice(0, limit).map(copy);
    }

    return sorted.map(copy);
  }

  async deleteState(stateId: string): Promise<void> {
    this.snapshots.delete(stateId);
  }

  async pruneHistory(stateId: string, keepLast: number): Promise<void> {
    const stateSnapshots = this.snapshots.get(stateId);

    if (!stateSnapshots || stateSnapshots.length <= keepLast) {
      return;
    }

    const sorted = [...stateSnapshots].sort((a, b) => b.version - a.version);
    this.snapshots.set(stateId, sorted.slice(0, keepLast).reverse());
  }

  async getSnapshotCount(stateId: string): Promise<number> {
    const stateSnapshots = this.snapshots.get(stateId);
    return stateSnapshots ? stateSnapshots.length : 0;
  }

  async stateExists(stateId: string): Promise<boolean> {
    const stateSnapshots = this.snapshots.get(stateId);
    return stateSnapshots !== undefined && stateSnapshots.length > 0;
  }

  /**
   * Clear all data from memory (useful for testing)
   */
  clearAll(): void {
    this.ruleSets.clear();
    this.flows.clear();
    this.snapshots.clear();
  }

  /**
   * Get all state ids that have snapshots (useful for debugging)
   */
  getAllStateIds(): string[] {
    return Array.from(this.snapshots.keys());
  }
}
