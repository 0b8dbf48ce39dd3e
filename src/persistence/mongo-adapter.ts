/**
 * MongoDB storage adapter for persistent rule sets, flows and state snapshots
 */

import type { Collection, MongoClient } from 'mongodb';

import { DEFAULT_COLLECTIONS } from '../constants';
import type { FlowRecord, RuleSetRecord } from '../schema/records';
import { StorageAdapter, StateSnapshot } from './storage-adapter';

/**
 * MongoDB configuration options
 */
export interface MongoStorageOptions {
  /** MongoDB connection URI */
  uri: string;
  /** Database name */
  database: string;
  /** Collection names, see {@link DEFAULT_COLLECTIONS} for the defaults */
  collections?: {
    ruleSets?: string;
    flows?: string;
    snapshots?: string;
  };
}

type RuleSetDocument = RuleSetRecord & { _id: string };
type FlowDocument = FlowRecord & { _id: string };
type SnapshotDocument = StateSnapshot & { _id: string };

type Collections = {
  ruleSets: Collection<RuleSetDocument>;
  flows: Collection<FlowDocument>;
  snapshots: Collection<SnapshotDocument>;
};

/**
 * MongoDB-based storage adapter
 * One collection per record kind; snapshots are indexed by state and version
 */
export class MongoStorageAdapter extends StorageAdapter {
  private client: MongoClient | null = null;
  private collections: Collections | null = null;
  private options: MongoStorageOptions;

  constructor(options: MongoStorageOptions) {
    super();
    this.options = options;
  }

  get isConnected(): boolean {
    return this.collections !== null;
  }

  /**
   * Connect to MongoDB
   * Must be called before using the adapter
   */
  async connect(): Promise<void> {
    if (this.collections) {
      return;
    }

    try {
      const { MongoClient } = await import('mongodb');

      const client = new MongoClient(this.options.uri);
      await client.connect();
      const db = client.db(this.options.database);
      const names = { ...DEFAULT_COLLECTIONS, ...this.options.collections };

      const collections: Collections = {
        ruleSets: db.collection<RuleSetDocument>(names.ruleSets),
        flows: db.collection<FlowDocument>(names.flows),
        snapshots: db.collection<SnapshotDocument>(names.snapshots),
      };

      await collections.snapshots.createIndex({ stateId: 1, version: -1 });
      await collections.snapshots.createIndex({ flowId: 1 });

      this.client = client;
      this.collections = collections;
    } catch (error) {
      throw new Error(
        `Failed to connect to MongoDB: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * Disconnect from MongoDB
   */
  async disconnect(): Promise<void> {
    if (this.client) {
      await this.client.close();
      this.client = null;
      this.collections = null;
    }
  }

  private ensureConnected(): Collections {
    if (!this.collections) {
      throw new Error(
        'MongoStorageAdapter is not connected. Call connect() first.'
      );
    }
    return this.collections;
  }

  async saveRuleSet(record: RuleSetRecord): Promise<void> {
    const { ruleSets } = this.ensureConnected();
    await ruleSets.replaceOne({ _id: record.name }, record, { upsert: true });
  }

  async loadRuleSet(name: string): Promise<RuleSetRecord | null> {
    const { ruleSets } = this.ensureConnected();
    const doc = await ruleSets.findOne({ _id: name });
    if (!doc) return null;

    const { _id, ...record } = doc;
    return record;
  }

  async saveFlow(record: FlowRecord): Promise<void> {
    const { flows } = this.ensureConnected();
    await flows.replaceOne({ _id: record.id }, record, { upsert: true });
  }

  async loadFlow(flowId: string): Promise<FlowRecord | null> {
    const { flows } = this.ensureConnected();
    const doc = await flows.findOne({ _id: flowId });
    if (!doc) return null;

    const { _id, ...record } = doc;
    return record;
  }

  async deleteFlow(flowId: string): Promise<void> {
    const { flows } = this.ensureConnected();
    await flows.deleteOne({ _id: flowId });
  }

  async saveSnapshot(snapshot: StateSnapshot): Promise<void> {
    const { snapshots } = this.ensureConnected();
    await snapshots.insertOne({
      ...snapshot,
      timestamp: new Date(snapshot.timestamp),
      _id: `${snapshot.stateId}_v${snapshot.version}`,
    });
  }

  async loadSnapshot(
    stateId: string,
    version?: number
  ): Promise<StateSnapshot | null> {
    const { snapshots } = this.ensureConnected();

    const doc = await snapshots.findOne(
      version === undefined ? { stateId } : { stateId, version },
      { sort: { version: -1 } }
    );
    if (!doc) return null;

    const { _id, ...snapshot } = doc;
    return snapshot;
  }

  async loadHistory(stateId: string, limit?: number): Promise<StateSnapshot[]> {
    const { snapshots } = this.ensureConnected();

    const docs = await snapshots
      .find({ stateId }, { sort: { version: -1 }, limit: limit || 0 })
      .toArray();

    return docs.map(({ _id, ...snapshot }) => snapshot);
  }

  async deleteState(stateId: string): Promise<void> {
    const { snapshots } = this.ensureConnected();
    await snapshots.deleteMany({ stateId });
  }

  async pruneHistory(stateId: string, keepLast: number): Promise<void> {
    const { snapshots } = this.ensureConnected();

    const versions = await snapshots
      .find(
        { stateId },
        { projection: { version: 1 }, sort: { version: -1 } }
      )
      .toArray();

    if (versions.length <= keepLast) {
      return;
    }

    const versionsToDelete = versions
      .slice(keepLast)
      .map((doc) => doc.version);

    await snapshots.deleteMany({
      stateId,
      version: { $in: versionsToDelete },
    });
  }

  async getSnapshotCount(stateId: string): Promise<number> {
    const { snapshots } = this.ensureConnected();
    return await snapshots.countDocuments({ stateId });
  }

  async stateExists(stateId: string): Promise<boolean> {
    const { snapshots } = this.ensureConnected();
    const count = await snapshots.countDocuments({ stateId }, { limit: 1 });
    return count > 0;
  }
}
