/**
 * StateManager Tests
 * Saves and restores rule sets, flows and state versions through an adapter
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { silentLogger } from '../src/logger';
import { MemoryStorageAdapter } from '../src/persistence/memory-adapter';
import { RuleRegistry } from '../src/rule-graph';
import { startState } from '../src/state';
import { StateManager } from '../src/state-manager';
import { buildForkFlow, createSampleRules, defineSampleRules, ids } from './sample-rules';

const options = { logger: silentLogger };

describe('StateManager', () => {
  let adapter: MemoryStorageAdapter;
  let manager: StateManager;

  beforeEach(() => {
    adapter = new MemoryStorageAdapter();
    manager = new StateManager({ adapter, logger: silentLogger });
  });

  it('should default to an in-memory adapter', () => {
    expect(new StateManager().getAdapter()).toBeInstanceOf(MemoryStorageAdapter);
  });

  describe('Versioning', () => {
    it('should number snapshots from 1', async () => {
      const { ruleSet } = createSampleRules();
      const { flow, a, c } = buildForkFlow(ruleSet);
      const state = startState(flow, undefined, { ...options, id: 'state-1' });

      expect(await manager.save(state)).toBe(1);
      state.advance(a, c);
      expect(await manager.save(state)).toBe(2);

      expect(await manager.getSnapshotCount('state-1')).toBe(2);
      expect(await manager.exists('state-1')).toBe(true);
      expect((await manager.getHistory('state-1')).map((s) => s.version)).toEqual([
        2, 1,
      ]);
    });

    it('should load the latest or a given version', async () => {
      const { ruleSet } = createSampleRules();
      const { flow, a, c, d } = buildForkFlow(ruleSet);
      const state = startState(flow, undefined, { ...options, id: 'state-1' });
      await manager.save(state);
      state.advance(a, c).advance(c, d);
      await manager.save(state);

      const latest = await manager.load('state-1', flow);
      const first = await manager.load('state-1', flow, 1);

      expect(latest?.positions).toEqual([c, d]);
      expect(first?.positions).toEqual([a]);
      expect(await manager.load('unknown', flow)).toBeNull();
    });

    it('should continue numbering after initializing from storage', async () => {
      const { ruleSet } = createSampleRules();
      const { flow } = buildForkFlow(ruleSet);
      const state = startState(flow, undefined, { ...options, id: 'state-1' });
      await manager.save(state);
      await manager.save(state);

      const other = new StateManager({ adapter, logger: silentLogger });
      await other.initializeVersionCounter('state-1');

      expect(await other.save(state)).toBe(3);
    });

    it('should continue numbering from storage without an explicit initialize', async () => {
      const { ruleSet } = createSampleRules();
      const { flow } = buildForkFlow(ruleSet);
      const state = startState(flow, undefined, { ...options, id: 'state-1' });
      await manager.save(state);
      await manager.save(state);

      const other = new StateManager({ adapter, logger: silentLogger });

      expect(await other.save(state)).toBe(3);
      expect((await adapter.loadHistory('state-1')).map((s) => s.version)).toEqual([
        3, 2, 1,
      ]);
    });

    it('should prune and delete snapshots', async () => {
      const { ruleSet } = createSampleRules();
      const { flow } = buildForkFlow(ruleSet);
      const state = startState(flow, undefined, { ...options, id: 'state-1' });
      for (let i = 0; i < 4; i++) {
        await manager.save(state);
      }

      await manager.pruneHistory('state-1', 1);
      expect(await manager.getSnapshotCount('state-1')).toBe(1);
      expect((await manager.loadSnapshot('state-1'))?.version).toBe(4);

      await manager.delete('state-1');
      expect(await manager.exists('state-1')).toBe(false);
      expect(await manager.save(state)).toBe(1);
    });
  });

  describe('Rule Sets and Flows', () => {
    it('should restore a flow into a registry that already has its rule set', async () => {
      const { registry, ruleSet } = createSampleRules();
      const { flow } = buildForkFlow(ruleSet);
      await manager.saveFlow(flow);

      const loaded = await manager.loadFlow('flow-1', registry);

      expect(loaded).not.toBe(flow);
      expect(loaded?.ruleSet).toBe(ruleSet);
      expect(loaded ? ids(loaded.nodes) : []).toEqual(['n1', 'n2', 'n3', 'n4', 'n5']);
    });

    it('should load the rule set from storage when the registry lacks it', async () => {
      const { ruleSet } = createSampleRules();
      const { flow } = buildForkFlow(ruleSet);
      await manager.saveRuleSet(ruleSet);
      await manager.saveFlow(flow);

      const fresh = new RuleRegistry();
      defineSampleRules(fresh);
      const loaded = await manager.loadFlow('flow-1', fresh);

      expect(loaded?.ruleSet).toBe(fresh.getRuleSet('My Rules'));
      expect(loaded?.edges).toHaveLength(4);
    });

    it('should fail on a flow whose rule set is unknown', async () => {
      const { ruleSet } = createSampleRules();
      await manager.saveFlow(buildForkFlow(ruleSet).flow);

      await expect(manager.loadFlow('flow-1', new RuleRegistry())).rejects.toThrow(
        'Flow "flow-1" references unknown rule set "My Rules"'
      );
    });

    it('should return null for missing records', async () => {
      const registry = new RuleRegistry();

      expect(await manager.loadFlow('missing', registry)).toBeNull();
      expect(await manager.loadRuleSet('missing', registry)).toBeNull();
    });

    it('should resume a saved state after a restart', async () => {
      const { ruleSet, log } = createSampleRules();
      const { flow, a, c, d } = buildForkFlow(ruleSet);
      const state = startState(flow, undefined, { ...options, id: 'state-1' });
      state.advance(a, c).advance(c, d);
      await manager.saveRuleSet(ruleSet);
      await manager.saveFlow(flow);
      await manager.save(state);

      const restarted = new StateManager({ adapter, logger: silentLogger });
      const registry = new RuleRegistry();
      defineSampleRules(registry);
      const loadedFlow = await restarted.loadFlow('flow-1', registry);
      const resumed = loadedFlow
        ? await restarted.load('state-1', loadedFlow)
        : null;

      expect(loadedFlow?.frozen).toBe(true);
      expect(resumed?.positions.map((node) => node.id)).toEqual(['n3', 'n4']);
      expect(
        resumed?.forks().map(([node, children]) => [node.id, ids(children)])
      ).toEqual([['n3', ['n4']]]);
      expect(log.entered).toEqual(['A', 'C', 'D']);
    });

    it('should delete a flow record', async () => {
      const { registry, ruleSet } = createSampleRules();
      await manager.saveFlow(buildForkFlow(ruleSet).flow);
      await manager.deleteFlow('flow-1');

      expect(await manager.loadFlow('flow-1', registry)).toBeNull();
    });
  });
});
