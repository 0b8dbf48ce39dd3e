import { beforeEach, describe, expect, it } from '@jest/globals';

import {
  DuplicateNodeIdError,
  FlowFrozenError,
  IllegalTransitionError,
  NodeNotRemovableError,
  RuleNotInSetError,
} from '../src/errors';
import { createFlow, Flow, FlowNode } from '../src/flow';
import { RuleRegistry } from '../src/rule-graph';
import type { RuleSet } from '../src/rule-set';
import { buildForkFlow, createSampleRules, ids, sortedLabels } from './sample-rules';

describe('Flow', () => {
  let registry: RuleRegistry;
  let ruleSet: RuleSet;

  beforeEach(() => {
    ({ registry, ruleSet } = createSampleRules());
  });

  describe('building', () => {
    it('should start empty and editable', () => {
      const flow = createFlow(ruleSet, { id: 'empty' });

      expect(flow.id).toBe('empty');
      expect(flow.name).toBe('empty');
      expect(flow.nodes).toEqual([]);
      expect(flow.roots).toEqual([]);
      expect(flow.frozen).toBe(false);
      expect(flow.inUse).toBe(false);
    });

    it('should generate an id when none is given', () => {
      const flow = createFlow(ruleSet);

      expect(flow.id).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('should make the first node a start node by default', () => {
      const flow = createFlow(ruleSet);
      const a = flow.addNode('A');
      const b = flow.addNode(registry.getRule('B'));
      const c = flow.addNode('C', { isStart: true, id: 'custom' });

      expect(a.isStart).toBe(true);
      expect(b.isStart).toBe(false);
      expect(c.isStart).toBe(true);
      expect(ids(flow.nodes)).toEqual(['n1', 'n2', 'custom']);
      expect(ids(flow.roots)).toEqual(['n1', 'custom']);
      expect(flow.getNode('n2')).toBe(b);
    });

    it('should reject rules outside the rule set', () => {
      const flow = createFlow(ruleSet);
      const lonely = registry.defineRule('Lonely');
      const foreign = new RuleRegistry().defineRule('A');

      expect(() => flow.addNode('Z')).toThrow(RuleNotInSetError);
      expect(() => flow.addNode(lonely)).toThrow(RuleNotInSetError);
      expect(() => flow.addNode(foreign)).toThrow(RuleNotInSetError);
      expect(flow.nodes).toEqual([]);
    });

    it('should reject a duplicate node id', () => {
      const flow = createFlow(ruleSet, { id: 'f' });
      flow.addNode('A', { id: 'start' });

      expect(() => flow.addNode('B', { id: 'start' })).toThrow(
        DuplicateNodeIdError
      );
      expect(() => flow.addNode('B', { id: 'start' })).toThrow(
        'Flow "f" already has a node with id "start"'
      );
    });

    it('should skip taken ids when generating', () => {
      const flow = createFlow(ruleSet);
      flow.addNode('A', { id: 'n1' });

      expect(flow.addNode('B').id).toBe('n2');
    });

    it('should connect nodes along declared rule edges', () => {
      const flow = createFlow(ruleSet);
      const a = flow.addNode('A');
      const b = flow.addNode('B');

      expect(flow.addEdge(a, b)).toBe(flow);
      flow.addEdge(a, b);

      expect(a.children).toEqual([b]);
      expect(b.parents).toEqual([a]);
      expect(flow.edges).toEqual([[a, b]]);
    });

    it('should reject an edge the rules do not declare', () => {
      const flow = createFlow(ruleSet);
      const a = flow.addNode('A');
      const d = flow.addNode('D');

      expect(() => flow.addEdge(a, d)).toThrow(IllegalTransitionError);
      expect(() => flow.addEdge(a, d)).toThrow(
        'Transition "A" -> "D" is not allowed: "D" is not a declared child of "A"'
      );
      expect(a.children).toEqual([]);
    });

    it('should reject an edge to a node of another flow', () => {
      const flow = createFlow(ruleSet);
      const other = createFlow(ruleSet);
      const a = flow.addNode('A');
      const b = other.addNode('B');

      expect(() => flow.addEdge(a, b)).toThrow(IllegalTransitionError);
    });

    it('should allow cycles the rules declare', () => {
      const flow = createFlow(ruleSet);
      const a = flow.addNode('A');
      const c = flow.addChildRule(a, 'C');
      const e = flow.addChildRule(c, 'E');
      flow.addEdge(e, a);

      expect(e.children).toEqual([a]);
      expect(flow.validate()).toEqual({ ok: true });
    });

    it('should check the edge before adding a child rule', () => {
      const flow = createFlow(ruleSet);
      const a = flow.addNode('A');

      expect(() => flow.addChildRule(a, 'D')).toThrow(IllegalTransitionError);
      expect(flow.nodes).toEqual([a]);
    });

    it('should not add a child under a node of another flow', () => {
      const flow = createFlow(ruleSet);
      flow.addNode('A');
      const foreign = createFlow(ruleSet).addNode('A');

      expect(() => flow.addChildRule(foreign, 'B')).toThrow(
        IllegalTransitionError
      );
      expect(flow.nodes).toHaveLength(1);
      expect(flow.validate()).toEqual({ ok: true });
    });

    it('should list the rules allowed beneath a node', () => {
      const { flow, a, c, b } = buildForkFlow(ruleSet);

      expect(flow.allowedChildRules(a).map((rule) => rule.label)).toEqual([
        'B',
        'C',
      ]);
      expect(flow.allowedChildRules(c).map((rule) => rule.label)).toEqual([
        'D',
        'E',
      ]);
      expect(flow.allowedChildRules(b)).toEqual([]);
    });
  });

  describe('validate', () => {
    it('should require a start node', () => {
      const flow = createFlow(ruleSet);

      expect(flow.validate()).toEqual({
        ok: false,
        violations: [{ kind: 'no-root' }],
      });
    });

    it('should report nodes no start node reaches', () => {
      const flow = createFlow(ruleSet);
      flow.addNode('A');
      flow.addNode('B');

      expect(flow.validate()).toEqual({
        ok: false,
        violations: [{ kind: 'unreachable-node', node: 'n2' }],
      });
    });

    it('should accept a flow built through the builder', () => {
      const { flow } = buildForkFlow(ruleSet);

      expect(flow.validate()).toEqual({ ok: true });
    });
  });

  describe('freezing', () => {
    it('should refuse every edit once frozen', () => {
      const { flow, a, b, c } = buildForkFlow(ruleSet);
      flow.freeze();

      expect(flow.frozen).toBe(true);
      expect(flow.inUse).toBe(true);
      expect(() => flow.addNode('A')).toThrow(FlowFrozenError);
      expect(() => flow.addEdge(a, b)).toThrow(FlowFrozenError);
      expect(() => flow.addChildRule(c, 'D')).toThrow(FlowFrozenError);
      expect(() => flow.removeNode(b)).toThrow(FlowFrozenError);
      expect(() => flow.removeBranch(c)).toThrow(
        'Flow "flow-1" is in use and can no longer change'
      );
      expect(flow.nodes).toHaveLength(5);
    });

    it('should stay frozen', () => {
      const { flow } = buildForkFlow(ruleSet);
      flow.freeze().freeze();

      expect(flow.frozen).toBe(true);
    });
  });
});

/**
 *        a
 *       / \
 *      b   c <--------+
 *         / \         |
 *        d   e -> f --+ (f -> a)
 *       / \
 *      g   h -> a
 *      |   ^
 *      i --+
 */
describe('Flow graph queries', () => {
  let flow: Flow;
  let nodes: Record<'a' | 'b' | 'c' | 'd' | 'e' | 'f' | 'g' | 'h' | 'i', FlowNode>;

  beforeEach(() => {
    const registry = new RuleRegistry();
    registry.defineRule('a', ['b', 'c']);
    registry.defineRule('b');
    registry.defineRule('c', ['d', 'e'], true);
    registry.defineRule('d', ['g', 'h'], true);
    registry.defineRule('e', ['f']);
    registry.defineRule('f', ['a']);
    registry.defineRule('g', ['i']);
    registry.defineRule('h', ['a']);
    registry.defineRule('i', ['h']);
    const ruleSet = registry.createRuleSet('Queries', registry.getRule('a'));

    flow = createFlow(ruleSet);
    const a = flow.addNode('a');
    const b = flow.addChildRule(a, 'b');
    const c = flow.addChildRule(a, 'c');
    const d = flow.addChildRule(c, 'd');
    const e = flow.addChildRule(c, 'e');
    const f = flow.addChildRule(e, 'f');
    const g = flow.addChildRule(d, 'g');
    const h = flow.addChildRule(d, 'h');
    const i = flow.addChildRule(g, 'i');
    flow.addEdge(i, h).addEdge(h, a).addEdge(f, a);
    nodes = { a, b, c, d, e, f, g, h, i };
  });

  it('should find ancestors through cycles', () => {
    const { a, b } = nodes;

    expect(sortedLabels(flow.ancestors(a))).toEqual([
      'c', 'd', 'e', 'f', 'g', 'h', 'i',
    ]);
    expect(sortedLabels(flow.ancestors(b))).toEqual([
      'a', 'c', 'd', 'e', 'f', 'g', 'h', 'i',
    ]);
  });

  it('should stop ancestor walks at start nodes', () => {
    const { a, b, f, h } = nodes;

    expect(flow.ancestorsToRoot(a)).toEqual([]);
    expect(flow.ancestorsToRoot(b)).toEqual([a]);
    expect(sortedLabels(flow.ancestorsToRoot(h))).toEqual(['a', 'c', 'd', 'g', 'i']);
    expect(sortedLabels(flow.ancestorsToRoot(f))).toEqual(['a', 'c', 'e']);
  });

  it('should find descendants through cycles', () => {
    const { a, b } = nodes;

    expect(sortedLabels(flow.descendants(a))).toEqual([
      'b', 'c', 'd', 'e', 'f', 'g', 'h', 'i',
    ]);
    expect(flow.descendants(b)).toEqual([]);
  });

  it('should stop descendant walks at start nodes', () => {
    const { c, d, e } = nodes;

    expect(sortedLabels(flow.descendantsToRoot(d))).toEqual(['a', 'g', 'h', 'i']);
    expect(sortedLabels(flow.descendantsToRoot(e))).toEqual(['a', 'f']);
    expect(sortedLabels(flow.descendantsToRoot(c))).toEqual([
      'a', 'd', 'e', 'f', 'g', 'h', 'i',
    ]);
  });

  it('should only allow removing nodes that strand nothing', () => {
    const removable = Object.values(nodes)
      .filter((node) => flow.canRemove(node))
      .map((node) => node.label);

    expect(removable).toEqual(['b', 'f', 'h']);
  });

  it('should remove a node and its edges', () => {
    const { a, b, d, h, i } = nodes;

    expect(flow.removeNode(b)).toBe(b);
    expect(flow.nodes).toHaveLength(8);
    expect(sortedLabels(a.children)).toEqual(['c']);

    flow.removeNode(h);
    expect(flow.nodes).toHaveLength(7);
    expect(i.children).toEqual([]);
    expect(sortedLabels(flow.descendantsToRoot(d))).toEqual(['g', 'i']);
    expect(flow.has(h)).toBe(false);
    expect(flow.validate()).toEqual({ ok: true });
  });

  it('should refuse to remove a node others depend on', () => {
    const { a, c } = nodes;

    expect(() => flow.removeNode(a)).toThrow(NodeNotRemovableError);
    expect(() => flow.removeNode(a)).toThrow(
      'Node "n1" cannot be removed: it is a start node'
    );
    expect(() => flow.removeNode(c)).toThrow(
      'Node "n3" cannot be removed: other nodes are only reachable through it'
    );
  });

  it('should remove whole branches up to the start nodes', () => {
    const { a, b, c, d } = nodes;

    expect(flow.branchOf(b)).toEqual([b]);
    expect(sortedLabels(flow.branchOf(d))).toEqual(['d', 'g', 'h', 'i']);

    expect(sortedLabels(flow.removeBranch(d))).toEqual(['d', 'g', 'h', 'i']);
    expect(sortedLabels(flow.nodes)).toEqual(['a', 'b', 'c', 'e', 'f']);
    expect(sortedLabels(flow.descendants(a))).toEqual(['b', 'c', 'e', 'f']);
    expect(sortedLabels(c.children)).toEqual(['e']);
    expect(flow.validate()).toEqual({ ok: true });
  });

  it('should refuse to remove the branch of a start node', () => {
    expect(() => flow.removeBranch(nodes.a)).toThrow(NodeNotRemovableError);
  });
});
