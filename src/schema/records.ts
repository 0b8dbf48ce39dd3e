/**
 * Plain-record forms of rule sets, flows and states.
 *
 * Records are JSON-safe and are what storage adapters persist. Restoring a
 * record validates its shape with Zod and then rebuilds the engine objects
 * through the same checks the builders apply, so a record that breaks the
 * rules is rejected on load rather than discovered mid-traversal.
 */

import { z } from 'zod';

import {
  InvalidPositionError,
  RecordError,
  RuleNotInSetError,
} from '../errors';
import { Flow, FlowNode } from '../flow';
import type { RuleRegistry } from '../rule-graph';
import type { RuleSet } from '../rule-set';
import { FlowState } from '../state';
import type { StateOptions } from '../types/state.types';

export const ruleSetRecordSchema = z.object({
  name: z.string().min(1),
  /** Label of the root rule */
  root: z.string().min(1),
});

export const flowRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  /** Name of the governing rule set */
  ruleSet: z.string().min(1),
  frozen: z.boolean(),
  nodes: z.array(
    z.object({
      id: z.string().min(1),
      rule: z.string().min(1),
      isStart: z.boolean(),
    })
  ),
  edges: z.array(z.object({ from: z.string(), to: z.string() })),
});

export const historyEntrySchema = z.object({
  node: z.string(),
  rule: z.string(),
  event: z.enum(['enter', 'exit']),
  at: z.coerce.date(),
  cause: z.enum(['start', 'advance', 'prune']),
});

export const stateRecordSchema = z.object({
  id: z.string().min(1),
  flowId: z.string().min(1),
  allowRepeats: z.boolean().default(true),
  positions: z.array(z.string()),
  /** Fork position id -> ids of the children it already activated */
  forks: z.record(z.array(z.string())).default({}),
  history: z.array(historyEntrySchema),
});

export type RuleSetRecord = z.infer<typeof ruleSetRecordSchema>;
export type FlowRecord = z.infer<typeof flowRecordSchema>;
export type StateRecord = z.infer<typeof stateRecordSchema>;
export type HistoryEntryRecord = z.infer<typeof historyEntrySchema>;

function parse<S extends z.ZodTypeAny>(
  schema: S,
  recordType: string,
  input: unknown
): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new RecordError(
      recordType,
      result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; '),
      { cause: result.error }
    );
  }
  return result.data;
}

export function serializeRuleSet(ruleSet: RuleSet): RuleSetRecord {
  return { name: ruleSet.name, root: ruleSet.root.label };
}

/**
 * Returns the registry's rule set with the record's name, creating it when
 * missing.
 * @throws RuleNotInSetError when the root label is not a defined rule, or
 * when an existing rule set of that name has a different root
 */
export function restoreRuleSet(
  input: unknown,
  registry: RuleRegistry
): RuleSet {
  const record = parse(ruleSetRecordSchema, 'rule set', input);

  const existing = registry.getRuleSet(record.name);
  if (existing) {
    if (existing.root.label !== record.root) {
      throw new RuleNotInSetError(record.root, record.name);
    }
    return existing;
  }

  const root = registry.findRule(record.root);
  if (!root) {
    throw new RuleNotInSetError(record.root, record.name);
  }
  return registry.createRuleSet(record.name, root);
}

export function serializeFlow(flow: Flow): FlowRecord {
  return {
    id: flow.id,
    name: flow.name,
    ruleSet: flow.ruleSet.name,
    frozen: flow.frozen,
    nodes: flow.nodes.map((node) => ({
      id: node.id,
      rule: node.label,
      isStart: node.isStart,
    })),
    edges: flow.edges.map(([from, to]) => ({ from: from.id, to: to.id })),
  };
}

/**
 * Rebuilds a flow against `ruleSet`
 *
 * @throws RuleNotInSetError for a node naming a rule outside the rule set
 * @throws IllegalTransitionError for an edge the rules do not allow
 */
export function restoreFlow(input: unknown, ruleSet: RuleSet): Flow {
  const record = parse(flowRecordSchema, 'flow', input);
  if (record.ruleSet !== ruleSet.name) {
    throw new RecordError(
      'flow',
      `flow "${record.id}" belongs to rule set "${record.ruleSet}", not "${ruleSet.name}"`
    );
  }

  const flow = new Flow(ruleSet, { id: record.id, name: record.name });
  for (const node of record.nodes) {
    flow.addNode(node.rule, { id: node.id, isStart: node.isStart });
  }
  for (const edge of record.edges) {
    const from = flow.getNode(edge.from);
    const to = flow.getNode(edge.to);
    if (!from || !to) {
      throw new RecordError(
        'flow',
        `edge ${edge.from} -> ${edge.to} references an unknown node`
      );
    }
    flow.addEdge(from, to);
  }

  if (record.frozen) flow.freeze();
  return flow;
}

export function serializeState(state: FlowState): StateRecord {
  return {
    id: state.id,
    flowId: state.flow.id,
    allowRepeats: state.repeatsAllowed,
    positions: state.positions.map((node) => node.id),
    forks: Object.fromEntries(
      state
        .forks()
        .map(([node, children]) => [node.id, children.map((child) => child.id)])
    ),
    history: state.history.map((entry) => ({ ...entry })),
  };
}

/**
 * Rebuilds a state on `flow` without running hooks
 *
 * @throws InvalidPositionError when the record names a node the flow lacks
 */
export function restoreState(
  input: unknown,
  flow: Flow,
  options: Omit<StateOptions, 'id' | 'allowRepeats'> = {}
): FlowState {
  const record = parse(stateRecordSchema, 'state', input);
  if (record.flowId !== flow.id) {
    throw new RecordError(
      'state',
      `state "${record.id}" runs flow "${record.flowId}", not "${flow.id}"`
    );
  }

  const node = (id: string): FlowNode => {
    const found = flow.getNode(id);
    if (!found) {
      throw new InvalidPositionError(id, `is not part of flow "${flow.id}"`);
    }
    return found;
  };

  return FlowState.restore(
    flow,
    {
      positions: record.positions.map(node),
      forks: Object.entries(record.forks).map(
        ([id, children]) => [node(id), children.map(node)] as const
      ),
      history: record.history,
    },
    { ...options, id: record.id, allowRepeats: record.allowRepeats }
  );
}
