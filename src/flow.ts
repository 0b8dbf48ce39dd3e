import { randomUUID } from 'node:crypto';

import {
  DuplicateNodeIdError,
  FlowFrozenError,
  FlowViolation,
  IllegalTransitionError,
  NodeNotRemovableError,
  RuleNotInSetError,
} from './errors';
import { reachableFrom, related } from './graph-utils';
import { isAllowedEdge, RuleNode } from './rule-graph';
import type { RuleSet } from './rule-set';
import type {
  AddNodeOptions,
  CreateFlowOptions,
  FlowValidation,
} from './types/flow.types';

/**
 * One position in a flow: an instance of a rule plus the positions that may
 * follow it. The same rule may back any number of flow nodes.
 */
export class FlowNode {
  /** @internal use {@link Flow.addNode} */
  constructor(
    readonly flow: Flow,
    readonly id: string,
    readonly ruleNode: RuleNode,
    readonly isStart: boolean
  ) {}

  get label(): string {
    return this.ruleNode.label;
  }

  /** Successor positions in the order their edges were added */
  get children(): readonly FlowNode[] {
    return this.flow.childrenOf(this);
  }

  get parents(): readonly FlowNode[] {
    return this.flow.parentsOf(this);
  }

  toString(): string {
    return `FlowNode(${this.id} ${this.label})`;
  }
}

/**
 * A user-composed workflow: a directed, possibly cyclic graph of flow nodes
 * whose every edge is allowed by the governing rule set.
 *
 * A flow is editable until the first state is started on it, and frozen for
 * good afterwards.
 *
 * @example
 * ```typescript
 * const flow = createFlow(ruleSet, { name: 'Review' });
 * const a = flow.addNode('A');
 * const c = flow.addChildRule(a, 'C');
 * flow.addChildRule(c, 'D');
 * flow.addChildRule(c, 'E');
 *
 * const state = startState(flow);
 * ```
 */
export class Flow {
  readonly id: string;
  readonly name: string;
  private readonly nodeMap = new Map<string, FlowNode>();
  private readonly childMap = new Map<FlowNode, FlowNode[]>();
  private isFrozen = false;
  private editLocks = 0;
  private nextId = 1;

  constructor(
    readonly ruleSet: RuleSet,
    options: CreateFlowOptions = {}
  ) {
    this.id = options.id ?? randomUUID();
    this.name = options.name ?? this.id;
  }

  /** Whether a state has been started on this flow */
  get frozen(): boolean {
    return this.isFrozen;
  }

  get inUse(): boolean {
    return this.isFrozen;
  }

  get nodes(): FlowNode[] {
    return [...this.nodeMap.values()];
  }

  /** Nodes a state may start from */
  get roots(): FlowNode[] {
    return this.nodes.filter((node) => node.isStart);
  }

  /** Every edge as a `[parent, child]` pair */
  get edges(): Array<[FlowNode, FlowNode]> {
    return this.nodes.flatMap((node) =>
      this.childrenOf(node).map((child): [FlowNode, FlowNode] => [node, child])
    );
  }

  getNode(id: string): FlowNode | undefined {
    return this.nodeMap.get(id);
  }

  has(node: FlowNode): boolean {
    return this.nodeMap.get(node.id) === node;
  }

  childrenOf(node: FlowNode): FlowNode[] {
    return [...(this.childMap.get(node) ?? [])];
  }

  parentsOf(node: FlowNode): FlowNode[] {
    return this.nodes.filter((candidate) =>
      (this.childMap.get(candidate) ?? []).includes(node)
    );
  }

  /**
   * Adds a position instantiating `rule`.
   * Unless told otherwise, the first node added becomes a start node.
   *
   * @throws FlowFrozenError once the flow is in use
   * @throws RuleNotInSetError when the rule is not reachable in the rule set
   */
  addNode(rule: RuleNode | string, options: AddNodeOptions = {}): FlowNode {
    this.assertMutable();
    const ruleNode = this.resolveRule(rule);

    const id = options.id ?? this.generateId();
    if (this.nodeMap.has(id)) {
      throw new DuplicateNodeIdError(id, this.id);
    }

    const node = new FlowNode(
      this,
      id,
      ruleNode,
      options.isStart ?? this.nodeMap.size === 0
    );
    this.nodeMap.set(id, node);
    this.childMap.set(node, []);
    return node;
  }

  /**
   * Connects two positions. Adding an existing edge does nothing.
   *
   * @throws FlowFrozenError once the flow is in use
   * @throws IllegalTransitionError when the rules do not allow the edge
   */
  addEdge(parent: FlowNode, child: FlowNode): this {
    this.assertMutable();
    if (!this.has(parent) || !this.has(child)) {
      throw new IllegalTransitionError(
        parent.label,
        child.label,
        `both nodes must belong to flow "${this.id}"`
      );
    }
    if (!isAllowedEdge(parent.ruleNode, child.ruleNode)) {
      throw new IllegalTransitionError(
        parent.label,
        child.label,
        `"${child.label}" is not a declared child of "${parent.label}"`
      );
    }

    const children = this.childMap.get(parent) ?? [];
    if (!children.includes(child)) {
      children.push(child);
      this.childMap.set(parent, children);
    }
    return this;
  }

  /**
   * Creates a new position for `rule` and connects it under `parent`.
   * The edge is checked before anything is added.
   */
  addChildRule(parent: FlowNode, rule: RuleNode | string): FlowNode {
    this.assertMutable();
    const ruleNode = this.resolveRule(rule);
    if (!this.has(parent)) {
      throw new IllegalTransitionError(
        parent.label,
        ruleNode.label,
        `both nodes must belong to flow "${this.id}"`
      );
    }
    if (!isAllowedEdge(parent.ruleNode, ruleNode)) {
      throw new IllegalTransitionError(
        parent.label,
        ruleNode.label,
        `"${ruleNode.label}" is not a declared child of "${parent.label}"`
      );
    }

    const child = this.addNode(ruleNode, { isStart: false });
    this.addEdge(parent, child);
    return child;
  }

  /** Rules that may be added beneath `node` */
  allowedChildRules(node: FlowNode): readonly RuleNode[] {
    return node.ruleNode.children;
  }

  /**
   * Checks the flow against its rule set: at least one start node, every
   * edge allowed, every node reachable from a start node.
   */
  validate(): FlowValidation {
    const violations: FlowViolation[] = [];
    const roots = this.roots;

    if (roots.length === 0) {
      violations.push({ kind: 'no-root' });
    }

    for (const [parent, child] of this.edges) {
      if (!isAllowedEdge(parent.ruleNode, child.ruleNode)) {
        violations.push({ kind: 'illegal-edge', from: parent.id, to: child.id });
      }
    }

    const reachable = reachableFrom(roots, (node) => this.childrenOf(node));
    for (const node of this.nodeMap.values()) {
      if (!reachable.has(node)) {
        violations.push({ kind: 'unreachable-node', node: node.id });
      }
    }

    return violations.length === 0 ? { ok: true } : { ok: false, violations };
  }

  /**
   * Marks the flow as in use. One-way; called when a state starts.
   */
  freeze(): this {
    this.isFrozen = true;
    return this;
  }

  /**
   * Runs `fn` with every edit refused as if the flow were frozen.
   * @internal used while start hooks run, before the flow is frozen
   */
  withEditsLocked<T>(fn: () => T): T {
    this.editLocks++;
    try {
      return fn();
    } finally {
      this.editLocks--;
    }
  }

  /** Every node with a path to `node` */
  ancestors(node: FlowNode): FlowNode[] {
    return [...related(node, (n) => this.parentsOf(n))];
  }

  /** Every node reachable from `node` */
  descendants(node: FlowNode): FlowNode[] {
    return [...related(node, (n) => this.childrenOf(n))];
  }

  /**
   * Ancestors up to the start nodes: a start node reached through a cycle is
   * included, but nothing above it. Empty for a start node.
   */
  ancestorsToRoot(node: FlowNode): FlowNode[] {
    if (node.isStart) return [];
    return [
      ...related(node, (n) => this.parentsOf(n), { stopAt: (n) => n.isStart }),
    ];
  }

  /**
   * Descendants up to the start nodes: a start node reached through a cycle
   * is included, but nothing past it.
   */
  descendantsToRoot(node: FlowNode): FlowNode[] {
    return [
      ...related(node, (n) => this.childrenOf(n), { stopAt: (n) => n.isStart }),
    ];
  }

  /**
   * Whether removing `node` leaves every other node reachable: start nodes
   * never qualify; other nodes must have no children, or only children that
   * are also their ancestors.
   */
  canRemove(node: FlowNode): boolean {
    if (!this.has(node) || node.isStart) return false;

    const children = this.childrenOf(node);
    if (children.length === 0) return true;

    const ancestors = new Set(this.ancestorsToRoot(node));
    return children.every((child) => ancestors.has(child));
  }

  /**
   * Removes a single node and every edge touching it
   * @throws NodeNotRemovableError unless {@link canRemove} holds
   */
  removeNode(node: FlowNode): FlowNode {
    this.assertMutable();
    if (!this.canRemove(node)) {
      throw new NodeNotRemovableError(
        node.id,
        node.isStart
          ? 'it is a start node'
          : 'other nodes are only reachable through it'
      );
    }
    this.detach(new Set([node]));
    return node;
  }

  /**
   * The nodes {@link removeBranch} would remove: `node` and its descendants,
   * stopping at and excluding start nodes
   */
  branchOf(node: FlowNode): FlowNode[] {
    return [node, ...this.descendantsToRoot(node)].filter(
      (candidate) => !candidate.isStart
    );
  }

  /**
   * Removes `node` together with everything beneath it
   * @returns the removed nodes
   */
  removeBranch(node: FlowNode): FlowNode[] {
    this.assertMutable();
    if (!this.has(node)) {
      throw new NodeNotRemovableError(node.id, 'it does not belong to this flow');
    }
    if (node.isStart) {
      throw new NodeNotRemovableError(node.id, 'it is a start node');
    }

    const branch = this.branchOf(node);
    this.detach(new Set(branch));
    return branch;
  }

  toString(): string {
    return `Flow(${this.id} ${this.name})`;
  }

  private detach(doomed: ReadonlySet<FlowNode>): void {
    for (const node of doomed) {
      this.nodeMap.delete(node.id);
      this.childMap.delete(node);
    }
    for (const [parent, children] of this.childMap) {
      this.childMap.set(
        parent,
        children.filter((child) => !doomed.has(child))
      );
    }
  }

  private resolveRule(rule: RuleNode | string): RuleNode {
    if (typeof rule === 'string') {
      return this.ruleSet.findRule(rule);
    }
    if (!this.ruleSet.contains(rule)) {
      throw new RuleNotInSetError(rule.label, this.ruleSet.name);
    }
    return rule;
  }

  private generateId(): string {
    let id = `n${this.nextId++}`;
    while (this.nodeMap.has(id)) {
      id = `n${this.nextId++}`;
    }
    return id;
  }

  private assertMutable(): void {
    if (this.isFrozen || this.editLocks > 0) {
      throw new FlowFrozenError(this.id);
    }
  }
}

/**
 * Creates an empty, editable flow bound to `ruleSet`
 */
export function createFlow(
  ruleSet: RuleSet,
  options: CreateFlowOptions = {}
): Flow {
  return new Flow(ruleSet, options);
}
