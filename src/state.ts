import { ENTER, EXIT } from './constants';
import {
  FlowInvalidError,
  HookFailureError,
  HookPhase,
  IllegalTransitionError,
  InvalidPositionError,
} from './errors';
import type { Flow, FlowNode } from './flow';
import type { Logger } from './logger';
import type { RuleNode } from './rule-graph';
import { ResolvedStateOptions, resolveStateOptions } from './schema/options';
import type {
  AdvanceOptions,
  HistoryCause,
  HistoryEntry,
  StateOptions,
  StateStatus,
} from './types/state.types';

/**
 * Everything needed to rebuild a state without replaying hooks
 */
export type FlowStateData = {
  positions: readonly FlowNode[];
  history: readonly HistoryEntry[];
  /** Children each fork position has already activated */
  forks: ReadonlyArray<readonly [FlowNode, readonly FlowNode[]]>;
};

/**
 * A live traversal of a frozen flow.
 *
 * A state holds one or more active positions. Advancing a position fires the
 * rule's `onExit` for the position left and `onEnter` for the position
 * entered. Positions on fork rules stay active until each of their children
 * has been activated, so a single state can progress along several branches.
 *
 * Every transition is all-or-nothing: if a hook throws, positions and history
 * are left exactly as they were.
 *
 * @example
 * ```typescript
 * const state = startState(flow);
 * state.advance(a, c);       // positions: [C]
 * state.advance(c, d);       // C forks, positions: [C, D]
 * state.advance(c, e);       // positions: [D, E]
 * state.isComplete;          // true
 * ```
 */
export class FlowState {
  readonly id: string;
  private readonly active: Set<FlowNode>;
  private readonly forkProgress = new Map<FlowNode, Set<FlowNode>>();
  private readonly visited = new Set<FlowNode>();
  private readonly pruned = new Set<FlowNode>();
  private readonly log: HistoryEntry[] = [];
  private readonly allowRepeats: boolean;
  private readonly clock: () => Date;
  private readonly logger: Logger;
  private transitioning = false;

  private constructor(
    readonly flow: Flow,
    options: ResolvedStateOptions
  ) {
    this.id = options.id;
    this.allowRepeats = options.allowRepeats;
    this.clock = options.clock;
    this.logger = options.logger;
    this.active = new Set();
  }

  /**
   * Validates and freezes `flow`, then enters the chosen start nodes.
   *
   * @param roots - Start nodes to activate, defaults to all of them
   * @throws FlowInvalidError when the flow does not validate
   * @throws InvalidPositionError when a chosen node is not a start node
   * @throws HookFailureError when an `onEnter` hook throws; the flow stays editable
   *
   * The flow refuses edits while the hooks run.
   */
  static start(
    flow: Flow,
    roots?: readonly FlowNode[],
    options: StateOptions = {}
  ): FlowState {
    const validation = flow.validate();
    if (!validation.ok) {
      throw new FlowInvalidError(flow.id, validation.violations);
    }

    const chosen = [...new Set(roots ?? flow.roots)];
    for (const root of chosen) {
      if (!flow.has(root) || !root.isStart) {
        throw new InvalidPositionError(
          root.id,
          `is not a start node of flow "${flow.id}"`
        );
      }
    }

    const state = new FlowState(flow, resolveStateOptions(options));
    state.transition(() => {
      flow.withEditsLocked(() => {
        for (const root of chosen) {
          state.runHook(ENTER, root);
        }
      });

      flow.freeze();
      const at = state.clock();
      for (const root of chosen) {
        state.active.add(root);
        state.record(root, ENTER, at, 'start');
      }
    });
    state.logger.debug('state started', {
      state: state.id,
      flow: flow.id,
      positions: chosen.map((node) => node.id),
    });
    return state;
  }

  /**
   * Rebuilds a state from saved data. No hooks run.
   * The flow is frozen as a side effect.
   */
  static restore(
    flow: Flow,
    data: FlowStateData,
    options: StateOptions = {}
  ): FlowState {
    const state = new FlowState(flow, resolveStateOptions(options));
    const check = (node: FlowNode): FlowNode => {
      if (!flow.has(node)) {
        throw new InvalidPositionError(
          node.id,
          `does not belong to flow "${flow.id}"`
        );
      }
      return node;
    };

    for (const node of data.positions) {
      state.active.add(check(node));
    }
    for (const [node, children] of data.forks) {
      state.forkProgress.set(check(node), new Set(children.map(check)));
    }
    for (const entry of data.history) {
      const node = flow.getNode(entry.node);
      if (node && entry.event === ENTER) state.visited.add(node);
      if (node && entry.cause === 'prune') state.pruned.add(node);
      state.log.push(copyEntry(entry));
    }

    flow.freeze();
    return state;
  }

  /** Active positions in activation order */
  get positions(): FlowNode[] {
    return [...this.active];
  }

  /** Audit trail, oldest first. Entries are copies. */
  get history(): readonly HistoryEntry[] {
    return this.log.map(copyEntry);
  }

  /**
   * True when no active position has anywhere left to go
   */
  get isComplete(): boolean {
    return [...this.active].every((node) => node.children.length === 0);
  }

  get status(): StateStatus {
    return this.isComplete ? 'complete' : 'active';
  }

  get repeatsAllowed(): boolean {
    return this.allowRepeats;
  }

  isActive(node: FlowNode): boolean {
    return this.active.has(node);
  }

  /** Children a fork position has activated so far */
  activatedChildren(position: FlowNode): FlowNode[] {
    return [...(this.forkProgress.get(position) ?? [])];
  }

  /** Fork positions with their activated children */
  forks(): Array<[FlowNode, FlowNode[]]> {
    return [...this.forkProgress].map(([node, children]) => [
      node,
      [...children],
    ]);
  }

  /**
   * Children of `position` that may be chosen next. With repeats disallowed,
   * nodes already visited or pruned in this state are left out.
   */
  allowedNextNodes(position: FlowNode): FlowNode[] {
    const children = this.flow.childrenOf(position);
    if (this.allowRepeats) return children;
    return children.filter(
      (child) => !this.visited.has(child) && !this.pruned.has(child)
    );
  }

  /**
   * Moves from an active position to one of its children.
   *
   * On a non-fork rule the child replaces the position. On a fork rule the
   * child is added, and the position is retired once all of its children were
   * activated from it (or `closeFork` is passed).
   *
   * @throws InvalidPositionError when `from` is not active, or when called
   * from a hook while another transition is running
   * @throws IllegalTransitionError when `to` is not a child of `from`
   * @throws HookFailureError when a hook throws; nothing changes
   */
  advance(from: FlowNode, to: FlowNode, options: AdvanceOptions = {}): this {
    this.assertIdle(from);
    this.assertActive(from);
    if (!this.flow.childrenOf(from).includes(to)) {
      throw new IllegalTransitionError(
        from.label,
        to.label,
        `node "${to.id}" is not a child of node "${from.id}"`
      );
    }
    if (!this.allowRepeats && (this.visited.has(to) || this.pruned.has(to))) {
      throw new IllegalTransitionError(
        from.label,
        to.label,
        `node "${to.id}" was already visited in this state`
      );
    }

    this.transition(() => {
      this.runHook(EXIT, from);
      this.runHook(ENTER, to);

      const at = this.clock();
      if (from.ruleNode.allowsFork) {
        const activated = new Set(this.forkProgress.get(from));
        activated.add(to);
        const closed =
          options.closeFork === true ||
          this.flow.childrenOf(from).every((child) => activated.has(child));

        this.active.add(to);
        if (closed) {
          this.forkProgress.delete(from);
          if (to !== from) this.active.delete(from);
        } else {
          this.forkProgress.set(from, activated);
        }
      } else {
        this.replace(from, to);
        this.forkProgress.delete(from);
      }

      this.record(from, EXIT, at, 'advance');
      this.record(to, ENTER, at, 'advance');
    });
    this.logger.debug('state advanced', {
      state: this.id,
      from: from.id,
      to: to.id,
      positions: this.positions.map((node) => node.id),
    });
    return this;
  }

  /**
   * Advances by rule rather than by node. With a single child the rule may be
   * omitted; otherwise the first child instantiating `rule` is taken.
   */
  advanceByRule(from: FlowNode, rule?: RuleNode | string): this {
    this.assertIdle(from);
    this.assertActive(from);
    const children = this.flow.childrenOf(from);
    if (children.length === 0) {
      throw new IllegalTransitionError(
        from.label,
        typeof rule === 'string' ? rule : (rule?.label ?? '(none)'),
        'there is no next step in this flow'
      );
    }

    if (rule === undefined) {
      if (children.length > 1) {
        throw new IllegalTransitionError(
          from.label,
          '(unspecified)',
          'several next steps are possible, a rule must be chosen'
        );
      }
      return this.advance(from, children[0]);
    }

    const label = typeof rule === 'string' ? rule : rule.label;
    const next = children.find((child) => child.label === label);
    if (!next) {
      throw new IllegalTransitionError(
        from.label,
        label,
        'no next step in this flow uses that rule'
      );
    }
    return this.advance(from, next);
  }

  /**
   * Drops an active position without advancing it, firing its `onExit`
   *
   * @throws InvalidPositionError when `position` is not active
   * @throws HookFailureError when the hook throws; the position stays active
   */
  prune(position: FlowNode): this {
    this.assertIdle(position);
    this.assertActive(position);
    this.transition(() => {
      this.runHook(EXIT, position);

      this.active.delete(position);
      this.forkProgress.delete(position);
      this.record(position, EXIT, this.clock(), 'prune');
    });
    this.logger.debug('position pruned', {
      state: this.id,
      node: position.id,
    });
    return this;
  }

  toString(): string {
    return `FlowState(${this.id} flow=${this.flow.id})`;
  }

  private replace(from: FlowNode, to: FlowNode): void {
    const next = [...this.active].map((node) => (node === from ? to : node));
    this.active.clear();
    for (const node of next) this.active.add(node);
  }

  private record(
    node: FlowNode,
    event: HookPhase,
    at: Date,
    cause: HistoryCause
  ): void {
    if (event === ENTER) this.visited.add(node);
    if (cause === 'prune') this.pruned.add(node);
    this.log.push(
      copyEntry({ node: node.id, rule: node.label, event, at, cause })
    );
  }

  /** Runs hooks plus commit with re-entrant transitions refused */
  private transition(fn: () => void): void {
    this.transitioning = true;
    try {
      fn();
    } finally {
      this.transitioning = false;
    }
  }

  private assertIdle(node: FlowNode): void {
    if (this.transitioning) {
      throw new InvalidPositionError(
        node.id,
        'cannot change while another transition is in progress'
      );
    }
  }

  private runHook(phase: HookPhase, node: FlowNode): void {
    const hook =
      phase === ENTER ? node.ruleNode.hooks.onEnter : node.ruleNode.hooks.onExit;
    if (!hook) return;

    try {
      hook({ node, rule: node.ruleNode, state: this, phase });
    } catch (error) {
      this.logger.warn('hook failed', {
        state: this.id,
        node: node.id,
        phase,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new HookFailureError(phase, node.id, error);
    }
  }

  private assertActive(node: FlowNode): void {
    if (!this.active.has(node)) {
      throw new InvalidPositionError(node.id);
    }
  }
}

const copyEntry = (entry: HistoryEntry): HistoryEntry =>
  Object.freeze({ ...entry, at: new Date(entry.at.getTime()) });

/**
 * Starts executing `flow`, freezing it
 */
export function startState(
  flow: Flow,
  roots?: readonly FlowNode[],
  options: StateOptions = {}
): FlowState {
  return FlowState.start(flow, roots, options);
}

export function advance(
  state: FlowState,
  from: FlowNode,
  to: FlowNode,
  options: AdvanceOptions = {}
): FlowState {
  return state.advance(from, to, options);
}

export function prune(state: FlowState, position: FlowNode): FlowState {
  return state.prune(position);
}

export function isComplete(state: FlowState): boolean {
  return state.isComplete;
}

export function allowedNextNodes(
  state: FlowState,
  position: FlowNode
): FlowNode[] {
  return state.allowedNextNodes(position);
}
