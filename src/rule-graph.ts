import { DuplicateLabelError, DuplicateNameError, UnknownChildError } from './errors';
import type { DefineRuleOptions, RuleHooks } from './types/rule.types';
import { RuleSet } from './rule-set';

/**
 * A node of the rule graph: one kind of step and the steps that may follow it.
 *
 * Children are stored by label and resolved through the owning registry, so a
 * rule may name children (itself included) that are defined after it.
 */
export class RuleNode {
  readonly displayName: string;
  readonly hooks: Readonly<RuleHooks>;
  private resolved?: readonly RuleNode[];

  /** @internal use {@link RuleRegistry.defineRule} */
  constructor(
    readonly registry: RuleRegistry,
    readonly label: string,
    readonly childLabels: readonly string[],
    readonly allowsFork: boolean,
    options: DefineRuleOptions = {}
  ) {
    this.displayName = options.displayName ?? label;
    this.hooks = Object.freeze({ ...options.hooks });
  }

  /**
   * Rules that may directly follow this one, in declaration order.
   * Throws {@link UnknownChildError} while a forward reference is still open.
   */
  get children(): readonly RuleNode[] {
    if (this.resolved) return this.resolved;

    const children = this.childLabels.map((label) =>
      this.registry.resolveChild(this.label, label)
    );
    if (this.registry.isFinalized) {
      this.resolved = Object.freeze(children);
    }
    return children;
  }

  toString(): string {
    return `RuleNode(${this.label})`;
  }
}

/**
 * True iff `child` was declared as a direct child of `parent`.
 * Never follows more than one edge.
 */
export function isAllowedEdge(parent: RuleNode, child: RuleNode): boolean {
  return (
    parent.registry === child.registry &&
    parent.childLabels.includes(child.label)
  );
}

/**
 * Arena of rule nodes indexed by label, plus the rule sets built on them.
 *
 * Rules are appended, never changed. Until {@link finalize} runs, a rule may
 * reference children that are not defined yet; finalizing checks that every
 * reference resolved. Afterwards new rules may only reference existing ones.
 *
 * @example
 * ```typescript
 * const rules = new RuleRegistry();
 * rules.defineRule('A', ['B', 'C']);
 * rules.defineRule('B', []);
 * rules.defineRule('C', ['D', 'E'], true);
 * rules.defineRule('D', []);
 * rules.defineRule('E', ['A']);
 *
 * const set = rules.createRuleSet('My Rules', rules.getRule('A'));
 * ```
 */
export class RuleRegistry {
  private readonly rules = new Map<string, RuleNode>();
  private readonly sets = new Map<string, RuleSet>();
  private finalized = false;

  get isFinalized(): boolean {
    return this.finalized;
  }

  /**
   * Registers a rule
   *
   * @param label - Unique identity of the rule
   * @param children - Labels of the rules that may directly follow it
   * @param allowsFork - Whether several children may be active at once
   */
  defineRule(
    label: string,
    children: readonly string[] = [],
    allowsFork = false,
    options: DefineRuleOptions = {}
  ): RuleNode {
    if (this.rules.has(label)) {
      throw new DuplicateLabelError(label);
    }

    const childLabels = [...new Set(children)];
    if (this.finalized) {
      for (const child of childLabels) {
        if (child !== label && !this.rules.has(child)) {
          throw new UnknownChildError(child, label);
        }
      }
    }

    const rule = new RuleNode(this, label, childLabels, allowsFork, options);
    this.rules.set(label, rule);
    return rule;
  }

  /**
   * Resolves every pending child reference and seals the existing rules.
   * Safe to call more than once.
   */
  finalize(): this {
    for (const rule of this.rules.values()) {
      for (const child of rule.childLabels) {
        if (!this.rules.has(child)) {
          throw new UnknownChildError(child, rule.label);
        }
      }
    }
    this.finalized = true;
    return this;
  }

  hasRule(label: string): boolean {
    return this.rules.has(label);
  }

  /** Look up a rule by label, `undefined` when not defined */
  findRule(label: string): RuleNode | undefined {
    return this.rules.get(label);
  }

  /** Look up a rule by label, throwing when it is not defined */
  getRule(label: string): RuleNode {
    const rule = this.rules.get(label);
    if (!rule) {
      throw new UnknownChildError(label);
    }
    return rule;
  }

  /** @internal used by {@link RuleNode.children} */
  resolveChild(parent: string, child: string): RuleNode {
    const rule = this.rules.get(child);
    if (!rule) {
      throw new UnknownChildError(child, parent);
    }
    return rule;
  }

  /** All rules in definition order */
  allRules(): RuleNode[] {
    return [...this.rules.values()];
  }

  /**
   * Creates a named rule set rooted at `root`. Finalizes the registry first.
   */
  createRuleSet(name: string, root: RuleNode): RuleSet {
    if (root.registry !== this) {
      throw new UnknownChildError(root.label);
    }
    if (this.sets.has(name)) {
      throw new DuplicateNameError(name);
    }
    this.finalize();

    const ruleSet = new RuleSet(name, root);
    this.sets.set(name, ruleSet);
    return ruleSet;
  }

  getRuleSet(name: string): RuleSet | undefined {
    return this.sets.get(name);
  }

  ruleSets(): RuleSet[] {
    return [...this.sets.values()];
  }
}

/**
 * Process-wide registry used by the module-level helpers
 */
export const defaultRegistry = new RuleRegistry();

/**
 * Registers a rule in the process-wide registry
 */
export function defineRule(
  label: string,
  children: readonly string[] = [],
  allowsFork = false,
  options: DefineRuleOptions = {}
): RuleNode {
  return defaultRegistry.defineRule(label, children, allowsFork, options);
}

/**
 * Creates a rule set in the registry that owns `root`
 */
export function createRuleSet(name: string, root: RuleNode): RuleSet {
  return root.registry.createRuleSet(name, root);
}
