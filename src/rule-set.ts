import { RuleNotInSetError } from './errors';
import { reachableFrom } from './graph-utils';
import type { RuleNode } from './rule-graph';

/**
 * A named handle on one rule graph: its entry rule and every rule reachable
 * from it. Flows are always built against a rule set.
 */
export class RuleSet {
  private readonly members: ReadonlyMap<string, RuleNode>;

  /** @internal use {@link RuleSet.factory} or `registry.createRuleSet` */
  constructor(
    readonly name: string,
    readonly root: RuleNode
  ) {
    const reachable = reachableFrom([root], (rule) => rule.children);
    this.members = new Map([...reachable].map((rule) => [rule.label, rule]));
  }

  /**
   * Creates a rule set in the registry owning `root`.
   * Fails with `DuplicateNameError` when the name is taken.
   */
  static factory(name: string, root: RuleNode): RuleSet {
    return root.registry.createRuleSet(name, root);
  }

  /** Rules reachable from the root, root first */
  get rules(): RuleNode[] {
    return [...this.members.values()];
  }

  contains(rule: RuleNode): boolean {
    return this.members.get(rule.label) === rule;
  }

  /**
   * Look up a member rule by label
   * @throws RuleNotInSetError when no reachable rule has that label
   */
  findRule(label: string): RuleNode {
    const rule = this.members.get(label);
    if (!rule) {
      throw new RuleNotInSetError(label, this.name);
    }
    return rule;
  }

  /** Every declared parent -> child pair between member rules */
  edges(): Array<[RuleNode, RuleNode]> {
    return this.rules.flatMap((rule) =>
      rule.children.map((child): [RuleNode, RuleNode] => [rule, child])
    );
  }

  toString(): string {
    return `RuleSet(${this.name})`;
  }
}
