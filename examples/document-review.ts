import {
  advance,
  createFlow,
  flowToCytoscape,
  isComplete,
  RuleRegistry,
  StateManager,
  startState,
} from '../src';
import type { RuleHooks } from '../src';

/**
 * Document review: a draft is submitted, legal and finance review it in
 * parallel, and each review ends in its own sign-off.
 *
 * Run: npm run example:review
 */

const announce: RuleHooks = {
  onEnter: ({ node }) => console.log(`  -> ${node.ruleNode.displayName}`),
  onExit: ({ node }) => console.log(`  <- ${node.ruleNode.displayName}`),
};

const rules = new RuleRegistry();
rules.defineRule('draft', ['submit'], false, { displayName: 'Draft', hooks: announce });
rules.defineRule('submit', ['review'], false, { displayName: 'Submit', hooks: announce });
rules.defineRule('review', ['legal', 'finance'], true, {
  displayName: 'Review',
  hooks: announce,
});
rules.defineRule('legal', ['sign-off', 'draft'], false, {
  displayName: 'Legal review',
  hooks: announce,
});
rules.defineRule('finance', ['sign-off', 'draft'], false, {
  displayName: 'Finance review',
  hooks: announce,
});
rules.defineRule('sign-off', [], false, { displayName: 'Sign-off', hooks: announce });

const reviewRules = rules.createRuleSet('Document review', rules.getRule('draft'));

async function main() {
  console.log('=== Document Review ===\n');

  // Compose one concrete workflow within the rules
  const flow = createFlow(reviewRules, { name: 'Quarterly report' });
  const draft = flow.addNode('draft');
  const submit = flow.addChildRule(draft, 'submit');
  const review = flow.addChildRule(submit, 'review');
  const legal = flow.addChildRule(review, 'legal');
  const finance = flow.addChildRule(review, 'finance');
  const legalSignOff = flow.addChildRule(legal, 'sign-off');
  const financeSignOff = flow.addChildRule(finance, 'sign-off');

  console.log('Validation:', flow.validate());
  console.log('Graph:', JSON.stringify(flowToCytoscape(flow), null, 2), '\n');

  const state = startState(flow);
  advance(state, draft, submit);
  advance(state, submit, review);

  // review forks: it stays active until both reviews have started
  advance(state, review, legal);
  console.log('Positions:', state.positions.map((node) => node.label));
  advance(state, review, finance);
  console.log('Positions:', state.positions.map((node) => node.label));

  advance(state, legal, legalSignOff);
  advance(state, finance, financeSignOff);
  console.log('Complete:', isComplete(state), '\n');

  const manager = new StateManager();
  await manager.saveRuleSet(reviewRules);
  await manager.saveFlow(flow);
  const version = await manager.save(state);
  console.log(`Saved state ${state.id} as version ${version}`);

  console.log('\nHistory:');
  for (const entry of state.history) {
    console.log(`  ${entry.at.toISOString()} ${entry.event} ${entry.rule} (${entry.cause})`);
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
