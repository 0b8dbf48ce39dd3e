import { MongoStorageAdapter } from '../src/persistence/mongo-adapter';
import { createFlow, RuleRegistry, StateManager, startState } from '../src';

/**
 * MongoDB persistence
 *
 * Prerequisites:
 * 1. Start MongoDB:
 *    - Docker: docker run -d -p 27017:27017 --name mongo-test mongo:latest
 * 2. Run: npm run example:mongo
 */

async function main() {
  console.log('=== MongoDB Persistence ===\n');

  const adapter = new MongoStorageAdapter({
    uri: process.env.MONGO_URI || 'mongodb://localhost:27017',
    database: 'rule_flow_example',
  });

  try {
    await adapter.connect();
    console.log('Connected\n');

    const rules = new RuleRegistry();
    rules.defineRule('open', ['triage']);
    rules.defineRule('triage', ['fix', 'close']);
    rules.defineRule('fix', ['close']);
    rules.defineRule('close');
    const ruleSet = rules.createRuleSet('Ticket', rules.getRule('open'));

    const flow = createFlow(ruleSet, { name: 'Bug ticket' });
    const open = flow.addNode('open');
    const triage = flow.addChildRule(open, 'triage');
    const fix = flow.addChildRule(triage, 'fix');
    flow.addChildRule(fix, 'close');

    const manager = new StateManager({ adapter });
    const state = startState(flow);
    await manager.saveRuleSet(ruleSet);
    await manager.saveFlow(flow);
    await manager.save(state);

    state.advance(open, triage).advance(triage, fix);
    await manager.save(state);

    // A fresh process only knows the rule definitions
    const restartedRules = new RuleRegistry();
    restartedRules.defineRule('open', ['triage']);
    restartedRules.defineRule('triage', ['fix', 'close']);
    restartedRules.defineRule('fix', ['close']);
    restartedRules.defineRule('close');

    const restartedFlow = await manager.loadFlow(flow.id, restartedRules);
    if (!restartedFlow) throw new Error(`Flow ${flow.id} was not saved`);

    const latest = await manager.load(state.id, restartedFlow);
    const first = await manager.load(state.id, restartedFlow, 1);
    console.log('Latest positions:', latest?.positions.map((node) => node.label));
    console.log('Version 1 positions:', first?.positions.map((node) => node.label));

    const history = await manager.getHistory(state.id);
    console.log(`Stored ${history.length} snapshots`);

    await manager.delete(state.id);
    await manager.deleteFlow(flow.id);
  } finally {
    await adapter.disconnect();
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
