#!/usr/bin/env node
// Scenario runner - sends a fixed set of queries through the orchestrator
// against the bundled seed data and prints each response

import { createAgents } from '../src/services/agents/index.js';
import { createOrchestrator } from '../src/services/orchestrator/index.js';
import type { QueryContext } from '../src/services/intent/types.js';
import { DEFAULT_SEED_FILE, MemorySupportStore, loadSeedFile } from '../src/services/store/index.js';
import { createToolRegistry } from '../src/services/tools/index.js';

interface Scenario {
  title: string;
  query: string;
  context?: QueryContext;
}

const SCENARIOS: Scenario[] = [
  { title: 'Simple lookup', query: 'Get customer information for ID 5' },
  { title: 'Coordinated support', query: "I'm customer 1 and need help upgrading my account" },
  { title: 'Customer report', query: 'Show me all active customers who have open tickets' },
  { title: 'Escalation', query: "I've been charged twice, please refund immediately!", context: { customer_id: 1 } },
  { title: 'Multi-intent', query: 'Update my email to new.address@example.com and show my ticket history', context: { customer_id: 4 } },
  { title: 'Priority report', query: 'Show high priority tickets for active customers' },
  { title: 'Unknown', query: 'What is the weather like today?' },
];

function separator(): void {
  console.log('\n' + '='.repeat(80) + '\n');
}

const seed = await loadSeedFile(process.env.SEED_FILE || DEFAULT_SEED_FILE);
const store = new MemorySupportStore(seed);
const orchestrator = createOrchestrator(createAgents(createToolRegistry(store)));

for (const [index, scenario] of SCENARIOS.entries()) {
  separator();
  console.log(`TEST ${index + 1}: ${scenario.title}`);
  console.log(`Query: '${scenario.query}'`);
  if (scenario.context) console.log(`Context: ${JSON.stringify(scenario.context)}`);
  separator();

  const response = await orchestrator.run(scenario.query, scenario.context);
  console.log(`Pattern: ${response.pattern_used}  State: ${response.state}  Success: ${response.success}  Escalated: ${response.escalated}`);
  console.log('');
  console.log(response.text);
  console.log('');
  for (const entry of response.trace) {
    const mark = entry.outcome === 'ok' ? '✓' : '✗';
    console.log(`  ${mark} #${entry.sequence} ${entry.actor} ${entry.action}${entry.detail ? ` (${entry.detail})` : ''}`);
  }
}

await store.close();
