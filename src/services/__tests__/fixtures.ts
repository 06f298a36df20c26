// Shared test setup: the bundled seed data behind a fresh in-memory store

import { createAgents } from '../agents/index.js';
import { createOrchestrator } from '../orchestrator/index.js';
import type { OrchestratorOptions } from '../orchestrator/types.js';
import { DEFAULT_SEED_FILE, MemorySupportStore, loadSeedFile } from '../store/index.js';
import type { MemoryStoreOptions, SupportStore } from '../store/index.js';
import { createToolRegistry } from '../tools/index.js';

export const FIXED_NOW = new Date('2026-03-01T12:00:00.000Z');

export async function seededStore(options: MemoryStoreOptions = { now: () => FIXED_NOW }): Promise<MemorySupportStore> {
  return new MemorySupportStore(await loadSeedFile(DEFAULT_SEED_FILE), options);
}

export function buildStack(store: SupportStore, options: OrchestratorOptions = {}) {
  const registry = createToolRegistry(store);
  const agents = createAgents(registry);
  const orchestrator = createOrchestrator(agents, undefined, options);
  return { registry, agents, orchestrator };
}
