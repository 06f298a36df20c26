// Seed loading for the in-memory store

import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { CUSTOMER_STATUSES, PRIORITIES, TICKET_STATUSES } from './types.js';
import type { MemoryStoreSeed } from './memory-store.js';

const isoTimestamp = z.string().datetime();

const CustomerSeedSchema = z.object({
  id: z.number().int().positive(),
  name: z.string().min(1),
  email: z.string().email().nullable(),
  phone: z.string().nullable(),
  status: z.enum(CUSTOMER_STATUSES),
  created_at: isoTimestamp,
  updated_at: isoTimestamp,
});

const TicketSeedSchema = z.object({
  id: z.number().int().positive(),
  customer_id: z.number().int().positive(),
  issue: z.string().min(1),
  status: z.enum(TICKET_STATUSES),
  priority: z.enum(PRIORITIES),
  created_at: isoTimestamp,
});

export const SeedSchema = z.object({
  customers: z.array(CustomerSeedSchema),
  tickets: z.array(TicketSeedSchema).default([]),
});

export const DEFAULT_SEED_FILE = 'data/seed.json';

export function parseSeed(raw: unknown): MemoryStoreSeed {
  const parsed = SeedSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first ? `${first.path.join('.')}: ${first.message}` : 'unknown issue';
    throw new Error(`Invalid seed data (${where})`);
  }
  return parsed.data;
}

export async function loadSeedFile(file: string = DEFAULT_SEED_FILE): Promise<MemoryStoreSeed> {
  const resolved = path.resolve(process.cwd(), file);
  const content = await readFile(resolved, 'utf-8');
  return parseSeed(JSON.parse(content));
}
