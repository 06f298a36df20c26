import { describe, it, expect, beforeEach } from 'vitest';
import { ErrorCode } from '../../../utils/errors.js';
import { MemorySupportStore } from '../../store/memory-store.js';
import type { SupportStore } from '../../store/types.js';
import { seededStore } from '../../__tests__/fixtures.js';
import { ToolRegistry } from '../registry.js';
import { createToolRegistry, supportTools } from '../index.js';

describe('Tool Registry', () => {
  let store: MemorySupportStore;
  let registry: ToolRegistry;

  beforeEach(async () => {
    store = await seededStore();
    registry = createToolRegistry(store);
  });

  it('should list all registered tools', () => {
    expect(registry.getAll().map(t => t.name)).toEqual([
      'get_customer',
      'list_customers',
      'update_customer',
      'create_ticket',
      'get_customer_history',
      'get_tickets_by_priority',
      'get_customers_with_open_tickets',
    ]);
    expect(registry.has('get_customer')).toBe(true);
    expect(registry.has('drop_tables')).toBe(false);
  });

  it('should describe parameters in the manifest', () => {
    const manifest = registry.toManifest();
    const listCustomers = manifest.find(t => t.name === 'list_customers');

    expect(listCustomers?.mutates).toBe(false);
    expect(listCustomers?.parameters.required).toEqual([]);
    expect(listCustomers?.parameters.properties.status?.enum).toEqual(['active', 'disabled']);
    expect(listCustomers?.parameters.properties.limit?.default).toBe(10);
    expect(listCustomers?.parameters.properties.offset?.default).toBe(0);
    expect(manifest.find(t => t.name === 'create_ticket')?.parameters.required).toEqual(['customer_id', 'issue']);
  });

  it('should return a customer by id', async () => {
    const result = await registry.invoke('get_customer', { customer_id: 5 });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.name).toBe('Charlie Brown');
      expect(result.data.email).toBe('charlie.brown@email.com');
    }
  });

  it('should reject malformed arguments before touching the store', async () => {
    const result = await registry.invoke('get_customer', { customer_id: 'five' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe(ErrorCode.VALIDATION_ERROR);
      expect(result.error.source).toBe('get_customer');
      expect(result.error.message).toBe('Invalid arguments for get_customer');
    }
  });

  it('should reject unknown argument keys', async () => {
    const result = await registry.invoke('get_customer', { customer_id: 5, include: 'all' });
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.code).toBe(ErrorCode.VALIDATION_ERROR);
  });

  it('should report unknown tools as validation errors', async () => {
    const result = await registry.invokeByName('drop_tables', {});
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toEqual({
        code: ErrorCode.VALIDATION_ERROR,
        message: 'Unknown tool "drop_tables"',
        source: 'drop_tables',
      });
    }
  });

  it('should report missing customers as not found', async () => {
    const result = await registry.invoke('get_customer_history', { customer_id: 999 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe(ErrorCode.NOT_FOUND);
      expect(result.error.message).toBe('Customer 999 not found');
      expect(result.error.source).toBe('get_customer_history');
    }
  });

  describe('list_customers', () => {
    it('applies the default limit and status filter', async () => {
      const disabled = await registry.invoke('list_customers', { status: 'disabled' });
      expect(disabled.success && disabled.data.map(c => c.id)).toEqual([3, 7]);

      const firstTwo = await registry.invoke('list_customers', { limit: 2 });
      expect(firstTwo.success && firstTwo.data.map(c => c.id)).toEqual([1, 2]);

      const nextTwo = await registry.invoke('list_customers', { limit: 2, offset: 2 });
      expect(nextTwo.success && nextTwo.data.map(c => c.id)).toEqual([3, 4]);
    });

    it('rejects limits outside 1..1000', async () => {
      for (const limit of [0, 1001, 2.5]) {
        const result = await registry.invoke('list_customers', { limit });
        expect(result.success).toBe(false);
      }
    });
  });

  describe('update_customer', () => {
    it('normalizes and applies the update', async () => {
      const result = await registry.invoke('update_customer', {
        customer_id: 2,
        data: { email: '  Ben.New@Example.com ' },
      });
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.email).toBe('ben.new@example.com');
        expect(result.data.updated_at).toBe('2026-03-01T12:00:00.000Z');
      }
      expect((await store.findCustomer(2))?.email).toBe('ben.new@example.com');
    });

    it('rejects an empty update', async () => {
      const result = await registry.invoke('update_customer', { customer_id: 2, data: {} });
      expect(result.success).toBe(false);
      if (!result.success) expect(result.error.code).toBe(ErrorCode.VALIDATION_ERROR);
    });

    it('rejects fields outside the allowed set without applying any', async () => {
      const result = await registry.invoke('update_customer', {
        customer_id: 2,
        data: { name: 'Ben O.', created_at: '2020-01-01T00:00:00.000Z' },
      });
      expect(result.success).toBe(false);
      expect((await store.findCustomer(2))?.name).toBe('Ben Okafor');
    });
  });

  describe('create_ticket', () => {
    it('defaults priority to medium', async () => {
      const result = await registry.invoke('create_ticket', { customer_id: 2, issue: 'Export keeps failing' });
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toEqual({
          id: 11,
          customer_id: 2,
          issue: 'Export keeps failing',
          status: 'open',
          priority: 'medium',
          created_at: '2026-03-01T12:00:00.000Z',
        });
      }
    });

    it('refuses tickets for unknown customers', async () => {
      const result = await registry.invoke('create_ticket', { customer_id: 999, issue: 'Ghost ticket' });
      expect(result.success).toBe(false);
      if (!result.success) expect(result.error.code).toBe(ErrorCode.NOT_FOUND);
    });

    it('serializes concurrent writes', async () => {
      const [a, b] = await Promise.all([
        registry.invoke('create_ticket', { customer_id: 1, issue: 'First' }),
        registry.invoke('create_ticket', { customer_id: 1, issue: 'Second' }),
      ]);
      expect(a.success && a.data.id).toBe(11);
      expect(b.success && b.data.id).toBe(12);
    });
  });

  it('filters priority tickets by customer set', async () => {
    const result = await registry.invoke('get_tickets_by_priority', { priority: 'high', customer_ids: [1, 4] });
    expect(result.success && result.data.map(t => [t.id, t.customer_name])).toEqual([
      [6, 'Dev Patel'],
      [1, 'Alice Nguyen'],
    ]);
  });

  it('wraps unexpected store failures as upstream failures', async () => {
    const broken: SupportStore = {
      driver: 'broken',
      findCustomer: async () => {
        throw new Error('connection reset');
      },
      listCustomers: async () => [],
      updateCustomer: async () => null,
      insertTicket: async () => {
        throw new Error('read only');
      },
      listTicketsForCustomer: async () => [],
      listTicketsByPriority: async () => [],
      listCustomersWithOpenTickets: async () => [],
      close: async () => undefined,
    };
    const brokenRegistry = new ToolRegistry(broken, supportTools);

    const result = await brokenRegistry.invoke('get_customer', { customer_id: 1 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe(ErrorCode.UPSTREAM_FAILURE);
      expect(result.error.message).toBe('get_customer failed: connection reset');
    }
  });
});
