// Argument schemas for every registry operation
// Each schema is strict: unknown keys are a validation error, never silently dropped

import { z } from 'zod';
import { CUSTOMER_STATUSES, PRIORITIES } from '../store/types.js';

export const MAX_LIST_LIMIT = 1000;
export const DEFAULT_LIST_LIMIT = 10;

export const CustomerIdSchema = z.number().int().positive();
export const PrioritySchema = z.enum(PRIORITIES);
export const CustomerStatusSchema = z.enum(CUSTOMER_STATUSES);

export const GetCustomerArgsSchema = z.object({
  customer_id: CustomerIdSchema,
}).strict();

export const ListCustomersArgsSchema = z.object({
  status: CustomerStatusSchema.optional(),
  limit: z.number().int().min(1).max(MAX_LIST_LIMIT).optional().default(DEFAULT_LIST_LIMIT),
  offset: z.number().int().min(0).optional().default(0),
}).strict();

export const CustomerUpdateSchema = z.object({
  name: z.string().trim().min(1).max(200).optional(),
  email: z.string().trim().toLowerCase().email().max(254).optional(),
  phone: z.string().trim().regex(/^\+?[\d\s().-]{5,30}$/, 'Invalid phone number').optional(),
  status: CustomerStatusSchema.optional(),
}).strict().refine(
  data => Object.values(data).some(value => value !== undefined),
  { message: 'No valid fields to update' }
);

export const UpdateCustomerArgsSchema = z.object({
  customer_id: CustomerIdSchema,
  data: CustomerUpdateSchema,
}).strict();

export const CreateTicketArgsSchema = z.object({
  customer_id: CustomerIdSchema,
  issue: z.string().trim().min(1).max(2000),
  priority: PrioritySchema.optional().default('medium'),
}).strict();

export const GetCustomerHistoryArgsSchema = z.object({
  customer_id: CustomerIdSchema,
}).strict();

export const GetTicketsByPriorityArgsSchema = z.object({
  priority: PrioritySchema,
  customer_ids: z.array(CustomerIdSchema).max(MAX_LIST_LIMIT).optional(),
}).strict();

export const NoArgsSchema = z.object({}).strict();

export type GetCustomerArgs = z.output<typeof GetCustomerArgsSchema>;
export type ListCustomersArgs = z.output<typeof ListCustomersArgsSchema>;
export type UpdateCustomerArgs = z.output<typeof UpdateCustomerArgsSchema>;
export type CreateTicketArgs = z.output<typeof CreateTicketArgsSchema>;
export type GetCustomerHistoryArgs = z.output<typeof GetCustomerHistoryArgsSchema>;
export type GetTicketsByPriorityArgs = z.output<typeof GetTicketsByPriorityArgsSchema>;
export type NoArgs = z.output<typeof NoArgsSchema>;
