import { z } from 'zod';
import { GROUP_STATUSES } from '@shared/constants/convention.js';
import { PaginationQuerySchema } from '@shared/utils/pagination.js';

// ============================================================================
// Group Schemas
// ============================================================================

const GroupFieldsSchema = z.object({
  name: z.string().trim().min(1).max(255),
  tables: z.number().min(0).max(10),
  power: z.number().int().min(0),
  powerFee: z.number().int().min(0),
  powerUsage: z.string().max(500),
  location: z.string().max(255),
  tableFee: z.number().int().min(0),
  taxNumber: z.string().max(100),
  status: z.enum(GROUP_STATUSES),
  isDealer: z.boolean(),
  canAdd: z.boolean(),
  cost: z.number().int().min(0),
  autoRecalc: z.boolean(),
  leaderId: z.string().uuid().nullable(),
});

export const CreateGroupSchema = GroupFieldsSchema.partial()
  .required({ name: true })
  .strict();

export const UpdateGroupSchema = GroupFieldsSchema.partial().strict();

export const ListGroupsQuerySchema = PaginationQuerySchema
  .extend({
    search: z.string().optional(),
    status: z.enum(GROUP_STATUSES).optional(),
    isDealer: z
      .enum(['true', 'false'])
      .transform((v) => v === 'true')
      .optional(),
  })
  .strict();

export const GroupIdParamSchema = z
  .object({
    id: z.string().uuid(),
  })
  .strict();

// ============================================================================
// Types
// ============================================================================

export type CreateGroupInput = z.infer<typeof CreateGroupSchema>;
export type UpdateGroupInput = z.infer<typeof UpdateGroupSchema>;
export type ListGroupsQuery = z.infer<typeof ListGroupsQuerySchema>;
