import { z } from 'zod';
import { ACCESS_SECTIONS, UserRole } from './permissions.js';
import { PaginationQuerySchema } from '@shared/utils/pagination.js';

// ============================================================================
// User Schemas
// ============================================================================

export const CreateUserSchema = z
  .object({
    email: z.string().email(),
    password: z.string().min(8),
    name: z.string().min(1).max(100),
    role: z.number().int().min(0).max(1).default(UserRole.STAFF),
    accessGroupId: z.string().uuid().optional().nullable(),
  })
  .strict();

export const UpdateUserSchema = z
  .object({
    name: z.string().min(1).max(100).optional(),
    role: z.number().int().min(0).max(1).optional(),
    accessGroupId: z.string().uuid().optional().nullable(),
    active: z.boolean().optional(),
  })
  .strict();

export const ListUsersQuerySchema = PaginationQuerySchema
  .extend({
    role: z.coerce.number().int().min(0).max(1).optional(),
    active: z
      .enum(['true', 'false'])
      .transform((v) => v === 'true')
      .optional(),
    search: z.string().optional(),
  })
  .strict();

export const UserIdParamSchema = z
  .object({
    id: z.string().min(1),
  })
  .strict();

// ============================================================================
// Access Group Schemas
// ============================================================================

const AccessGroupWindowSchema = z.object({
  startTime: z.coerce.date().optional().nullable(),
  endTime: z.coerce.date().optional().nullable(),
});

export const CreateAccessGroupSchema = z
  .object({
    name: z.string().min(1).max(100),
    sections: z.array(z.enum(ACCESS_SECTIONS)).default([]),
  })
  .merge(AccessGroupWindowSchema)
  .strict()
  .refine((value) => !value.startTime || !value.endTime || value.startTime < value.endTime, {
    message: 'Start time must be before end time',
    path: ['endTime'],
  });

export const UpdateAccessGroupSchema = z
  .object({
    name: z.string().min(1).max(100).optional(),
    sections: z.array(z.enum(ACCESS_SECTIONS)).optional(),
  })
  .merge(AccessGroupWindowSchema)
  .strict();

export const AccessGroupIdParamSchema = z
  .object({
    id: z.string().uuid(),
  })
  .strict();

// ============================================================================
// Types
// ============================================================================

export type CreateUserInput = z.infer<typeof CreateUserSchema>;
export type UpdateUserInput = z.infer<typeof UpdateUserSchema>;
export type ListUsersQuery = z.infer<typeof ListUsersQuerySchema>;
export type CreateAccessGroupInput = z.infer<typeof CreateAccessGroupSchema>;
export type UpdateAccessGroupInput = z.infer<typeof UpdateAccessGroupSchema>;
