import { requireAuth, requireAdmin } from '@shared/middleware/auth.middleware.js';
import {
  createUser,
  getUserById,
  listUsers,
  updateUser,
  deleteUser,
  createAccessGroup,
  listAccessGroups,
  getAccessGroupById,
  updateAccessGroup,
} from './users.service.js';
import {
  CreateUserSchema,
  UpdateUserSchema,
  ListUsersQuerySchema,
  UserIdParamSchema,
  CreateAccessGroupSchema,
  UpdateAccessGroupSchema,
  AccessGroupIdParamSchema,
  type CreateUserInput,
  type UpdateUserInput,
  type ListUsersQuery,
  type CreateAccessGroupInput,
  type UpdateAccessGroupInput,
} from './users.schema.js';
import type { AppInstance } from '@shared/types/fastify.js';

export async function usersRoutes(app: AppInstance): Promise<void> {
  // All routes require authentication
  app.addHook('onRequest', requireAuth);

  // GET /api/users/me - Get current user (any authenticated user)
  app.get('/me', async (request, reply) => {
    return reply.send(request.user);
  });

  // POST /api/users - Create user (admin only)
  app.post<{ Body: CreateUserInput }>(
    '/',
    {
      preHandler: [requireAdmin],
      schema: { body: CreateUserSchema },
    },
    async (request, reply) => {
      const user = await createUser(request.body);
      return reply.status(201).send(user);
    }
  );

  // GET /api/users - List users (admin only)
  app.get<{ Querystring: ListUsersQuery }>(
    '/',
    {
      preHandler: [requireAdmin],
      schema: { querystring: ListUsersQuerySchema },
    },
    async (request, reply) => {
      const result = await listUsers(request.query);
      return reply.send(result);
    }
  );

  // GET /api/users/:id - Get single user (admin only)
  app.get<{ Params: { id: string } }>(
    '/:id',
    {
      preHandler: [requireAdmin],
      schema: { params: UserIdParamSchema },
    },
    async (request, reply) => {
      const user = await getUserById(request.params.id);
      if (!user) {
        throw app.httpErrors.notFound('User not found');
      }
      return reply.send(user);
    }
  );

  // PATCH /api/users/:id - Update user (admin only)
  app.patch<{ Params: { id: string }; Body: UpdateUserInput }>(
    '/:id',
    {
      preHandler: [requireAdmin],
      schema: { params: UserIdParamSchema, body: UpdateUserSchema },
    },
    async (request, reply) => {
      const user = await updateUser(request.params.id, request.body);
      return reply.send(user);
    }
  );

  // DELETE /api/users/:id - Delete user (admin only)
  app.delete<{ Params: { id: string } }>(
    '/:id',
    {
      preHandler: [requireAdmin],
      schema: { params: UserIdParamSchema },
    },
    async (request, reply) => {
      await deleteUser(request.params.id);
      return reply.status(204).send();
    }
  );
}

export async function accessGroupsRoutes(app: AppInstance): Promise<void> {
  app.addHook('onRequest', requireAuth);
  app.addHook('preHandler', requireAdmin);

  // POST /api/access-groups
  app.post<{ Body: CreateAccessGroupInput }>(
    '/',
    { schema: { body: CreateAccessGroupSchema } },
    async (request, reply) => {
      const group = await createAccessGroup(request.body);
      return reply.status(201).send(group);
    }
  );

  // GET /api/access-groups
  app.get('/', async (_request, reply) => {
    const groups = await listAccessGroups();
    return reply.send(groups);
  });

  // GET /api/access-groups/:id
  app.get<{ Params: { id: string } }>(
    '/:id',
    { schema: { params: AccessGroupIdParamSchema } },
    async (request, reply) => {
      const group = await getAccessGroupById(request.params.id);
      if (!group) {
        throw app.httpErrors.notFound('Access group not found');
      }
      return reply.send(group);
    }
  );

  // PATCH /api/access-groups/:id
  app.patch<{ Params: { id: string }; Body: UpdateAccessGroupInput }>(
    '/:id',
    { schema: { params: AccessGroupIdParamSchema, body: UpdateAccessGroupSchema } },
    async (request, reply) => {
      const group = await updateAccessGroup(request.params.id, request.body);
      return reply.send(group);
    }
  );
}
