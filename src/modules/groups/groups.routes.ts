import { requireAuth, requireSection } from '@shared/middleware/auth.middleware.js';
import { requestMeta } from '@modules/attendees/attendees.routes.js';
import {
  createGroup,
  getGroupById,
  listGroups,
  updateGroup,
  deleteGroup,
  recalculateGroupCost,
} from './groups.service.js';
import {
  CreateGroupSchema,
  UpdateGroupSchema,
  ListGroupsQuerySchema,
  GroupIdParamSchema,
  type CreateGroupInput,
  type UpdateGroupInput,
  type ListGroupsQuery,
} from './groups.schema.js';
import type { AppInstance } from '@shared/types/fastify.js';

export async function groupsRoutes(app: AppInstance): Promise<void> {
  app.addHook('onRequest', requireAuth);
  app.addHook('preHandler', requireSection('groups'));

  // POST /api/groups
  app.post<{ Body: CreateGroupInput }>(
    '/',
    { schema: { body: CreateGroupSchema } },
    async (request, reply) => {
      const group = await createGroup(request.body, requestMeta(request).performedBy);
      return reply.status(201).send(group);
    }
  );

  // GET /api/groups
  app.get<{ Querystring: ListGroupsQuery }>(
    '/',
    { schema: { querystring: ListGroupsQuerySchema } },
    async (request, reply) => {
      const result = await listGroups(request.query);
      return reply.send(result);
    }
  );

  // GET /api/groups/:id - Group with members and costs
  app.get<{ Params: { id: string } }>(
    '/:id',
    { schema: { params: GroupIdParamSchema } },
    async (request, reply) => {
      const group = await getGroupById(request.params.id);
      if (!group) {
        throw app.httpErrors.notFound('Group not found');
      }
      return reply.send(group);
    }
  );

  // PATCH /api/groups/:id
  app.patch<{ Params: { id: string }; Body: UpdateGroupInput }>(
    '/:id',
    { schema: { params: GroupIdParamSchema, body: UpdateGroupSchema } },
    async (request, reply) => {
      const group = await updateGroup(request.params.id, request.body, requestMeta(request).performedBy);
      return reply.send(group);
    }
  );

  // POST /api/groups/:id/recalculate - Reset cost to the default
  app.post<{ Params: { id: string } }>(
    '/:id/recalculate',
    { schema: { params: GroupIdParamSchema } },
    async (request, reply) => {
      const group = await recalculateGroupCost(request.params.id, requestMeta(request).performedBy);
      return reply.send(group);
    }
  );

  // DELETE /api/groups/:id
  app.delete<{ Params: { id: string } }>(
    '/:id',
    { schema: { params: GroupIdParamSchema } },
    async (request, reply) => {
      await deleteGroup(request.params.id, requestMeta(request).performedBy);
      return reply.status(204).send();
    }
  );
}
