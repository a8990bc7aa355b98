// Services
export {
  createGroup,
  getGroupById,
  listGroups,
  updateGroup,
  deleteGroup,
  recalculateGroupCost,
  syncGroupCost,
  type GroupWithMembers,
  type GroupDetail,
} from './groups.service.js';
export {
  powerCost,
  tableCost,
  defaultCost,
  dealerPaymentDue,
  dealerPaymentIsLate,
  tablesRepr,
  dealerMaxBadges,
  groupCosts,
  applyGroupPresaveAdjustments,
  type GroupCosts,
} from './groups.utils.js';

// Schemas & Types
export {
  CreateGroupSchema,
  UpdateGroupSchema,
  ListGroupsQuerySchema,
  GroupIdParamSchema,
  type CreateGroupInput,
  type UpdateGroupInput,
  type ListGroupsQuery,
} from './groups.schema.js';

// Routes
export { groupsRoutes } from './groups.routes.js';
