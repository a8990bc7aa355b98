// Services
export {
  createUser,
  getUserById,
  updateUser,
  listUsers,
  deleteUser,
  createAccessGroup,
  getAccessGroupById,
  listAccessGroups,
  updateAccessGroup,
  type UserWithAccessGroup,
} from './users.service.js';

// Types & Permissions
export {
  UserRole,
  type UserRoleType,
  ACCESS_SECTIONS,
  type AccessSection,
  isAdmin,
  canManageUsers,
  getRoleName,
  isAccessGroupActive,
  canAccessSection,
} from './permissions.js';

export {
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

// Routes
export { usersRoutes, accessGroupsRoutes } from './users.routes.js';
