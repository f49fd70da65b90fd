export {
  AdminService,
  AdminServiceDeps,
  ForceMatchResult,
  ManualResolution,
} from './admin.service';
export { AdminController } from './admin.controller';
export { createAdminRoutes } from './admin.routes';
