export {
  AdminService,
  AdjustmentResult,
  UserInspection,
  AdminLogListOptions,
} from './admin.service';
export { AdminController } from './admin.controller';
export { createAdminRoutes } from './admin.routes';
