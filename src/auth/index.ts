export { AuthService } from './auth.service';
export { createAuthMiddleware, requireAdmin } from './auth.middleware';
export * from './auth.types';
