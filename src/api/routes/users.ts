import { Router, RequestHandler } from 'express';
import { asyncHandler } from '../middleware/asyncHandler';
import { pageSchema, roleUpdateSchema } from '../schemas';
import { AuthService } from '../services/authService';

// Account administration; every route is ADMIN-only
export function createUserRoutes(authService: AuthService, guards: RequestHandler[]): Router {
  const router = Router();
  router.use(...guards);

  // GET /users?offset=0&limit=10
  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const page = pageSchema.parse(req.query);
      const users = await authService.listAccounts(page);
      res.json({ users });
    })
  );

  // PATCH /users/:username/role
  router.patch(
    '/:username/role',
    asyncHandler(async (req, res) => {
      const { role } = roleUpdateSchema.parse(req.body);
      const account = await authService.setRole(req.params.username, role);
      res.json(account);
    })
  );

  return router;
}
