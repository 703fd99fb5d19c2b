import { Router, Request, RequestHandler } from 'express';
import { MissingCredentialsError } from '../../shared/errors';
import { Principal, TokenResponse } from '../../shared/types';
import { asyncHandler } from '../middleware/asyncHandler';
import { changePasswordSchema, loginSchema, registerSchema } from '../schemas';
import { AuthService } from '../services/authService';

function tokenBody(token: TokenResponse) {
  return {
    access_token: token.accessToken,
    token_type: token.tokenType,
    expires_in: token.expiresIn,
  };
}

function requirePrincipal(req: Request): Principal {
  if (!req.principal) {
    throw new MissingCredentialsError();
  }
  return req.principal;
}

export function createAuthRoutes(authService: AuthService, authenticate: RequestHandler): Router {
  const router = Router();

  // POST /auth/register - public sign-up, always as STANDARD
  router.post(
    '/register',
    asyncHandler(async (req, res) => {
      const { username, password } = registerSchema.parse(req.body);
      const account = await authService.register(username, password);
      res.status(201).json(account);
    })
  );

  // POST /auth/login - JSON or OAuth2 password form (application/x-www-form-urlencoded)
  router.post(
    '/login',
    asyncHandler(async (req, res) => {
      const { username, password } = loginSchema.parse(req.body ?? {});
      const token = await authService.login(username, password);
      res.json(tokenBody(token));
    })
  );

  // POST /auth/refresh-token - new token for the bearer of a valid one
  router.post(
    '/refresh-token',
    authenticate,
    asyncHandler(async (req, res) => {
      const token = await authService.refresh(requirePrincipal(req));
      res.json(tokenBody(token));
    })
  );

  // POST /auth/password - change own password
  router.post(
    '/password',
    authenticate,
    asyncHandler(async (req, res) => {
      const body = changePasswordSchema.parse(req.body);
      await authService.changePassword(requirePrincipal(req), body.current_password, body.new_password);
      res.status(204).end();
    })
  );

  // GET /auth/me - the account behind the token
  router.get(
    '/me',
    authenticate,
    asyncHandler(async (req, res) => {
      const account = await authService.getAccount(requirePrincipal(req).username);
      res.json(account);
    })
  );

  return router;
}
