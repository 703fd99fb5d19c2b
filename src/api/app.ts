import express, { Express } from 'express';
import { AccessGuard } from '../security/accessGuard';
import { PasswordHasher, ScryptPasswordHasher } from '../security/passwordHasher';
import { TokenIssuer } from '../security/tokenIssuer';
import { TokenVerifier } from '../security/tokenVerifier';
import { Clock, systemClock } from '../shared/clock';
import { TokenConfig } from '../shared/config';
import { createAuthMiddleware } from './middleware/auth';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { createRbacMiddleware } from './middleware/rbac';
import { createAuthRoutes } from './routes/auth';
import { createUserRoutes } from './routes/users';
import { AuthService } from './services/authService';
import { AccountStore } from './store/accountStore';

export interface AppDependencies {
  token: TokenConfig;
  store: AccountStore;
  hasher?: PasswordHasher;
  clock?: Clock;
}

export interface AppContext {
  app: Express;
  authService: AuthService;
  guard: AccessGuard;
}

export function createApp(deps: AppDependencies): AppContext {
  const clock = deps.clock ?? systemClock;
  const hasher = deps.hasher ?? new ScryptPasswordHasher();
  const issuer = new TokenIssuer(deps.token, clock);
  const guard = new AccessGuard(new TokenVerifier(deps.token, clock));
  const authService = new AuthService(deps.store, hasher, issuer);

  const app = express();
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  // Public routes
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', service: 'lu-estilo-api' });
  });

  // Protected route middleware chain
  const authenticate = createAuthMiddleware(guard);
  const rbac = createRbacMiddleware(guard);

  app.use('/auth', createAuthRoutes(authService, authenticate));
  app.use('/users', createUserRoutes(authService, [authenticate, rbac('ADMIN')]));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return { app, authService, guard };
}
