import { Request, Response, NextFunction } from 'express';
import { AccessGuard } from '../../security/accessGuard';
import { MissingCredentialsError } from '../../shared/errors';
import { Role } from '../../shared/types';

// Must run after the auth middleware
export function createRbacMiddleware(guard: AccessGuard) {
  return (requiredRole: Role) => {
    return (req: Request, _res: Response, next: NextFunction): void => {
      const principal = req.principal;

      if (!principal) {
        next(new MissingCredentialsError());
        return;
      }

      try {
        guard.authorize(principal, requiredRole);
        next();
      } catch (error) {
        next(error);
      }
    };
  };
}
