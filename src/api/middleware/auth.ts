import { Request, Response, NextFunction } from 'express';
import { AccessGuard } from '../../security/accessGuard';
import { Principal } from '../../shared/types';

// Extend Express Request to carry the authenticated principal
declare global {
  namespace Express {
    interface Request {
      principal?: Principal;
    }
  }
}

export function createAuthMiddleware(guard: AccessGuard) {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    try {
      req.principal = await guard.authenticate(req);
      next();
    } catch (error) {
      next(error);
    }
  };
}
