import { Request, Response, NextFunction } from 'express';
import { AuthenticationError } from '@inferlab/shared-utils';

/** Guards admin routes with a static bearer token; a no-op when none is configured. */
export function requireAdminToken(token: string | undefined) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (!token) {
      next();
      return;
    }

    const authHeader = req.headers.authorization;
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      next(new AuthenticationError('Missing or invalid authorization header'));
      return;
    }

    if (authHeader.substring(7) !== token) {
      next(new AuthenticationError('Invalid admin token'));
      return;
    }

    next();
  };
}
