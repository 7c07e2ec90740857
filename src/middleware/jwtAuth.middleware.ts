import { Request, Response, NextFunction, RequestHandler } from 'express';
import jwt from 'jsonwebtoken';
import { ForbiddenError } from '../errors/AppError';

/** Verified identity; `sub` is the farmer identifier. */
export interface AuthenticatedFarmer {
  sub: string;
  iat?: number;
  exp?: number;
}

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      user?: AuthenticatedFarmer;
    }
  }
}

/**
 * Verify the Bearer token issued by the identity provider. The token's
 * subject is trusted as the farmer id from here on.
 */
export function requireJwt(secret: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;

    if (!authHeader?.startsWith('Bearer ')) {
      res.status(401).json({ error: 'Missing or malformed Authorization header' });
      return;
    }

    const token = authHeader.slice(7);

    try {
      const payload = jwt.verify(token, secret);
      if (typeof payload === 'string' || typeof payload.sub !== 'string' || payload.sub === '') {
        res.status(401).json({ error: 'Invalid token' });
        return;
      }
      req.user = { sub: payload.sub, iat: payload.iat, exp: payload.exp };
      next();
    } catch (err) {
      if (err instanceof jwt.TokenExpiredError) {
        res.status(401).json({ error: 'Token expired' });
      } else {
        res.status(401).json({ error: 'Invalid token' });
      }
    }
  };
}

/** The caller may only act on their own farmer id. Runs before any data access. */
export function requireSelf(param = 'farmerId'): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!req.user) {
      res.status(401).json({ error: 'Unauthenticated' });
      return;
    }
    if (req.user.sub !== req.params[param]) {
      next(new ForbiddenError('Not authorized to access recommendations for this farmer'));
      return;
    }
    next();
  };
}
