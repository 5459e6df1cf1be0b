import { Request, Response, NextFunction, RequestHandler } from 'express';
import { AuthService } from '../services/authService';
import { JWTPayload } from '../types';

// Extend Express Request type to include user
declare global {
  namespace Express {
    interface Request {
      user?: JWTPayload;
    }
  }
}

/**
 * JWT authentication middleware for protected routes
 */
export const authenticateToken =
  (authService: AuthService): RequestHandler =>
  (req: Request, res: Response, next: NextFunction): void => {
    const authHeader = req.headers['authorization'];
    const token = authHeader && authHeader.split(' ')[1]; // Bearer TOKEN

    if (!token) {
      res.status(401).json({
        error: {
          code: 'UNAUTHORIZED',
          message: 'Access token is required',
          retryable: false,
        },
      });
      return;
    }

    try {
      req.user = authService.verifyAccessToken(token);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Invalid token';
      res.status(403).json({
        error: {
          code: 'FORBIDDEN',
          message,
          retryable: false,
        },
      });
      return;
    }

    next();
  };
