import jwt from 'jsonwebtoken';
import { JWTPayload } from '../types';

/**
 * Verifies agent access tokens signed with the shared JWT secret.
 * Shared by the REST middleware and the websocket handshake.
 */
export class AuthService {
  constructor(private readonly jwtSecret: string) {}

  /**
   * Verify access token
   */
  verifyAccessToken(token: string): JWTPayload {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.jwtSecret);
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new Error('Access token has expired');
      }
      throw new Error('Invalid access token');
    }

    if (typeof decoded === 'string' || typeof decoded.userId !== 'string' || typeof decoded.email !== 'string') {
      throw new Error('Invalid access token');
    }
    return { userId: decoded.userId, email: decoded.email };
  }
}
