import jwt from 'jsonwebtoken';
import { AuthService } from '../services/authService';

describe('AuthService', () => {
  const secret = 'test-secret-for-jwt-signing';
  const auth = new AuthService(secret);

  it('should verify tokens signed with the shared secret', () => {
    const token = jwt.sign({ userId: 'agent-1', email: 'agent@example.com' }, secret, { expiresIn: '15m' });

    expect(auth.verifyAccessToken(token)).toEqual({ userId: 'agent-1', email: 'agent@example.com' });
  });

  it('should reject tokens signed with another secret', () => {
    const token = jwt.sign({ userId: 'agent-1', email: 'agent@example.com' }, 'other-test-secret-value');

    expect(() => auth.verifyAccessToken(token)).toThrow('Invalid access token');
  });

  it('should report expired tokens', () => {
    const token = jwt.sign({ userId: 'agent-1', email: 'agent@example.com', exp: 1 }, secret);

    expect(() => auth.verifyAccessToken(token)).toThrow('Access token has expired');
  });

  it('should reject tokens without an agent identity', () => {
    const token = jwt.sign({ sub: 'agent-1' }, secret);

    expect(() => auth.verifyAccessToken(token)).toThrow('Invalid access token');
  });

  it('should reject garbage', () => {
    expect(() => auth.verifyAccessToken('not-a-token')).toThrow('Invalid access token');
  });
});
