import { signToken, verifyToken } from '../tokenManager';

const options = { secret: 'test-secret', algorithm: 'HS256' as const };

describe('tokenManager', () => {
  const nowSeconds = Math.floor(Date.now() / 1000);

  it('round-trips the claims it signed', () => {
    const token = signToken({ sub: 'alice', iat: nowSeconds, exp: nowSeconds + 60 }, options);

    expect(verifyToken(token, options)).toMatchObject({ sub: 'alice', exp: nowSeconds + 60 });
  });

  it('rejects expired tokens unless expiry is ignored', () => {
    const token = signToken({ sub: 'alice', iat: nowSeconds - 120, exp: nowSeconds - 60 }, options);

    expect(() => verifyToken(token, options)).toThrow('jwt expired');
    expect(verifyToken(token, { ...options, ignoreExpiration: true }).sub).toBe('alice');
  });

  it('rejects tokens signed with another secret', () => {
    const token = signToken({ sub: 'alice', iat: nowSeconds, exp: nowSeconds + 60 }, { ...options, secret: 'other-secret' });

    expect(() => verifyToken(token, options)).toThrow('invalid signature');
  });
});
