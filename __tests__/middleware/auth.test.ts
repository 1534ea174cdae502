import { NextFunction, Request, Response } from 'express';
import { basicAuth, parseBasicAuth } from '../../src/middleware/auth';

function header(credentials: string) {
  return `Basic ${Buffer.from(credentials).toString('base64')}`;
}

function mockResponse() {
  const res = {
    setHeader: jest.fn(),
    status: jest.fn(),
    send: jest.fn(),
  };
  res.status.mockReturnValue(res);
  return res;
}

function run(authorization: string | undefined) {
  const middleware = basicAuth({ username: 'admin', password: 'test-secret' });
  const req = { headers: { authorization } } as unknown as Request;
  const res = mockResponse();
  const next = jest.fn();
  middleware(req, res as unknown as Response, next as NextFunction);
  return { res, next };
}

describe('parseBasicAuth', () => {
  it('decodes username and password', () => {
    expect(parseBasicAuth(header('admin:pa:ss'))).toEqual({ username: 'admin', password: 'pa:ss' });
  });

  it('ignores other schemes and malformed values', () => {
    expect(parseBasicAuth(undefined)).toBeNull();
    expect(parseBasicAuth('Bearer abc')).toBeNull();
    expect(parseBasicAuth(header('no-separator'))).toBeNull();
  });
});

describe('basicAuth', () => {
  it('lets valid credentials through', () => {
    const { res, next } = run(header('admin:test-secret'));

    expect(next).toHaveBeenCalledTimes(1);
    expect(res.status).not.toHaveBeenCalled();
  });

  it('challenges missing credentials', () => {
    const { res, next } = run(undefined);

    expect(next).not.toHaveBeenCalled();
    expect(res.status).toHaveBeenCalledWith(401);
    expect(res.setHeader).toHaveBeenCalledWith('WWW-Authenticate', 'Basic realm="Attendance", charset="UTF-8"');
  });

  it('rejects a wrong password', () => {
    const { res, next } = run(header('admin:wrong'));

    expect(next).not.toHaveBeenCalled();
    expect(res.status).toHaveBeenCalledWith(401);
  });
});
