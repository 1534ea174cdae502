import { RequestHandler } from 'express';
import { timingSafeEqual } from 'crypto';

export type BasicCredentials = { username: string; password: string };

const REALM = 'Attendance';

export function parseBasicAuth(header: string | undefined): BasicCredentials | null {
  if (!header || !header.startsWith('Basic ')) return null;
  const decoded = Buffer.from(header.slice(6), 'base64').toString('utf8');
  const separator = decoded.indexOf(':');
  if (separator < 0) return null;
  return { username: decoded.slice(0, separator), password: decoded.slice(separator + 1) };
}

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
}

export function basicAuth(expected: BasicCredentials): RequestHandler {
  return (req, res, next) => {
    const given = parseBasicAuth(req.headers.authorization);
    if (
      given === null ||
      !safeEqual(given.username, expected.username) ||
      !safeEqual(given.password, expected.password)
    ) {
      res.setHeader('WWW-Authenticate', `Basic realm="${REALM}", charset="UTF-8"`);
      res.status(401).send('Authentication required');
      return;
    }
    next();
  };
}
