import type { Request, RequestHandler } from 'express';
import { auth } from 'express-oauth2-jwt-bearer';
import jwt from 'jsonwebtoken';

export const WRITE_SCOPE = 'tournaments:write';

const audience = process.env.AUTH0_AUDIENCE;
const domain = process.env.AUTH0_DOMAIN;
const authProvider = (process.env.AUTH_PROVIDER ?? 'AUTH0').toUpperCase();

const devSharedSecret = process.env.AUTH_DEV_SHARED_SECRET;
const devAudience = process.env.AUTH_DEV_AUDIENCE ?? audience;
const devIssuer = process.env.AUTH_DEV_ISSUER;

const configuredAuth0 = Boolean(audience && domain);
const configuredDev = authProvider === 'DEV' && Boolean(devSharedSecret);

const AUTH_DISABLED = process.env.AUTH_DISABLE === '1' || (!configuredAuth0 && !configuredDev);

const devPayloads = new WeakMap<Request, jwt.JwtPayload>();

const createDevJwtMiddleware = (secret: string): RequestHandler => (req, res, next) => {
  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    return res.status(401).send({ error: 'missing_token', message: 'Authorization header missing bearer token.' });
  }

  const token = authHeader.slice('Bearer '.length);

  try {
    const verifyOptions: jwt.VerifyOptions = {
      algorithms: ['HS256'],
    };
    if (devAudience) verifyOptions.audience = devAudience;
    if (devIssuer) verifyOptions.issuer = devIssuer;

    const payload = jwt.verify(token, secret, verifyOptions);
    if (typeof payload === 'string') {
      return res.status(401).send({ error: 'invalid_token', message: 'Token payload must be a JSON object.' });
    }
    devPayloads.set(req, payload);
    return next();
  } catch (err) {
    console.error('dev_auth_invalid_token', err instanceof Error ? err.message : err);
    return res.status(401).send({ error: 'invalid_token', message: 'Invalid or expired token.' });
  }
};

const passthrough: RequestHandler = (_req, _res, next) => next();

const jwtMiddleware: RequestHandler = AUTH_DISABLED
  ? passthrough
  : configuredDev && devSharedSecret
    ? createDevJwtMiddleware(devSharedSecret)
    : auth({
        audience,
        issuerBaseURL: `https://${domain}`,
        tokenSigningAlg: 'RS256',
      });

export const requireAuth = jwtMiddleware;

const getScopes = (req: Request): string[] => {
  const scope = req.auth?.payload.scope ?? devPayloads.get(req)?.scope;
  return typeof scope === 'string' ? scope.split(' ').filter(Boolean) : [];
};

export const hasScope = (req: Request, scope: string) => {
  if (AUTH_DISABLED) return true;
  return getScopes(req).includes(scope);
};

export const requireScope = (scope: string): RequestHandler => (req, res, next) => {
  if (AUTH_DISABLED) return next();
  if (!hasScope(req, scope)) {
    return res.status(403).send({ error: 'insufficient_scope', required: scope });
  }
  return next();
};

export const isAuthDisabled = () => AUTH_DISABLED;
