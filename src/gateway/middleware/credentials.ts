import { CookieOptions, Request, Response } from 'express';
import { IssuedTokens } from '../../shared/types';

export interface CredentialCookieSettings {
  accessName: string;
  refreshName: string;
  secure: boolean;
}

export interface PresentedCredentials {
  accessToken: string | null;
  refreshToken: string | null;
}

function readCookie(req: Request, name: string): string | null {
  const cookies: Record<string, unknown> = req.cookies ?? {};
  const value = cookies[name];
  return typeof value === 'string' && value ? value : null;
}

function readBearer(req: Request): string | null {
  const header = req.headers.authorization;
  if (!header || !header.startsWith('Bearer ')) {
    return null;
  }
  const token = header.slice(7).trim();
  return token || null;
}

/**
 * Credentials travel in HTTP-only cookies. A Bearer header is honoured for the
 * access token when no access cookie is present (non-browser clients).
 */
export function readCredentials(req: Request, settings: CredentialCookieSettings): PresentedCredentials {
  return {
    accessToken: readCookie(req, settings.accessName) ?? readBearer(req),
    refreshToken: readCookie(req, settings.refreshName),
  };
}

function baseOptions(settings: CredentialCookieSettings): CookieOptions {
  return {
    httpOnly: true,
    secure: settings.secure,
    sameSite: 'strict',
    path: '/',
  };
}

export function setCredentialCookies(
  res: Response,
  tokens: Pick<IssuedTokens, 'accessToken' | 'refreshToken' | 'accessExpiresAt' | 'refreshExpiresAt'>,
  settings: CredentialCookieSettings,
  now: number
): void {
  const options = baseOptions(settings);
  // The access cookie outlives its token by the refresh window so an expired token still reaches rotation
  res.cookie(settings.accessName, tokens.accessToken, {
    ...options,
    maxAge: Math.max(tokens.refreshExpiresAt - now, 0),
  });
  res.cookie(settings.refreshName, tokens.refreshToken, {
    ...options,
    maxAge: Math.max(tokens.refreshExpiresAt - now, 0),
  });
}

export function clearCredentialCookies(res: Response, settings: CredentialCookieSettings): void {
  const options = baseOptions(settings);
  res.clearCookie(settings.accessName, options);
  res.clearCookie(settings.refreshName, options);
}

/** Cookie names the forwarder must never pass downstream. */
export function credentialCookieNames(settings: CredentialCookieSettings): string[] {
  return [settings.accessName, settings.refreshName];
}
