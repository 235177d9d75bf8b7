import { createPrivateKey, randomUUID, type KeyObject } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { SignJWT } from 'jose';
import { isRecord } from '../shared/json.js';
import type { CertificateCredentials, TenantCredentials } from '../shared/types.js';
import type { TokenAudience } from './accessModes.js';
import { TraceSyncError } from './errors.js';
import { toProviderError } from './microsoftApi.js';

export interface AuthProvider {
  getAccessToken(credentials: TenantCredentials, audience: TokenAudience): Promise<string>;
}

export interface ClientCredentialsOptions {
  authorityHost: string;
  scopes: Record<TokenAudience, string>;
  /** Renew this long before the provider-reported expiry. */
  expiryWindowMs?: number;
  readKeyFile?: (filePath: string) => Promise<string>;
}

type CachedToken = { accessToken: string; expiresAtMs: number };

const CLIENT_ASSERTION_TYPE = 'urn:ietf:params:oauth:client-assertion-type:jwt-bearer';
const THUMBPRINT_PATTERN = /^[0-9a-f]{40}$/;

export const thumbprintToX5t = (thumbprint: string) => {
  const normalized = thumbprint.replace(/[\s:]/g, '').toLowerCase();
  if (!THUMBPRINT_PATTERN.test(normalized)) {
    throw new TraceSyncError('AuthenticationFailed', 'Certificate thumbprint must be a 40 character SHA-1 hex string');
  }
  return Buffer.from(normalized, 'hex').toString('base64url');
};

const loadPrivateKey = async (
  credentials: CertificateCredentials,
  readKeyFile: (filePath: string) => Promise<string>,
): Promise<KeyObject> => {
  const certificatePath = credentials.certificatePath.trim();
  if (!certificatePath) {
    throw new TraceSyncError('AuthenticationFailed', 'Certificate path is not configured');
  }
  const extension = path.extname(certificatePath).toLowerCase();
  if (extension === '.pfx' || extension === '.p12') {
    throw new TraceSyncError(
      'AuthenticationFailed',
      `PKCS#12 certificate ${certificatePath} must be converted to a PEM private key`,
    );
  }

  let pem: string;
  try {
    pem = await readKeyFile(certificatePath);
  } catch (error) {
    throw new TraceSyncError('AuthenticationFailed', `Certificate file not found: ${certificatePath}`, { cause: error });
  }

  try {
    return createPrivateKey({
      key: pem,
      format: 'pem',
      passphrase: credentials.certificatePassword || undefined,
    });
  } catch (error) {
    throw new TraceSyncError('AuthenticationFailed', `Certificate private key could not be read: ${String(error)}`, {
      cause: error,
    });
  }
};

const readTokenResponse = (payload: unknown): { accessToken: string; expiresInSeconds: number } => {
  if (!isRecord(payload) || typeof payload.access_token !== 'string' || !payload.access_token) {
    throw new TraceSyncError('UnexpectedResponse', 'Token endpoint response has no access_token');
  }
  const expiresIn = Number(payload.expires_in);
  return {
    accessToken: payload.access_token,
    expiresInSeconds: Number.isFinite(expiresIn) && expiresIn > 0 ? expiresIn : 3600,
  };
};

export const createClientCredentialsAuthProvider = (options: ClientCredentialsOptions): AuthProvider => {
  const cache = new Map<string, CachedToken>();
  const expiryWindowMs = options.expiryWindowMs ?? 5 * 60 * 1000;
  const readKeyFile = options.readKeyFile ?? ((filePath: string) => readFile(filePath, 'utf8'));

  const buildForm = async (credentials: TenantCredentials, audience: TokenAudience, tokenUrl: string) => {
    const form = new URLSearchParams({
      client_id: credentials.clientId,
      grant_type: 'client_credentials',
      scope: options.scopes[audience],
    });
    if (credentials.authMethod === 'secret') {
      if (!credentials.clientSecret) {
        throw new TraceSyncError('AuthenticationFailed', 'Client secret is not configured');
      }
      form.set('client_secret', credentials.clientSecret);
      return form;
    }

    const key = await loadPrivateKey(credentials, readKeyFile);
    const assertion = await new SignJWT({})
      .setProtectedHeader({ alg: 'RS256', typ: 'JWT', x5t: thumbprintToX5t(credentials.certificateThumbprint) })
      .setIssuer(credentials.clientId)
      .setSubject(credentials.clientId)
      .setAudience(tokenUrl)
      .setJti(randomUUID())
      .setIssuedAt()
      .setNotBefore(Math.floor(Date.now() / 1000))
      .setExpirationTime('10m')
      .sign(key);
    form.set('client_assertion_type', CLIENT_ASSERTION_TYPE);
    form.set('client_assertion', assertion);
    return form;
  };

  return {
    async getAccessToken(credentials, audience) {
      if (!credentials.directoryTenantId || !credentials.clientId) {
        throw new TraceSyncError('AuthenticationFailed', 'Directory tenant id and client id are required');
      }
      const cacheKey = `${credentials.directoryTenantId}:${credentials.clientId}:${credentials.authMethod}:${audience}`;
      const cached = cache.get(cacheKey);
      if (cached && cached.expiresAtMs - Date.now() > expiryWindowMs) {
        return cached.accessToken;
      }

      const tokenUrl = `${options.authorityHost}/${encodeURIComponent(credentials.directoryTenantId)}/oauth2/v2.0/token`;
      const form = await buildForm(credentials, audience, tokenUrl);

      let response: Response;
      try {
        response = await fetch(tokenUrl, {
          method: 'POST',
          headers: { 'Content-Type': 'application/x-www-form-urlencoded', Accept: 'application/json' },
          body: form.toString(),
        });
      } catch (error) {
        throw new TraceSyncError('TransientNetworkError', `Token request failed: ${String(error)}`, { cause: error });
      }

      const text = await response.text().catch(() => '');
      if (!response.ok) {
        const providerError = toProviderError(response, text, 'Token request');
        if (providerError.kind === 'TransientNetworkError') {
          throw providerError;
        }
        throw new TraceSyncError('AuthenticationFailed', providerError.message);
      }

      let payload: unknown;
      try {
        payload = JSON.parse(text);
      } catch (error) {
        throw new TraceSyncError('UnexpectedResponse', 'Token endpoint returned invalid JSON', { cause: error });
      }
      const token = readTokenResponse(payload);
      cache.set(cacheKey, {
        accessToken: token.accessToken,
        expiresAtMs: Date.now() + token.expiresInSeconds * 1000,
      });
      return token.accessToken;
    },
  };
};
