import { createHash } from 'node:crypto';
import type { IncomingHttpHeaders } from 'node:http';

import type { NextFunction, Request, Response } from 'express';
import type { SupabaseClient } from '@supabase/supabase-js';
import { UnauthorizedError, createComponentLogger, toError, type Logger } from '@streamscribe/stream-engine';

import { apiKeyRowSchema, type ApiKey } from '../lib/supabase.js';

export interface AuthorizedClient {
  /** Stable, non-secret key the engine uses for per-client limits. */
  clientKey: string;
  userId?: string;
  rateLimit?: number;
}

export interface AuthenticatedRequest extends Request {
  client?: AuthorizedClient;
  requestId?: string;
}

/** Decides whether a presented token may open streams. */
export interface Authorizer {
  authorize(token: string): Promise<AuthorizedClient | null>;
}

export function fingerprint(token: string): string {
  return `key_${createHash('sha256').update(token).digest('hex').slice(0, 16)}`;
}

export function extractToken(headers: IncomingHttpHeaders, url?: URL): string | undefined {
  const header = headers['x-api-key'];
  if (typeof header === 'string' && header.trim()) {
    return header.trim();
  }
  const authorization = headers.authorization;
  if (authorization?.startsWith('Bearer ')) {
    const bearer = authorization.slice('Bearer '.length).trim();
    if (bearer) {
      return bearer;
    }
  }
  const query = url?.searchParams.get('token')?.trim();
  return query ? query : undefined;
}

export class StaticKeyAuthorizer implements Authorizer {
  private readonly keys: Set<string>;

  constructor(keys: string[]) {
    this.keys = new Set(keys);
  }

  async authorize(token: string): Promise<AuthorizedClient | null> {
    return this.keys.has(token) ? { clientKey: fingerprint(token) } : null;
  }
}

export interface ApiKeyStore {
  findActiveKey(key: string): Promise<ApiKey | null>;
  touch(id: string): Promise<void>;
}

export class SupabaseApiKeyStore implements ApiKeyStore {
  constructor(private readonly client: SupabaseClient) {}

  async findActiveKey(key: string): Promise<ApiKey | null> {
    const { data, error } = await this.client
      .from('api_keys')
      .select('id, user_id, key, name, rate_limit, is_active, last_used_at')
      .eq('key', key)
      .eq('is_active', true)
      .maybeSingle();

    if (error) {
      throw new Error(`API key lookup failed: ${error.message}`);
    }
    if (!data) {
      return null;
    }
    return apiKeyRowSchema.parse(data);
  }

  async touch(id: string): Promise<void> {
    const { error } = await this.client
      .from('api_keys')
      .update({ last_used_at: new Date().toISOString() })
      .eq('id', id);
    if (error) {
      throw new Error(`Failed to update last_used_at: ${error.message}`);
    }
  }
}

interface CachedApiKey {
  client: AuthorizedClient;
  expiresAt: number;
}

export interface CachingAuthorizerOptions {
  ttlMs?: number;
  logger?: Logger;
  now?: () => number;
}

const CACHE_TTL = 5 * 60 * 1000; // 5 minutes

/** Looks keys up in the `api_keys` table and caches hits. */
export class ApiKeyAuthorizer implements Authorizer {
  private readonly cache = new Map<string, CachedApiKey>();
  private readonly ttlMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(
    private readonly store: ApiKeyStore,
    options: CachingAuthorizerOptions = {},
  ) {
    this.ttlMs = options.ttlMs ?? CACHE_TTL;
    this.logger = createComponentLogger('auth', options.logger);
    this.now = options.now ?? Date.now;
  }

  async authorize(token: string): Promise<AuthorizedClient | null> {
    const cached = this.cache.get(token);
    if (cached && cached.expiresAt > this.now()) {
      return cached.client;
    }
    this.cache.delete(token);

    const row = await this.store.findActiveKey(token);
    if (!row) {
      return null;
    }

    const client: AuthorizedClient = {
      clientKey: row.id,
      userId: row.user_id,
      rateLimit: row.rate_limit ?? undefined,
    };
    this.cache.set(token, { client, expiresAt: this.now() + this.ttlMs });

    this.store.touch(row.id).catch((error: unknown) => {
      this.logger.warn({ err: toError(error), keyId: row.id }, 'Failed to record API key usage');
    });
    return client;
  }

  invalidate(token: string): void {
    this.cache.delete(token);
  }

  pruneExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const [token, cached] of this.cache.entries()) {
      if (cached.expiresAt <= now) {
        this.cache.delete(token);
        removed += 1;
      }
    }
    return removed;
  }
}

export function apiKeyAuth(authorizer: Authorizer) {
  return (req: AuthenticatedRequest, _res: Response, next: NextFunction) => {
    const token = extractToken(req.headers);
    if (!token) {
      next(new UnauthorizedError('Missing API key'));
      return;
    }

    authorizer
      .authorize(token)
      .then((client) => {
        if (!client) {
          next(new UnauthorizedError('Invalid API key'));
          return;
        }
        req.client = client;
        next();
      })
      .catch(next);
  };
}
