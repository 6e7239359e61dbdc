import { createHash } from 'node:crypto';
import { selectEndpoint } from './catalog.js';
import { buildIdentityRequest, parseIdentityResponse } from './identity.js';
import { ComputeClientError } from '../errors.js';
import {
  executeJsonRequest,
  responseBodyForError,
} from '../http/requestExecutor.js';
import type {
  AuthContext,
  CatalogEntry,
  LogFn,
  TimingFn,
  Token,
} from '../types.js';

const TOKEN_EXPIRY_SAFETY_MS = 60_000;
const DEFAULT_TOKEN_LIFETIME_MS = 3_600_000;

export interface SessionManagerOptions {
  timeoutMs?: number;
  log?: LogFn;
  onTiming?: TimingFn;
  /** Clock used for expiry checks, in epoch milliseconds. */
  now?: () => number;
}

export class SessionManager {
  private readonly cache = new Map<string, Token>();
  private readonly pending = new Map<string, Promise<Token>>();
  /** Keys whose pre-issued token has already been handed out. */
  private readonly seeded = new Set<string>();
  private readonly now: () => number;

  constructor(private readonly options: SessionManagerOptions = {}) {
    this.now = options.now ?? (() => Date.now());
  }

  /** Returns the cached token for `ctx` while it is valid, otherwise authenticates. */
  async authenticate(ctx: AuthContext): Promise<Token> {
    const cacheKey = tokenCacheKey(ctx);
    const cached = this.cache.get(cacheKey);
    if (cached && this.isValid(cached)) {
      return cached;
    }

    if (
      ctx.authToken !== undefined &&
      ctx.bypassUrl !== undefined &&
      !this.seeded.has(cacheKey)
    ) {
      this.seeded.add(cacheKey);
      const token = preIssuedToken(ctx, ctx.authToken, ctx.bypassUrl);
      this.cache.set(cacheKey, token);
      return token;
    }

    return this.refresh(cacheKey, ctx);
  }

  /**
   * Replaces a token the compute service rejected. If another caller already
   * swapped it for a newer valid one, that token is returned instead.
   */
  async reauthenticate(ctx: AuthContext, stale: Token): Promise<Token> {
    const cacheKey = tokenCacheKey(ctx);
    const cached = this.cache.get(cacheKey);
    if (cached && cached.value !== stale.value && this.isValid(cached)) {
      return cached;
    }

    if (cached?.value === stale.value) {
      this.cache.delete(cacheKey);
    }
    return this.refresh(cacheKey, ctx);
  }

  invalidate(ctx: AuthContext): void {
    this.cache.delete(tokenCacheKey(ctx));
  }

  private isValid(token: Token): boolean {
    return token.expiresAtMs - this.now() > TOKEN_EXPIRY_SAFETY_MS;
  }

  private refresh(cacheKey: string, ctx: AuthContext): Promise<Token> {
    const inFlight = this.pending.get(cacheKey);
    if (inFlight) {
      return inFlight;
    }

    const request = this.requestToken(ctx)
      .then((token) => {
        this.cache.set(cacheKey, token);
        return token;
      })
      .finally(() => {
        this.pending.delete(cacheKey);
      });
    this.pending.set(cacheKey, request);
    return request;
  }

  private async requestToken(ctx: AuthContext): Promise<Token> {
    const identity = buildIdentityRequest(ctx);
    const response = await executeJsonRequest({
      method: 'POST',
      url: identity.url,
      body: identity.body,
      timeoutMs: this.options.timeoutMs,
      transportErrorCode: 'ENDPOINT_UNREACHABLE',
      log: this.options.log,
      onTiming: this.options.onTiming,
    });

    if (response.status < 200 || response.status >= 300) {
      throw new ComputeClientError(
        'AUTHENTICATION_FAILED',
        `Identity service rejected credentials (HTTP ${response.status})`,
        {
          authUrl: ctx.authUrl,
          status: response.status,
          body: responseBodyForError(response),
        },
      );
    }

    const grant = parseIdentityResponse(ctx, response);
    const endpoint =
      ctx.bypassUrl !== undefined
        ? bypassEndpoint(ctx, ctx.bypassUrl)
        : selectEndpoint(grant.serviceCatalog, {
            serviceType: ctx.serviceType,
            endpointType: ctx.endpointType,
            serviceName: ctx.serviceName,
            regionName: ctx.regionName,
          });

    return Object.freeze({
      value: grant.value,
      expiresAtMs: grant.expiresAtMs ?? this.now() + DEFAULT_TOKEN_LIFETIME_MS,
      projectId: grant.projectId,
      serviceCatalog: Object.freeze([...grant.serviceCatalog]),
      endpoint,
    });
  }
}

function bypassEndpoint(ctx: AuthContext, url: string): CatalogEntry {
  return {
    serviceType: ctx.serviceType,
    ...(ctx.serviceName !== undefined ? { serviceName: ctx.serviceName } : {}),
    region: ctx.regionName ?? '',
    interface: ctx.endpointType,
    url,
  };
}

// No expiry is known; it stays in use until the compute service rejects it.
function preIssuedToken(
  ctx: AuthContext,
  value: string,
  bypassUrl: string,
): Token {
  const endpoint = bypassEndpoint(ctx, bypassUrl);
  return Object.freeze({
    value,
    expiresAtMs: Number.POSITIVE_INFINITY,
    serviceCatalog: Object.freeze([endpoint]),
    endpoint,
  });
}

/** Secrets enter the key only as a digest. */
export function tokenCacheKey(ctx: AuthContext): string {
  const secrets = createHash('sha256')
    .update(ctx.password)
    .update('\0')
    .update(ctx.authToken ?? '')
    .digest('hex');

  return [
    ctx.authUrl,
    ctx.username,
    ctx.tenantName,
    ctx.regionName ?? '',
    ctx.serviceType,
    ctx.serviceName ?? '',
    ctx.endpointType,
    ctx.bypassUrl ?? '',
    secrets,
  ].join('|');
}
