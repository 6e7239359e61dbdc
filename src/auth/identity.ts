import { z } from 'zod';
import { ComputeClientError } from '../errors.js';
import { joinUrl } from '../http/requestExecutor.js';
import type { JsonResponse } from '../http/requestExecutor.js';
import type {
  AuthContext,
  CatalogEntry,
  EndpointInterface,
  IdentityVersion,
} from '../types.js';

const DEFAULT_DOMAIN_ID = 'default';
const VERSION_SEGMENT = /^v\d/;

export interface IdentityRequest {
  url: URL;
  body: unknown;
}

export interface IdentityGrant {
  value: string;
  expiresAtMs?: number;
  projectId?: string;
  serviceCatalog: CatalogEntry[];
}

const v2ResponseSchema = z.object({
  access: z.object({
    token: z.object({
      id: z.string().min(1),
      expires: z.string().optional(),
      tenant: z.object({ id: z.string() }).passthrough().optional(),
    }),
    serviceCatalog: z
      .array(
        z.object({
          type: z.string(),
          name: z.string().optional(),
          endpoints: z.array(
            z.object({
              region: z.string().optional(),
              publicURL: z.string().optional(),
              internalURL: z.string().optional(),
              adminURL: z.string().optional(),
            }),
          ),
        }),
      )
      .default([]),
  }),
});

const v3ResponseSchema = z.object({
  token: z.object({
    expires_at: z.string().optional(),
    project: z.object({ id: z.string() }).passthrough().optional(),
    catalog: z
      .array(
        z.object({
          type: z.string(),
          name: z.string().optional(),
          endpoints: z.array(
            z.object({
              interface: z.enum(['public', 'internal', 'admin']),
              region: z.string().nullish(),
              region_id: z.string().nullish(),
              url: z.string(),
            }),
          ),
        }),
      )
      .default([]),
  }),
});

const V2_URL_KEYS: ReadonlyArray<[EndpointInterface, 'publicURL' | 'internalURL' | 'adminURL']> = [
  ['public', 'publicURL'],
  ['internal', 'internalURL'],
  ['admin', 'adminURL'],
];

/**
 * Picks the identity API version from the first path segment of the auth URL
 * shaped like `v<digit>...`. URLs without one are treated as v2.0.
 */
export function detectIdentityVersion(authUrl: string): {
  version: IdentityVersion;
  baseUrl: string;
} {
  const url = new URL(authUrl);
  const segment = url.pathname
    .split('/')
    .find((part) => VERSION_SEGMENT.test(part));

  if (segment === undefined) {
    return { version: 'v2.0', baseUrl: joinUrl(authUrl, 'v2.0') };
  }

  return {
    version: segment.startsWith('v3') ? 'v3' : 'v2.0',
    baseUrl: authUrl,
  };
}

export function buildIdentityRequest(ctx: AuthContext): IdentityRequest {
  const { version, baseUrl } = detectIdentityVersion(ctx.authUrl);

  if (version === 'v3') {
    return {
      url: new URL(joinUrl(baseUrl, 'auth/tokens')),
      body: {
        auth: {
          identity: {
            methods: ['password'],
            password: {
              user: {
                name: ctx.username,
                domain: { id: DEFAULT_DOMAIN_ID },
                password: ctx.password,
              },
            },
          },
          scope: {
            project: {
              name: ctx.tenantName,
              domain: { id: DEFAULT_DOMAIN_ID },
            },
          },
        },
      },
    };
  }

  return {
    url: new URL(joinUrl(baseUrl, 'tokens')),
    body: {
      auth: {
        passwordCredentials: {
          username: ctx.username,
          password: ctx.password,
        },
        tenantName: ctx.tenantName,
      },
    },
  };
}

export function parseIdentityResponse(
  ctx: AuthContext,
  response: JsonResponse,
): IdentityGrant {
  const { version } = detectIdentityVersion(ctx.authUrl);
  const body = response.bodyType === 'json' ? response.bodyJson : undefined;

  if (version === 'v3') {
    const parsed = v3ResponseSchema.safeParse(body);
    const subjectToken = response.headers['x-subject-token'];
    if (!parsed.success || !subjectToken) {
      throw malformed(ctx, parsed.success ? undefined : parsed.error.issues);
    }

    const token = parsed.data.token;
    return {
      value: subjectToken,
      expiresAtMs: parseExpiry(ctx, token.expires_at),
      projectId: token.project?.id,
      serviceCatalog: token.catalog.flatMap((service) =>
        service.endpoints.map((endpoint) => ({
          serviceType: service.type,
          serviceName: service.name,
          region: endpoint.region ?? endpoint.region_id ?? '',
          interface: endpoint.interface,
          url: endpoint.url,
        })),
      ),
    };
  }

  const parsed = v2ResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw malformed(ctx, parsed.error.issues);
  }

  const { token, serviceCatalog } = parsed.data.access;
  return {
    value: token.id,
    expiresAtMs: parseExpiry(ctx, token.expires),
    projectId: token.tenant?.id,
    serviceCatalog: serviceCatalog.flatMap((service) =>
      service.endpoints.flatMap((endpoint) =>
        V2_URL_KEYS.flatMap(([iface, key]): CatalogEntry[] => {
          const url = endpoint[key];
          if (!url) {
            return [];
          }
          return [
            {
              serviceType: service.type,
              serviceName: service.name,
              region: endpoint.region ?? '',
              interface: iface,
              url,
            },
          ];
        }),
      ),
    ),
  };
}

function parseExpiry(
  ctx: AuthContext,
  value: string | undefined,
): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    throw new ComputeClientError(
      'AUTHENTICATION_FAILED',
      'Identity service returned an unreadable token expiry',
      { authUrl: ctx.authUrl, expires: value },
    );
  }
  return ms;
}

function malformed(ctx: AuthContext, issues: unknown): ComputeClientError {
  return new ComputeClientError(
    'AUTHENTICATION_FAILED',
    'Identity service returned a malformed token response',
    { authUrl: ctx.authUrl, issues },
  );
}
