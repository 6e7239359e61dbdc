export type EndpointInterface = 'public' | 'internal' | 'admin';

export type IdentityVersion = 'v2.0' | 'v3';

export interface AuthContext {
  readonly authUrl: string;
  readonly username: string;
  readonly password: string;
  readonly tenantName: string;
  /** When absent the first matching catalog entry is used. */
  readonly regionName?: string;
  readonly computeApiVersion: string;
  readonly endpointType: EndpointInterface;
  readonly serviceType: string;
  /** Narrows catalog lookup to one named service. */
  readonly serviceName?: string;
  /** Compute endpoint used instead of the service catalog. */
  readonly bypassUrl?: string;
  /** Pre-issued token, only honoured together with `bypassUrl`. */
  readonly authToken?: string;
}

export interface AuthOverrides {
  authUrl?: string;
  username?: string;
  password?: string;
  tenantName?: string;
  regionName?: string;
  computeApiVersion?: string;
  endpointType?: string;
  serviceType?: string;
  serviceName?: string;
  bypassUrl?: string;
  authToken?: string;
}

export interface FileConfig extends AuthOverrides {
  version: 1;
  timeoutMs?: number;
}

export interface CatalogEntry {
  readonly serviceType: string;
  readonly serviceName?: string;
  readonly region: string;
  readonly interface: EndpointInterface;
  readonly url: string;
}

export interface Token {
  readonly value: string;
  readonly expiresAtMs: number;
  readonly projectId?: string;
  readonly serviceCatalog: readonly CatalogEntry[];
  readonly endpoint: CatalogEntry;
}

export type QueryValue =
  | string
  | number
  | boolean
  | ReadonlyArray<string | number>
  | undefined;

export type QueryParams = Record<string, QueryValue>;

export interface Page<T> {
  readonly items: readonly T[];
  readonly next?: string;
}

export type LogFn = (line: string) => void;

export interface RequestTiming {
  method: string;
  url: string;
  elapsedMs: number;
}

export type TimingFn = (timing: RequestTiming) => void;
