import { presentValue, readCredentialEnv, sourceFor } from "./env.js";
import type { CredentialField } from "./env.js";
import { ComputeClientError } from "../errors.js";
import type {
  AuthContext,
  AuthOverrides,
  EndpointInterface,
} from "../types.js";

export const DEFAULT_COMPUTE_API_VERSION = "2.1";
export const DEFAULT_SERVICE_TYPE = "compute";
export const DEFAULT_ENDPOINT_TYPE: EndpointInterface = "public";

const REQUIRED_FIELDS = [
  "authUrl",
  "username",
  "password",
  "tenantName",
] as const satisfies readonly CredentialField[];

const ENDPOINT_TYPE_ALIASES = new Map<string, EndpointInterface>([
  ["public", "public"],
  ["publicurl", "public"],
  ["internal", "internal"],
  ["internalurl", "internal"],
  ["admin", "admin"],
  ["adminurl", "admin"],
]);

interface ResolveAuthOptions {
  env?: NodeJS.ProcessEnv;
  /** Lowest-precedence values, typically from a config file. */
  defaults?: AuthOverrides;
}

interface MissingCredential {
  field: CredentialField;
  flag: string;
  env: string[];
}

export function resolveAuthContext(
  overrides: AuthOverrides = {},
  { env = process.env, defaults = {} }: ResolveAuthOptions = {},
): AuthContext {
  const fromEnv = readCredentialEnv(env);
  const pick = (field: CredentialField): string | undefined =>
    presentValue(overrides[field]) ??
    fromEnv[field] ??
    presentValue(defaults[field]);

  const authUrl = pick("authUrl");
  const username = pick("username");
  const password = pick("password");
  const tenantName = pick("tenantName");
  if (
    authUrl === undefined ||
    username === undefined ||
    password === undefined ||
    tenantName === undefined
  ) {
    const missing: MissingCredential[] = REQUIRED_FIELDS.filter(
      (field) => pick(field) === undefined,
    ).map((field) => {
      const source = sourceFor(field);
      return { field, flag: source.flag, env: [...source.env] };
    });
    throw new ComputeClientError(
      "MISSING_CREDENTIAL",
      `Missing required credential${missing.length > 1 ? "s" : ""}: ${missing
        .map((item) => item.field)
        .join(", ")}`,
      { missing },
    );
  }

  const computeApiVersion =
    pick("computeApiVersion") ?? DEFAULT_COMPUTE_API_VERSION;
  parseApiVersion(computeApiVersion);

  const regionName = pick("regionName");
  const serviceName = pick("serviceName");
  const bypassUrl = pick("bypassUrl");
  const authToken = pick("authToken");
  if (authToken !== undefined && bypassUrl === undefined) {
    const tokenSource = sourceFor("authToken");
    const bypassSource = sourceFor("bypassUrl");
    throw new ComputeClientError(
      "CONFIG_ERROR",
      `${tokenSource.flag} requires ${bypassSource.flag}`,
      { fields: ["authToken", "bypassUrl"] },
    );
  }

  const context: AuthContext = {
    authUrl: normalizeHttpUrl(authUrl, "auth URL"),
    username,
    password,
    tenantName,
    ...(regionName !== undefined ? { regionName } : {}),
    computeApiVersion: computeApiVersion.trim(),
    endpointType: parseEndpointType(
      pick("endpointType") ?? DEFAULT_ENDPOINT_TYPE,
    ),
    serviceType: pick("serviceType") ?? DEFAULT_SERVICE_TYPE,
    ...(serviceName !== undefined ? { serviceName } : {}),
    ...(bypassUrl !== undefined
      ? { bypassUrl: normalizeHttpUrl(bypassUrl, "bypass URL") }
      : {}),
    ...(authToken !== undefined ? { authToken } : {}),
  };

  return Object.freeze(context);
}

export function parseEndpointType(value: string): EndpointInterface {
  const normalized = ENDPOINT_TYPE_ALIASES.get(value.trim().toLowerCase());
  if (!normalized) {
    throw new ComputeClientError(
      "CONFIG_ERROR",
      `Invalid endpoint type '${value}'`,
      { allowed: ["public", "internal", "admin"] },
    );
  }
  return normalized;
}

export function parseApiVersion(version: string): {
  major: number;
  minor?: number;
} {
  const match = /^(\d+)(?:\.(\d+))?$/.exec(version.trim());
  if (!match) {
    throw new ComputeClientError(
      "CONFIG_ERROR",
      `Invalid compute API version '${version}'`,
      { expected: "<major> or <major>.<minor>" },
    );
  }

  const major = Number(match[1]);
  return match[2] === undefined
    ? { major }
    : { major, minor: Number(match[2]) };
}

function normalizeHttpUrl(raw: string, label: string): string {
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    throw new ComputeClientError("CONFIG_ERROR", `Invalid ${label}: ${raw}`);
  }

  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ComputeClientError(
      "CONFIG_ERROR",
      `The ${label} must use http or https: ${raw}`,
    );
  }

  return url.toString().replace(/\/+$/, "");
}
