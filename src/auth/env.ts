import type { AuthOverrides } from "../types.js";

export type CredentialField = keyof AuthOverrides;

export interface CredentialSource {
  field: CredentialField;
  flag: string;
  env: readonly string[];
}

export const CREDENTIAL_SOURCES: readonly CredentialSource[] = [
  { field: "authUrl", flag: "--os-auth-url", env: ["OS_AUTH_URL"] },
  { field: "username", flag: "--os-username", env: ["OS_USERNAME"] },
  { field: "password", flag: "--os-password", env: ["OS_PASSWORD"] },
  {
    field: "tenantName",
    flag: "--os-tenant-name",
    env: ["OS_TENANT_NAME", "OS_PROJECT_NAME"],
  },
  { field: "regionName", flag: "--os-region-name", env: ["OS_REGION_NAME"] },
  {
    field: "computeApiVersion",
    flag: "--os-compute-api-version",
    env: ["OS_COMPUTE_API_VERSION"],
  },
  {
    field: "endpointType",
    flag: "--os-endpoint-type",
    env: ["OS_ENDPOINT_TYPE"],
  },
  { field: "serviceType", flag: "--service-type", env: [] },
  {
    field: "serviceName",
    flag: "--service-name",
    env: ["NOVA_SERVICE_NAME"],
  },
  {
    field: "bypassUrl",
    flag: "--bypass-url",
    env: ["NOVACLIENT_BYPASS_URL"],
  },
  { field: "authToken", flag: "--os-token", env: ["OS_TOKEN", "OS_AUTH_TOKEN"] },
];

export function sourceFor(field: CredentialField): CredentialSource {
  const source = CREDENTIAL_SOURCES.find((item) => item.field === field);
  if (!source) {
    throw new Error(`No credential source registered for '${field}'`);
  }
  return source;
}

/** Treats empty and whitespace-only strings as unset. */
export function presentValue(value: string | undefined): string | undefined {
  if (value === undefined || value.trim().length === 0) {
    return undefined;
  }
  return value;
}

export function readCredentialEnv(
  env: NodeJS.ProcessEnv = process.env,
): AuthOverrides {
  const out: AuthOverrides = {};
  for (const source of CREDENTIAL_SOURCES) {
    for (const name of source.env) {
      const value = presentValue(env[name]);
      if (value !== undefined) {
        out[source.field] = value;
        break;
      }
    }
  }
  return out;
}
