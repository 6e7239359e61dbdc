import { z } from "zod";
import { ComputeClientError } from "../errors.js";
import { isPlainObject } from "../http/requestExecutor.js";
import type { Page } from "../types.js";

const numericId = z.union([z.string(), z.number()]);

const serverSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    status: z.string().optional(),
    tenant_id: z.string().optional(),
    user_id: z.string().optional(),
    key_name: z.string().nullish(),
    created: z.string().optional(),
    updated: z.string().optional(),
    flavor: z.object({ id: z.string().optional() }).passthrough().optional(),
    image: z
      .union([z.object({ id: z.string() }).passthrough(), z.literal("")])
      .optional(),
    addresses: z
      .record(
        z.array(
          z
            .object({ addr: z.string(), version: z.number().optional() })
            .passthrough(),
        ),
      )
      .optional(),
  })
  .passthrough();

const flavorSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    ram: z.number(),
    disk: z.number(),
    vcpus: z.number(),
    swap: z.union([z.number(), z.literal("")]).optional(),
    rxtx_factor: z.number().optional(),
    "OS-FLV-EXT-DATA:ephemeral": z.number().optional(),
    "os-flavor-access:is_public": z.boolean().optional(),
  })
  .passthrough();

const keypairSchema = z
  .object({
    name: z.string(),
    fingerprint: z.string(),
    public_key: z.string().optional(),
    type: z.string().optional(),
  })
  .passthrough();

const imageSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    status: z.string().optional(),
    server: z.object({ id: z.string() }).passthrough().optional(),
  })
  .passthrough();

const networkSchema = z
  .object({
    id: z.string(),
    label: z.string(),
    cidr: z.string().nullish(),
  })
  .passthrough();

const securityGroupSchema = z
  .object({
    id: numericId,
    name: z.string(),
    description: z.string().nullish(),
  })
  .passthrough();

const hypervisorSchema = z
  .object({
    id: numericId,
    hypervisor_hostname: z.string(),
    state: z.string().optional(),
    status: z.string().optional(),
  })
  .passthrough();

export type Server = z.infer<typeof serverSchema>;
export type Flavor = z.infer<typeof flavorSchema>;
export type Keypair = z.infer<typeof keypairSchema>;
export type Image = z.infer<typeof imageSchema>;
export type Network = z.infer<typeof networkSchema>;
export type SecurityGroup = z.infer<typeof securityGroupSchema>;
export type Hypervisor = z.infer<typeof hypervisorSchema>;

export interface ResourceMap {
  servers: Server;
  flavors: Flavor;
  keypairs: Keypair;
  images: Image;
  networks: Network;
  "security-groups": SecurityGroup;
  hypervisors: Hypervisor;
}

export type ResourceType = keyof ResourceMap;

export type ResourceRecord = ResourceMap[ResourceType];

export interface ResourceDefinition<T> {
  /** Path below the versioned compute endpoint. */
  readonly path: string;
  /** Key of the array in the response body; `<key>_links` holds paging links. */
  readonly collectionKey: string;
  readonly entry: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export const RESOURCES: {
  readonly [K in ResourceType]: ResourceDefinition<ResourceMap[K]>;
} = {
  servers: {
    path: "servers/detail",
    collectionKey: "servers",
    entry: serverSchema,
  },
  flavors: {
    path: "flavors/detail",
    collectionKey: "flavors",
    entry: flavorSchema,
  },
  keypairs: {
    path: "os-keypairs",
    collectionKey: "keypairs",
    // each entry arrives wrapped as {"keypair": {...}}
    entry: z
      .object({ keypair: keypairSchema })
      .transform((wrapped) => wrapped.keypair),
  },
  images: {
    path: "images/detail",
    collectionKey: "images",
    entry: imageSchema,
  },
  networks: {
    path: "os-networks",
    collectionKey: "networks",
    entry: networkSchema,
  },
  "security-groups": {
    path: "os-security-groups",
    collectionKey: "security_groups",
    entry: securityGroupSchema,
  },
  hypervisors: {
    path: "os-hypervisors",
    collectionKey: "hypervisors",
    entry: hypervisorSchema,
  },
};

export const RESOURCE_TYPES = Object.keys(RESOURCES).filter(isResourceType);

const linksSchema = z.array(
  z.object({ rel: z.string(), href: z.string() }).passthrough(),
);

export function isResourceType(value: string): value is ResourceType {
  return Object.prototype.hasOwnProperty.call(RESOURCES, value);
}

export function requireResourceType(value: string): ResourceType {
  if (!isResourceType(value)) {
    throw new ComputeClientError(
      "RESOURCE_NOT_SUPPORTED",
      `Unsupported resource type '${value}'`,
      { supported: RESOURCE_TYPES },
    );
  }
  return value;
}

export function decodePage<T>(
  definition: ResourceDefinition<T>,
  body: unknown,
): Page<T> {
  const key = definition.collectionKey;
  if (!isPlainObject(body) || !Array.isArray(body[key])) {
    throw new ComputeClientError(
      "REQUEST_ERROR",
      `Response body has no '${key}' collection`,
      { path: definition.path },
    );
  }

  const items = z.array(definition.entry).safeParse(body[key]);
  if (!items.success) {
    throw new ComputeClientError(
      "REQUEST_ERROR",
      `Could not decode '${key}' collection`,
      { path: definition.path, issues: items.error.issues },
    );
  }

  const links = linksSchema.safeParse(body[`${key}_links`]);
  const next = links.success
    ? links.data.find((link) => link.rel === "next")?.href
    : undefined;

  return next === undefined ? { items: items.data } : { items: items.data, next };
}
