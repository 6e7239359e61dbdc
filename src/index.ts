export { resolveAuthContext, parseApiVersion } from "./auth/resolveAuth.js";
export { readCredentialEnv, CREDENTIAL_SOURCES } from "./auth/env.js";
export { SessionManager } from "./auth/sessionManager.js";
export { selectEndpoint } from "./auth/catalog.js";
export { ComputeClient } from "./compute/client.js";
export { ResourceCollection, PageIterator } from "./compute/collection.js";
export { RESOURCES, RESOURCE_TYPES, isResourceType } from "./compute/resources.js";
export type * from "./compute/resources.js";
export { loadConfig } from "./config/loadConfig.js";
export { ComputeClientError, asErrorResponse } from "./errors.js";
export type { ErrorCode } from "./errors.js";
export type * from "./types.js";
