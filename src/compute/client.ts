import { ResourceCollection } from "./collection.js";
import { RESOURCES, decodePage, requireResourceType } from "./resources.js";
import type {
  ResourceDefinition,
  ResourceMap,
  ResourceRecord,
  ResourceType,
} from "./resources.js";
import { parseApiVersion } from "../auth/resolveAuth.js";
import { SessionManager } from "../auth/sessionManager.js";
import { ComputeClientError, describeCause } from "../errors.js";
import {
  appendQueryParams,
  executeJsonRequest,
  joinUrl,
  responseBodyForError,
} from "../http/requestExecutor.js";
import type { JsonResponse } from "../http/requestExecutor.js";
import type {
  AuthContext,
  LogFn,
  Page,
  QueryParams,
  TimingFn,
  Token,
} from "../types.js";

const VERSION_SEGMENT = /\/v\d+(?:\.\d+)?(?:\/|$)/;

export interface ComputeClientOptions {
  context: AuthContext;
  sessions?: SessionManager;
  timeoutMs?: number;
  log?: LogFn;
  onTiming?: TimingFn;
}

export class ComputeClient {
  readonly context: AuthContext;
  readonly sessions: SessionManager;
  private readonly timeoutMs?: number;
  private readonly log?: LogFn;
  private readonly onTiming?: TimingFn;

  constructor(options: ComputeClientOptions) {
    this.context = options.context;
    this.timeoutMs = options.timeoutMs;
    this.log = options.log;
    this.onTiming = options.onTiming;
    this.sessions =
      options.sessions ??
      new SessionManager({
        timeoutMs: options.timeoutMs,
        log: options.log,
        onTiming: options.onTiming,
      });
  }

  list<K extends ResourceType>(
    resourceType: K,
    query?: QueryParams,
  ): ResourceCollection<ResourceMap[K]>;
  list(
    resourceType: string,
    query?: QueryParams,
  ): ResourceCollection<ResourceRecord>;
  list(
    resourceType: string,
    query: QueryParams = {},
  ): ResourceCollection<ResourceRecord> {
    const definition: ResourceDefinition<ResourceRecord> =
      RESOURCES[requireResourceType(resourceType)];
    return this.collectionFor(definition, { ...query });
  }

  /** Builds the first-page URL for a resource against a compute endpoint. */
  collectionUrl(endpointUrl: string, path: string, query: QueryParams): URL {
    const url = new URL(
      joinUrl(
        versionedEndpoint(endpointUrl, this.context.computeApiVersion),
        path,
      ),
    );
    appendQueryParams(url, query);
    return url;
  }

  private collectionFor<T>(
    definition: ResourceDefinition<T>,
    query: QueryParams,
  ): ResourceCollection<T> {
    // cursors are always absolute; relative links are resolved below
    return new ResourceCollection<T>(async (cursor): Promise<Page<T>> => {
      const { body, token } = await this.getJson((current) =>
        cursor === undefined
          ? this.collectionUrl(current.endpoint.url, definition.path, query)
          : new URL(cursor),
      );
      const page = decodePage(definition, body);
      if (page.next === undefined) {
        return page;
      }

      const base = `${versionedEndpoint(
        token.endpoint.url,
        this.context.computeApiVersion,
      ).replace(/\/+$/, "")}/`;
      return { items: page.items, next: resolvePageLink(page.next, base) };
    });
  }

  /**
   * GET with the session token. A 401 triggers one re-authentication and
   * one retry; a second 401 is surfaced as UNAUTHORIZED.
   */
  private async getJson(
    urlFor: (token: Token) => URL,
  ): Promise<{ body: unknown; token: Token }> {
    let token = await this.sessions.authenticate(this.context);
    let url = urlFor(token);
    let response = await this.send(url, token);

    if (response.status === 401) {
      token = await this.sessions.reauthenticate(this.context, token);
      url = urlFor(token);
      response = await this.send(url, token);
      if (response.status === 401) {
        throw new ComputeClientError(
          "UNAUTHORIZED",
          "Compute service rejected the token after re-authentication",
          { url: url.toString(), body: responseBodyForError(response) },
        );
      }
    }

    if (response.status >= 500) {
      throw new ComputeClientError(
        "TRANSIENT_REQUEST_ERROR",
        `Compute service error (HTTP ${response.status})`,
        {
          url: url.toString(),
          status: response.status,
          body: responseBodyForError(response),
        },
      );
    }

    if (response.status < 200 || response.status >= 300) {
      throw new ComputeClientError(
        "REQUEST_ERROR",
        `Compute request failed (HTTP ${response.status})`,
        {
          url: url.toString(),
          status: response.status,
          body: responseBodyForError(response),
        },
      );
    }

    if (response.bodyType !== "json") {
      throw new ComputeClientError(
        "REQUEST_ERROR",
        "Compute service returned a non-JSON body",
        { url: url.toString(), bodyType: response.bodyType },
      );
    }

    return { body: response.bodyJson, token };
  }

  private send(url: URL, token: Token): Promise<JsonResponse> {
    return executeJsonRequest({
      method: "GET",
      url,
      headers: {
        "x-auth-token": token.value,
        ...microversionHeaders(this.context.computeApiVersion),
      },
      timeoutMs: this.timeoutMs,
      transportErrorCode: "TRANSIENT_REQUEST_ERROR",
      log: this.log,
      onTiming: this.onTiming,
    });
  }
}

/**
 * Appends `/v{major}` (or `/v{major}.1` for microversioned APIs) unless the
 * catalog URL already carries a version segment.
 */
export function versionedEndpoint(
  endpointUrl: string,
  apiVersion: string,
): string {
  const url = new URL(endpointUrl);
  if (VERSION_SEGMENT.test(url.pathname)) {
    return endpointUrl;
  }

  const { major, minor } = parseApiVersion(apiVersion);
  return joinUrl(
    endpointUrl,
    minor === undefined ? `v${major}` : `v${major}.1`,
  );
}

/** Resolves a paging link against the versioned endpoint `base`. */
export function resolvePageLink(href: string, base: string): string {
  try {
    return new URL(href, base).toString();
  } catch (error) {
    throw new ComputeClientError(
      "REQUEST_ERROR",
      "Compute service returned an invalid pagination link",
      { href, cause: describeCause(error) },
    );
  }
}

export function microversionHeaders(
  apiVersion: string,
): Record<string, string> {
  const { minor } = parseApiVersion(apiVersion);
  if (minor === undefined) {
    return {};
  }
  return {
    "x-openstack-nova-api-version": apiVersion,
    "openstack-api-version": `compute ${apiVersion}`,
  };
}
