import nock from "nock";
import { afterEach, describe, expect, it } from "vitest";
import { SessionManager } from "../src/auth/sessionManager.js";
import {
  ComputeClient,
  microversionHeaders,
  resolvePageLink,
  versionedEndpoint,
} from "../src/compute/client.js";
import { ComputeClientError } from "../src/errors.js";
import {
  COMPUTE_A,
  COMPUTE_A_ORIGIN,
  COMPUTE_B_ORIGIN,
  COMPUTE_PATH,
  makeContext,
  mockTokenIssue,
} from "./helpers/identity.js";

const JSON_HEADERS = { "content-type": "application/json" };

afterEach(() => {
  nock.abortPendingRequests();
  nock.cleanAll();
});

function flavor(id: string): Record<string, unknown> {
  return { id, name: `m1.${id}`, ram: 512, disk: 1, vcpus: 1 };
}

describe("ComputeClient.list", () => {
  it("follows next links across pages", async () => {
    mockTokenIssue();
    const compute = nock(COMPUTE_A_ORIGIN)
      .get(`${COMPUTE_PATH}/flavors/detail`)
      .matchHeader("x-auth-token", "token-1")
      .matchHeader("x-openstack-nova-api-version", "2.1")
      .matchHeader("openstack-api-version", "compute 2.1")
      .reply(
        200,
        {
          flavors: [flavor("1")],
          flavors_links: [
            { rel: "next", href: `${COMPUTE_A}/flavors/detail?marker=1` },
          ],
        },
        JSON_HEADERS,
      )
      .get(`${COMPUTE_PATH}/flavors/detail`)
      .query({ marker: "1" })
      .matchHeader("x-auth-token", "token-1")
      .reply(200, { flavors: [flavor("2")] }, JSON_HEADERS);

    const client = new ComputeClient({ context: makeContext() });
    const flavors = await client.list("flavors").toArray();

    expect(flavors.map((item) => item.id)).toEqual(["1", "2"]);
    expect(flavors[0]).toEqual(flavor("1"));
    expect(compute.isDone()).toBe(true);
  });

  it("sends query parameters on the first page", async () => {
    mockTokenIssue();
    nock(COMPUTE_A_ORIGIN)
      .get(`${COMPUTE_PATH}/servers/detail`)
      .query({ limit: "1", marker: "abc" })
      .reply(
        200,
        { servers: [{ id: "srv-1", name: "web" }] },
        JSON_HEADERS,
      );

    const client = new ComputeClient({ context: makeContext() });
    const servers = await client
      .list("servers", { limit: 1, marker: "abc" })
      .toArray();

    expect(servers).toEqual([{ id: "srv-1", name: "web" }]);
  });

  it("uses the endpoint of the configured region", async () => {
    mockTokenIssue();
    nock(COMPUTE_B_ORIGIN)
      .get(`${COMPUTE_PATH}/os-networks`)
      .reply(
        200,
        { networks: [{ id: "net-1", label: "private", cidr: "10.0.0.0/24" }] },
        JSON_HEADERS,
      );

    const client = new ComputeClient({
      context: makeContext({ regionName: "B" }),
    });

    expect(await client.list("networks").toArray()).toEqual([
      { id: "net-1", label: "private", cidr: "10.0.0.0/24" },
    ]);
  });

  it("unwraps keypair entries", async () => {
    mockTokenIssue();
    nock(COMPUTE_A_ORIGIN)
      .get(`${COMPUTE_PATH}/os-keypairs`)
      .reply(
        200,
        {
          keypairs: [
            {
              keypair: {
                name: "default",
                fingerprint: "aa:bb",
                type: "ssh",
                public_key: "ssh-rsa test-key",
              },
            },
          ],
        },
        JSON_HEADERS,
      );

    const client = new ComputeClient({ context: makeContext() });

    expect(await client.list("keypairs").toArray()).toEqual([
      {
        name: "default",
        fingerprint: "aa:bb",
        type: "ssh",
        public_key: "ssh-rsa test-key",
      },
    ]);
  });

  it("omits microversion headers for a bare major version", async () => {
    mockTokenIssue();
    nock(COMPUTE_A_ORIGIN, {
      badheaders: ["x-openstack-nova-api-version", "openstack-api-version"],
    })
      .get(`${COMPUTE_PATH}/os-hypervisors`)
      .reply(
        200,
        { hypervisors: [{ id: 1, hypervisor_hostname: "node-1" }] },
        JSON_HEADERS,
      );

    const client = new ComputeClient({
      context: makeContext({ computeApiVersion: "2" }),
    });

    expect(await client.list("hypervisors").toArray()).toEqual([
      { id: 1, hypervisor_hostname: "node-1" },
    ]);
  });

  it("reuses the session token across listings", async () => {
    const identity = mockTokenIssue();
    nock(COMPUTE_A_ORIGIN)
      .get(`${COMPUTE_PATH}/os-security-groups`)
      .twice()
      .matchHeader("x-auth-token", "token-1")
      .reply(
        200,
        {
          security_groups: [
            { id: 1, name: "default", description: "Default group" },
          ],
        },
        JSON_HEADERS,
      );

    const client = new ComputeClient({ context: makeContext() });
    const collection = client.list("security-groups");

    expect(await collection.toArray()).toHaveLength(1);
    expect(await collection.toArray()).toHaveLength(1);
    expect(identity.isDone()).toBe(true);
  });

  it("authenticates again once the token nears expiry", async () => {
    const expires = "2030-01-01T00:00:00Z";
    let now = Date.parse(expires) - 120_000;
    const sessions = new SessionManager({ now: () => now });
    const client = new ComputeClient({ context: makeContext(), sessions });

    mockTokenIssue("token-1", expires);
    nock(COMPUTE_A_ORIGIN)
      .get(`${COMPUTE_PATH}/images/detail`)
      .matchHeader("x-auth-token", "token-1")
      .reply(200, { images: [] }, JSON_HEADERS);
    expect(await client.list("images").toArray()).toEqual([]);

    now = Date.parse(expires) - 30_000;
    const refresh = mockTokenIssue("token-2", "2031-01-01T00:00:00Z");
    nock(COMPUTE_A_ORIGIN)
      .get(`${COMPUTE_PATH}/images/detail`)
      .matchHeader("x-auth-token", "token-2")
      .reply(200, { images: [] }, JSON_HEADERS);
    expect(await client.list("images").toArray()).toEqual([]);
    expect(refresh.isDone()).toBe(true);
  });

  it("re-authenticates once after a 401", async () => {
    mockTokenIssue("token-1");
    mockTokenIssue("token-2");
    const compute = nock(COMPUTE_A_ORIGIN)
      .get(`${COMPUTE_PATH}/servers/detail`)
      .matchHeader("x-auth-token", "token-1")
      .reply(401, { error: "expired" }, JSON_HEADERS)
      .get(`${COMPUTE_PATH}/servers/detail`)
      .matchHeader("x-auth-token", "token-2")
      .reply(200, { servers: [{ id: "srv-1", name: "web" }] }, JSON_HEADERS);

    const client = new ComputeClient({ context: makeContext() });

    expect(await client.list("servers").toArray()).toEqual([
      { id: "srv-1", name: "web" },
    ]);
    expect(compute.isDone()).toBe(true);
  });

  it("fails with UNAUTHORIZED when the retry is rejected too", async () => {
    mockTokenIssue("token-1");
    mockTokenIssue("token-2");
    nock(COMPUTE_A_ORIGIN)
      .get(`${COMPUTE_PATH}/servers/detail`)
      .twice()
      .reply(401, { error: "denied" }, JSON_HEADERS);

    const client = new ComputeClient({ context: makeContext() });

    await expect(client.list("servers").toArray()).rejects.toMatchObject({
      code: "UNAUTHORIZED",
      details: {
        url: `${COMPUTE_A}/servers/detail`,
        body: { error: "denied" },
      },
    });
  });

  it("maps server errors to TRANSIENT_REQUEST_ERROR", async () => {
    mockTokenIssue();
    nock(COMPUTE_A_ORIGIN)
      .get(`${COMPUTE_PATH}/flavors/detail`)
      .reply(503, "unavailable", { "content-type": "text/plain" });

    const client = new ComputeClient({ context: makeContext() });
    const error: unknown = await client
      .list("flavors")
      .toArray()
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ComputeClientError);
    expect(error).toMatchObject({
      code: "TRANSIENT_REQUEST_ERROR",
      message: "Compute service error (HTTP 503)",
      details: { status: 503, body: "unavailable" },
    });
    expect(error instanceof ComputeClientError && error.transient).toBe(true);
  });

  it("maps other client errors to REQUEST_ERROR", async () => {
    mockTokenIssue();
    nock(COMPUTE_A_ORIGIN)
      .get(`${COMPUTE_PATH}/os-networks`)
      .reply(404, { itemNotFound: { code: 404 } }, JSON_HEADERS);

    const client = new ComputeClient({ context: makeContext() });

    await expect(client.list("networks").toArray()).rejects.toMatchObject({
      code: "REQUEST_ERROR",
      message: "Compute request failed (HTTP 404)",
      details: { status: 404 },
    });
  });

  it("rejects a body without the collection key", async () => {
    mockTokenIssue();
    nock(COMPUTE_A_ORIGIN)
      .get(`${COMPUTE_PATH}/servers/detail`)
      .reply(200, { items: [] }, JSON_HEADERS);

    const client = new ComputeClient({ context: makeContext() });

    await expect(client.list("servers").toArray()).rejects.toMatchObject({
      code: "REQUEST_ERROR",
      message: "Response body has no 'servers' collection",
    });
  });

  it("rejects unknown resource types before any request", () => {
    const client = new ComputeClient({ context: makeContext() });

    expect(() => client.list("volumes")).toThrow(
      expect.objectContaining({
        code: "RESOURCE_NOT_SUPPORTED",
        message: "Unsupported resource type 'volumes'",
      }),
    );
  });

  it("resolves relative next links against the endpoint", async () => {
    mockTokenIssue();
    const compute = nock(COMPUTE_A_ORIGIN)
      .get(`${COMPUTE_PATH}/images/detail`)
      .reply(
        200,
        {
          images: [{ id: "img-1", name: "cirros" }],
          images_links: [{ rel: "next", href: "images/detail?marker=img-1" }],
        },
        JSON_HEADERS,
      )
      .get(`${COMPUTE_PATH}/images/detail`)
      .query({ marker: "img-1" })
      .reply(200, { images: [{ id: "img-2", name: "fedora" }] }, JSON_HEADERS);

    const client = new ComputeClient({ context: makeContext() });
    const images = await client.list("images").toArray();

    expect(images.map((item) => item.id)).toEqual(["img-1", "img-2"]);
    expect(compute.isDone()).toBe(true);
  });

  it("rejects an unparseable next link", async () => {
    mockTokenIssue();
    nock(COMPUTE_A_ORIGIN)
      .get(`${COMPUTE_PATH}/images/detail`)
      .reply(
        200,
        {
          images: [{ id: "img-1", name: "cirros" }],
          images_links: [{ rel: "next", href: "https://bad host/images" }],
        },
        JSON_HEADERS,
      );

    const client = new ComputeClient({ context: makeContext() });

    await expect(client.list("images").toArray()).rejects.toMatchObject({
      code: "REQUEST_ERROR",
      message: "Compute service returned an invalid pagination link",
      details: { href: "https://bad host/images" },
    });
  });

  it("lists from the bypass URL", async () => {
    mockTokenIssue();
    nock("https://bypass.example.com")
      .get("/v2.1/tenant-1/os-networks")
      .matchHeader("x-auth-token", "token-1")
      .reply(200, { networks: [] }, JSON_HEADERS);

    const client = new ComputeClient({
      context: makeContext({
        bypassUrl: "https://bypass.example.com/v2.1/tenant-1",
      }),
    });

    expect(await client.list("networks").toArray()).toEqual([]);
  });

  it("reports each round trip to onTiming", async () => {
    mockTokenIssue();
    nock(COMPUTE_A_ORIGIN)
      .get(`${COMPUTE_PATH}/os-networks`)
      .reply(200, { networks: [] }, JSON_HEADERS);

    const calls: string[] = [];
    const client = new ComputeClient({
      context: makeContext(),
      onTiming: (timing) => calls.push(`${timing.method} ${timing.url}`),
    });
    await client.list("networks").toArray();

    expect(calls).toEqual([
      "POST https://identity.example.com/v2.0/tokens",
      `GET ${COMPUTE_A}/os-networks`,
    ]);
  });

  it("stops paging once the limit is reached", async () => {
    mockTokenIssue();
    const compute = nock(COMPUTE_A_ORIGIN)
      .get(`${COMPUTE_PATH}/flavors/detail`)
      .reply(
        200,
        {
          flavors: [flavor("1"), flavor("2")],
          flavors_links: [
            { rel: "next", href: `${COMPUTE_A}/flavors/detail?marker=2` },
          ],
        },
        JSON_HEADERS,
      )
      .get(`${COMPUTE_PATH}/flavors/detail`)
      .query({ marker: "2" })
      .reply(200, { flavors: [flavor("3")] }, JSON_HEADERS);

    const client = new ComputeClient({ context: makeContext() });
    const flavors = await client.list("flavors").toArray(1);

    expect(flavors.map((item) => item.id)).toEqual(["1"]);
    expect(compute.pendingMocks()).toHaveLength(1);
  });
});

describe("versionedEndpoint", () => {
  it("keeps a URL that already names a version", () => {
    expect(versionedEndpoint(COMPUTE_A, "2.60")).toBe(COMPUTE_A);
    expect(versionedEndpoint("https://c.example.com/v2", "2.1")).toBe(
      "https://c.example.com/v2",
    );
  });

  it("appends the API version when missing", () => {
    expect(versionedEndpoint("https://c.example.com/compute/", "2.60")).toBe(
      "https://c.example.com/compute/v2.1",
    );
    expect(versionedEndpoint("https://c.example.com", "2")).toBe(
      "https://c.example.com/v2",
    );
  });
});

describe("resolvePageLink", () => {
  it("keeps absolute links and resolves relative ones", () => {
    const base = `${COMPUTE_A}/`;
    expect(resolvePageLink(`${COMPUTE_A}/servers/detail?marker=a`, base)).toBe(
      `${COMPUTE_A}/servers/detail?marker=a`,
    );
    expect(resolvePageLink("servers/detail?marker=a", base)).toBe(
      `${COMPUTE_A}/servers/detail?marker=a`,
    );
    expect(resolvePageLink("/v2.1/other/servers", base)).toBe(
      `${COMPUTE_A_ORIGIN}/v2.1/other/servers`,
    );
  });
});

describe("microversionHeaders", () => {
  it("sends both headers for X.Y versions", () => {
    expect(microversionHeaders("2.53")).toEqual({
      "x-openstack-nova-api-version": "2.53",
      "openstack-api-version": "compute 2.53",
    });
    expect(microversionHeaders("2")).toEqual({});
  });
});
