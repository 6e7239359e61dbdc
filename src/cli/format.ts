import type { ResourceMap, ResourceType, Server } from "../compute/resources.js";
import type { RequestTiming } from "../types.js";

export interface Column<T> {
  header: string;
  value: (item: T) => string;
}

function text(value: unknown): string {
  if (value === undefined || value === null) {
    return "";
  }
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return JSON.stringify(value);
}

function networks(server: Server): string {
  return Object.entries(server.addresses ?? {})
    .map(([name, addresses]) =>
      `${name}=${addresses.map((address) => address.addr).join(", ")}`,
    )
    .join("; ");
}

export const COLUMNS: { readonly [K in ResourceType]: Column<ResourceMap[K]>[] } = {
  servers: [
    { header: "ID", value: (item) => item.id },
    { header: "Name", value: (item) => item.name },
    { header: "Status", value: (item) => text(item.status) },
    { header: "Networks", value: networks },
  ],
  flavors: [
    { header: "ID", value: (item) => item.id },
    { header: "Name", value: (item) => item.name },
    { header: "Memory_MB", value: (item) => text(item.ram) },
    { header: "Disk", value: (item) => text(item.disk) },
    {
      header: "Ephemeral",
      value: (item) => text(item["OS-FLV-EXT-DATA:ephemeral"]),
    },
    { header: "Swap", value: (item) => text(item.swap) },
    { header: "VCPUs", value: (item) => text(item.vcpus) },
    { header: "RXTX_Factor", value: (item) => text(item.rxtx_factor) },
    {
      header: "Is_Public",
      value: (item) => text(item["os-flavor-access:is_public"]),
    },
  ],
  keypairs: [
    { header: "Name", value: (item) => item.name },
    { header: "Type", value: (item) => text(item.type) },
    { header: "Fingerprint", value: (item) => item.fingerprint },
  ],
  images: [
    { header: "ID", value: (item) => item.id },
    { header: "Name", value: (item) => item.name },
    { header: "Status", value: (item) => text(item.status) },
    { header: "Server", value: (item) => text(item.server?.id) },
  ],
  networks: [
    { header: "ID", value: (item) => item.id },
    { header: "Label", value: (item) => item.label },
    { header: "Cidr", value: (item) => text(item.cidr) },
  ],
  "security-groups": [
    { header: "Id", value: (item) => text(item.id) },
    { header: "Name", value: (item) => item.name },
    { header: "Description", value: (item) => text(item.description) },
  ],
  hypervisors: [
    { header: "ID", value: (item) => text(item.id) },
    {
      header: "Hypervisor hostname",
      value: (item) => item.hypervisor_hostname,
    },
    { header: "State", value: (item) => text(item.state) },
    { header: "Status", value: (item) => text(item.status) },
  ],
};

export function renderTable(headers: string[], rows: string[][]): string {
  const widths = headers.map((header, index) =>
    Math.max(header.length, ...rows.map((row) => (row[index] ?? "").length)),
  );
  const border = `+${widths.map((width) => "-".repeat(width + 2)).join("+")}+`;
  const line = (cells: string[]): string =>
    `| ${widths
      .map((width, index) => (cells[index] ?? "").padEnd(width))
      .join(" | ")} |`;

  const out = [border, line(headers), border];
  if (rows.length > 0) {
    out.push(...rows.map(line), border);
  }
  return `${out.join("\n")}\n`;
}

export function renderResourceTable<K extends ResourceType>(
  type: K,
  items: readonly ResourceMap[K][],
): string {
  const columns: Column<ResourceMap[K]>[] = COLUMNS[type];
  return renderTable(
    columns.map((column) => column.header),
    items.map((item) => columns.map((column) => column.value(item))),
  );
}

function seconds(ms: number): string {
  return (ms / 1000).toFixed(3);
}

/** One row per HTTP call plus a closing total. */
export function renderTimings(timings: readonly RequestTiming[]): string {
  const rows = timings.map((timing) => [
    `${timing.method} ${timing.url}`,
    seconds(timing.elapsedMs),
  ]);
  const total = timings.reduce((sum, timing) => sum + timing.elapsedMs, 0);
  rows.push(["Total", seconds(total)]);
  return renderTable(["url", "seconds"], rows);
}
