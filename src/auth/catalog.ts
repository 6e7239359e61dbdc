import { ComputeClientError } from "../errors.js";
import type { CatalogEntry, EndpointInterface } from "../types.js";

export interface EndpointFilter {
  serviceType: string;
  endpointType: EndpointInterface;
  serviceName?: string;
  regionName?: string;
}

/**
 * Picks the endpoint for a service from a catalog, keeping catalog order.
 * Regions and service names match exactly; with no region the first
 * candidate wins.
 */
export function selectEndpoint(
  catalog: readonly CatalogEntry[],
  filter: EndpointFilter,
): CatalogEntry {
  const candidates = catalog.filter(
    (entry) =>
      entry.serviceType === filter.serviceType &&
      entry.interface === filter.endpointType &&
      (filter.serviceName === undefined ||
        entry.serviceName === filter.serviceName),
  );

  if (candidates.length === 0) {
    throw new ComputeClientError(
      "ENDPOINT_NOT_FOUND",
      `No '${filter.serviceType}' endpoint with interface '${filter.endpointType}' in service catalog`,
      {
        serviceTypes: [...new Set(catalog.map((entry) => entry.serviceType))],
        ...(filter.serviceName !== undefined
          ? { serviceName: filter.serviceName }
          : {}),
      },
    );
  }

  if (filter.regionName === undefined) {
    return candidates[0];
  }

  const match = candidates.find((entry) => entry.region === filter.regionName);
  if (!match) {
    throw new ComputeClientError(
      "REGION_NOT_FOUND",
      `No '${filter.serviceType}' endpoint in region '${filter.regionName}'`,
      {
        availableRegions: [...new Set(candidates.map((entry) => entry.region))],
      },
    );
  }
  return match;
}
