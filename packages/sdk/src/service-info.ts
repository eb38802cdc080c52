/**
 * Static descriptions of the catalog service
 */

export const SERVICE_VERSION = "0.1.0";

export const API_FEATURES = [
  "author_catalog",
  "book_catalog",
  "many_to_many_associations",
  "referential_integrity",
  "offset_pagination",
] as const;

export interface ServiceInfo {
  message: string;
  version: string;
  status: "running";
  architecture: string;
}

export interface HealthReport {
  status: "healthy";
  service: string;
  version: string;
}

export interface ApiStatus {
  api_version: "v1";
  status: "operational";
  features: string[];
}

export function describeService(): ServiceInfo {
  return {
    message: "Bookshelf catalog service",
    version: SERVICE_VERSION,
    status: "running",
    architecture: "hexagonal",
  };
}

/**
 * @param service - Name of the process answering (server, CLI)
 */
export function healthReport(service: string): HealthReport {
  return { status: "healthy", service, version: SERVICE_VERSION };
}

export function apiStatus(extraFeatures: readonly string[] = []): ApiStatus {
  return { api_version: "v1", status: "operational", features: [...API_FEATURES, ...extraFeatures] };
}
