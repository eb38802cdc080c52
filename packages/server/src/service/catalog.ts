/**
 * Catalog service adapter
 * Owns the catalog the server exposes and answers the informational tools
 */

import { apiStatus, describeService, healthReport, openCatalog, SERVICE_VERSION } from "@bookshelf/sdk";
import type { ApiStatus, Catalog, CatalogStats, HealthReport, ServiceInfo } from "@bookshelf/sdk";
import { logger } from "../observability/logger.js";

export const SERVICE_NAME = "bookshelf-server";
export { SERVICE_VERSION };

export class CatalogService {
  readonly catalog: Catalog;

  constructor(catalog: Catalog = openCatalog()) {
    this.catalog = catalog;
    logger.debug("service.init", { version: SERVICE_VERSION });
  }

  info(): ServiceInfo {
    return describeService();
  }

  health(): HealthReport {
    return healthReport(SERVICE_NAME);
  }

  apiStatus(): ApiStatus {
    return apiStatus(["mcp_stdio_transport"]);
  }

  async stats(): Promise<CatalogStats> {
    return this.catalog.stats();
  }
}
