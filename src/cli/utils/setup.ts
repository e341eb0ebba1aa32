/**
 * Shared command setup
 */

import { applyOverrides, loadConfig } from "../../config.js";
import type { AppConfig, ConfigOverrides } from "../../config.js";
import { ConfigurationError } from "../../errors.js";
import { ReconciliationEngine } from "../../services/reconcile/index.js";

import type { ServiceConnector } from "../../connectors/types.js";

export type CommonOptions = ConfigOverrides;

export function resolveConfig(options: CommonOptions): AppConfig {
  return applyOverrides(loadConfig(), options);
}

export function createEngine(
  config: AppConfig,
  connectors: ServiceConnector[],
  deleteOrphans = config.deleteOrphans
): ReconciliationEngine {
  return new ReconciliationEngine({
    connectors,
    retry: config.retry,
    rateLimitDelayMs: {
      devto: config.devto.rateLimitMs,
      hashnode: config.hashnode.rateLimitMs,
    },
    skipPermissionErrorsOnDelete: config.skipPermissionErrorsOnDelete,
    deleteOrphans,
  });
}

/**
 * One-line description of a command failure, with configuration details
 */
export function describeError(error: unknown): string {
  if (error instanceof ConfigurationError) {
    const details = error.details ?? [];
    return details.length > 0
      ? `${error.message}\n  - ${details.join("\n  - ")}`
      : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}
