/**
 * Builds the connectors for the enabled services, in configured order
 */

import { ConfigurationError } from "../errors.js";
import { connectorLogger } from "../logger.js";
import { DevToConnector } from "./devto.js";
import { HashnodeConnector } from "./hashnode.js";

import type { AppConfig } from "../config.js";
import type { ServiceKind } from "../types/index.js";
import type { FetchFn } from "./http.js";
import type { ServiceConnector } from "./types.js";

export interface ConnectorDependencies {
  fetch?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
}

type Built =
  | { connector: ServiceConnector }
  | { missing: string[] };

function buildConnector(
  kind: ServiceKind,
  config: AppConfig,
  deps: ConnectorDependencies
): Built {
  switch (kind) {
    case "devto": {
      const { apiKey, rateLimitMs } = config.devto;
      if (apiKey === undefined) {
        return { missing: ["DEVTO_API_KEY"] };
      }
      return {
        connector: new DevToConnector({ apiKey, rateLimitMs, ...deps }),
      };
    }
    case "hashnode": {
      const { apiKey, username, publicationId, rateLimitMs } = config.hashnode;
      if (
        apiKey === undefined ||
        username === undefined ||
        publicationId === undefined
      ) {
        const missing: string[] = [];
        if (apiKey === undefined) missing.push("HASHNODE_API_KEY");
        if (username === undefined) missing.push("HASHNODE_USERNAME");
        if (publicationId === undefined) {
          missing.push("HASHNODE_PUBLICATION_ID");
        }
        return { missing };
      }
      return {
        connector: new HashnodeConnector({
          apiKey,
          username,
          publicationId,
          rateLimitMs,
          ...deps,
        }),
      };
    }
  }
}

/**
 * A service without credentials is left out with an error log; having
 * none left is a ConfigurationError.
 */
export function createConnectors(
  config: AppConfig,
  deps: ConnectorDependencies = {}
): ServiceConnector[] {
  const connectors: ServiceConnector[] = [];
  const problems: string[] = [];

  for (const kind of config.services) {
    const built = buildConnector(kind, config, deps);
    if ("connector" in built) {
      connectors.push(built.connector);
      continue;
    }

    connectorLogger.error(
      { service: kind, missing: built.missing },
      "Missing credentials, service disabled for this run"
    );
    problems.push(`${kind}: missing ${built.missing.join(", ")}`);
  }

  if (connectors.length === 0) {
    throw new ConfigurationError("No publishing service is usable", problems);
  }

  connectorLogger.debug(
    { services: connectors.map((c) => c.kind) },
    "Connectors ready"
  );
  return connectors;
}
