/**
 * Runtime configuration from environment variables (and .env via dotenv)
 */

import "dotenv/config";

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigurationError } from "./errors.js";
import { isServiceKind, type ServiceKind } from "./types/index.js";
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from "./utils/retry.js";

// ============================================================================
// Environment Schema
// ============================================================================

const Milliseconds = Type.String({ pattern: "^[0-9]+$" });
const Flag = Type.String({ pattern: "^(true|false|1|0|yes|no)$" });

export const EnvSchema = Type.Object({
  ENABLED_PLATFORMS: Type.Optional(Type.String()),
  CONTENT_DIR: Type.Optional(Type.String()),
  EXCLUDE_FILES: Type.Optional(Type.String()),
  DEVTO_API_KEY: Type.Optional(Type.String()),
  DEVTO_RATE_LIMIT_MS: Type.Optional(Milliseconds),
  HASHNODE_API_KEY: Type.Optional(Type.String()),
  HASHNODE_USERNAME: Type.Optional(Type.String()),
  HASHNODE_PUBLICATION_ID: Type.Optional(
    Type.String({ pattern: "^[0-9a-fA-F]{24}$" })
  ),
  HASHNODE_RATE_LIMIT_MS: Type.Optional(Milliseconds),
  RETRY_MAX_ATTEMPTS: Type.Optional(Type.String({ pattern: "^[1-9][0-9]*$" })),
  RETRY_BASE_DELAY_MS: Type.Optional(Milliseconds),
  RETRY_MAX_DELAY_MS: Type.Optional(Milliseconds),
  SKIP_DELETE_PERMISSION_ERRORS: Type.Optional(Flag),
  DELETE_ORPHANS: Type.Optional(Flag),
});

export type Env = Static<typeof EnvSchema>;

// ============================================================================
// Config
// ============================================================================

export interface DevToSettings {
  apiKey?: string;
  rateLimitMs: number;
}

export interface HashnodeSettings {
  apiKey?: string;
  username?: string;
  publicationId?: string;
  rateLimitMs: number;
}

export interface AppConfig {
  /** Enabled services, in the order they are reconciled */
  services: ServiceKind[];
  contentDir: string;
  excludeFiles: string[];
  devto: DevToSettings;
  hashnode: HashnodeSettings;
  retry: RetryPolicy;
  skipPermissionErrorsOnDelete: boolean;
  deleteOrphans: boolean;
}

export const DEFAULT_RATE_LIMIT_MS: Record<ServiceKind, number> = {
  devto: 1000,
  hashnode: 2000,
};

function splitList(value: string | undefined, fallback: string[]): string[] {
  if (value === undefined) {
    return fallback;
  }
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");
}

function toNumber(value: string | undefined, fallback: number): number {
  return value === undefined ? fallback : Number.parseInt(value, 10);
}

function toFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  return value === "true" || value === "1" || value === "yes";
}

const FLAG_KEYS = new Set(["SKIP_DELETE_PERMISSION_ERRORS", "DELETE_ORPHANS"]);

/**
 * Pick the known variables, treating blank values as unset
 */
function pickEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.properties)) {
    const value = env[key]?.trim();
    if (value !== undefined && value !== "") {
      picked[key] = FLAG_KEYS.has(key) ? value.toLowerCase() : value;
    }
  }
  return picked;
}

/**
 * Build the run configuration. Throws ConfigurationError listing every
 * invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const raw: unknown = pickEnv(env);

  if (!Value.Check(EnvSchema, raw)) {
    const details = [...Value.Errors(EnvSchema, raw)].map(
      (e) => `${e.path.replace(/^\//, "")}: ${e.message}`
    );
    throw new ConfigurationError("Invalid configuration", details);
  }

  const services: ServiceKind[] = [];
  const unknown: string[] = [];
  for (const name of splitList(raw.ENABLED_PLATFORMS?.toLowerCase(), [
    "devto",
    "hashnode",
  ])) {
    if (!isServiceKind(name)) {
      unknown.push(name);
    } else if (!services.includes(name)) {
      services.push(name);
    }
  }
  if (unknown.length > 0) {
    throw new ConfigurationError(
      `Unknown service(s) in ENABLED_PLATFORMS: ${unknown.join(", ")}`
    );
  }

  const retry: RetryPolicy = {
    ...DEFAULT_RETRY_POLICY,
    maxAttempts: toNumber(
      raw.RETRY_MAX_ATTEMPTS,
      DEFAULT_RETRY_POLICY.maxAttempts
    ),
    baseDelayMs: toNumber(
      raw.RETRY_BASE_DELAY_MS,
      DEFAULT_RETRY_POLICY.baseDelayMs
    ),
    maxDelayMs: toNumber(raw.RETRY_MAX_DELAY_MS, DEFAULT_RETRY_POLICY.maxDelayMs),
  };

  return {
    services,
    contentDir: raw.CONTENT_DIR ?? "blogs",
    excludeFiles: splitList(raw.EXCLUDE_FILES, ["README.md"]),
    devto: {
      apiKey: raw.DEVTO_API_KEY,
      rateLimitMs: toNumber(raw.DEVTO_RATE_LIMIT_MS, DEFAULT_RATE_LIMIT_MS.devto),
    },
    hashnode: {
      apiKey: raw.HASHNODE_API_KEY,
      username: raw.HASHNODE_USERNAME,
      publicationId: raw.HASHNODE_PUBLICATION_ID,
      rateLimitMs: toNumber(
        raw.HASHNODE_RATE_LIMIT_MS,
        DEFAULT_RATE_LIMIT_MS.hashnode
      ),
    },
    retry,
    skipPermissionErrorsOnDelete: toFlag(
      raw.SKIP_DELETE_PERMISSION_ERRORS,
      true
    ),
    deleteOrphans: toFlag(raw.DELETE_ORPHANS, true),
  };
}

export interface ConfigOverrides {
  /** Comma-separated service names */
  services?: string;
  contentDir?: string;
}

/**
 * Apply command-line overrides on top of the environment configuration
 */
export function applyOverrides(
  config: AppConfig,
  overrides: ConfigOverrides
): AppConfig {
  let services = config.services;

  if (overrides.services !== undefined) {
    const names = splitList(overrides.services.toLowerCase(), []);
    const unknown = names.filter((name) => !isServiceKind(name));
    if (unknown.length > 0) {
      throw new ConfigurationError(`Unknown service(s): ${unknown.join(", ")}`);
    }
    services = [...new Set(names.filter(isServiceKind))];
  }

  return {
    ...config,
    services,
    contentDir: overrides.contentDir ?? config.contentDir,
  };
}
