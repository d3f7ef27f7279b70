/**
 * Configuration loading.
 *
 * Settings come from an optional JSON file ($SELLER_ORDERS_CONFIG or
 * ~/.seller-orders-mcp/config.json). Tool arguments override them per call.
 */

import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import { z } from "zod";
import { DEFAULT_STATUS, getStatusCodes } from "../ebay/statuses";
import { DEFAULT_MAX_ITEMS } from "../ebay/extractors/order-lines";

export const CONFIG_DIR = join(homedir(), ".seller-orders-mcp");
export const DEFAULT_CONFIG_PATH = join(CONFIG_DIR, "config.json");
export const PROFILES_DIR = join(CONFIG_DIR, "profiles");

/**
 * Configuration is missing, unreadable or invalid.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly path?: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

const statusSchema = z
  .string()
  .transform((s) => s.toLowerCase())
  .refine((s) => getStatusCodes().includes(s), {
    message: `status must be one of: ${getStatusCodes().join(", ")}`,
  });

const sourceSchema = z.object({
  label: z
    .string()
    .min(1)
    .regex(/^[\w.-]+$/, "label may only contain letters, digits, '.', '_' and '-'"),
  profileDir: z.string().min(1).optional(),
});

export const configFileSchema = z
  .object({
    status: statusSchema.default(DEFAULT_STATUS),
    maxItems: z.number().int().positive().default(DEFAULT_MAX_ITEMS),
    contentFilter: z
      .object({
        enabled: z.boolean().default(false),
        keywords: z.array(z.string()).default([]),
      })
      .default({}),
    headless: z.boolean().default(false),
    parallel: z.boolean().default(false),
    sources: z.array(sourceSchema).min(1).default([{ label: "default" }]),
  })
  .superRefine((config, ctx) => {
    const labels = new Set<string>();
    for (const source of config.sources) {
      if (labels.has(source.label)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["sources"],
          message: `duplicate source label: ${source.label}`,
        });
      }
      labels.add(source.label);
    }
  });

export interface SourceConfig {
  label: string;
  profileDir: string;
}

export interface SellerOrdersConfig {
  status: string;
  maxItems: number;
  contentFilter: {
    enabled: boolean;
    keywords: string[];
  };
  headless: boolean;
  parallel: boolean;
  sources: SourceConfig[];
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Validate a parsed config object and fill in defaults.
 */
export function parseConfig(
  raw: unknown,
  profilesDir = PROFILES_DIR,
): SellerOrdersConfig {
  const result = configFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`);
  }

  const config = result.data;
  return {
    ...config,
    sources: config.sources.map((s) => ({
      label: s.label,
      profileDir: s.profileDir ?? join(profilesDir, s.label),
    })),
  };
}

export function getConfigPath(): string {
  return process.env.SELLER_ORDERS_CONFIG || DEFAULT_CONFIG_PATH;
}

/**
 * Load configuration from disk, falling back to defaults when no file exists.
 */
export function loadConfig(path = getConfigPath()): SellerOrdersConfig {
  if (!existsSync(path)) {
    return parseConfig({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Failed to read config file: ${error}`, path);
  }

  try {
    return parseConfig(raw);
  } catch (error) {
    if (error instanceof ConfigError) {
      throw new ConfigError(`${error.message} (${path})`, path);
    }
    throw error;
  }
}

/**
 * Pick the configured sources named by a tool call, in configuration order.
 */
export function selectSources(
  config: SellerOrdersConfig,
  labels?: string[],
): SourceConfig[] {
  if (!labels || labels.length === 0) {
    return config.sources;
  }

  const unknown = labels.filter(
    (label) => !config.sources.some((s) => s.label === label),
  );
  if (unknown.length > 0) {
    throw new ConfigError(
      `Unknown source(s): ${unknown.join(", ")}. Configured: ${config.sources
        .map((s) => s.label)
        .join(", ")}`,
    );
  }

  return config.sources.filter((s) => labels.includes(s.label));
}

/**
 * Per-call overrides taken from tool arguments.
 */
export interface RunOverrides {
  status?: string;
  sources?: string[];
  maxItems?: number;
  keywords?: string[];
  filterEnabled?: boolean;
  parallel?: boolean;
}

/**
 * Effective settings for one fetch.
 */
export interface RunSettings {
  status: string;
  sources: SourceConfig[];
  maxItems: number;
  contentFilter: {
    enabled: boolean;
    keywords: string[];
  };
  parallel: boolean;
  headless: boolean;
}

/**
 * Combine file configuration with tool-call overrides.
 * Passing keywords turns the filter on unless filterEnabled says otherwise.
 */
export function resolveRunSettings(
  config: SellerOrdersConfig,
  overrides: RunOverrides = {},
): RunSettings {
  let status = config.status;
  if (overrides.status !== undefined) {
    const parsed = statusSchema.safeParse(overrides.status);
    if (!parsed.success) {
      throw new ConfigError(`Invalid status: ${formatIssues(parsed.error)}`);
    }
    status = parsed.data;
  }

  const keywords = overrides.keywords ?? config.contentFilter.keywords;
  const enabled =
    overrides.filterEnabled ??
    (overrides.keywords !== undefined
      ? overrides.keywords.length > 0
      : config.contentFilter.enabled);

  return {
    status,
    sources: selectSources(config, overrides.sources),
    maxItems: overrides.maxItems ?? config.maxItems,
    contentFilter: { enabled, keywords },
    parallel: overrides.parallel ?? config.parallel,
    headless: config.headless,
  };
}
