import path from "node:path";
import os from "node:os";
import { parse, stringify } from "yaml";
import { z } from "zod";
import { compilePatternTable, DEFAULT_REFERENCE_PATTERNS } from "../references/patterns.js";
import { ConfigError, ErrorCode, FileSystemError, toErrorCause } from "./errors.js";
import { readTextFile, writeFileAtomic } from "./files.js";

/**
 * Expand tilde (~) to home directory in a path.
 * Also handles Windows %USERPROFILE% environment variable.
 *
 * @returns The expanded absolute path
 *
 * @example
 * expandPath("~/notes"); // "/Users/username/notes" on macOS
 */
export function expandPath(inputPath: string): string {
  if (!inputPath) return inputPath;

  // Handle Unix-style tilde expansion
  if (inputPath.startsWith("~/")) {
    return path.join(os.homedir(), inputPath.slice(2));
  }
  if (inputPath === "~") {
    return os.homedir();
  }

  // Handle Windows %USERPROFILE% expansion
  if (process.platform === "win32" && inputPath.includes("%USERPROFILE%")) {
    return inputPath.replace(/%USERPROFILE%/gi, os.homedir());
  }

  return path.resolve(inputPath);
}

// ============================================================================
// Schema
// ============================================================================

const ReferencePatternSchema = z.object({
  kind: z.enum(["wikilink", "image-embed", "diagram-embed"]),
  pattern: z.string().min(1),
  flags: z.string().optional(),
  exclude: z.string().optional(),
  description: z.string().optional(),
});

const EmbeddingSettingsSchema = z.object({
  concurrency: z.number().int().positive().default(4),
  batchSize: z.number().int().positive().default(16),
  maxRetries: z.number().int().nonnegative().default(3),
  retryDelayMs: z.number().int().nonnegative().default(500),
});

const IngestionSettingsSchema = z.object({
  /** Notes parsed and resolved at once */
  concurrency: z.number().int().positive().default(8),
  /** Abort the run on the first chunking or embedding failure */
  failFast: z.boolean().default(false),
  /** Ignore references inside code blocks and inline code */
  skipCode: z.boolean().default(true),
  /** Characters of context kept around each reference */
  contextLength: z.number().int().nonnegative().default(60),
});

export const ConfigSchema = z
  .object({
    notesDir: z.string().min(1).default("~/vaultweave-notes"),
    /** Artifact location; `<notesDir>/.vaultweave/vector-db.json` when omitted */
    outputPath: z.string().min(1).optional(),
    referencePatterns: z.array(ReferencePatternSchema).min(1).default(DEFAULT_REFERENCE_PATTERNS),
    attachmentSearchRoots: z
      .array(z.string())
      .min(1)
      .default(["{noteDir}", "{noteDir}/{noteStem}.assets", "attachments"]),
    chunkSize: z.number().int().positive().default(1000),
    chunkOverlap: z.number().int().nonnegative().default(200),
    embedding: EmbeddingSettingsSchema.default({}),
    ingestion: IngestionSettingsSchema.default({}),
  })
  .superRefine((config, ctx) => {
    if (config.chunkOverlap >= config.chunkSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["chunkOverlap"],
        message: `chunkOverlap (${config.chunkOverlap}) must be smaller than chunkSize (${config.chunkSize})`,
      });
    }

    try {
      compilePatternTable(config.referencePatterns);
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["referencePatterns"],
        message: toErrorCause(err)?.message ?? String(err),
      });
    }
  });

export type VaultweaveConfig = z.output<typeof ConfigSchema>;
export type VaultweaveConfigInput = z.input<typeof ConfigSchema>;
export type EmbeddingSettings = VaultweaveConfig["embedding"];
export type IngestionSettings = VaultweaveConfig["ingestion"];

export const DEFAULT_CONFIG: VaultweaveConfig = ConfigSchema.parse({});

// ============================================================================
// Loading
// ============================================================================

/**
 * Get the path to the configuration file: `VAULTWEAVE_CONFIG`, else
 * `vaultweave.yaml` in the working directory
 */
export function getConfigPath(): string {
  return process.env.VAULTWEAVE_CONFIG
    ? expandPath(process.env.VAULTWEAVE_CONFIG)
    : path.join(process.cwd(), "vaultweave.yaml");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const ENV_OVERRIDES: Array<{ env: string; key: string; apply: (raw: Record<string, unknown>, value: number) => void }> = [
  {
    env: "VAULTWEAVE_CHUNK_SIZE",
    key: "chunkSize",
    apply: (raw, value) => {
      raw.chunkSize = value;
    },
  },
  {
    env: "VAULTWEAVE_CHUNK_OVERLAP",
    key: "chunkOverlap",
    apply: (raw, value) => {
      raw.chunkOverlap = value;
    },
  },
  {
    env: "VAULTWEAVE_EMBED_CONCURRENCY",
    key: "embedding.concurrency",
    apply: (raw, value) => {
      raw.embedding = { ...(isRecord(raw.embedding) ? raw.embedding : {}), concurrency: value };
    },
  },
];

/**
 * Copy of `raw` with numeric environment overrides applied
 *
 * @throws ConfigError when an override is not a number
 */
export function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...raw };

  for (const override of ENV_OVERRIDES) {
    const value = env[override.env];
    if (value === undefined || value === "") continue;

    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
      throw new ConfigError(ErrorCode.CONFIG_INVALID_VALUE, `${override.env} must be a number, got "${value}"`, {
        configKey: override.key,
      });
    }
    override.apply(result, parsed);
  }

  return result;
}

/**
 * Validate a raw configuration object and fill defaults
 *
 * @throws ConfigError on the first invalid value
 */
export function parseConfig(raw: unknown): VaultweaveConfig {
  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const configKey = issue.path.join(".");
    throw new ConfigError(ErrorCode.CONFIG_INVALID_VALUE, `${configKey || "config"}: ${issue.message}`, {
      cause: result.error,
      configKey,
    });
  }
  return result.data;
}

/**
 * Load the configuration from a YAML file.
 *
 * A missing file yields the defaults. Partial configurations are merged with
 * defaults for missing values, then environment overrides are applied.
 *
 * @throws {ConfigError} If the file is malformed YAML or holds an invalid value
 *
 * @example
 * const config = await loadConfig();
 * console.log(config.chunkSize); // 1000
 */
export async function loadConfig(configPath: string = getConfigPath()): Promise<VaultweaveConfig> {
  let content = "";
  try {
    content = await readTextFile(configPath);
  } catch (err) {
    if (!(err instanceof FileSystemError && err.code === ErrorCode.FS_FILE_NOT_FOUND)) {
      throw err;
    }
  }

  let parsed: unknown;
  try {
    parsed = content ? parse(content) : {};
  } catch (err) {
    throw new ConfigError(ErrorCode.CONFIG_PARSE_ERROR, `Invalid YAML in ${configPath}`, {
      cause: toErrorCause(err),
    });
  }

  let raw: Record<string, unknown> = {};
  if (isRecord(parsed)) {
    raw = parsed;
  } else if (parsed !== null && parsed !== undefined) {
    throw new ConfigError(ErrorCode.CONFIG_PARSE_ERROR, `${configPath} must contain a mapping`);
  }

  return parseConfig(applyEnvOverrides(raw));
}

/**
 * Save the configuration to disk as YAML
 */
export async function saveConfig(config: VaultweaveConfigInput, configPath: string = getConfigPath()): Promise<void> {
  await writeFileAtomic(configPath, stringify(config));
}

/**
 * Absolute location of the vector database artifact
 */
export function resolveOutputPath(config: Pick<VaultweaveConfig, "notesDir" | "outputPath">): string {
  return config.outputPath
    ? expandPath(config.outputPath)
    : path.join(expandPath(config.notesDir), ".vaultweave", "vector-db.json");
}
