/**
 * @fileoverview Loads, validates, and exports application configuration.
 * Values are sourced from environment variables (optionally from a `.env` file)
 * and `package.json`, validated with Zod, and returned as a frozen
 * {@link AppConfig}. The config is built once at start-up and passed explicitly
 * to the server factory and services; nothing mutates it afterwards.
 *
 * @module src/config/index
 */

import dotenv from "dotenv";
import { existsSync, mkdirSync, readFileSync, statSync } from "fs";
import path, { dirname, join } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { AppError, BaseErrorCode } from "../types-global/errors.js";
import { LOG_LEVELS } from "../utils/internal/logger.js";

dotenv.config();

// --- Determine Project Root ---
const findProjectRoot = (startDir: string): string => {
  let currentDir = startDir;
  while (true) {
    if (existsSync(join(currentDir, "package.json"))) {
      return currentDir;
    }
    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      throw new Error(
        `Could not find project root (package.json) starting from ${startDir}`,
      );
    }
    currentDir = parentDir;
  }
};

const resolveProjectRoot = (): string => {
  try {
    return findProjectRoot(dirname(fileURLToPath(import.meta.url)));
  } catch (error: unknown) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    if (process.stdout.isTTY) {
      console.warn(
        `Warning: ${errorMessage}. Using process.cwd() as project root.`,
      );
    }
    return process.cwd();
  }
};

export const projectRoot = resolveProjectRoot();
// --- End Determine Project Root ---

export interface PackageInfo {
  name: string;
  version: string;
  description: string;
}

const PackageJsonSchema = z.object({
  name: z.string().optional(),
  version: z.string().optional(),
  description: z.string().optional(),
});

/**
 * Loads name, version and description from the project's package.json,
 * falling back to defaults when it is missing (e.g. in slim container images).
 */
const loadPackageJson = (rootDir: string): PackageInfo => {
  const fallback: PackageInfo = {
    name: "pubmed-research-api",
    version: "0.0.0",
    description: "No description provided.",
  };
  const pkgPath = join(rootDir, "package.json");
  if (!existsSync(pkgPath)) {
    return fallback;
  }

  try {
    const parsed = PackageJsonSchema.safeParse(
      JSON.parse(readFileSync(pkgPath, "utf-8")),
    );
    if (!parsed.success) return fallback;
    return {
      name: parsed.data.name ?? fallback.name,
      version: parsed.data.version ?? fallback.version,
      description: parsed.data.description ?? fallback.description,
    };
  } catch (error) {
    if (process.stdout.isTTY) {
      console.error(
        "Warning: Could not read or parse package.json. Using hardcoded defaults.",
        error,
      );
    }
    return fallback;
  }
};

/** Treats `VAR=` in an env file the same as an unset variable. */
const emptyAsUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalString = z.preprocess(emptyAsUndefined, z.string().optional());

export const EnvSchema = z.object({
  NODE_ENV: z.string().default("development"),
  SERVICE_NAME: z.string().default("PubMed Research API"),

  // HTTP listener
  PORT: z.coerce.number().int().positive().max(65535).default(8000),
  HOST: z.string().default("0.0.0.0"),
  HTTP_MAX_PORT_RETRIES: z.coerce.number().int().nonnegative().default(0),
  ALLOWED_ORIGINS: z.string().default("*"),

  // Logging
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  LOGS_DIR: optionalString,

  // NCBI E-utilities identification
  PUBMED_EMAIL: z.preprocess(
    emptyAsUndefined,
    z.string().email("PUBMED_EMAIL must be a valid email address.").optional(),
  ),
  PUBMED_TOOL_NAME: z.preprocess(
    emptyAsUndefined,
    z.string().default("PubMedAPIClient"),
  ),
  PUBMED_API_KEY: optionalString,
  NCBI_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  // OpenTelemetry
  OTEL_ENABLED: z
    .string()
    .transform((v) => v.toLowerCase() === "true")
    .default("false"),
  OTEL_SERVICE_NAME: optionalString,
  OTEL_EXPORTER_OTLP_TRACES_ENDPOINT: z.preprocess(
    emptyAsUndefined,
    z.string().url().optional(),
  ),
  OTEL_TRACES_SAMPLER_ARG: z.coerce.number().min(0).max(1).default(1.0),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

/**
 * Identification and limits applied to every NCBI E-utilities call.
 */
export interface NcbiClientConfig {
  readonly toolName: string;
  readonly email?: string;
  readonly apiKey?: string;
  readonly timeoutMs: number;
}

export interface AppConfig {
  readonly pkg: PackageInfo;
  readonly serviceName: string;
  readonly serviceVersion: string;
  readonly serviceDescription: string;
  readonly environment: string;
  readonly http: {
    readonly port: number;
    readonly host: string;
    readonly maxPortRetries: number;
    readonly allowedOrigins: readonly string[];
  };
  readonly logLevel: EnvConfig["LOG_LEVEL"];
  readonly logsPath: string | null;
  /** Problems found while loading that only disable optional features. */
  readonly warnings: readonly string[];
  readonly ncbi: NcbiClientConfig;
  readonly openTelemetry: {
    readonly enabled: boolean;
    readonly serviceName: string;
    readonly serviceVersion: string;
    readonly tracesEndpoint?: string;
    readonly samplingRatio: number;
  };
}

/** Where a directory ended up, or why it cannot be used. */
export type DirectoryResult =
  | { path: string; problem?: undefined }
  | { path: null; problem: string };

/**
 * Resolves the logs directory and makes sure it exists inside the project.
 * A `null` path disables file logging; `problem` then says why.
 */
export const ensureDirectory = (
  dirPath: string,
  rootDir: string,
  dirName: string,
): DirectoryResult => {
  const resolvedDirPath = path.isAbsolute(dirPath)
    ? dirPath
    : path.resolve(rootDir, dirPath);

  if (
    !resolvedDirPath.startsWith(rootDir + path.sep) &&
    resolvedDirPath !== rootDir
  ) {
    return {
      path: null,
      problem: `${dirName} path "${dirPath}" resolves to "${resolvedDirPath}", which is outside the project boundary "${rootDir}".`,
    };
  }

  try {
    if (!existsSync(resolvedDirPath)) {
      mkdirSync(resolvedDirPath, { recursive: true });
    } else if (!statSync(resolvedDirPath).isDirectory()) {
      return {
        path: null,
        problem: `${dirName} path ${resolvedDirPath} exists but is not a directory.`,
      };
    }
  } catch (err: unknown) {
    const errorMessage = err instanceof Error ? err.message : String(err);
    return {
      path: null,
      problem: `Could not prepare ${dirName} directory at ${resolvedDirPath}: ${errorMessage}`,
    };
  }
  return { path: resolvedDirPath };
};

export interface LoadConfigOptions {
  /** Project root used for package.json and relative paths. */
  rootDir?: string;
  /** Skip creating the logs directory (used by tests). */
  skipLogsDirectory?: boolean;
}

/**
 * Validates `env` and builds the immutable application configuration.
 * @throws {AppError} `CONFIGURATION_ERROR` listing every invalid variable.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  options: LoadConfigOptions = {},
): AppConfig {
  const rootDir = options.rootDir ?? projectRoot;
  const parsedEnv = EnvSchema.safeParse(env);

  if (!parsedEnv.success) {
    const fieldErrors = parsedEnv.error.flatten().fieldErrors;
    const summary = Object.entries(fieldErrors)
      .map(([key, messages]) => `${key}: ${(messages ?? []).join(", ")}`)
      .join("; ");
    throw new AppError(
      BaseErrorCode.CONFIGURATION_ERROR,
      `Invalid environment variables: ${summary}`,
      { fieldErrors },
    );
  }

  const parsed = parsedEnv.data;
  const pkg = loadPackageJson(rootDir);
  const logsDirectory = options.skipLogsDirectory
    ? undefined
    : ensureDirectory(parsed.LOGS_DIR ?? "logs", rootDir, "logs");
  const warnings =
    logsDirectory?.problem !== undefined
      ? [`File logging is disabled: ${logsDirectory.problem}`]
      : [];

  const allowedOrigins = parsed.ALLOWED_ORIGINS.split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);

  const config: AppConfig = {
    pkg,
    serviceName: parsed.SERVICE_NAME,
    serviceVersion: pkg.version,
    serviceDescription: pkg.description,
    environment: parsed.NODE_ENV,
    http: {
      port: parsed.PORT,
      host: parsed.HOST,
      maxPortRetries: parsed.HTTP_MAX_PORT_RETRIES,
      allowedOrigins: allowedOrigins.length > 0 ? allowedOrigins : ["*"],
    },
    logLevel: parsed.LOG_LEVEL,
    logsPath: logsDirectory?.path ?? null,
    warnings,
    ncbi: {
      toolName: parsed.PUBMED_TOOL_NAME,
      email: parsed.PUBMED_EMAIL,
      apiKey: parsed.PUBMED_API_KEY,
      timeoutMs: parsed.NCBI_TIMEOUT_MS,
    },
    openTelemetry: {
      enabled: parsed.OTEL_ENABLED,
      serviceName: parsed.OTEL_SERVICE_NAME ?? pkg.name,
      serviceVersion: pkg.version,
      tracesEndpoint: parsed.OTEL_EXPORTER_OTLP_TRACES_ENDPOINT,
      samplingRatio: parsed.OTEL_TRACES_SAMPLER_ARG,
    },
  };

  return Object.freeze(config);
}
