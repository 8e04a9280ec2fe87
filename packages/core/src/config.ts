/**
 * Environment configuration for both sidecar processes.
 *
 * The injector and the launcher read the same DT_DIR / DT_STAGE /
 * DT_LIBRARY_NAME variables so they derive the same stable library path.
 * Empty values count as unset, matching ${VAR:-default} in a shell entrypoint.
 */

import path from "node:path";
import { z } from "zod";
import { SidecarError } from "./errors.js";
import { AGENT_LIBRARY_NAME } from "./paths.js";

function envVar<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === "" ? undefined : value), schema);
}

const pathSegmentSchema = z
  .string()
  .regex(
    /^[A-Za-z0-9._-]+$/,
    "must contain only letters, digits, '.', '_' or '-'",
  )
  .refine((value) => value !== "." && value !== "..", {
    message: "must not be '.' or '..'",
  });

const secondsSchema = z.coerce.number().int().min(0);

const booleanSchema = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const sharedEnvSchema = z.object({
  DT_DIR: envVar(z.string().default("/opt/dynatrace")),
  DT_STAGE: envVar(pathSegmentSchema.default("nonprod")),
  DT_LIBRARY_NAME: envVar(pathSegmentSchema.default(AGENT_LIBRARY_NAME)),
});

const injectorEnvSchema = sharedEnvSchema.extend({
  ZIP_PATH: envVar(z.string().default("/image/oneagent.zip")),
  HEALTH_PORT: envVar(z.coerce.number().int().min(0).max(65535).default(8082)),
  HEALTH_PATH: envVar(
    z.string().startsWith("/", "must start with '/'").default("/healthz"),
  ),
  DT_INSTALL_LOCK_TIMEOUT: envVar(secondsSchema.default(120)),
});

const launcherEnvSchema = sharedEnvSchema.extend({
  DT_WAIT_TIMEOUT: envVar(secondsSchema.default(60)),
  DT_PRELOAD_VAR: envVar(
    z
      .string()
      .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "must be a valid variable name")
      .default("LD_PRELOAD"),
  ),
  DT_DIAGNOSTICS: envVar(booleanSchema.default("true")),
});

export interface InjectorConfig {
  volumeRoot: string;
  stage: string;
  libraryName: string;
  archivePath: string;
  healthPort: number;
  healthPath: string;
  lockTimeoutMs: number;
}

export interface LauncherConfig {
  volumeRoot: string;
  stage: string;
  libraryName: string;
  maxWaitSeconds: number;
  preloadVar: string;
  diagnostics: boolean;
}

function parseEnv<T extends z.ZodTypeAny>(
  schema: T,
  env: NodeJS.ProcessEnv,
): z.infer<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new SidecarError("INVALID_CONFIG", `Invalid environment: ${details}`);
  }
  return result.data;
}

export function loadInjectorConfig(
  env: NodeJS.ProcessEnv = process.env,
): InjectorConfig {
  const parsed = parseEnv(injectorEnvSchema, env);
  return {
    volumeRoot: path.resolve(parsed.DT_DIR),
    stage: parsed.DT_STAGE,
    libraryName: parsed.DT_LIBRARY_NAME,
    archivePath: path.resolve(parsed.ZIP_PATH),
    healthPort: parsed.HEALTH_PORT,
    healthPath: parsed.HEALTH_PATH,
    lockTimeoutMs: parsed.DT_INSTALL_LOCK_TIMEOUT * 1000,
  };
}

export function loadLauncherConfig(
  env: NodeJS.ProcessEnv = process.env,
): LauncherConfig {
  const parsed = parseEnv(launcherEnvSchema, env);
  return {
    volumeRoot: path.resolve(parsed.DT_DIR),
    stage: parsed.DT_STAGE,
    libraryName: parsed.DT_LIBRARY_NAME,
    maxWaitSeconds: parsed.DT_WAIT_TIMEOUT,
    preloadVar: parsed.DT_PRELOAD_VAR,
    diagnostics: parsed.DT_DIAGNOSTICS,
  };
}
