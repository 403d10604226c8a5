import fs from "node:fs";
import path from "node:path";
import { expandHome, isDebugEnabled, type SafekeepConfig } from "@safekeep/core";
import { parse as parseDotEnv } from "dotenv";
import { z } from "zod";

export interface LoadedCliConfig {
  projectRoot: string;
  config: SafekeepConfig;
}

export class CliConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliConfigError";
  }
}

const envSchema = z.object({
  SAFEKEEP_STORE_ROOT: z.string().trim().min(1).optional(),
  SAFEKEEP_MAX_AGE_DAYS: z
    .string()
    .trim()
    .regex(/^[1-9]\d*$/, "must be a positive whole number of days")
    .transform((value) => Number.parseInt(value, 10))
    .optional()
});

function loadProjectEnvFiles(projectRoot: string, env: NodeJS.ProcessEnv): void {
  // Keep explicit shell/CI env vars authoritative over local files.
  const shellDefined = new Set(Object.keys(env));
  const merged: Record<string, string> = {};
  for (const candidate of [".env", ".env.local"]) {
    const filePath = path.join(projectRoot, candidate);
    if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
      continue;
    }
    const parsed = parseDotEnv(fs.readFileSync(filePath, "utf8"));
    for (const [key, value] of Object.entries(parsed)) {
      merged[key] = value;
    }
  }

  for (const [key, value] of Object.entries(merged)) {
    if (shellDefined.has(key)) {
      continue;
    }
    env[key] = value;
  }
}

export function loadCliConfig(projectRoot = process.cwd(), env: NodeJS.ProcessEnv = process.env): LoadedCliConfig {
  const resolvedRoot = path.resolve(projectRoot);
  loadProjectEnvFiles(resolvedRoot, env);

  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`).join("; ");
    throw new CliConfigError(`Invalid environment: ${details}`);
  }

  const storeRoot = parsed.data.SAFEKEEP_STORE_ROOT;
  const maxAgeDays = parsed.data.SAFEKEEP_MAX_AGE_DAYS;
  return {
    projectRoot: resolvedRoot,
    config: {
      storeRoot: storeRoot ? path.resolve(resolvedRoot, expandHome(storeRoot)) : undefined,
      retention: maxAgeDays !== undefined ? { maxAgeDays } : undefined,
      debug: isDebugEnabled(env)
    }
  };
}
