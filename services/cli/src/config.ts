import { ConfigurationError, describeError } from "@opsreg/core";
import { NETWORK_STORE_DRIVERS, type NetworkStoreDriver } from "@opsreg/store";
import { load } from "js-yaml";
import { access, readFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { z } from "zod";

export const OPS_TABLE_UNRESOLVED_MESSAGE =
  "OPS_TABLE could not be resolved. Pass --ops-table <table_name>, set OPS_TABLE in the environment " +
  "or add it to your var/<stage>-var.yml file.";

const varFileSchema = z.object({
  OPS_TABLE: z
    .union([z.string(), z.number()])
    .nullish()
    .transform((value) => (value === null || value === undefined ? undefined : String(value)))
});

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

async function readVarFile(path: string): Promise<string | undefined> {
  let document: unknown;
  try {
    document = load(await readFile(path, "utf8"));
  } catch (error) {
    throw new ConfigurationError(`Could not read ${path}: ${describeError(error)}`);
  }

  const parsed = varFileSchema.safeParse(document ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(`${path} must be a mapping of variable names to values`);
  }
  return parsed.data.OPS_TABLE?.trim() || undefined;
}

export type ResolveOpsTableInput = {
  opsTable?: string;
  stage?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
};

/**
 * Resolve the ops table from, in order: the flag, `OPS_TABLE`, then `var/<stage>-var.yml` in the
 * working directory or its parent. The first var file found decides, even when it lacks the key.
 */
export async function resolveOpsTable(input: ResolveOpsTableInput): Promise<string | undefined> {
  const flag = input.opsTable?.trim();
  if (flag) {
    return flag;
  }

  const fromEnv = (input.env ?? process.env).OPS_TABLE?.trim();
  if (fromEnv) {
    return fromEnv;
  }

  if (!input.stage) {
    return undefined;
  }

  const cwd = input.cwd ?? process.cwd();
  for (const directory of [cwd, dirname(cwd)]) {
    const candidate = join(directory, "var", `${input.stage}-var.yml`);
    if (await exists(candidate)) {
      return readVarFile(candidate);
    }
  }
  return undefined;
}

const envSchema = z.object({
  OPS_STORE_DRIVER: z.enum(NETWORK_STORE_DRIVERS).default("redis"),
  REDIS_URL: z.string().default("redis://localhost:6379"),
  POSTGRES_URL: z.string().optional()
}).superRefine((value, ctx) => {
  if (value.OPS_STORE_DRIVER === "postgres" && !value.POSTGRES_URL) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["POSTGRES_URL"],
      message: "POSTGRES_URL is required when OPS_STORE_DRIVER=postgres"
    });
  }
});

export type CliStoreConfig = {
  storeDriver: NetworkStoreDriver;
  redisUrl: string;
  postgresUrl?: string;
};

/**
 * @throws ZodError If the store variables are invalid.
 */
export function loadCliConfig(env: NodeJS.ProcessEnv = process.env): CliStoreConfig {
  const parsed = envSchema.parse(env);
  return {
    storeDriver: parsed.OPS_STORE_DRIVER,
    redisUrl: parsed.REDIS_URL,
    postgresUrl: parsed.POSTGRES_URL
  };
}
