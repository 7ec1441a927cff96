import {
  SYSTEM_OWNER,
  OperationRegistry,
  RegistrySynchronizer,
  consoleLogger,
  describeError,
  type Logger,
  type PartitionStore
} from "@opsreg/core";
import { scanOperations, type ScanResult } from "@opsreg/scanner";
import { createPartitionStore, type PartitionStoreOptions } from "@opsreg/store";
import { OPS_TABLE_UNRESOLVED_MESSAGE, loadCliConfig, resolveOpsTable } from "./config";
import { formatDiagnostic, formatOperation } from "./print";

export type CliContext = {
  env: NodeJS.ProcessEnv;
  cwd: string;
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  logger: Logger;
  openStore: (options: PartitionStoreOptions) => PartitionStore;
};

export function createCliContext(): CliContext {
  return {
    env: process.env,
    cwd: process.cwd(),
    // eslint-disable-next-line no-console
    stdout: (line) => console.log(line),
    // eslint-disable-next-line no-console
    stderr: (line) => console.error(line),
    logger: consoleLogger,
    openStore: createPartitionStore
  };
}

export type ListOptions = {
  dir?: string;
  /** Directory names skipped in addition to the default ignore set. */
  ignore?: string[];
};

export type RegisterOptions = ListOptions & {
  stage?: string;
  opsTable?: string;
  owner?: string;
};

function printScan(result: ScanResult, context: CliContext): void {
  for (const record of result.operations) {
    formatOperation(record).forEach((line) => context.stdout(line));
  }
  for (const diagnostic of result.diagnostics) {
    context.stderr(formatDiagnostic(diagnostic));
  }
}

/**
 * `opsreg ls`: scan and print. Diagnostics never change the exit code.
 */
export async function runList(options: ListOptions, context: CliContext): Promise<number> {
  const result = await scanOperations(options.dir || context.cwd, { ignore: options.ignore });
  printScan(result, context);
  context.stdout(`Found ${result.operations.length} operation(s), ${result.diagnostics.length} diagnostic(s).`);
  return 0;
}

/**
 * `opsreg register`: resolve the ops table, scan, then publish everything found for the owner.
 *
 * @returns The process exit code: 1 when the table is unresolved or registration fails.
 */
export async function runRegister(options: RegisterOptions, context: CliContext): Promise<number> {
  const opsTable = await resolveOpsTable({
    opsTable: options.opsTable,
    stage: options.stage,
    env: context.env,
    cwd: context.cwd
  });
  if (!opsTable) {
    context.stderr(`Error: ${OPS_TABLE_UNRESOLVED_MESSAGE}`);
    return 1;
  }

  const storeConfig = loadCliConfig(context.env);
  const result = await scanOperations(options.dir || context.cwd, { ignore: options.ignore });
  printScan(result, context);

  const owner = options.owner || SYSTEM_OWNER;
  const store = context.openStore({
    driver: storeConfig.storeDriver,
    table: opsTable,
    redisUrl: storeConfig.redisUrl,
    postgresUrl: storeConfig.postgresUrl
  });

  try {
    const registry = new OperationRegistry(new RegistrySynchronizer({ store, logger: context.logger }));
    const registered = await registry.registerOperations(owner, result.operations);
    if (!registered.success) {
      context.stderr(`Error: ${registered.message}`);
      return 1;
    }
    context.stdout(`${registered.message} (${registered.data.length} operation(s) for ${owner} in ${opsTable}).`);
    return 0;
  } finally {
    try {
      await store.close();
    } catch (error) {
      context.logger.error("cli.store_close_failed", { error: describeError(error) });
    }
  }
}
