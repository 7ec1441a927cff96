#!/usr/bin/env node
import { AppError, describeError } from "@opsreg/core";
import { Command } from "commander";
import { ZodError } from "zod";
import { createCliContext, runList, runRegister, type CliContext, type ListOptions, type RegisterOptions } from "./commands";

function collectIgnore(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function reportFailure(error: unknown, context: CliContext): void {
  if (error instanceof AppError) {
    context.stderr(`Error: ${error.message}`);
    return;
  }
  if (error instanceof ZodError) {
    const details = error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    context.stderr(`Error: invalid configuration: ${details}`);
    return;
  }
  context.stderr(`Error: ${describeError(error)}`);
}

/**
 * Builds the `opsreg` program. `onExit` receives each command's exit code.
 */
export function createProgram(context: CliContext, onExit: (code: number) => void): Command {
  const program = new Command();

  const run = async (command: () => Promise<number>): Promise<void> => {
    try {
      onExit(await command());
    } catch (error) {
      reportFailure(error, context);
      onExit(1);
    }
  };

  program.name("opsreg").description("Scan source trees for declared operations and publish them to the registry");

  program
    .command("ls")
    .description("Scan a directory and print the operations it declares")
    .option("--dir <path>", "Directory to scan (defaults to the working directory)")
    .option("--ignore <name>", "Directory name to skip, repeatable", collectIgnore, [])
    .action((opts: ListOptions) => run(() => runList(opts, context)));

  program
    .command("register")
    .description("Scan a directory and register its operations")
    .option("--dir <path>", "Directory to scan (defaults to the working directory)")
    .option("--ignore <name>", "Directory name to skip, repeatable", collectIgnore, [])
    .option("--stage <stage>", "Stage whose var/<stage>-var.yml supplies OPS_TABLE")
    .option("--ops-table <table>", "Ops table name (overrides OPS_TABLE)")
    .option("--owner <owner>", "Owner to register for", "system")
    .action((opts: RegisterOptions) => run(() => runRegister(opts, context)));

  return program;
}

if (require.main === module) {
  const context = createCliContext();
  createProgram(context, (code) => {
    process.exitCode = code;
  })
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      reportFailure(error, context);
      process.exitCode = 1;
    });
}
