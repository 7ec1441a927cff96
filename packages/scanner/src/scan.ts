import { describeError, type OperationRecord } from "@opsreg/core";
import { readFile } from "node:fs/promises";
import { extractDeclarations, type ExtractOptions, type ScanDiagnostic } from "./extract";
import { findDeclarationFiles, type FindFilesOptions } from "./files";

export type ScanOptions = FindFilesOptions &
  ExtractOptions & {
    /** Files read at the same time. Defaults to 16. */
    concurrency?: number;
  };

const DEFAULT_READ_CONCURRENCY = 16;

export type ScanResult = {
  operations: OperationRecord[];
  diagnostics: ScanDiagnostic[];
};

async function scanFile(file: string, options: ExtractOptions): Promise<ScanResult> {
  let content: string;
  try {
    content = await readFile(file, "utf8");
  } catch (error) {
    return { operations: [], diagnostics: [{ kind: "read", file, message: describeError(error) }] };
  }
  return extractDeclarations(file, content, options);
}

/**
 * Walks `root`, extracts every declared operation and collects per-file diagnostics.
 *
 * Files are independent: an unreadable or unparseable file only adds a diagnostic. At most
 * `options.concurrency` files are open at once. Output follows the sorted file order, then
 * declaration order within each file.
 */
export async function scanOperations(root: string, options: ScanOptions = {}): Promise<ScanResult> {
  const files = await findDeclarationFiles(root, options);
  const perFile: ScanResult[] = new Array(files.length);
  const workerCount = Math.max(1, Math.min(options.concurrency ?? DEFAULT_READ_CONCURRENCY, files.length));
  let next = 0;

  // Workers claim indexes from a shared cursor; results land by index so file order holds.
  const worker = async (): Promise<void> => {
    while (next < files.length) {
      const index = next;
      next += 1;
      perFile[index] = await scanFile(files[index], options);
    }
  };
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  return {
    operations: perFile.flatMap((result) => result.operations),
    diagnostics: perFile.flatMap((result) => result.diagnostics)
  };
}
