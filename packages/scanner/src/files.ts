import fg from "fast-glob";

export const DEFAULT_IGNORED_DIRECTORIES = [
  "node_modules",
  ".git",
  "dist",
  "build",
  "coverage",
  ".venv",
  "venv",
  "__pycache__"
] as const;

const SOURCE_PATTERN = "**/*.{ts,tsx,mts,cts}";
const DECLARATION_FILE_PATTERN = "**/*.d.{ts,mts,cts}";

export type FindFilesOptions = {
  /** Directory names pruned in addition to the defaults. */
  ignore?: readonly string[];
};

/**
 * Absolute paths of every declaration source below `root`, sorted so repeated scans see the
 * same order.
 */
export async function findDeclarationFiles(root: string, options: FindFilesOptions = {}): Promise<string[]> {
  const ignoredNames = [...new Set([...DEFAULT_IGNORED_DIRECTORIES, ...(options.ignore || [])])];
  const files = await fg.glob(SOURCE_PATTERN, {
    cwd: root,
    absolute: true,
    dot: true,
    onlyFiles: true,
    ignore: [...ignoredNames.map((name) => `**/${fg.escapePath(name)}/**`), DECLARATION_FILE_PATTERN]
  });
  return files.sort();
}
