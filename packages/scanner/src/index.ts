export {
  extractDeclarations,
  literalValue,
  type ExtractOptions,
  type FileScanResult,
  type ScanDiagnostic
} from "./extract";
export { DEFAULT_IGNORED_DIRECTORIES, findDeclarationFiles, type FindFilesOptions } from "./files";
export { scanOperations, type ScanOptions, type ScanResult } from "./scan";
