import type { OperationRecord } from "@opsreg/core";
import type { ScanDiagnostic } from "@opsreg/scanner";

export function formatOperation(record: OperationRecord): string[] {
  const lines = [
    "Operation Details:",
    `  Name       : ${record.name}`,
    `  URL        : ${record.url}`,
    `  Method     : ${record.method}`,
    `  Description: ${record.description}`,
    `  ID         : ${record.id}`,
    `  Tags       : ${record.tags.join(", ")}`,
    "  Params:"
  ];
  for (const param of record.params) {
    lines.push(`    - ${param.name} : ${param.description}`);
  }
  if (record.parameters !== undefined) {
    lines.push(`  Parameters : ${JSON.stringify(record.parameters)}`);
  }
  lines.push(`  Include Access Token: ${record.includeAccessToken}`, `  Type       : ${record.type}`, "");
  return lines;
}

export function formatDiagnostic(diagnostic: ScanDiagnostic): string {
  const location = diagnostic.line === undefined ? diagnostic.file : `${diagnostic.file}:${diagnostic.line}`;
  const subject = diagnostic.candidate
    ? ` ${diagnostic.candidate}${diagnostic.field ? ` (${diagnostic.field})` : ""}`
    : "";
  return `[${diagnostic.kind}] ${location}${subject}: ${diagnostic.message}`;
}
