import {
  DECLARATION_MARKERS,
  isDeclarationMarker,
  validateOperation,
  type LiteralValue,
  type OperationRecord
} from "@opsreg/core";
import ts from "typescript";

export type ScanDiagnostic = {
  kind: "read" | "parse" | "validation";
  file: string;
  message: string;
  candidate?: string;
  field?: string;
  line?: number;
};

export type FileScanResult = {
  operations: OperationRecord[];
  diagnostics: ScanDiagnostic[];
};

export type ExtractOptions = {
  markers?: readonly string[];
};

const REQUIRED_KEYWORDS = ["path", "name", "description"] as const;

function unwrap(node: ts.Expression): ts.Expression {
  let current = node;
  while (ts.isParenthesizedExpression(current) || ts.isAsExpression(current) || ts.isSatisfiesExpression(current)) {
    current = current.expression;
  }
  return current;
}

function propertyKey(name: ts.PropertyName): string | undefined {
  if (ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)) {
    return name.text;
  }
  return undefined;
}

/**
 * Reads a literal out of the syntax tree. Anything that is not built from literals comes back as
 * its source text; nothing is evaluated.
 */
export function literalValue(node: ts.Expression, sourceFile: ts.SourceFile): LiteralValue {
  const expression = unwrap(node);

  if (ts.isStringLiteral(expression) || ts.isNoSubstitutionTemplateLiteral(expression)) {
    return expression.text;
  }
  if (ts.isNumericLiteral(expression)) {
    return Number(expression.text);
  }
  if (
    ts.isPrefixUnaryExpression(expression) &&
    ts.isNumericLiteral(expression.operand) &&
    (expression.operator === ts.SyntaxKind.MinusToken || expression.operator === ts.SyntaxKind.PlusToken)
  ) {
    const value = Number(expression.operand.text);
    return expression.operator === ts.SyntaxKind.MinusToken ? -value : value;
  }
  if (expression.kind === ts.SyntaxKind.TrueKeyword) {
    return true;
  }
  if (expression.kind === ts.SyntaxKind.FalseKeyword) {
    return false;
  }
  if (expression.kind === ts.SyntaxKind.NullKeyword) {
    return null;
  }
  if (ts.isArrayLiteralExpression(expression)) {
    return expression.elements.map((element) => literalValue(element, sourceFile));
  }
  if (ts.isObjectLiteralExpression(expression)) {
    return objectLiteral(expression, sourceFile);
  }
  return expression.getText(sourceFile);
}

function objectLiteral(node: ts.ObjectLiteralExpression, sourceFile: ts.SourceFile): { [key: string]: LiteralValue } {
  const result: { [key: string]: LiteralValue } = {};
  for (const property of node.properties) {
    if (ts.isPropertyAssignment(property)) {
      const key = propertyKey(property.name);
      if (key !== undefined) {
        result[key] = literalValue(property.initializer, sourceFile);
      }
    } else if (ts.isShorthandPropertyAssignment(property)) {
      result[property.name.text] = property.name.text;
    }
  }
  return result;
}

function isHandler(node: ts.Node): node is ts.MethodDeclaration | ts.PropertyDeclaration {
  if (ts.isMethodDeclaration(node)) {
    return true;
  }
  if (!ts.isPropertyDeclaration(node) || !node.initializer) {
    return false;
  }
  const initializer = unwrap(node.initializer);
  return ts.isArrowFunction(initializer) || ts.isFunctionExpression(initializer);
}

type Candidate = {
  keywords: Record<string, ts.Expression>;
  line: number;
};

function markerCall(decorator: ts.Decorator, markers: readonly string[]): ts.ObjectLiteralExpression | undefined {
  const call = decorator.expression;
  if (!ts.isCallExpression(call) || !ts.isIdentifier(call.expression)) {
    return undefined;
  }
  if (!isDeclarationMarker(call.expression.text, markers)) {
    return undefined;
  }
  const [first] = call.arguments;
  return first && ts.isObjectLiteralExpression(first) ? first : undefined;
}

function collectCandidates(sourceFile: ts.SourceFile, markers: readonly string[]): Candidate[] {
  const candidates: Candidate[] = [];

  const visit = (node: ts.Node): void => {
    if (isHandler(node) && ts.canHaveDecorators(node)) {
      for (const decorator of ts.getDecorators(node) || []) {
        const args = markerCall(decorator, markers);
        if (!args) {
          continue;
        }
        const keywords: Record<string, ts.Expression> = {};
        for (const property of args.properties) {
          if (ts.isPropertyAssignment(property)) {
            const key = propertyKey(property.name);
            if (key !== undefined) {
              keywords[key] = property.initializer;
            }
          } else if (ts.isShorthandPropertyAssignment(property)) {
            keywords[property.name.text] = property.name;
          }
        }
        const { line } = sourceFile.getLineAndCharacterOfPosition(decorator.getStart(sourceFile));
        candidates.push({ keywords, line: line + 1 });
      }
    }
    ts.forEachChild(node, visit);
  };

  visit(sourceFile);
  return candidates;
}

function qualifies(keywords: Record<string, ts.Expression>): boolean {
  return (
    REQUIRED_KEYWORDS.every((keyword) => keyword in keywords) && ("params" in keywords || "parameters" in keywords)
  );
}

function syntaxErrors(fileName: string, content: string): ts.Diagnostic[] {
  const output = ts.transpileModule(content, {
    fileName,
    reportDiagnostics: true,
    compilerOptions: { target: ts.ScriptTarget.ES2022, experimentalDecorators: true }
  });
  return (output.diagnostics || []).filter(
    (diagnostic) => diagnostic.file !== undefined && diagnostic.category === ts.DiagnosticCategory.Error
  );
}

function describeDiagnostic(diagnostic: ts.Diagnostic): { message: string; line?: number } {
  const message = ts.flattenDiagnosticMessageText(diagnostic.messageText, "\n");
  if (diagnostic.file && diagnostic.start !== undefined) {
    const { line } = diagnostic.file.getLineAndCharacterOfPosition(diagnostic.start);
    return { message, line: line + 1 };
  }
  return { message };
}

/**
 * Finds `@op({...})` / `@vop({...})` declarations in one source file and validates them into
 * operation records.
 *
 * A file that does not parse yields a single `parse` diagnostic and no operations. Each candidate
 * that fails validation yields one `validation` diagnostic per offending field and is dropped.
 */
export function extractDeclarations(fileName: string, content: string, options: ExtractOptions = {}): FileScanResult {
  const errors = syntaxErrors(fileName, content);
  if (errors.length > 0) {
    const [first] = errors;
    return {
      operations: [],
      diagnostics: first ? [{ kind: "parse", file: fileName, ...describeDiagnostic(first) }] : []
    };
  }

  const sourceFile = ts.createSourceFile(fileName, content, ts.ScriptTarget.ES2022, true);
  const markers = options.markers || DECLARATION_MARKERS;
  const operations: OperationRecord[] = [];
  const diagnostics: ScanDiagnostic[] = [];

  for (const candidate of collectCandidates(sourceFile, markers)) {
    if (!qualifies(candidate.keywords)) {
      continue;
    }
    const read = (keyword: string): LiteralValue | undefined => {
      const node = candidate.keywords[keyword];
      return node ? literalValue(node, sourceFile) : undefined;
    };

    const name = read("name");
    const outcome = validateOperation({
      id: name,
      name,
      description: read("description"),
      method: read("method") ?? "POST",
      url: read("path"),
      tags: read("tags"),
      params: read("params"),
      parameters: read("parameters"),
      includeAccessToken: true,
      type: "custom"
    });

    if (outcome.ok) {
      operations.push(outcome.value);
      continue;
    }
    const label = typeof name === "string" ? name : JSON.stringify(name);
    for (const issue of outcome.issues) {
      diagnostics.push({
        kind: "validation",
        file: fileName,
        candidate: label,
        field: issue.path,
        message: issue.message,
        line: candidate.line
      });
    }
  }

  return { operations, diagnostics };
}
