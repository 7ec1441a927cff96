import type { LiteralValue } from "./model";

/**
 * Decorator names the declaration scanner recognizes. Matching is by identifier at the
 * decorator call site, so an aliased import of `op` is not discovered.
 */
export const DECLARATION_MARKERS = ["op", "vop"] as const;
export type DeclarationMarker = (typeof DECLARATION_MARKERS)[number];

export type OperationDeclaration = {
  name: string;
  path: string;
  description: string;
  method?: string;
  tags?: string[];
  params?: Record<string, string>;
  parameters?: LiteralValue;
};

const declarations = new WeakMap<object, OperationDeclaration>();

/**
 * Marks a handler method as a registrable operation.
 *
 * The method is left untouched; the declaration is only remembered so it can be read back with
 * {@link getDeclaredOperation}. Registration itself goes through the static scanner.
 */
export function op(declaration: OperationDeclaration) {
  return function <T extends (...args: never[]) => unknown>(
    _target: object,
    _propertyKey: string | symbol,
    descriptor: TypedPropertyDescriptor<T>
  ): void {
    if (descriptor.value) {
      declarations.set(descriptor.value, declaration);
    }
  };
}

export const vop = op;

export function getDeclaredOperation(handler: object): OperationDeclaration | undefined {
  return declarations.get(handler);
}

export function isDeclarationMarker(name: string, markers: readonly string[] = DECLARATION_MARKERS): boolean {
  return markers.includes(name);
}
