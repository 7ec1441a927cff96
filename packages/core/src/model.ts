import { z } from "zod";

export const HTTP_METHODS = ["GET", "POST", "PUT", "DELETE", "PATCH"] as const;
export type HttpMethod = (typeof HTTP_METHODS)[number];

export const SYSTEM_OWNER = "system";
export const ALL_TAG = "all";
export const DEFAULT_TAG = "default";
export const OPERATION_TYPE = "custom";

const METHOD_MESSAGE = `Method must be one of ${HTTP_METHODS.join(", ")}`;

export type LiteralValue =
  | string
  | number
  | boolean
  | null
  | LiteralValue[]
  | { [key: string]: LiteralValue };

export const literalValueSchema: z.ZodType<LiteralValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(literalValueSchema),
    z.record(literalValueSchema)
  ])
);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function uniqueTags(tags: string[]): string[] {
  return [...new Set(tags)];
}

const paramSchema = z.object({
  name: z.string().min(1, "param name is required"),
  description: z.string()
});

export type OperationParam = z.output<typeof paramSchema>;

// A flat { name: description } mapping is accepted and kept in declaration order.
const paramsSchema = z.preprocess((value) => {
  if (value === undefined) {
    return [];
  }
  if (isPlainObject(value)) {
    return Object.entries(value).map(([name, description]) => ({ name, description }));
  }
  return value;
}, z.array(paramSchema));

const methodSchema = z
  .string({ required_error: "method is required" })
  .transform((value) => value.trim().toUpperCase())
  .pipe(z.enum(HTTP_METHODS, { errorMap: () => ({ message: METHOD_MESSAGE }) }));

const tagValuesSchema = z.array(z.string().trim().min(1, "tags must not contain empty values"));

const tagListSchema = tagValuesSchema.min(1, "tags must not be empty").transform(uniqueTags);

export const operationRecordSchema = z.object({
  id: z.string().min(1, "id is required"),
  name: z.string().min(1, "name is required"),
  description: z.string(),
  method: methodSchema,
  url: z.string().min(1, "url is required"),
  tags: tagListSchema.default([DEFAULT_TAG]),
  params: paramsSchema,
  parameters: literalValueSchema.optional(),
  includeAccessToken: z.boolean().default(true),
  type: z.literal(OPERATION_TYPE).default(OPERATION_TYPE),
  schema: literalValueSchema.optional()
});

export type OperationRecord = z.output<typeof operationRecordSchema>;
export type OperationInput = z.input<typeof operationRecordSchema>;

export const operationRefSchema = z.object({
  id: z.string().min(1, "id is required"),
  name: z.string().min(1, "name is required"),
  url: z.string().min(1, "url is required"),
  // An empty list still reaches the all partition.
  tags: tagValuesSchema.transform(uniqueTags).default([DEFAULT_TAG])
});

export type OperationRef = z.output<typeof operationRefSchema>;

export type FieldIssue = {
  path: string;
  message: string;
};

export type ValidationOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; issues: FieldIssue[] };

function validateWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): ValidationOutcome<T> {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return { ok: true, value: parsed.data };
  }

  return {
    ok: false,
    issues: parsed.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message
    }))
  };
}

/**
 * Check an untrusted value against the operation record schema.
 *
 * Never throws: schema violations come back as field-level issues so callers can report them
 * per candidate and keep going.
 */
export function validateOperation(input: unknown): ValidationOutcome<OperationRecord> {
  return validateWith(operationRecordSchema, input);
}

export function validateOperationRef(input: unknown): ValidationOutcome<OperationRef> {
  return validateWith(operationRefSchema, input);
}

export function formatFieldIssues(issues: FieldIssue[]): string {
  return issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join("; ");
}

/**
 * Tags a record is written under: the declared tags followed by `all`, without duplicates.
 */
export function effectiveTags(tags: readonly string[]): string[] {
  const result = new Set(tags);
  result.add(ALL_TAG);
  return [...result];
}

/**
 * Delete matching requires the full (id, name, url) triple; an id alone may have been reused.
 */
export function matchesOperationRef(
  record: Pick<OperationRecord, "id" | "name" | "url">,
  ref: Pick<OperationRef, "id" | "name" | "url">
): boolean {
  return record.id === ref.id && record.name === ref.name && record.url === ref.url;
}
