import { AppError } from "./errors";
import {
  ALL_TAG,
  DEFAULT_TAG,
  SYSTEM_OWNER,
  formatFieldIssues,
  validateOperation,
  validateOperationRef,
  type FieldIssue,
  type OperationRecord
} from "./model";
import type { DeleteOutcome, RegistrySynchronizer } from "./registry";

export type RegistryResult<T> =
  | { success: true; message: string; data: T }
  | { success: false; message: string; code: string; issues?: FieldIssue[] };

function validationFailure(prefix: string, issues: FieldIssue[]): RegistryResult<never> {
  return {
    success: false,
    code: "VALIDATION_ERROR",
    message: `${prefix}: ${formatFieldIssues(issues)}`,
    issues
  };
}

// Store and other known failures become result values; anything else is a bug and propagates.
function toFailure(error: unknown): RegistryResult<never> {
  if (error instanceof AppError) {
    return { success: false, code: error.code, message: error.message };
  }
  throw error;
}

/**
 * Entry points used by the HTTP and CLI drivers. Every call resolves to a {@link RegistryResult}.
 */
export class OperationRegistry {
  constructor(private readonly synchronizer: RegistrySynchronizer) {}

  /**
   * Validate every input, then upsert each one for `owner`. Nothing is written when any input is
   * invalid.
   */
  async registerOperations(owner: string, inputs: readonly unknown[]): Promise<RegistryResult<OperationRecord[]>> {
    const records: OperationRecord[] = [];
    const issues: FieldIssue[] = [];

    inputs.forEach((input, index) => {
      const outcome = validateOperation(input);
      if (outcome.ok) {
        records.push(outcome.value);
        return;
      }
      for (const issue of outcome.issues) {
        issues.push({ path: issue.path ? `ops.${index}.${issue.path}` : `ops.${index}`, message: issue.message });
      }
    });

    if (issues.length > 0) {
      return validationFailure("Operation validation failed", issues);
    }

    try {
      const stored: OperationRecord[] = [];
      for (const record of records) {
        stored.push(await this.synchronizer.upsert(owner, record));
      }
      return {
        success: true,
        message: "Successfully associated operations with provided tags and user",
        data: stored
      };
    } catch (error) {
      return toFailure(error);
    }
  }

  async listOperations(owner: string, tag: string = DEFAULT_TAG): Promise<RegistryResult<OperationRecord[]>> {
    try {
      const data = await this.synchronizer.fetch(owner, tag);
      return { success: true, message: "Successfully retrieved available operations for user", data };
    } catch (error) {
      return toFailure(error);
    }
  }

  async listAllOperations(): Promise<RegistryResult<OperationRecord[]>> {
    return this.listOperations(SYSTEM_OWNER, ALL_TAG);
  }

  async deleteOperation(owner: string, input: unknown): Promise<RegistryResult<DeleteOutcome>> {
    const outcome = validateOperationRef(input);
    if (!outcome.ok) {
      return validationFailure("Operation reference is invalid", outcome.issues);
    }

    try {
      const data = await this.synchronizer.delete(owner, outcome.value);
      return {
        success: true,
        message:
          data.removed > 0
            ? "Successfully deleted the specified operation(s)"
            : "No matching operation(s) found to delete",
        data
      };
    } catch (error) {
      return toFailure(error);
    }
  }
}
