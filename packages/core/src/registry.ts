import { describeError, formatErrorForLog, StoreError } from "./errors";
import { consoleLogger, type Logger } from "./log";
import {
  DEFAULT_TAG,
  SYSTEM_OWNER,
  effectiveTags,
  matchesOperationRef,
  type OperationRecord,
  type OperationRef
} from "./model";

/**
 * Keyed (owner, tag) access to lists of operation records. A missing partition reads as `null`.
 */
export interface PartitionStore {
  getPartition(owner: string, tag: string): Promise<OperationRecord[] | null>;
  putPartition(owner: string, tag: string, records: OperationRecord[]): Promise<void>;
  deletePartition(owner: string, tag: string): Promise<void>;
  close(): Promise<void>;
}

export type DeleteOutcome = {
  removed: number;
  tags: string[];
};

function replaceOrAppend(
  existing: readonly OperationRecord[],
  record: OperationRecord
): { records: OperationRecord[]; replaced: boolean } {
  const index = existing.findIndex((item) => item.id === record.id);
  if (index === -1) {
    return { records: [...existing, record], replaced: false };
  }

  const records = [...existing];
  records[index] = record;
  return { records, replaced: true };
}

/**
 * Keeps tag partitions in step for upserts and deletes, and merges the shared system partition
 * into reads for every other owner.
 *
 * Each partition is updated by read, copy, write. Nothing here is atomic: two writers racing on
 * the same (owner, tag) lose one update, and a failure halfway through a fan-out leaves the earlier
 * tags written. Both `upsert` and `delete` are idempotent per tag, so a failed call can be re-run.
 */
export class RegistrySynchronizer {
  private readonly store: PartitionStore;
  private readonly logger: Logger;

  constructor(input: { store: PartitionStore; logger?: Logger }) {
    this.store = input.store;
    this.logger = input.logger || consoleLogger;
  }

  async upsert(owner: string, record: OperationRecord): Promise<OperationRecord> {
    const tags = effectiveTags(record.tags);
    const stored: OperationRecord = { ...record, tags };

    for (const tag of tags) {
      const existing = await this.read(owner, tag);
      const next = replaceOrAppend(existing || [], stored);
      await this.guard(`write partition ${owner}/${tag}`, () => this.store.putPartition(owner, tag, next.records));
      this.logger.info("registry.upsert", { owner, tag, id: stored.id, replaced: next.replaced });
    }

    return stored;
  }

  async delete(owner: string, ref: OperationRef): Promise<DeleteOutcome> {
    const outcome: DeleteOutcome = { removed: 0, tags: [] };

    for (const tag of effectiveTags(ref.tags)) {
      const existing = await this.read(owner, tag);
      if (!existing) {
        continue;
      }

      const remaining = existing.filter((record) => !matchesOperationRef(record, ref));
      if (remaining.length === existing.length) {
        continue;
      }

      if (remaining.length > 0) {
        await this.guard(`write partition ${owner}/${tag}`, () => this.store.putPartition(owner, tag, remaining));
      } else {
        await this.guard(`delete partition ${owner}/${tag}`, () => this.store.deletePartition(owner, tag));
      }

      outcome.removed += existing.length - remaining.length;
      outcome.tags.push(tag);
      this.logger.info("registry.delete", { owner, tag, id: ref.id, emptied: remaining.length === 0 });
    }

    if (outcome.tags.length === 0) {
      this.logger.info("registry.delete.no_match", { owner, id: ref.id, name: ref.name, url: ref.url });
    }

    return outcome;
  }

  /**
   * Owner records first, then system records for the same tag. Ids are not reconciled across the
   * two lists. The system read is best effort: if it fails the owner's records are returned alone.
   */
  async fetch(owner: string, tag: string = DEFAULT_TAG): Promise<OperationRecord[]> {
    const own = [...((await this.read(owner, tag)) || [])];
    if (owner === SYSTEM_OWNER) {
      return own;
    }

    try {
      const system = await this.fetch(SYSTEM_OWNER, tag);
      return [...own, ...system];
    } catch (error) {
      this.logger.error("registry.fallback.failed", { owner, tag, error: formatErrorForLog(error) });
      return own;
    }
  }

  private async read(owner: string, tag: string): Promise<OperationRecord[] | null> {
    return this.guard(`read partition ${owner}/${tag}`, () => this.store.getPartition(owner, tag));
  }

  private async guard<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new StoreError(`Failed to ${action}: ${describeError(error)}`, error);
    }
  }
}
