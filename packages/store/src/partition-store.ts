import { ConfigurationError, type OperationRecord, type PartitionStore } from "@opsreg/core";
import IORedis from "ioredis";
import { Pool } from "pg";

/** Drivers a deployed service may be configured with. */
export const NETWORK_STORE_DRIVERS = ["redis", "postgres"] as const;
export type NetworkStoreDriver = (typeof NETWORK_STORE_DRIVERS)[number];
export type StoreDriver = NetworkStoreDriver | "memory";

const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function assertTableName(table: string): string {
  if (!TABLE_NAME_PATTERN.test(table)) {
    throw new ConfigurationError(
      `Invalid ops table name "${table}": use letters, digits and underscores, not starting with a digit`
    );
  }
  return table;
}

function partitionKey(table: string, owner: string, tag: string): string {
  return `${table}:${encodeURIComponent(owner)}:${encodeURIComponent(tag)}`;
}

/**
 * The subset of ioredis the store talks to.
 */
export type RedisPartitionClient = {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  del(key: string): Promise<number>;
  quit(): Promise<unknown>;
  disconnect(reconnect?: boolean): void;
};

/**
 * One Redis string per partition, holding the JSON-encoded record list under `<table>:<owner>:<tag>`.
 */
export class RedisPartitionStore implements PartitionStore {
  private readonly redis: RedisPartitionClient;
  private readonly table: string;
  private closePromise: Promise<void> | null = null;

  constructor(input: { table: string; redisUrl?: string; redisClient?: RedisPartitionClient }) {
    this.table = assertTableName(input.table);
    if (input.redisClient) {
      this.redis = input.redisClient;
    } else if (input.redisUrl) {
      this.redis = new IORedis(input.redisUrl, { maxRetriesPerRequest: null });
    } else {
      throw new ConfigurationError("REDIS_URL is required when OPS_STORE_DRIVER=redis");
    }
  }

  async getPartition(owner: string, tag: string): Promise<OperationRecord[] | null> {
    const value = await this.redis.get(partitionKey(this.table, owner, tag));
    if (!value) {
      return null;
    }
    return JSON.parse(value) as OperationRecord[];
  }

  async putPartition(owner: string, tag: string, records: OperationRecord[]): Promise<void> {
    await this.redis.set(partitionKey(this.table, owner, tag), JSON.stringify(records));
  }

  async deletePartition(owner: string, tag: string): Promise<void> {
    await this.redis.del(partitionKey(this.table, owner, tag));
  }

  async close(): Promise<void> {
    if (!this.closePromise) {
      this.closePromise = (async () => {
        try {
          await this.redis.quit();
        } catch {
          this.redis.disconnect(false);
        }
      })();
    }
    return this.closePromise;
  }
}

type PartitionRow = {
  ops: OperationRecord[];
};

/**
 * The SQL surface the Postgres store needs; `createPostgresExecutor` adapts a pg `Pool` to it.
 */
export type SqlExecutor = {
  query(text: string, values?: unknown[]): Promise<PartitionRow[]>;
  end(): Promise<void>;
};

export function createPostgresExecutor(pool: Pool): SqlExecutor {
  return {
    query: async (text, values) => {
      const result = await pool.query<PartitionRow>(text, values);
      return result.rows;
    },
    end: () => pool.end()
  };
}

/**
 * One row per (owner, tag) with the record list in a JSONB column.
 */
export class PostgresPartitionStore implements PartitionStore {
  private readonly sql: SqlExecutor;
  private readonly table: string;
  private initPromise: Promise<void> | null = null;

  constructor(input: { table: string; connectionString?: string; executor?: SqlExecutor }) {
    this.table = assertTableName(input.table);
    if (input.executor) {
      this.sql = input.executor;
    } else if (input.connectionString) {
      this.sql = createPostgresExecutor(new Pool({ connectionString: input.connectionString }));
    } else {
      throw new ConfigurationError("POSTGRES_URL is required when OPS_STORE_DRIVER=postgres");
    }
  }

  private async initialize(): Promise<void> {
    if (!this.initPromise) {
      this.initPromise = this.ensureSchema();
    }
    await this.initPromise;
  }

  private async ensureSchema(): Promise<void> {
    await this.sql.query(`
      CREATE TABLE IF NOT EXISTS ${this.table} (
        owner TEXT NOT NULL,
        tag TEXT NOT NULL,
        ops JSONB NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        PRIMARY KEY (owner, tag)
      );
    `);
  }

  async getPartition(owner: string, tag: string): Promise<OperationRecord[] | null> {
    await this.initialize();
    const rows = await this.sql.query(`SELECT ops FROM ${this.table} WHERE owner = $1 AND tag = $2`, [owner, tag]);
    return rows[0]?.ops || null;
  }

  async putPartition(owner: string, tag: string, records: OperationRecord[]): Promise<void> {
    await this.initialize();
    await this.sql.query(
      `
        INSERT INTO ${this.table} (owner, tag, ops, updated_at)
        VALUES ($1, $2, $3::jsonb, NOW())
        ON CONFLICT (owner, tag)
        DO UPDATE SET ops = EXCLUDED.ops, updated_at = EXCLUDED.updated_at
      `,
      [owner, tag, JSON.stringify(records)]
    );
  }

  async deletePartition(owner: string, tag: string): Promise<void> {
    await this.initialize();
    await this.sql.query(`DELETE FROM ${this.table} WHERE owner = $1 AND tag = $2`, [owner, tag]);
  }

  async close(): Promise<void> {
    await this.sql.end();
  }
}

export class InMemoryPartitionStore implements PartitionStore {
  private readonly partitions = new Map<string, OperationRecord[]>();

  async getPartition(owner: string, tag: string): Promise<OperationRecord[] | null> {
    const records = this.partitions.get(partitionKey("memory", owner, tag));
    return records ? structuredClone(records) : null;
  }

  async putPartition(owner: string, tag: string, records: OperationRecord[]): Promise<void> {
    this.partitions.set(partitionKey("memory", owner, tag), structuredClone(records));
  }

  async deletePartition(owner: string, tag: string): Promise<void> {
    this.partitions.delete(partitionKey("memory", owner, tag));
  }

  async close(): Promise<void> {}
}

export type PartitionStoreOptions = {
  driver: StoreDriver;
  table: string;
  redisUrl?: string;
  postgresUrl?: string;
};

export function createPartitionStore(options: PartitionStoreOptions): PartitionStore {
  if (options.driver === "postgres") {
    return new PostgresPartitionStore({ table: options.table, connectionString: options.postgresUrl });
  }
  if (options.driver === "memory") {
    assertTableName(options.table);
    return new InMemoryPartitionStore();
  }
  return new RedisPartitionStore({ table: options.table, redisUrl: options.redisUrl });
}
