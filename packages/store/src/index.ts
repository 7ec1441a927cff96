export {
  InMemoryPartitionStore,
  PostgresPartitionStore,
  RedisPartitionStore,
  NETWORK_STORE_DRIVERS,
  assertTableName,
  createPartitionStore,
  createPostgresExecutor,
  type NetworkStoreDriver,
  type PartitionStoreOptions,
  type RedisPartitionClient,
  type SqlExecutor,
  type StoreDriver
} from "./partition-store";
