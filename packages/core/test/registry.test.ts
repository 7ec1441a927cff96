import { describe, expect, it, vi } from "vitest";
import { RegistrySynchronizer, StoreError, type OperationRecord } from "../src";
import { FakePartitionStore, makeRecord, silentLogger } from "./helpers/fake-store";

function createSynchronizer(store = new FakePartitionStore()) {
  return { store, sync: new RegistrySynchronizer({ store, logger: silentLogger }) };
}

describe("RegistrySynchronizer.upsert", () => {
  it("writes the record under every declared tag and under all", async () => {
    const { store, sync } = createSynchronizer();

    await sync.upsert("alice", makeRecord({ tags: ["x", "y"] }));

    expect((await sync.fetch("alice", "x")).map((record) => record.id)).toEqual(["op1"]);
    expect((await sync.fetch("alice", "y")).map((record) => record.id)).toEqual(["op1"]);
    expect((await sync.fetch("alice", "all")).map((record) => record.id)).toEqual(["op1"]);
    expect(store.peek("alice", "x")?.[0]?.tags).toEqual(["x", "y", "all"]);
  });

  it("writes the all partition once when it is already declared", async () => {
    const { store, sync } = createSynchronizer();

    const stored = await sync.upsert("alice", makeRecord({ tags: ["all", "x"] }));

    expect(stored.tags).toEqual(["all", "x"]);
    expect(store.calls.filter((call) => call.call === "put").map((call) => call.tag)).toEqual(["all", "x"]);
  });

  it("is idempotent for identical records", async () => {
    const { store, sync } = createSynchronizer();
    const record = makeRecord();

    await sync.upsert("alice", record);
    const once = structuredClone(store.peek("alice", "default"));
    await sync.upsert("alice", record);

    expect(store.peek("alice", "default")).toEqual(once);
  });

  it("replaces an entry with the same id in place", async () => {
    const { store, sync } = createSynchronizer();
    store.seed("alice", "default", [
      makeRecord({ id: "first", name: "First", url: "/first" }),
      makeRecord({ id: "op1", description: "old" }),
      makeRecord({ id: "last", name: "Last", url: "/last" })
    ]);

    await sync.upsert("alice", makeRecord({ description: "new" }));

    const partition = store.peek("alice", "default") || [];
    expect(partition).toHaveLength(3);
    expect(partition.map((record) => record.id)).toEqual(["first", "op1", "last"]);
    expect(partition[1]?.description).toBe("new");
  });

  it("appends when the id is new to the partition", async () => {
    const { store, sync } = createSynchronizer();
    store.seed("alice", "default", [makeRecord({ id: "other", name: "Other", url: "/other" })]);

    await sync.upsert("alice", makeRecord());

    expect(store.peek("alice", "default")?.map((record) => record.id)).toEqual(["other", "op1"]);
  });

  it("does not mutate the list it read", async () => {
    const seeded: OperationRecord[] = [makeRecord({ description: "old" })];
    const store = new FakePartitionStore();
    vi.spyOn(store, "getPartition").mockResolvedValue(seeded);
    const { sync } = createSynchronizer(store);

    await sync.upsert("alice", makeRecord({ description: "new" }));

    expect(seeded).toHaveLength(1);
    expect(seeded[0]?.description).toBe("old");
  });

  it("wraps store failures and leaves earlier tags written", async () => {
    const { store, sync } = createSynchronizer();
    store.failWhen = (call, _owner, tag) => call === "put" && tag === "y";

    await expect(sync.upsert("alice", makeRecord({ tags: ["x", "y"] }))).rejects.toBeInstanceOf(StoreError);
    expect(store.has("alice", "x")).toBe(true);
    expect(store.has("alice", "y")).toBe(false);
    expect(store.has("alice", "all")).toBe(false);
  });
});

describe("RegistrySynchronizer.delete", () => {
  it("removes the record from every tag partition and drops emptied partitions", async () => {
    const { store, sync } = createSynchronizer();
    await sync.upsert("alice", makeRecord({ tags: ["x"] }));

    const outcome = await sync.delete("alice", { id: "op1", name: "Echo", url: "/echo", tags: ["x"] });

    expect(outcome).toEqual({ removed: 2, tags: ["x", "all"] });
    expect(store.has("alice", "x")).toBe(false);
    expect(store.has("alice", "all")).toBe(false);
    expect(await sync.fetch("alice", "x")).toEqual([]);
  });

  it("keeps a record whose url differs from the reference", async () => {
    const { store, sync } = createSynchronizer();
    await sync.upsert("alice", makeRecord());

    const outcome = await sync.delete("alice", { id: "op1", name: "Echo", url: "/other", tags: ["default"] });

    expect(outcome).toEqual({ removed: 0, tags: [] });
    expect(store.peek("alice", "default")).toHaveLength(1);
  });

  it("writes back the remaining records when the partition is not emptied", async () => {
    const { store, sync } = createSynchronizer();
    await sync.upsert("alice", makeRecord({ id: "keep", name: "Keep", url: "/keep" }));
    await sync.upsert("alice", makeRecord());

    await sync.delete("alice", { id: "op1", name: "Echo", url: "/echo", tags: ["default"] });

    expect(store.peek("alice", "default")?.map((record) => record.id)).toEqual(["keep"]);
    expect(store.peek("alice", "all")?.map((record) => record.id)).toEqual(["keep"]);
  });

  it("cleans only the all partition for a reference with no tags", async () => {
    const { store, sync } = createSynchronizer();
    await sync.upsert("alice", makeRecord({ tags: ["x"] }));

    const outcome = await sync.delete("alice", { id: "op1", name: "Echo", url: "/echo", tags: [] });

    expect(outcome).toEqual({ removed: 1, tags: ["all"] });
    expect(store.has("alice", "all")).toBe(false);
    expect(store.peek("alice", "x")?.map((record) => record.id)).toEqual(["op1"]);
  });

  it("treats a reference matching nothing as a no-op", async () => {
    const { store, sync } = createSynchronizer();

    const outcome = await sync.delete("alice", { id: "ghost", name: "Ghost", url: "/ghost", tags: ["default"] });

    expect(outcome).toEqual({ removed: 0, tags: [] });
    expect(store.calls.filter((call) => call.call !== "get")).toEqual([]);
  });
});

describe("RegistrySynchronizer.fetch", () => {
  it("returns owner records followed by system records", async () => {
    const { store, sync } = createSynchronizer();
    store.seed("alice", "default", [makeRecord({ id: "mine" })]);
    store.seed("system", "default", [makeRecord({ id: "shared" }), makeRecord({ id: "mine" })]);

    const records = await sync.fetch("alice", "default");

    expect(records.map((record) => record.id)).toEqual(["mine", "shared", "mine"]);
  });

  it("returns only the owner records when the system read fails", async () => {
    const store = new FakePartitionStore();
    store.seed("alice", "default", [makeRecord({ id: "mine" })]);
    store.failWhen = (call, owner) => call === "get" && owner === "system";
    const logger = { info: vi.fn(), error: vi.fn() };
    const sync = new RegistrySynchronizer({ store, logger });

    const records = await sync.fetch("alice", "default");

    expect(records.map((record) => record.id)).toEqual(["mine"]);
    expect(logger.error).toHaveBeenCalledWith(
      "registry.fallback.failed",
      expect.objectContaining({ owner: "alice", tag: "default" })
    );
  });

  it("fails when the owner partition cannot be read", async () => {
    const { store, sync } = createSynchronizer();
    store.failWhen = (call, owner) => call === "get" && owner === "alice";

    await expect(sync.fetch("alice", "default")).rejects.toThrow(/Failed to read partition alice\/default/);
  });

  it("does not fall back when reading the system owner", async () => {
    const { store, sync } = createSynchronizer();
    store.seed("system", "all", [makeRecord({ id: "shared" })]);

    const records = await sync.fetch("system", "all");

    expect(records.map((record) => record.id)).toEqual(["shared"]);
    expect(store.calls).toEqual([{ call: "get", owner: "system", tag: "all" }]);
  });

  it("reads the default tag when none is given", async () => {
    const { store, sync } = createSynchronizer();
    store.seed("system", "default", [makeRecord({ id: "shared" })]);

    const records = await sync.fetch("bob");

    expect(records.map((record) => record.id)).toEqual(["shared"]);
  });
});

describe("register, list and delete round trip", () => {
  it("finds the record under its tag and all, then forgets it", async () => {
    const { sync } = createSynchronizer();
    const record = makeRecord();

    await sync.upsert("alice", record);
    expect(await sync.fetch("alice", "default")).toEqual([{ ...record, tags: ["default", "all"] }]);
    expect(await sync.fetch("alice", "all")).toEqual([{ ...record, tags: ["default", "all"] }]);

    await sync.delete("alice", { id: "op1", name: "Echo", url: "/echo", tags: ["default"] });
    expect(await sync.fetch("alice", "default")).toEqual([]);
  });
});
