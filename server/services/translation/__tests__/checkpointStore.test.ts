import { after, before, describe, test } from "node:test";
import assert from "node:assert/strict";
import { access, mkdtemp, readFile, rm, utimes, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { PipelineError, SessionLockedError } from "../../../errors";
import {
  FileCheckpointStore,
  InMemoryCheckpointStore,
  acquireLock,
  createCheckpoint,
  isLockStale,
  refreshLock,
  releaseLock,
  writeAsOwner,
} from "../checkpointStore";

const T0 = new Date("2024-03-01T10:00:00.000Z");
const later = (ms: number) => new Date(T0.getTime() + ms);

const outcomes = (results: PromiseSettledResult<unknown>[]) =>
  results.map((result) =>
    result.status === "fulfilled"
      ? "claimed"
      : result.reason instanceof SessionLockedError
        ? "locked"
        : "failed",
  );

describe("InMemoryCheckpointStore", () => {
  test("reads back what was written, as a copy", async () => {
    const store = new InMemoryCheckpointStore();
    assert.equal(await store.read(), null);

    const record = { ...createCheckpoint(T0), lastCompletedLocation: "dn#title" };
    await store.write(record);
    record.lastCompletedLocation = "changed";

    assert.equal((await store.read())?.lastCompletedLocation, "dn#title");
    assert.equal(store.writes.length, 1);

    await store.remove();
    assert.equal(await store.read(), null);
  });
});

describe("FileCheckpointStore", () => {
  let dir = "";

  before(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "checkpoint-"));
  });

  after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("round-trips a record through the file", async () => {
    const store = new FileCheckpointStore(path.join(dir, "session.json"));
    assert.equal(await store.read(), null);

    const record = createCheckpoint(T0);
    await store.write(record);
    assert.deepEqual(await store.read(), record);
    assert.ok((await readFile(store.label, "utf8")).endsWith("}\n"));

    await store.remove();
    assert.equal(await store.read(), null);
    await store.remove();
  });

  test("rejects a file that is not JSON", async () => {
    const file = path.join(dir, "broken.json");
    await writeFile(file, "{ not json", "utf8");
    await assert.rejects(
      new FileCheckpointStore(file).read(),
      (error: unknown) => error instanceof PipelineError && error.code === "checkpoint_invalid",
    );
  });

  test("two stores on one file never both claim the lock", async () => {
    const file = path.join(dir, "race.json");
    const results = await Promise.allSettled([
      acquireLock(new FileCheckpointStore(file, { retryDelayMs: 1 }), "worker-a", T0, 600_000),
      acquireLock(new FileCheckpointStore(file, { retryDelayMs: 1 }), "worker-b", T0, 600_000),
    ]);
    assert.deepEqual(outcomes(results).sort(), ["claimed", "locked"]);
    await assert.rejects(access(`${file}.lock`));
  });

  test("clears a mutex left behind by a crashed process", async () => {
    const file = path.join(dir, "crashed.json");
    const store = new FileCheckpointStore(file, { mutexStaleMs: 1_000 });
    await writeFile(store.mutexPath, "12345\n", "utf8");
    const past = new Date(Date.now() - 60_000);
    await utimes(store.mutexPath, past, past);

    const record = await acquireLock(store, "worker-a", T0, 60_000);
    assert.equal(record.lock?.owner, "worker-a");
    await assert.rejects(access(store.mutexPath));
  });

  test("gives up when the mutex stays held", async () => {
    const file = path.join(dir, "busy.json");
    const store = new FileCheckpointStore(file, { mutexTimeoutMs: 30, retryDelayMs: 5 });
    await writeFile(store.mutexPath, "12345\n", "utf8");

    await assert.rejects(
      acquireLock(store, "worker-a", T0, 60_000),
      (error: unknown) => error instanceof PipelineError && error.code === "checkpoint_busy",
    );
    assert.equal(await store.read(), null);
  });

  test("rejects a record of the wrong shape", async () => {
    const file = path.join(dir, "shape.json");
    await writeFile(file, JSON.stringify({ version: 2 }), "utf8");
    await assert.rejects(new FileCheckpointStore(file).read(), /not a valid session record/);
  });
});

describe("session lock", () => {
  test("creates and locks a record when none exists", async () => {
    const store = new InMemoryCheckpointStore();
    const record = await acquireLock(store, "worker-a", T0, 60_000);

    assert.equal(record.status, "active");
    assert.equal(record.lastCompletedBatchIndex, -1);
    assert.deepEqual(record.lock, {
      owner: "worker-a",
      pid: process.pid,
      acquiredAt: T0.toISOString(),
      heartbeatAt: T0.toISOString(),
    });
    assert.deepEqual(await store.read(), record);
  });

  test("refuses a fresh lock held by someone else", async () => {
    const store = new InMemoryCheckpointStore();
    await acquireLock(store, "worker-a", T0, 60_000);

    await assert.rejects(acquireLock(store, "worker-b", later(1_000), 60_000), (error: unknown) => {
      assert.ok(error instanceof SessionLockedError);
      assert.equal(
        error.message,
        "Checkpoint is locked by worker-a (last heartbeat 2024-03-01T10:00:00.000Z).",
      );
      return true;
    });
  });

  test("concurrent claims on a free record: exactly one wins", async () => {
    const store = new InMemoryCheckpointStore();
    const results = await Promise.allSettled([
      acquireLock(store, "worker-a", T0, 600_000),
      acquireLock(store, "worker-b", T0, 600_000),
    ]);
    assert.deepEqual(outcomes(results), ["claimed", "locked"]);
    assert.equal((await store.read())?.lock?.owner, "worker-a");
    assert.equal(store.writes.length, 1);
  });

  test("concurrent takeovers of a stale lock: exactly one wins", async () => {
    const store = new InMemoryCheckpointStore({
      ...createCheckpoint(T0),
      lock: { owner: "worker-a", pid: 1, acquiredAt: T0.toISOString(), heartbeatAt: T0.toISOString() },
    });
    const results = await Promise.allSettled([
      acquireLock(store, "worker-b", later(60_000), 60_000),
      acquireLock(store, "worker-c", later(60_000), 60_000),
    ]);
    assert.deepEqual(outcomes(results), ["claimed", "locked"]);
    assert.equal((await store.read())?.lock?.owner, "worker-b");
  });

  test("refreshLock moves the heartbeat only for the owner", async () => {
    const store = new InMemoryCheckpointStore();
    await acquireLock(store, "worker-a", T0, 60_000);

    const refreshed = await refreshLock(store, "worker-a", later(5_000));
    assert.equal(refreshed.lock?.heartbeatAt, later(5_000).toISOString());
    assert.equal(refreshed.lock?.acquiredAt, T0.toISOString());

    await assert.rejects(refreshLock(store, "worker-b", later(6_000)), SessionLockedError);
    assert.equal((await store.read())?.lock?.heartbeatAt, later(5_000).toISOString());
  });

  test("writeAsOwner leaves a record taken over by someone else alone", async () => {
    const store = new InMemoryCheckpointStore();
    const mine = await acquireLock(store, "worker-a", T0, 60_000);
    await acquireLock(store, "worker-b", later(60_000), 60_000);

    await assert.rejects(
      writeAsOwner(store, "worker-a", { ...mine, lastCompletedLocation: "dn#title" }, later(60_001)),
      (error: unknown) => error instanceof SessionLockedError && error.owner === "worker-b",
    );
    const stored = await store.read();
    assert.equal(stored?.lock?.owner, "worker-b");
    assert.equal(stored?.lastCompletedLocation, null);
  });

  test("writeAsOwner fails once the record is gone", async () => {
    const store = new InMemoryCheckpointStore();
    const mine = await acquireLock(store, "worker-a", T0, 60_000);
    await store.remove();

    await assert.rejects(writeAsOwner(store, "worker-a", mine, later(1)), {
      message: "Checkpoint lock is no longer held by this session.",
    });
    assert.equal(await store.read(), null);
  });

  test("takes over a stale lock and keeps progress", async () => {
    const store = new InMemoryCheckpointStore({
      ...createCheckpoint(T0),
      lastCompletedLocation: "dn/sila#title",
      lock: {
        owner: "worker-a",
        pid: 1,
        acquiredAt: T0.toISOString(),
        heartbeatAt: T0.toISOString(),
      },
    });

    const record = await acquireLock(store, "worker-b", later(60_000), 60_000);
    assert.equal(record.lock?.owner, "worker-b");
    assert.equal(record.lastCompletedLocation, "dn/sila#title");
  });

  test("the owner can re-acquire its own lock", async () => {
    const store = new InMemoryCheckpointStore();
    await acquireLock(store, "worker-a", T0, 60_000);
    const record = await acquireLock(store, "worker-a", later(10), 60_000);
    assert.equal(record.lock?.heartbeatAt, later(10).toISOString());
  });

  test("only the owner releases", async () => {
    const store = new InMemoryCheckpointStore();
    await acquireLock(store, "worker-a", T0, 60_000);

    await releaseLock(store, "worker-b");
    assert.equal((await store.read())?.lock?.owner, "worker-a");

    await releaseLock(store, "worker-a");
    assert.equal((await store.read())?.lock, null);
  });

  test("isLockStale treats missing or unreadable heartbeats as stale", () => {
    assert.equal(isLockStale(createCheckpoint(T0), T0, 1_000), true);
    const record = {
      ...createCheckpoint(T0),
      lock: { owner: "a", pid: 1, acquiredAt: "x", heartbeatAt: "not a date" },
    };
    assert.equal(isLockStale(record, T0, 1_000), true);
  });
});
