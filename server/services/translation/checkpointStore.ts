import { mkdir, readFile, stat, unlink, writeFile } from "node:fs/promises";
import path from "node:path";
import { setTimeout as delay } from "node:timers/promises";
import { z } from "zod";

import type { SessionCheckpoint, SessionLock } from "@pali-corpus/corpus-types";

import { PipelineError, SessionLockedError, errorMessage } from "../../errors";
import { writeFileAtomic } from "../corpus/corpusStore";

export interface CheckpointStore {
  readonly label: string;
  read(): Promise<SessionCheckpoint | null>;
  write(record: SessionCheckpoint): Promise<void>;
  remove(): Promise<void>;
  /**
   * Atomic read-modify-write. `mutate` sees the current record and returns the
   * replacement, or null to leave it untouched; anything it throws aborts the update.
   */
  update(mutate: CheckpointMutation): Promise<SessionCheckpoint | null>;
}

export type CheckpointMutation = (current: SessionCheckpoint | null) => SessionCheckpoint | null;

const languageSchema = z.enum(["english", "sinhala"]);

const checkpointSchema = z.object({
  version: z.literal(1),
  status: z.enum(["active", "complete"]),
  lastCompletedLocation: z.string().nullable(),
  lastCompletedBatchIndex: z.number().int(),
  timestamp: z.string(),
  lock: z
    .object({
      owner: z.string(),
      pid: z.number().int(),
      acquiredAt: z.string(),
      heartbeatAt: z.string(),
    })
    .nullable(),
  review: z.array(
    z.object({
      location: z.string(),
      sourceText: z.string(),
      language: languageSchema,
      code: z.string(),
      message: z.string(),
      recordedAt: z.string(),
    }),
  ),
  conflicts: z.array(
    z.object({
      location: z.string(),
      sourceText: z.string(),
      language: languageSchema,
      conflictingLocations: z.array(z.string()),
      proposed: z.string(),
      recordedAt: z.string(),
    }),
  ),
}) satisfies z.ZodType<SessionCheckpoint>;

export function parseCheckpoint(raw: unknown, source: string): SessionCheckpoint {
  const parsed = checkpointSchema.safeParse(raw);
  if (!parsed.success) {
    throw new PipelineError(
      "checkpoint_invalid",
      `Checkpoint ${source} is not a valid session record: ${parsed.error.issues[0]?.message ?? "unknown"}`,
    );
  }
  return parsed.data;
}

export const createCheckpoint = (now: Date): SessionCheckpoint => ({
  version: 1,
  status: "active",
  lastCompletedLocation: null,
  lastCompletedBatchIndex: -1,
  timestamp: now.toISOString(),
  lock: null,
  review: [],
  conflicts: [],
});

const hasCode = (error: unknown, code: string): boolean =>
  error instanceof Error && "code" in error && error.code === code;

const isMissingFile = (error: unknown): boolean => hasCode(error, "ENOENT");

export interface FileCheckpointStoreOptions {
  /** How long to wait for the update mutex before giving up. */
  mutexTimeoutMs?: number;
  /** A mutex file older than this is left over from a crashed process. */
  mutexStaleMs?: number;
  retryDelayMs?: number;
}

/**
 * Checkpoint file guarded, for updates, by a `<label>.lock` mutex created with an
 * exclusive open, so only one process at a time runs a read-modify-write.
 */
export class FileCheckpointStore implements CheckpointStore {
  readonly mutexPath: string;
  private readonly mutexTimeoutMs: number;
  private readonly mutexStaleMs: number;
  private readonly retryDelayMs: number;

  constructor(readonly label: string, options: FileCheckpointStoreOptions = {}) {
    this.mutexPath = `${label}.lock`;
    this.mutexTimeoutMs = options.mutexTimeoutMs ?? 10_000;
    this.mutexStaleMs = options.mutexStaleMs ?? 30_000;
    this.retryDelayMs = options.retryDelayMs ?? 20;
  }

  async read(): Promise<SessionCheckpoint | null> {
    let raw: string;
    try {
      raw = await readFile(this.label, "utf8");
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new PipelineError(
        "checkpoint_invalid",
        `Checkpoint ${this.label} is not valid JSON: ${errorMessage(error)}`,
      );
    }
    return parseCheckpoint(json, this.label);
  }

  async write(record: SessionCheckpoint): Promise<void> {
    await writeFileAtomic(this.label, `${JSON.stringify(record, null, 2)}\n`);
  }

  async remove(): Promise<void> {
    try {
      await unlink(this.label);
    } catch (error) {
      if (!isMissingFile(error)) throw error;
    }
  }

  async update(mutate: CheckpointMutation): Promise<SessionCheckpoint | null> {
    await this.lockMutex();
    try {
      const current = await this.read();
      const next = mutate(current);
      if (next === null) return current;
      await this.write(next);
      return next;
    } finally {
      await this.unlockMutex();
    }
  }

  private async lockMutex(): Promise<void> {
    await mkdir(path.dirname(this.mutexPath), { recursive: true });
    const deadline = Date.now() + this.mutexTimeoutMs;
    for (;;) {
      try {
        await writeFile(this.mutexPath, `${process.pid}\n`, { flag: "wx" });
        return;
      } catch (error) {
        if (!hasCode(error, "EEXIST")) throw error;
      }
      if (await this.clearStaleMutex()) continue;
      if (Date.now() >= deadline) {
        throw new PipelineError(
          "checkpoint_busy",
          `Checkpoint ${this.label} is being updated by another process (${this.mutexPath}).`,
        );
      }
      await delay(this.retryDelayMs);
    }
  }

  private async clearStaleMutex(): Promise<boolean> {
    try {
      const { mtimeMs } = await stat(this.mutexPath);
      if (Date.now() - mtimeMs < this.mutexStaleMs) return false;
      await unlink(this.mutexPath);
      return true;
    } catch (error) {
      if (isMissingFile(error)) return true;
      throw error;
    }
  }

  private async unlockMutex(): Promise<void> {
    try {
      await unlink(this.mutexPath);
    } catch (error) {
      if (!isMissingFile(error)) throw error;
    }
  }
}

export class InMemoryCheckpointStore implements CheckpointStore {
  readonly label = "memory";
  writes: SessionCheckpoint[] = [];
  private record: string | null;

  constructor(initial: SessionCheckpoint | null = null) {
    this.record = initial ? JSON.stringify(initial) : null;
  }

  async read(): Promise<SessionCheckpoint | null> {
    return this.record === null ? null : parseCheckpoint(JSON.parse(this.record), this.label);
  }

  async write(record: SessionCheckpoint): Promise<void> {
    this.record = JSON.stringify(record);
    this.writes.push(parseCheckpoint(JSON.parse(this.record), this.label));
  }

  async remove(): Promise<void> {
    this.record = null;
  }

  // No await between the read and the write: the update is a single step.
  async update(mutate: CheckpointMutation): Promise<SessionCheckpoint | null> {
    const current =
      this.record === null ? null : parseCheckpoint(JSON.parse(this.record), this.label);
    const next = mutate(current);
    if (next === null) return current;
    this.record = JSON.stringify(next);
    this.writes.push(parseCheckpoint(JSON.parse(this.record), this.label));
    return next;
  }
}

// ---------------------------------------------------------------------------
// Session lock
// ---------------------------------------------------------------------------

export function isLockStale(record: SessionCheckpoint, now: Date, staleMs: number): boolean {
  if (!record.lock) return true;
  const heartbeat = Date.parse(record.lock.heartbeatAt);
  return Number.isNaN(heartbeat) || now.getTime() - heartbeat >= staleMs;
}

async function commit(
  store: CheckpointStore,
  mutate: (current: SessionCheckpoint | null) => SessionCheckpoint,
): Promise<SessionCheckpoint> {
  const written = await store.update(mutate);
  if (!written) throw new PipelineError("checkpoint_invalid", `Checkpoint ${store.label} was not written.`);
  return written;
}

const lockBlocks = (
  record: SessionCheckpoint,
  owner: string,
  now: Date,
  staleMs: number,
): record is SessionCheckpoint & { lock: SessionLock } =>
  record.lock !== null && record.lock.owner !== owner && !isLockStale(record, now, staleMs);

/**
 * Claims the checkpoint for `owner`, creating it when absent. A lock held by another
 * owner is honored until its heartbeat is older than `staleMs`. The staleness check
 * and the claim run inside one store update.
 */
export async function acquireLock(
  store: CheckpointStore,
  owner: string,
  now: Date,
  staleMs: number,
): Promise<SessionCheckpoint> {
  const stamp = now.toISOString();
  const written = await commit(store, (current) => {
    const record = current ?? createCheckpoint(now);
    if (lockBlocks(record, owner, now, staleMs)) {
      throw new SessionLockedError(record.lock.owner, record.lock.heartbeatAt);
    }
    return {
      ...record,
      timestamp: stamp,
      lock: { owner, pid: process.pid, acquiredAt: stamp, heartbeatAt: stamp },
    };
  });
  return written;
}

/** Throws SessionLockedError unless `owner` still holds the record's lock. */
export function assertLockOwner(
  record: SessionCheckpoint | null,
  owner: string,
): asserts record is SessionCheckpoint & { lock: SessionLock } {
  if (!record || !record.lock) {
    throw new SessionLockedError(null, null);
  }
  if (record.lock.owner !== owner) {
    throw new SessionLockedError(record.lock.owner, record.lock.heartbeatAt);
  }
}

/**
 * Writes `next` only while `owner` holds the lock, stamping a fresh heartbeat.
 * A lock taken over by someone else is left as it is.
 */
export async function writeAsOwner(
  store: CheckpointStore,
  owner: string,
  next: SessionCheckpoint,
  now: Date,
): Promise<SessionCheckpoint> {
  const stamp = now.toISOString();
  const written = await commit(store, (current) => {
    assertLockOwner(current, owner);
    return { ...next, timestamp: stamp, lock: { ...current.lock, heartbeatAt: stamp } };
  });
  return written;
}

/** Refreshes the heartbeat of a lock `owner` still holds. */
export async function refreshLock(
  store: CheckpointStore,
  owner: string,
  now: Date,
): Promise<SessionCheckpoint> {
  const stamp = now.toISOString();
  const written = await commit(store, (current) => {
    assertLockOwner(current, owner);
    return { ...current, lock: { ...current.lock, heartbeatAt: stamp } };
  });
  return written;
}

export async function releaseLock(store: CheckpointStore, owner: string): Promise<void> {
  await store.update((current) =>
    current && current.lock?.owner === owner ? { ...current, lock: null } : null,
  );
}
