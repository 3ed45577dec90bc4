import { randomUUID } from "node:crypto";
import { hostname } from "node:os";

import type {
  CorpusTree,
  SessionCheckpoint,
  TargetLanguage,
  TranslatableUnit,
} from "@pali-corpus/corpus-types";

import type { PipelineConfiguration } from "../../config/pipelineConfiguration";
import {
  IllegalTransitionError,
  OverwriteConflictError,
  QuotaExceededError,
  SessionLockedError,
  errorMessage,
} from "../../errors";
import { createLogger, type Logger } from "../../logger";
import type { CorpusRepository } from "../corpus/corpusStore";
import { locationOrder } from "../corpus/corpusTree";
import {
  acquireLock,
  createCheckpoint,
  refreshLock,
  releaseLock,
  writeAsOwner,
} from "./checkpointStore";
import type { CheckpointStore } from "./checkpointStore";
import { chunk } from "./chunker";
import { collectUnits, extract, snapshotFingerprint } from "./extractor";
import { DirtyTracker, merge, type MergeOutcome } from "./mergeEngine";
import type { ProviderResult, TranslationProvider } from "./providers/types";
import { RatePacer, systemClock, type PacerClock } from "./ratePacer";
import { sanitize } from "./sanitizer";
import { joinPieces, splitText } from "./textSplitter";

export type SessionState =
  | "IDLE"
  | "RUNNING"
  | "PAUSED_QUOTA"
  | "PAUSED_ERROR"
  | "PAUSED_USER"
  | "COMPLETE";

type PausedState = Extract<SessionState, `PAUSED_${string}`>;

export interface SessionCounts {
  translated: number;
  propagated: number;
  skippedComplete: number;
  skippedByCheckpoint: number;
  flaggedForReview: number;
  conflicts: number;
}

export interface SessionReport {
  state: SessionState;
  counts: SessionCounts;
  /** Why the session paused; null when it completed. */
  reason: string | null;
  lastCompletedLocation: string | null;
  /** Units still missing a required language when the run ended. */
  pendingUnits: number;
}

export interface SessionDriverOptions {
  repository: CorpusRepository;
  checkpoints: CheckpointStore;
  provider: TranslationProvider;
  config: PipelineConfiguration;
  requiredLanguages?: readonly TargetLanguage[];
  /** Operator override: skip every unit at or before this location key on the next run. */
  resumeAfter?: string | null;
  owner?: string;
  clock?: PacerClock;
  pacer?: RatePacer;
  logger?: Logger;
}

interface Pause {
  state: PausedState;
  reason: string;
}

type StepResult<T> = { ok: true; value: T } | { ok: false; pause: Pause };

const emptyCounts = (): SessionCounts => ({
  translated: 0,
  propagated: 0,
  skippedComplete: 0,
  skippedByCheckpoint: 0,
  flaggedForReview: 0,
  conflicts: 0,
});

export const defaultOwner = (): string =>
  `${hostname()}:${process.pid}:${randomUUID().slice(0, 8)}`;

export class TranslationSessionDriver {
  private currentState: SessionState = "IDLE";
  private stopRequested = false;
  private resumeAfter: string | null;
  private counts: SessionCounts = emptyCounts();
  private checkpoint: SessionCheckpoint | null = null;
  private readonly dirty = new DirtyTracker();

  private readonly owner: string;
  private readonly clock: PacerClock;
  private readonly pacer: RatePacer;
  private readonly log: Logger;
  private readonly languages: readonly TargetLanguage[];

  constructor(private readonly options: SessionDriverOptions) {
    this.owner = options.owner ?? defaultOwner();
    this.clock = options.clock ?? systemClock;
    this.pacer =
      options.pacer ??
      new RatePacer(
        {
          requestDelayMs: options.config.provider.requestDelayMs,
          requestsPerMinute: options.config.provider.requestsPerMinute,
        },
        this.clock,
      );
    this.log = options.logger ?? createLogger("session");
    this.languages = options.requiredLanguages ?? options.config.requiredLanguages;
    this.resumeAfter = options.resumeAfter ?? null;
  }

  get state(): SessionState {
    return this.currentState;
  }

  /** Cooperative stop: the unit in flight finishes and is persisted first. */
  requestStop(): void {
    if (this.currentState !== "RUNNING") {
      throw new IllegalTransitionError(this.currentState, "stop");
    }
    this.stopRequested = true;
  }

  async run(): Promise<SessionReport> {
    if (this.currentState === "RUNNING" || this.currentState === "COMPLETE") {
      throw new IllegalTransitionError(this.currentState, "run");
    }
    const previous = this.currentState;
    this.currentState = "RUNNING";
    this.stopRequested = false;
    this.counts = emptyCounts();

    let locked = false;
    try {
      this.checkpoint = await this.startCheckpoint();
      locked = true;
      return await this.execute(await this.options.repository.load());
    } catch (error) {
      if (error instanceof SessionLockedError && !locked) {
        this.currentState = previous;
        throw error;
      }
      if (error instanceof SessionLockedError) {
        // another session took the checkpoint over; its record is left alone
        this.currentState = "PAUSED_ERROR";
        this.dirty.drain();
        this.log.error({ owner: error.owner }, "[SESSION] Lock lost, stopping");
        throw error;
      }
      this.currentState = "PAUSED_ERROR";
      this.log.error({ err: errorMessage(error) }, "[SESSION] Run aborted");
      throw error;
    } finally {
      if (locked) {
        await releaseLock(this.options.checkpoints, this.owner);
      }
    }
  }

  private now(): Date {
    return new Date(this.clock.now());
  }

  private async startCheckpoint(): Promise<SessionCheckpoint> {
    const record = await acquireLock(
      this.options.checkpoints,
      this.owner,
      this.now(),
      this.options.config.session.lockStaleMs,
    );
    if (record.status === "active") return record;

    // a finished pass: start over, keeping the lock just taken
    const fresh = await this.writeCheckpoint(createCheckpoint(this.now()));
    this.log.info("[SESSION] Previous pass complete, starting a fresh pass");
    return fresh;
  }

  /** Refreshes the heartbeat; throws SessionLockedError once the lock is someone else's. */
  private async heartbeat(): Promise<void> {
    await refreshLock(this.options.checkpoints, this.owner, this.now());
  }

  private async writeCheckpoint(next: SessionCheckpoint): Promise<SessionCheckpoint> {
    this.checkpoint = await writeAsOwner(this.options.checkpoints, this.owner, next, this.now());
    return this.checkpoint;
  }

  private activeCheckpoint(): SessionCheckpoint {
    if (!this.checkpoint) {
      throw new IllegalTransitionError(this.currentState, "write checkpoint");
    }
    return this.checkpoint;
  }

  private async execute(tree: CorpusTree): Promise<SessionReport> {
    const { config } = this.options;
    // batches cover every distinct source, complete or not, so indices stay put across runs
    const plan = collectUnits(tree, this.languages);
    const batches = chunk(plan, config.batching.maxBatchSize);
    const pending = plan.filter((unit) => unit.missingLanguages.length > 0).length;
    this.counts.skippedComplete = plan.length - pending;

    this.log.info(
      {
        units: pending,
        batches: batches.length,
        fingerprint: snapshotFingerprint(plan).slice(0, 12),
        languages: this.languages,
      },
      "[SESSION] Extraction ready",
    );

    const order = locationOrder(tree);
    const resumeKey = this.resumeAfter ?? this.activeCheckpoint().lastCompletedLocation;
    this.resumeAfter = null;
    let resumePosition = -1;
    if (resumeKey !== null) {
      const position = order.get(resumeKey);
      if (position === undefined) {
        return this.pause(tree, {
          state: "PAUSED_ERROR",
          reason: `Resume location ${resumeKey} does not exist in the corpus`,
        });
      }
      resumePosition = position;
      this.log.info({ resumeAfter: resumeKey }, "[SESSION] Resuming");
    }

    for (const batch of batches) {
      for (const unit of batch.units) {
        if (unit.missingLanguages.length === 0) continue;
        const position = order.get(unit.location) ?? -1;
        if (position <= resumePosition) {
          this.counts.skippedByCheckpoint += 1;
          continue;
        }

        if (this.stopRequested) {
          return this.pause(tree, { state: "PAUSED_USER", reason: "Stop requested" });
        }

        const result = await this.processUnit(tree, unit);
        if (!result.ok) {
          return this.pause(tree, result.pause);
        }

        await this.persist(tree, { lastCompletedLocation: unit.location });
      }

      if (batch.index > this.activeCheckpoint().lastCompletedBatchIndex) {
        await this.persist(tree, { lastCompletedBatchIndex: batch.index });
      }
    }

    return this.complete(tree);
  }

  private async processUnit(tree: CorpusTree, unit: TranslatableUnit): Promise<StepResult<null>> {
    for (const language of unit.missingLanguages) {
      const known = unit.targetFields[language];
      if (known !== null) {
        const merged = this.mergeInto(tree, unit, language, known);
        if (!merged.ok) return merged;
        if (merged.value && merged.value.written > 0) this.counts.propagated += 1;
        continue;
      }

      const translated = await this.translateUnit(unit, language);
      if (!translated.ok) return translated;

      const cleaned = sanitize(translated.value, language, {
        sourceText: unit.sourceText,
        options: this.options.config.sanitizer,
      });
      if (!cleaned.ok) {
        this.counts.flaggedForReview += 1;
        this.activeCheckpoint().review.push({
          location: unit.location,
          sourceText: unit.sourceText,
          language,
          code: cleaned.error.code,
          message: cleaned.error.message,
          recordedAt: this.now().toISOString(),
        });
        this.log.warn(
          { location: unit.location, language, code: cleaned.error.code },
          "[SESSION] Output flagged for review",
        );
        continue;
      }

      const merged = this.mergeInto(tree, unit, language, cleaned.value.text);
      if (!merged.ok) return merged;
      if (merged.value) this.counts.translated += 1;
    }
    return { ok: true, value: null };
  }

  /** A null value means the merge was refused as a conflict and recorded. */
  private mergeInto(
    tree: CorpusTree,
    unit: TranslatableUnit,
    language: TargetLanguage,
    text: string,
  ): StepResult<MergeOutcome | null> {
    const result = merge(tree, unit, language, text);
    if (result.ok) {
      this.dirty.record(result.value);
      return result;
    }

    if (result.error instanceof OverwriteConflictError) {
      this.counts.conflicts += 1;
      this.activeCheckpoint().conflicts.push({
        location: unit.location,
        sourceText: unit.sourceText,
        language,
        conflictingLocations: result.error.conflictingLocations,
        proposed: text,
        recordedAt: this.now().toISOString(),
      });
      this.log.warn(
        { location: unit.location, language, at: result.error.conflictingLocations },
        "[SESSION] Overwrite conflict recorded",
      );
      return { ok: true, value: null };
    }

    return { ok: false, pause: { state: "PAUSED_ERROR", reason: result.error.message } };
  }

  private async translateUnit(
    unit: TranslatableUnit,
    language: TargetLanguage,
  ): Promise<StepResult<string>> {
    const pieces = splitText(unit.sourceText, this.options.config.provider.maxChunkChars);
    const translated: string[] = [];
    for (const piece of pieces) {
      const result = await this.callProvider(piece, language, unit.location);
      if (!result.ok) return result;
      translated.push(result.value);
    }
    return { ok: true, value: joinPieces(translated) };
  }

  private async callProvider(
    text: string,
    language: TargetLanguage,
    context: string,
  ): Promise<StepResult<string>> {
    const { maxRetries, retryBaseDelayMs, maxRetryDelayMs } = this.options.config.provider;

    for (let attempt = 0; ; attempt += 1) {
      await this.pacer.acquire();
      await this.heartbeat();

      let result: ProviderResult;
      try {
        result = await this.options.provider.translate({
          text,
          targetLanguage: language,
          context,
        });
      } catch (error) {
        return {
          ok: false,
          pause: {
            state: "PAUSED_ERROR",
            reason: `Provider ${this.options.provider.name} failed: ${errorMessage(error)}`,
          },
        };
      }

      if (result.ok) return { ok: true, value: result.text };

      if (result.error instanceof QuotaExceededError) {
        return { ok: false, pause: { state: "PAUSED_QUOTA", reason: result.error.message } };
      }
      if (attempt >= maxRetries) {
        return {
          ok: false,
          pause: {
            state: "PAUSED_ERROR",
            reason: `Gave up after ${attempt + 1} attempts: ${result.error.message}`,
          },
        };
      }

      const delayMs = Math.min(retryBaseDelayMs * 2 ** attempt, maxRetryDelayMs);
      this.log.warn(
        { location: context, language, attempt: attempt + 1, delayMs, err: result.error.message },
        "[SESSION] Transient provider error, retrying",
      );
      await this.heartbeat();
      await this.clock.sleep(delayMs);
    }
  }

  private async flush(tree: CorpusTree): Promise<void> {
    if (this.dirty.isEmpty) return;
    await this.options.repository.save(tree, this.dirty.drain());
  }

  /**
   * Ownership check, then corpus, then checkpoint: a crash in between only repeats
   * idempotent work, and a session that lost its lock writes nothing.
   */
  private async persist(
    tree: CorpusTree,
    progress: Partial<Pick<SessionCheckpoint, "lastCompletedLocation" | "lastCompletedBatchIndex">>,
  ): Promise<void> {
    await this.heartbeat();
    await this.flush(tree);
    await this.writeCheckpoint({ ...this.activeCheckpoint(), ...progress });
  }

  private report(reason: string | null, pendingUnits: number): SessionReport {
    return {
      state: this.currentState,
      counts: { ...this.counts },
      reason,
      lastCompletedLocation: this.checkpoint?.lastCompletedLocation ?? null,
      pendingUnits,
    };
  }

  private async pause(tree: CorpusTree, pause: Pause): Promise<SessionReport> {
    // keeps finished languages of the interrupted unit; the location does not advance
    await this.persist(tree, {});

    this.currentState = pause.state;
    this.log.warn({ state: pause.state, reason: pause.reason }, "[SESSION] Paused");
    return this.report(pause.reason, extract(tree, this.languages).length);
  }

  private async complete(tree: CorpusTree): Promise<SessionReport> {
    await this.heartbeat();
    await this.flush(tree);
    const pending = extract(tree, this.languages).length;
    if (pending === 0) {
      await this.options.checkpoints.remove();
    } else {
      await this.writeCheckpoint({ ...this.activeCheckpoint(), status: "complete" });
    }

    this.currentState = "COMPLETE";
    this.log.info({ counts: this.counts, pending }, "[SESSION] Pass complete");
    return this.report(null, pending);
  }
}
