import { randomUUID } from "node:crypto";
import { badInput, sessionNotFound } from "./errors.js";
import type { SessionSummary, SessionTotals, SpeedStat, TypingSample } from "./types.js";
import { computeWpm } from "./wpm.js";

const MAX_ID_ATTEMPTS = 8;

export interface TypingStoreOptions {
  /** Wall clock in UTC epoch milliseconds. */
  now?: () => number;
  generateId?: () => string;
}

function toSummary(totals: SessionTotals): SessionSummary {
  return {
    sessionId: totals.sessionId,
    totalChars: totals.totalChars,
    totalDurationMs: totals.totalDurationMs,
    avgWpm: computeWpm(totals.totalChars, totals.totalDurationMs),
    samplesCount: totals.samplesCount,
    lastUpdatedMs: totals.lastUpdatedMs,
  };
}

function isNonNegativeInteger(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

/**
 * In-memory registry of typing sessions and their running totals.
 *
 * Every method is synchronous and completes within one turn of the event loop, so
 * callers never observe a batch half-applied. Handlers must finish any awaiting
 * (request bodies and the like) before calling in.
 */
export class TypingStore {
  private readonly sessions = new Map<string, SessionTotals>();
  private readonly now: () => number;
  private readonly generateId: () => string;

  public constructor(options?: TypingStoreOptions) {
    this.now = options?.now ?? (() => Date.now());
    this.generateId = options?.generateId ?? (() => randomUUID());
  }

  public get size(): number {
    return this.sessions.size;
  }

  public createOrGet(sessionId?: string | null): string {
    const requested = String(sessionId ?? "");
    if (requested.trim()) {
      if (!this.sessions.has(requested)) {
        this.sessions.set(requested, this.createTotals(requested));
      }
      return requested;
    }

    const generated = this.allocateId();
    this.sessions.set(generated, this.createTotals(generated));
    return generated;
  }

  public appendSamples(sessionId: string, samples: readonly TypingSample[]): SessionSummary {
    if (samples.length === 0) {
      throw badInput("samples must be non-empty", sessionId);
    }

    let addedChars = 0;
    let addedDurationMs = 0;
    let latestSampleMs = Number.NEGATIVE_INFINITY;
    for (const sample of samples) {
      if (sample.sessionId !== sessionId) {
        throw badInput("sample.session_id does not match request session_id", sessionId);
      }
      if (!isNonNegativeInteger(sample.charsTyped) || !isNonNegativeInteger(sample.durationMs)) {
        throw badInput("chars_typed and duration_ms must be non-negative integers", sessionId);
      }
      if (!Number.isFinite(sample.timestampMs)) {
        throw badInput("sample timestamp must be a valid date", sessionId);
      }
      addedChars += sample.charsTyped;
      addedDurationMs += sample.durationMs;
      latestSampleMs = Math.max(latestSampleMs, sample.timestampMs);
    }

    const totals = this.require(sessionId);
    const nextChars = totals.totalChars + addedChars;
    const nextDurationMs = totals.totalDurationMs + addedDurationMs;
    if (!Number.isSafeInteger(nextChars) || !Number.isSafeInteger(nextDurationMs)) {
      throw badInput("session totals would exceed the supported range", sessionId);
    }

    totals.totalChars = nextChars;
    totals.totalDurationMs = nextDurationMs;
    totals.samplesCount += samples.length;
    totals.lastUpdatedMs = Math.max(totals.lastUpdatedMs, latestSampleMs, this.now());

    return toSummary(totals);
  }

  public getSummary(sessionId: string): SessionSummary {
    return toSummary(this.require(sessionId));
  }

  public getStats(sessionId: string): SpeedStat {
    const totals = this.require(sessionId);
    return {
      sessionId: totals.sessionId,
      wpm: computeWpm(totals.totalChars, totals.totalDurationMs),
      accuracy: null,
      lastUpdatedMs: totals.lastUpdatedMs,
    };
  }

  public listSessions(): SessionSummary[] {
    return Array.from(this.sessions.values(), toSummary);
  }

  public delete(sessionId: string): void {
    if (!this.sessions.delete(sessionId)) {
      throw sessionNotFound(sessionId);
    }
  }

  private require(sessionId: string): SessionTotals {
    const totals = this.sessions.get(sessionId);
    if (!totals) throw sessionNotFound(sessionId);
    return totals;
  }

  private createTotals(sessionId: string): SessionTotals {
    return {
      sessionId,
      totalChars: 0,
      totalDurationMs: 0,
      samplesCount: 0,
      lastUpdatedMs: this.now(),
    };
  }

  private allocateId(): string {
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt += 1) {
      const candidate = String(this.generateId() || "").trim();
      if (candidate && !this.sessions.has(candidate)) return candidate;
    }
    throw new Error(`Unable to allocate a unique session id after ${MAX_ID_ATTEMPTS} attempts.`);
  }
}
