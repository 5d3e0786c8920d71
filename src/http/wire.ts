import type { SessionSummary, SpeedStat, TypingSample } from "../typing/types.js";
import type { TypingSampleBody } from "./schemas.js";
import { toIsoTimestamp } from "./timestamps.js";

export interface WireSessionSummary {
  session_id: string;
  total_chars: number;
  total_duration_ms: number;
  avg_wpm: number;
  samples_count: number;
  last_updated: string;
}

export interface WireSpeedStat {
  session_id: string;
  wpm: number;
  accuracy: number | null;
  last_updated: string;
}

export function toWireSummary(summary: SessionSummary): WireSessionSummary {
  return {
    session_id: summary.sessionId,
    total_chars: summary.totalChars,
    total_duration_ms: summary.totalDurationMs,
    avg_wpm: summary.avgWpm,
    samples_count: summary.samplesCount,
    last_updated: toIsoTimestamp(summary.lastUpdatedMs),
  };
}

export function toWireSpeedStat(stat: SpeedStat): WireSpeedStat {
  return {
    session_id: stat.sessionId,
    wpm: stat.wpm,
    accuracy: stat.accuracy,
    last_updated: toIsoTimestamp(stat.lastUpdatedMs),
  };
}

export function fromWireSample(sample: TypingSampleBody): TypingSample {
  return {
    sessionId: sample.session_id,
    timestampMs: sample.timestamp,
    charsTyped: sample.chars_typed,
    durationMs: sample.duration_ms,
  };
}
