/** One reported interval of typing activity, already normalised to UTC epoch milliseconds. */
export interface TypingSample {
  sessionId: string;
  timestampMs: number;
  charsTyped: number;
  durationMs: number;
}

export interface SessionTotals {
  sessionId: string;
  totalChars: number;
  totalDurationMs: number;
  samplesCount: number;
  lastUpdatedMs: number;
}

export interface SessionSummary extends SessionTotals {
  avgWpm: number;
}

export interface SpeedStat {
  sessionId: string;
  wpm: number;
  /** Reserved; never computed. */
  accuracy: number | null;
  lastUpdatedMs: number;
}
