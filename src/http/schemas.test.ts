import assert from "node:assert/strict";
import test from "node:test";

import { buildSubmissionBodySchema, formatZodError, sessionCreateBodySchema } from "./schemas.js";

const submissionBodySchema = buildSubmissionBodySchema(2);

function firstError(body: unknown): string {
  const result = submissionBodySchema.safeParse(body);
  assert.equal(result.success, false);
  return result.success ? "" : formatZodError(result.error);
}

function wireSample(overrides: Record<string, unknown> = {}) {
  return {
    session_id: "s1",
    timestamp: "2024-03-01T12:00:00Z",
    chars_typed: 50,
    duration_ms: 60_000,
    ...overrides,
  };
}

test("submission body parses timestamps into epoch milliseconds", () => {
  const result = submissionBodySchema.safeParse({
    session_id: "s1",
    samples: [wireSample({ timestamp: "2024-03-01T12:00:00" })],
  });

  assert.equal(result.success, true);
  assert.deepEqual(result.success ? result.data : null, {
    session_id: "s1",
    samples: [
      {
        session_id: "s1",
        timestamp: Date.UTC(2024, 2, 1, 12, 0, 0),
        chars_typed: 50,
        duration_ms: 60_000,
      },
    ],
  });
});

test("submission body rejects empty and oversized batches", () => {
  assert.equal(firstError({ session_id: "s1", samples: [] }), "samples: samples must be a non-empty list");
  assert.equal(
    firstError({ session_id: "s1", samples: [wireSample(), wireSample(), wireSample()] }),
    "samples: samples must contain at most 2 entries",
  );
});

test("submission body reports the first invalid sample field", () => {
  assert.equal(
    firstError({ session_id: "s1", samples: [wireSample({ chars_typed: -1 })] }),
    "samples.0.chars_typed: chars_typed must be >= 0",
  );
  assert.equal(
    firstError({ session_id: "s1", samples: [wireSample(), wireSample({ duration_ms: 2.5 })] }),
    "samples.1.duration_ms: duration_ms must be an integer",
  );
  assert.equal(
    firstError({ session_id: "s1", samples: [wireSample({ chars_typed: "5" })] }),
    "samples.0.chars_typed: chars_typed must be a number",
  );
  assert.equal(
    firstError({ session_id: "s1", samples: [wireSample({ duration_ms: undefined })] }),
    "samples.0.duration_ms: duration_ms is required",
  );
  assert.equal(
    firstError({ session_id: "s1", samples: [wireSample({ timestamp: "garbage" })] }),
    "samples.0.timestamp: timestamp must be an ISO-8601 date-time",
  );
  assert.equal(
    firstError({ session_id: "s1", samples: [wireSample({ session_id: "  " })] }),
    "samples.0.session_id: session_id must be a non-empty string",
  );
});

test("submission body rejects timestamps that are not ISO-8601 dates", () => {
  for (const timestamp of ["1", "foo 2024-01-01", "2024-02-30T00:00:00"]) {
    assert.equal(
      firstError({ session_id: "s1", samples: [wireSample({ timestamp })] }),
      "samples.0.timestamp: timestamp must be an ISO-8601 date-time",
      timestamp,
    );
  }
});

test("submission body requires a non-blank session id", () => {
  assert.equal(
    firstError({ session_id: "", samples: [wireSample()] }),
    "session_id: session_id must be a non-empty string",
  );
});

test("session create body accepts optional ids", () => {
  assert.deepEqual(sessionCreateBodySchema.parse({}), {});
  assert.deepEqual(sessionCreateBodySchema.parse({ session_id: null, user_id: " u1 " }), {
    session_id: null,
    user_id: "u1",
  });
  assert.equal(sessionCreateBodySchema.safeParse({ session_id: 5 }).success, false);
});
