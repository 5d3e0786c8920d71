import type { ZodType, ZodTypeDef } from "zod";
import type { Config } from "../config/index.js";
import type { Logger } from "../observability/logger.js";
import { isTypingStoreError } from "../typing/errors.js";
import type { TypingStore } from "../typing/store.js";
import { corsInfoFromHeaders, errorResponse, jsonResponse, preflightResponse, withCors } from "./responses.js";
import { buildSubmissionBodySchema, formatZodError, sessionCreateBodySchema } from "./schemas.js";
import { fromWireSample, toWireSpeedStat, toWireSummary } from "./wire.js";

export type RequestHandler = (request: Request) => Promise<Response>;

export interface TypingApiDeps {
  store: TypingStore;
  config: Config;
  logger: Logger;
}

type RouteContext = {
  request: Request;
  params: Record<string, string>;
};

type Route = {
  method: "GET" | "POST" | "DELETE";
  pattern: string[];
  handle: (context: RouteContext) => Promise<Response> | Response;
};

type Parsed<T> = { ok: true; value: T } | { ok: false; response: Response };

function matchPattern(pattern: string[], segments: string[]): Record<string, string> | null {
  if (pattern.length !== segments.length) return null;
  const params: Record<string, string> = {};
  for (let index = 0; index < pattern.length; index += 1) {
    const expected = pattern[index];
    const actual = segments[index];
    if (expected === undefined || actual === undefined) return null;
    if (expected.startsWith(":")) {
      params[expected.slice(1)] = actual;
      continue;
    }
    if (expected !== actual) return null;
  }
  return params;
}

function decodeSegments(pathname: string): string[] | null {
  try {
    return pathname.split("/").filter(Boolean).map((segment) => decodeURIComponent(segment));
  } catch {
    return null;
  }
}

/**
 * Builds the `Request -> Response` handler for the typing API. Every store call
 * happens after the request body has been fully read and validated.
 */
export function createTypingApi(deps: TypingApiDeps): RequestHandler {
  const { store, logger } = deps;
  const corsOrigin = deps.config.http.corsOrigin;
  const maxBodyBytes = deps.config.http.maxBodyBytes;
  const submissionBodySchema = buildSubmissionBodySchema(deps.config.typing.maxBatchSize);

  const badInput = (message: string): Response => errorResponse("BAD_INPUT", message, 400);

  async function parseBody<T>(request: Request, schema: ZodType<T, ZodTypeDef, unknown>): Promise<Parsed<T>> {
    const text = await request.text();
    if (Buffer.byteLength(text, "utf8") > maxBodyBytes) {
      return {
        ok: false,
        response: errorResponse("PAYLOAD_TOO_LARGE", `request body exceeds ${maxBodyBytes} bytes`, 413),
      };
    }

    let raw: unknown = {};
    if (text.trim()) {
      try {
        raw = JSON.parse(text);
      } catch {
        return { ok: false, response: badInput("invalid json body") };
      }
    }

    const result = schema.safeParse(raw);
    if (!result.success) {
      return { ok: false, response: badInput(formatZodError(result.error)) };
    }
    return { ok: true, value: result.data };
  }

  const routes: Route[] = [
    {
      method: "GET",
      pattern: [],
      handle: () => jsonResponse({ message: "Healthy" }),
    },
    {
      method: "GET",
      pattern: ["ready"],
      handle: () => jsonResponse({ status: "ready", sessions: store.size }),
    },
    {
      method: "POST",
      pattern: ["api", "typing", "session"],
      handle: async ({ request }) => {
        const body = await parseBody(request, sessionCreateBodySchema);
        if (!body.ok) return body.response;
        const sessionId = store.createOrGet(body.value.session_id);
        logger.debug("session_resolved", {
          sessionId,
          userId: body.value.user_id || undefined,
          requested: Boolean(body.value.session_id?.trim()),
        });
        return jsonResponse({ session_id: sessionId });
      },
    },
    {
      method: "POST",
      pattern: ["api", "typing", "submit"],
      handle: async ({ request }) => {
        const body = await parseBody(request, submissionBodySchema);
        if (!body.ok) return body.response;
        const summary = store.appendSamples(body.value.session_id, body.value.samples.map(fromWireSample));
        return jsonResponse(toWireSummary(summary));
      },
    },
    {
      method: "GET",
      pattern: ["api", "typing", "summary", ":sessionId"],
      handle: ({ params }) => jsonResponse(toWireSummary(store.getSummary(params.sessionId ?? ""))),
    },
    {
      method: "GET",
      pattern: ["api", "typing", "stats", ":sessionId"],
      handle: ({ params }) => jsonResponse(toWireSpeedStat(store.getStats(params.sessionId ?? ""))),
    },
    {
      method: "GET",
      pattern: ["api", "typing", "sessions"],
      handle: () => jsonResponse(store.listSessions().map(toWireSummary)),
    },
    {
      method: "DELETE",
      pattern: ["api", "typing", "session", ":sessionId"],
      handle: ({ params }) => {
        store.delete(params.sessionId ?? "");
        return jsonResponse({ status: "deleted" });
      },
    },
  ];

  function toErrorResponse(error: unknown, method: string, path: string): Response {
    if (isTypingStoreError(error)) {
      logger.warn("store_rejected", {
        method,
        path,
        code: error.code,
        sessionId: error.sessionId,
        message: error.message,
      });
      return errorResponse(error.code, error.message, error.status);
    }
    logger.error("unhandled_error", {
      method,
      path,
      message: error instanceof Error ? error.message : String(error),
    });
    return errorResponse("INTERNAL", "internal server error", 500);
  }

  async function dispatch(request: Request, url: URL): Promise<Response> {
    if (request.method === "OPTIONS") return preflightResponse();

    const segments = decodeSegments(url.pathname);
    if (!segments) return badInput("malformed path parameter");

    const allowed: string[] = [];
    for (const route of routes) {
      const params = matchPattern(route.pattern, segments);
      if (!params) continue;
      if (route.method !== request.method) {
        allowed.push(route.method);
        continue;
      }
      return await route.handle({ request, params });
    }

    if (allowed.length > 0) {
      return errorResponse("METHOD_NOT_ALLOWED", "method not allowed", 405, {
        allow: [...allowed, "OPTIONS"].join(","),
      });
    }
    return errorResponse("NOT_FOUND", "route not found", 404);
  }

  return async (request) => {
    const startedAt = Date.now();
    const url = new URL(request.url);
    let response: Response;
    try {
      response = await dispatch(request, url);
    } catch (error) {
      response = toErrorResponse(error, request.method, url.pathname);
    }
    withCors(response, corsOrigin, corsInfoFromHeaders(request.headers));
    logger.info("request", {
      method: request.method,
      path: url.pathname,
      status: response.status,
      latencyMs: Date.now() - startedAt,
    });
    return response;
  };
}
