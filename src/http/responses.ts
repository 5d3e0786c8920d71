export type ApiErrorCode =
  | "BAD_INPUT"
  | "NOT_FOUND"
  | "METHOD_NOT_ALLOWED"
  | "PAYLOAD_TOO_LARGE"
  | "INTERNAL";

export interface ApiErrorBody {
  ok: false;
  error: string;
  code: ApiErrorCode;
}

/** The parts of an incoming request that decide its CORS headers. */
export interface CorsRequestInfo {
  origin: string | null;
  requestHeaders: string | null;
}

const ALLOWED_METHODS = "GET,POST,DELETE,OPTIONS";
const JSON_HEADERS = { "content-type": "application/json; charset=utf-8" };

export function corsInfoFromHeaders(headers: Headers): CorsRequestInfo {
  return {
    origin: headers.get("origin"),
    requestHeaders: headers.get("access-control-request-headers"),
  };
}

/**
 * Any header and credentials are allowed. With a wildcard origin the caller's own
 * origin is echoed back, since browsers refuse `*` on credentialed requests.
 */
export function corsHeaders(corsOrigin: string, info: CorsRequestInfo): Record<string, string> {
  const requestOrigin = info.origin?.trim() ?? "";
  const reflect = corsOrigin === "*" && requestOrigin !== "";
  return {
    "access-control-allow-origin": reflect ? requestOrigin : corsOrigin,
    "access-control-allow-credentials": "true",
    "access-control-allow-methods": ALLOWED_METHODS,
    "access-control-allow-headers": info.requestHeaders?.trim() || "*",
    ...(reflect ? { vary: "Origin" } : {}),
  };
}

export function withCors(response: Response, corsOrigin: string, info: CorsRequestInfo): Response {
  for (const [name, value] of Object.entries(corsHeaders(corsOrigin, info))) {
    response.headers.set(name, value);
  }
  return response;
}

export function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: JSON_HEADERS,
  });
}

export function errorResponse(
  code: ApiErrorCode,
  message: string,
  status: number,
  extraHeaders?: Record<string, string>,
): Response {
  const body: ApiErrorBody = { ok: false, error: message, code };
  return new Response(JSON.stringify(body), {
    status,
    headers: { ...JSON_HEADERS, ...extraHeaders },
  });
}

export function preflightResponse(): Response {
  return new Response(null, { status: 204 });
}
