import http from "node:http";
import type { IncomingMessage, ServerResponse } from "node:http";
import type { Logger } from "../observability/logger.js";
import { corsInfoFromHeaders, errorResponse, withCors } from "./responses.js";
import type { RequestHandler } from "./routes.js";

export interface TypingServerOptions {
  maxBodyBytes: number;
  corsOrigin: string;
  logger: Logger;
}

class BodyTooLargeError extends Error {
  constructor(limit: number) {
    super(`request body exceeds ${limit} bytes`);
    this.name = "BodyTooLargeError";
  }
}

function readBody(req: IncomingMessage, limit: number): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const chunks: Buffer[] = [];
    let total = 0;

    const onData = (chunk: Buffer | string): void => {
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
      total += buffer.length;
      if (total > limit) {
        // Stop consuming; the caller answers 413 and then drops the connection.
        req.off("data", onData);
        req.pause();
        reject(new BodyTooLargeError(limit));
        return;
      }
      chunks.push(buffer);
    };

    req.on("data", onData);
    req.once("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    req.once("error", reject);
  });
}

function toHeaders(req: IncomingMessage): Headers {
  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const item of value) headers.append(name, item);
    } else {
      headers.set(name, value);
    }
  }
  return headers;
}

async function toRequest(req: IncomingMessage, limit: number): Promise<Request> {
  const method = String(req.method || "GET").toUpperCase();
  const host = req.headers.host || "localhost";
  const url = new URL(req.url || "/", `http://${host}`);
  const hasBody = method !== "GET" && method !== "HEAD";
  return new Request(url, {
    method,
    headers: toHeaders(req),
    body: hasBody ? await readBody(req, limit) : undefined,
  });
}

async function writeResponse(res: ServerResponse, response: Response): Promise<void> {
  res.statusCode = response.status;
  response.headers.forEach((value, name) => {
    res.setHeader(name, value);
  });
  const body = await response.text();
  res.end(body);
}

/**
 * Serves a Web `Request -> Response` handler over node:http.
 */
export function createTypingServer(handler: RequestHandler, options: TypingServerOptions): http.Server {
  const { logger } = options;

  const serve = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    let response: Response;
    let dropConnection = false;
    try {
      const request = await toRequest(req, options.maxBodyBytes);
      response = await handler(request);
    } catch (error) {
      if (error instanceof BodyTooLargeError) {
        dropConnection = true;
        response = errorResponse("PAYLOAD_TOO_LARGE", error.message, 413);
      } else {
        logger.error("bridge_failed", {
          method: req.method,
          url: req.url,
          message: error instanceof Error ? error.message : String(error),
        });
        response = errorResponse("INTERNAL", "internal server error", 500);
      }
      withCors(response, options.corsOrigin, corsInfoFromHeaders(toHeaders(req)));
    }
    if (dropConnection) {
      res.setHeader("connection", "close");
      res.once("finish", () => req.destroy());
    }
    await writeResponse(res, response);
  };

  return http.createServer((req, res) => {
    void serve(req, res).catch((error: unknown) => {
      logger.error("response_write_failed", {
        message: error instanceof Error ? error.message : String(error),
      });
      res.destroy();
    });
  });
}
