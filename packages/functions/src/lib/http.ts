import type { HttpRequest, HttpResponseInit, InvocationContext } from "@azure/functions";

type HttpHandler = (request: HttpRequest, context: InvocationContext) => Promise<HttpResponseInit>;

export interface CorsSettings {
  allowedOrigins: string[];
  allowHeaders: string;
  allowMethods: string;
  supportCredentials: boolean;
}

export function readCorsSettings(env: NodeJS.ProcessEnv = process.env): CorsSettings {
  return {
    allowedOrigins: (env.CORS_ALLOWED_ORIGINS ?? "http://localhost:3000")
      .split(",")
      .map((origin) => origin.trim())
      .filter(Boolean),
    allowHeaders: env.CORS_ALLOWED_HEADERS ?? "Content-Type",
    allowMethods: env.CORS_ALLOWED_METHODS ?? "POST,OPTIONS",
    supportCredentials: env.CORS_SUPPORT_CREDENTIALS === "true",
  };
}

function wildcardToRegExp(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+?^${}()|[\]\\]/g, "\\$&").replace(/\*/g, ".*");
  return new RegExp(`^${escaped}$`, "i");
}

/** The value for Access-Control-Allow-Origin, or null when the origin is not allowed. */
export function matchOrigin(origin: string | null, allowedOrigins: readonly string[]): string | null {
  if (!origin) return null;
  if (allowedOrigins.includes("*")) return "*";
  const allowed = allowedOrigins.some((pattern) =>
    pattern.includes("*") ? wildcardToRegExp(pattern).test(origin) : pattern === origin
  );
  return allowed ? origin : null;
}

function corsHeaders(allowedOrigin: string, settings: CorsSettings): Headers {
  const headers = new Headers({
    "Access-Control-Allow-Origin": allowedOrigin,
    "Access-Control-Allow-Headers": settings.allowHeaders,
    "Access-Control-Allow-Methods": settings.allowMethods,
    Vary: "Origin",
  });
  if (settings.supportCredentials && allowedOrigin !== "*") {
    headers.set("Access-Control-Allow-Credentials", "true");
  }
  return headers;
}

/**
 * Answers preflight requests and adds CORS headers to responses for
 * allowed origins.
 */
export function withCors(handler: HttpHandler, settings: CorsSettings = readCorsSettings()): HttpHandler {
  return async (request, context) => {
    const allowedOrigin = matchOrigin(request.headers.get("origin"), settings.allowedOrigins);

    if (request.method.toUpperCase() === "OPTIONS") {
      return allowedOrigin
        ? { status: 204, headers: corsHeaders(allowedOrigin, settings) }
        : { status: 204 };
    }

    const response = await handler(request, context);
    if (!allowedOrigin) return response;

    const headers = new Headers(response.headers ?? {});
    corsHeaders(allowedOrigin, settings).forEach((value, key) => headers.set(key, value));
    return { ...response, headers };
  };
}

export function jsonResponse(status: number, body: unknown): HttpResponseInit {
  return { status, jsonBody: body };
}

export type { HttpHandler };
