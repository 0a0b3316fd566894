import { app, type HttpRequest, type HttpResponseInit, type InvocationContext } from "@azure/functions";
import type { PaletteRequest, PaletteResponse, PaletteType, SeqBy, TrimRange } from "imgpal-shared";
import { type JsonCache, paletteCacheKey, redisJsonCache } from "../lib/cache";
import { paletteConfig, type PaletteServiceConfig } from "../lib/config";
import { DerivationLogger } from "../lib/derivation-logger";
import { EmptyDistributionError, PaletteError } from "../lib/errors";
import { type HttpHandler, jsonResponse, withCors } from "../lib/http";
import { ImageLoadError, loadImagePixels } from "../lib/image-loader";
import { derivePalette, type PaletteOptions, validatePaletteOptions } from "../lib/palette";
import { isSeqBy } from "../lib/palette-assembler";
import { trackEvent, trackException, trackMetric } from "../lib/telemetry";

const TYPE_ALIASES = new Map<string, PaletteType>([
  ["qual", "qual"],
  ["qualitative", "qual"],
  ["seq", "seq"],
  ["sequential", "seq"],
  ["div", "div"],
  ["divergent", "div"],
]);

export class RequestBodyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RequestBodyError";
  }
}

export interface ParsedPaletteRequest {
  image: string;
  options: Omit<PaletteOptions, "logger" | "random">;
  debug: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalNumber(body: Record<string, unknown>, key: string): number | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number") {
    throw new RequestBodyError(`"${key}" must be a number`);
  }
  return value;
}

function optionalString(body: Record<string, unknown>, key: string): string | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new RequestBodyError(`"${key}" must be a string`);
  }
  return value;
}

function optionalRange(body: Record<string, unknown>, key: string): TrimRange | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (
    !Array.isArray(value) ||
    value.length !== 2 ||
    typeof value[0] !== "number" ||
    typeof value[1] !== "number"
  ) {
    throw new RequestBodyError(`"${key}" must be a [lo, hi] pair of numbers`);
  }
  return [value[0], value[1]];
}

function optionalSeqBy(body: Record<string, unknown>): SeqBy | undefined {
  const value = optionalString(body, "seqBy")?.toLowerCase();
  if (value === undefined) return undefined;
  if (!isSeqBy(value)) {
    throw new RequestBodyError('"seqBy" must order the letters h, s and v, e.g. "hsv" or "svh"');
  }
  return value;
}

/** Checks the JSON shape of a request body; value ranges are checked later. */
export function readPaletteRequest(body: unknown): PaletteRequest {
  if (!isRecord(body)) {
    throw new RequestBodyError("Request body must be a JSON object");
  }

  const image = optionalString(body, "image")?.trim();
  if (!image) {
    throw new RequestBodyError('"image" is required');
  }
  if (!image.startsWith("data:") && !/^https?:\/\//i.test(image)) {
    throw new RequestBodyError('"image" must be an http(s) URL or a data URL');
  }

  const n = optionalNumber(body, "n");
  if (n === undefined) {
    throw new RequestBodyError('"n" is required');
  }

  const typeName = optionalString(body, "type")?.toLowerCase();
  const type = typeName ? TYPE_ALIASES.get(typeName) : undefined;
  if (!type) {
    throw new RequestBodyError('"type" must be one of qual, seq, div');
  }

  const debug = body.debug;
  if (debug !== undefined && typeof debug !== "boolean") {
    throw new RequestBodyError('"debug" must be a boolean');
  }

  return {
    image,
    n,
    type,
    k: optionalNumber(body, "k"),
    bw: optionalRange(body, "bw"),
    brightness: optionalRange(body, "brightness"),
    saturation: optionalRange(body, "saturation"),
    seqBy: optionalSeqBy(body),
    divCenter: optionalString(body, "divCenter"),
    seed: optionalNumber(body, "seed"),
    trials: optionalNumber(body, "trials"),
    debug: typeof debug === "boolean" ? debug : undefined,
  };
}

export type RequestLimits = Pick<PaletteServiceConfig, "maxColors" | "maxTrials" | "defaultTrials">;

function atMost(key: string, value: number | undefined, limit: number): void {
  if (value !== undefined && value > limit) {
    throw new RequestBodyError(`"${key}" must be at most ${limit}`);
  }
}

/** Reads a request body into pipeline options, enforcing the service limits. */
export function parsePaletteRequest(body: unknown, limits: RequestLimits = paletteConfig): ParsedPaletteRequest {
  const request = readPaletteRequest(body);
  atMost("n", request.n, limits.maxColors);
  atMost("k", request.k, limits.maxColors);
  atMost("trials", request.trials, limits.maxTrials);

  const type = TYPE_ALIASES.get(request.type);
  if (!type) {
    throw new RequestBodyError('"type" must be one of qual, seq, div');
  }

  return {
    image: request.image,
    debug: request.debug === true,
    options: {
      n: request.n,
      type,
      k: request.k,
      bw: request.bw,
      brightness: request.brightness,
      saturation: request.saturation,
      seqBy: request.seqBy,
      divCenter: request.divCenter,
      seed: request.seed,
      trials: request.trials ?? limits.defaultTrials,
    },
  };
}

export interface PaletteHandlerOptions {
  cache?: JsonCache;
  limits?: RequestLimits;
}

/**
 * Builds the handler for POST /api/palette. Seeded results go through
 * `cache`, Redis unless another cache is given.
 */
export function createPaletteHandler(handlerOptions: PaletteHandlerOptions = {}): HttpHandler {
  const cache = handlerOptions.cache ?? redisJsonCache;
  const limits = handlerOptions.limits ?? paletteConfig;

  return async (request: HttpRequest, context: InvocationContext): Promise<HttpResponseInit> => {
    let parsed: ParsedPaletteRequest;
    try {
      parsed = parsePaletteRequest(await request.json(), limits);
    } catch (error) {
      const message = error instanceof RequestBodyError ? error.message : "Request body must be valid JSON";
      return jsonResponse(400, { error: message });
    }

    const { image, options, debug } = parsed;
    const logger = new DerivationLogger({ context });
    const withLogs = (body: PaletteResponse): PaletteResponse =>
      debug ? { ...body, logs: logger.getEntries() } : body;

    try {
      validatePaletteOptions(options);

      // Unseeded palettes are random draws, so only seeded ones are reusable.
      const cacheKey = options.seed === undefined ? null : paletteCacheKey(image, { ...options });
      if (cacheKey) {
        const cached = await cache.get<PaletteResponse>(cacheKey);
        if (cached) {
          logger.info("Palette served from cache", { cacheKey });
          return jsonResponse(200, withLogs({ ...cached, cached: true }));
        }
      }

      const pixels = await logger.time("decode", () =>
        loadImagePixels(image, { maxDimension: paletteConfig.maxDimension })
      );
      const started = performance.now();
      const palette = await logger.time("derive", () => derivePalette(pixels, { ...options, logger }));
      trackMetric("palette.derive.ms", performance.now() - started, { type: options.type });

      const body: PaletteResponse = {
        palette,
        type: options.type,
        n: options.n,
        seed: options.seed ?? null,
        cached: false,
      };
      if (cacheKey) {
        await cache.set(cacheKey, body, paletteConfig.cacheTtlSeconds);
      }
      trackEvent("palette.derived", { type: options.type, n: options.n, colors: palette.length });

      return jsonResponse(200, withLogs(body));
    } catch (error) {
      if (error instanceof PaletteError) {
        logger.warn("Palette request rejected", { name: error.name, message: error.message });
        const status = error instanceof EmptyDistributionError ? 422 : 400;
        return jsonResponse(status, error.toBody());
      }
      if (error instanceof ImageLoadError) {
        logger.warn("Image could not be loaded", { message: error.message, status: error.status });
        return jsonResponse(error.status, { error: error.message });
      }

      trackException(error, { function: "palette", type: options.type });
      logger.error("Failed to derive palette", {
        message: error instanceof Error ? error.message : String(error),
      });
      return jsonResponse(500, { error: "Failed to derive palette" });
    }
  };
}

/**
 * Derive a palette from an image
 * POST /api/palette
 */
export const handlePaletteRequest = createPaletteHandler();

app.http("palette", {
  methods: ["POST", "OPTIONS"],
  authLevel: "anonymous",
  route: "palette",
  handler: withCors(handlePaletteRequest),
});
