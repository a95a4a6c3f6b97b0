import { z } from "zod";
import { env } from "../config/env.js";
import { getCategory, type CategoryId } from "../domain/categories.js";
import type { ContentPayload, TianEnvelope } from "../types/content.js";
import { errorMessage } from "../utils/logger.js";
import { normalizeContent } from "./normalize.js";

export const TIAN_SUCCESS_CODE = 200;

const API_CODE_DESCRIPTIONS: Record<number, string> = {
  100: "invalid or missing API key",
  110: "API not enabled for this key",
  130: "call frequency exceeded",
  150: "call quota exhausted",
  160: "account suspended",
  250: "no data for this request",
};

export function describeApiCode(code: number): string | undefined {
  return API_CODE_DESCRIPTIONS[code];
}

export class TianFetchError extends Error {
  readonly category: CategoryId;

  constructor(category: CategoryId, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.category = category;
  }
}

export class NetworkError extends TianFetchError {
  readonly status?: number;

  constructor(category: CategoryId, message: string, options?: { cause?: unknown; status?: number }) {
    super(category, message, options);
    this.name = "NetworkError";
    this.status = options?.status;
  }
}

export class ParseError extends TianFetchError {
  constructor(category: CategoryId, message: string, options?: { cause?: unknown }) {
    super(category, message, options);
    this.name = "ParseError";
  }
}

export class ApiError extends TianFetchError {
  readonly code: number;

  readonly msg: string;

  constructor(category: CategoryId, code: number, msg: string) {
    const described = describeApiCode(code);
    super(category, `TianAPI returned ${code}: ${msg || described || "unknown error"}`);
    this.name = "ApiError";
    this.code = code;
    this.msg = msg;
  }
}

const envelopeSchema = z.object({
  code: z.number().int(),
  msg: z.string().default(""),
  result: z.unknown().optional(),
});

export interface ContentFetcher {
  fetch(category: CategoryId, apiKey: string): Promise<ContentPayload>;
}

export class TianApiClient implements ContentFetcher {
  private readonly baseUrl: string;

  private readonly timeoutMs: number;

  private readonly nowFn: () => number;

  constructor(options?: { baseUrl?: string; timeoutMs?: number; nowFn?: () => number }) {
    this.baseUrl = options?.baseUrl ?? env.TIAN_BASE_URL;
    this.timeoutMs = options?.timeoutMs ?? env.REQUEST_TIMEOUT_MS;
    this.nowFn = options?.nowFn ?? (() => Date.now());
  }

  buildUrl(category: CategoryId, apiKey: string): string {
    const definition = getCategory(category);
    // Appended rather than resolved so a path prefix on the base URL survives.
    const url = new URL(`${this.baseUrl.replace(/\/+$/, "")}${definition.path}`);
    url.searchParams.set("key", apiKey);
    for (const [key, value] of Object.entries(definition.query)) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  private async request(category: CategoryId, url: string): Promise<string> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(url, {
        method: "GET",
        headers: {
          accept: "application/json",
        },
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new NetworkError(category, `TianAPI responded with HTTP ${response.status}`, {
          status: response.status,
        });
      }

      return await response.text();
    } catch (error) {
      if (error instanceof NetworkError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new NetworkError(category, `TianAPI request timed out after ${this.timeoutMs}ms`, { cause: error });
      }
      throw new NetworkError(category, `TianAPI request failed: ${errorMessage(error)}`, { cause: error });
    } finally {
      clearTimeout(timeout);
    }
  }

  parseEnvelope(category: CategoryId, body: string): TianEnvelope {
    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (error) {
      throw new ParseError(category, "TianAPI response is not valid JSON", { cause: error });
    }

    const parsed = envelopeSchema.safeParse(json);
    if (!parsed.success) {
      throw new ParseError(category, `Unexpected TianAPI response shape: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    return parsed.data;
  }

  async fetch(category: CategoryId, apiKey: string): Promise<ContentPayload> {
    const body = await this.request(category, this.buildUrl(category, apiKey));
    const envelope = this.parseEnvelope(category, body);

    if (envelope.code !== TIAN_SUCCESS_CODE) {
      throw new ApiError(category, envelope.code, envelope.msg);
    }

    const payload = normalizeContent(category, envelope, this.nowFn());
    if (!payload) {
      throw new ParseError(category, "TianAPI response has no usable result");
    }
    return payload;
  }
}
