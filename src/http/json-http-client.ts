import { Codec } from "../codec/Codec";
import type { FieldType, FieldTypeNode } from "../codec/field-types";
import { CodecDefaults } from "../codec/types";
import type { Constructor } from "../codec/types";
import {
  httpBaseUrlRequiredError,
  httpStatusError,
  httpTimeoutError,
} from "../errors";
import { Logger } from "../models/Logger";
import type { IValidationSchema } from "../types/utilities";
import type { JsonHttpClientConfig, PostJsonResult } from "./types";

export type { JsonHttpClientConfig, PostJsonResult } from "./types";

type DecodeTarget = Constructor | FieldTypeNode | IValidationSchema<unknown>;

const BODY_PREVIEW_LENGTH = 200;

const isSchema = (
  target: DecodeTarget,
): target is IValidationSchema<unknown> =>
  typeof target === "object" && "parse" in target;

interface RawResponse {
  url: string;
  response: Response;
  text: string;
}

/**
 * JSON over HTTP on top of a Codec. Responses are decoded into registered
 * types, field types or a Zod-compatible schema.
 */
export class JsonHttpClient {
  private readonly baseUrl: string;
  private readonly codec: Codec;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly logger: Logger;

  constructor(config: JsonHttpClientConfig) {
    const baseUrl = config.baseUrl?.replace(/\/+$/, "");
    if (!baseUrl) {
      throw httpBaseUrlRequiredError.create({});
    }
    this.baseUrl = baseUrl;
    this.codec = config.codec ?? new Codec({ defaults: CodecDefaults.Web });
    this.fetchImpl = config.fetchImpl ?? globalThis.fetch;
    this.timeoutMs = config.timeoutMs ?? 0;
    this.headers = { ...config.headers };
    this.logger = (config.logger ?? Logger.silent()).with({
      source: "http.jsonClient",
    });
  }

  /**
   * GET a resource and decode the response body. Non-2xx statuses fail.
   */
  public fetchJson(path: string): Promise<unknown>;
  public fetchJson<T extends object>(
    path: string,
    type: Constructor<T>,
  ): Promise<T>;
  public fetchJson<T>(path: string, type: FieldType<T>): Promise<T>;
  public fetchJson<T>(path: string, schema: IValidationSchema<T>): Promise<T>;
  public async fetchJson(path: string, target?: DecodeTarget): Promise<unknown> {
    const { url, response, text } = await this.send("GET", path);
    if (!response.ok) {
      this.logger.warn(`GET ${url} answered ${response.status}`);
      throw httpStatusError.create({
        url,
        status: response.status,
        statusText: response.statusText,
        bodyPreview: text.slice(0, BODY_PREVIEW_LENGTH),
      });
    }

    if (target === undefined) {
      return this.codec.decode(text);
    }
    if (isSchema(target)) {
      return target.parse(this.codec.decode(text));
    }
    if (typeof target === "function") {
      return this.codec.decode(text, target);
    }
    return this.codec.decode(text, target);
  }

  /**
   * POST a value encoded with the codec. The status is reported, not thrown.
   */
  public async postJson(
    path: string,
    value: unknown,
    type?: Constructor | FieldTypeNode,
  ): Promise<PostJsonResult> {
    const body = this.codec.encode(value, type);
    const { url, response } = await this.send("POST", path, body);
    if (!response.ok) {
      this.logger.warn(`POST ${url} answered ${response.status}`);
    }
    return {
      status: response.status,
      ok: response.ok,
      statusText: response.statusText,
    };
  }

  private resolveUrl(path: string): string {
    if (/^https?:\/\//i.test(path)) {
      return path;
    }
    return `${this.baseUrl}/${path.replace(/^\/+/, "")}`;
  }

  private async send(
    method: "GET" | "POST",
    path: string,
    body?: string,
  ): Promise<RawResponse> {
    const url = this.resolveUrl(path);
    const headers: Record<string, string> = {
      accept: "application/json",
      ...this.headers,
    };
    if (body !== undefined) {
      headers["content-type"] = "application/json; charset=utf-8";
    }

    const controller = this.timeoutMs > 0 ? new AbortController() : undefined;
    const timeout = controller
      ? setTimeout(() => controller.abort(), this.timeoutMs)
      : undefined;

    this.logger.debug(`${method} ${url}`);
    try {
      const response = await this.fetchImpl(url, {
        method,
        headers,
        body,
        signal: controller?.signal,
      });
      const text = await response.text();
      return { url, response, text };
    } catch (error) {
      if (controller?.signal.aborted) {
        throw httpTimeoutError.create({ url, timeoutMs: this.timeoutMs });
      }
      throw error;
    } finally {
      if (timeout) clearTimeout(timeout);
    }
  }
}

export function createJsonHttpClient(
  config: JsonHttpClientConfig,
): JsonHttpClient {
  return new JsonHttpClient(config);
}
