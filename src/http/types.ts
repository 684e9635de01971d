import type { Codec } from "../codec/Codec";
import type { Logger } from "../models/Logger";

export interface JsonHttpClientConfig {
  baseUrl: string;
  /** Encodes request bodies and decodes responses; defaults to the web preset */
  codec?: Codec;
  fetchImpl?: typeof fetch;
  /** Abort requests after this many milliseconds; 0 disables the timeout */
  timeoutMs?: number;
  headers?: Record<string, string>;
  logger?: Logger;
}

export interface PostJsonResult {
  status: number;
  ok: boolean;
  statusText: string;
}
