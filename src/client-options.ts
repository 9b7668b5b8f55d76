/**
 * Client-wide options.
 */
import { z } from "zod";
import { HttpHeaders } from "./utils/headers.js";

export const ClientOptionsSchema = z.object({
  /** Headers added to every request that does not set them itself */
  defaultHeaders: z
    .union([z.record(z.string(), z.string()), z.array(z.tuple([z.string(), z.string()]))])
    .default({}),
  /**
   * Return HTTP/1 connections to the pool as soon as the request is written,
   * so the next request can be sent before the current response arrives.
   */
  useHttp1Pipelining: z.boolean().default(false),
});

export type ClientOptions = z.input<typeof ClientOptionsSchema>;

export interface ResolvedClientOptions {
  readonly defaultHeaders: HttpHeaders;
  readonly useHttp1Pipelining: boolean;
}

/** Validate options and fill defaults. Throws a ZodError on bad input. */
export function resolveClientOptions(options: ClientOptions = {}): ResolvedClientOptions {
  const parsed = ClientOptionsSchema.parse(options);
  return {
    defaultHeaders: HttpHeaders.of(parsed.defaultHeaders),
    useHttp1Pipelining: parsed.useHttp1Pipelining,
  };
}
