/**
 * Header collection and validation.
 * Names are stored lowercase (HTTP/2 requires it, RFC 7540 Section 8.1.2)
 * and compared case-insensitively. Pseudo-headers (":authority", ":scheme")
 * live in the same ordered map as regular headers.
 */

const INVALID_HEADER_CHAR_RE = /[\r\n\0]/;

// RFC 7230 3.2.6. Field Value Components: token = 1*tchar
// tchar = "!" / "#" / "$" / "%" / "&" / "'" / "*" / "+" / "-" / "." / "^" / "_" / "`" / "|" / "~" / DIGIT / ALPHA
const TOKEN_RE = /^[a-zA-Z0-9!#$%&'*+.^_`|~-]+$/;

const PSEUDO_HEADERS = new Set([":method", ":path", ":scheme", ":authority", ":status"]);

/**
 * Validate header name against RFC 7230 token characters.
 * Known pseudo-header names are accepted as well.
 */
export function validateHeaderName(name: string): void {
  if (PSEUDO_HEADERS.has(name.toLowerCase())) return;
  if (!TOKEN_RE.test(name)) {
    throw new Error(`Invalid header name: ${JSON.stringify(name)} contains invalid characters`);
  }
}

/**
 * Validate header value against CR/LF/NUL injection.
 */
export function validateHeaderValue(name: string, value: string): void {
  if (INVALID_HEADER_CHAR_RE.test(value)) {
    throw new Error(`Invalid header value for "${name}": contains CR/LF/NUL`);
  }
}

/**
 * Validate HTTP method to prevent CRLF injection and ensure valid token characters.
 */
export function validateMethod(method: string): void {
  if (!TOKEN_RE.test(method)) {
    throw new Error(`Invalid method: ${JSON.stringify(method)} contains invalid characters`);
  }
}

/** Headers input accepted by the public API. */
export type HeaderInput = Record<string, string> | ReadonlyArray<readonly [string, string]>;

/**
 * Immutable, insertion-ordered header map.
 * Every mutator returns a new instance; unchanged results return `this`.
 */
export class HttpHeaders implements Iterable<[string, string]> {
  static readonly EMPTY = new HttpHeaders(new Map());

  private readonly entries: ReadonlyMap<string, string>;

  private constructor(entries: ReadonlyMap<string, string>) {
    this.entries = entries;
  }

  /**
   * Build headers from a record or a list of pairs.
   * Later duplicates of a name overwrite earlier ones but keep the first position.
   */
  static of(input?: HeaderInput | HttpHeaders): HttpHeaders {
    if (!input) return HttpHeaders.EMPTY;
    if (input instanceof HttpHeaders) return input;

    const pairs: Iterable<readonly [string, string]> = isPairList(input)
      ? input
      : Object.entries(input);
    const map = new Map<string, string>();
    for (const [name, value] of pairs) {
      validateHeaderName(name);
      validateHeaderValue(name, value);
      map.set(name.toLowerCase(), value);
    }
    return map.size === 0 ? HttpHeaders.EMPTY : new HttpHeaders(map);
  }

  get size(): number {
    return this.entries.size;
  }

  get(name: string): string | undefined {
    return this.entries.get(name.toLowerCase());
  }

  has(name: string): boolean {
    return this.entries.has(name.toLowerCase());
  }

  get authority(): string | undefined {
    return this.get(":authority");
  }

  get scheme(): string | undefined {
    return this.get(":scheme");
  }

  /** Set a header, replacing any existing value in place. */
  set(name: string, value: string): HttpHeaders {
    validateHeaderName(name);
    validateHeaderValue(name, value);
    const lower = name.toLowerCase();
    if (this.entries.get(lower) === value) return this;
    const map = new Map(this.entries);
    map.set(lower, value);
    return new HttpHeaders(map);
  }

  /** Set a header only when no value for the name exists yet. */
  setIfAbsent(name: string, value: string): HttpHeaders {
    return this.has(name) ? this : this.set(name, value);
  }

  /** Add every header of `defaults` whose name is missing here, in their order. */
  withDefaults(defaults: HttpHeaders): HttpHeaders {
    let result: HttpHeaders = this;
    for (const [name, value] of defaults) {
      result = result.setIfAbsent(name, value);
    }
    return result;
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries(this.entries);
  }

  [Symbol.iterator](): Iterator<[string, string]> {
    return this.entries.entries();
  }
}

function isPairList(
  input: HeaderInput,
): input is ReadonlyArray<readonly [string, string]> {
  if (!Array.isArray(input)) return false;
  for (const entry of input) {
    if (
      !Array.isArray(entry) ||
      entry.length !== 2 ||
      typeof entry[0] !== "string" ||
      typeof entry[1] !== "string"
    ) {
      throw new Error(
        `Invalid header entry: expected [string, string], got ${JSON.stringify(entry)}`,
      );
    }
  }
  return true;
}
