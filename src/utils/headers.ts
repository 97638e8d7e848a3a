/**
 * Header utilities for HTTP/1.1 request serialization.
 */

const INVALID_HEADER_CHAR_RE = /[\r\n\0]/;

// RFC 7230 3.2.6. Field Value Components: token = 1*tchar
// tchar = "!" / "#" / "$" / "%" / "&" / "'" / "*" / "+" / "-" / "." / "^" / "_" / "`" / "|" / "~" / DIGIT / ALPHA
const TOKEN_RE = /^[a-zA-Z0-9!#$%&'*+.^_`|~-]+$/;

/**
 * Validate header name against RFC 7230 token characters.
 */
export function validateHeaderName(name: string): void {
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
 * Serialize an ordered header list into HTTP/1.1 format: "Key: Value\r\n".
 * Names keep their case; the pipelining server matches control headers by name.
 */
export function serializeHttp1Headers(headers: ReadonlyArray<readonly [string, string]>): string {
  let result = "";
  for (const [key, value] of headers) {
    validateHeaderName(key);
    validateHeaderValue(key, value);
    result += `${key}: ${value}\r\n`;
  }
  return result;
}

/**
 * Validate HTTP method to prevent CRLF injection and ensure valid token characters.
 */
export function validateMethod(method: string): void {
  if (!TOKEN_RE.test(method)) {
    throw new Error(`Invalid method: ${JSON.stringify(method)} contains invalid characters`);
  }
}

// RFC 7230 3.1.1 request-target cannot contain whitespace (SP/HTAB) or CR/LF
const INVALID_PATH_RE = /[\r\n\s]/;

/**
 * Validate HTTP path to prevent Request Splitting and ensure valid request-target.
 */
export function validatePath(path: string): void {
  if (INVALID_PATH_RE.test(path)) {
    throw new Error(
      `Invalid path: ${JSON.stringify(path)} contains whitespace or control characters`,
    );
  }
}
