/**
 * Endpoint fetcher type definitions
 */

/**
 * The only I/O boundary of the pipeline: one GET per controller page.
 * Tests substitute canned bodies behind this interface.
 */
export interface EndpointFetcher {
  /**
   * Fetch a sub-resource of the controller as text
   * @throws {TransportError} On connection, DNS, abort or HTTP status failure
   * @throws {BodyDecodeError} If the body is not valid UTF-8
   */
  fetchPage(resource: string): Promise<string>;
}

/**
 * HTTP client configuration
 */
export interface ControllerClientConfig {
  /** `host`, `host:port` or a full http(s) URL */
  address: string;

  /** Abort after this many ms; transport defaults apply when omitted or 0 */
  timeoutMs?: number;
}

/**
 * Minimal fetch signature the client depends on
 */
export type FetchFunction = (input: string, init?: RequestInit) => Promise<Response>;
