/**
 * Controller HTTP client
 * Fetches the firmware's server-side-include pages as text
 */

import { BodyDecodeError, TransportError } from '$types/errors';
import { describeError, normalizeBaseUrl, resourceUrl } from './helpers';
import type { ControllerClientConfig, EndpointFetcher, FetchFunction } from './types';

export class ControllerHttpClient implements EndpointFetcher {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFunction;
  private readonly decoder = new TextDecoder('utf-8', { fatal: true });

  constructor(config: ControllerClientConfig, fetchFn?: FetchFunction) {
    this.baseUrl = normalizeBaseUrl(config.address);
    this.timeoutMs = config.timeoutMs ?? 0;
    this.fetchFn = fetchFn ?? ((input, init) => fetch(input, init));
  }

  /**
   * Fetch one page. No retry; no deadline unless a timeout is configured.
   */
  async fetchPage(resource: string): Promise<string> {
    const url = resourceUrl(this.baseUrl, resource);

    const controller = this.timeoutMs > 0 ? new AbortController() : null;
    const timeoutId = controller
      ? setTimeout(() => controller.abort(), this.timeoutMs)
      : null;

    let body: ArrayBuffer;
    try {
      const response = await this.fetchFn(url, {
        method: 'GET',
        signal: controller ? controller.signal : undefined,
      });

      if (!response.ok) {
        // Release the connection; the error page is never read
        await response.body?.cancel();
        throw new TransportError(url, `HTTP ${response.status}: ${response.statusText}`, response.status);
      }

      body = await response.arrayBuffer();
    } catch (error: unknown) {
      if (error instanceof TransportError) {
        throw error;
      }
      if (error instanceof Error && error.name === 'AbortError') {
        throw new TransportError(url, `Request timeout after ${this.timeoutMs}ms`);
      }
      throw new TransportError(url, `Request to ${url} failed: ${describeError(error)}`);
    } finally {
      if (timeoutId !== null) {
        clearTimeout(timeoutId);
      }
    }

    try {
      return this.decoder.decode(body);
    } catch (error: unknown) {
      throw new BodyDecodeError(url, `Response from ${url} is not valid UTF-8: ${describeError(error)}`);
    }
  }
}
