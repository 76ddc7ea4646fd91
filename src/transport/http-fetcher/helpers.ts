/**
 * Endpoint fetcher helper functions
 */

const SCHEME_PATTERN = /^https?:\/\//i;

/**
 * Normalize a controller address into a base URL without trailing slash
 *
 * A bare `host` or `host:port` gets `http://`; controllers serve plain HTTP
 * on the local network.
 *
 * @param address - Address as configured
 * @returns Base URL
 * @throws {Error} If the address is empty, unparseable or carries credentials
 */
export function normalizeBaseUrl(address: string): string {
  const trimmed = address.trim();
  if (trimmed === '') {
    throw new Error('Controller address must not be empty');
  }

  const withScheme = SCHEME_PATTERN.test(trimmed) ? trimmed : 'http://' + trimmed;
  let url: URL;
  try {
    url = new URL(withScheme);
  } catch {
    throw new Error('Controller address is not a valid URL: ' + trimmed);
  }
  if (url.username !== '' || url.password !== '') {
    throw new Error('Controller address must not embed credentials');
  }

  return withScheme.replace(/\/+$/, '');
}

/**
 * Join a base URL and a resource name
 * @param baseUrl - Normalized base URL
 * @param resource - Page name such as `main_data.shtml`
 * @returns Full page URL
 */
export function resourceUrl(baseUrl: string, resource: string): string {
  return baseUrl + '/' + resource.replace(/^\/+/, '');
}

/**
 * Describe an unknown thrown value for error messages
 * @param error - Caught value
 * @returns Message text
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause;
    if (cause instanceof Error && cause.message !== '') {
      return error.message + ' (' + cause.message + ')';
    }
    return error.message;
  }
  return String(error);
}
