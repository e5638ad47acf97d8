import { AxiosResponse } from 'axios';
import { describeHttpError, TransportError } from './errors.js';
import { logger } from './logger.js';
import { CanvasRequester } from './types.js';

/**
 * Extract the `rel="next"` target from a Canvas `Link` header.
 */
export function parseNextLink(linkHeader: unknown): string | null {
  if (typeof linkHeader !== 'string' || linkHeader.length === 0) {
    return null;
  }

  for (const part of linkHeader.split(',')) {
    const [target, ...attributes] = part.split(';');
    const isNext = attributes.some(attr => /^\s*rel="?next"?\s*$/.test(attr));
    if (!isNext) continue;
    const match = target.match(/<(.*?)>/);
    if (match && match[1]) {
      return match[1];
    }
  }
  return null;
}

/**
 * Fetch all pages of a paginated Canvas API endpoint using the Link header.
 * Query params are sent with the first request only; later pages carry them in
 * the link itself.
 */
export async function fetchAllPages(
  client: CanvasRequester,
  initialUrl: string,
  params?: Record<string, unknown>
): Promise<unknown[]> {
  const results: unknown[] = [];
  let url: string | null = initialUrl;
  let pageParams = params;
  let pages = 0;

  logger.debug(`Fetching all pages starting from: ${url}`);

  while (url) {
    let response: AxiosResponse<unknown>;
    try {
      response = await client.get<unknown>(url, pageParams ? { params: pageParams } : undefined);
    } catch (error: unknown) {
      const { message, status } = describeHttpError(error);
      throw new TransportError(`Failed during pagination at ${url}: ${message}`, url, status, {
        cause: error,
      });
    }

    pages += 1;
    if (Array.isArray(response.data)) {
      results.push(...response.data);
    } else {
      results.push(response.data);
    }

    url = parseNextLink(response.headers?.['link']);
    pageParams = undefined;
    if (url) {
      logger.debug(`Found next page link: ${url}`);
    }
  }

  logger.debug(`Finished fetching ${pages} page(s). Total items: ${results.length}`);
  return results;
}
