/**
 * HTTP fetch with timeout and retries
 */

import type { Collaborators, ImagesConfig } from "../types";
import { CollaboratorError } from "../utils/errors";

type FetchOptions = Pick<ImagesConfig, "timeout" | "retries" | "userAgent">;

async function fetchOnce(url: string, options: FetchOptions): Promise<Buffer> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeout);

  try {
    const response = await fetch(url, {
      signal: controller.signal,
      headers: { "User-Agent": options.userAgent },
    });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status}: ${response.statusText}`);
    }
    return Buffer.from(await response.arrayBuffer());
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Retries back off exponentially from `retryDelay` milliseconds
 */
export function createFetchResource(
  options: FetchOptions,
  retryDelay = 1000,
): Collaborators["fetchResource"] {
  return async (url) => {
    let lastError: unknown = null;

    for (let attempt = 0; attempt <= options.retries; attempt++) {
      try {
        return await fetchOnce(url, options);
      } catch (error) {
        lastError = error;
        if (attempt < options.retries) {
          await new Promise((r) => setTimeout(r, Math.pow(2, attempt) * retryDelay));
        }
      }
    }

    const message = lastError instanceof Error ? lastError.message : "Download failed";
    throw new CollaboratorError("fetchResource", message, { cause: lastError });
  };
}
