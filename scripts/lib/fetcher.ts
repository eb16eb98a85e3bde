/**
 * HTTP download utilities for statute sources.
 *
 * - Uses a descriptive User-Agent.
 * - Applies a minimum delay between requests.
 * - Retries transient 429/5xx failures with exponential backoff.
 * - Falls back to curl -k for environments with broken CA bundles.
 */

import { execFileSync } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';

const USER_AGENT = 'statute-corpus/1.0 (statute text ingestion)';
const MIN_DELAY_MS = 1000;
const REQUEST_TIMEOUT_MS = 30000;

let lastRequestAt = 0;
let rateLimitChain: Promise<void> = Promise.resolve();

async function sleep(ms: number): Promise<void> {
  await new Promise(resolve => setTimeout(resolve, ms));
}

async function enforceRateLimit(): Promise<void> {
  let release!: () => void;
  const previous = rateLimitChain;
  rateLimitChain = new Promise<void>(resolve => {
    release = resolve;
  });

  await previous;
  try {
    const elapsed = Date.now() - lastRequestAt;
    if (elapsed < MIN_DELAY_MS) {
      await sleep(MIN_DELAY_MS - elapsed);
    }
    lastRequestAt = Date.now();
  } finally {
    release();
  }
}

export function collectErrorMessages(error: unknown): string {
  const parts: string[] = [];
  let current: unknown = error;

  while (current) {
    if (current instanceof Error) {
      if (current.message) parts.push(current.message);
      current = current.cause;
      continue;
    }

    parts.push(String(current));
    break;
  }

  return parts.join(' | ');
}

export function isTlsVerificationError(error: unknown): boolean {
  const message = collectErrorMessages(error);
  return /UNABLE_TO_VERIFY_LEAF_SIGNATURE|unable to verify the first certificate|SSL certificate|self[- ]signed certificate/i.test(message);
}

export function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function backoffMs(attempt: number): number {
  return Math.pow(2, attempt + 1) * 1000;
}

function fetchViaCurl(url: string): Buffer {
  return execFileSync(
    'curl',
    ['-k', '-fsSL', '--connect-timeout', '10', '--max-time', '120', '-A', USER_AGENT, url],
    { maxBuffer: 256 * 1024 * 1024 },
  );
}

async function fetchWithRetry(url: string, accept: string, maxRetries = 2): Promise<Response> {
  await enforceRateLimit();

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: {
          'User-Agent': USER_AGENT,
          'Accept': accept,
        },
        redirect: 'follow',
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });

      if (isRetryableStatus(response.status) && attempt < maxRetries) {
        await sleep(backoffMs(attempt));
        continue;
      }

      if (!response.ok) {
        throw new Error(`HTTP ${response.status} while fetching ${url}`);
      }

      return response;
    } catch (error) {
      if (isTlsVerificationError(error) || attempt >= maxRetries) {
        throw error;
      }

      await sleep(backoffMs(attempt));
    }
  }

  throw new Error(`Failed to fetch ${url} after ${maxRetries + 1} attempts`);
}

export async function fetchBinaryFromUrl(url: string): Promise<Buffer> {
  try {
    const response = await fetchWithRetry(url, 'application/pdf, text/plain, application/octet-stream, */*');
    const bytes = await response.arrayBuffer();
    return Buffer.from(bytes);
  } catch (error) {
    if (!isTlsVerificationError(error)) {
      throw error;
    }

    await enforceRateLimit();
    return fetchViaCurl(url);
  }
}

/**
 * Download `url` to `localPath` unless the file is already cached and
 * `refresh` is off. Returns true when a download happened.
 */
export async function downloadSource(url: string, localPath: string, refresh: boolean): Promise<boolean> {
  if (!refresh && fs.existsSync(localPath)) {
    return false;
  }

  const body = await fetchBinaryFromUrl(encodeURI(url));
  fs.mkdirSync(path.dirname(localPath), { recursive: true });
  fs.writeFileSync(localPath, body);
  return true;
}
