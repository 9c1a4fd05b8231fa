/**
 * HTTP Utility Module
 *
 * Thin axios wrapper used by the scores API client.
 */

import axios from 'axios';
import { FetchError, toError } from '../errors/index.js';

/**
 * HTTP response structure
 *
 * @template T - Type of the response data
 */
export interface HttpResponse<T> {
  status: number; // HTTP status code
  data?: T; // Response body (parsed)
}

/**
 * Signature of an HTTP GET whose body is decoded by the caller, so clients
 * can be handed a stand-in
 */
export type HttpGet = (
  url: string,
  headers?: Record<string, string>,
  logUrl?: string
) => Promise<HttpResponse<unknown>>;

/**
 * Performs an HTTP GET request
 *
 * Never throws on HTTP errors (validateStatus: () => true); the caller
 * inspects `status`. Network failures (DNS, refused connection, reset)
 * are thrown as FetchError.
 *
 * @param url - Full URL to request
 * @param headers - Optional headers to include in the request
 * @param logUrl - URL to report in errors, when `url` carries a credential
 * @returns Promise resolving to HttpResponse with status and data
 *
 * @example
 * const res = await httpGet<Game[]>('https://api.example.com/games');
 */
export async function httpGet<T>(
  url: string,
  headers: Record<string, string> = {},
  logUrl: string = url
): Promise<HttpResponse<T>> {
  try {
    const res = await axios.get<T>(url, { headers, validateStatus: () => true });
    return { status: res.status, data: res.data };
  } catch (e) {
    // axios errors carry the request config (full URL included), so only the message is kept
    const { message } = toError(e);
    throw new FetchError(`HTTP request failed: ${message}`, logUrl, 0, new Error(message));
  }
}
