/**
 * Scores API Client Module
 *
 * Builds GamesByDate URLs and fetches the day's games from the scores data
 * source. One attempt per call; failures come back as FetchError values.
 */

import type { Logger } from '../core/logger.js';
import { SCORES_API } from '../core/constants.js';
import { FetchError, toError } from '../errors/index.js';
import { httpGet as defaultHttpGet, type HttpGet, type HttpResponse } from '../util/http.js';
import { err, ok, type Result } from '../util/result.js';
import { isValidDateISO, ValidationError } from '../util/validation.js';
import { GamesByDateSchema, type GameRecord } from '../types/api.js';

export interface ScoresApiOptions {
  apiKey: string;
  baseUrl: string;
  logger: Logger;
  /** HTTP GET implementation (defaults to axios) */
  get?: HttpGet;
}

export type FetchGames = (dateISO: string) => Promise<Result<GameRecord[], FetchError>>;

/**
 * Constructs URL for fetching the games of one day
 *
 * Endpoint: /v3/nba/scores/json/GamesByDate/{YYYY-MM-DD}?key={apiKey}
 *
 * @param baseUrl - Data host, without trailing slash
 * @param dateISO - Date in ISO format (YYYY-MM-DD)
 * @param apiKey - Credential, sent as the `key` query parameter
 * @throws ValidationError if the date is not a valid YYYY-MM-DD date
 *
 * @example
 * gamesByDateUrl('https://api.sportsdata.io', '2025-01-15', 'test-key')
 * // Returns: https://api.sportsdata.io/v3/nba/scores/json/GamesByDate/2025-01-15?key=test-key
 */
export function gamesByDateUrl(baseUrl: string, dateISO: string, apiKey: string): string {
  if (!isValidDateISO(dateISO)) {
    throw new ValidationError(`Invalid date format: ${dateISO}`, 'dateISO');
  }
  return `${baseUrl}${SCORES_API.GAMES_BY_DATE_PATH}/${dateISO}?key=${encodeURIComponent(apiKey)}`;
}

/**
 * Replaces the `key` query parameter so URLs can be logged
 */
export function redactApiKey(url: string): string {
  return url.replace(/([?&]key=)[^&]*/, '$1***');
}

/**
 * Creates a fetcher for the GamesByDate endpoint
 *
 * The returned function fails with FetchError when:
 * - the request cannot be made (network error, invalid date)
 * - the response status is not 2xx
 * - the body is not an array of game objects
 */
export function createScoresApiClient(options: ScoresApiOptions): FetchGames {
  const { apiKey, baseUrl, logger } = options;
  const get: HttpGet = options.get ?? defaultHttpGet;

  return async function fetchGamesByDate(dateISO) {
    let url: string;
    try {
      url = gamesByDateUrl(baseUrl, dateISO, apiKey);
    } catch (e) {
      return err(new FetchError(toError(e).message, `${baseUrl}${SCORES_API.GAMES_BY_DATE_PATH}/${dateISO}`, 0));
    }
    const logUrl = redactApiKey(url);

    let res: HttpResponse<unknown>;
    try {
      res = await get(url, { Accept: 'application/json' }, logUrl);
    } catch (e) {
      if (e instanceof FetchError) return err(e);
      const error = toError(e);
      return err(new FetchError(`Unexpected error fetching games: ${error.message}`, logUrl, 0, error));
    }

    if (res.status < 200 || res.status >= 300) {
      return err(new FetchError(`Scores API responded with status ${res.status}`, logUrl, res.status));
    }

    const parsed = GamesByDateSchema.safeParse(res.data);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; ');
      return err(new FetchError(`Malformed games response: ${issues}`, logUrl, res.status));
    }

    logger.debug({ url: logUrl, dateISO, count: parsed.data.length }, 'games fetched');
    return ok(parsed.data);
  };
}
