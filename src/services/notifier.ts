/**
 * Notifier Service
 *
 * One run of the pipeline: resolve today's date, fetch the games, format
 * them and publish the digest. Fetch and publish failures end the run with
 * a 500 result; nothing is retried, the next scheduled trigger runs again.
 */

import type { Logger } from '../core/logger.js';
import { NOTIFICATION, RESULT_BODIES } from '../core/constants.js';
import type { FetchGames } from '../http/scoresApiClient.js';
import type { Publisher } from '../models/messages.js';
import { todayAtFixedOffset } from '../util/date.js';
import { buildNotificationMessage } from './formatter.js';

export interface NotifierResult {
  code: 200 | 500;
  body: string;
}

export interface NotifierDeps {
  /** Topic the digest is published to */
  topicDestination: string;
  /** Fixed date (YYYY-MM-DD) to use instead of today; empty = today */
  scheduleDate?: string;
  fetchGames: FetchGames;
  publisher: Publisher;
  logger: Logger;
  /** Clock (defaults to the system clock) */
  now?: () => Date;
}

/**
 * Creates the notifier
 *
 * The returned function accepts the scheduler's trigger payload but never
 * reads it; every trigger means "run now".
 */
export function createNotifier(deps: NotifierDeps): (trigger?: unknown) => Promise<NotifierResult> {
  const { topicDestination, fetchGames, publisher, logger } = deps;
  const now = deps.now ?? (() => new Date());

  return async function run(): Promise<NotifierResult> {
    const dateISO = deps.scheduleDate || todayAtFixedOffset(now());
    logger.info({ dateISO, configured: !!deps.scheduleDate }, 'fetching games');

    const games = await fetchGames(dateISO);
    if (!games.ok) {
      const { message, url, status } = games.error;
      logger.error({ err: games.error, url, status, dateISO }, 'Failed to fetch games');
      return { code: 500, body: `${RESULT_BODIES.FETCH_FAILED}: ${message}` };
    }

    if (games.value.length === 0) {
      logger.warn({ dateISO }, 'no games found for date');
    } else {
      logger.info({ dateISO, count: games.value.length }, 'games discovered');
    }

    const body = buildNotificationMessage(games.value);

    const published = await publisher.publish({
      destination: topicDestination,
      subject: NOTIFICATION.SUBJECT,
      body,
      key: dateISO
    });
    if (!published.ok) {
      logger.error({ err: published.error, topic: topicDestination, dateISO }, 'Failed to publish notification');
      return { code: 500, body: `${RESULT_BODIES.PUBLISH_FAILED}: ${published.error.message}` };
    }

    logger.info({ dateISO, topic: topicDestination, games: games.value.length }, 'notification processed');
    return { code: 200, body: RESULT_BODIES.PROCESSED };
  };
}
