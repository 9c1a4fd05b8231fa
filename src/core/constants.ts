/**
 * Application Constants
 *
 * Centralized location for the fixed strings and numbers of the notifier.
 */

/**
 * Scores data source
 */
export const SCORES_API = {
  /** Default data host */
  DEFAULT_BASE_URL: 'https://api.sportsdata.io',

  /** Path of the games-by-date endpoint, date appended as the last segment */
  GAMES_BY_DATE_PATH: '/v3/nba/scores/json/GamesByDate',
} as const;

/**
 * Date resolution
 */
export const SCHEDULE_TIME = {
  /** Fixed UTC offset used to decide "today" (no daylight-saving adjustment) */
  UTC_OFFSET_HOURS: -5,
} as const;

/**
 * Notification contents
 */
export const NOTIFICATION = {
  /** Subject line attached to every published message */
  SUBJECT: 'NBA Game Updates',

  /** Placed between formatted game blocks */
  SEPARATOR: '\n\n',

  /** Message body when the data source returns no games */
  NO_GAMES_MESSAGE: 'No games available today.',

  /** Line used for statuses without a dedicated template */
  DETAILS_UNAVAILABLE: 'Game details unavailable.',
} as const;

/**
 * Text rendered in place of missing game fields
 */
export const PLACEHOLDERS = {
  TEXT: 'Unknown',
  VALUE: 'N/A',
} as const;

/**
 * Handler results
 */
export const RESULT_BODIES = {
  PROCESSED: 'processed',
  FETCH_FAILED: 'Failed to fetch games',
  PUBLISH_FAILED: 'Failed to publish notification',
} as const;
