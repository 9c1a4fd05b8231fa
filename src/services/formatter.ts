/**
 * Game Formatter
 *
 * Turns game records into the plain-text blocks sent to subscribers.
 * Total over any record: a missing or mistyped field renders as a
 * placeholder, and an unrecognized status falls back to a short block.
 */

import { NOTIFICATION, PLACEHOLDERS } from '../core/constants.js';
import type { GameRecord, GameStatus, QuarterScore } from '../types/api.js';

type Formatter = (game: GameRecord) => string[];

function textOr(value: string | null | undefined, placeholder: string): string {
  return value == null || value === '' ? placeholder : value;
}

function valueOr(value: number | string | null | undefined): string {
  return value == null || value === '' ? PLACEHOLDERS.VALUE : String(value);
}

function scoreLine(away: number | null | undefined, home: number | null | undefined): string {
  return `${valueOr(away)}-${valueOr(home)}`;
}

function header(game: GameRecord): string[] {
  return [
    `Status: ${textOr(game.Status, PLACEHOLDERS.TEXT)}`,
    `Matchup: ${textOr(game.AwayTeam, PLACEHOLDERS.TEXT)} @ ${textOr(game.HomeTeam, PLACEHOLDERS.TEXT)}`,
  ];
}

/**
 * Formats quarter scores as `Q1: 20-19, Q2: 25-30`, in the order given
 */
export function formatQuarters(quarters: QuarterScore[] | null | undefined): string {
  if (!quarters || quarters.length === 0) return PLACEHOLDERS.VALUE;
  return quarters
    .map((q) => `Q${valueOr(q.Number)}: ${scoreLine(q.AwayScore, q.HomeScore)}`)
    .join(', ');
}

const TEMPLATES: Record<GameStatus, Formatter> = {
  Final: (game) => [
    ...header(game),
    `Final Score: ${scoreLine(game.AwayTeamScore, game.HomeTeamScore)}`,
    `Start Time: ${textOr(game.DateTime, PLACEHOLDERS.TEXT)}`,
    `Channel: ${textOr(game.Channel, PLACEHOLDERS.VALUE)}`,
    `Quarter Scores: ${formatQuarters(game.Quarters)}`,
  ],
  InProgress: (game) => [
    ...header(game),
    `Current Score: ${scoreLine(game.AwayTeamScore, game.HomeTeamScore)}`,
    `Last Play: ${textOr(game.LastPlay, PLACEHOLDERS.VALUE)}`,
    `Channel: ${textOr(game.Channel, PLACEHOLDERS.VALUE)}`,
  ],
  Scheduled: (game) => [
    ...header(game),
    `Start Time: ${textOr(game.DateTime, PLACEHOLDERS.TEXT)}`,
    `Channel: ${textOr(game.Channel, PLACEHOLDERS.VALUE)}`,
  ],
};

function isKnownStatus(status: string | null | undefined): status is GameStatus {
  return status != null && Object.prototype.hasOwnProperty.call(TEMPLATES, status);
}

/**
 * Formats one game as a multi-line text block
 *
 * @example
 * formatGame({ Status: 'Scheduled', AwayTeam: 'BOS', HomeTeam: 'LAL', DateTime: '2025-01-15T19:30:00', Channel: 'ESPN' })
 * // Status: Scheduled
 * // Matchup: BOS @ LAL
 * // Start Time: 2025-01-15T19:30:00
 * // Channel: ESPN
 */
export function formatGame(game: GameRecord): string {
  const lines = isKnownStatus(game.Status)
    ? TEMPLATES[game.Status](game)
    : [...header(game), `Details: ${NOTIFICATION.DETAILS_UNAVAILABLE}`];
  return lines.join('\n');
}

/**
 * Builds the notification body for a day's games
 *
 * Blocks keep the order of `games`. An empty list yields the fixed
 * no-games message.
 */
export function buildNotificationMessage(games: readonly GameRecord[]): string {
  if (games.length === 0) return NOTIFICATION.NO_GAMES_MESSAGE;
  return games.map(formatGame).join(NOTIFICATION.SEPARATOR);
}
