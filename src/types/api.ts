/**
 * Scores API Type Definitions
 *
 * Zod schemas and inferred types for the GamesByDate response.
 * Field names follow the data source's PascalCase JSON.
 *
 * Every field is optional and a value of the wrong type decodes as
 * `undefined` (`.catch`), so a malformed field renders as a placeholder
 * instead of failing the whole response. Only a body that is not an
 * array of objects is rejected.
 */

import { z } from 'zod';

const text = z.string().nullish().catch(undefined);
const score = z.number().nullish().catch(undefined);

/**
 * Score of a single quarter (or overtime period)
 */
export const QuarterScoreSchema = z
  .object({
    Number: score,
    AwayScore: score,
    HomeScore: score,
  })
  .passthrough();

/**
 * One game of the day
 *
 * `LastPlay` is meaningful while the game is InProgress, `Quarters` once
 * it is Final.
 */
export const GameRecordSchema = z
  .object({
    Status: text,
    AwayTeam: text,
    HomeTeam: text,
    AwayTeamScore: score,
    HomeTeamScore: score,
    DateTime: text,
    Channel: text,
    LastPlay: text,
    // a malformed entry degrades on its own and the other quarters are kept
    Quarters: z.array(QuarterScoreSchema.catch({})).nullish().catch(undefined),
  })
  .passthrough();

export const GamesByDateSchema = z.array(GameRecordSchema);

export type QuarterScore = z.infer<typeof QuarterScoreSchema>;
export type GameRecord = z.infer<typeof GameRecordSchema>;

/**
 * Known values of `Status`; anything else uses the generic template
 */
export type GameStatus = 'Final' | 'InProgress' | 'Scheduled';
