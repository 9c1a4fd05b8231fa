/**
 * Configuration Module
 *
 * Builds the notifier configuration from environment variables.
 * Loads .env file automatically via dotenv/config import.
 *
 * Configuration is read once by the hosting entry point and passed into the
 * notifier; nothing else in the code reads process.env.
 */

import 'dotenv/config';
import { SCORES_API } from './constants.js';
import { ConfigError } from '../errors/index.js';
import { isValidDateISO, isValidUrl } from '../util/validation.js';

export type Env = Record<string, string | undefined>;

export interface KafkaConfig {
  brokers: string[];
  clientId: string;
}

export interface NotifierConfig {
  scoresApi: {
    apiKey: string;
    baseUrl: string;
  };
  /** Topic the digest is published to */
  topicDestination: string;
  /** Optional fixed date (YYYY-MM-DD); empty = today */
  scheduleDate: string;
  kafka: KafkaConfig;
  logLevel: string;
}

/**
 * Reads the notifier configuration from an environment map
 *
 * @param env - Environment variables (defaults to process.env)
 * @throws ConfigError listing every missing required variable, or naming an invalid one
 */
export function loadConfig(env: Env = process.env): NotifierConfig {
  const missing = ['API_KEY', 'TOPIC_DESTINATION'].filter((name) => !env[name]);
  if (missing.length > 0) {
    throw new ConfigError(`Missing required env var ${missing.join(', ')}`, missing);
  }

  const baseUrl = (env.SCORES_API_BASE_URL || SCORES_API.DEFAULT_BASE_URL).replace(/\/+$/, '');
  if (!isValidUrl(baseUrl)) {
    throw new ConfigError(`Invalid SCORES_API_BASE_URL: ${baseUrl}`, ['SCORES_API_BASE_URL']);
  }

  const scheduleDate = env.SCHEDULE_DATE?.trim() || '';
  if (scheduleDate && !isValidDateISO(scheduleDate)) {
    throw new ConfigError(`Invalid SCHEDULE_DATE: ${scheduleDate}. Expected YYYY-MM-DD`, ['SCHEDULE_DATE']);
  }

  return {
    scoresApi: {
      apiKey: env.API_KEY ?? '',
      baseUrl,
    },
    topicDestination: env.TOPIC_DESTINATION ?? '',
    scheduleDate,
    kafka: {
      brokers: (env.KAFKA_BROKERS || 'localhost:9092').split(',').map(b => b.trim()).filter(Boolean), // Comma-separated list of Kafka broker addresses
      clientId: env.KAFKA_CLIENT_ID || 'nba-score-notifier',
    },
    logLevel: env.LOG_LEVEL || 'info', // trace, debug, info, warn, error, fatal, silent
  };
}
