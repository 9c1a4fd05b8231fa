/**
 * Scheduled Trigger Handler
 * 
 * Entry point for hosts that invoke a function per scheduler firing.
 * The notifier is built from environment configuration on the first
 * invocation and reused while the host keeps the process warm.
 */

import { loadConfig, type Env } from './core/config.js';
import { createLogger } from './core/logger.js';
import { createKafkaPublisher } from './bus/kafkaPublisher.js';
import { createScoresApiClient } from './http/scoresApiClient.js';
import { createNotifier, type NotifierResult } from './services/notifier.js';

type Notifier = (trigger?: unknown) => Promise<NotifierResult>;

let notifier: Notifier | undefined;

/**
 * Wires the notifier from environment variables
 * 
 * @throws ConfigError if API_KEY or TOPIC_DESTINATION is missing
 */
export function buildNotifier(env: Env = process.env): Notifier {
  const cfg = loadConfig(env);
  const logger = createLogger(cfg.logLevel);
  
  return createNotifier({
    topicDestination: cfg.topicDestination,
    scheduleDate: cfg.scheduleDate,
    fetchGames: createScoresApiClient({
      apiKey: cfg.scoresApi.apiKey,
      baseUrl: cfg.scoresApi.baseUrl,
      logger
    }),
    publisher: createKafkaPublisher({ kafka: cfg.kafka, logger }),
    logger
  });
}

/**
 * Runs the notifier once; the event payload is ignored
 */
export async function handler(event?: unknown): Promise<NotifierResult> {
  if (!notifier) notifier = buildNotifier();
  return notifier(event);
}
