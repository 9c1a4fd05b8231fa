/**
 * Kafka Publisher Module
 *
 * Publishes notification messages to a Kafka topic.
 * Uses KafkaJS library which is compatible with Kafka and Redpanda brokers.
 */

import { Kafka, logLevel, type Producer } from 'kafkajs';
import type { KafkaConfig } from '../core/config.js';
import type { Logger } from '../core/logger.js';
import { PublishError, toError } from '../errors/index.js';
import type { NotificationMessage, NotificationPayload, Publisher, PublishReceipt } from '../models/messages.js';
import { err, ok, type Result } from '../util/result.js';

const NO_RETRY = { retries: 0 };

/**
 * The part of a KafkaJS producer the publisher uses
 */
export type ProducerLike = Pick<Producer, 'connect' | 'send' | 'disconnect'>;

export interface KafkaPublisherOptions {
  kafka: KafkaConfig;
  logger: Logger;
  /** Producer to use instead of one built from `kafka` */
  producer?: ProducerLike;
}

/**
 * Builds a KafkaJS producer from configuration
 *
 * Log level set to ERROR to reduce noise from KafkaJS internal logs.
 * KafkaJS retries with backoff by default; both the client and the
 * producer are limited to a single attempt.
 */
function createProducer(config: KafkaConfig): Producer {
  const kafka = new Kafka({
    clientId: config.clientId,
    brokers: config.brokers,
    logLevel: logLevel.ERROR,
    retry: NO_RETRY
  });
  return kafka.producer({ retry: NO_RETRY });
}

/**
 * Creates a publisher backed by a Kafka producer
 *
 * Each publish connects, sends one message and disconnects, so nothing is
 * left open between invocations. A failure at any step is returned as a
 * PublishError; there is no retry.
 */
export function createKafkaPublisher(options: KafkaPublisherOptions): Publisher {
  const { logger } = options;
  const producer = options.producer ?? createProducer(options.kafka);

  async function publish(message: NotificationMessage): Promise<Result<PublishReceipt, PublishError>> {
    const topic = message.destination;
    const payload: NotificationPayload = {
      subject: message.subject,
      body: message.body,
      publishedAt: new Date().toISOString()
    };

    let connected = false;
    try {
      await producer.connect();
      connected = true;
      const [metadata] = await producer.send({
        topic,
        messages: [{
          key: message.key,
          value: JSON.stringify(payload),
          headers: { subject: message.subject }
        }]
      });
      logger.info({ topic, partition: metadata?.partition }, 'notification published');
      return ok({
        topic,
        partition: metadata?.partition,
        offset: metadata?.baseOffset ?? metadata?.offset
      });
    } catch (e) {
      const error = toError(e);
      return err(new PublishError(`Failed to publish to ${topic}: ${error.message}`, topic, error));
    } finally {
      if (connected) {
        try {
          await producer.disconnect();
        } catch (e) {
          logger.warn({ err: e, topic }, 'Error disconnecting Kafka producer');
        }
      }
    }
  }

  return { publish };
}
