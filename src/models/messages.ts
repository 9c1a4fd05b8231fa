/**
 * Message Models
 * 
 * Defines the notification published to the pub/sub topic and the
 * publisher contract the notifier depends on.
 */

import type { PublishError } from '../errors/index.js';
import type { Result } from '../util/result.js';

/**
 * Notification handed to the publisher
 */
export interface NotificationMessage {
  /** Topic the message is published to */
  destination: string;
  
  /** Subject line shown by email subscribers */
  subject: string;
  
  /** Formatted game digest */
  body: string;
  
  /** Message key; the schedule date the digest covers */
  key?: string;
}

/**
 * Value written to the topic
 */
export interface NotificationPayload {
  subject: string;
  body: string;
  
  /** ISO timestamp when the message was published */
  publishedAt: string;
}

/**
 * Identifies a published message
 */
export interface PublishReceipt {
  topic: string;
  partition?: number;
  offset?: string;
}

export interface Publisher {
  publish(message: NotificationMessage): Promise<Result<PublishReceipt, PublishError>>;
}
