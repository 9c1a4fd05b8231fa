import { describe, it, expect, vi } from 'vitest';
import { pino } from 'pino';
import { createKafkaPublisher, type ProducerLike } from '../../src/bus/kafkaPublisher.js';
import { PublishError } from '../../src/errors/index.js';

const logger = pino({ level: 'silent' });
const kafka = { brokers: ['localhost:9092'], clientId: 'test-client' };

function fakeProducer() {
  return {
    connect: vi.fn<ProducerLike['connect']>(async () => {}),
    send: vi.fn<ProducerLike['send']>(async () => [
      { topicName: 'nba.digest', partition: 2, errorCode: 0, baseOffset: '15' },
    ]),
    disconnect: vi.fn<ProducerLike['disconnect']>(async () => {}),
  };
}

const message = {
  destination: 'nba.digest',
  subject: 'NBA Game Updates',
  body: 'No games available today.',
  key: '2025-01-15',
};

describe('kafkaPublisher', () => {
  it('should send one message with subject header and JSON value', async () => {
    const producer = fakeProducer();
    const publisher = createKafkaPublisher({ kafka, logger, producer });

    const result = await publisher.publish(message);

    expect(result).toEqual({ ok: true, value: { topic: 'nba.digest', partition: 2, offset: '15' } });
    expect(producer.send).toHaveBeenCalledTimes(1);
    const [record] = producer.send.mock.calls[0];
    expect(record.topic).toBe('nba.digest');
    expect(record.messages).toHaveLength(1);
    expect(record.messages[0].key).toBe('2025-01-15');
    expect(record.messages[0].headers).toEqual({ subject: 'NBA Game Updates' });
    expect(JSON.parse(String(record.messages[0].value))).toMatchObject({
      subject: 'NBA Game Updates',
      body: 'No games available today.',
    });
  });

  it('should connect before sending and disconnect afterwards', async () => {
    const producer = fakeProducer();
    const order: string[] = [];
    producer.connect.mockImplementation(async () => { order.push('connect'); });
    producer.send.mockImplementation(async () => { order.push('send'); return []; });
    producer.disconnect.mockImplementation(async () => { order.push('disconnect'); });

    const result = await createKafkaPublisher({ kafka, logger, producer }).publish(message);

    expect(order).toEqual(['connect', 'send', 'disconnect']);
    expect(result).toEqual({ ok: true, value: { topic: 'nba.digest', partition: undefined, offset: undefined } });
  });

  it('should return PublishError when sending fails', async () => {
    const producer = fakeProducer();
    producer.send.mockRejectedValue(new Error('broker down'));

    const result = await createKafkaPublisher({ kafka, logger, producer }).publish(message);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(PublishError);
    expect(result.error.message).toBe('Failed to publish to nba.digest: broker down');
    expect(result.error.topic).toBe('nba.digest');
    expect(producer.disconnect).toHaveBeenCalledTimes(1);
  });

  it('should return PublishError without disconnecting when connecting fails', async () => {
    const producer = fakeProducer();
    producer.connect.mockRejectedValue(new Error('ECONNREFUSED'));

    const result = await createKafkaPublisher({ kafka, logger, producer }).publish(message);

    expect(result.ok).toBe(false);
    expect(producer.send).not.toHaveBeenCalled();
    expect(producer.disconnect).not.toHaveBeenCalled();
  });

  it('should keep the receipt when disconnecting fails', async () => {
    const producer = fakeProducer();
    producer.disconnect.mockRejectedValue(new Error('already closed'));

    const result = await createKafkaPublisher({ kafka, logger, producer }).publish(message);

    expect(result.ok).toBe(true);
  });
});
