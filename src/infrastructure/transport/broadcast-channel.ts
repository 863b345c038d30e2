import { Redis } from 'ioredis';
import type { Logger } from 'pino';

export type ChannelMessageHandler = (channel: string, message: string) => void;

/**
 * Primary broadcast channel.
 *
 * `publish` resolves with the number of listeners that received the
 * message; zero means nobody was listening.
 */
export interface BroadcastChannel {
  connect(): Promise<void>;
  publish(channel: string, message: string): Promise<number>;
  subscribe(channels: readonly string[], onMessage: ChannelMessageHandler): Promise<void>;
  unsubscribe(channels: readonly string[]): Promise<void>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

/**
 * Redis Pub/Sub implementation.
 *
 * ioredis requires a dedicated connection for subscriber mode, so a
 * second client is kept for publishing. The publisher has its offline
 * queue disabled: while Redis is unreachable `publish` rejects at once
 * instead of buffering, which lets the transport fall back.
 */
export class RedisBroadcastChannel implements BroadcastChannel {
  private readonly pub: Redis;
  private readonly sub: Redis;

  constructor(
    redisUrl: string,
    private readonly log: Logger,
  ) {
    this.pub = new Redis(redisUrl, {
      maxRetriesPerRequest: 1,
      enableReadyCheck: true,
      enableOfflineQueue: false,
      lazyConnect: true,
    });
    this.sub = new Redis(redisUrl, {
      maxRetriesPerRequest: null,
      enableReadyCheck: true,
      lazyConnect: true,
    });

    this.pub.on('error', (err: Error) => log.warn({ err, connection: 'publisher' }, 'Redis connection error'));
    this.sub.on('error', (err: Error) => log.warn({ err, connection: 'subscriber' }, 'Redis connection error'));
  }

  async connect(): Promise<void> {
    await Promise.all([this.pub.connect(), this.sub.connect()]);
    this.log.info('Broadcast channel Redis connections established');
  }

  async publish(channel: string, message: string): Promise<number> {
    return this.pub.publish(channel, message);
  }

  async subscribe(channels: readonly string[], onMessage: ChannelMessageHandler): Promise<void> {
    this.sub.on('message', onMessage);
    await this.sub.subscribe(...channels);
    this.log.info({ channels }, 'Subscribed to broadcast channels');
  }

  async unsubscribe(channels: readonly string[]): Promise<void> {
    await this.sub.unsubscribe(...channels);
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.pub.ping()) === 'PONG';
    } catch (err: unknown) {
      this.log.debug({ err }, 'Redis ping failed');
      return false;
    }
  }

  async close(): Promise<void> {
    const results = await Promise.allSettled([this.sub.quit(), this.pub.quit()]);
    for (const result of results) {
      if (result.status === 'rejected') {
        this.log.warn({ err: result.reason }, 'Redis quit failed');
      }
    }
    this.log.info('Broadcast channel disconnected');
  }
}
