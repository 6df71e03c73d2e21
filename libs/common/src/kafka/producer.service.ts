import { Injectable, OnModuleInit, OnApplicationShutdown, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Kafka, Producer, logLevel } from 'kafkajs';
import type { CaptureRecord } from '../captures';
import type { QueueCountEvent } from './queue-count.types';

export function toQueueCountEvent(record: CaptureRecord): QueueCountEvent {
  return {
    capture_id: record.id,
    camera_id: record.camera_id,
    captured_at: record.captured_at.toISOString(),
    status: record.status,
    people_count: record.people_count,
    model_identifier: record.model_identifier,
    error_message: record.error_message,
  };
}

@Injectable()
export class KafkaProducerService implements OnModuleInit, OnApplicationShutdown {
  private readonly logger = new Logger(KafkaProducerService.name);
  private readonly enabled: boolean;
  private producer: Producer | null = null;
  private isConnected = false;

  constructor(private readonly configService: ConfigService) {
    this.enabled = this.configService.get<boolean>('kafka.enabled', false);
    if (!this.enabled) return;

    const broker = this.configService.get<string>('kafka.broker') || 'localhost:9092';
    const clientId = this.configService.get<string>('kafka.clientId') || 'queue-watch-worker';
    const connectionTimeout = this.configService.get<number>('kafka.connectionTimeout', 3000);
    const requestTimeout = this.configService.get<number>('kafka.requestTimeout', 30000);

    const kafka = new Kafka({
      clientId,
      brokers: broker.split(',').map((b) => b.trim()),
      connectionTimeout,
      requestTimeout,
      logLevel: logLevel.WARN,
    });

    this.producer = kafka.producer({
      allowAutoTopicCreation: true,
      retry: {
        retries: this.configService.get<number>('kafka.retry.retries', 5),
        initialRetryTime: this.configService.get<number>('kafka.retry.initialRetryTime', 100),
        multiplier: this.configService.get<number>('kafka.retry.multiplier', 2),
      },
    });
  }

  async onModuleInit() {
    if (!this.enabled) {
      this.logger.log('Kafka publishing is disabled');
      return;
    }
    // Connect in background, don't block worker startup
    this.connectWithRetry().catch((error: unknown) => {
      this.logger.warn(
        `Kafka producer will connect on first publish: ${error instanceof Error ? error.message : String(error)}`,
      );
    });
  }

  /** Last shutdown phase, after the worker loop has published its final cycle. */
  async onApplicationShutdown() {
    await this.disconnect();
  }

  private async connect(): Promise<boolean> {
    if (!this.producer) return false;
    try {
      await this.producer.connect();
      this.isConnected = true;
      this.logger.log('Kafka producer connected successfully');
      return true;
    } catch (error) {
      this.logger.error(`Failed to connect Kafka producer: ${error instanceof Error ? error.message : String(error)}`);
      this.isConnected = false;
      return false;
    }
  }

  private async connectWithRetry(): Promise<boolean> {
    const maxRetries = this.configService.get<number>('kafka.retry.retries', 5);
    const initialRetryTime = this.configService.get<number>('kafka.retry.initialRetryTime', 100);
    const multiplier = this.configService.get<number>('kafka.retry.multiplier', 2);

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      if (await this.connect()) {
        return true;
      }

      if (attempt < maxRetries - 1) {
        const retryTime = initialRetryTime * Math.pow(multiplier, attempt);
        this.logger.warn(
          `Kafka producer connection failed. Retrying in ${retryTime}ms (attempt ${attempt + 1}/${maxRetries})`,
        );
        await new Promise((resolve) => setTimeout(resolve, retryTime));
      }
    }
    return false;
  }

  private async disconnect() {
    try {
      if (this.producer && this.isConnected) {
        await this.producer.disconnect();
        this.isConnected = false;
        this.logger.log('Kafka producer disconnected');
      }
    } catch (error) {
      this.logger.error(`Error disconnecting Kafka producer: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /**
   * Publish the outcome of one capture cycle. Returns false when publishing is
   * disabled or the broker is unreachable; the record itself is already stored.
   */
  async publishQueueCount(record: CaptureRecord): Promise<boolean> {
    if (!this.producer) return false;
    if (!this.isConnected && !(await this.connect())) {
      return false;
    }

    const topic = this.configService.get<string>('kafka.topics.queueCounts') || 'queue-watch.queue-counts.v1';
    try {
      const result = await this.producer.send({
        topic,
        messages: [
          {
            key: String(record.camera_id),
            value: JSON.stringify(toQueueCountEvent(record)),
          },
        ],
      });
      this.logger.debug(`Queue count sent - Topic: ${topic}, Partition: ${result[0]?.partition}, Offset: ${result[0]?.baseOffset}`);
      return true;
    } catch (error) {
      this.logger.error(`Error publishing queue count: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }
}
