import { Injectable, Logger, OnApplicationShutdown, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { performance } from 'perf_hooks';
import { setTimeout as sleep } from 'timers/promises';
import { KafkaProducerService, describeError } from '../../libs/common';
import { IngestionService } from './ingestion.service';
import { RetentionService } from './retention.service';

const HOUR_MS = 60 * 60 * 1000;

/**
 * Single-task scheduler: one cycle at a time, then sleep for whatever is left
 * of the interval. Slow cycles stretch the cadence instead of overlapping.
 * Shutdown waits for the running cycle, so its record is stored and its
 * temporary files are removed before the other providers are torn down.
 */
@Injectable()
export class WorkerLoopService implements OnModuleDestroy, OnApplicationShutdown {
  private readonly logger = new Logger(WorkerLoopService.name);
  private readonly stopController = new AbortController();
  private lastRetentionAt: number | null = null;
  private currentCycle: Promise<void> | null = null;

  constructor(
    private readonly configService: ConfigService,
    private readonly ingestionService: IngestionService,
    private readonly retentionService: RetentionService,
    private readonly kafkaProducerService: KafkaProducerService,
  ) {}

  async run(): Promise<void> {
    const intervalMs = this.configService.get<number>('worker.captureIntervalSeconds', 60) * 1000;
    this.logger.log(`Starting worker with interval=${intervalMs / 1000}s`);

    while (!this.stopController.signal.aborted) {
      const startedAt = performance.now();
      this.currentCycle = this.tick();
      await this.currentCycle;
      this.currentCycle = null;
      const remaining = Math.max(0, intervalMs - (performance.now() - startedAt));
      await this.pause(remaining);
    }
    this.logger.log('Worker loop stopped');
  }

  /** One loop iteration. Never throws. */
  async tick(now: number = Date.now()): Promise<void> {
    try {
      const capture = await this.ingestionService.runCycle();
      if (capture.status === 'ok') {
        this.logger.log(
          `Capture id=${capture.id} count=${capture.people_count} captured_at=${capture.captured_at.toISOString()}`,
        );
      } else {
        this.logger.warn(`Capture id=${capture.id} failed: ${capture.error_message}`);
      }
      await this.kafkaProducerService.publishQueueCount(capture);

      if (this.isRetentionDue(now)) {
        await this.retentionService.prune(this.configService.get<number>('retention.imageTtlDays', 30));
        this.lastRetentionAt = now;
      }
    } catch (error) {
      this.logger.error(
        `Worker iteration failed: ${describeError(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
    }
  }

  stop() {
    this.stopController.abort();
  }

  /** First shutdown phase; the Kafka producer only disconnects in the last one. */
  async onModuleDestroy() {
    this.stop();
    if (this.currentCycle) {
      this.logger.log('Stopping after the current cycle');
      await this.currentCycle;
    }
  }

  onApplicationShutdown(signal?: string) {
    if (signal) this.logger.log(`Worker stopped on ${signal}`);
    this.stop();
  }

  private isRetentionDue(now: number): boolean {
    if (this.lastRetentionAt === null) return true;
    const intervalMs = this.configService.get<number>('worker.retentionIntervalHours', 24) * HOUR_MS;
    return now - this.lastRetentionAt >= intervalMs;
  }

  private async pause(ms: number) {
    try {
      await sleep(ms, undefined, { signal: this.stopController.signal });
    } catch (error) {
      // an aborted sleep rejects with an AbortError that may come from another realm
      if (!this.stopController.signal.aborted) throw error;
    }
  }
}
