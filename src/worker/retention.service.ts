import { Injectable, Logger } from '@nestjs/common';
import { CaptureRepository } from '../../libs/common';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Drops image payloads of old captures. Counts and statuses stay queryable.
 */
@Injectable()
export class RetentionService {
  private readonly logger = new Logger(RetentionService.name);

  constructor(private readonly captureRepository: CaptureRepository) {}

  async prune(maxAgeDays: number, now: Date = new Date()): Promise<number> {
    const cutoff = new Date(now.getTime() - maxAgeDays * DAY_MS);
    const affected = await this.captureRepository.pruneImages(cutoff);
    this.logger.log(`Retention cleanup done; pruned rows=${affected} (captured before ${cutoff.toISOString()})`);
    return affected;
  }
}
