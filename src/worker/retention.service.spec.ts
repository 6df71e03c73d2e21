import { Test } from '@nestjs/testing';
import { CaptureRepository } from '../../libs/common';
import { failedCapture, successfulCapture } from '../../libs/common/src/captures/testing/capture-fixtures';
import { InMemoryCaptureRepository } from '../../libs/common/src/captures/testing/in-memory-capture.repository';
import { RetentionService } from './retention.service';

const now = new Date('2026-05-01T00:00:00.000Z');
const daysAgo = (days: number) => new Date(now.getTime() - days * 24 * 60 * 60 * 1000);

describe('RetentionService', () => {
  let repository: InMemoryCaptureRepository;
  let service: RetentionService;

  beforeEach(async () => {
    repository = new InMemoryCaptureRepository();
    const moduleRef = await Test.createTestingModule({
      providers: [RetentionService, { provide: CaptureRepository, useValue: repository }],
    }).compile();
    service = moduleRef.get(RetentionService);

    await repository.insert(successfulCapture(daysAgo(40), 5));
    await repository.insert(failedCapture(daysAgo(35)));
    await repository.insert(successfulCapture(daysAgo(2), 7));
  });

  it('drops images older than the TTL and keeps the counts', async () => {
    await expect(service.prune(30, now)).resolves.toBe(1);

    const [old, failed, recent] = repository.records;
    expect(old).toMatchObject({ status: 'ok', people_count: 5, raw_image: null, annotated_image: null });
    expect(failed.status).toBe('error');
    expect(recent.raw_image?.mime_type).toBe('image/jpeg');
  });

  it('is idempotent', async () => {
    await service.prune(30, now);
    await expect(service.prune(30, now)).resolves.toBe(0);
  });

  it('prunes nothing when every record is recent', async () => {
    await expect(service.prune(60, now)).resolves.toBe(0);
  });
});
