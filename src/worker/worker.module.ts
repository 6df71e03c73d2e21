import { Module } from '@nestjs/common';
import {
  CameraModule,
  CapturesModule,
  ConfigModule,
  DetectionModule,
  KafkaModule,
} from '../../libs/common';
import { IngestionService } from './ingestion.service';
import { RetentionService } from './retention.service';
import { WorkerLoopService } from './worker-loop.service';

@Module({
  imports: [ConfigModule, CameraModule, DetectionModule, CapturesModule, KafkaModule],
  providers: [IngestionService, RetentionService, WorkerLoopService],
  exports: [WorkerLoopService],
})
export class WorkerModule {}
