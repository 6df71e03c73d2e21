import { Module } from '@nestjs/common';
import { ElasticModule } from '../elastic';
import { CaptureRepository } from './capture.repository';
import { ElasticCaptureRepository } from './elastic-capture.repository';

@Module({
  imports: [ElasticModule],
  providers: [{ provide: CaptureRepository, useClass: ElasticCaptureRepository }],
  exports: [CaptureRepository],
})
export class CapturesModule {}
