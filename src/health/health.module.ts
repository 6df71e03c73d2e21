import { Module } from '@nestjs/common';
import { ElasticModule } from '../../libs/common';
import { HealthController } from './health.controller';

@Module({
  imports: [ElasticModule],
  controllers: [HealthController],
})
export class HealthModule {}
