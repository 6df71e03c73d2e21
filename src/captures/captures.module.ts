import { Module } from '@nestjs/common';
import { CapturesModule as CaptureStorageModule } from '../../libs/common';
import { CapturesController } from './captures.controller';
import { CapturesService } from './captures.service';

@Module({
  imports: [CaptureStorageModule],
  controllers: [CapturesController],
  providers: [CapturesService],
})
export class CapturesModule {}
