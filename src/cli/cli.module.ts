import { Module } from '@nestjs/common';
import { CameraModule, ConfigModule, DetectionModule } from '../../libs/common';
import { CaptureFrameCommand } from './capture-frame.command';
import { CountPeopleCommand } from './count-people.command';

@Module({
  imports: [ConfigModule, CameraModule, DetectionModule],
  providers: [CaptureFrameCommand, CountPeopleCommand],
})
export class CliModule {}
