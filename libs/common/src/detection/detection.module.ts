import { Module } from '@nestjs/common';
import { AnnotationService } from './annotation.service';
import { DETECTION_MODEL } from './detection-model';
import { HttpDetectionModel } from './http-detection.model';
import { PersonDetectorService } from './person-detector.service';

@Module({
  providers: [
    { provide: DETECTION_MODEL, useClass: HttpDetectionModel },
    PersonDetectorService,
    AnnotationService,
  ],
  exports: [DETECTION_MODEL, PersonDetectorService, AnnotationService],
})
export class DetectionModule {}
