export { KafkaModule } from './kafka.module';
export { KafkaProducerService, toQueueCountEvent } from './producer.service';
export type { QueueCountEvent } from './queue-count.types';
