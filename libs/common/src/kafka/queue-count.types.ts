/**
 * Message published for every persisted capture cycle.
 */
export interface QueueCountEvent {
  capture_id: string;
  camera_id: number;
  captured_at: string;
  status: 'ok' | 'error';
  people_count: number | null;
  model_identifier: string;
  error_message: string | null;
}
