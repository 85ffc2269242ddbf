import type { ObjectNotificationEvent } from '../../entities/object-notification.js';

export type IngestResult =
  | { status: 'done' }
  | { status: 'error'; message: string };

export interface TripIngestionPort {
  handle(event: ObjectNotificationEvent): Promise<IngestResult>;
}
