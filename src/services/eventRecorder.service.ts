import logger from '../config/logger';
import { WorkflowEvent } from '../types/event.types';
import { IdentityStore } from './identityStore';
import { EventPublisher } from './workflowPublisher.service';

/**
 * Event Recorder
 *
 * Appends a normalized event to the workflow log, then offers it to the
 * publisher. A store failure propagates and nothing is published; a publish
 * failure never touches the stored event.
 */
export class EventRecorder {
  private log = logger.child({ service: 'event-recorder' });

  constructor(
    private readonly store: IdentityStore,
    private readonly publisher: EventPublisher
  ) {}

  async record(event: WorkflowEvent): Promise<WorkflowEvent> {
    await this.store.insertEvent(event);

    this.log.info(
      {
        eventId: event.eventId,
        eventType: event.eventType,
        sourceSystem: event.sourceSystem,
        identity: event.identity,
      },
      'Workflow event recorded'
    );

    await this.publisher.publish(event);
    return event;
  }
}
