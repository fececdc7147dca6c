/**
 * Workflow Publisher
 *
 * Forwards recorded events to the workflow-automation bus (an n8n or
 * Temporal webhook). Delivery is best-effort: no retries, and a failure is
 * logged and dropped. Events are already persisted before publish is called.
 */

import axios, { AxiosInstance } from 'axios';
import logger from '../config/logger';
import { WorkflowEvent } from '../types/event.types';
import { errorMessage } from '../utils/errors';

export interface EventPublisher {
  readonly enabled: boolean;
  publish(event: WorkflowEvent): Promise<void>;
}

export class WorkflowPublisher implements EventPublisher {
  private client: AxiosInstance;
  private log = logger.child({ service: 'workflow-publisher' });

  constructor(
    private readonly webhookUrl?: string,
    client?: AxiosInstance
  ) {
    this.client =
      client ??
      axios.create({
        headers: { 'Content-Type': 'application/json' },
        timeout: 10000,
      });

    this.client.interceptors.request.use((config) => {
      this.log.debug({ url: config.url, method: config.method }, 'Workflow webhook request');
      return config;
    });
  }

  get enabled(): boolean {
    return Boolean(this.webhookUrl);
  }

  async publish(event: WorkflowEvent): Promise<void> {
    if (!this.webhookUrl) {
      return;
    }

    try {
      const response = await this.client.post(this.webhookUrl, {
        ...event.payload,
        event_type: event.eventType,
      });

      this.log.debug({ eventId: event.eventId, status: response.status }, 'Workflow event published');
    } catch (error) {
      this.log.warn(
        { eventId: event.eventId, eventType: event.eventType, error: errorMessage(error) },
        'Workflow publish failed; event remains persisted'
      );
    }
  }
}
