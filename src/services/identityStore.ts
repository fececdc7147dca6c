/**
 * Identity Store
 *
 * Contract the core needs from persistence, plus the in-memory substitute
 * used for development and tests. The SQLite implementation lives in
 * database.service.ts.
 */

import { v4 as uuidv4 } from 'uuid';
import logger from '../config/logger';
import { WorkflowEvent, WorkflowEventType } from '../types/event.types';
import { Identity, LeadRecord, StoredLead } from '../types/lead.types';

export interface EventFilter {
  identity?: Identity;
  eventType?: WorkflowEventType;
}

export interface IdentityStore {
  readonly kind: 'memory' | 'sqlite';

  insertLead(identity: Identity, ingestId: string, lead: LeadRecord): Promise<void>;

  insertEvent(event: WorkflowEvent): Promise<void>;

  /** Disjunctive match: a stored record sharing the email OR the phone */
  findIdentityByContact(email?: string | null, phone?: string | null): Promise<Identity | null>;

  /**
   * Find-or-create keyed on (email OR phone), performed as one step: the
   * lookup and the insert of the lead record cannot interleave with another
   * claim. Returns the identity the lead was stored under.
   */
  claimIdentity(ingestId: string, lead: LeadRecord, mintIdentity: () => Identity): Promise<Identity>;

  findLatestLeadByPhone(phone: string): Promise<StoredLead | null>;

  listEvents(filter?: EventFilter): Promise<WorkflowEvent[]>;
}

export const mintIdentity = (): Identity => uuidv4();

const matchesContact = (lead: LeadRecord, email?: string | null, phone?: string | null): boolean =>
  Boolean((email && lead.person.email === email) || (phone && lead.person.phone === phone));

/**
 * InMemoryIdentityStore - Map-backed store
 *
 * Every method body runs without awaiting, so claimIdentity is atomic on the
 * event loop. Not safe to share across worker threads or processes.
 */
export class InMemoryIdentityStore implements IdentityStore {
  readonly kind = 'memory' as const;
  private leads = new Map<string, StoredLead>();
  private events: WorkflowEvent[] = [];
  private log = logger.child({ service: 'identity-store', store: 'memory' });

  async insertLead(identity: Identity, ingestId: string, lead: LeadRecord): Promise<void> {
    this.insertLeadSync(identity, ingestId, lead);
  }

  async insertEvent(event: WorkflowEvent): Promise<void> {
    this.events.push(event);
    this.log.debug({ eventId: event.eventId, eventType: event.eventType }, 'Workflow event stored');
  }

  async findIdentityByContact(email?: string | null, phone?: string | null): Promise<Identity | null> {
    return this.findIdentitySync(email, phone);
  }

  async claimIdentity(ingestId: string, lead: LeadRecord, mint: () => Identity): Promise<Identity> {
    const identity = this.findIdentitySync(lead.person.email, lead.person.phone) ?? mint();
    this.insertLeadSync(identity, ingestId, lead);
    return identity;
  }

  async findLatestLeadByPhone(phone: string): Promise<StoredLead | null> {
    let latest: StoredLead | null = null;
    for (const stored of this.leads.values()) {
      if (stored.lead.person.phone === phone) {
        latest = stored;
      }
    }
    return latest;
  }

  async listEvents(filter: EventFilter = {}): Promise<WorkflowEvent[]> {
    return this.events.filter(
      (event) =>
        (filter.identity === undefined || event.identity === filter.identity) &&
        (filter.eventType === undefined || event.eventType === filter.eventType)
    );
  }

  private findIdentitySync(email?: string | null, phone?: string | null): Identity | null {
    if (!email && !phone) return null;

    for (const stored of this.leads.values()) {
      if (matchesContact(stored.lead, email, phone)) {
        return stored.identity;
      }
    }
    return null;
  }

  private insertLeadSync(identity: Identity, ingestId: string, lead: LeadRecord): void {
    this.leads.set(ingestId, { ingestId, identity, lead, createdAt: new Date().toISOString() });
    this.log.debug({ ingestId, identity }, 'Lead record stored');
  }
}
