import Database from 'better-sqlite3';
import { join } from 'path';
import { readFileSync } from 'fs';
import logger from '../config/logger';
import { EVENT_ONLY_SOURCES, EVENT_TYPES, SOURCE_SYSTEMS } from '../config/constants';
import { WorkflowEvent, WorkflowEventType } from '../types/event.types';
import { EventSourceSystem, Identity, LeadRecord, StoredLead } from '../types/lead.types';
import { EventFilter, IdentityStore } from './identityStore';

// Database row types
export interface LeadContextRow {
  id: string;
  ohid: string;
  source_system: string;
  source_lead_id: string | null;
  channel: string | null;
  email: string | null;
  phone: string | null;
  payload: string; // JSON string of the full LeadRecord
  consent: string | null; // JSON string
  created_at: string;
}

export interface WorkflowEventRow {
  id: string;
  ohid: string | null;
  event_type: string;
  payload: string; // JSON string
  occurred_at: string;
  source_system: string;
}

const EVENT_SOURCES: readonly EventSourceSystem[] = [...SOURCE_SYSTEMS, ...EVENT_ONLY_SOURCES];

const toEventType = (value: string): WorkflowEventType => {
  const eventType = EVENT_TYPES.find((candidate) => candidate === value);
  if (!eventType) {
    throw new Error(`Unknown event type in workflow_event: ${value}`);
  }
  return eventType;
};

const toEventSource = (value: string): EventSourceSystem => {
  const source = EVENT_SOURCES.find((candidate) => candidate === value);
  if (!source) {
    throw new Error(`Unknown source system in workflow_event: ${value}`);
  }
  return source;
};

/**
 * SqliteIdentityStore - better-sqlite3 backed identity store
 *
 * better-sqlite3 is synchronous, so each method runs to completion before any
 * other request is served; claimIdentity additionally runs inside a
 * transaction so the find and the insert commit together.
 */
export class SqliteIdentityStore implements IdentityStore {
  readonly kind = 'sqlite' as const;
  private db: Database.Database;
  private log = logger.child({ service: 'database' });

  constructor(private readonly dbPath: string) {
    this.log.info({ dbPath }, 'Initializing database');

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');

    this.initializeSchema();

    this.log.info('Database initialized successfully');
  }

  private initializeSchema(): void {
    try {
      const schemaPath = join(__dirname, '..', 'database', 'schema.sql');
      const schema = readFileSync(schemaPath, 'utf-8');

      this.db.exec(schema);

      this.log.info('Database schema initialized');
    } catch (error) {
      this.log.error({ error }, 'Failed to initialize database schema');
      throw error;
    }
  }

  // ============= LEADS =============

  async insertLead(identity: Identity, ingestId: string, lead: LeadRecord): Promise<void> {
    this.insertLeadRow(identity, ingestId, lead);
  }

  async findIdentityByContact(email?: string | null, phone?: string | null): Promise<Identity | null> {
    return this.findIdentityRow(email ?? null, phone ?? null);
  }

  async claimIdentity(ingestId: string, lead: LeadRecord, mint: () => Identity): Promise<Identity> {
    const claim = this.db.transaction((): Identity => {
      const identity =
        this.findIdentityRow(lead.person.email ?? null, lead.person.phone ?? null) ?? mint();
      this.insertLeadRow(identity, ingestId, lead);
      return identity;
    });

    return claim.immediate();
  }

  async findLatestLeadByPhone(phone: string): Promise<StoredLead | null> {
    const row = this.db
      .prepare<[string], LeadContextRow>(
        'SELECT * FROM lead_context WHERE phone = ? ORDER BY rowid DESC LIMIT 1'
      )
      .get(phone);

    return row ? this.toStoredLead(row) : null;
  }

  private findIdentityRow(email: string | null, phone: string | null): Identity | null {
    if (!email && !phone) return null;

    const row = this.db
      .prepare<{ email: string | null; phone: string | null }, Pick<LeadContextRow, 'ohid'>>(
        `
        SELECT ohid FROM lead_context
        WHERE (@email IS NOT NULL AND email = @email)
           OR (@phone IS NOT NULL AND phone = @phone)
        ORDER BY rowid ASC
        LIMIT 1
      `
      )
      .get({ email: email || null, phone: phone || null });

    return row ? row.ohid : null;
  }

  private insertLeadRow(identity: Identity, ingestId: string, lead: LeadRecord): void {
    const stmt = this.db.prepare(`
      INSERT INTO lead_context (
        id, ohid, source_system, source_lead_id, channel, email, phone, payload, consent, created_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    stmt.run(
      ingestId,
      identity,
      lead.sourceSystem,
      lead.sourceLeadId,
      lead.channel,
      lead.person.email || null,
      lead.person.phone || null,
      JSON.stringify(lead),
      JSON.stringify(lead.consent),
      new Date().toISOString()
    );

    this.log.debug({ ingestId, identity }, 'Lead record stored');
  }

  private toStoredLead(row: LeadContextRow): StoredLead {
    const lead: LeadRecord = JSON.parse(row.payload);
    return { ingestId: row.id, identity: row.ohid, lead, createdAt: row.created_at };
  }

  // ============= WORKFLOW EVENTS =============

  async insertEvent(event: WorkflowEvent): Promise<void> {
    const stmt = this.db.prepare(`
      INSERT INTO workflow_event (
        id, ohid, event_type, payload, occurred_at, source_system
      ) VALUES (?, ?, ?, ?, ?, ?)
    `);

    stmt.run(
      event.eventId,
      event.identity,
      event.eventType,
      JSON.stringify(event.payload),
      event.occurredAt,
      event.sourceSystem
    );

    this.log.debug({ eventId: event.eventId, eventType: event.eventType }, 'Workflow event stored');
  }

  async listEvents(filter: EventFilter = {}): Promise<WorkflowEvent[]> {
    const rows = this.db
      .prepare<{ identity: string | null; eventType: string | null }, WorkflowEventRow>(
        `
        SELECT * FROM workflow_event
        WHERE (@identity IS NULL OR ohid = @identity)
          AND (@eventType IS NULL OR event_type = @eventType)
        ORDER BY rowid ASC
      `
      )
      .all({ identity: filter.identity ?? null, eventType: filter.eventType ?? null });

    return rows.map((row) => {
      const payload: Record<string, unknown> = JSON.parse(row.payload);
      return {
        eventId: row.id,
        eventType: toEventType(row.event_type),
        identity: row.ohid,
        payload,
        occurredAt: row.occurred_at,
        sourceSystem: toEventSource(row.source_system),
      };
    });
  }

  close(): void {
    this.db.close();
    this.log.info({ dbPath: this.dbPath }, 'Database closed');
  }
}
