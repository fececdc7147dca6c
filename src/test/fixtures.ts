import { LeadRecord } from '../types/lead.types';
import { IngestLeadArgs } from '../validation/toolArgs.schema';

/** Sequential identity minter, so tests can assert exact identities */
export const sequentialMint = (prefix = 'ohid'): (() => string) => {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${next}`;
  };
};

export const makeLead = (person: Partial<LeadRecord['person']> = {}, overrides: Partial<LeadRecord> = {}): LeadRecord => ({
  sourceSystem: 'WEB',
  sourceLeadId: 'web-1',
  channel: 'WEB_FORM',
  person: { firstName: 'Layla', lastName: 'Haddad', ...person },
  consent: { marketing: true, timestamp: '2026-01-01T00:00:00.000Z' },
  rawPayload: {},
  timestamp: '2026-01-01T00:00:00.000Z',
  ...overrides,
});

export const ingestArgs = (overrides: Partial<IngestLeadArgs> = {}): IngestLeadArgs => ({
  source_system: 'WEB',
  source_lead_id: 'web-1',
  channel: 'WEB_FORM',
  first_name: 'Layla',
  last_name: 'Haddad',
  marketing_consent: true,
  ...overrides,
});
