/**
 * Personalization Resolver
 *
 * Pre-call path: turns a caller's phone number into the sixteen string
 * variables the voice agent greets the caller with. The agent times out
 * call setup after a few seconds, so the lookup runs under a deadline and
 * every failure (lookup error, timeout, malformed record) degrades to the
 * defaults. resolvePersonalization never rejects.
 */

import logger, { Logger } from '../config/logger';
import { PERSONALIZATION_LOOKUP_TIMEOUT_MS } from '../config/constants';
import { ContactLookup, CrmLeadRecord, DynamicVariables } from '../types/elevenlabs.types';
import { TimeoutError, withTimeout } from '../utils/async.util';
import { errorMessage } from '../utils/errors';
import { maskPhoneNumber } from '../utils/phoneNumber.util';

export const DEFAULT_VARIABLES: Readonly<DynamicVariables> = Object.freeze({
  first_name: 'there',
  last_name: '',
  lead_status: 'new',
  qualification_score: '0',
  property_type: 'not specified',
  source: 'phone',
  previous_contact: 'no',
  last_interaction: 'first contact',
  notes: '',
  ohid: '',
  budget_range: 'not discussed',
  investment_timeline: 'not discussed',
  preferred_location: 'Dubai',
  nationality: '',
  occupation: '',
  phone: '',
});

const NEW_LEAD_STATUSES = new Set(['new', 'New', '']);

export type PersonalizationOutcome = 'no_phone' | 'found' | 'not_found' | 'lookup_failed' | 'timed_out';

export interface PersonalizationResult {
  variables: DynamicVariables;
  outcome: PersonalizationOutcome;
}

/**
 * Read a stored value as text. Empty strings, null and non-scalar values
 * count as absent so the caller's fallback applies.
 */
const text = (value: unknown): string | undefined => {
  if (typeof value === 'string') return value !== '' ? value : undefined;
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : undefined;
  if (typeof value === 'boolean') return String(value);
  return undefined;
};

/**
 * Map a CRM-shaped lead record to the agent's variables, field by field,
 * each with its own fallback.
 */
export const mapLeadToVariables = (lead: CrmLeadRecord, phone: string): DynamicVariables => {
  const leadStatus = text(lead.Lead_Status);
  const hasPreviousContact = lead.Lead_Status !== undefined && lead.Lead_Status !== null &&
    !NEW_LEAD_STATUSES.has(leadStatus ?? '');

  return {
    first_name: text(lead.First_Name) ?? DEFAULT_VARIABLES.first_name,
    last_name: text(lead.Last_Name) ?? DEFAULT_VARIABLES.last_name,
    lead_status: leadStatus ?? DEFAULT_VARIABLES.lead_status,
    qualification_score: text(lead.qualification_score) ?? DEFAULT_VARIABLES.qualification_score,
    property_type: text(lead.Lead_Type) ?? DEFAULT_VARIABLES.property_type,
    source: text(lead.Lead_Source) ?? text(lead.Campaign) ?? DEFAULT_VARIABLES.source,
    previous_contact: hasPreviousContact ? 'yes' : 'no',
    last_interaction:
      text(lead.call_timestamp) ?? text(lead.Modified_Time) ?? DEFAULT_VARIABLES.last_interaction,
    notes: text(lead.call_summary) ?? text(lead.Description) ?? DEFAULT_VARIABLES.notes,
    ohid: text(lead.DistributionID) ?? text(lead.Record_Id) ?? DEFAULT_VARIABLES.ohid,
    budget_range: text(lead.Budget_Range) ?? DEFAULT_VARIABLES.budget_range,
    investment_timeline: text(lead.Investment_Timeline) ?? DEFAULT_VARIABLES.investment_timeline,
    preferred_location: text(lead.Preferred_Location) ?? DEFAULT_VARIABLES.preferred_location,
    nationality: text(lead.Nationality) ?? DEFAULT_VARIABLES.nationality,
    occupation: text(lead.Occupation) ?? DEFAULT_VARIABLES.occupation,
    phone,
  };
};

export class PersonalizationResolver {
  private log = logger.child({ service: 'personalization' });

  constructor(
    private readonly lookup: ContactLookup | null,
    private readonly timeoutMs: number = PERSONALIZATION_LOOKUP_TIMEOUT_MS
  ) {}

  async resolvePersonalization(callerPhone?: string | null, log: Logger = this.log): Promise<DynamicVariables> {
    const { variables } = await this.resolve(callerPhone, log);
    return variables;
  }

  async resolve(callerPhone?: string | null, log: Logger = this.log): Promise<PersonalizationResult> {
    if (!callerPhone) {
      return { variables: { ...DEFAULT_VARIABLES }, outcome: 'no_phone' };
    }

    // Set eagerly so the agent always has the number, whatever happens below
    const defaults: DynamicVariables = { ...DEFAULT_VARIABLES, phone: callerPhone };

    if (!this.lookup) {
      return { variables: defaults, outcome: 'not_found' };
    }

    const lookup = this.lookup;

    try {
      const lead = await withTimeout(
        Promise.resolve().then(() => lookup.findByPhone(callerPhone)),
        this.timeoutMs
      );

      if (!lead) {
        log.debug({ phone: maskPhoneNumber(callerPhone) }, 'No lead found for caller; defaults used');
        return { variables: defaults, outcome: 'not_found' };
      }

      const variables = mapLeadToVariables(lead, callerPhone);
      log.info(
        { phone: maskPhoneNumber(callerPhone), leadStatus: variables.lead_status, ohid: variables.ohid },
        'Lead resolved for caller'
      );
      return { variables, outcome: 'found' };
    } catch (error) {
      const timedOut = error instanceof TimeoutError;
      log.error(
        { phone: maskPhoneNumber(callerPhone), error: errorMessage(error), timedOut },
        'Lead lookup failed; defaults used'
      );
      return { variables: defaults, outcome: timedOut ? 'timed_out' : 'lookup_failed' };
    }
  }
}
