/**
 * Zoho CRM Service
 *
 * REST client for the CRM's Leads module, and the sync operations built on
 * it. Every sync is recorded as a CrmSyncCompleted or CrmSyncFailed event.
 */

import axios, { AxiosInstance } from 'axios';
import logger from '../config/logger';
import { SyncLeadResult, UpsertZohoLeadRequest, ZohoDataResponse, ZohoLead, ZohoUpsertResult } from '../types/zoho.types';
import { errorMessage } from '../utils/errors';
import { maskPhoneNumber } from '../utils/phoneNumber.util';
import { SyncLeadArgs } from '../validation/toolArgs.schema';
import { EventNormalizer } from './eventNormalizer.service';
import { EventRecorder } from './eventRecorder.service';
import { IdentityResolver } from './identity.service';
import { ZohoTokenManager } from './zohoAuth.service';

const firstRecord = <T>(body: ZohoDataResponse<T> | undefined): T | null =>
  body?.data && body.data.length > 0 ? body.data[0] : null;

const stringField = (lead: ZohoLead, field: string): string | null => {
  const value = lead[field];
  return typeof value === 'string' && value !== '' ? value : null;
};

export class ZohoCrmClient {
  private client: AxiosInstance;
  private log = logger.child({ service: 'zoho-crm' });

  constructor(
    private readonly tokens: ZohoTokenManager,
    apiBase: string,
    client?: AxiosInstance
  ) {
    this.client =
      client ??
      axios.create({
        baseURL: apiBase,
        headers: { 'Content-Type': 'application/json' },
        timeout: 15000,
      });

    // Non-2xx answers are read as "not found / not written", not thrown
    this.client.defaults.validateStatus = () => true;

    this.client.interceptors.request.use((config) => {
      this.log.debug({ url: config.url, method: config.method }, 'Zoho API request');
      return config;
    });
  }

  get isConfigured(): boolean {
    return this.tokens.isConfigured;
  }

  async getLead(leadId: string): Promise<ZohoLead | null> {
    const headers = await this.authHeaders();
    if (!headers) return null;

    const response = await this.client.get<ZohoDataResponse<ZohoLead>>(
      `/Leads/${encodeURIComponent(leadId)}`,
      { headers }
    );

    if (response.status !== 200) {
      this.log.debug({ leadId, status: response.status }, 'Zoho lead not returned');
      return null;
    }
    return firstRecord(response.data);
  }

  /** Create or update, deduplicated on Email */
  async upsertLead(leadData: ZohoLead): Promise<ZohoUpsertResult | null> {
    const headers = await this.authHeaders();
    if (!headers) return null;

    const response = await this.client.post<ZohoDataResponse<ZohoUpsertResult>>(
      '/Leads/upsert',
      { data: [leadData], duplicate_check_fields: ['Email'] },
      { headers }
    );

    if (response.status !== 200 && response.status !== 201) {
      this.log.warn({ status: response.status }, 'Zoho upsert rejected');
      return null;
    }
    return firstRecord(response.data);
  }

  async searchLeadByPhone(phone: string): Promise<ZohoLead | null> {
    const headers = await this.authHeaders();
    if (!headers) return null;

    const response = await this.client.get<ZohoDataResponse<ZohoLead>>('/Leads/search', {
      headers,
      params: { phone },
    });

    // 204 means no match
    if (response.status !== 200) {
      this.log.debug({ phone: maskPhoneNumber(phone), status: response.status }, 'No Zoho lead for phone');
      return null;
    }
    return firstRecord(response.data);
  }

  private async authHeaders(): Promise<Record<string, string> | null> {
    const token = await this.tokens.getAccessToken();
    if (!token) {
      this.log.warn('No Zoho access token available');
      return null;
    }
    return { Authorization: `Zoho-oauthtoken ${token}` };
  }
}

export type GetZohoLeadResult = { found: true; lead: ZohoLead } | { found: false; error: string };

export type UpsertZohoLeadResult =
  | { success: true; zoho_lead_id: string; action: string; source_attribution: string | null }
  | { success: false; error: string };

export class ZohoSyncService {
  private log = logger.child({ service: 'zoho-sync' });

  constructor(
    private readonly crm: ZohoCrmClient,
    private readonly identities: IdentityResolver,
    private readonly normalizer: EventNormalizer,
    private readonly recorder: EventRecorder
  ) {}

  /**
   * inbound: fetch the CRM lead; outbound: push the property DB lead id to the
   * CRM; bidirectional: both. Status is success when every attempted leg
   * succeeded, partial when one did, failed otherwise.
   */
  async syncLead(args: SyncLeadArgs): Promise<SyncLeadResult> {
    const startedAt = Date.now();
    const direction = args.sync_direction;
    const errors: string[] = [];
    let inboundOk: boolean | null = null;
    let outboundOk: boolean | null = null;
    let fetched: ZohoLead | null = null;
    let status: SyncLeadResult['status'];

    try {
      if (direction === 'inbound' || direction === 'bidirectional') {
        fetched = await this.crm.getLead(args.zoho_lead_id);
        inboundOk = fetched !== null;
        if (!fetched) errors.push(`Zoho lead ${args.zoho_lead_id} not found`);
      }

      if (direction === 'outbound' || direction === 'bidirectional') {
        const leadData: ZohoLead = {
          Last_Name: 'Synced Lead',
          Lead_Source: args.source || 'property_db',
        };
        if (args.property_db_lead_id) {
          leadData.External_ID__c = args.property_db_lead_id;
        }

        const upserted = await this.crm.upsertLead(leadData);
        outboundOk = upserted !== null;
        if (!upserted) errors.push('Zoho upsert failed');
      }

      if (inboundOk === false || outboundOk === false) {
        status = inboundOk || outboundOk ? 'partial' : 'failed';
      } else {
        status = 'success';
      }
    } catch (error) {
      status = 'failed';
      errors.push(errorMessage(error));
      this.log.error({ zohoLeadId: args.zoho_lead_id, error: errorMessage(error) }, 'Zoho sync failed');
    }

    const result: Omit<SyncLeadResult, 'event_id'> = {
      zoho_lead_id: args.zoho_lead_id,
      property_db_lead_id: args.property_db_lead_id ?? '',
      sync_direction: direction,
      source: args.source ?? null,
      status,
      inbound_success: inboundOk,
      outbound_success: outboundOk,
      error_message: errors.length > 0 ? errors.join(' | ') : null,
      execution_time_ms: Date.now() - startedAt,
    };

    const identity = fetched
      ? await this.identities.lookup(stringField(fetched, 'Email'), stringField(fetched, 'Phone'))
      : null;
    const event = await this.recorder.record(this.normalizer.crmSync(result, identity));

    this.log.info({ zohoLeadId: args.zoho_lead_id, direction, status, eventType: event.eventType }, 'Zoho sync recorded');

    return { ...result, event_id: event.eventId };
  }

  async getZohoLead(leadId: string): Promise<GetZohoLeadResult> {
    const lead = await this.crm.getLead(leadId);

    if (lead) {
      return { found: true, lead };
    }
    return { found: false, error: `Lead ${leadId} not found in Zoho CRM` };
  }

  async upsertZohoLead(request: UpsertZohoLeadRequest): Promise<UpsertZohoLeadResult> {
    const leadData: ZohoLead = { Last_Name: request.lastName };
    if (request.email) leadData.Email = request.email;
    if (request.phone) leadData.Phone = request.phone;
    if (request.firstName) leadData.First_Name = request.firstName;
    if (request.company) leadData.Company = request.company;
    if (request.leadSource) leadData.Lead_Source = request.leadSource;
    if (request.sourceAttribution) leadData.Description = `Source: ${request.sourceAttribution}`;

    const result = await this.crm.upsertLead(leadData);

    if (!result) {
      return { success: false, error: 'Zoho CRM upsert failed' };
    }

    const zohoLeadId = result.details?.id ?? 'unknown';
    const action = result.action ?? 'unknown';
    this.log.info({ zohoLeadId, action }, 'Zoho lead upserted');

    return {
      success: true,
      zoho_lead_id: zohoLeadId,
      action,
      source_attribution: request.sourceAttribution ?? null,
    };
  }
}
