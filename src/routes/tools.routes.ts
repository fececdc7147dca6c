/**
 * Tool API
 *
 * POST /api/tools/:toolName - invoke a tool with JSON arguments
 * GET  /api/tools           - list available tools
 * GET  /api/status          - pipeline configuration
 *
 * Used by the workflow runner; guarded by the bearer API key when one is set.
 */

import express, { NextFunction, Request, Response, Router } from 'express';
import { CHANNELS, ERROR_MESSAGES, HTTP_STATUS, SERVICE_NAME, SERVICE_VERSION, SOURCE_SYSTEMS } from '../config/constants';
import { GatewayConfig } from '../config/env';
import { apiKeyAuth } from '../middleware/apiKeyAuth';
import { LeadIngestService } from '../services/leadIngest.service';
import { verifyWebhookSignature } from '../services/signature.service';
import { ZohoSyncService } from '../services/zohoCrm.service';
import { NotFoundError } from '../utils/errors';
import { parseArgs } from '../validation/parse';
import {
  calcomEventSchema,
  cloudtalkEventSchema,
  elevenlabsEventSchema,
  getZohoLeadSchema,
  ingestLeadSchema,
  lookupOhidSchema,
  notionEventSchema,
  syncLeadSchema,
  twilioEventSchema,
  upsertZohoLeadSchema,
  verifySignatureSchema,
} from '../validation/toolArgs.schema';

export interface ToolsRouterOptions {
  config: GatewayConfig;
  storeKind: string;
  publisherEnabled: boolean;
  zohoConfigured: boolean;
  leadIngest: LeadIngestService;
  zohoSync: ZohoSyncService;
}

interface ToolDefinition {
  description: string;
  handler: (args: unknown) => Promise<unknown> | unknown;
}

export const createToolsRouter = (options: ToolsRouterOptions): Router => {
  const { config, leadIngest, zohoSync } = options;
  const router = express.Router();

  const tools: Record<string, ToolDefinition> = {
    ingest_lead: {
      description: 'Ingest a lead, resolving or minting its OHID, and publish LeadIngested',
      handler: (args) => leadIngest.ingestLead(parseArgs(ingestLeadSchema, args)),
    },
    process_twilio_event: {
      description: 'Record a Twilio call status event',
      handler: (args) => leadIngest.processTwilioEvent(parseArgs(twilioEventSchema, args)),
    },
    process_cloudtalk_event: {
      description: 'Record a CloudTalk telephony event',
      handler: (args) => leadIngest.processCloudtalkEvent(parseArgs(cloudtalkEventSchema, args)),
    },
    process_calcom_event: {
      description: 'Record a Cal.com booking event, attached to the attendee identity',
      handler: (args) => leadIngest.processCalcomEvent(parseArgs(calcomEventSchema, args)),
    },
    process_elevenlabs_event: {
      description: 'Record a voice agent event',
      handler: (args) => leadIngest.processElevenlabsEvent(parseArgs(elevenlabsEventSchema, args)),
    },
    process_notion_event: {
      description: 'Record a Notion event, or echo a verification challenge',
      handler: (args) => leadIngest.processNotionEvent(parseArgs(notionEventSchema, args).payload),
    },
    lookup_ohid: {
      description: 'Find the OHID for an email or phone',
      handler: (args) => leadIngest.lookupOhid(parseArgs(lookupOhidSchema, args)),
    },
    verify_webhook_signature: {
      description: 'Check a CloudTalk, Notion or Twilio HMAC signature over a hex-encoded body',
      handler: (args) => {
        const { body_hex: bodyHex, signature, source } = parseArgs(verifySignatureSchema, args);
        return verifyWebhookSignature(bodyHex, signature, source, {
          cloudtalk: config.secrets.cloudtalk,
          notion: config.secrets.notion,
          twilio: config.secrets.twilio,
        });
      },
    },
    sync_lead: {
      description: 'Sync a lead between Zoho CRM and the property database',
      handler: (args) => zohoSync.syncLead(parseArgs(syncLeadSchema, args)),
    },
    get_zoho_lead: {
      description: 'Fetch a lead from Zoho CRM by id',
      handler: (args) => zohoSync.getZohoLead(parseArgs(getZohoLeadSchema, args).lead_id),
    },
    upsert_zoho_lead: {
      description: 'Create or update a Zoho CRM lead, deduplicated on email',
      handler: (args) => {
        const parsed = parseArgs(upsertZohoLeadSchema, args);
        return zohoSync.upsertZohoLead({
          lastName: parsed.last_name,
          email: parsed.email ?? undefined,
          phone: parsed.phone ?? undefined,
          firstName: parsed.first_name ?? undefined,
          company: parsed.company ?? undefined,
          leadSource: parsed.lead_source ?? undefined,
          sourceAttribution: parsed.source_attribution ?? undefined,
        });
      },
    },
  };

  router.use(apiKeyAuth(config.apiKey));
  router.use(express.json({ limit: '2mb' }));

  router.get('/tools', (_req: Request, res: Response) => {
    res.status(HTTP_STATUS.OK).json({
      tools: Object.entries(tools).map(([name, tool]) => ({ name, description: tool.description })),
    });
  });

  router.get('/status', (_req: Request, res: Response) => {
    res.status(HTTP_STATUS.OK).json({
      server: SERVICE_NAME,
      version: SERVICE_VERSION,
      sources: SOURCE_SYSTEMS,
      channels: CHANNELS,
      store: options.storeKind,
      workflow_webhook: options.publisherEnabled,
      contact_lookup: config.contactLookup,
      zoho_configured: options.zohoConfigured,
    });
  });

  router.post('/tools/:toolName', async (req: Request, res: Response, next: NextFunction) => {
    const { toolName } = req.params;
    const log = res.locals.requestLogger.child({ tool: toolName });

    try {
      if (!Object.prototype.hasOwnProperty.call(tools, toolName)) {
        throw new NotFoundError(`${ERROR_MESSAGES.UNKNOWN_TOOL}: ${toolName}`);
      }

      const tool = tools[toolName];
      const startedAt = Date.now();
      const result = await tool.handler(req.body ?? {});

      log.info({ elapsedMs: Date.now() - startedAt }, 'Tool call completed');
      res.status(HTTP_STATUS.OK).json(result);
    } catch (error) {
      next(error);
    }
  });

  return router;
};
