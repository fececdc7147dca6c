/**
 * Gateway Server
 *
 * One Express app hosting the voice agent webhooks, the provider webhooks
 * and the tool API. Body parsing is per router: signed webhooks need the
 * raw bytes, the tool API takes JSON.
 */

import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { AxiosInstance } from 'axios';
import { HTTP_STATUS, SERVICE_NAME } from '../config/constants';
import { GatewayConfig } from '../config/env';
import { errorHandler } from '../middleware/errorHandler';
import { requestLogger } from '../middleware/requestLogger';
import { createElevenlabsRouter } from '../routes/elevenlabs.routes';
import { createToolsRouter } from '../routes/tools.routes';
import { createWebhooksRouter } from '../routes/webhooks.routes';
import { ContactLookup } from '../types/elevenlabs.types';
import { Identity } from '../types/lead.types';
import { StoreCallOutcomeSink, StoreContactLookup, ZohoContactLookup } from '../services/contactLookup.service';
import { SqliteIdentityStore } from '../services/database.service';
import { EventNormalizer } from '../services/eventNormalizer.service';
import { EventRecorder } from '../services/eventRecorder.service';
import { IdentityResolver } from '../services/identity.service';
import { IdentityStore, InMemoryIdentityStore } from '../services/identityStore';
import { LeadIngestService } from '../services/leadIngest.service';
import { PersonalizationResolver } from '../services/personalization.service';
import { PostCallExtractor } from '../services/postCall.service';
import { WorkflowPublisher } from '../services/workflowPublisher.service';
import { ZohoTokenManager } from '../services/zohoAuth.service';
import { ZohoCrmClient, ZohoSyncService } from '../services/zohoCrm.service';

export interface GatewayDependencies {
  config: GatewayConfig;
  store: IdentityStore;
  publisher: WorkflowPublisher;
  leadIngest: LeadIngestService;
  zohoTokens: ZohoTokenManager;
  zohoSync: ZohoSyncService;
  personalization: PersonalizationResolver;
  postCall: PostCallExtractor;
}

export interface DependencyOverrides {
  store?: IdentityStore;
  mintIdentity?: () => Identity;
  publisherClient?: AxiosInstance;
  zohoAuthClient?: AxiosInstance;
  crmClient?: AxiosInstance;
}

export const createIdentityStore = (config: GatewayConfig): IdentityStore =>
  config.store.kind === 'sqlite' ? new SqliteIdentityStore(config.store.sqlitePath) : new InMemoryIdentityStore();

/**
 * Wire the services for a config. Tests pass an in-memory store and axios
 * instances with stand-in adapters.
 */
export const createGatewayDependencies = (
  config: GatewayConfig,
  overrides: DependencyOverrides = {}
): GatewayDependencies => {
  const store = overrides.store ?? createIdentityStore(config);
  const identities = new IdentityResolver(store, overrides.mintIdentity);
  const normalizer = new EventNormalizer(identities);
  const publisher = new WorkflowPublisher(config.workflowWebhookUrl, overrides.publisherClient);
  const recorder = new EventRecorder(store, publisher);

  const zohoTokens = new ZohoTokenManager(config.zoho, overrides.zohoAuthClient);
  const crm = new ZohoCrmClient(zohoTokens, config.zoho.apiBase, overrides.crmClient);

  const lookup: ContactLookup =
    config.contactLookup === 'zoho' ? new ZohoContactLookup(crm) : new StoreContactLookup(store);

  return {
    config,
    store,
    publisher,
    leadIngest: new LeadIngestService(identities, normalizer, recorder),
    zohoTokens,
    zohoSync: new ZohoSyncService(crm, identities, normalizer, recorder),
    personalization: new PersonalizationResolver(lookup, config.personalizationTimeoutMs),
    postCall: new PostCallExtractor(new StoreCallOutcomeSink(identities, normalizer, recorder)),
  };
};

export const createGatewayApp = (deps: GatewayDependencies): Express => {
  const { config } = deps;
  const app = express();

  app.set('trust proxy', true);
  app.use(helmet());
  app.use(cors());
  app.use(requestLogger(SERVICE_NAME));

  /**
   * Health check endpoint
   */
  app.get('/health', (_req: Request, res: Response) => {
    res.status(HTTP_STATUS.OK).json({
      status: 'ok',
      store: deps.store.kind,
      workflow_webhook: deps.publisher.enabled,
    });
  });

  app.use(
    '/webhooks/elevenlabs',
    createElevenlabsRouter({
      secret: config.secrets.elevenlabs,
      personalization: deps.personalization,
      postCall: deps.postCall,
    })
  );

  app.use('/webhooks', createWebhooksRouter({ config, leadIngest: deps.leadIngest }));

  app.use(
    '/api',
    createToolsRouter({
      config,
      storeKind: deps.store.kind,
      publisherEnabled: deps.publisher.enabled,
      zohoConfigured: deps.zohoTokens.isConfigured,
      leadIngest: deps.leadIngest,
      zohoSync: deps.zohoSync,
    })
  );

  app.use(errorHandler);

  return app;
};
