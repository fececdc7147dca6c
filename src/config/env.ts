/**
 * Environment configuration.
 *
 * Parses process.env once into a typed GatewayConfig. Secrets left unset mean
 * the matching verification step is skipped (local development).
 */

import { z } from 'zod';
import { PORTS, PERSONALIZATION_LOOKUP_TIMEOUT_MS, ZOHO } from './constants';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().positive().default(PORTS.GATEWAY),
  PUBLIC_BASE_URL: optionalString,
  IDENTITY_STORE: z.enum(['memory', 'sqlite']).default('memory'),
  SQLITE_PATH: z.string().default('lead-gateway.db'),
  MCP_API_KEY: optionalString,
  ELEVENLABS_WEBHOOK_SECRET: optionalString,
  CLOUDTALK_WEBHOOK_SECRET: optionalString,
  NOTION_WEBHOOK_SECRET: optionalString,
  CALCOM_WEBHOOK_SECRET: optionalString,
  TWILIO_AUTH_TOKEN: optionalString,
  WORKFLOW_WEBHOOK_URL: optionalString,
  N8N_WEBHOOK_URL: optionalString,
  CONTACT_LOOKUP: z.enum(['store', 'zoho']).default('store'),
  PERSONALIZATION_LOOKUP_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(PERSONALIZATION_LOOKUP_TIMEOUT_MS),
  ZOHO_API_BASE: z.string().default(ZOHO.API_BASE),
  ZOHO_TOKEN_URL: z.string().default(ZOHO.TOKEN_URL),
  ZOHO_CLIENT_ID: optionalString,
  ZOHO_CLIENT_SECRET: optionalString,
  ZOHO_REFRESH_TOKEN: optionalString,
  ZOHO_ACCESS_TOKEN: optionalString,
});

export type WebhookSource = 'elevenlabs' | 'cloudtalk' | 'notion' | 'calcom' | 'twilio';

export interface ZohoConfig {
  apiBase: string;
  tokenUrl: string;
  clientId?: string;
  clientSecret?: string;
  refreshToken?: string;
  accessToken?: string;
}

export interface GatewayConfig {
  nodeEnv: string;
  port: number;
  publicBaseUrl?: string;
  store: { kind: 'memory' | 'sqlite'; sqlitePath: string };
  apiKey?: string;
  secrets: Record<WebhookSource, string | undefined>;
  workflowWebhookUrl?: string;
  contactLookup: 'store' | 'zoho';
  personalizationTimeoutMs: number;
  zoho: ZohoConfig;
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): GatewayConfig => {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    publicBaseUrl: parsed.PUBLIC_BASE_URL,
    store: { kind: parsed.IDENTITY_STORE, sqlitePath: parsed.SQLITE_PATH },
    apiKey: parsed.MCP_API_KEY,
    secrets: {
      elevenlabs: parsed.ELEVENLABS_WEBHOOK_SECRET,
      cloudtalk: parsed.CLOUDTALK_WEBHOOK_SECRET,
      notion: parsed.NOTION_WEBHOOK_SECRET,
      calcom: parsed.CALCOM_WEBHOOK_SECRET,
      twilio: parsed.TWILIO_AUTH_TOKEN,
    },
    workflowWebhookUrl: parsed.WORKFLOW_WEBHOOK_URL ?? parsed.N8N_WEBHOOK_URL,
    contactLookup: parsed.CONTACT_LOOKUP,
    personalizationTimeoutMs: parsed.PERSONALIZATION_LOOKUP_TIMEOUT_MS,
    zoho: {
      apiBase: parsed.ZOHO_API_BASE,
      tokenUrl: parsed.ZOHO_TOKEN_URL,
      clientId: parsed.ZOHO_CLIENT_ID,
      clientSecret: parsed.ZOHO_CLIENT_SECRET,
      refreshToken: parsed.ZOHO_REFRESH_TOKEN,
      accessToken: parsed.ZOHO_ACCESS_TOKEN,
    },
  };
};
