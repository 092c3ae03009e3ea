/**
 * Case-management REST client
 *
 * Features:
 * - Form-encoded authentication, auth values replayed on every call
 * - Request timeout
 * - Structured logging (no secrets)
 * - Responses validated with zod
 */

import { z } from 'zod';
import pino from 'pino';
import { RemoteServiceError, ValidationError, errorMessage } from '@caselens/core';
import type { CmsSettings } from '@caselens/config';
import type {
  CaseManagementClient,
  CaseSummary,
  CmsCharge,
  CmsClientConfig,
  CmsDefendant,
  CmsDocument,
  CmsOffence,
  DefendantOptions,
} from './types.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

const str = z.string().nullish().transform((value) => value ?? null);
const num = z.coerce.number().nullish().transform((value) => value ?? null);
const bool = z.boolean().nullish().transform((value) => value ?? null);

const AuthResponseSchema = z
  .object({
    Token: z.string().optional(),
  })
  .passthrough();

const CaseIdentifiersSchema = z.array(z.object({ id: num }).passthrough());

const SummarySchema = z
  .object({
    urn: str,
    finalised: bool,
    areaId: num,
    areaName: str,
    unitId: num,
    unitName: str,
    registrationDate: str,
  })
  .passthrough();

const ChargeSchema = z
  .object({
    id: num,
    code: str,
    description: str,
    latestVerdict: str,
  })
  .passthrough();

const OffenceSchema = z
  .object({
    id: num,
    code: str,
    type: str,
    description: str,
    active: bool,
  })
  .passthrough();

const DefendantSchema = z
  .object({
    id: num,
    dob: str,
    personalDetail: z
      .object({ gender: str, ethnicity: str })
      .passthrough()
      .nullish(),
    charges: z.array(ChargeSchema).nullish(),
    proposedCharges: z.array(ChargeSchema).nullish(),
    offences: z.array(OffenceSchema).nullish(),
  })
  .passthrough();

const DocumentSchema = z
  .object({
    id: z.coerce.number(),
    versionId: z.coerce.number(),
    originalFileName: str,
    cmsDocCategory: str,
    type: str,
    mimeType: str,
    fileExtension: str,
  })
  .passthrough();

function toCharge(charge: z.infer<typeof ChargeSchema>): CmsCharge {
  return { id: charge.id, code: charge.code, description: charge.description, latestVerdict: charge.latestVerdict };
}

function toOffence(offence: z.infer<typeof OffenceSchema>): CmsOffence {
  return {
    id: offence.id,
    code: offence.code,
    type: offence.type,
    description: offence.description,
    active: offence.active,
  };
}

/**
 * Create a case-management API client
 */
export function createCmsClient(config: CmsClientConfig): CaseManagementClient {
  const { functionKey, username, password, timeoutMs = 30000, fetchFn = fetch } = config;

  if (!config.baseUrl) {
    throw new ValidationError('CMS endpoint is required');
  }
  const baseUrl = config.baseUrl.replace(/\/+$/, '');

  logger.info(
    {
      event: 'cms.client.init',
      baseUrl,
      functionKeyLength: functionKey.length,
      usernameLength: username.length,
      passwordLength: password.length,
    },
    'CMS client configured'
  );

  let authValues: string | null = null;

  function authHeaders(): Record<string, string> {
    if (!authValues) {
      throw new ValidationError('Not authenticated. Call authenticate() first.');
    }
    return {
      'Cms-Auth-Values': authValues,
      'x-functions-key': functionKey,
      'Content-Type': 'application/json',
    };
  }

  /**
   * Make HTTP request with timeout; throws RemoteServiceError on non-2xx
   */
  async function request(method: 'GET' | 'POST', path: string, init: { headers: Record<string, string>; body?: string }): Promise<Response> {
    const startTime = Date.now();
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    logger.debug({ event: 'cms.request.start', method, path }, 'CMS request');

    try {
      const response = await fetchFn(`${baseUrl}${path}`, {
        method,
        headers: init.headers,
        body: init.body,
        signal: controller.signal,
      });

      if (!response.ok) {
        const responseText = await response.text().catch(() => '');
        logger.warn(
          { event: 'cms.request.fail', method, path, status: response.status, durationMs: Date.now() - startTime },
          'CMS request failed'
        );
        throw new RemoteServiceError(
          'cms',
          `CMS API error: ${response.status} ${response.statusText}`,
          response.status,
          responseText.substring(0, 500)
        );
      }

      logger.debug(
        { event: 'cms.request.success', method, path, status: response.status, durationMs: Date.now() - startTime },
        'CMS request succeeded'
      );
      return response;
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new RemoteServiceError('cms', `CMS API request timeout (${timeoutMs}ms)`, 408);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async function getJson(path: string): Promise<unknown> {
    const response = await request('GET', path, { headers: authHeaders() });
    return response.json();
  }

  return {
    async authenticate(): Promise<boolean> {
      try {
        const response = await request('POST', '/authenticate', {
          headers: {
            'x-functions-key': functionKey,
            'Content-Type': 'application/x-www-form-urlencoded',
            Accept: 'application/json',
          },
          body: new URLSearchParams({ username, password }).toString(),
        });
        const authData = AuthResponseSchema.parse(await response.json());
        authValues = JSON.stringify(authData);
        logger.info({ event: 'cms.auth.success', hasToken: !!authData.Token }, 'Authentication successful');
        return true;
      } catch (error) {
        authValues = null;
        logger.error({ event: 'cms.auth.fail', error: errorMessage(error) }, 'Authentication failed');
        return false;
      }
    },

    async resolveReference(urn: string): Promise<number | null> {
      try {
        const identifiers = CaseIdentifiersSchema.parse(await getJson(`/urns/${encodeURIComponent(urn)}/case-identifiers`));
        const caseId = identifiers[0]?.id ?? null;
        if (caseId === null) {
          logger.warn({ event: 'cms.urn.not_found', urn }, 'No case ID found in response');
        }
        return caseId;
      } catch (error) {
        if (error instanceof ValidationError) throw error;
        logger.warn({ event: 'cms.urn.fail', urn, error: errorMessage(error) }, 'Failed to get case ID');
        return null;
      }
    },

    async getSummary(caseId: number): Promise<CaseSummary | null> {
      try {
        const summary = SummarySchema.parse(await getJson(`/cases/${caseId}/summary`));
        return {
          urn: summary.urn,
          finalised: summary.finalised,
          areaId: summary.areaId,
          areaName: summary.areaName,
          unitId: summary.unitId,
          unitName: summary.unitName,
          registrationDate: summary.registrationDate,
        };
      } catch (error) {
        if (error instanceof ValidationError) throw error;
        logger.warn({ event: 'cms.summary.fail', caseId, error: errorMessage(error) }, 'Failed to get case summary');
        return null;
      }
    },

    async getDefendants(caseId: number, options: DefendantOptions = {}): Promise<CmsDefendant[]> {
      const { includeCharges = true, includeOffences = false } = options;
      try {
        const defendants = z.array(DefendantSchema).parse(await getJson(`/cases/${caseId}/defendants`));
        return defendants.map((defendant) => {
          const charges = defendant.charges && defendant.charges.length > 0 ? defendant.charges : defendant.proposedCharges ?? [];
          return {
            id: defendant.id,
            caseId,
            dob: defendant.dob,
            gender: defendant.personalDetail?.gender ?? null,
            ethnicity: defendant.personalDetail?.ethnicity ?? null,
            charges: includeCharges ? charges.map(toCharge) : [],
            offences: includeOffences ? (defendant.offences ?? []).map(toOffence) : [],
          };
        });
      } catch (error) {
        if (error instanceof ValidationError) throw error;
        logger.warn({ event: 'cms.defendants.fail', caseId, error: errorMessage(error) }, 'Failed to get defendants');
        return [];
      }
    },

    async listDocuments(caseId: number): Promise<CmsDocument[]> {
      try {
        const documents = z.array(DocumentSchema).parse(await getJson(`/cases/${caseId}/documents/cwa`));
        logger.info({ event: 'cms.documents.listed', caseId, count: documents.length }, `Found ${documents.length} documents`);
        return documents.map((document) => ({
          id: document.id,
          versionId: document.versionId,
          originalFileName: document.originalFileName,
          cmsDocCategory: document.cmsDocCategory,
          type: document.type,
          mimeType: document.mimeType,
          fileExtension: document.fileExtension,
        }));
      } catch (error) {
        if (error instanceof ValidationError) throw error;
        logger.error({ event: 'cms.documents.fail', caseId, error: errorMessage(error) }, 'Failed to list documents');
        return [];
      }
    },

    async download(caseId: number, documentId: number, versionId: number): Promise<Buffer> {
      const response = await request('GET', `/cases/${caseId}/documents/${documentId}/versions/${versionId}`, {
        headers: authHeaders(),
      });
      return Buffer.from(await response.arrayBuffer());
    },
  };
}

/**
 * Build a client from CMS settings
 */
export function createCmsClientFromSettings(settings: CmsSettings): CaseManagementClient {
  const missing = (['endpoint', 'functionKey', 'username', 'password'] as const).filter((key) => !settings[key]);
  if (missing.length > 0) {
    throw new ValidationError(`CMS settings missing: ${missing.join(', ')}`);
  }
  return createCmsClient({
    baseUrl: settings.endpoint ?? '',
    functionKey: settings.functionKey ?? '',
    username: settings.username ?? '',
    password: settings.password ?? '',
    timeoutMs: settings.timeoutMs,
  });
}
