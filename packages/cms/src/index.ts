/**
 * Case-management system client
 */

export { createCmsClient, createCmsClientFromSettings } from './client.js';
export type {
  CaseManagementClient,
  CaseSummary,
  CmsCharge,
  CmsClientConfig,
  CmsDefendant,
  CmsDocument,
  CmsOffence,
  DefendantOptions,
} from './types.js';
