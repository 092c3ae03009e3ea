/**
 * Case-management API shapes, as returned to callers
 */

export interface CmsClientConfig {
  baseUrl: string;
  functionKey: string;
  username: string;
  password: string;
  timeoutMs?: number;
  fetchFn?: typeof fetch;
}

export interface CaseSummary {
  urn: string | null;
  finalised: boolean | null;
  areaId: number | null;
  areaName: string | null;
  unitId: number | null;
  unitName: string | null;
  registrationDate: string | null;
}

export interface CmsCharge {
  id: number | null;
  code: string | null;
  description: string | null;
  latestVerdict: string | null;
}

export interface CmsOffence {
  id: number | null;
  code: string | null;
  type: string | null;
  description: string | null;
  active: boolean | null;
}

export interface CmsDefendant {
  id: number | null;
  caseId: number;
  dob: string | null;
  gender: string | null;
  ethnicity: string | null;
  charges: CmsCharge[];
  offences: CmsOffence[];
}

export interface CmsDocument {
  id: number;
  versionId: number;
  originalFileName: string | null;
  cmsDocCategory: string | null;
  type: string | null;
  mimeType: string | null;
  fileExtension: string | null;
}

export interface DefendantOptions {
  includeCharges?: boolean;
  includeOffences?: boolean;
}

export interface CaseManagementClient {
  /** Exchange credentials for auth values; false on any failure */
  authenticate(): Promise<boolean>;
  /** Internal case id for an external reference; null when unknown */
  resolveReference(urn: string): Promise<number | null>;
  getSummary(caseId: number): Promise<CaseSummary | null>;
  getDefendants(caseId: number, options?: DefendantOptions): Promise<CmsDefendant[]>;
  listDocuments(caseId: number): Promise<CmsDocument[]>;
  download(caseId: number, documentId: number, versionId: number): Promise<Buffer>;
}
