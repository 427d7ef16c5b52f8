export const DOMAIN_STATUSES = ['pending', 'analyzed', 'error'] as const;

export type DomainStatus = (typeof DOMAIN_STATUSES)[number];

export interface AnalysisResult {
  readonly domain: string;
  readonly status: DomainStatus;
  readonly companyName: string | null;
  readonly contactUrl: string | null;
}

/** Flat wire shape used by the API, the store file and batch reports. */
export interface SerializedAnalysisResult {
  domain: string;
  status: DomainStatus;
  company_name: string | null;
  contact_url: string | null;
}

export function serializeResult(result: AnalysisResult): SerializedAnalysisResult {
  return {
    domain: result.domain,
    status: result.status,
    company_name: result.companyName,
    contact_url: result.contactUrl,
  };
}
