import { Buffer } from 'node:buffer';
import type { Dispatcher } from 'undici';
import { httpGetJson, HttpBodyError, HttpStatusError } from './http.js';
import { logger as rootLogger, type Logger } from './logger.js';
import { unlimited, type RequestScheduler } from './chRateLimiter.js';
import { assertCompanyNumber } from './companyNumber.js';
import { parseCompanyProfile, parsePscPage, parseShareCapital, PayloadShapeError, type PscPage } from './chParsers.js';
import { AuthError, NotFoundError, RegistryError, TransportError } from './errors.js';
import type { CompanyProfile, ControllingParty, ShareCapitalItem } from './types.js';

export const DEFAULT_CH_BASE = 'https://api.company-information.service.gov.uk';
const PSC_PAGE_SIZE = 100;
const MAX_PSC_PAGES = 20;

/** Read-only view of the registry the ownership resolver depends on. */
export interface RegistryClient {
  fetchProfile(companyNumber: string): Promise<CompanyProfile>;
  fetchControllingParties(companyNumber: string): Promise<ControllingParty[]>;
  /** Resolves to null when the registry holds no capital record for the company. */
  fetchShareCapital(companyNumber: string): Promise<ShareCapitalItem[] | null>;
}

export type CompaniesHouseClientOptions = {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  dispatcher?: Dispatcher;
  schedule?: RequestScheduler;
  logger?: Logger;
  /** Upper bound on PSC pages fetched per company; the rest of the register is dropped with a warning. */
  maxPscPages?: number;
};

export function basicAuthHeader(apiKey: string): string {
  return `Basic ${Buffer.from(`${apiKey}:`).toString('base64')}`;
}

function buildUrl(base: string, endpoint: string): string {
  const path = endpoint.startsWith('/') ? endpoint : `/${endpoint}`;
  return `${base.replace(/\/$/, '')}${path}`;
}

export function toRegistryError(err: unknown, companyNumber: string, resource: string): RegistryError {
  if (err instanceof RegistryError) return err;
  if (err instanceof HttpStatusError) {
    if (err.status === 401 || err.status === 403) {
      return new AuthError(`Companies House rejected the API key (HTTP ${err.status})`, companyNumber, err.status);
    }
    if (err.status === 404) return new NotFoundError(companyNumber, resource);
    return new TransportError(`Companies House returned HTTP ${err.status} for ${resource}`, {
      companyNumber,
      status: err.status,
      cause: err,
    });
  }
  if (err instanceof HttpBodyError || err instanceof PayloadShapeError) {
    return new TransportError(err.message, { companyNumber, cause: err });
  }
  if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
    return new TransportError(`Companies House request for ${resource} timed out`, { companyNumber, cause: err });
  }
  return new TransportError(`Companies House request for ${resource} failed: ${String(err)}`, {
    companyNumber,
    cause: err,
  });
}

export class CompaniesHouseClient implements RegistryClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly dispatcher?: Dispatcher;
  private readonly schedule: RequestScheduler;
  private readonly log: Logger;
  private readonly maxPscPages: number;

  constructor(opts: CompaniesHouseClientOptions) {
    this.apiKey = opts.apiKey.trim();
    this.baseUrl = opts.baseUrl || DEFAULT_CH_BASE;
    this.timeoutMs = opts.timeoutMs ?? 15000;
    this.dispatcher = opts.dispatcher;
    this.schedule = opts.schedule ?? unlimited;
    this.log = opts.logger ?? rootLogger;
    this.maxPscPages = opts.maxPscPages ?? MAX_PSC_PAGES;
  }

  private async getJson(endpoint: string, companyNumber: string, resource: string): Promise<unknown> {
    if (!this.apiKey) throw new AuthError('Missing COMPANIES_HOUSE_API_KEY', companyNumber);
    const headers = { Authorization: basicAuthHeader(this.apiKey) };
    const url = buildUrl(this.baseUrl, endpoint);
    try {
      return await this.schedule(() =>
        httpGetJson(url, { headers, timeoutMs: this.timeoutMs, dispatcher: this.dispatcher, logger: this.log })
      );
    } catch (err) {
      throw toRegistryError(err, companyNumber, resource);
    }
  }

  async fetchProfile(input: string): Promise<CompanyProfile> {
    const companyNumber = assertCompanyNumber(input);
    const json = await this.getJson(`/company/${companyNumber}`, companyNumber, 'company profile');
    try {
      return parseCompanyProfile(json, companyNumber);
    } catch (err) {
      throw toRegistryError(err, companyNumber, 'company profile');
    }
  }

  async fetchControllingParties(input: string): Promise<ControllingParty[]> {
    const companyNumber = assertCompanyNumber(input);
    const parties: ControllingParty[] = [];
    let start = 0;
    let totalResults: number | undefined;
    for (let page = 0; page < this.maxPscPages; page++) {
      const json = await this.getJson(
        `/company/${companyNumber}/persons-with-significant-control?items_per_page=${PSC_PAGE_SIZE}&start_index=${start}`,
        companyNumber,
        'PSC list'
      );
      let parsed: PscPage;
      try {
        parsed = parsePscPage(json, companyNumber, this.log);
      } catch (err) {
        throw toRegistryError(err, companyNumber, 'PSC list');
      }
      parties.push(...parsed.parties);
      start += parsed.itemCount;
      totalResults = parsed.totalResults;
      if (parsed.itemCount === 0 || totalResults === undefined || start >= totalResults) {
        return parties;
      }
    }
    if (totalResults !== undefined && start < totalResults) {
      this.log.warn(
        { companyNumber, fetched: start, totalResults, maxPages: this.maxPscPages },
        'PSC register truncated at page limit'
      );
    }
    return parties;
  }

  async fetchShareCapital(input: string): Promise<ShareCapitalItem[] | null> {
    const companyNumber = assertCompanyNumber(input);
    let json: unknown;
    try {
      json = await this.getJson(`/company/${companyNumber}/capital`, companyNumber, 'share capital');
    } catch (err) {
      if (err instanceof NotFoundError) return null;
      throw err;
    }
    try {
      return parseShareCapital(json);
    } catch (err) {
      throw toRegistryError(err, companyNumber, 'share capital');
    }
  }
}
