import { z } from 'zod';
import { logger as rootLogger, type Logger } from './logger.js';
import { normalizeCompanyNumber, normalizeRegistrationNumber } from './companyNumber.js';
import {
  COMPANY_STATUSES,
  type CompanyProfile,
  type CompanyStatus,
  type ControllingParty,
  type PscIdentification,
  type PscKind,
  type ShareCapitalItem,
} from './types.js';

// Companies House sends null for plenty of optional fields
const optStr = z.string().nullish().transform((v) => (v && v.trim() ? v.trim() : undefined));
const optScalar = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((v) => (v === null || v === undefined || String(v).trim() === '' ? undefined : String(v).trim()));

const rawProfileSchema = z.object({
  company_number: optStr,
  company_name: optStr,
  company_status: optStr,
  date_of_creation: optStr,
  sic_codes: z.array(z.string()).nullish(),
  jurisdiction: optStr,
  type: optStr,
});

const rawIdentificationSchema = z.object({
  registration_number: optScalar,
  legal_form: optStr,
  legal_authority: optStr,
  country_registered: optStr,
  place_registered: optStr,
});

const rawPscSchema = z.object({
  kind: optStr,
  name: optStr,
  name_elements: z
    .object({ title: optStr, forename: optStr, middle_name: optStr, surname: optStr })
    .nullish(),
  nationality: optStr,
  country_of_residence: optStr,
  natures_of_control: z.array(z.string()).nullish(),
  notified_on: optStr,
  ceased_on: optStr,
  statement: optStr,
  identification: rawIdentificationSchema.nullish(),
});

const rawPscPageSchema = z.object({
  items: z.array(z.unknown()).nullish(),
  total_results: z.number().nullish(),
});

const aggregateValueSchema = z.union([
  z.object({ value: optScalar, currency: optStr }),
  z.string(),
  z.number(),
]);

const rawCapitalItemSchema = z.object({
  share_class: optStr,
  class_of_shares: optStr,
  number_allotted: optScalar,
  shares_allotted: optScalar,
  number_of_shares: optScalar,
  currency: optStr,
  nominal_value_per_share: optScalar,
  value_per_share: optScalar,
  aggregate_nominal_value: aggregateValueSchema.nullish(),
});

const rawCapitalSchema = z.union([
  z.array(z.unknown()),
  z.object({ items: z.array(z.unknown()).nullish(), share_capital: z.array(z.unknown()).nullish() }),
]);

export class PayloadShapeError extends Error {
  constructor(what: string, issues: z.ZodIssue[]) {
    super(`Unexpected ${what} payload: ${issues.map((i) => `${i.path.join('.') || '(root)'} ${i.message}`).join('; ')}`);
    this.name = 'PayloadShapeError';
  }
}

function toCompanyStatus(raw: string | undefined): CompanyStatus {
  const s = (raw || '').toLowerCase();
  return COMPANY_STATUSES.find((known) => known === s) ?? 'unknown';
}

export function parseCompanyProfile(json: unknown, requestedNumber: string): CompanyProfile {
  const parsed = rawProfileSchema.safeParse(json);
  if (!parsed.success) throw new PayloadShapeError('company profile', parsed.error.issues);
  const p = parsed.data;
  return {
    companyNumber: normalizeCompanyNumber(p.company_number) ?? requestedNumber,
    name: p.company_name ?? 'N/A',
    status: toCompanyStatus(p.company_status),
    incorporatedOn: p.date_of_creation,
    sicCodes: Array.from(new Set((p.sic_codes ?? []).map((c) => c.trim()).filter(Boolean))),
    jurisdiction: p.jurisdiction,
    companyType: p.type,
  };
}

export function classifyPscKind(rawKind: string | undefined): PscKind {
  const k = (rawKind || '').toLowerCase();
  if (k.startsWith('individual-')) return 'individual';
  if (k.startsWith('corporate-entity-')) return 'corporate-entity';
  if (k.startsWith('legal-person-')) return 'legal-person';
  return 'other';
}

export function isCorporateKind(kind: PscKind): boolean {
  return kind === 'corporate-entity' || kind === 'legal-person';
}

const UK_REGISTRY_HINTS = [
  'united kingdom',
  'england',
  'wales',
  'scotland',
  'northern ireland',
  'companies house',
  'great britain',
];

function mentionsUk(value?: string): boolean {
  if (!value) return false;
  const v = value.toLowerCase();
  return UK_REGISTRY_HINTS.some((hint) => v.includes(hint));
}

/**
 * A corporate PSC is followed only when its registration looks like a Companies House one:
 * either the country/place names a UK registry or neither is given.
 */
export function registeredCompanyNumberFor(kind: PscKind, id?: PscIdentification): string | undefined {
  if (!isCorporateKind(kind) || !id?.registrationNumber) return undefined;
  const ukLike =
    mentionsUk(id.countryRegistered) ||
    mentionsUk(id.placeRegistered) ||
    (!id.countryRegistered && !id.placeRegistered);
  if (!ukLike) return undefined;
  return normalizeRegistrationNumber(id.registrationNumber) ?? undefined;
}

function pscName(p: z.infer<typeof rawPscSchema>): string {
  if (p.name) return p.name;
  const ne = p.name_elements;
  const joined = ne ? [ne.title, ne.forename, ne.middle_name, ne.surname].filter(Boolean).join(' ') : '';
  return joined || 'N/A';
}

export function parseControllingParty(item: unknown): ControllingParty | null {
  const parsed = rawPscSchema.safeParse(item);
  if (!parsed.success) return null;
  const p = parsed.data;
  const kind = classifyPscKind(p.kind);
  const identification: PscIdentification | undefined = p.identification
    ? {
        registrationNumber: p.identification.registration_number,
        legalForm: p.identification.legal_form,
        legalAuthority: p.identification.legal_authority,
        countryRegistered: p.identification.country_registered,
        placeRegistered: p.identification.place_registered,
      }
    : undefined;
  return {
    kind,
    rawKind: p.kind ?? 'unknown',
    name: pscName(p),
    nationality: p.nationality,
    countryOfResidence: p.country_of_residence,
    naturesOfControl: p.natures_of_control ?? [],
    notifiedOn: p.notified_on,
    ceasedOn: p.ceased_on,
    statement: p.statement && p.statement.toUpperCase() !== 'NONE' ? p.statement : undefined,
    identification,
    registeredCompanyNumber: registeredCompanyNumberFor(kind, identification),
  };
}

export type PscPage = {
  parties: ControllingParty[];
  itemCount: number;
  totalResults?: number;
};

export function parsePscPage(json: unknown, companyNumber: string, log: Logger = rootLogger): PscPage {
  const parsed = rawPscPageSchema.safeParse(json);
  if (!parsed.success) throw new PayloadShapeError('PSC list', parsed.error.issues);
  const items = parsed.data.items ?? [];
  const parties: ControllingParty[] = [];
  items.forEach((item, index) => {
    const party = parseControllingParty(item);
    if (party) parties.push(party);
    else log.warn({ companyNumber, index }, 'Skipping unreadable PSC entry');
  });
  return {
    parties,
    itemCount: items.length,
    totalResults: parsed.data.total_results ?? undefined,
  };
}

export function parseShareCapital(json: unknown): ShareCapitalItem[] {
  const parsed = rawCapitalSchema.safeParse(json);
  if (!parsed.success) throw new PayloadShapeError('share capital', parsed.error.issues);
  const data = parsed.data;
  let rawItems: unknown[];
  if (Array.isArray(data)) rawItems = data;
  else rawItems = data.items?.length ? data.items : data.share_capital ?? [];

  const out: ShareCapitalItem[] = [];
  for (const raw of rawItems) {
    const r = rawCapitalItemSchema.safeParse(raw);
    if (!r.success) continue;
    const c = r.data;
    let aggregate: string | undefined;
    const agg = c.aggregate_nominal_value;
    if (typeof agg === 'string' || typeof agg === 'number') aggregate = String(agg);
    else if (agg) aggregate = [agg.value, agg.currency].filter(Boolean).join(' ') || undefined;
    out.push({
      shareClass: c.share_class ?? c.class_of_shares,
      currency: c.currency,
      numberAllotted: c.number_allotted ?? c.shares_allotted ?? c.number_of_shares,
      nominalValuePerShare: c.nominal_value_per_share ?? c.value_per_share,
      aggregateNominalValue: aggregate,
    });
  }
  return out;
}
