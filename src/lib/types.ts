import type { RegistryErrorKind } from './errors.js';

export const COMPANY_STATUSES = [
  'active',
  'dissolved',
  'liquidation',
  'receivership',
  'administration',
  'voluntary-arrangement',
  'converted-closed',
  'insolvency-proceedings',
  'registered',
  'removed',
  'closed',
  'open',
] as const;

export type CompanyStatus = (typeof COMPANY_STATUSES)[number] | 'unknown';

export type ShareCapitalItem = {
  shareClass?: string;
  currency?: string;
  numberAllotted?: string;
  nominalValuePerShare?: string;
  aggregateNominalValue?: string;
};

export type CompanyProfile = {
  readonly companyNumber: string;
  readonly name: string;
  readonly status: CompanyStatus;
  readonly incorporatedOn?: string;
  readonly sicCodes: readonly string[];
  readonly jurisdiction?: string;
  readonly companyType?: string;
  readonly shareCapital?: readonly ShareCapitalItem[];
};

/** `other` covers super-secure PSCs and any kind Companies House adds later. */
export type PscKind = 'individual' | 'corporate-entity' | 'legal-person' | 'other';

export type PscIdentification = {
  registrationNumber?: string;
  legalForm?: string;
  legalAuthority?: string;
  countryRegistered?: string;
  placeRegistered?: string;
};

export type ControllingParty = {
  readonly kind: PscKind;
  readonly rawKind: string;
  readonly name: string;
  readonly nationality?: string;
  readonly countryOfResidence?: string;
  readonly naturesOfControl: readonly string[];
  readonly notifiedOn?: string;
  readonly ceasedOn?: string;
  readonly statement?: string;
  readonly identification?: PscIdentification;
  /** Normalized number usable for a further lookup; absent for people and unresolvable entities. */
  readonly registeredCompanyNumber?: string;
};

export type NodeStatus = 'resolved' | 'depth-limit-reached' | 'cycle-detected' | 'lookup-failed';

export type LinkStatus = NodeStatus | 'not-corporate';

export type NodeError = {
  kind: RegistryErrorKind | 'unknown';
  message: string;
  status?: number;
};

export type ControllerLink = {
  party: ControllingParty;
  status: LinkStatus;
  child?: OwnershipNode;
};

export type OwnershipNode = {
  companyNumber: string;
  depth: number;
  status: NodeStatus;
  profile?: CompanyProfile;
  controllers: ControllerLink[];
  error?: NodeError;
  cyclePath?: string[];
};
