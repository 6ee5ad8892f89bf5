import { vi } from 'vitest';
import { NotFoundError } from '../../src/lib/errors.js';
import type { RegistryClient } from '../../src/lib/companiesHouseClient.js';
import type { CompanyProfile, ControllingParty, ShareCapitalItem } from '../../src/lib/types.js';

export type FakeCompany = {
  name?: string;
  parties?: ControllingParty[];
  profileError?: Error;
  partiesError?: Error;
  shareCapital?: ShareCapitalItem[] | null;
  shareCapitalError?: Error;
};

export function person(name: string): ControllingParty {
  return {
    kind: 'individual',
    rawKind: 'individual-person-with-significant-control',
    name,
    nationality: 'British',
    naturesOfControl: ['ownership-of-shares-25-to-50-percent'],
  };
}

export function corporate(name: string, registeredCompanyNumber?: string): ControllingParty {
  return {
    kind: 'corporate-entity',
    rawKind: 'corporate-entity-person-with-significant-control',
    name,
    naturesOfControl: ['ownership-of-shares-75-to-100-percent'],
    identification: registeredCompanyNumber ? { registrationNumber: registeredCompanyNumber } : undefined,
    registeredCompanyNumber,
  };
}

export function profileFor(companyNumber: string, name = `Company ${companyNumber}`): CompanyProfile {
  return { companyNumber, name, status: 'active', sicCodes: [] };
}

/** In-memory registry keyed by company number; unknown numbers fail with NotFoundError. */
export function fakeRegistry(companies: Record<string, FakeCompany>) {
  const lookup = (n: string) => {
    const company = companies[n];
    if (!company) throw new NotFoundError(n);
    return company;
  };
  const client = {
    fetchProfile: vi.fn(async (n: string): Promise<CompanyProfile> => {
      const c = lookup(n);
      if (c.profileError) throw c.profileError;
      return profileFor(n, c.name);
    }),
    fetchControllingParties: vi.fn(async (n: string): Promise<ControllingParty[]> => {
      const c = lookup(n);
      if (c.partiesError) throw c.partiesError;
      return c.parties ?? [];
    }),
    fetchShareCapital: vi.fn(async (n: string): Promise<ShareCapitalItem[] | null> => {
      const c = lookup(n);
      if (c.shareCapitalError) throw c.shareCapitalError;
      return c.shareCapital ?? null;
    }),
  } satisfies RegistryClient;
  return client;
}
