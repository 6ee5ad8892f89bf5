import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MockAgent } from 'undici';
import pino from 'pino';
import { basicAuthHeader, CompaniesHouseClient, toRegistryError } from '../../src/lib/companiesHouseClient.js';
import { AuthError, InvalidIdentifierError, NotFoundError, TransportError } from '../../src/lib/errors.js';

const BASE = 'https://registry.test';
const PSC_PATH = (n: string, start: number) =>
  `/company/${n}/persons-with-significant-control?items_per_page=100&start_index=${start}`;

let agent: MockAgent;

beforeEach(() => {
  agent = new MockAgent();
  agent.disableNetConnect();
});

afterEach(async () => {
  await agent.close();
});

function client(apiKey = 'test-key') {
  return new CompaniesHouseClient({ apiKey, baseUrl: BASE, dispatcher: agent, timeoutMs: 1000 });
}

function capturingLogger() {
  const records: Array<{ level: number; msg: string }> = [];
  const log = pino(
    { level: 'debug' },
    {
      write(line: string) {
        const record: { level: number; msg: string } = JSON.parse(line);
        records.push({ level: record.level, msg: record.msg });
      },
    }
  );
  return { log, records };
}

describe('basicAuthHeader', () => {
  it('encodes the key as the username with an empty password', () => {
    expect(basicAuthHeader('test-key')).toBe('Basic dGVzdC1rZXk6');
  });
});

describe('CompaniesHouseClient.fetchProfile', () => {
  it('maps the registry profile to a CompanyProfile', async () => {
    agent.get(BASE).intercept({ path: '/company/00000001', method: 'GET' }).reply(200, {
      company_number: '00000001',
      company_name: 'Acme Holdings Ltd',
      company_status: 'active',
      date_of_creation: '2001-02-03',
      sic_codes: ['64209', '64209', '70100'],
      jurisdiction: 'england-wales',
      type: 'ltd',
    });

    const profile = await client().fetchProfile('00000001');

    expect(profile).toEqual({
      companyNumber: '00000001',
      name: 'Acme Holdings Ltd',
      status: 'active',
      incorporatedOn: '2001-02-03',
      sicCodes: ['64209', '70100'],
      jurisdiction: 'england-wales',
      companyType: 'ltd',
    });
  });

  it('normalizes the number used in the request path', async () => {
    agent.get(BASE).intercept({ path: '/company/SC012345', method: 'GET' }).reply(200, {
      company_name: 'Highland Ventures Ltd',
      company_status: 'something-new',
    });

    const profile = await client().fetchProfile(' sc 012345 ');

    expect(profile.companyNumber).toBe('SC012345');
    expect(profile.status).toBe('unknown');
    expect(profile.sicCodes).toEqual([]);
  });

  it('fails with InvalidIdentifierError before any request', async () => {
    await expect(client().fetchProfile('12-34')).rejects.toBeInstanceOf(InvalidIdentifierError);
  });

  it('fails with AuthError when no key is configured', async () => {
    await expect(client('  ').fetchProfile('00000001')).rejects.toBeInstanceOf(AuthError);
  });

  it.each([401, 403])('maps HTTP %i to AuthError', async (status) => {
    agent.get(BASE).intercept({ path: '/company/00000001', method: 'GET' }).reply(status, { error: 'Invalid Authorization' });

    await expect(client().fetchProfile('00000001')).rejects.toMatchObject({ kind: 'auth', status });
  });

  it('maps HTTP 404 to NotFoundError', async () => {
    agent.get(BASE).intercept({ path: '/company/00000009', method: 'GET' }).reply(404, { errors: [] });

    const err = await client().fetchProfile('00000009').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(NotFoundError);
    expect(err).toMatchObject({ companyNumber: '00000009', status: 404 });
  });

  it('maps other statuses to TransportError carrying the status', async () => {
    agent.get(BASE).intercept({ path: '/company/00000001', method: 'GET' }).reply(503, 'upstream down');

    const err = await client().fetchProfile('00000001').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({ kind: 'transport', status: 503 });
  });

  it('maps a malformed body to TransportError', async () => {
    agent.get(BASE).intercept({ path: '/company/00000001', method: 'GET' }).reply(200, '<html>oops</html>');

    await expect(client().fetchProfile('00000001')).rejects.toBeInstanceOf(TransportError);
  });

  it('maps a network failure to TransportError', async () => {
    agent.get(BASE).intercept({ path: '/company/00000001', method: 'GET' }).replyWithError(new Error('socket hang up'));

    await expect(client().fetchProfile('00000001')).rejects.toBeInstanceOf(TransportError);
  });
});

describe('toRegistryError', () => {
  it('reports an aborted-by-timeout request as a transport timeout', () => {
    const aborted = Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
    const err = toRegistryError(aborted, '00000001', 'company profile');

    expect(err).toBeInstanceOf(TransportError);
    expect(err.message).toBe('Companies House request for company profile timed out');
    expect(err.companyNumber).toBe('00000001');
  });

  it('passes registry errors through unchanged', () => {
    const original = new NotFoundError('00000001');

    expect(toRegistryError(original, '00000001', 'company profile')).toBe(original);
  });
});

describe('CompaniesHouseClient.fetchControllingParties', () => {
  it('follows pagination and keeps registry order', async () => {
    const pool = agent.get(BASE);
    pool.intercept({ path: PSC_PATH('00000001', 0), method: 'GET' }).reply(200, {
      total_results: 3,
      items: [
        {
          kind: 'corporate-entity-person-with-significant-control',
          name: 'Parent Holdings Limited',
          natures_of_control: ['ownership-of-shares-75-to-100-percent'],
          identification: { registration_number: '1234', country_registered: 'England', legal_form: 'Private Limited Company' },
        },
        {
          kind: 'individual-person-with-significant-control',
          name_elements: { title: 'Ms', forename: 'Jane', surname: 'Smith' },
          nationality: 'British',
          country_of_residence: 'England',
          natures_of_control: ['voting-rights-25-to-50-percent'],
        },
      ],
    });
    pool.intercept({ path: PSC_PATH('00000001', 2), method: 'GET' }).reply(200, {
      total_results: 3,
      items: [
        {
          kind: 'corporate-entity-person-with-significant-control',
          name: 'Auslands GmbH',
          identification: { registration_number: 'HRB 1234', country_registered: 'Germany' },
        },
      ],
    });

    const parties = await client().fetchControllingParties('00000001');

    expect(parties.map((p) => p.name)).toEqual(['Parent Holdings Limited', 'Ms Jane Smith', 'Auslands GmbH']);
    expect(parties.map((p) => p.kind)).toEqual(['corporate-entity', 'individual', 'corporate-entity']);
    expect(parties[0].registeredCompanyNumber).toBe('00001234');
    expect(parties[1].registeredCompanyNumber).toBeUndefined();
    expect(parties[2].registeredCompanyNumber).toBeUndefined();
    expect(parties[2].naturesOfControl).toEqual([]);
  });

  it('returns an empty list when the register has no entries', async () => {
    agent.get(BASE).intercept({ path: PSC_PATH('00000001', 0), method: 'GET' }).reply(200, { items: [], total_results: 0 });

    await expect(client().fetchControllingParties('00000001')).resolves.toEqual([]);
  });

  it('logs requests and skipped entries to the logger it was given', async () => {
    agent.get(BASE).intercept({ path: PSC_PATH('00000001', 0), method: 'GET' }).reply(200, {
      total_results: 2,
      items: [{ kind: 'individual-person-with-significant-control', name: 'Jane Smith' }, 42],
    });
    const { log, records } = capturingLogger();
    const injected = new CompaniesHouseClient({ apiKey: 'test-key', baseUrl: BASE, dispatcher: agent, logger: log });

    const parties = await injected.fetchControllingParties('00000001');

    expect(parties.map((p) => p.name)).toEqual(['Jane Smith']);
    expect(records).toEqual([
      { level: 20, msg: 'HTTP GET' },
      { level: 40, msg: 'Skipping unreadable PSC entry' },
    ]);
  });

  it('warns when the register is longer than the page limit allows', async () => {
    agent.get(BASE).intercept({ path: PSC_PATH('00000001', 0), method: 'GET' }).reply(200, {
      total_results: 3,
      items: [
        { kind: 'individual-person-with-significant-control', name: 'Jane Smith' },
        { kind: 'individual-person-with-significant-control', name: 'Sam Jones' },
      ],
    });
    const { log, records } = capturingLogger();
    const limited = new CompaniesHouseClient({
      apiKey: 'test-key',
      baseUrl: BASE,
      dispatcher: agent,
      logger: log,
      maxPscPages: 1,
    });

    const parties = await limited.fetchControllingParties('00000001');

    expect(parties).toHaveLength(2);
    expect(records.at(-1)).toEqual({ level: 40, msg: 'PSC register truncated at page limit' });
  });

  it('maps a missing register to NotFoundError', async () => {
    agent.get(BASE).intercept({ path: PSC_PATH('00000001', 0), method: 'GET' }).reply(404, {});

    await expect(client().fetchControllingParties('00000001')).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe('CompaniesHouseClient.fetchShareCapital', () => {
  it('returns null when there is no capital record', async () => {
    agent.get(BASE).intercept({ path: '/company/00000001/capital', method: 'GET' }).reply(404, {});

    await expect(client().fetchShareCapital('00000001')).resolves.toBeNull();
  });

  it('reads alternative field names for capital items', async () => {
    agent.get(BASE).intercept({ path: '/company/00000001/capital', method: 'GET' }).reply(200, {
      share_capital: [
        {
          class_of_shares: 'Ordinary',
          shares_allotted: 100,
          currency: 'GBP',
          value_per_share: 1,
          aggregate_nominal_value: { value: 100, currency: 'GBP' },
        },
      ],
    });

    await expect(client().fetchShareCapital('00000001')).resolves.toEqual([
      {
        shareClass: 'Ordinary',
        numberAllotted: '100',
        currency: 'GBP',
        nominalValuePerShare: '1',
        aggregateNominalValue: '100 GBP',
      },
    ]);
  });
});
