#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig } from '../src/lib/config.js';
import { createChRateLimiter } from '../src/lib/chRateLimiter.js';
import { CompaniesHouseClient } from '../src/lib/companiesHouseClient.js';
import { OwnershipResolver, summarizeTree } from '../src/lib/ownershipResolver.js';
import { renderOwnershipMarkdown } from '../src/lib/renderMarkdown.js';
import { isRegistryError } from '../src/lib/errors.js';
import { parseArgs, USAGE } from '../src/cli/args.js';
import { createStderrLogger } from '../src/lib/logger.js';

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (typeof args === 'string') {
    console.error(`${args}\n${USAGE}`);
    process.exit(2);
  }

  const config = loadConfig();
  const log = createStderrLogger();
  const client = new CompaniesHouseClient({
    apiKey: config.companiesHouse.apiKey,
    baseUrl: config.companiesHouse.baseUrl,
    timeoutMs: config.companiesHouse.timeoutMs,
    schedule: createChRateLimiter(config.companiesHouse.rateLimit),
    logger: log,
  });
  const resolver = new OwnershipResolver(client, { logger: log });
  const maxDepth = args.depth ?? config.ownership.defaultMaxDepth;

  try {
    const tree = await resolver.resolve(args.companyNumber, maxDepth);
    if (args.json) {
      console.log(JSON.stringify({ maxDepth, summary: summarizeTree(tree), tree }, null, 2));
    } else {
      process.stdout.write(renderOwnershipMarkdown(tree));
    }
  } catch (err) {
    if (isRegistryError(err)) {
      console.error(`Lookup failed (${err.kind}): ${err.message}`);
    } else {
      console.error('Lookup failed:', err);
    }
    process.exit(1);
  }
}

await main();
