import "dotenv/config";
import { logger } from "../lib/logger.js";
import { loadConfig } from "../lib/config.js";
import { createChRateLimiter } from "../lib/chRateLimiter.js";
import { CompaniesHouseClient } from "../lib/companiesHouseClient.js";
import { OwnershipResolver } from "../lib/ownershipResolver.js";
import { createApp } from "./app.js";

const config = loadConfig();
if (!config.companiesHouse.apiKey) {
  logger.warn("COMPANIES_HOUSE_API_KEY is not set; every lookup will fail with an auth error");
}

const client = new CompaniesHouseClient({
  apiKey: config.companiesHouse.apiKey,
  baseUrl: config.companiesHouse.baseUrl,
  timeoutMs: config.companiesHouse.timeoutMs,
  schedule: createChRateLimiter(config.companiesHouse.rateLimit),
});
const resolver = new OwnershipResolver(client);
const app = createApp({ resolver, ownership: config.ownership });

app.listen(config.port, () => logger.info({ port: config.port }, "API listening"));
