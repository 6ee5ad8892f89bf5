import { logger as rootLogger, type Logger } from './logger.js';
import { assertCompanyNumber } from './companyNumber.js';
import { isCorporateKind } from './chParsers.js';
import { isRegistryError } from './errors.js';
import type { RegistryClient } from './companiesHouseClient.js';
import type {
  CompanyProfile,
  ControllerLink,
  ControllingParty,
  LinkStatus,
  NodeError,
  OwnershipNode,
} from './types.js';

export type OwnershipResolverOptions = {
  logger?: Logger;
  /** Load the root company's share capital alongside its profile. Defaults to true. */
  includeShareCapital?: boolean;
};

export type TreeSummary = {
  companiesResolved: number;
  controllers: number;
  links: Record<LinkStatus, number>;
  deepestResolvedDepth: number;
};

function toNodeError(err: unknown): NodeError {
  if (isRegistryError(err)) {
    return err.status === undefined
      ? { kind: err.kind, message: err.message }
      : { kind: err.kind, message: err.message, status: err.status };
  }
  return { kind: 'unknown', message: err instanceof Error ? err.message : String(err) };
}

function markerNode(
  companyNumber: string,
  depth: number,
  status: 'depth-limit-reached' | 'cycle-detected',
  path: readonly string[]
): OwnershipNode {
  const node: OwnershipNode = { companyNumber, depth, status, controllers: [] };
  if (status === 'cycle-detected') node.cyclePath = [...path, companyNumber];
  return node;
}

/**
 * Depth-first walk from a root company through its corporate PSCs.
 *
 * Cycle detection is scoped to the current path: a parent shared by two
 * sibling branches is resolved once per branch. Fetches are strictly
 * sequential, so the registry sees at most one request per traversal at a time.
 * Failures below the root are recorded on the node; the root's own failure rejects.
 */
export class OwnershipResolver {
  private readonly client: RegistryClient;
  private readonly log: Logger;
  private readonly includeShareCapital: boolean;

  constructor(client: RegistryClient, opts: OwnershipResolverOptions = {}) {
    this.client = client;
    this.log = opts.logger ?? rootLogger;
    this.includeShareCapital = opts.includeShareCapital ?? true;
  }

  async resolve(rootCompanyNumber: string, maxDepth: number): Promise<OwnershipNode> {
    if (!Number.isInteger(maxDepth) || maxDepth < 0) {
      throw new RangeError(`maxDepth must be a non-negative integer, got ${maxDepth}`);
    }
    const root = assertCompanyNumber(rootCompanyNumber);
    const log = this.log.child({ rootCompanyNumber: root, maxDepth });
    const started = Date.now();

    const tree = await this.resolveNode(root, 0, [], maxDepth, log);

    log.info({ ms: Date.now() - started, ...summarizeTree(tree) }, 'Ownership traversal complete');
    return tree;
  }

  private async resolveNode(
    companyNumber: string,
    depth: number,
    path: readonly string[],
    maxDepth: number,
    log: Logger
  ): Promise<OwnershipNode> {
    if (depth > maxDepth) {
      log.debug({ companyNumber, depth }, 'Depth limit reached');
      return markerNode(companyNumber, depth, 'depth-limit-reached', path);
    }
    if (path.includes(companyNumber)) {
      log.info({ companyNumber, path }, 'Ownership cycle detected');
      return markerNode(companyNumber, depth, 'cycle-detected', path);
    }

    let profile: CompanyProfile;
    let parties: ControllingParty[];
    try {
      profile = await this.client.fetchProfile(companyNumber);
      parties = await this.client.fetchControllingParties(companyNumber);
    } catch (err) {
      if (depth === 0) throw err;
      const error = toNodeError(err);
      log.warn({ companyNumber, depth, error }, 'Lookup failed; branch not expanded');
      return { companyNumber, depth, status: 'lookup-failed', controllers: [], error };
    }

    if (depth === 0 && this.includeShareCapital) {
      profile = await this.withShareCapital(profile, log);
    }

    const nextPath = [...path, companyNumber];
    const controllers: ControllerLink[] = [];
    for (const party of parties) {
      if (!isCorporateKind(party.kind) || !party.registeredCompanyNumber) {
        controllers.push({ party, status: 'not-corporate' });
        continue;
      }
      const child = await this.resolveNode(party.registeredCompanyNumber, depth + 1, nextPath, maxDepth, log);
      controllers.push({ party, status: child.status, child });
    }

    return { companyNumber, depth, status: 'resolved', profile, controllers };
  }

  private async withShareCapital(profile: CompanyProfile, log: Logger): Promise<CompanyProfile> {
    try {
      const shareCapital = await this.client.fetchShareCapital(profile.companyNumber);
      return shareCapital ? { ...profile, shareCapital } : profile;
    } catch (err) {
      log.warn({ companyNumber: profile.companyNumber, error: toNodeError(err) }, 'Share capital unavailable');
      return profile;
    }
  }
}

export function summarizeTree(tree: OwnershipNode): TreeSummary {
  const summary: TreeSummary = {
    companiesResolved: 0,
    controllers: 0,
    links: {
      resolved: 0,
      'depth-limit-reached': 0,
      'cycle-detected': 0,
      'lookup-failed': 0,
      'not-corporate': 0,
    },
    deepestResolvedDepth: 0,
  };
  const stack: OwnershipNode[] = [tree];
  while (stack.length) {
    const node = stack.pop();
    if (!node) break;
    if (node.status === 'resolved') {
      summary.companiesResolved++;
      summary.deepestResolvedDepth = Math.max(summary.deepestResolvedDepth, node.depth);
    }
    for (const link of node.controllers) {
      summary.controllers++;
      summary.links[link.status]++;
      if (link.child) stack.push(link.child);
    }
  }
  return summary;
}
