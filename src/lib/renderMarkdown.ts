import { isCorporateKind } from './chParsers.js';
import type { ControllerLink, ControllingParty, OwnershipNode, ShareCapitalItem } from './types.js';

const DOMESTIC_JURISDICTIONS = new Set(['England Wales', 'United Kingdom']);

export function prettify(value: string): string {
  return value
    .replace(/-/g, ' ')
    .split(/\s+/)
    .filter(Boolean)
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1).toLowerCase())
    .join(' ');
}

function heading(depth: number, offset = 0): string {
  return '#'.repeat(Math.min(6, 3 + depth + offset));
}

function shareCapitalLines(items: readonly ShareCapitalItem[]): string[] {
  if (!items.length) return ['* No structured share capital data found.'];
  const out: string[] = [];
  for (const item of items) {
    out.push(`* **Class:** ${item.shareClass ?? 'N/A'}`);
    out.push(`  * Shares Allotted: ${item.numberAllotted ?? 'N/A'}`);
    if (item.nominalValuePerShare) {
      out.push(`  * Nominal Value per Share: ${[item.nominalValuePerShare, item.currency].filter(Boolean).join(' ')}`);
    }
    if (item.aggregateNominalValue) out.push(`  * Aggregate Nominal Value: ${item.aggregateNominalValue}`);
  }
  return out;
}

function identificationLine(party: ControllingParty): string | null {
  const id = party.identification;
  if (!id) return null;
  const parts: string[] = [];
  if (id.registrationNumber) parts.push(`Reg No: ${id.registrationNumber}`);
  if (id.legalForm) parts.push(`Legal Form: ${id.legalForm}`);
  if (id.legalAuthority) parts.push(`Legal Authority: ${id.legalAuthority}`);
  if (id.countryRegistered) parts.push(`Country Reg: ${id.countryRegistered}`);
  if (id.placeRegistered) parts.push(`Place Reg: ${id.placeRegistered}`);
  return parts.length ? `  * Identification: ${parts.join('; ')}` : null;
}

function linkLine(link: ControllerLink): string | null {
  const child = link.child;
  switch (link.status) {
    case 'resolved':
      return child ? `  * Ownership: see ${child.profile?.name ?? child.companyNumber} (${child.companyNumber}) below` : null;
    case 'depth-limit-reached':
      return child ? `  * *Not followed: reached max analysis depth (${child.depth - 1} levels).*` : null;
    case 'cycle-detected':
      return `  * *Circular reference: ${(child?.cyclePath ?? []).join(' → ')}.*`;
    case 'lookup-failed':
      return `  * *Could not retrieve ${child?.companyNumber ?? 'company'} (${child?.error?.kind ?? 'unknown'}): ${child?.error?.message ?? 'no details'}*`;
    case 'not-corporate':
      return isCorporateKind(link.party.kind) ? '  * *Not followed: no UK company number on record.*' : null;
  }
}

function partyLines(link: ControllerLink): string[] {
  const { party } = link;
  const out = [`* **${party.name}** (${prettify(party.rawKind)})`];
  if (party.nationality) out.push(`  * Nationality: ${party.nationality}`);
  if (party.countryOfResidence) out.push(`  * Country of Residence: ${party.countryOfResidence}`);
  if (party.ceasedOn) out.push(`  * Ceased: ${party.ceasedOn}`);
  out.push('  * Natures of Control:');
  if (party.naturesOfControl.length) {
    for (const nature of party.naturesOfControl) out.push(`    * \`${prettify(nature)}\``);
  } else {
    out.push('    * N/A');
  }
  if (party.statement) out.push(`  * Statement: *${party.statement}*`);
  const idLine = identificationLine(party);
  if (idLine) out.push(idLine);
  const follow = linkLine(link);
  if (follow) out.push(follow);
  return out;
}

function renderNode(node: OwnershipNode, lines: string[]): void {
  const p = node.profile;
  if (node.status !== 'resolved' || !p) return;

  lines.push(`${heading(node.depth)} ${p.name} (${node.companyNumber})`, '');
  lines.push(`* Status: ${p.status}`);
  lines.push(`* Incorporated: ${p.incorporatedOn ?? 'N/A'}`);
  lines.push(`* Industry (SIC Codes): ${p.sicCodes.length ? p.sicCodes.join(', ') : 'N/A'}`);
  const jurisdiction = p.jurisdiction ? prettify(p.jurisdiction) : '';
  if (jurisdiction && !DOMESTIC_JURISDICTIONS.has(jurisdiction)) lines.push(`* Jurisdiction: ${jurisdiction}`);
  lines.push('');

  if (p.shareCapital) {
    lines.push(`${heading(node.depth, 1)} Share Capital`, '', ...shareCapitalLines(p.shareCapital), '');
  }

  lines.push(`${heading(node.depth, 1)} Persons with Significant Control`, '');
  if (!node.controllers.length) {
    lines.push('* No PSCs listed for this company or company is exempt.');
  }
  for (const link of node.controllers) lines.push(...partyLines(link));
  lines.push('');

  // Parent sections follow the full PSC list so headings never split it
  for (const link of node.controllers) {
    if (link.child) renderNode(link.child, lines);
  }
}

/** Nested Markdown: one heading per resolved company, deeper owners at deeper heading levels. */
export function renderOwnershipMarkdown(tree: OwnershipNode): string {
  const lines: string[] = [];
  renderNode(tree, lines);
  return `${lines.join('\n').trimEnd()}\n`;
}
