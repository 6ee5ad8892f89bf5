import { ShareholdingInputError } from './errors.js';

export type ShareholdingInput = {
  totalShares: number;
  sharesHeld: number;
  entityName?: string;
  shareClass?: string;
};

export type ShareholdingResult = {
  percentage: number;
  summary: string;
};

/** Percentage of one share class held by an entity, rounded to two decimals. */
export function calculateShareholding(input: ShareholdingInput): ShareholdingResult {
  const { totalShares, sharesHeld } = input;
  if (!Number.isInteger(totalShares) || totalShares < 1) {
    throw new ShareholdingInputError('Total issued shares must be a whole number greater than zero.');
  }
  if (!Number.isInteger(sharesHeld) || sharesHeld < 0) {
    throw new ShareholdingInputError('Shares held must be a whole number of zero or more.');
  }
  if (sharesHeld > totalShares) {
    throw new ShareholdingInputError('Number of shares held cannot exceed total issued shares for this class.');
  }

  const percentage = Math.round((sharesHeld / totalShares) * 10000) / 100;
  const entity = input.entityName?.trim() || 'The specified entity';
  const shareClass = input.shareClass?.trim() || 'specified';
  return {
    percentage,
    summary: `${entity} holds ${percentage.toFixed(2)}% of the ${shareClass} shares.`,
  };
}
