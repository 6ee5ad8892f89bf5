export const USAGE = 'Usage: explore <companyNumber> [--depth N] [--json]';

export type CliArgs = { companyNumber: string; depth?: number; json: boolean };

export function parseArgs(argv: string[]): CliArgs | string {
  let companyNumber = '';
  let depth: number | undefined;
  let json = false;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--json') json = true;
    else if (arg === '--depth' || arg.startsWith('--depth=')) {
      const raw = arg.includes('=') ? arg.slice('--depth='.length) : argv[++i];
      const n = Number(raw);
      if (!Number.isInteger(n) || n < 0) return `--depth expects a non-negative integer, got "${raw ?? ''}"`;
      depth = n;
    } else if (arg.startsWith('--')) return `Unknown option ${arg}`;
    else if (!companyNumber) companyNumber = arg;
    else return `Unexpected argument ${arg}`;
  }
  if (!companyNumber) return 'Missing company number';
  return { companyNumber, depth, json };
}
