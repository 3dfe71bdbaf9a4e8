export interface CheckOptions {
  limit?: number;
  startId?: number;
  dryRun: boolean;
}

function readIntFlag(args: string[], flag: string): number | undefined {
  const arg = args.find((a) => a.startsWith(`${flag}=`));
  if (!arg) return undefined;

  const value = Number(arg.slice(flag.length + 1));
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${flag} deve ser um inteiro >= 0`);
  }
  return value;
}

export function parseArgs(args: string[]): CheckOptions {
  return {
    limit: readIntFlag(args, '--limit'),
    startId: readIntFlag(args, '--start-id'),
    dryRun: args.includes('--dry-run'),
  };
}
