/**
 * CLI argument parser
 */

import { CliOptions } from '../types';

export const DEFAULT_CONFIG_PATH = 'config/oracle.json';

function valueOf(args: string[], flag: string): string | null {
  const arg = args.find((a) => a.startsWith(`${flag}=`));
  if (!arg) return null;
  const value = arg.slice(flag.length + 1).trim();
  return value.length > 0 ? value : null;
}

/**
 * Parse command line arguments
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const args = argv.slice(2);

  const isDryRun = args.includes('--dryrun') || args.includes('--dry-run');
  const verbose = args.includes('--verbose') || args.includes('-v');
  const logFile = valueOf(args, '--log');
  const configPath = valueOf(args, '--config');

  const modeArg = valueOf(args, '--mode');
  const mode = modeArg === 'producer' || modeArg === 'consumer' ? modeArg : null;

  return { configPath, mode, isDryRun, verbose, logFile };
}

/**
 * Validate CLI options
 */
export function validateCliOptions(argv: string[]): string | null {
  const args = argv.slice(2);
  const modeArg = valueOf(args, '--mode');
  if (modeArg !== null && modeArg !== 'producer' && modeArg !== 'consumer') {
    return `Unknown mode "${modeArg}"`;
  }
  const known = ['--dryrun', '--dry-run', '--verbose', '-v', '--help', '-h'];
  const unknown = args.find(
    (a) => !known.includes(a) && !/^--(log|config|mode)=/.test(a)
  );
  return unknown ? `Unknown argument "${unknown}"` : null;
}

/**
 * Display usage information
 */
export function displayUsage(): void {
  console.error('Usage:');
  console.error('  crosschain-oracle [--config=<file>] [--mode=producer|consumer] [options]');
  console.error('');
  console.error('Options:');
  console.error(`  --config=<file>     Oracle config (default: ${DEFAULT_CONFIG_PATH})`);
  console.error('  --mode=<mode>       Override the configured mode');
  console.error('  --dry-run           Run one update, print the result and exit');
  console.error('  --verbose, -v       Enable debug logging');
  console.error('  --log=<file>        Write logs to specified file (appends)');
  console.error('');
  console.error('Environment:');
  console.error('  ORACLE_RPC_URL, ORACLE_MODE, ORACLE_STATUS_PORT, ORACLE_READ_PORT,');
  console.error('  ORACLE_HERMES_URL, ORACLE_LOG_LEVEL override the config file');
}
