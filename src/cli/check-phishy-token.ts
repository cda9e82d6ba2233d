#!/usr/bin/env node
// src/cli/check-phishy-token.ts

/**
 * Checks one token from the terminal.
 * Usage: check-phishy-token <token_address> [bonding_curve]
 *
 * Exit codes: 0 analysis completed (phishy or not) or nothing to check yet,
 * 1 configuration or upstream failure, 2 bad input.
 */

import chalk from 'chalk';
import { PhishyCheckService } from '../analysis/phishy-check-service';
import { renderCliReport } from '../presentation/cli-report';
import { PhishyCheckError, errorMessage } from '../utils/errors';

const USAGE = 'Usage: check-phishy-token <token_address> [bonding_curve]';

export function exitCodeFor(error: unknown): number {
  if (!(error instanceof PhishyCheckError)) return 1;
  switch (error.kind) {
    case 'info':
      return 0;
    case 'invalid_input':
      return 2;
    case 'configuration':
    case 'upstream':
    case 'cancelled':
      return 1;
  }
}

export async function runCli(
  args: string[],
  service: PhishyCheckService = new PhishyCheckService(),
  write: (line: string) => void = line => console.log(line)
): Promise<number> {
  const [tokenAddress, bondingCurve] = args;

  if (!tokenAddress || tokenAddress === '--help' || tokenAddress === '-h') {
    write(USAGE);
    return tokenAddress ? 0 : 2;
  }

  try {
    const result = await service.checkToken({ tokenAddress, bondingCurve });
    renderCliReport(result).forEach(line => write(line));
    return 0;
  } catch (error) {
    const code = exitCodeFor(error);
    if (error instanceof PhishyCheckError && error.kind === 'info') {
      write(chalk.yellow(`ℹ️  ${error.message}`));
    } else {
      write(chalk.red(`❌ Error: ${errorMessage(error)}`));
      if (code === 2) write(USAGE);
    }
    return code;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then(code => process.exit(code))
    .catch(error => {
      console.error(chalk.red(`❌ ${errorMessage(error)}`));
      process.exit(1);
    });
}
