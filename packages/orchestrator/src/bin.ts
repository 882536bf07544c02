import chalk from 'chalk';
import { errorMessage } from '@factreel/shared';
import { main } from './cli.js';

main(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error(chalk.red(`\n  ✗ Error: ${errorMessage(err)}`));
    process.exit(1);
  },
);
