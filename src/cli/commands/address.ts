/**
 * Address Command
 *
 * Classifies an address and shows how it splits into parent and leaf.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { AddressResolver } from '../../core/AddressResolver.js';
import { OutputFormatter, getKindColor } from '../lib/OutputFormatter.js';
import type { GlobalOptions } from '../types/index.js';

export function registerAddressCommand(program: Command): void {
  program
    .command('address <address>')
    .description('Show the kind of an address and its parent/leaf split')
    .action((address: string, _options: unknown, cmd: Command) => {
      const opts = cmd.optsWithGlobals<GlobalOptions>();
      const formatter = new OutputFormatter(opts.json);
      const resolver = new AddressResolver();

      const kind = resolver.kindOf(address);
      const [parent, leaf] = resolver.split(address);

      formatter.output(
        [
          `${chalk.gray('Address:')} ${address}`,
          `${chalk.gray('Kind:')}    ${getKindColor(kind)(kind)}`,
          `${chalk.gray('Parent:')}  ${parent}`,
          `${chalk.gray('Leaf:')}    ${leaf || chalk.gray('(none)')}`,
        ].join('\n'),
        { address, kind, parent, leaf }
      );
    });
}
