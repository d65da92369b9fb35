import { Command } from 'commander';
import { createConfigCommand } from './commands/config.js';
import { createAuthCommand } from './commands/auth.js';
import { createPlayerCommand } from './commands/player.js';
import { createDevicesCommand } from './commands/devices.js';
import { createActionsCommand } from './commands/actions.js';
import { setCliLogLevel } from './lib/plugin-client.js';

export function createCli(): Command {
  const cli = new Command();

  cli
    .name('spdeck')
    .description('Spotify playback buttons and their command-line companion')
    .version('0.1.0');

  // global options
  cli
    .option('-f, --format <format>', 'output format: json (default) | table', 'json')
    .option('-q, --quiet', 'only log errors')
    .option('-v, --verbose', 'debug logging');

  cli.hook('preAction', (_thisCommand, actionCommand) => {
    const opts: Record<string, unknown> = actionCommand.optsWithGlobals();
    if (opts.verbose === true) {
      setCliLogLevel('debug');
    } else if (opts.quiet === true) {
      setCliLogLevel('error');
    } else {
      setCliLogLevel(null);
    }
  });

  cli.addCommand(createConfigCommand());
  cli.addCommand(createAuthCommand());
  cli.addCommand(createPlayerCommand());
  cli.addCommand(createDevicesCommand());
  cli.addCommand(createActionsCommand());

  return cli;
}

export const cli = createCli();
