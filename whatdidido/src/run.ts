#!/usr/bin/env node
/**
 * CLI entrypoint
 *
 * Usage:
 *   npx tsx whatdidido/src/run.ts connect jira github
 *   npx tsx whatdidido/src/run.ts status
 *   npx tsx whatdidido/src/run.ts config
 *   npx tsx whatdidido/src/run.ts disconnect linear --yes
 */

import * as p from '@clack/prompts';
import { Command } from 'commander';
import { createRequire } from 'module';
import { runConnect } from './commands/connect-interactive.js';
import { showConfig } from './commands/config.js';
import { disconnect, resolveProviders, storedProviders } from './commands/disconnect.js';
import { formatCheck, status } from './commands/status.js';
import { createAppContext, type AppContext } from './context.js';
import { getErrorMessage } from './errors.js';
import { log } from './log.js';
import { loadSettings } from './settings.js';
import { ui } from './ui.js';

const require = createRequire(import.meta.url);
const packageJson: { version: string } = require('../../package.json');

let appContext: AppContext | null = null;

function useAppContext(): AppContext {
  if (!appContext) {
    throw new Error('App context not initialized');
  }
  return appContext;
}

const program = new Command();

program
  .name('whatdidido')
  .description('What did I do again? Track your work across Jira, GitHub and Linear')
  .version(packageJson.version)
  .option('-v, --verbose', 'Enable verbose/debug output')
  .configureOutput({
    outputError: (str, write) => write(ui.error(str.trim())),
  })
  .hook('preAction', (thisCommand) => {
    const settings = loadSettings();
    const opts = thisCommand.opts<{ verbose?: boolean }>();
    log.setVerbose(Boolean(opts.verbose) || settings.debug);
    log.debug(`Using config file ${settings.configPath}`);
    appContext = createAppContext(settings);
  })
  .showHelpAfterError();

program
  .command('connect')
  .alias('init')
  .argument('[providers...]', 'Providers to set up (jira, github, linear, openai)')
  .description('Guided setup: store credentials for integrations and check them')
  .action(
    handle(async (providers: string[]) => {
      const results = await runConnect(useAppContext(), providers);
      if (results.some((result) => result.saved && result.check.status !== 'authenticated')) {
        process.exitCode = 1;
      }
    })
  );

program
  .command('status')
  .description('Check which integrations are configured and whether their credentials work')
  .action(
    handle(async () => {
      const result = await status(useAppContext());
      for (const check of result.checks) {
        log.print(formatCheck(check));
      }
      if (result.authenticated === 0) {
        log.error(`No authenticated integrations. Run ${ui.command('whatdidido connect')} first.`);
        process.exitCode = 1;
      }
    })
  );

program
  .command('config')
  .description('Display the current configuration with secrets masked')
  .action(
    handle(async () => {
      const view = await showConfig(useAppContext());
      if (!view.exists) {
        log.error(`No configuration file found. Run ${ui.command('whatdidido connect')} first.`);
        process.exitCode = 1;
        return;
      }

      log.print(`Configuration file: ${ui.path(view.path)}`);
      log.print('');
      if (view.lines.length === 0) {
        log.print('Configuration file is empty.');
        return;
      }
      for (const line of view.lines) {
        log.print(line);
      }
    })
  );

program
  .command('disconnect')
  .argument('[providers...]', 'Providers to disconnect (default: every configured one)')
  .option('-y, --yes', 'Skip confirmation prompt')
  .description('Remove stored credentials for integrations')
  .action(
    handle(async (providers: string[], options: { yes?: boolean }) => {
      const ctx = useAppContext();
      const targets =
        providers.length > 0
          ? resolveProviders(ctx.providers, providers)
          : storedProviders(ctx.providers, await ctx.store.readAll());

      if (targets.length === 0) {
        log.info('No configured integrations found to disconnect.');
        return;
      }

      log.info('The following integrations will be disconnected:');
      for (const provider of targets) {
        log.info(`  ${ui.symbols.bullet} ${provider.displayName}`);
      }

      if (!options.yes) {
        const confirmed = await p.confirm({
          message: 'Remove the stored credentials for these integrations?',
          initialValue: false,
        });
        if (p.isCancel(confirmed) || !confirmed) {
          log.info('Disconnect cancelled.');
          return;
        }
      }

      const result = await disconnect(ctx, { providers: targets.map((provider) => provider.id) });
      for (const entry of result.removed) {
        log.success(`Disconnected ${entry.displayName} (${entry.keys.join(', ')})`);
      }
      log.info(`Run ${ui.command('whatdidido connect')} to reconnect.`);
    })
  );

program.parseAsync(process.argv).catch((err: unknown) => {
  log.error(getErrorMessage(err));
  process.exit(1);
});

function handle<TArgs extends unknown[]>(fn: (...args: TArgs) => Promise<void>) {
  return async (...args: TArgs) => {
    try {
      await fn(...args);
    } catch (err) {
      log.error(getErrorMessage(err));
      process.exitCode = 1;
    }
  };
}
