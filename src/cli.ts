#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import fs from 'fs';
import path from 'path';
import { createLoginServices } from './core/bootstrap.js';
import { createApp, startServer } from './server/app.js';
import { AppConfig } from './types/index.js';
import { loadConfig, validateConfig } from './utils/config.js';
import { parseCookieHeader } from './utils/cookie-header.js';
import { logger, redact } from './utils/logger.js';

const SERVICE_NAME = 'energy-portal-session';

function readVersion(): string {
  try {
    const raw = fs.readFileSync(path.resolve(__dirname, '../package.json'), 'utf-8');
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch (error) {
    logger.debug('Package version unavailable', { error: error instanceof Error ? error.message : 'Unknown error' });
  }
  return '0.0.0';
}

interface CommonOptions {
  verbose?: boolean;
}

function prepare(options: CommonOptions): AppConfig {
  const config = loadConfig();
  validateConfig(config);
  logger.level = options.verbose ? 'debug' : config.log_level;
  return config;
}

function fail(error: unknown): never {
  console.error(chalk.red(`Error: ${error instanceof Error ? error.message : 'Unknown error'}`));
  process.exit(1);
}

const program = new Command();

program
  .name('portal-session')
  .description('Obtain and serve session cookies for the energy usage portal')
  .version(readVersion());

program
  .command('serve')
  .description('Start the HTTP service')
  .option('--port <port>', 'Port to listen on (overrides PORT)')
  .option('--verbose', 'Enable verbose logging')
  .action(async (options: CommonOptions & { port?: string }) => {
    try {
      const config = prepare(options);
      const port = options.port ? parseInt(options.port, 10) : config.port;

      const services = createLoginServices(config, logger);
      const app = createApp(
        {
          coordinator: services.coordinator,
          manualCookieDomain: services.profile.manualCookieDomain,
          info: { service: SERVICE_NAME, version: readVersion() },
        },
        logger
      );
      const server = await startServer(app, port, config.host, logger);
      console.log(chalk.green(`Listening on http://${config.host}:${port}`));

      const shutdown = (signal: string): void => {
        logger.info('Shutting down', { signal });
        server.close();
        services.coordinator
          .shutdown()
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            logger.error('Shutdown failed', { error: error instanceof Error ? error.message : 'Unknown error' });
            process.exit(1);
          });
      };
      process.once('SIGINT', () => shutdown('SIGINT'));
      process.once('SIGTERM', () => shutdown('SIGTERM'));
    } catch (error) {
      logger.error('Server failed to start', { error: error instanceof Error ? error.message : 'Unknown error' });
      fail(error);
    }
  });

program
  .command('login')
  .description('Run the automated login once and save the harvested cookies')
  .requiredOption('--username <username>', 'Portal account username')
  .requiredOption('--password <password>', 'Portal account password')
  .option('--verbose', 'Enable verbose logging')
  .action(async (options: CommonOptions & { username: string; password: string }) => {
    const spinner = ora('Starting login flow...').start();

    try {
      const config = prepare(options);
      const services = createLoginServices(config, logger);

      spinner.text = 'Logging in to the portal...';
      const outcome = await services.coordinator.login({
        username: options.username,
        password: options.password,
      });

      if (!outcome.success) {
        spinner.fail(chalk.red(`${outcome.error.kind}: ${outcome.error.message}`));
        if (outcome.session) {
          console.log(chalk.gray(`  Variants tried: ${outcome.session.attemptedVariants.join(', ') || 'none'}`));
        }
        if (outcome.error.kind === 'ChallengeBlocked') {
          console.log(chalk.yellow('  Supply cookies by hand with: portal-session cookies set "<header>"'));
        }
        process.exit(1);
      }

      spinner.succeed(chalk.green(`Logged in via ${outcome.session.variant ?? 'unknown variant'}`));
      console.log(services.coordinator.cookieHeader(outcome.cookieSet));
      if (outcome.persistenceError) {
        console.log(chalk.yellow(`  Not saved: ${outcome.persistenceError.message}`));
        process.exit(1);
      }
      console.log(chalk.blue(`  Saved to ${services.store.getFilePath()}`));
    } catch (error) {
      spinner.fail(chalk.red(`Error: ${error instanceof Error ? error.message : 'Unknown error'}`));
      logger.error('CLI error', { error: error instanceof Error ? error.message : 'Unknown error' });
      process.exit(1);
    }
  });

const cookies = program.command('cookies').description('Inspect or replace the saved cookie record');

cookies
  .command('show')
  .description('Print the current cookie record')
  .option('--reveal', 'Print full cookie values')
  .option('--verbose', 'Enable verbose logging')
  .action(async (options: CommonOptions & { reveal?: boolean }) => {
    try {
      const config = prepare(options);
      const { coordinator } = createLoginServices(config, logger);
      const record = await coordinator.current();

      console.log(chalk.cyan(`Source: ${record.source}`));
      console.log(chalk.cyan(`Saved:  ${record.savedAt}`));
      for (const [name, cookie] of Object.entries(record.cookieSet)) {
        const value = options.reveal ? cookie.value : redact(cookie.value);
        console.log(`  • ${name} = ${value} (${cookie.domain}${cookie.expiresAt ? `, expires ${cookie.expiresAt}` : ''})`);
      }
      if (options.reveal) {
        console.log(coordinator.cookieHeader(record.cookieSet));
      }
    } catch (error) {
      fail(error);
    }
  });

cookies
  .command('set <header>')
  .description('Save cookies copied from a browser, e.g. "MM_SID=...; __RequestVerificationToken=..."')
  .option('--verbose', 'Enable verbose logging')
  .action(async (header: string, options: CommonOptions) => {
    try {
      const config = prepare(options);
      const { coordinator, profile, store } = createLoginServices(config, logger);
      const record = await coordinator.submitManual(parseCookieHeader(header, profile.manualCookieDomain));
      console.log(chalk.green(`Saved ${Object.keys(record.cookieSet).length} cookie(s) to ${store.getFilePath()}`));
    } catch (error) {
      fail(error);
    }
  });

if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  program.parseAsync().catch(fail);
}
