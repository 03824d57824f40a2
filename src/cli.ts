#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { createApp, type App } from './app.js';
import { loadConfig } from './config.js';
import type { Message, MessageStatus } from './messages/types.js';

const DEFAULT_CONFIG_PATH = fileURLToPath(new URL('../config/default.yaml', import.meta.url));

export interface GlobalOptions {
  config: string;
  verbose?: boolean;
}

export interface CliDeps {
  openApp(options: GlobalOptions): Promise<App>;
  print(line: string): void;
}

async function openApp(options: GlobalOptions): Promise<App> {
  const config = await loadConfig(options.config);
  if (options.verbose) {
    config.logging.level = 'debug';
  }
  return createApp(config);
}

const defaultDeps: CliDeps = {
  openApp,
  print: (line) => console.log(line),
};

function colorStatus(status: MessageStatus): string {
  switch (status) {
    case 'sent':
    case 'handled':
      return chalk.green(status);
    case 'queued':
    case 'pending':
      return chalk.yellow(status);
    case 'cancelled':
      return chalk.red(status);
    default:
      return chalk.cyan(status);
  }
}

export function formatMessage(message: Message): string {
  const { backend, identity } = message.connection;
  return `${chalk.bold(`#${message.id}`)} [${colorStatus(message.status)}] ${backend}/${identity}: ${message.text}`;
}

function parseMessageId(raw: string): number {
  const id = Number(raw);
  if (!Number.isInteger(id) || id <= 0) {
    throw new Error(`Invalid message id: ${raw}`);
  }
  return id;
}

export function createProgram(deps: CliDeps = defaultDeps): Command {
  const program = new Command();

  program
    .name('textrouter')
    .description('Route SMS traffic through a chain of handler applications')
    .version('0.1.0')
    .option('-c, --config <path>', 'Path to configuration file', DEFAULT_CONFIG_PATH)
    .option('-v, --verbose', 'Enable verbose logging');

  const withApp = async (fn: (app: App) => Promise<void>): Promise<void> => {
    const app = await deps.openApp(program.opts<GlobalOptions>());
    try {
      await fn(app);
    } finally {
      app.close();
    }
  };

  // ── textrouter receive ──────────────────────────────────
  program
    .command('receive')
    .description('Dispatch an incoming message as if a backend had received it')
    .argument('<backend>', 'Backend the message arrived on')
    .argument('<sender>', 'Sender address')
    .argument('<text...>', 'Message text')
    .action(async (backend: string, sender: string, text: string[]) => {
      await withApp(async (app) => {
        const message = await app.router.handleIncoming(backend, sender, text.join(' '));
        deps.print(formatMessage(message));
        for (const reply of await app.store.findResponses(message.id)) {
          deps.print(`  ${chalk.dim('->')} ${formatMessage(reply)}`);
        }
      });
    });

  // ── textrouter send ─────────────────────────────────────
  program
    .command('send')
    .description('Send a message to a recipient through the outgoing phase')
    .argument('<backend>', 'Backend to send on')
    .argument('<recipient>', 'Recipient address')
    .argument('<text...>', 'Message text')
    .action(async (backend: string, recipient: string, text: string[]) => {
      await withApp(async (app) => {
        const connection = await app.router.connectionFor(backend, recipient);
        const message = await app.router.sendOutgoing(connection, text.join(' '));
        deps.print(formatMessage(message));
      });
    });

  // ── textrouter mark-sent ────────────────────────────────
  program
    .command('mark-sent')
    .description('Record that the gateway delivered a message')
    .argument('<id>', 'Message id')
    .action(async (rawId: string) => {
      const id = parseMessageId(rawId);
      await withApp(async (app) => {
        deps.print(formatMessage(await app.router.markSent(id)));
      });
    });

  // ── textrouter outbox ───────────────────────────────────
  program
    .command('outbox')
    .description('List messages queued for delivery')
    .action(async () => {
      await withApp(async (app) => {
        await app.router.ensureStarted();
        const outbox = app.router.getOutbox();
        if (outbox.length === 0) {
          deps.print(chalk.dim('Outbox empty'));
          return;
        }
        for (const message of outbox) {
          deps.print(formatMessage(message));
        }
      });
    });

  // ── textrouter flush ────────────────────────────────────
  program
    .command('flush')
    .description('Retry delivery of every queued message')
    .action(async () => {
      await withApp(async (app) => {
        const result = await app.router.flushOutbox();
        deps.print(`Sent ${result.sent}, still queued ${result.queued}`);
      });
    });

  return program;
}

/**
 * Whether `script` (usually `process.argv[1]`) resolves to the module at
 * `moduleUrl`. Installed binaries are symlinks, so both sides are resolved.
 */
export function isEntryPoint(script: string | undefined, moduleUrl: string): boolean {
  if (!script) {
    return false;
  }
  try {
    return realpathSync(script) === realpathSync(fileURLToPath(moduleUrl));
  } catch {
    return false;
  }
}

if (isEntryPoint(process.argv[1], import.meta.url)) {
  createProgram().parseAsync(process.argv).catch((error: unknown) => {
    console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  });
}
