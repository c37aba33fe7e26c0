#!/usr/bin/env node

import { Command } from 'commander';
import { getIrcConfig, getRuntimeConfig } from './core/app-config';
import { buildRegistry, loadTicketTable } from './core/config';
import { SentLog } from './core/db';
import { TicketLinkError, errorMessage } from './core/errors';
import type { TicketRegistry } from './core/registry';
import { MemoryRepeatGuard } from './core/repeat-guard';
import type { OutputFormat, RepeatGuard } from './core/types';
import { TicketBot } from './irc/bot';
import { startServer } from './server';
import { startScheduler } from './server/scheduler';

const program = new Command();

interface GlobalOpts {
  config?: string;
  format?: string;
}

interface ResolveOpts {
  dryRun?: boolean;
}

interface BotOpts {
  db?: string;
  cron?: string;
}

interface ServeOpts {
  port: string;
  host: string;
  db?: string;
  cron?: string;
}

interface SentOpts {
  db?: string;
  limit: string;
}

function globalOpts(): { configPath: string; format: OutputFormat } {
  const opts = program.opts<GlobalOpts>();
  const format = opts.format ?? 'table';
  if (format !== 'table' && format !== 'json') {
    throw new TicketLinkError(`Invalid --format "${format}". Use table or json.`, 'CONFIG_ERROR');
  }
  return {
    configPath: opts.config ?? getRuntimeConfig().ticketTablePath,
    format,
  };
}

function makeRegistry(guard: RepeatGuard = new MemoryRepeatGuard()): TicketRegistry {
  const runtime = getRuntimeConfig();
  const table = loadTicketTable(globalOpts().configPath);
  return buildRegistry(table, {
    guard,
    githubToken: runtime.githubToken,
    gitlabToken: runtime.gitlabToken,
  });
}

function validatePort(value: string): number {
  const port = parseInt(value, 10);
  if (isNaN(port) || port < 1 || port > 65535) {
    throw new TicketLinkError(`Invalid --port value "${value}". Must be 1-65535.`, 'CONFIG_ERROR');
  }
  return port;
}

/** Run a command body; report failures as one line and a non-zero exit */
function run<A extends unknown[]>(fn: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (err) {
      console.error(`❌ ${errorMessage(err)}`);
      process.exit(1);
    }
  };
}

program
  .name('ticketlink')
  .description('Answer ticket references in IRC channels with their titles')
  .version('0.1.0')
  .option('-c, --config <path>', 'Ticket table JSON (default: $TICKETLINK_CONFIG or config/tickets.json)')
  .option('-f, --format <format>', 'Output format: table or json', 'table');

program
  .command('resolve')
  .description('Print the lines the bot would send for a message')
  .argument('<channel>', 'Channel the message was sent to, e.g. "#tor-dev"')
  .argument('<message...>', 'Message text')
  .option('--dry-run', 'Only show detected references; do not look them up')
  .action(run(async (channel: string, message: string[], opts: ResolveOpts) => {
    const { format } = globalOpts();
    const registry = makeRegistry();
    const text = message.join(' ');

    if (opts.dryRun) {
      const matches = registry.preview(channel, text);
      if (format === 'json') {
        console.log(JSON.stringify(matches, null, 2));
        return;
      }
      for (const entry of matches) {
        console.log(`${entry.provider}: ${entry.refs.map(r => r.id).join(', ')}`);
      }
      return;
    }

    const lines = await registry.handleMessage(channel, text);
    if (format === 'json') {
      console.log(JSON.stringify(lines, null, 2));
      return;
    }
    for (const line of lines) console.log(line);
  }));

program
  .command('lookup')
  .description('Look up a single ticket with one provider')
  .argument('<provider>', 'Provider name, e.g. bugs.debian.org')
  .argument('<id>', 'Ticket id')
  .action(run(async (provider: string, id: string) => {
    const { format } = globalOpts();
    const line = await makeRegistry().lookup(provider, id);
    console.log(format === 'json' ? JSON.stringify({ provider, id, line }, null, 2) : line);
  }));

program
  .command('channels')
  .description('Show which providers answer in a channel, or the whole table')
  .argument('[channel]', 'Channel name, e.g. "#munin"')
  .action(run(async (channel: string | undefined) => {
    const { format } = globalOpts();
    const registry = makeRegistry();

    const rows = channel
      ? registry.describeChannel(channel).map(rule => ({
        Provider: rule.provider,
        Binding: rule.channel,
        Pattern: rule.pattern ?? (rule.default ? '(default #NNNN)' : '-'),
        Default: rule.default ? 'yes' : 'no',
      }))
      : registry.list().flatMap(p => [
        ...(p.patternSource ? [{ Provider: p.name, Binding: '*', Pattern: p.patternSource, Default: 'no' }] : []),
        ...p.bindings().map(b => ({
          Provider: p.name,
          Binding: b.channel,
          Pattern: b.pattern?.source ?? (b.default ? '(default #NNNN)' : '-'),
          Default: b.default ? 'yes' : 'no',
        })),
      ]);

    if (format === 'json') {
      console.log(JSON.stringify(rows, null, 2));
    } else {
      console.table(rows);
    }
  }));

program
  .command('bot')
  .description('Connect to IRC and answer ticket references (settings from IRC_* env vars)')
  .option('--db <path>', 'SQLite sent log, so restarts do not repeat answers (default: $TICKETLINK_DB)')
  .option('--cron <expression>', 'Maintenance schedule (default: $TICKETLINK_CRON or every 30 minutes)')
  .action(run(async (opts: BotOpts) => {
    const runtime = getRuntimeConfig();
    const irc = getIrcConfig();
    const dbPath = opts.db ?? runtime.dbPath;
    const sentLog = dbPath ? new SentLog(dbPath) : undefined;
    const registry = makeRegistry(sentLog ?? new MemoryRepeatGuard());

    const bot = new TicketBot(irc, registry);
    const scheduler = startScheduler({ cronExpression: opts.cron ?? runtime.cronExpression, registry });
    await registry.refreshIndexes();
    bot.start();

    const shutdown = () => {
      scheduler.stop();
      bot.stop();
      sentLog?.close();
      setTimeout(() => process.exit(0), 500).unref();
    };
    process.on('SIGTERM', shutdown);
    process.on('SIGINT', shutdown);
  }));

program
  .command('serve')
  .description('Start the HTTP API with scheduled maintenance')
  .option('-p, --port <port>', 'Port to listen on', '8080')
  .option('--host <host>', 'Host to bind to', '127.0.0.1')
  .option('--db <path>', 'SQLite sent log to share with the bot and serve at /api/sent (default: $TICKETLINK_DB)')
  .option('--cron <expression>', 'Maintenance schedule (default: $TICKETLINK_CRON or every 30 minutes)')
  .action(run(async (opts: ServeOpts) => {
    const runtime = getRuntimeConfig();
    const dbPath = opts.db ?? runtime.dbPath;
    const sentLog = dbPath ? new SentLog(dbPath) : undefined;
    await startServer({
      port: validatePort(opts.port),
      host: opts.host,
      registry: makeRegistry(sentLog ?? new MemoryRepeatGuard()),
      sentLog,
      cronExpression: opts.cron ?? runtime.cronExpression,
    });
  }));

program
  .command('sent')
  .description('Show the most recent replies recorded in the sent log')
  .option('--db <path>', 'SQLite sent log (default: $TICKETLINK_DB)')
  .option('-n, --limit <count>', 'How many replies to show', '20')
  .action(run(async (opts: SentOpts) => {
    const { format } = globalOpts();
    const dbPath = opts.db ?? getRuntimeConfig().dbPath;
    if (!dbPath) {
      throw new TicketLinkError('No sent log: pass --db or set TICKETLINK_DB', 'CONFIG_ERROR');
    }
    const limit = parseInt(opts.limit, 10);
    if (isNaN(limit) || limit < 1) {
      throw new TicketLinkError(`Invalid --limit value "${opts.limit}". Must be a positive number.`, 'CONFIG_ERROR');
    }

    const sentLog = new SentLog(dbPath);
    try {
      const entries = sentLog.recent(limit);
      if (format === 'json') {
        console.log(JSON.stringify(entries, null, 2));
        return;
      }
      console.table(entries.map(e => ({
        Provider: e.provider,
        Channel: e.target,
        Ticket: e.ticketId,
        'Sent at': new Date(e.sentAt).toISOString(),
      })));
    } finally {
      sentLog.close();
    }
  }));

program.parseAsync(process.argv).catch(err => {
  console.error(`❌ ${errorMessage(err)}`);
  process.exit(1);
});
