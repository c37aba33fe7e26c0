/**
 * Runtime configuration from the environment
 *
 * The ticket table says what to answer; these settings say where the bot
 * connects and which credentials the trackers get.
 *
 *   TICKETLINK_CONFIG   ticket table JSON (default: config/tickets.json)
 *   TICKETLINK_DB       SQLite sent log (default: in-memory)
 *   TICKETLINK_CRON     index refresh / prune schedule (default: every 30 min)
 *   GITHUB_TOKEN, GITLAB_TOKEN
 *   IRC_SERVER, IRC_PORT, IRC_TLS, IRC_NICK, IRC_CHANNELS,
 *   IRC_PASSWORD, IRC_USERNAME, IRC_REALNAME
 */

import { DEFAULT_TICKET_TABLE } from './config';
import { ConfigError } from './errors';

export const DEFAULT_CRON = '*/30 * * * *';

export interface IrcConfig {
  host: string;
  port: number;
  tls: boolean;
  nick: string;
  channels: string[];
  password?: string;
  username?: string;
  realname?: string;
}

export interface RuntimeConfig {
  ticketTablePath: string;
  dbPath?: string;
  cronExpression: string;
  githubToken?: string;
  gitlabToken?: string;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

export function getRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  return {
    ticketTablePath: nonEmpty(env.TICKETLINK_CONFIG) ?? DEFAULT_TICKET_TABLE,
    dbPath: nonEmpty(env.TICKETLINK_DB),
    cronExpression: nonEmpty(env.TICKETLINK_CRON) ?? DEFAULT_CRON,
    githubToken: nonEmpty(env.GITHUB_TOKEN),
    gitlabToken: nonEmpty(env.GITLAB_TOKEN),
  };
}

/**
 * Load IRC connection settings from the environment
 * Throws ConfigError when IRC_SERVER or IRC_NICK is missing or IRC_PORT is not a port
 */
export function getIrcConfig(env: NodeJS.ProcessEnv = process.env): IrcConfig {
  const { valid, errors } = validateConfig(env);
  if (!valid) {
    throw new ConfigError('Invalid IRC settings', errors);
  }

  const tls = parseBoolean(env.IRC_TLS, true);
  const port = nonEmpty(env.IRC_PORT);

  return {
    host: nonEmpty(env.IRC_SERVER) ?? '',
    port: port ? parseInt(port, 10) : tls ? 6697 : 6667,
    tls,
    nick: nonEmpty(env.IRC_NICK) ?? '',
    channels: (env.IRC_CHANNELS ?? '')
      .split(',')
      .map(c => c.trim())
      .filter(c => c.length > 0),
    password: nonEmpty(env.IRC_PASSWORD),
    username: nonEmpty(env.IRC_USERNAME),
    realname: nonEmpty(env.IRC_REALNAME),
  };
}

/**
 * Validate that everything the IRC bot needs is present
 */
export function validateConfig(env: NodeJS.ProcessEnv = process.env): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!nonEmpty(env.IRC_SERVER)) {
    errors.push('IRC_SERVER environment variable is required');
  }
  if (!nonEmpty(env.IRC_NICK)) {
    errors.push('IRC_NICK environment variable is required');
  }

  const port = nonEmpty(env.IRC_PORT);
  if (port !== undefined) {
    const parsed = Number(port);
    if (!Number.isInteger(parsed) || parsed < 1 || parsed > 65535) {
      errors.push('IRC_PORT must be a number between 1 and 65535');
    }
  }

  for (const channel of (env.IRC_CHANNELS ?? '').split(',').map(c => c.trim()).filter(Boolean)) {
    if (!/^[#&]/.test(channel)) {
      errors.push(`IRC_CHANNELS entry "${channel}" must start with # or &`);
    }
  }

  return { valid: errors.length === 0, errors };
}
