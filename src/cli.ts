// File overview:
// - Purpose: Command line parsing for the server entrypoint.
// - Flags: --host <ip> (env HOST), -p/--port <port> (env PORT), -l/--log <level> (env LOG_LEVEL), -v/--version.
// - Provides: host resolution and the mapping from CLI log level to Nest log levels.
import { isIP } from 'net';
import { LogLevel } from '@nestjs/common';
import { Command, InvalidArgumentError, Option } from 'commander';
import { CliLogLevel, LOG_LEVELS } from './config/env.validation';

export const DEFAULT_PORT = 3000;
export const DEFAULT_HOST = '127.0.0.1';
const ANY_HOST = '0.0.0.0';

export interface CliOptions {
  host?: string;
  port: number;
  log: CliLogLevel;
  version: boolean;
}

export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError(`Not a valid port number: ${value}`);
  }
  return port;
}

function isCliLogLevel(value: string | undefined): value is CliLogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createProgram(env: NodeJS.ProcessEnv = process.env): Command {
  const defaultLog: CliLogLevel = isCliLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : 'info';
  return new Command()
    .name('item-api')
    .description('Item API server')
    .option('--host <ip>', 'Host IP to listen to (for example "0.0.0.0")', env.HOST || undefined)
    .option('-p, --port <port>', 'Port number to use', parsePort, env.PORT ? parsePort(env.PORT) : DEFAULT_PORT)
    .addOption(new Option('-l, --log <level>', 'Log level to use').choices(LOG_LEVELS).default(defaultLog))
    .option('-v, --version', 'Print version info and exit', false);
}

/** Parse user arguments (without the node and script entries). */
export function parseCli(args: string[], env: NodeJS.ProcessEnv = process.env): CliOptions {
  const program = createProgram(env).parse(args, { from: 'user' });
  return program.opts<CliOptions>();
}

/** Missing host listens on localhost; a host that is not an IP address listens on all interfaces. */
export function resolveHost(host: string | undefined): string {
  if (host === undefined) return DEFAULT_HOST;
  return isIP(host) ? host : ANY_HOST;
}

const NEST_LEVELS: Record<CliLogLevel, LogLevel[]> = {
  trace: ['verbose', 'debug', 'log', 'warn', 'error', 'fatal'],
  debug: ['debug', 'log', 'warn', 'error', 'fatal'],
  info: ['log', 'warn', 'error', 'fatal'],
  warn: ['warn', 'error', 'fatal'],
  error: ['error', 'fatal'],
};

export function logLevelsFor(level: CliLogLevel): LogLevel[] {
  return NEST_LEVELS[level];
}
