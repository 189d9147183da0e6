import { InvalidArgumentError } from 'commander';
import { DEFAULT_HOST, DEFAULT_PORT, logLevelsFor, parseCli, parsePort, resolveHost } from './cli';

describe('parseCli', () => {
  it('uses defaults without arguments or env vars', () => {
    expect(parseCli([], {})).toEqual({ port: DEFAULT_PORT, log: 'info', version: false });
  });

  it('reads host, port and log level from env vars', () => {
    expect(parseCli([], { HOST: '0.0.0.0', PORT: '8080', LOG_LEVEL: 'debug' })).toEqual({
      host: '0.0.0.0',
      port: 8080,
      log: 'debug',
      version: false,
    });
  });

  it('lets flags override env vars', () => {
    const options = parseCli(['--host', '10.0.0.1', '-p', '4000', '--log', 'warn'], { HOST: '0.0.0.0', PORT: '8080' });
    expect(options).toEqual({ host: '10.0.0.1', port: 4000, log: 'warn', version: false });
  });

  it('parses the version flag', () => {
    expect(parseCli(['-v'], {}).version).toBe(true);
    expect(parseCli(['--version'], {}).version).toBe(true);
  });

  it('ignores an unknown LOG_LEVEL', () => {
    expect(parseCli([], { LOG_LEVEL: 'loud' }).log).toBe('info');
  });
});

describe('parsePort', () => {
  it('accepts valid ports', () => {
    expect(parsePort('0')).toBe(0);
    expect(parsePort('65535')).toBe(65535);
  });

  it.each(['-1', '65536', '3.5', 'http'])('rejects %s', (value) => {
    expect(() => parsePort(value)).toThrow(InvalidArgumentError);
  });
});

describe('resolveHost', () => {
  it('listens on localhost when no host is given', () => {
    expect(resolveHost(undefined)).toBe(DEFAULT_HOST);
    expect(resolveHost(parseCli([], { HOST: '' }).host)).toBe(DEFAULT_HOST);
  });

  it('listens on all interfaces for an explicitly empty host', () => {
    const options = parseCli(['--host', ''], {});
    expect(options.host).toBe('');
    expect(resolveHost(options.host)).toBe('0.0.0.0');
  });

  it('keeps valid IP addresses', () => {
    expect(resolveHost('0.0.0.0')).toBe('0.0.0.0');
    expect(resolveHost('::1')).toBe('::1');
  });

  it('listens on all interfaces for a value that is not an IP address', () => {
    expect(resolveHost('not-an-ip')).toBe('0.0.0.0');
  });
});

describe('logLevelsFor', () => {
  it('includes more severe levels only', () => {
    expect(logLevelsFor('warn')).toEqual(['warn', 'error', 'fatal']);
    expect(logLevelsFor('info')).toEqual(['log', 'warn', 'error', 'fatal']);
    expect(logLevelsFor('trace')).toContain('verbose');
  });
});
