import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Logger } from '@nestjs/common';
import { FILE_CONFIG_NAME, FileConfig, fileConfigPaths, loadFileConfig } from './file.config';

describe('loadFileConfig', () => {
  let dir: string;
  let warnSpy: jest.SpyInstance;
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'item-api-config-'));
    warnSpy = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    logSpy = jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    warnSpy.mockRestore();
    logSpy.mockRestore();
  });

  function write(name: string, content: string): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content);
    return file;
  }

  it('looks in the working directory before the home config directory', () => {
    expect(fileConfigPaths('/work', '/home/user')).toEqual([
      path.join('/work', FILE_CONFIG_NAME),
      path.join('/home/user', '.config', FILE_CONFIG_NAME),
    ]);
  });

  it('returns defaults when no file exists', () => {
    expect(loadFileConfig([path.join(dir, 'missing.json')])).toEqual(new FileConfig());
    expect(new FileConfig()).toEqual({ periodic_store_log_enabled: false, periodic_store_log_interval: 60 });
  });

  it('reads the first existing file', () => {
    const second = write('second.json', JSON.stringify({ periodic_store_log_enabled: true, periodic_store_log_interval: 5 }));
    const config = loadFileConfig([path.join(dir, 'missing.json'), second]);
    expect(config.periodic_store_log_enabled).toBe(true);
    expect(config.periodic_store_log_interval).toBe(5);
  });

  it('keeps defaults for fields the file leaves out', () => {
    const file = write('partial.json', JSON.stringify({ periodic_store_log_enabled: true }));
    expect(loadFileConfig([file])).toEqual({ periodic_store_log_enabled: true, periodic_store_log_interval: 60 });
  });

  it('falls back to defaults for malformed JSON', () => {
    const file = write('broken.json', '{ "periodic_store_log_enabled": ');
    expect(loadFileConfig([file])).toEqual(new FileConfig());
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it('falls back to defaults for invalid values', () => {
    const file = write('invalid.json', JSON.stringify({ periodic_store_log_interval: 0 }));
    expect(loadFileConfig([file])).toEqual(new FileConfig());
    expect(warnSpy).toHaveBeenCalledWith(`Ignoring invalid config file ${file}: periodic_store_log_interval`);
  });

  it('falls back to defaults when the file is not an object', () => {
    const file = write('array.json', '[1, 2]');
    expect(loadFileConfig([file])).toEqual(new FileConfig());
  });
});
