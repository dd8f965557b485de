/**
 * FsConfigStore Unit Tests
 *
 * Tests FsConfigStore with mocked filesystem.
 */

import { FsConfigStore, createConfigManager } from './fs_config_store';
import type { MetablockConfig } from '../../config_manager';
import { setDefaultLogLevel } from '../../logger';

jest.mock('fs', () => ({
  promises: {
    readFile: jest.fn(),
    writeFile: jest.fn(),
  },
  existsSync: jest.fn(),
}));

import { promises as fs } from 'fs';
import { existsSync } from 'fs';

const mockedFs = jest.mocked(fs);
const mockedExistsSync = jest.mocked(existsSync);

describe('FsConfigStore', () => {
  const projectRoot = '/test/project';

  beforeEach(() => {
    jest.clearAllMocks();
    FsConfigStore.resetCache();
  });

  afterEach(() => {
    setDefaultLogLevel(null);
  });

  describe('loadConfig', () => {
    it('should return the config for a valid file', async () => {
      const store = new FsConfigStore(projectRoot);
      const config: MetablockConfig = { threshold: 2, keysDir: 'secrets', logLevel: 'debug' };
      mockedFs.readFile.mockResolvedValue(JSON.stringify(config));

      const result = await store.loadConfig();

      expect(result).toEqual(config);
      expect(mockedFs.readFile).toHaveBeenCalledWith('/test/project/metablock.config.json', 'utf-8');
    });

    it('should return null for a missing file', async () => {
      const store = new FsConfigStore(projectRoot);
      mockedFs.readFile.mockRejectedValue(new Error('ENOENT: no such file'));

      await expect(store.loadConfig()).resolves.toBeNull();
    });

    it('should return null for invalid JSON', async () => {
      const store = new FsConfigStore(projectRoot);
      mockedFs.readFile.mockResolvedValue('{ invalid json }');

      await expect(store.loadConfig()).resolves.toBeNull();
    });

    it('should warn and return null for a config that fails the schema', async () => {
      setDefaultLogLevel('warn');
      const warnSpy = jest.spyOn(console, 'warn').mockImplementation();
      const store = new FsConfigStore(projectRoot);
      mockedFs.readFile.mockResolvedValue('{"threshold": 0}');

      const result = await store.loadConfig();

      expect(result).toBeNull();
      expect(warnSpy).toHaveBeenCalledWith(
        '[Config] Ignoring /test/project/metablock.config.json: /threshold must be >= 1'
      );
      warnSpy.mockRestore();
    });
  });

  describe('saveConfig', () => {
    it('should write pretty-printed JSON to metablock.config.json', async () => {
      const store = new FsConfigStore(projectRoot);
      const config: MetablockConfig = { threshold: 3 };
      mockedFs.writeFile.mockResolvedValue();

      await store.saveConfig(config);

      expect(mockedFs.writeFile).toHaveBeenCalledWith(
        '/test/project/metablock.config.json',
        '{\n  "threshold": 3\n}',
        'utf-8'
      );
    });
  });

  describe('findProjectRoot', () => {
    it('should find the nearest directory holding the config file', () => {
      mockedExistsSync.mockImplementation((p) => p === '/test/project/metablock.config.json');

      expect(FsConfigStore.findProjectRoot('/test/project/src/deep')).toBe('/test/project');
    });

    it('should return null when no directory holds the config file', () => {
      mockedExistsSync.mockReturnValue(false);

      expect(FsConfigStore.findProjectRoot('/some/random/path')).toBeNull();
      expect(mockedExistsSync).toHaveBeenCalledWith('/metablock.config.json');
    });

    it('should cache the result for the same start path', () => {
      mockedExistsSync.mockImplementation((p) => p === '/test/project/metablock.config.json');

      FsConfigStore.findProjectRoot('/test/project/src');
      FsConfigStore.findProjectRoot('/test/project/src');

      const lookups = mockedExistsSync.mock.calls.filter(
        ([p]) => p === '/test/project/metablock.config.json'
      );
      expect(lookups).toHaveLength(1);
    });

    it('should search again from a different start path', () => {
      mockedExistsSync.mockImplementation(
        (p) => p === '/test/project/metablock.config.json' || p === '/other/project/metablock.config.json'
      );

      expect(FsConfigStore.findProjectRoot('/test/project/src')).toBe('/test/project');
      expect(FsConfigStore.findProjectRoot('/other/project/src')).toBe('/other/project');
    });
  });

  describe('createConfigManager', () => {
    it('should read the config from the given root', async () => {
      mockedFs.readFile.mockResolvedValue('{"metadataDir": "signed"}');

      const manager = createConfigManager('/explicit/root');

      await expect(manager.getMetadataDir()).resolves.toBe('signed');
      expect(mockedFs.readFile).toHaveBeenCalledWith('/explicit/root/metablock.config.json', 'utf-8');
    });
  });
});
