jest.mock('@metablock/core/fs', () => ({
  FsConfigStore: {
    findProjectRoot: jest.fn()
  },
  createConfigManager: jest.fn()
}));

import { FsConfigStore, createConfigManager } from '@metablock/core/fs';
import { DependencyInjectionService } from './dependency-injection';

const mockedFindProjectRoot = jest.mocked(FsConfigStore.findProjectRoot);
const mockedCreateConfigManager = jest.mocked(createConfigManager);

describe('DependencyInjectionService', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    DependencyInjectionService.reset();
  });

  it('should return a single shared instance', () => {
    expect(DependencyInjectionService.getInstance()).toBe(DependencyInjectionService.getInstance());
  });

  it('should build the config manager once, on the discovered project root', async () => {
    mockedFindProjectRoot.mockReturnValue('/repo');
    const manager = { getThreshold: jest.fn() };
    mockedCreateConfigManager.mockReturnValue(manager as unknown as ReturnType<typeof createConfigManager>);
    const service = DependencyInjectionService.getInstance();

    await expect(service.getConfigManager()).resolves.toBe(manager);
    await service.getConfigManager();

    expect(mockedCreateConfigManager).toHaveBeenCalledTimes(1);
    expect(mockedCreateConfigManager).toHaveBeenCalledWith('/repo');
  });

  it('should fall back to the working directory outside a project', () => {
    mockedFindProjectRoot.mockReturnValue(null);

    expect(DependencyInjectionService.getInstance().getProjectRoot()).toBe(process.cwd());
  });

  it('should resolve configured directories against the project root', () => {
    mockedFindProjectRoot.mockReturnValue('/repo');

    expect(DependencyInjectionService.getInstance().resolveProjectPath('keys')).toBe('/repo/keys');
    expect(DependencyInjectionService.getInstance().resolveProjectPath('/abs/keys')).toBe('/abs/keys');
  });
});
