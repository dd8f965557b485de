jest.mock('fs', () => ({
  promises: {
    readFile: jest.fn(),
    writeFile: jest.fn(),
    mkdir: jest.fn(),
  },
}));

jest.mock('../../services/dependency-injection', () => ({
  DependencyInjectionService: {
    getInstance: jest.fn()
  }
}));

import { promises as fs } from 'fs';
import { JsonLink, LinkMetadataBuilder, PrivateKey, RawSignedMetadata, SignedMetadata } from '@metablock/core';
import { DependencyInjectionService } from '../../services/dependency-injection';
import { MergeCommand } from './merge-command';

const mockedFs = jest.mocked(fs);
const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation();
const mockProcessExit = jest.spyOn(process, 'exit').mockImplementation();

describe('MergeCommand', () => {
  const mockFiles = new Map<string, Buffer>();
  const link = new LinkMetadataBuilder().name('build').build();
  let alice: PrivateKey;
  let bob: PrivateKey;
  let mergeCommand: MergeCommand;

  beforeAll(async () => {
    [alice, bob] = await Promise.all([PrivateKey.generate(), PrivateKey.generate()]);
  });

  beforeEach(() => {
    jest.clearAllMocks();
    mockFiles.clear();
    mockFiles.set('/m/alice.link', Buffer.from(SignedMetadata.create(link, alice, JsonLink).toRaw().bytes));
    mockFiles.set('/m/bob.link', Buffer.from(SignedMetadata.create(link, bob, JsonLink).toRaw().bytes));

    mockedFs.mkdir.mockResolvedValue(undefined);
    mockedFs.readFile.mockImplementation(async (file) => {
      const content = mockFiles.get(String(file));
      if (!content) {
        throw new Error(`ENOENT: no such file or directory, open '${String(file)}'`);
      }
      return content;
    });
    mockedFs.writeFile.mockImplementation(async (file, data) => {
      mockFiles.set(String(file), data instanceof Uint8Array ? Buffer.from(data) : Buffer.from(String(data)));
    });

    jest.mocked(DependencyInjectionService.getInstance).mockReturnValue(
      {} as unknown as DependencyInjectionService
    );

    mergeCommand = new MergeCommand();
  });

  function readSigned(file: string) {
    const bytes = mockFiles.get(file);
    if (!bytes) throw new Error(`${file} was not written`);
    return new RawSignedMetadata(bytes, JsonLink).parse();
  }

  it('should append the second file signatures and overwrite the first file', async () => {
    await mergeCommand.execute('/m/alice.link', '/m/bob.link', { type: 'link' });

    const merged = readSigned('/m/alice.link');
    expect(merged.keyIds()).toEqual([alice.keyId, bob.keyId]);
    expect(merged.verify(2, [alice.publicKey, bob.publicKey])).toEqual(link);
    expect(mockConsoleLog).toHaveBeenCalledWith('✅ Merged 1 signature(s) into /m/alice.link');
  });

  it('should write to --out and leave the inputs alone', async () => {
    const before = mockFiles.get('/m/alice.link');

    await mergeCommand.execute('/m/alice.link', '/m/bob.link', { type: 'link', out: '/m/both.link' });

    expect(mockFiles.get('/m/alice.link')).toBe(before);
    expect(readSigned('/m/both.link').keyIds()).toEqual([alice.keyId, bob.keyId]);
  });

  it('should add nothing when both files carry the same signer', async () => {
    await mergeCommand.execute('/m/alice.link', '/m/alice.link', { type: 'link', out: '/m/same.link' });

    expect(readSigned('/m/same.link').keyIds()).toEqual([alice.keyId]);
    expect(mockConsoleLog).toHaveBeenCalledWith('✅ Merged 0 signature(s) into /m/same.link');
  });

  it('should refuse to merge different documents', async () => {
    const other = new LinkMetadataBuilder().name('test').build();
    mockFiles.set('/m/other.link', Buffer.from(SignedMetadata.create(other, bob, JsonLink).toRaw().bytes));

    await mergeCommand.execute('/m/alice.link', '/m/other.link', { type: 'link' });

    expect(mockConsoleError).toHaveBeenCalledWith('❌ Attempted to merge unequal metadata');
    expect(mockProcessExit).toHaveBeenCalledWith(1);
    expect(mockedFs.writeFile).not.toHaveBeenCalled();
  });
});
