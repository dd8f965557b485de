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
import { JsonLink, PrivateKey, RawSignedMetadata } from '@metablock/core';
import { DependencyInjectionService } from '../../services/dependency-injection';
import { SignCommand } from './sign-command';

const mockedFs = jest.mocked(fs);
const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation();
const mockProcessExit = jest.spyOn(process, 'exit').mockImplementation();

const LINK_DOCUMENT = JSON.stringify({
  _type: 'link',
  name: 'build',
  materials: { 'src/main.c': { sha256: 'ab'.repeat(32) } },
  products: {},
});

describe('SignCommand', () => {
  const mockFiles = new Map<string, Buffer>();
  let alice: PrivateKey;
  let bob: PrivateKey;
  let signCommand: SignCommand;

  beforeAll(async () => {
    [alice, bob] = await Promise.all([PrivateKey.generate(), PrivateKey.generate()]);
  });

  beforeEach(() => {
    jest.clearAllMocks();
    mockFiles.clear();
    mockFiles.set('/work/build.json', Buffer.from(LINK_DOCUMENT));
    mockFiles.set('/keys/alice.pem', Buffer.from(alice.toPkcs8Pem()));
    mockFiles.set('/keys/bob.pem', Buffer.from(bob.toPkcs8Pem()));

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

    jest.mocked(DependencyInjectionService.getInstance).mockReturnValue({
      getConfigManager: jest.fn().mockResolvedValue({ getMetadataDir: jest.fn().mockResolvedValue('metadata') }),
      resolveProjectPath: (relative: string) => `/project/${relative}`,
    } as unknown as DependencyInjectionService);

    signCommand = new SignCommand();
  });

  function readSigned(file: string) {
    const bytes = mockFiles.get(file);
    if (!bytes) throw new Error(`${file} was not written`);
    return new RawSignedMetadata(bytes, JsonLink).parse();
  }

  it('should write a link under its conventional name in the metadata directory', async () => {
    await signCommand.execute('/work/build.json', { type: 'link', key: ['/keys/alice.pem'] });

    const out = `/project/metadata/build.${alice.keyId.slice(0, 8)}.link`;
    const signed = readSigned(out);
    expect(signed.keyIds()).toEqual([alice.keyId]);
    expect(signed.verify(1, [alice.publicKey]).name).toBe('build');
    expect(mockConsoleLog).toHaveBeenCalledWith(`✅ Signed /work/build.json with 1 key(s): ${out}`);
    expect(mockProcessExit).not.toHaveBeenCalled();
  });

  it('should sign with every key given, sorted by key ID', async () => {
    await signCommand.execute('/work/build.json', {
      type: 'link',
      key: ['/keys/bob.pem', '/keys/alice.pem'],
      out: '/out/build.link',
    });

    const signed = readSigned('/out/build.link');
    expect(signed.keyIds()).toEqual([alice.keyId, bob.keyId].sort());
    expect(signed.verify(2, [alice.publicKey, bob.publicKey]).name).toBe('build');
  });

  it('should print the output path and signers as JSON', async () => {
    await signCommand.execute('/work/build.json', {
      type: 'link',
      key: ['/keys/alice.pem'],
      out: '/out/build.link',
      json: true,
    });

    expect(JSON.parse(String(mockConsoleLog.mock.calls[0]?.[0]))).toEqual({
      success: true,
      data: { path: '/out/build.link', signatures: [alice.keyId] },
    });
  });

  it('should reject an unknown document type', async () => {
    await signCommand.execute('/work/build.json', { type: 'layout', key: ['/keys/alice.pem'] });

    expect(mockConsoleError).toHaveBeenCalledWith(
      '❌ Unknown document type "layout". Expected one of: link, targets'
    );
    expect(mockProcessExit).toHaveBeenCalledWith(1);
  });

  it('should refuse a document that does not match its type', async () => {
    await signCommand.execute('/work/build.json', { type: 'targets', key: ['/keys/alice.pem'] });

    expect(mockConsoleError).toHaveBeenCalledWith(expect.stringMatching(/^❌ Targets validation failed: /));
    expect(mockedFs.writeFile).not.toHaveBeenCalled();
    expect(mockProcessExit).toHaveBeenCalledWith(1);
  });

  it('should fail on a missing key file', async () => {
    await signCommand.execute('/work/build.json', { type: 'link', key: ['/keys/missing.pem'] });

    expect(mockConsoleError).toHaveBeenCalledWith(
      "❌ ENOENT: no such file or directory, open '/keys/missing.pem'"
    );
    expect(mockProcessExit).toHaveBeenCalledWith(1);
  });
});
