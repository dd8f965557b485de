jest.mock('fs', () => ({
  promises: {
    readFile: jest.fn(),
  },
}));

jest.mock('../../services/dependency-injection', () => ({
  DependencyInjectionService: {
    getInstance: jest.fn()
  }
}));

import { promises as fs } from 'fs';
import { JsonTargets, PrivateKey, SignedMetadata, createTargetsMetadata, describeTarget } from '@metablock/core';
import { DependencyInjectionService } from '../../services/dependency-injection';
import { InspectCommand } from './inspect-command';

const mockedFs = jest.mocked(fs);
const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation();
const mockProcessExit = jest.spyOn(process, 'exit').mockImplementation();

describe('InspectCommand', () => {
  const targets = createTargetsMetadata(4, new Date('2030-01-01T00:00:00Z'), {
    'app.tgz': describeTarget(new TextEncoder().encode('abc')),
  });
  let alice: PrivateKey;
  let inspectCommand: InspectCommand;

  beforeAll(async () => {
    alice = await PrivateKey.generate();
  });

  beforeEach(() => {
    jest.clearAllMocks();
    const bytes = Buffer.from(SignedMetadata.create(targets, alice, JsonTargets).toRaw().bytes);
    mockedFs.readFile.mockImplementation(async (file) => {
      if (String(file) !== '/m/targets.json') {
        throw new Error(`ENOENT: no such file or directory, open '${String(file)}'`);
      }
      return bytes;
    });
    jest.mocked(DependencyInjectionService.getInstance).mockReturnValue(
      {} as unknown as DependencyInjectionService
    );

    inspectCommand = new InspectCommand();
  });

  it('should list signers without verifying', async () => {
    await inspectCommand.execute('/m/targets.json', { type: 'targets' });

    expect(mockConsoleLog).toHaveBeenCalledWith('📄 /m/targets.json (targets, version 4)');
    expect(mockConsoleLog).toHaveBeenCalledWith('🔏 Signatures (unverified): 1');
    expect(mockConsoleLog).toHaveBeenCalledWith(`  • ${alice.keyId}`);
    expect(mockProcessExit).not.toHaveBeenCalled();
  });

  it('should report type, version, signers and document as JSON', async () => {
    await inspectCommand.execute('/m/targets.json', { type: 'targets', json: true });

    expect(JSON.parse(String(mockConsoleLog.mock.calls[0]?.[0]))).toEqual({
      success: true,
      data: {
        type: 'targets',
        version: 4,
        signatures: [alice.keyId],
        signed: {
          _type: 'targets',
          version: 4,
          expires: '2030-01-01T00:00:00Z',
          targets: { 'app.tgz': describeTarget(new TextEncoder().encode('abc')) },
        },
      },
    });
  });

  it('should print nothing with --quiet', async () => {
    await inspectCommand.execute('/m/targets.json', { type: 'targets', quiet: true });

    expect(mockConsoleLog).not.toHaveBeenCalled();
  });

  it('should fail when the document does not match the type', async () => {
    await inspectCommand.execute('/m/targets.json', { type: 'link' });

    expect(mockConsoleError).toHaveBeenCalledWith(expect.stringMatching(/^❌ Link validation failed: /));
    expect(mockProcessExit).toHaveBeenCalledWith(1);
  });
});
