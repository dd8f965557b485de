import { InvalidArgumentError } from 'commander';
import type { Command } from 'commander';
import { collectVerificationEvents, defaultVerificationObserver } from '@metablock/core';
import { BaseCommand } from '../../base/base-command';
import type { DocumentCommandOptions } from '../../interfaces/command';
import { readPublicKey, readSignedDocument } from '../../services/document-io';
import { resolveDocumentKind } from '../../services/document-types';

export interface VerifyCommandOptions extends DocumentCommandOptions {
  key: string[];
  threshold?: number;
}

export function parseThreshold(value: string): number {
  const threshold = Number(value);
  if (!Number.isInteger(threshold)) {
    throw new InvalidArgumentError('Threshold must be an integer.');
  }
  return threshold;
}

/**
 * VerifyCommand - checks a signature threshold against a set of public keys.
 * Exits with status 1 when verification fails.
 */
export class VerifyCommand extends BaseCommand<VerifyCommandOptions> {
  register(program: Command): void {
    this.withOutputOptions(
      program
        .command('verify <signed>')
        .description('Verify that enough authorized keys signed a document')
        .requiredOption('-t, --type <type>', 'Document type (link, targets)')
        .requiredOption('-k, --key <paths...>', 'Authorized public key files (.pub.json)')
        .option('--threshold <n>', 'Signatures required (default: threshold from config)', parseThreshold)
    ).action(async (signedPath: string, options: VerifyCommandOptions) => {
      await this.execute(signedPath, options);
    });
  }

  async execute(signedPath: string, options: VerifyCommandOptions): Promise<void> {
    await this.run(options, async () => {
      const { name, format } = resolveDocumentKind(options.type);
      const configManager = await this.dependencyService.getConfigManager();
      const threshold = options.threshold ?? await configManager.getThreshold();

      const [signed, keys] = await Promise.all([
        readSignedDocument(signedPath, format),
        Promise.all(options.key.map(readPublicKey)),
      ]);

      const { observer, events } = collectVerificationEvents();
      const document = signed.verify(threshold, keys, (event) => {
        observer(event);
        defaultVerificationObserver(event);
      });

      const goodKeys = events.flatMap(event => event.kind === 'good_signature' ? [event.keyId] : []);
      this.handleSuccess(
        document,
        options,
        `Verified ${signedPath} (${name}): ${goodKeys.length}/${threshold} signatures from ${goodKeys.join(', ')}`
      );
    });
  }
}
