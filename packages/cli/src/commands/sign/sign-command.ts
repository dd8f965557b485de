import * as path from 'path';
import type { Command } from 'commander';
import { IllegalArgumentError, SignedMetadataBuilder } from '@metablock/core';
import { BaseCommand } from '../../base/base-command';
import type { DocumentCommandOptions } from '../../interfaces/command';
import { readPlainDocument, readPrivateKey, writeContents } from '../../services/document-io';
import { resolveDocumentKind } from '../../services/document-types';

export interface SignCommandOptions extends DocumentCommandOptions {
  key: string[];
  out?: string;
}

/**
 * SignCommand - signs a plain document and writes the signed envelope.
 *
 * Without --out, links go to `<metadataDir>/<name>.<keyid prefix>.link`
 * and other documents to `<metadataDir>/<source file name>`.
 */
export class SignCommand extends BaseCommand<SignCommandOptions> {
  register(program: Command): void {
    this.withOutputOptions(
      program
        .command('sign <document>')
        .description('Sign a document with one or more private keys')
        .requiredOption('-t, --type <type>', 'Document type (link, targets)')
        .requiredOption('-k, --key <paths...>', 'PKCS#8 PEM private key files')
        .option('-o, --out <path>', 'Output file for the signed document')
    ).action(async (document: string, options: SignCommandOptions) => {
      await this.execute(document, options);
    });
  }

  async execute(document: string, options: SignCommandOptions): Promise<void> {
    await this.run(options, async () => {
      const kind = resolveDocumentKind(options.type);
      const keys = await Promise.all(options.key.map(readPrivateKey));
      const [firstKey] = keys;
      if (!firstKey) {
        throw new IllegalArgumentError('At least one --key is required');
      }

      const raw = await readPlainDocument(document);
      let builder = SignedMetadataBuilder.fromRawMetadata(raw, kind.format);
      for (const key of keys) {
        builder = builder.sign(key);
      }
      const signed = builder.build();

      const out = options.out ?? await this.defaultOutput(kind.defaultFilename(raw, firstKey.keyId, document));
      await writeContents(out, signed.toRaw().bytes);
      this.logger.debug(`Signed ${document} as ${kind.name} with ${signed.keyIds().join(', ')}`);

      this.handleSuccess(
        { path: out, signatures: signed.keyIds() },
        options,
        `Signed ${document} with ${keys.length} key(s): ${out}`
      );
    });
  }

  private async defaultOutput(filename: string): Promise<string> {
    const configManager = await this.dependencyService.getConfigManager();
    const metadataDir = this.dependencyService.resolveProjectPath(await configManager.getMetadataDir());
    return path.join(metadataDir, filename);
  }
}
