import type { Command } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { DocumentCommandOptions } from '../../interfaces/command';
import { readSignedDocument } from '../../services/document-io';
import { resolveDocumentKind } from '../../services/document-types';

/**
 * InspectCommand - shows a signed document and its signers without verifying anything.
 */
export class InspectCommand extends BaseCommand<DocumentCommandOptions> {
  register(program: Command): void {
    this.withOutputOptions(
      program
        .command('inspect <signed>')
        .description('Show the signatures on a document without verifying them')
        .requiredOption('-t, --type <type>', 'Document type (link, targets)')
    ).action(async (signedPath: string, options: DocumentCommandOptions) => {
      await this.execute(signedPath, options);
    });
  }

  async execute(signedPath: string, options: DocumentCommandOptions): Promise<void> {
    await this.run(options, async () => {
      const { name, format } = resolveDocumentKind(options.type);
      const signed = await readSignedDocument(signedPath, format);
      const version = format.type.version(signed.assumeValid());

      if (options.json) {
        this.handleSuccess(
          { type: name, version, signatures: signed.keyIds(), signed: signed.signed },
          options
        );
        return;
      }
      if (options.quiet) {
        return;
      }

      console.log(`📄 ${signedPath} (${name}, version ${version})`);
      console.log(`🔏 Signatures (unverified): ${signed.signatures.length}`);
      for (const keyId of signed.keyIds()) {
        console.log(`  • ${keyId}`);
      }
      console.log(format.interchange.pretty(signed.signed));
    });
  }
}
