import type { Command } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { DocumentCommandOptions } from '../../interfaces/command';
import { readSignedDocument, writeContents } from '../../services/document-io';
import { resolveDocumentKind } from '../../services/document-types';

export interface MergeCommandOptions extends DocumentCommandOptions {
  out?: string;
}

/**
 * MergeCommand - combines the signatures of two copies of the same document.
 * The result replaces the first file unless --out is given.
 */
export class MergeCommand extends BaseCommand<MergeCommandOptions> {
  register(program: Command): void {
    this.withOutputOptions(
      program
        .command('merge <first> <second>')
        .description('Merge the signatures of two signed copies of one document')
        .requiredOption('-t, --type <type>', 'Document type (link, targets)')
        .option('-o, --out <path>', 'Output file (default: overwrite <first>)')
    ).action(async (first: string, second: string, options: MergeCommandOptions) => {
      await this.execute(first, second, options);
    });
  }

  async execute(first: string, second: string, options: MergeCommandOptions): Promise<void> {
    await this.run(options, async () => {
      const { format } = resolveDocumentKind(options.type);
      const [mine, theirs] = await Promise.all([
        readSignedDocument(first, format),
        readSignedDocument(second, format),
      ]);

      const merged = mine.mergeSignatures(theirs);
      const out = options.out ?? first;
      await writeContents(out, merged.toRaw().bytes);

      const added = merged.signatures.length - mine.signatures.length;
      this.handleSuccess(
        { path: out, signatures: merged.keyIds() },
        options,
        `Merged ${added} signature(s) into ${out}`
      );
    });
  }
}
