import * as path from 'path';
import type { Command } from 'commander';
import { IllegalArgumentError, PrivateKey } from '@metablock/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';
import { writeContents } from '../../services/document-io';

export interface KeygenCommandOptions extends BaseCommandOptions {
  dir?: string;
  force?: boolean;
}

const KEY_NAME = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/**
 * KeygenCommand - writes `<name>.pem` (PKCS#8) and `<name>.pub.json` into the keys directory.
 */
export class KeygenCommand extends BaseCommand<KeygenCommandOptions> {
  register(program: Command): void {
    this.withOutputOptions(
      program
        .command('keygen <name>')
        .description('Generate an Ed25519 key pair')
        .option('-d, --dir <dir>', 'Directory for the key files (default: keysDir from config)')
        .option('-f, --force', 'Overwrite existing key files')
    ).action(async (name: string, options: KeygenCommandOptions) => {
      await this.execute(name, options);
    });
  }

  async execute(name: string, options: KeygenCommandOptions): Promise<void> {
    await this.run(options, async () => {
      if (!KEY_NAME.test(name)) {
        throw new IllegalArgumentError(`Invalid key name: ${name}`);
      }

      const configManager = await this.dependencyService.getConfigManager();
      const dir = options.dir ?? this.dependencyService.resolveProjectPath(await configManager.getKeysDir());
      const privatePath = path.join(dir, `${name}.pem`);
      const publicPath = path.join(dir, `${name}.pub.json`);

      const key = await PrivateKey.generate();
      const writeOptions = { exclusive: !options.force };
      await writeContents(privatePath, key.toPkcs8Pem(), { ...writeOptions, mode: 0o600 });
      await writeContents(publicPath, `${JSON.stringify(key.publicKey.toJSON(), null, 2)}\n`, writeOptions);
      this.logger.debug(`Wrote ${privatePath} and ${publicPath}`);

      this.handleSuccess(
        { keyId: key.keyId, privateKey: privatePath, publicKey: publicPath },
        options,
        `Generated key ${key.keyId}\n   private: ${privatePath}\n   public:  ${publicPath}`
      );
    });
  }
}
