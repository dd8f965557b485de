import { promises as fs } from 'fs';
import * as path from 'path';
import { Json, PrivateKey, PublicKey, RawSignedMetadata } from '@metablock/core';
import type { Interchange, SignedMetadata } from '@metablock/core';
import type { DocumentFormat, SignableDocument } from './document-types';

export type SignedDocument = SignedMetadata<Interchange.JsonValue, SignableDocument>;

export async function readBytes(filePath: string): Promise<Uint8Array> {
  return fs.readFile(filePath);
}

/**
 * Writes `contents`, creating parent directories. With `exclusive` an
 * existing file is an error.
 */
export async function writeContents(
  filePath: string,
  contents: Uint8Array | string,
  { exclusive = false, mode }: { exclusive?: boolean; mode?: number } = {}
): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, contents, { flag: exclusive ? 'wx' : 'w', mode });
}

export async function readSignedDocument(filePath: string, format: DocumentFormat): Promise<SignedDocument> {
  return new RawSignedMetadata(await readBytes(filePath), format).parse();
}

export async function readPlainDocument(filePath: string): Promise<Interchange.JsonValue> {
  return Json.fromBytes(await readBytes(filePath));
}

export async function readPrivateKey(filePath: string): Promise<PrivateKey> {
  return PrivateKey.fromPkcs8(Buffer.from(await readBytes(filePath)).toString('utf8'));
}

export async function readPublicKey(filePath: string): Promise<PublicKey> {
  const document: unknown = Json.deserialize(await readPlainDocument(filePath));
  return PublicKey.fromJSON(document);
}
