import * as path from 'path';
import { IllegalArgumentError, JsonLink, JsonTargets, linkFilename } from '@metablock/core';
import type { Interchange, KeyId, LinkMetadata, MetadataFormat, TargetsMetadata } from '@metablock/core';

type JsonValue = Interchange.JsonValue;

export type SignableDocument = LinkMetadata | TargetsMetadata;
export type DocumentFormat = MetadataFormat<JsonValue, SignableDocument>;

/**
 * A document type the CLI can sign and verify.
 */
export interface DocumentKind {
  readonly name: string;
  readonly format: DocumentFormat;
  /**
   * File name a freshly signed document is written to when no --out is given.
   */
  defaultFilename(raw: JsonValue, signer: KeyId, source: string): string;
}

function defineKind<M extends SignableDocument>(
  name: string,
  format: MetadataFormat<JsonValue, M>,
  filename: (document: M, signer: KeyId, source: string) => string
): DocumentKind {
  return {
    name,
    format,
    defaultFilename: (raw, signer, source) =>
      filename(format.type.decode(format.interchange.deserialize(raw)), signer, source),
  };
}

const KINDS: readonly DocumentKind[] = [
  defineKind('link', JsonLink, (link, signer) => linkFilename(link.name, signer)),
  defineKind('targets', JsonTargets, (_targets, _signer, source) => path.basename(source)),
];

export const DOCUMENT_TYPE_NAMES: readonly string[] = KINDS.map(kind => kind.name);

/**
 * @throws IllegalArgumentError for an unknown type name
 */
export function resolveDocumentKind(name: string): DocumentKind {
  const kind = KINDS.find(candidate => candidate.name === name);
  if (!kind) {
    throw new IllegalArgumentError(
      `Unknown document type "${name}". Expected one of: ${DOCUMENT_TYPE_NAMES.join(', ')}`
    );
  }
  return kind;
}
