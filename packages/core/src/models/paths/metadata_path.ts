import { EncodingError } from "../../errors";
import type { DataInterchange } from "../../interchange";
import { safePath } from "./safe_path";

/**
 * Wrapper for a path to metadata.
 *
 * Note: This should **not** contain the file extension. The extension of the
 * data interchange format in use is added when a filename is derived.
 *
 * @example
 * ```typescript
 * new MetadataPath("root");          // right
 * new MetadataPath("root.json");     // wrong: becomes root.json.json
 * new MetadataPath("../root");       // throws EncodingError
 * ```
 */
export class MetadataPath {
  private readonly path: string;

  constructor(path: string) {
    safePath(path);
    this.path = path;
  }

  static fromJSON(value: unknown): MetadataPath {
    if (typeof value !== 'string') {
      throw new EncodingError(`Metadata path must be a string, got ${typeof value}`);
    }
    return new MetadataPath(value);
  }

  get value(): string {
    return this.path;
  }

  /**
   * Path components with the interchange extension appended to the last one.
   */
  components<TRaw>(interchange: DataInterchange<TRaw>): string[] {
    const parts = this.path.split('/');
    const last = parts.pop() ?? '';
    return [...parts, `${last}.${interchange.extension}`];
  }

  toFilename<TRaw>(interchange: DataInterchange<TRaw>): string {
    return this.components(interchange).join('/');
  }

  equals(other: MetadataPath): boolean {
    return this.path === other.path;
  }

  compare(other: MetadataPath): number {
    if (this.path < other.path) return -1;
    if (this.path > other.path) return 1;
    return 0;
  }

  toString(): string {
    return this.path;
  }

  toJSON(): string {
    return this.path;
  }
}
