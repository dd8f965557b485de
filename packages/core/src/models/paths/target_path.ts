import { EncodingError } from "../../errors";
import type { HashValue } from "../../crypto";
import { safePath } from "./safe_path";

/**
 * Wrapper for the real path to a target.
 */
export class TargetPath {
  private readonly path: string;

  constructor(path: string) {
    safePath(path);
    this.path = path;
  }

  static fromJSON(value: unknown): TargetPath {
    if (typeof value !== 'string') {
      throw new EncodingError(`Target path must be a string, got ${typeof value}`);
    }
    return new TargetPath(value);
  }

  /**
   * The string value of the path.
   */
  get value(): string {
    return this.path;
  }

  /**
   * Splits the path into components that can be joined into URL, Unix or
   * Windows paths.
   *
   * @example
   * ```typescript
   * new TargetPath("foo/bar").components(); // ["foo", "bar"]
   * ```
   */
  components(): string[] {
    return this.path.split('/');
  }

  /**
   * Prefixes the file name with `<hash>.`, leaving directories untouched,
   * so a target can be addressed by content hash (consistent snapshots).
   *
   * @example
   * ```typescript
   * new TargetPath("foo/bar").withHashPrefix(hash); // "foo/<hash>.bar"
   * ```
   */
  withHashPrefix(hash: HashValue | string): TargetPath {
    const components = this.components();
    // safePath rejects the empty string, so there is always a last component.
    const fileName = components.pop() ?? '';
    components.push(`${hash.toString()}.${fileName}`);
    return new TargetPath(components.join('/'));
  }

  equals(other: TargetPath): boolean {
    return this.path === other.path;
  }

  compare(other: TargetPath): number {
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
