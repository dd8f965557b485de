import { EncodingError } from "../../errors";

/**
 * Rejects paths that could escape the directory they are resolved against:
 * empty paths, absolute paths, and paths with a `..` component.
 * Components that merely contain dots (`..foo`, `bar..`) are allowed.
 * The path is not normalized.
 *
 * @throws EncodingError
 */
export function safePath(path: string): void {
  if (path.length === 0) {
    throw new EncodingError("Path cannot be empty");
  }

  if (path.startsWith("/")) {
    throw new EncodingError(`Cannot start with '/': ${path}`);
  }

  for (const component of path.split("/")) {
    if (component === "..") {
      throw new EncodingError(`Path cannot contain a '..' component: ${path}`);
    }
  }
}

export function isSafePath(path: string): boolean {
  try {
    safePath(path);
    return true;
  } catch {
    return false;
  }
}
