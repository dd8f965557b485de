import { safePath, isSafePath } from './safe_path';
import { MetadataPath } from './metadata_path';
import { TargetPath } from './target_path';
import { HashValue } from '../../crypto';
import { EncodingError } from '../../errors';
import { Json } from '../../interchange';

describe('safePath', () => {
  it.each(['foo', 'foo/bar', '..foo', 'foo/..bar', 'foo/bar..', 'a/./b', 'foo/'])(
    'should accept %p',
    (path) => {
      expect(() => safePath(path)).not.toThrow();
      expect(isSafePath(path)).toBe(true);
    }
  );

  it.each([
    ['', 'Path cannot be empty'],
    ['/foo', "Cannot start with '/': /foo"],
    ['../foo', "Path cannot contain a '..' component: ../foo"],
    ['foo/..', "Path cannot contain a '..' component: foo/.."],
    ['foo/../bar', "Path cannot contain a '..' component: foo/../bar"],
    ['..', "Path cannot contain a '..' component: .."],
  ])('should reject %p', (path, message) => {
    expect(() => safePath(path)).toThrow(EncodingError);
    expect(() => safePath(path)).toThrow(message);
    expect(isSafePath(path)).toBe(false);
  });
});

describe('MetadataPath', () => {
  it('should append the interchange extension to the last component', () => {
    const path = new MetadataPath('delegations/build');

    expect(path.components(Json)).toEqual(['delegations', 'build.json']);
    expect(path.toFilename(Json)).toBe('delegations/build.json');
  });

  it('should validate on construction and when read from JSON', () => {
    expect(() => new MetadataPath('../root')).toThrow(EncodingError);
    expect(() => MetadataPath.fromJSON(7)).toThrow('Metadata path must be a string, got number');
    expect(MetadataPath.fromJSON('root').equals(new MetadataPath('root'))).toBe(true);
  });

  it('should serialize as its string value', () => {
    expect(JSON.stringify({ path: new MetadataPath('root') })).toBe('{"path":"root"}');
  });
});

describe('TargetPath', () => {
  it('should split into components', () => {
    expect(new TargetPath('foo/bar/baz.tar.gz').components()).toEqual(['foo', 'bar', 'baz.tar.gz']);
  });

  it('should prefix only the file name with the hash', () => {
    const hash = HashValue.fromHex('abcd');

    expect(new TargetPath('foo/bar').withHashPrefix(hash).value).toBe('foo/abcd.bar');
    expect(new TargetPath('bar').withHashPrefix('abcd').value).toBe('abcd.bar');
  });

  it('should order paths by string value', () => {
    const paths = ['b', 'a/z', 'a'].map(path => new TargetPath(path)).sort((a, b) => a.compare(b));

    expect(paths.map(path => path.toString())).toEqual(['a', 'a/z', 'b']);
  });

  it('should reject non-string JSON values', () => {
    expect(() => TargetPath.fromJSON(null)).toThrow('Target path must be a string, got object');
  });
});
