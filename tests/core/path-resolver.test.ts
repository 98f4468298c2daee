/**
 * Path Resolver Tests
 *
 * Every suite works inside a throwaway directory laid out as:
 *   <tmp>/sandbox/...   the sandbox root
 *   <tmp>/outside/...   files the sandbox must never reach
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { symlinkSync } from 'node:fs';
import path from 'node:path';
import { PathResolver, canonicalize, isWithinRoot, nodeResolverFileSystem, readSourceFile } from '../../src/core/path-resolver.js';
import { FileNotFoundError, IncludeIoError, PermissionDeniedError } from '../../src/utils/errors.js';
import type { IncludeDirective } from '../../src/types/index.js';
import { createTempRoot, removeTempRoot, writeFiles } from '../test-helpers.js';

let tmp: string;
let root: string;
let resolver: PathResolver;

function directive(rawPath: string, sourceFile: string, lineNumber = 1): IncludeDirective {
  return { rawPath, sourceFile, lineNumber, quoteStyle: 'double' };
}

before(() => {
  tmp = createTempRoot('resolver');
  root = path.join(tmp, 'sandbox');
  writeFiles(tmp, {
    'sandbox/main.sh': 'echo main\n',
    'sandbox/lib/util.sh': 'echo util\n',
    'sandbox/lib/nested/deep.sh': 'echo deep\n',
    'sandbox/locked.sh': 'echo locked\n',
    'outside/secret.sh': 'echo secret\n'
  });
  symlinkSync(path.join(root, 'lib', 'util.sh'), path.join(root, 'alias.sh'));
  symlinkSync(path.join(tmp, 'outside', 'secret.sh'), path.join(root, 'escape.sh'));
  symlinkSync(path.join(root, 'loop-b.sh'), path.join(root, 'loop-a.sh'));
  symlinkSync(path.join(root, 'loop-a.sh'), path.join(root, 'loop-b.sh'));
  resolver = new PathResolver(root);
});

after(() => {
  removeTempRoot(tmp);
});

describe('PathResolver', () => {
  it('canonicalizes the sandbox root', () => {
    assert.equal(resolver.root, root);
    assert.equal(new PathResolver(path.join(root, 'lib', '..')).root, root);
  });

  it('resolves relative paths against the including file directory', () => {
    const resolved = resolver.resolve(directive('util.sh', path.join(root, 'lib', 'other.sh')));
    assert.equal(resolved, path.join(root, 'lib', 'util.sh'));
  });

  it('resolves relative paths from nested files to their own directory', () => {
    const resolved = resolver.resolve(directive('../util.sh', path.join(root, 'lib', 'nested', 'deep.sh')));
    assert.equal(resolved, path.join(root, 'lib', 'util.sh'));
  });

  it('normalizes dot segments', () => {
    const resolved = resolver.resolve(directive('./lib/../lib/./util.sh', path.join(root, 'main.sh')));
    assert.equal(resolved, path.join(root, 'lib', 'util.sh'));
  });

  it('roots absolute paths at the sandbox root', () => {
    const resolved = resolver.resolve(directive('/lib/util.sh', path.join(root, 'lib', 'nested', 'deep.sh')));
    assert.equal(resolved, path.join(root, 'lib', 'util.sh'));
  });

  it('resolves symlinks to their target', () => {
    const resolved = resolver.resolve(directive('alias.sh', path.join(root, 'main.sh')));
    assert.equal(resolved, path.join(root, 'lib', 'util.sh'));
  });

  it('fails with FileNotFound for missing files, carrying the directive location', () => {
    assert.throws(
      () => resolver.resolve(directive('missing.sh', path.join(root, 'main.sh'), 4)),
      (error: unknown) => {
        assert.ok(error instanceof FileNotFoundError);
        assert.equal(error.path, path.join(root, 'missing.sh'));
        assert.deepEqual(error.location, { sourceFile: path.join(root, 'main.sh'), lineNumber: 4 });
        return true;
      }
    );
  });

  it('fails with FileNotFound for directories', () => {
    assert.throws(
      () => resolver.resolve(directive('lib', path.join(root, 'main.sh'))),
      FileNotFoundError
    );
  });

  it('refuses relative paths that climb out of the sandbox', () => {
    assert.throws(
      () => resolver.resolve(directive('../outside/secret.sh', path.join(root, 'main.sh'))),
      (error: unknown) => error instanceof FileNotFoundError && error.path === '../outside/secret.sh'
    );
  });

  it('refuses absolute paths that climb out of the sandbox', () => {
    assert.throws(
      () => resolver.resolve(directive('/../outside/secret.sh', path.join(root, 'main.sh'))),
      (error: unknown) => error instanceof FileNotFoundError && error.path === '/../outside/secret.sh'
    );
  });

  it('refuses symlinks that point out of the sandbox', () => {
    assert.throws(
      () => resolver.resolve(directive('escape.sh', path.join(root, 'main.sh'))),
      (error: unknown) => error instanceof FileNotFoundError && error.path === 'escape.sh'
    );
  });

  it('maps other filesystem failures to IoError', () => {
    assert.throws(
      () => resolver.resolve(directive('loop-a.sh', path.join(root, 'main.sh'))),
      IncludeIoError
    );
  });

  it('fails with PermissionDenied for unreadable files', () => {
    const locked = path.join(root, 'locked.sh');
    const checked: string[] = [];
    const guarded = new PathResolver(root, {
      ...nodeResolverFileSystem,
      assertReadable: filePath => {
        checked.push(filePath);
        if (filePath === locked) {
          const error: NodeJS.ErrnoException = new Error(`EACCES: permission denied, access '${filePath}'`);
          error.code = 'EACCES';
          throw error;
        }
      }
    });

    assert.equal(guarded.resolve(directive('main.sh', path.join(root, 'lib', '..', 'main.sh'))), path.join(root, 'main.sh'));
    assert.throws(
      () => guarded.resolve(directive('locked.sh', path.join(root, 'main.sh'), 2)),
      (error: unknown) => {
        assert.ok(error instanceof PermissionDeniedError);
        assert.equal(error.path, locked);
        assert.deepEqual(error.location, { sourceFile: path.join(root, 'main.sh'), lineNumber: 2 });
        assert.ok(error.cause instanceof Error);
        return true;
      }
    );
    assert.deepEqual(checked, [path.join(root, 'main.sh'), locked]);
  });

  it('fails with FileNotFound when the base directory is missing', () => {
    assert.throws(() => new PathResolver(path.join(tmp, 'no-such-dir')), FileNotFoundError);
  });
});

describe('canonicalize and readSourceFile', () => {
  it('canonicalizes existing paths', () => {
    assert.equal(canonicalize(path.join(root, 'lib', 'nested', '..', 'util.sh')), path.join(root, 'lib', 'util.sh'));
  });

  it('maps missing paths to FileNotFound', () => {
    assert.throws(() => canonicalize(path.join(root, 'nope.sh')), FileNotFoundError);
    assert.throws(() => readSourceFile(path.join(root, 'nope.sh')), FileNotFoundError);
  });

  it('reads file content as text', () => {
    assert.equal(readSourceFile(path.join(root, 'lib', 'util.sh')), 'echo util\n');
  });
});

describe('isWithinRoot', () => {
  it('accepts the root and paths below it', () => {
    assert.equal(isWithinRoot('/srv/app', '/srv/app'), true);
    assert.equal(isWithinRoot('/srv/app', '/srv/app/lib/a.sh'), true);
    assert.equal(isWithinRoot('/srv/app', '/srv/app/..hidden/a.sh'), true);
  });

  it('rejects siblings and parents', () => {
    assert.equal(isWithinRoot('/srv/app', '/srv/application/a.sh'), false);
    assert.equal(isWithinRoot('/srv/app', '/srv'), false);
    assert.equal(isWithinRoot('/srv/app', '/etc/passwd'), false);
  });
});
