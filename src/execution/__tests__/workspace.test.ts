import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { BatchFailedError } from '../errors.js';
import { createSessionContext, type InMemorySessionContext } from '../session.js';
import { Workspace } from '../workspace.js';
import type { SandboxSettingsInput } from '../config.js';
import { Semaphore } from '../../utils/concurrency.js';
import { createLogger, type LogEntry } from '../../utils/logger.js';
import { makeTempDir, sandboxCode } from './helpers.js';

describe('Workspace', () => {
  let root: string;
  let session: InMemorySessionContext;

  const open = (settings: SandboxSettingsInput = {}) =>
    Workspace.open({ session, settings, pool: new Semaphore(1) });
  const file = (name: string) => path.join(root, name);

  beforeEach(async () => {
    root = await makeTempDir('sandbox-workspace-');
    session = await createSessionContext(root);
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  describe('open', () => {
    it('requires a session or a project root', async () => {
      await assert.rejects(
        () => Workspace.open({}),
        sandboxCode('NotFound', /^A session or project root is required$/)
      );
    });

    it('takes the root from the session', async () => {
      const workspace = await open();

      assert.strictEqual(workspace.projectRoot, root);
    });
  });

  describe('readFile', () => {
    it('returns the content and records evidence', async () => {
      await fs.writeFile(file('a.txt'), 'a\nb\nc');
      const workspace = await open();

      assert.deepStrictEqual(await workspace.readFile('a.txt'), { content: 'a\nb\nc', totalLines: 3 });
      assert.strictEqual(session.wasRead(file('a.txt')), true);
    });

    it('returns a line window', async () => {
      await fs.writeFile(file('a.txt'), 'a\nb\nc');
      const workspace = await open();

      assert.deepStrictEqual(await workspace.readFile('a.txt', { offset: 1, limit: 1 }), {
        content: 'b',
        totalLines: 3,
      });
    });

    it('reports missing files and directories', async () => {
      await fs.mkdir(file('src'));
      const workspace = await open();

      await assert.rejects(
        () => workspace.readFile('missing.txt'),
        sandboxCode('NotFound', /^File not found: missing\.txt$/)
      );
      await assert.rejects(() => workspace.readFile('src'), sandboxCode('NotFound', /^Not a file: src$/));
    });

    it('refuses binary content', async () => {
      await fs.writeFile(file('image.bin'), Buffer.from([0x89, 0x50, 0x00, 0x01]));
      const workspace = await open();

      await assert.rejects(
        () => workspace.readFile('image.bin'),
        sandboxCode('NotText', /^File is binary or not valid UTF-8: image\.bin$/)
      );
    });

    it('refuses files over the size cap', async () => {
      await fs.writeFile(file('big.txt'), 'hello');
      const workspace = await open({ maxFileBytes: 4 });

      await assert.rejects(
        () => workspace.readFile('big.txt'),
        sandboxCode('CapExceeded', /^File is 5 bytes; the limit is 4$/)
      );
    });

    it('rejects paths outside the project', async () => {
      const workspace = await open();

      await assert.rejects(() => workspace.readFile('../../etc/passwd'), sandboxCode('PathTraversal'));
    });
  });

  describe('writeFile', () => {
    it('creates a new file and its directories without a prior read', async () => {
      const workspace = await open();

      assert.deepStrictEqual(await workspace.writeFile('src/new.ts', 'export {};\n'), {
        bytes: 11,
        created: true,
      });
      assert.strictEqual(await fs.readFile(file('src/new.ts'), 'utf8'), 'export {};\n');
    });

    it('refuses to overwrite a file the session has not read', async () => {
      await fs.writeFile(file('a.txt'), 'original');
      const workspace = await open();

      await assert.rejects(
        () => workspace.writeFile('a.txt', 'replaced'),
        sandboxCode('ReadBeforeWriteRequired', /^File must be read before overwriting: a\.txt$/)
      );
      assert.strictEqual(await fs.readFile(file('a.txt'), 'utf8'), 'original');
    });

    it('overwrites after a read and counts its own write as a read', async () => {
      await fs.writeFile(file('a.txt'), 'v1');
      const workspace = await open();
      await workspace.readFile('a.txt');

      assert.deepStrictEqual(await workspace.writeFile('a.txt', 'v2'), { bytes: 2, created: false });
      assert.deepStrictEqual(await workspace.writeFile('a.txt', 'v3!'), { bytes: 3, created: false });
      assert.strictEqual(await fs.readFile(file('a.txt'), 'utf8'), 'v3!');
    });

    it('refuses when the file changed since it was read', async () => {
      await fs.writeFile(file('a.txt'), 'v1');
      const workspace = await open();
      await workspace.readFile('a.txt');
      await fs.writeFile(file('a.txt'), 'changed elsewhere');

      await assert.rejects(
        () => workspace.writeFile('a.txt', 'v2'),
        sandboxCode('ReadBeforeWriteRequired', /^File changed since it was last read: a\.txt$/)
      );
    });

    it('ignores a bare mtime change', async () => {
      await fs.writeFile(file('a.txt'), 'v1');
      const workspace = await open();
      await workspace.readFile('a.txt');
      const later = new Date(Date.now() + 60_000);
      await fs.utimes(file('a.txt'), later, later);

      assert.deepStrictEqual(await workspace.writeFile('a.txt', 'v2'), { bytes: 2, created: false });
    });

    it('refuses content over the size cap', async () => {
      const workspace = await open({ maxFileBytes: 4 });

      await assert.rejects(
        () => workspace.writeFile('a.txt', 'hello'),
        sandboxCode('CapExceeded', /^Content is 5 bytes; the limit is 4$/)
      );
    });

    it('refuses to replace a directory', async () => {
      await fs.mkdir(file('src'));
      const workspace = await open();

      await assert.rejects(() => workspace.writeFile('src', 'x'), sandboxCode('NotFound', /^Not a file: src$/));
    });

    it('refuses to write through a symlink that leaves the project', async () => {
      const outside = await makeTempDir('sandbox-workspace-outside-');
      try {
        await fs.symlink(outside, file('link'));
        const workspace = await open();

        await assert.rejects(() => workspace.writeFile('link/x.txt', 'x'), sandboxCode('SymlinkEscape'));
        assert.deepStrictEqual(await fs.readdir(outside), []);
      } finally {
        await fs.rm(outside, { recursive: true, force: true });
      }
    });
  });

  describe('editFile', () => {
    it('applies an edit to a file the session has read', async () => {
      await fs.writeFile(file('a.ts'), 'const a = 1;\n');
      const workspace = await open();
      await workspace.readFile('a.ts');

      const result = await workspace.editFile('a.ts', { oldString: '1', newString: '2' });

      assert.deepStrictEqual(result, { applied: [{ strategy: 'exact', replacements: 1 }], replacements: 1 });
      assert.strictEqual(await fs.readFile(file('a.ts'), 'utf8'), 'const a = 2;\n');
    });

    it('requires a prior read', async () => {
      await fs.writeFile(file('a.ts'), 'const a = 1;\n');
      const workspace = await open();

      await assert.rejects(
        () => workspace.editFile('a.ts', { oldString: '1', newString: '2' }),
        sandboxCode('ReadBeforeWriteRequired')
      );
    });

    it('keeps the file mode', async () => {
      await fs.writeFile(file('run.sh'), 'echo 1\n');
      await fs.chmod(file('run.sh'), 0o755);
      const workspace = await open();
      await workspace.readFile('run.sh');

      await workspace.editFile('run.sh', { oldString: '1', newString: '2' });

      assert.strictEqual((await fs.stat(file('run.sh'))).mode & 0o777, 0o755);
    });

    it('runs concurrent edits one at a time', async () => {
      await fs.writeFile(file('a.txt'), 'alpha beta');
      const workspace = await open();
      await workspace.readFile('a.txt');

      await Promise.all([
        workspace.editFile('a.txt', { oldString: 'alpha', newString: 'ALPHA' }),
        workspace.editFile('a.txt', { oldString: 'beta', newString: 'BETA' }),
      ]);

      assert.strictEqual(await fs.readFile(file('a.txt'), 'utf8'), 'ALPHA BETA');
    });
  });

  describe('multiEditFile', () => {
    it('writes once after every edit succeeded', async () => {
      await fs.writeFile(file('a.txt'), 'one two three');
      const workspace = await open();
      await workspace.readFile('a.txt');

      const result = await workspace.multiEditFile('a.txt', [
        { oldString: 'one', newString: '1' },
        { oldString: 'three', newString: '3' },
      ]);

      assert.strictEqual(result.replacements, 2);
      assert.strictEqual(await fs.readFile(file('a.txt'), 'utf8'), '1 two 3');
    });

    it('leaves the file byte-identical when an edit fails', async () => {
      await fs.writeFile(file('a.txt'), 'one two three');
      const workspace = await open();
      await workspace.readFile('a.txt');

      await assert.rejects(
        () =>
          workspace.multiEditFile('a.txt', [
            { oldString: 'one', newString: '1' },
            { oldString: 'four', newString: '4' },
          ]),
        (err: unknown) => {
          assert.ok(err instanceof BatchFailedError);
          assert.strictEqual(err.index, 2);
          assert.strictEqual(err.message, 'Edit 2 failed: String not found in file: a.txt');
          return true;
        }
      );
      assert.strictEqual(await fs.readFile(file('a.txt'), 'utf8'), 'one two three');
      assert.deepStrictEqual(await fs.readdir(root), ['a.txt']);
    });
  });

  describe('.git metadata', () => {
    it('refuses writes inside .git', async () => {
      const workspace = await open();

      await assert.rejects(
        () => workspace.writeFile('.git/hooks/pre-commit', '#!/bin/sh\n'),
        sandboxCode('Disallowed', /^Writes inside \.git are not allowed: \.git\/hooks\/pre-commit$/)
      );
      await assert.rejects(() => fs.stat(file('.git')), { code: 'ENOENT' });
    });

    it('refuses writes through a link into .git', async () => {
      await fs.mkdir(file('.git'));
      await fs.symlink('.git', file('meta'));
      const workspace = await open();

      await assert.rejects(
        () => workspace.writeFile('meta/config', '[core]\n'),
        sandboxCode('Disallowed', /^Writes inside \.git are not allowed: meta\/config$/)
      );
      assert.deepStrictEqual(await fs.readdir(file('.git')), []);
    });

    it('refuses edits inside .git', async () => {
      await fs.mkdir(file('.git'));
      await fs.writeFile(file('.git/config'), '[core]\n');
      const workspace = await open();
      await workspace.readFile('.git/config');

      await assert.rejects(
        () => workspace.editFile('.git/config', { oldString: '[core]', newString: '[alias]' }),
        sandboxCode('Disallowed')
      );
      assert.strictEqual(await fs.readFile(file('.git/config'), 'utf8'), '[core]\n');
    });
  });

  describe('listDirectory', () => {
    beforeEach(async () => {
      await fs.writeFile(file('b.txt'), 'b');
      await fs.mkdir(file('a'));
      await fs.writeFile(file('a/c.txt'), 'c');
      await fs.writeFile(file('.hidden'), 'h');
    });

    it('lists entries sorted by name', async () => {
      const workspace = await open();

      assert.deepStrictEqual(await workspace.listDirectory(), [
        { name: '.hidden', type: 'file' },
        { name: 'a', type: 'directory' },
        { name: 'b.txt', type: 'file' },
      ]);
    });

    it('names nested entries relative to the listed directory', async () => {
      const workspace = await open();

      assert.deepStrictEqual(await workspace.listDirectory('.', { recursive: true }), [
        { name: '.hidden', type: 'file' },
        { name: 'a', type: 'directory' },
        { name: 'a/c.txt', type: 'file' },
        { name: 'b.txt', type: 'file' },
      ]);
    });

    it('reports symlinks without following them', async () => {
      await fs.symlink('a', file('link'));
      const workspace = await open();

      assert.deepStrictEqual(await workspace.listDirectory('.', { recursive: true }), [
        { name: '.hidden', type: 'file' },
        { name: 'a', type: 'directory' },
        { name: 'a/c.txt', type: 'file' },
        { name: 'b.txt', type: 'file' },
        { name: 'link', type: 'symlink' },
      ]);
    });

    it('requires a directory', async () => {
      const workspace = await open();

      await assert.rejects(
        () => workspace.listDirectory('b.txt'),
        sandboxCode('NotFound', /^Not a directory: b\.txt$/)
      );
      await assert.rejects(
        () => workspace.listDirectory('nope'),
        sandboxCode('NotFound', /^Directory not found: nope$/)
      );
    });
  });

  describe('fileInfo', () => {
    it('reports size, type, mode and modification time', async () => {
      await fs.writeFile(file('a.txt'), 'hello');
      await fs.chmod(file('a.txt'), 0o640);
      const stat = await fs.stat(file('a.txt'));
      const workspace = await open();

      assert.deepStrictEqual(await workspace.fileInfo('a.txt'), {
        path: 'a.txt',
        size: 5,
        type: 'file',
        mode: '640',
        modified: stat.mtime.toISOString(),
      });
    });

    it('reports a missing path', async () => {
      const workspace = await open();

      await assert.rejects(() => workspace.fileInfo('missing'), sandboxCode('NotFound', /^Path not found: missing$/));
    });
  });

  describe('createDirectory', () => {
    it('creates missing parents and tolerates an existing directory', async () => {
      const workspace = await open();

      assert.deepStrictEqual(await workspace.createDirectory('x/y'), { created: true });
      assert.strictEqual((await fs.stat(file('x/y'))).isDirectory(), true);
      assert.deepStrictEqual(await workspace.createDirectory('x/y'), { created: false });
    });

    it('refuses when a file is in the way', async () => {
      await fs.writeFile(file('a.txt'), 'a');
      const workspace = await open();

      await assert.rejects(
        () => workspace.createDirectory('a.txt'),
        sandboxCode('NotFound', /^Not a directory: a\.txt$/)
      );
    });

    it('refuses to create directories inside .git', async () => {
      const workspace = await open();

      await assert.rejects(
        () => workspace.createDirectory('.git/hooks'),
        sandboxCode('Disallowed', /^Writes inside \.git are not allowed: \.git\/hooks$/)
      );
    });
  });

  describe('deleteFile', () => {
    it('requires confirm', async () => {
      await fs.writeFile(file('a.txt'), 'a');
      const workspace = await open();

      await assert.rejects(
        () => workspace.deleteFile('a.txt'),
        sandboxCode('Disallowed', /^Delete operation requires confirm=true$/)
      );
      assert.strictEqual(await fs.readFile(file('a.txt'), 'utf8'), 'a');
    });

    it('deletes a file', async () => {
      await fs.writeFile(file('a.txt'), 'a');
      const workspace = await open();

      await workspace.deleteFile('a.txt', { confirm: true });

      assert.deepStrictEqual(await fs.readdir(root), []);
    });

    it('removes a symlink and keeps its target', async () => {
      await fs.writeFile(file('target.txt'), 't');
      await fs.symlink('target.txt', file('link'));
      const workspace = await open();

      await workspace.deleteFile('link', { confirm: true });

      assert.deepStrictEqual(await fs.readdir(root), ['target.txt']);
    });

    it('refuses directories, missing files and the project root', async () => {
      await fs.mkdir(file('src'));
      const workspace = await open();

      await assert.rejects(
        () => workspace.deleteFile('src', { confirm: true }),
        sandboxCode('NotFound', /^Not a file: src$/)
      );
      await assert.rejects(
        () => workspace.deleteFile('missing.txt', { confirm: true }),
        sandboxCode('NotFound', /^File not found: missing\.txt$/)
      );
      await assert.rejects(() => workspace.deleteFile('.', { confirm: true }), sandboxCode('PathTraversal'));
    });

    it('refuses paths outside the project and inside .git', async () => {
      await fs.mkdir(file('.git'));
      await fs.writeFile(file('.git/HEAD'), 'ref: refs/heads/main\n');
      const workspace = await open();

      await assert.rejects(
        () => workspace.deleteFile('../outside.txt', { confirm: true }),
        sandboxCode('PathTraversal')
      );
      await assert.rejects(
        () => workspace.deleteFile('.git/HEAD', { confirm: true }),
        sandboxCode('Disallowed', /^Writes inside \.git are not allowed: \.git\/HEAD$/)
      );
      assert.strictEqual(await fs.readFile(file('.git/HEAD'), 'utf8'), 'ref: refs/heads/main\n');
    });
  });

  describe('grep', () => {
    beforeEach(async () => {
      await fs.mkdir(file('src'));
      await fs.writeFile(file('src/a.ts'), 'const a = 1;\nconst b = 2;\n');
      await fs.writeFile(file('src/b.js'), 'let a = 3;\n');
      await fs.writeFile(file('bin.dat'), Buffer.from('a = 1\0'));
      await fs.mkdir(file('.hidden'));
      await fs.writeFile(file('.hidden/x.ts'), 'const a = 0;\n');
    });

    it('returns matching lines with paths and line numbers', async () => {
      const workspace = await open();

      assert.deepStrictEqual(await workspace.grep('a ='), [
        { path: 'src/a.ts', line: 1, text: 'const a = 1;' },
        { path: 'src/b.js', line: 1, text: 'let a = 3;' },
      ]);
    });

    it('filters by file name and caps the results', async () => {
      const workspace = await open();

      assert.deepStrictEqual(await workspace.grep('a =', { include: ['*.ts'] }), [
        { path: 'src/a.ts', line: 1, text: 'const a = 1;' },
      ]);
      assert.deepStrictEqual(await workspace.grep('=', { maxResults: 1 }), [
        { path: 'src/a.ts', line: 1, text: 'const a = 1;' },
      ]);
    });

    it('searches a single file', async () => {
      await fs.writeFile(file('crlf.txt'), 'x\r\ny\r\n');
      const workspace = await open();

      assert.deepStrictEqual(await workspace.grep('b', { path: 'src/a.ts' }), [
        { path: 'src/a.ts', line: 2, text: 'const b = 2;' },
      ]);
      assert.deepStrictEqual(await workspace.grep('^y$', { path: 'crlf.txt' }), [
        { path: 'crlf.txt', line: 2, text: 'y' },
      ]);
    });

    it('rejects invalid patterns and missing paths', async () => {
      const workspace = await open();

      await assert.rejects(() => workspace.grep('('), sandboxCode('InvalidPattern'));
      await assert.rejects(
        () => workspace.grep('a', { path: 'nope' }),
        sandboxCode('NotFound', /^Path not found: nope$/)
      );
    });
  });

  describe('glob', () => {
    beforeEach(async () => {
      await fs.mkdir(file('src/deep'), { recursive: true });
      await fs.writeFile(file('src/a.ts'), '');
      await fs.writeFile(file('src/b.js'), '');
      await fs.writeFile(file('src/deep/c.ts'), '');
      await fs.writeFile(file('top.ts'), '');
      await fs.mkdir(file('.hidden'));
      await fs.writeFile(file('.hidden/x.ts'), '');
    });

    it('matches bare names at any depth', async () => {
      const workspace = await open();

      assert.deepStrictEqual(await workspace.glob('*.ts'), ['src/a.ts', 'src/deep/c.ts', 'top.ts']);
    });

    it('anchors patterns with a slash at the search directory', async () => {
      const workspace = await open();

      assert.deepStrictEqual(await workspace.glob('src/*.ts'), ['src/a.ts']);
      assert.deepStrictEqual(await workspace.glob('*.ts', { path: 'src' }), ['src/a.ts', 'src/deep/c.ts']);
    });

    it('caps the results and requires a directory', async () => {
      const workspace = await open();

      assert.deepStrictEqual(await workspace.glob('*.ts', { maxResults: 1 }), ['src/a.ts']);
      await assert.rejects(
        () => workspace.glob('*.ts', { path: 'top.ts' }),
        sandboxCode('NotFound', /^Not a directory: top\.ts$/)
      );
    });
  });

  describe('without a session', () => {
    it('rejects overwrites in reject mode', async () => {
      await fs.writeFile(file('a.txt'), 'v1');
      const workspace = await Workspace.open({ projectRoot: root, logger: createLogger({ handler: () => {} }) });

      await assert.rejects(
        () => workspace.writeFile('a.txt', 'v2'),
        sandboxCode(
          'ReadBeforeWriteRequired',
          /^No session context; read-before-write cannot be verified: a\.txt$/
        )
      );
    });

    it('still creates new files', async () => {
      const workspace = await Workspace.open({ projectRoot: root, logger: createLogger({ handler: () => {} }) });

      assert.deepStrictEqual(await workspace.writeFile('new.txt', 'x'), { bytes: 1, created: true });
    });

    it('proceeds with a warning in warn mode', async () => {
      await fs.writeFile(file('a.txt'), 'v1');
      const entries: LogEntry[] = [];
      const workspace = await Workspace.open({
        projectRoot: root,
        settings: { legacyMode: 'warn' },
        logger: createLogger({ handler: (entry) => entries.push(entry) }),
      });

      await workspace.writeFile('a.txt', 'v2');

      assert.strictEqual(await fs.readFile(file('a.txt'), 'utf8'), 'v2');
      assert.deepStrictEqual(
        entries.map((e) => [e.level, e.message]),
        [
          ['warn', '[workspace] Workspace opened without a session context'],
          ['warn', '[workspace] Skipping read-before-write check without a session'],
        ]
      );
    });
  });

  describe('runCommand', () => {
    it('runs commands in the project root', async () => {
      const workspace = await open({ allowedCommands: ['echo'], envAllowlist: ['PATH'] });

      const result = await workspace.runCommand({ command: 'echo', args: ['hi'] });

      assert.strictEqual(result.stdout, 'hi\n');
      assert.strictEqual(result.exitCode, 0);
    });
  });
});
