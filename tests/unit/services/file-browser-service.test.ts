import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import type { ResultAsync } from 'neverthrow';
import { loadConfig } from '../../../src/config/app-config.js';
import type { ConfigOverrides } from '../../../src/config/app-config.js';
import { FileBrowserService } from '../../../src/application/services/file-browser-service.js';
import { ExclusionPolicy } from '../../../src/application/services/exclusion-policy.js';
import { parseSort, DEFAULT_SORT } from '../../../src/application/services/listing-sort.js';
import { NodeFileSystem } from '../../../src/infrastructure/fs/node-file-system.js';
import type { BrowseError } from '../../../src/errors/index.js';
import { FakeLoggerFactory } from '../../helpers/FakeLoggerFactory.js';
import { makeTempDir, removeTempDir, writeTree } from '../../helpers/temp-tree.js';

async function expectOk<T>(pending: ResultAsync<T, BrowseError>): Promise<T> {
  const result = await pending;
  if (result.isErr()) throw new Error(`expected ok, got ${result.error._tag}: ${result.error.message}`);
  return result.value;
}

async function expectErr<T>(pending: ResultAsync<T, BrowseError>): Promise<BrowseError> {
  const result = await pending;
  if (result.isOk()) throw new Error('expected an error');
  return result.error;
}

async function exists(p: string): Promise<boolean> {
  return fs.lstat(p).then(
    () => true,
    () => false
  );
}

describe('FileBrowserService', () => {
  let tmp: string;
  let base: string;
  let spool: string;
  let service: FileBrowserService;

  function createService(overrides: ConfigOverrides = {}): FileBrowserService {
    const config = loadConfig({
      env: {},
      cwd: base,
      overrides: { removable: 'trash', upload: 'incoming', exclude: ['*.key', '.git/'], ...overrides },
    });
    if (config.kind === 'err') throw new Error('invalid test config');
    return new FileBrowserService(
      config.value,
      new NodeFileSystem(),
      new ExclusionPolicy(config.value.paths.base, config.value.exclude.patterns),
      new FakeLoggerFactory()
    );
  }

  async function spoolFile(name: string, content: string): Promise<{ originalName: string; tempPath: string }> {
    const tempPath = path.join(spool, `upload-${Math.random().toString(36).slice(2)}`);
    await fs.writeFile(tempPath, content);
    return { originalName: name, tempPath };
  }

  beforeEach(async () => {
    tmp = await makeTempDir();
    base = path.join(tmp, 'root');
    spool = path.join(tmp, 'spool');
    await writeTree(tmp, {
      'root/docs/readme.md': 'hello',
      'root/docs/notes.txt': 'n',
      'root/photos/cat.jpg': 'jpg',
      'root/trash/old.txt': 'old',
      'root/incoming': null,
      'root/secret.key': 'k',
      'root/.git/config': 'x',
      'outside/leak.txt': 'leak',
      spool: null,
    });
    service = createService();
  });

  afterEach(async () => {
    await removeTempDir(tmp);
  });

  describe('list', () => {
    it('lists visible entries, directories first', async () => {
      const listing = await expectOk(service.list('', DEFAULT_SORT));

      expect(listing.directory.name).toBe('root');
      expect(listing.directory.urlPath).toBe('');
      expect(listing.parent).toBeNull();
      expect(listing.sort).toBe('text');
      expect(listing.entries.map((e) => e.name)).toEqual(['docs', 'incoming', 'photos', 'trash']);
    });

    it('describes files', async () => {
      const listing = await expectOk(service.list('docs', parseSort('-text')));

      expect(listing.parent).toBe('');
      expect(listing.sort).toBe('-text');
      expect(listing.entries.map((e) => e.urlPath)).toEqual(['docs/readme.md', 'docs/notes.txt']);
      expect(listing.entries[0]).toMatchObject({
        name: 'readme.md',
        kind: 'file',
        size: 5,
        sizeLabel: '5 B',
        mimetype: 'text/markdown',
        canDownload: true,
        canRemove: false,
        canUpload: false,
      });
    });

    it('marks removable and uploadable nodes', async () => {
      const listing = await expectOk(service.list('', DEFAULT_SORT));
      const byName = new Map(listing.entries.map((e) => [e.name, e]));

      expect(byName.get('incoming')?.canUpload).toBe(true);
      expect(byName.get('trash')?.canRemove).toBe(false);
      expect(byName.get('docs')?.mimetype).toBe('inode/directory');

      const trash = await expectOk(service.list('trash', DEFAULT_SORT));
      expect(trash.entries[0]?.canRemove).toBe(true);
    });

    it('refuses paths outside the base directory', async () => {
      expect((await expectErr(service.list('../outside', DEFAULT_SORT)))._tag).toBe('OutsideJail');
    });

    it('treats files and missing paths as not found', async () => {
      expect(await expectErr(service.list('docs/readme.md', DEFAULT_SORT))).toMatchObject({
        _tag: 'NotFound',
        path: 'docs/readme.md',
      });
      expect((await expectErr(service.list('nope', DEFAULT_SORT)))._tag).toBe('NotFound');
    });

    it('hides symlinks leading out of the base directory', async () => {
      await fs.symlink(path.join(tmp, 'outside'), path.join(base, 'escape'));
      await fs.symlink(path.join(base, 'docs'), path.join(base, 'docs-link'));

      const listing = await expectOk(service.list('', DEFAULT_SORT));

      expect(listing.entries.map((e) => e.name)).toEqual(['docs', 'docs-link', 'incoming', 'photos', 'trash']);
      expect((await expectErr(service.stat('escape/leak.txt')))._tag).toBe('NotFound');
    });
  });

  describe('stat', () => {
    it('hides excluded nodes and everything below them', async () => {
      expect((await expectErr(service.stat('secret.key')))._tag).toBe('NotFound');
      expect((await expectErr(service.stat('.git/config')))._tag).toBe('NotFound');
    });

    it('normalizes the request path', async () => {
      const node = await expectOk(service.stat('/docs/../photos/cat.jpg'));
      expect(node.urlPath).toBe('photos/cat.jpg');
      expect(node.mimetype).toBe('image/jpeg');
    });
  });

  describe('startPath', () => {
    it('is the base directory by default', () => {
      expect(service.startPath).toBe('');
    });

    it('follows the initial directory', () => {
      expect(createService({ initial: 'docs' }).startPath).toBe('docs');
    });
  });

  describe('resolveFile', () => {
    it('returns the absolute path of a file', async () => {
      const file = await expectOk(service.resolveFile('photos/cat.jpg'));
      expect(file.absolutePath).toBe(path.join(base, 'photos', 'cat.jpg'));
    });

    it('does not serve directories', async () => {
      expect((await expectErr(service.resolveFile('photos')))._tag).toBe('NotFound');
    });
  });

  describe('openArchive', () => {
    it('opens an archive named after the directory', async () => {
      const archive = await expectOk(service.openArchive('docs'));
      expect(archive.name).toBe('docs.tgz');
      expect(archive.state).toBe('idle');
      await archive.close();
    });

    it('is forbidden when directory downloads are disabled', async () => {
      const disabled = createService({ directoryDownload: false });
      expect(await expectErr(disabled.openArchive('docs'))).toMatchObject({ _tag: 'Forbidden', action: 'download' });
    });
  });

  describe('remove', () => {
    it('removes below the removable directory and returns the parent', async () => {
      expect(await expectOk(service.remove('trash/old.txt'))).toBe('trash');
      expect(await exists(path.join(base, 'trash', 'old.txt'))).toBe(false);
    });

    it('refuses the removable directory itself and anything outside it', async () => {
      expect(await expectErr(service.remove('trash'))).toMatchObject({ _tag: 'Forbidden', action: 'remove' });
      expect((await expectErr(service.remove('docs/notes.txt')))._tag).toBe('Forbidden');
      expect(await exists(path.join(base, 'docs', 'notes.txt'))).toBe(true);
    });
  });

  describe('upload', () => {
    it('stores files under sanitized, non-colliding names', async () => {
      const first = await spoolFile('../evil.txt', 'one');
      const second = await spoolFile('evil.txt', 'two');

      expect(await expectOk(service.upload('incoming', [first, second]))).toEqual([
        'incoming/evil.txt',
        'incoming/evil (2).txt',
      ]);
      expect(await fs.readFile(path.join(base, 'incoming', 'evil (2).txt'), 'utf8')).toBe('two');
      expect(await exists(first.tempPath)).toBe(false);
    });

    it('is forbidden outside the upload directory', async () => {
      const file = await spoolFile('a.txt', 'a');
      expect(await expectErr(service.upload('docs', [file]))).toMatchObject({ _tag: 'Forbidden', action: 'upload' });
    });

    it('rejects empty uploads and unusable names', async () => {
      expect((await expectErr(service.upload('incoming', [])))._tag).toBe('InvalidRequest');
      const dots = await spoolFile('..', 'x');
      expect(await expectErr(service.upload('incoming', [dots]))).toMatchObject({
        _tag: 'InvalidFilename',
        filename: '..',
      });
    });
  });

  describe('createDirectory', () => {
    it('creates a directory once', async () => {
      expect(await expectOk(service.createDirectory('incoming', 'new'))).toBe('incoming/new');
      expect(await expectErr(service.createDirectory('incoming', 'new'))).toMatchObject({
        _tag: 'AlreadyExists',
        path: 'incoming/new',
      });
    });

    it('sanitizes the name', async () => {
      expect(await expectOk(service.createDirectory('incoming', 'a/b'))).toBe('incoming/b');
      expect((await expectErr(service.createDirectory('incoming', '..')))._tag).toBe('InvalidFilename');
    });

    it('is forbidden outside the upload directory', async () => {
      expect((await expectErr(service.createDirectory('', 'x')))._tag).toBe('Forbidden');
    });
  });

  describe('paste', () => {
    it('copies files and directories with non-colliding names', async () => {
      const outcome = await expectOk(service.paste('incoming', 'copy', ['docs/readme.md', 'docs', 'docs/readme.md']));

      expect(outcome.failures).toEqual([]);
      expect(outcome.pasted).toEqual(['incoming/readme.md', 'incoming/docs', 'incoming/readme (2).md']);
      expect(await fs.readFile(path.join(base, 'incoming', 'docs', 'notes.txt'), 'utf8')).toBe('n');
      expect(await exists(path.join(base, 'docs', 'readme.md'))).toBe(true);
    });

    it('moves removable items', async () => {
      const outcome = await expectOk(service.paste('incoming', 'cut', ['trash/old.txt']));

      expect(outcome.pasted).toEqual(['incoming/old.txt']);
      expect(await exists(path.join(base, 'trash', 'old.txt'))).toBe(false);
    });

    it('collects per-item failures', async () => {
      const outcome = await expectOk(service.paste('incoming', 'cut', ['docs/notes.txt', 'missing.txt', 'trash/old.txt']));

      expect(outcome.pasted).toEqual(['incoming/old.txt']);
      expect(outcome.failures.map((f) => [f.urlPath, f.error._tag])).toEqual([
        ['docs/notes.txt', 'Forbidden'],
        ['missing.txt', 'NotFound'],
      ]);
    });

    it('refuses to paste a directory into itself', async () => {
      const outcome = await expectOk(service.paste('incoming', 'copy', ['incoming']));
      expect(outcome.failures[0]?.error._tag).toBe('InvalidRequest');
    });

    it('is forbidden outside the upload directory', async () => {
      expect(await expectErr(service.paste('docs', 'copy', ['photos/cat.jpg']))).toMatchObject({
        _tag: 'Forbidden',
        action: 'paste',
      });
    });
  });

  describe('playlist', () => {
    beforeEach(async () => {
      await writeTree(tmp, {
        'root/music/A.ogg': 'ogg',
        'root/music/b.mp3': 'mp3',
        'root/music/skip.mp3': 'mp3',
        'root/music/cover.jpg': 'jpg',
        'root/music/list.m3u8': [
          '#EXTM3U',
          '#EXTINF:215,Intro Song',
          'b.mp3',
          '#EXTINF:-1,Live Stream',
          'http://radio.example/stream.mp3?x=1',
          '../docs/readme.md',
          'skip.mp3',
          'missing.mp3',
          '../../outside/leak.mp3',
          path.join(base, 'music', 'A.ogg'),
          '',
        ].join('\n'),
        'root/music/set.pls': '[playlist]\nFile1=A.ogg\nTitle1=First\nLength1=61\nFile3=b.mp3\nNumberOfEntries=3\n',
        'outside/leak.mp3': 'leak',
      });
      service = createService({ exclude: ['*.key', 'skip.mp3'] });
    });

    it('plays the audio files of a directory in name order', async () => {
      const playlist = await expectOk(service.playlist('music'));

      expect(playlist.source.urlPath).toBe('music');
      expect(playlist.entries).toEqual([
        { kind: 'file', urlPath: 'music/A.ogg', title: 'A.ogg', duration: null, mimetype: 'audio/ogg' },
        { kind: 'file', urlPath: 'music/b.mp3', title: 'b.mp3', duration: null, mimetype: 'audio/mpeg' },
      ]);
    });

    it('keeps only reachable audio entries of an m3u8 file', async () => {
      const playlist = await expectOk(service.playlist('music/list.m3u8'));

      expect(playlist.source.urlPath).toBe('music/list.m3u8');
      expect(playlist.entries).toEqual([
        { kind: 'file', urlPath: 'music/b.mp3', title: 'Intro Song', duration: 215, mimetype: 'audio/mpeg' },
        {
          kind: 'remote',
          url: 'http://radio.example/stream.mp3?x=1',
          title: 'Live Stream',
          duration: null,
          mimetype: 'audio/mpeg',
        },
        { kind: 'file', urlPath: 'music/A.ogg', title: 'A.ogg', duration: null, mimetype: 'audio/ogg' },
      ]);
    });

    it('reads pls files', async () => {
      const playlist = await expectOk(service.playlist('music/set.pls'));

      expect(playlist.entries).toEqual([
        { kind: 'file', urlPath: 'music/A.ogg', title: 'First', duration: 61, mimetype: 'audio/ogg' },
        { kind: 'file', urlPath: 'music/b.mp3', title: 'b.mp3', duration: null, mimetype: 'audio/mpeg' },
      ]);
    });

    it('plays a single audio file', async () => {
      const playlist = await expectOk(service.playlist('music/b.mp3'));
      expect(playlist.entries).toEqual([
        { kind: 'file', urlPath: 'music/b.mp3', title: 'b.mp3', duration: null, mimetype: 'audio/mpeg' },
      ]);
    });

    it('treats unplayable and excluded nodes as not found', async () => {
      expect(await expectErr(service.playlist('music/cover.jpg'))).toMatchObject({ _tag: 'NotFound', path: 'music/cover.jpg' });
      expect(await expectErr(service.playlist('docs'))).toMatchObject({ _tag: 'NotFound', path: 'docs' });
      expect((await expectErr(service.playlist('music/skip.mp3')))._tag).toBe('NotFound');
      expect((await expectErr(service.playlist('../outside/leak.mp3')))._tag).toBe('OutsideJail');
    });
  });
});
