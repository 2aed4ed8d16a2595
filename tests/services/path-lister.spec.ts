import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import path from 'node:path';
import {
    PathLister,
    isNotFoundError,
    nodeFileSystem,
    type ListOptions,
} from '../../src/services/path-lister.js';
import { regexFilterHook } from '../../src/services/filter-hooks.js';
import { ListingError } from '../../src/types/watcher.js';
import { MemoryFileSystem } from '../harness/memory-fs.js';

function options(overrides: Partial<ListOptions> = {}): ListOptions {
    return {
        isIgnored: () => false,
        ignoreHidden: false,
        filterHooks: [],
        descendantErrors: 'abort',
        ...overrides,
    };
}

function sampleTree(): MemoryFileSystem {
    return new MemoryFileSystem()
        .mkdir('/r')
        .writeFile('/r/top.md', { size: 3 })
        .writeFile('/r/.hidden', { size: 1 })
        .writeFile('/r/docs/a.md', { size: 5 })
        .writeFile('/r/docs/b.txt', { size: 6 })
        .writeFile('/r/docs/deep/c.md', { size: 7 })
        .writeFile('/r/.cache/blob', { size: 8 });
}

describe('PathLister', () => {
    it('returns a single entry for a file root', async () => {
        const lister = new PathLister(sampleTree());

        const listing = await lister.list('/r/top.md', true, options());

        expect([...listing.keys()]).toEqual(['/r/top.md']);
        expect(listing.get('/r/top.md')?.size).toBe(3);
    });

    it('lists only immediate children when not recursive', async () => {
        const lister = new PathLister(sampleTree());

        const listing = await lister.list('/r', false, options());

        expect([...listing.keys()]).toEqual(['/r', '/r/.cache', '/r/.hidden', '/r/docs', '/r/top.md']);
    });

    it('walks depth-first in name order when recursive', async () => {
        const lister = new PathLister(sampleTree());

        const listing = await lister.list('/r', true, options());

        expect([...listing.keys()]).toEqual([
            '/r',
            '/r/.cache',
            '/r/.cache/blob',
            '/r/.hidden',
            '/r/docs',
            '/r/docs/a.md',
            '/r/docs/b.txt',
            '/r/docs/deep',
            '/r/docs/deep/c.md',
            '/r/top.md',
        ]);
    });

    it('skips hidden entries and their subtrees when asked to', async () => {
        const lister = new PathLister(sampleTree());

        const listing = await lister.list('/r', true, options({ ignoreHidden: true }));

        expect([...listing.keys()].some((key) => key.includes('/.'))).toBe(false);
        expect(listing.has('/r/docs/deep/c.md')).toBe(true);
    });

    it('does not descend into ignored directories', async () => {
        const lister = new PathLister(sampleTree());

        const listing = await lister.list('/r', true, options({ isIgnored: (p) => p === '/r/docs' }));

        expect([...listing.keys()]).toEqual(['/r', '/r/.cache', '/r/.cache/blob', '/r/.hidden', '/r/top.md']);
    });

    it('descends through directories rejected by a filter hook', async () => {
        const lister = new PathLister(sampleTree());

        const listing = await lister.list('/r', true, options({ filterHooks: [regexFilterHook(/\.md$/, false)] }));

        expect([...listing.keys()]).toEqual(['/r', '/r/docs/a.md', '/r/docs/deep/c.md', '/r/top.md']);
    });

    it('matches filter hooks against the full path when requested', async () => {
        const lister = new PathLister(sampleTree());

        const listing = await lister.list('/r', true, options({ filterHooks: [regexFilterHook(/^\/r\/docs\//, true)] }));

        expect([...listing.keys()]).toEqual(['/r', '/r/docs/a.md', '/r/docs/b.txt', '/r/docs/deep', '/r/docs/deep/c.md']);
    });

    it('rejects with a not-found error when the root is gone', async () => {
        const lister = new PathLister(sampleTree());

        const failure = await lister.list('/missing', false, options()).catch((err: unknown) => err);

        expect(isNotFoundError(failure)).toBe(true);
    });

    it('aborts on an unreadable descendant by default', async () => {
        const fileSystem = sampleTree().failOn('/r/docs', 'EACCES');
        const lister = new PathLister(fileSystem);

        const failure = await lister.list('/r', true, options()).catch((err: unknown) => err);

        expect(failure).toBeInstanceOf(ListingError);
        expect(failure instanceof ListingError ? failure.path : null).toBe('/r/docs');
    });

    it('skips an unreadable descendant under the skip policy', async () => {
        const fileSystem = sampleTree().failOn('/r/docs', 'EACCES');
        const lister = new PathLister(fileSystem);

        const listing = await lister.list('/r', true, options({ descendantErrors: 'skip' }));

        expect(listing.has('/r/docs')).toBe(true);
        expect(listing.has('/r/docs/a.md')).toBe(false);
        expect(listing.has('/r/top.md')).toBe(true);
    });
});

describe('nodeFileSystem', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'pollwatch-lister-'));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('reports size, directory flag and permission bits from disk', async () => {
        await fs.writeFile(path.join(tempDir, 'note.txt'), 'hello');
        await fs.chmod(path.join(tempDir, 'note.txt'), 0o640);
        await fs.mkdir(path.join(tempDir, 'sub'));
        await fs.writeFile(path.join(tempDir, 'sub', 'inner.txt'), 'abc');

        const listing = await new PathLister(nodeFileSystem).list(tempDir, true, options());

        expect([...listing.keys()]).toEqual([
            tempDir,
            path.join(tempDir, 'note.txt'),
            path.join(tempDir, 'sub'),
            path.join(tempDir, 'sub', 'inner.txt'),
        ]);
        const note = listing.get(path.join(tempDir, 'note.txt'));
        expect(note?.size).toBe(5);
        expect(note?.mode).toBe(0o640);
        expect(note?.isDirectory).toBe(false);
        expect(listing.get(path.join(tempDir, 'sub'))?.isDirectory).toBe(true);
    });

    it('rejects with ENOENT for a missing root', async () => {
        const failure = await nodeFileSystem.stat(path.join(tempDir, 'nope')).catch((err: unknown) => err);
        expect(isNotFoundError(failure)).toBe(true);
    });
});
