import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('fs', async importOriginal => {
    const actual = await importOriginal<typeof import('fs')>();
    return { ...actual, readFileSync: vi.fn(actual.readFileSync) };
});

import { fromArguments, loadExpressionFiles, parseExpressionFile } from '../../src/core/sources.js';

describe('fromArguments', () => {
    it('names each argument by its position', () => {
        expect(fromArguments(['1 + 2', '3'])).toEqual([
            { text: '1 + 2', file: '<arg:1>', line: 1 },
            { text: '3', file: '<arg:2>', line: 1 }
        ]);
    });
});

describe('parseExpressionFile', () => {
    it('reads one expression per line, skipping blanks and comments', () => {
        const content = '# totals\n10 + 3\n\n   \n5 - 2\r\n  # done\n';

        expect(parseExpressionFile(content, 'totals.calc')).toEqual([
            { text: '10 + 3', file: 'totals.calc', line: 2 },
            { text: '5 - 2', file: 'totals.calc', line: 5 }
        ]);
    });

    it('strips a BOM but keeps the line text verbatim', () => {
        expect(parseExpressionFile('\uFEFF 1 +\t2', 'a.calc')).toEqual([
            { text: ' 1 +\t2', file: 'a.calc', line: 1 }
        ]);
    });
});

describe('loadExpressionFiles', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(path.join(tmpdir(), 'linecalc-sources-'));
        mkdirSync(path.join(dir, 'node_modules'));
        mkdirSync(path.join(dir, 'skipped'));
        writeFileSync(path.join(dir, 'a.calc'), '1 + 1\n');
        writeFileSync(path.join(dir, 'b.calc'), '# nothing\n2 - 1\n3\n');
        writeFileSync(path.join(dir, 'node_modules', 'c.calc'), '9\n');
        writeFileSync(path.join(dir, 'skipped', 'd.calc'), '9\n');
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('expands globs in sorted order and honors ignore patterns', async () => {
        const loaded = await loadExpressionFiles(['**/*.calc'], { cwd: dir, ignore: ['skipped/**'] });

        expect(loaded.diagnostics).toEqual([]);
        expect(loaded.expressions).toEqual([
            { text: '1 + 1', file: 'a.calc', line: 1 },
            { text: '2 - 1', file: 'b.calc', line: 2 },
            { text: '3', file: 'b.calc', line: 3 }
        ]);
    });

    it('reads a file matched by several patterns once', async () => {
        const loaded = await loadExpressionFiles(['a.calc', '*.calc'], { cwd: dir });

        expect(loaded.expressions.map(e => `${e.file}:${e.line}`)).toEqual(['a.calc:1', 'b.calc:2', 'b.calc:3']);
    });

    it('reports files that match but cannot be read', async () => {
        vi.mocked(readFileSync).mockImplementationOnce(() => {
            throw new Error('EACCES: permission denied');
        });

        const loaded = await loadExpressionFiles(['*.calc'], { cwd: dir });

        expect(loaded.diagnostics).toEqual([{
            code: 'FILE_READ_ERROR',
            message: 'Failed to read a.calc: EACCES: permission denied',
            severity: 'error',
            file: 'a.calc'
        }]);
        expect(loaded.expressions).toEqual([
            { text: '2 - 1', file: 'b.calc', line: 2 },
            { text: '3', file: 'b.calc', line: 3 }
        ]);
    });

    it('warns about patterns that match nothing', async () => {
        const loaded = await loadExpressionFiles(['missing/*.calc'], { cwd: dir });

        expect(loaded.expressions).toEqual([]);
        expect(loaded.diagnostics).toEqual([{
            code: 'NO_EXPRESSIONS',
            message: 'No files matched "missing/*.calc"',
            severity: 'warning',
            file: 'missing/*.calc'
        }]);
    });
});
