import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { DEFAULT_SETTINGS, loadConfig, parseConfig, resolveSettings } from '../../src/core/config.js';

const SAMPLE = [
    'format: compact',
    'color: purple',
    'trace: true',
    'files:',
    '  - exprs/*.calc',
    'profiles:',
    '  ci:',
    '    format: json',
    '    failFast: true',
    'unknown: 1',
    ''
].join('\n');

describe('parseConfig', () => {
    it('keeps valid fields and warns about the rest', () => {
        const { config, diagnostics } = parseConfig(SAMPLE, '.linecalc.yml');

        expect(config).toEqual({
            format: 'compact',
            trace: true,
            files: ['exprs/*.calc'],
            profiles: {
                ci: { format: 'json', failFast: true }
            }
        });

        expect(diagnostics.map(d => [d.code, d.severity, d.message])).toEqual([
            ['CONFIG_INVALID_FIELD', 'warning', 'Field "color" must be one of auto, always, never, got "purple".'],
            ['CONFIG_INVALID_FIELD', 'warning', 'Unknown field "unknown".']
        ]);
        expect(diagnostics[0].range?.start).toMatchObject({ line: 2, col: 8 });
    });

    it('validates fields inside profiles', () => {
        const { config, diagnostics } = parseConfig('profiles:\n  ci:\n    trace: yes\n', 'cfg.yml');

        expect(config?.profiles).toEqual({ ci: {} });
        expect(diagnostics).toHaveLength(1);
        expect(diagnostics[0].message).toBe('Field "profiles.ci.trace" must be a boolean, got string.');
        expect(diagnostics[0].range?.start.line).toBe(3);
    });

    it('rejects lists with non-string entries', () => {
        const { config, diagnostics } = parseConfig('ignore:\n  - a/**\n  - 3\n', 'cfg.yml');

        expect(config?.ignore).toBeUndefined();
        expect(diagnostics[0].message).toBe('Field "ignore[1]" must be a string.');
    });

    it('warns when the document is not a map', () => {
        const { config, diagnostics } = parseConfig('- 1\n- 2\n', 'cfg.yml');

        expect(config).toEqual({ profiles: {} });
        expect(diagnostics[0].message).toBe('Config must be a map.');
    });

    it('accepts an empty document', () => {
        expect(parseConfig('', 'cfg.yml')).toEqual({ config: { profiles: {} }, diagnostics: [] });
    });

    it('reports YAML syntax errors with a location', () => {
        const { config, diagnostics } = parseConfig('format: [compact\n', 'cfg.yml');

        expect(config).toBeUndefined();
        expect(diagnostics.length).toBeGreaterThan(0);
        expect(diagnostics[0].code).toBe('CONFIG_SYNTAX_ERROR');
        expect(diagnostics[0].file).toBe('cfg.yml');
        expect(diagnostics[0].range).toBeDefined();
    });
});

describe('resolveSettings', () => {
    it('layers config, profile and flags', () => {
        const { config } = parseConfig(SAMPLE, '.linecalc.yml');
        const { settings, diagnostics } = resolveSettings(config, 'ci', { trace: false, files: ['more.calc'], ignore: [] });

        expect(diagnostics).toEqual([]);
        expect(settings).toEqual({
            format: 'json',
            color: 'auto',
            trace: false,
            failFast: true,
            files: ['exprs/*.calc', 'more.calc'],
            ignore: []
        });
    });

    it('falls back to defaults without a config', () => {
        expect(resolveSettings(undefined, undefined, {}).settings).toEqual(DEFAULT_SETTINGS);
    });

    it('does not share list instances with the defaults', () => {
        resolveSettings(undefined, undefined, { files: ['x.calc'] });
        expect(DEFAULT_SETTINGS.files).toEqual([]);
    });

    it('reports profiles that are not defined', () => {
        const { config } = parseConfig(SAMPLE, '.linecalc.yml');

        for (const name of ['nightly', 'toString']) {
            const { settings, diagnostics } = resolveSettings(config, name, {});
            expect(settings.format).toBe('compact');
            expect(diagnostics).toEqual([{
                code: 'CONFIG_UNKNOWN_PROFILE',
                message: `Profile "${name}" is not defined`,
                severity: 'error',
                file: '.linecalc.yml'
            }]);
        }
    });
});

describe('loadConfig', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(path.join(tmpdir(), 'linecalc-config-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('is silent when the default file is absent', () => {
        expect(loadConfig(undefined, dir)).toEqual({ diagnostics: [] });
    });

    it('fails when an explicit file is absent', () => {
        expect(loadConfig('nope.yml', dir)).toEqual({
            diagnostics: [{
                code: 'FILE_READ_ERROR',
                message: 'Config file not found: nope.yml',
                severity: 'error',
                file: 'nope.yml'
            }]
        });
    });

    it('reads the default file from the working directory', () => {
        writeFileSync(path.join(dir, '.linecalc.yml'), 'format: plain\ncolor: never\n');

        expect(loadConfig(undefined, dir)).toEqual({
            config: { format: 'plain', color: 'never', profiles: {} },
            diagnostics: []
        });
    });
});
