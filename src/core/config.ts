import { readFileSync, existsSync } from 'fs';
import path from 'path';
import { Diagnostic } from '../types/diagnostic.js';
import { parseYaml } from '../parser/yaml.js';
import { SchemaField, validateSchema, isRecord } from './schema.js';
import { OutputFormat, ColorMode, OUTPUT_FORMATS, COLOR_MODES } from './reporter.js';

export const DEFAULT_CONFIG_FILE = '.linecalc.yml';

export interface ConfigFields {
    format?: OutputFormat;
    color?: ColorMode;
    trace?: boolean;
    failFast?: boolean;
    files?: string[];
    ignore?: string[];
}

export interface LinecalcConfig extends ConfigFields {
    profiles: Record<string, ConfigFields>;
}

export interface Settings {
    format: OutputFormat;
    color: ColorMode;
    trace: boolean;
    failFast: boolean;
    files: string[];
    ignore: string[];
}

export const DEFAULT_SETTINGS: Settings = {
    format: 'pretty',
    color: 'auto',
    trace: false,
    failFast: false,
    files: [],
    ignore: []
};

const PROFILE_SCHEMA: Record<string, SchemaField> = {
    format: { type: 'string', values: OUTPUT_FORMATS },
    color: { type: 'string', values: COLOR_MODES },
    trace: { type: 'boolean' },
    failFast: { type: 'boolean' },
    files: { type: 'list', items: { type: 'string' } },
    ignore: { type: 'list', items: { type: 'string' } }
};

export const CONFIG_SCHEMA: Record<string, SchemaField> = {
    ...PROFILE_SCHEMA,
    profiles: { type: 'map', entries: PROFILE_SCHEMA }
};

function pick<T extends string>(allowed: readonly T[], val: unknown): T | undefined {
    return allowed.find(a => a === val);
}

function stringList(val: unknown): string[] | undefined {
    return Array.isArray(val) ? val.filter((v): v is string => typeof v === 'string') : undefined;
}

function toFields(raw: Record<string, unknown>): ConfigFields {
    return {
        format: pick(OUTPUT_FORMATS, raw.format),
        color: pick(COLOR_MODES, raw.color),
        trace: typeof raw.trace === 'boolean' ? raw.trace : undefined,
        failFast: typeof raw.failFast === 'boolean' ? raw.failFast : undefined,
        files: stringList(raw.files),
        ignore: stringList(raw.ignore)
    };
}

export function parseConfig(text: string, filePath: string): { config?: LinecalcConfig, diagnostics: Diagnostic[] } {
    const { parsed, diagnostics } = parseYaml(text, filePath);
    if (!parsed) {
        return { diagnostics };
    }

    const result = validateSchema(parsed.doc.toJS(), CONFIG_SCHEMA, parsed, parsed.doc.contents);
    diagnostics.push(...result.diagnostics);

    const profiles: Record<string, ConfigFields> = {};
    const rawProfiles = result.value.profiles;
    if (isRecord(rawProfiles)) {
        for (const [name, profile] of Object.entries(rawProfiles)) {
            if (isRecord(profile)) profiles[name] = toFields(profile);
        }
    }

    return {
        config: { ...toFields(result.value), profiles },
        diagnostics
    };
}

/**
 * Loads `configPath`, or `.linecalc.yml` under `cwd` when no path is given.
 * Only an explicitly requested file has to exist.
 */
export function loadConfig(configPath: string | undefined, cwd: string): { config?: LinecalcConfig, diagnostics: Diagnostic[] } {
    const resolved = path.resolve(cwd, configPath ?? DEFAULT_CONFIG_FILE);
    const file = path.relative(cwd, resolved);

    if (!existsSync(resolved)) {
        if (configPath === undefined) {
            return { diagnostics: [] };
        }
        return {
            diagnostics: [{
                code: 'FILE_READ_ERROR',
                message: `Config file not found: ${file}`,
                severity: 'error',
                file
            }]
        };
    }

    let text: string;
    try {
        text = readFileSync(resolved, 'utf8');
    } catch (e) {
        return {
            diagnostics: [{
                code: 'FILE_READ_ERROR',
                message: `Failed to read config file ${file}: ${e instanceof Error ? e.message : String(e)}`,
                severity: 'error',
                file
            }]
        };
    }

    return parseConfig(text, file);
}

function applyConfig(source: ConfigFields | undefined, target: Settings): void {
    if (!source) return;
    if (source.format !== undefined) target.format = source.format;
    if (source.color !== undefined) target.color = source.color;
    if (source.trace !== undefined) target.trace = source.trace;
    if (source.failFast !== undefined) target.failFast = source.failFast;
    if (source.files) target.files.push(...source.files);
    if (source.ignore) target.ignore.push(...source.ignore);
}

/**
 * Layers defaults, the config file, the chosen profile and explicit flags, in
 * that order. Scalars are replaced, lists are appended.
 */
export function resolveSettings(
    config: LinecalcConfig | undefined,
    profile: string | undefined,
    overrides: ConfigFields,
    configFile: string = DEFAULT_CONFIG_FILE
): { settings: Settings, diagnostics: Diagnostic[] } {
    const settings: Settings = { ...DEFAULT_SETTINGS, files: [], ignore: [] };
    const diagnostics: Diagnostic[] = [];

    applyConfig(config, settings);

    if (profile !== undefined) {
        const selected = config && Object.hasOwn(config.profiles, profile) ? config.profiles[profile] : undefined;
        if (selected) {
            applyConfig(selected, settings);
        } else {
            diagnostics.push({
                code: 'CONFIG_UNKNOWN_PROFILE',
                message: `Profile "${profile}" is not defined`,
                severity: 'error',
                file: configFile
            });
        }
    }

    applyConfig(overrides, settings);

    return { settings, diagnostics };
}
