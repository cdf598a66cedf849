import { isMap, isNode, isScalar, Node } from 'yaml';
import { Diagnostic } from '../types/diagnostic.js';
import { ParsedYaml, getNodeRange } from '../parser/yaml.js';

export interface SchemaField {
    type: 'string' | 'boolean' | 'list' | 'map';
    values?: readonly string[]; // Allowed values for strings
    items?: SchemaField; // For lists
    entries?: Record<string, SchemaField>; // For maps with arbitrary keys, the schema of each value
}

export interface SchemaResult {
    value: Record<string, unknown>;
    diagnostics: Diagnostic[];
}

type ValueType = 'string' | 'boolean' | 'list' | 'map' | 'number' | 'null' | 'other';

function typeOf(val: unknown): ValueType {
    if (val === null || val === undefined) return 'null';
    if (Array.isArray(val)) return 'list';
    if (typeof val === 'string') return 'string';
    if (typeof val === 'boolean') return 'boolean';
    if (typeof val === 'number') return 'number';
    if (typeof val === 'object') return 'map';
    return 'other';
}

export function isRecord(val: unknown): val is Record<string, unknown> {
    return typeOf(val) === 'map';
}

function childNode(node: Node | null | undefined, key: string): Node | undefined {
    if (!isMap(node)) return undefined;
    const pair = node.items.find(p => isScalar(p.key) && String(p.key.value) === key);
    if (!pair) return undefined;
    if (isNode(pair.value)) return pair.value;
    return isNode(pair.key) ? pair.key : undefined;
}

function checkField(val: unknown, field: SchemaField, fieldPath: string): string | undefined {
    const actualType = typeOf(val);
    if (actualType !== field.type) {
        return `Field "${fieldPath}" must be a ${field.type}, got ${actualType}.`;
    }

    if (field.values && typeof val === 'string' && !field.values.includes(val)) {
        return `Field "${fieldPath}" must be one of ${field.values.join(', ')}, got "${val}".`;
    }

    const items = field.items;
    if (items && Array.isArray(val)) {
        const bad = val.findIndex(item => checkField(item, items, `${fieldPath}[]`) !== undefined);
        if (bad !== -1) {
            return `Field "${fieldPath}[${bad}]" must be a ${items.type}.`;
        }
    }

    return undefined;
}

/**
 * Checks a plain value (from `doc.toJS()`) against a schema. Fields that fail
 * are reported as warnings and left out of the returned value, so callers fall
 * back to their defaults for them.
 */
export function validateSchema(
    obj: unknown,
    schema: Record<string, SchemaField>,
    doc: ParsedYaml,
    node: Node | null | undefined,
    prefix: string = ''
): SchemaResult {
    const diagnostics: Diagnostic[] = [];
    const value: Record<string, unknown> = {};

    if (!isRecord(obj)) {
        if (obj !== null && obj !== undefined) {
            diagnostics.push({
                code: 'CONFIG_INVALID_FIELD',
                message: `${prefix ? `"${prefix}"` : 'Config'} must be a map.`,
                severity: 'warning',
                file: doc.filePath,
                range: getNodeRange(node, doc.lineCounter)
            });
        }
        return { value, diagnostics };
    }

    for (const [key, val] of Object.entries(obj)) {
        const fieldPath = prefix ? `${prefix}.${key}` : key;
        const field = schema[key];
        const fieldNode = childNode(node, key);
        const range = getNodeRange(fieldNode ?? node, doc.lineCounter);

        if (!field) {
            diagnostics.push({
                code: 'CONFIG_INVALID_FIELD',
                message: `Unknown field "${fieldPath}".`,
                severity: 'warning',
                file: doc.filePath,
                range
            });
            continue;
        }

        const problem = checkField(val, field, fieldPath);
        if (problem) {
            diagnostics.push({
                code: 'CONFIG_INVALID_FIELD',
                message: problem,
                severity: 'warning',
                file: doc.filePath,
                range
            });
            continue;
        }

        if (field.entries && isRecord(val)) {
            const entries: Record<string, unknown> = {};
            for (const [name, entry] of Object.entries(val)) {
                const nested = validateSchema(entry, field.entries, doc, childNode(fieldNode, name), `${fieldPath}.${name}`);
                diagnostics.push(...nested.diagnostics);
                entries[name] = nested.value;
            }
            value[key] = entries;
            continue;
        }

        value[key] = val;
    }

    return { value, diagnostics };
}
