import { getByDotPath, isRecord } from './dotPath';

const PLACEHOLDER = /{{\s*([^}]+?)\s*}}/g;
const WHOLE_PLACEHOLDER = /^{{\s*([^}]+?)\s*}}$/;

export function renderTemplate(template: string, scope: unknown): string {
    return template.replace(PLACEHOLDER, (_match, rawPath: string) => {
        const value = getByDotPath(scope, rawPath);
        if (value === null || value === undefined) return '';
        if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
            return String(value);
        }
        return JSON.stringify(value);
    });
}

/**
 * Resolves `{{path}}` placeholders throughout a tool argument tree.
 * A string that is exactly one placeholder takes the referenced value as is,
 * so objects and numbers survive; anything else is string interpolation.
 */
export function resolveTemplates(value: unknown, scope: unknown): unknown {
    if (typeof value === 'string') {
        const whole = WHOLE_PLACEHOLDER.exec(value);
        if (whole?.[1]) return getByDotPath(scope, whole[1]);
        return renderTemplate(value, scope);
    }
    if (Array.isArray(value)) {
        return value.map((v) => resolveTemplates(v, scope));
    }
    if (isRecord(value)) {
        const out: Record<string, unknown> = {};
        for (const [k, v] of Object.entries(value)) {
            out[k] = resolveTemplates(v, scope);
        }
        return out;
    }
    return value;
}

export function resolveArguments(args: Record<string, unknown>, scope: unknown): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(args)) {
        out[k] = resolveTemplates(v, scope);
    }
    return out;
}
