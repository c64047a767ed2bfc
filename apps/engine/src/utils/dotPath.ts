export function isRecord(value: unknown): value is Record<string, unknown> {
    return !!value && typeof value === 'object' && !Array.isArray(value);
}

// Arrays are indexable too: `steps.1.tool_results.0.result`
export function getByDotPath(obj: unknown, path: string): unknown {
    if (!path) return undefined;
    let current: unknown = obj;
    for (const part of path.split('.')) {
        if (Array.isArray(current)) {
            current = current[Number(part)];
        } else if (isRecord(current)) {
            current = current[part];
        } else {
            return undefined;
        }
    }
    return current;
}
