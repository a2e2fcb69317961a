export const DANGEROUS_KEYS: ReadonlySet<string> = new Set([
    "__proto__",
    "constructor",
    "prototype",
]);
const MAX_DEPTH = 64;

function isPlainRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function sanitize(value: unknown, depth: number): unknown {
    if (depth > MAX_DEPTH) {
        throw new Error("document nesting too deep");
    }
    if (Array.isArray(value)) {
        return value.map((item) => sanitize(item, depth + 1));
    }
    if (!isPlainRecord(value)) {
        return value;
    }
    const entries = Object.entries(value)
        .filter(([key]) => !DANGEROUS_KEYS.has(key))
        .map(([key, val]) => [key, sanitize(val, depth + 1)] as const);
    return Object.fromEntries(entries);
}

export function stripDangerousKeys(value: unknown): unknown {
    return sanitize(value, 0);
}

/**
 * Parses JSON and drops prototype-polluting keys. `label` names the input in
 * error messages.
 */
export function parseJsonInput(content: string, label: string): unknown {
    let raw: unknown;
    try {
        raw = JSON.parse(content);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Invalid JSON: ${label} is not valid JSON (${message})`);
    }

    try {
        return stripDangerousKeys(raw);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(
            `Invalid JSON: ${label} could not be sanitized (${message})`,
        );
    }
}
