const REGEX_SPECIALS = /[.+^${}()|[\]\\]/g;

export function hasWildcard(pattern: string): boolean {
    return pattern.includes("*") || pattern.includes("?");
}

/**
 * IAM-style wildcard: `*` matches any run of characters, `?` exactly one.
 */
export function compileWildcard(
    pattern: string,
    options: { readonly caseSensitive: boolean },
): RegExp {
    const body = pattern
        .replace(REGEX_SPECIALS, "\\$&")
        .replace(/\*/g, ".*")
        .replace(/\?/g, ".");
    return new RegExp(`^${body}$`, options.caseSensitive ? "" : "i");
}

export function matchesActionPattern(pattern: string, action: string): boolean {
    return compileWildcard(pattern, { caseSensitive: false }).test(action);
}

export function matchesResourcePattern(
    pattern: string,
    resource: string,
): boolean {
    return compileWildcard(pattern, { caseSensitive: true }).test(resource);
}

export function splitAction(action: string): {
    readonly service: string;
    readonly name: string;
} {
    const colonIndex = action.indexOf(":");
    if (colonIndex < 0) {
        return { service: "", name: action };
    }
    return {
        service: action.substring(0, colonIndex).toLowerCase(),
        name: action.substring(colonIndex + 1),
    };
}

export function compareCodeUnits(a: string, b: string): number {
    if (a < b) {
        return -1;
    }
    return a > b ? 1 : 0;
}
