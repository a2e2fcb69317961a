import { InvalidExclusionPatternError } from "./analysis-errors.js";

export interface GlobPattern {
    readonly source: string;
    test(value: string): boolean;
}

const LITERAL_SPECIALS = /[.+^${}()|[\]\\]/g;
const CLASS_SPECIALS = /[\\\]^[]/g;

function translate(source: string): string {
    let out = "";
    let i = 0;
    while (i < source.length) {
        const ch = source.charAt(i);
        if (ch === "*") {
            out += ".*";
            i++;
            continue;
        }
        if (ch === "?") {
            out += ".";
            i++;
            continue;
        }
        if (ch === "[") {
            let start = i + 1;
            const negate = source.charAt(start) === "!";
            if (negate) {
                start++;
            }
            // A "]" directly after the opening bracket is a literal member.
            const close = source.indexOf("]", start + 1);
            if (start >= source.length || close < 0) {
                throw new InvalidExclusionPatternError(
                    source,
                    `unterminated character class at position ${i}`,
                );
            }
            const members = source
                .substring(start, close)
                .replace(CLASS_SPECIALS, "\\$&");
            out += `[${negate ? "^" : ""}${members}]`;
            i = close + 1;
            continue;
        }
        out += ch.replace(LITERAL_SPECIALS, "\\$&");
        i++;
    }
    return out;
}

/**
 * Shell-style glob (`*`, `?`, `[seq]`, `[!seq]`), matched case-insensitively
 * against the whole value.
 */
export function compileGlob(source: string): GlobPattern {
    if (source.trim().length === 0) {
        throw new InvalidExclusionPatternError(source, "pattern is empty");
    }

    let regex: RegExp;
    try {
        regex = new RegExp(`^${translate(source)}$`, "i");
    } catch (error) {
        if (error instanceof InvalidExclusionPatternError) {
            throw error;
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new InvalidExclusionPatternError(source, message);
    }

    return {
        source,
        test(value: string): boolean {
            return regex.test(value);
        },
    };
}
