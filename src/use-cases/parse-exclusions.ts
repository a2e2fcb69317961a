import { load } from "js-yaml";
import { InvalidExclusionPatternError } from "../entities/analysis-errors.js";
import type { ExclusionRule } from "../entities/exclusion-rule.js";
import { compileGlob, type GlobPattern } from "../entities/glob-pattern.js";
import type { PrincipalType } from "../entities/policy-document.js";
import { stripDangerousKeys } from "../entities/sanitize-json.js";
import {
    type ExclusionRuleInput,
    ExclusionsFileSchema,
} from "./exclusions.schema.js";

export interface ExclusionsParser {
    /** Throws InvalidExclusionPatternError for any malformed glob. */
    parse(content: string): readonly ExclusionRule[];
}

const RULE_KEY_MAP: Readonly<Record<string, string>> = {
    principal_type: "principalType",
    role_path: "rolePath",
};

function transformRuleKeys(data: unknown): unknown {
    if (typeof data !== "object" || data === null || Array.isArray(data)) {
        return data;
    }
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
        result[RULE_KEY_MAP[key] ?? key] = value;
    }
    return result;
}

function transformFile(data: unknown): unknown {
    if (typeof data !== "object" || data === null || Array.isArray(data)) {
        return data;
    }
    const result: Record<string, unknown> = { ...data };
    const rules = result.rules;
    if (Array.isArray(rules)) {
        result.rules = rules.map(transformRuleKeys);
    }
    return result;
}

function optionalGlob(source: string | undefined): GlobPattern | null {
    return source === undefined ? null : compileGlob(source);
}

function fromRuleInput(
    input: ExclusionRuleInput,
    index: number,
): ExclusionRule {
    const targeted =
        input.policy !== undefined ||
        input.principal !== undefined ||
        input.principalType !== undefined ||
        input.rolePath !== undefined ||
        input.action !== undefined ||
        input.category !== undefined;
    // An untargeted rule would match every finding.
    if (!targeted) {
        throw new InvalidExclusionPatternError(
            `rules[${index}]`,
            "a rule must set at least one of policy, principal, principal_type, role_path, action or category",
        );
    }

    return {
        policy: optionalGlob(input.policy),
        principal: optionalGlob(input.principal),
        principalType: input.principalType ?? null,
        rolePath: optionalGlob(input.rolePath),
        action: optionalGlob(input.action),
        category: input.category ?? null,
        disposition: input.disposition,
        reason: input.reason ?? null,
    };
}

function emptyRule(): ExclusionRule {
    return {
        policy: null,
        principal: null,
        principalType: null,
        rolePath: null,
        action: null,
        category: null,
        disposition: "suppress",
        reason: null,
    };
}

// Blank entries are placeholders in starter files.
function listed(patterns: readonly string[]): string[] {
    return patterns.filter((pattern) => pattern.trim().length > 0);
}

function principalRules(
    patterns: readonly string[],
    principalType: PrincipalType,
): ExclusionRule[] {
    return listed(patterns).map((pattern) => ({
        ...emptyRule(),
        principal: compileGlob(pattern),
        principalType,
        reason: `${principalType} excluded by name`,
    }));
}

export function createExclusionsParser(): ExclusionsParser {
    return {
        parse(content: string): readonly ExclusionRule[] {
            let raw: unknown;
            try {
                raw = load(content);
            } catch (error) {
                const message =
                    error instanceof Error ? error.message : String(error);
                throw new Error(
                    `Invalid YAML: exclusions file is not valid YAML (${message})`,
                );
            }

            const sanitized = stripDangerousKeys(raw ?? {});
            const file = ExclusionsFileSchema.parse(transformFile(sanitized));

            return [
                ...file.rules.map((rule, index) => fromRuleInput(rule, index)),
                ...listed(file["include-actions"]).map((pattern) => ({
                    ...emptyRule(),
                    action: compileGlob(pattern),
                    disposition: "keep" as const,
                    reason: "action always reported",
                })),
                ...listed(file.policies).map((pattern) => ({
                    ...emptyRule(),
                    policy: compileGlob(pattern),
                    reason: "policy excluded by name",
                })),
                ...principalRules(file.roles, "role"),
                ...principalRules(file.users, "user"),
                ...principalRules(file.groups, "group"),
                ...listed(file["exclude-actions"]).map((pattern) => ({
                    ...emptyRule(),
                    action: compileGlob(pattern),
                    reason: "action excluded",
                })),
            ];
        },
    };
}
