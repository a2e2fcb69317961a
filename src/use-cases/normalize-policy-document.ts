import type { ZodError } from "zod";
import { MalformedStatementError } from "../entities/analysis-errors.js";
import { type Diagnostic, toDiagnostic } from "../entities/diagnostic.js";
import type {
    Matcher,
    PolicyDocument,
    Statement,
} from "../entities/policy-document.js";
import type { PolicySource } from "../entities/scan-report.js";
import {
    RawPolicyDocumentSchema,
    type RawStatement,
    RawStatementSchema,
} from "./policy-document.schema.js";

const ACTION_PATTERN_REGEX = /^(\*|[A-Za-z0-9*?-]+:[A-Za-z0-9*?_-]+)$/;

export interface NormalizedPolicy {
    readonly document: PolicyDocument;
    /** Statements dropped as malformed. */
    readonly diagnostics: readonly Diagnostic[];
}

export interface PolicyDocumentNormalizer {
    /**
     * Throws MalformedStatementError when the document itself cannot be read;
     * malformed statements are dropped and reported instead.
     */
    normalize(source: PolicySource): NormalizedPolicy;
}

export interface PolicyDocumentNormalizerOptions {
    readonly notActionScope: readonly string[];
}

function describeIssues(error: ZodError): string {
    return error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
}

function toList(value: string | readonly string[]): readonly string[] {
    return typeof value === "string" ? [value] : value;
}

function buildMatcher(
    positive: string | readonly string[] | undefined,
    negated: string | readonly string[] | undefined,
    fields: readonly [string, string],
    statementIndex: number,
): Matcher {
    const [positiveField, negatedField] = fields;
    if (positive !== undefined && negated !== undefined) {
        throw new MalformedStatementError(
            `Statement cannot contain both ${positiveField} and ${negatedField}`,
            statementIndex,
        );
    }

    const field = positive !== undefined ? positiveField : negatedField;
    const value = positive ?? negated;
    if (value === undefined) {
        throw new MalformedStatementError(
            `Statement must contain ${positiveField} or ${negatedField}`,
            statementIndex,
        );
    }

    const patterns = toList(value);
    if (patterns.length === 0) {
        throw new MalformedStatementError(
            `${field} must not be empty`,
            statementIndex,
        );
    }
    if (patterns.some((pattern) => pattern.trim().length === 0)) {
        throw new MalformedStatementError(
            `${field} contains an empty pattern`,
            statementIndex,
        );
    }

    return {
        kind: positive !== undefined ? "positive" : "negated",
        patterns,
    };
}

function buildStatement(
    raw: RawStatement,
    statementIndex: number,
    serviceScope: readonly string[],
): Statement {
    if (raw.Effect !== "Allow" && raw.Effect !== "Deny") {
        throw new MalformedStatementError(
            `Effect must be "Allow" or "Deny" (got ${JSON.stringify(raw.Effect ?? null)})`,
            statementIndex,
        );
    }

    const actions = buildMatcher(
        raw.Action,
        raw.NotAction,
        ["Action", "NotAction"],
        statementIndex,
    );
    const invalid = actions.patterns.find(
        (pattern) => !ACTION_PATTERN_REGEX.test(pattern),
    );
    if (invalid !== undefined) {
        throw new MalformedStatementError(
            `Action pattern "${invalid}" must be "*" or "service:action"`,
            statementIndex,
        );
    }

    return {
        index: statementIndex,
        sid: raw.Sid ?? null,
        effect: raw.Effect,
        actions,
        resources: buildMatcher(
            raw.Resource,
            raw.NotResource,
            ["Resource", "NotResource"],
            statementIndex,
        ),
        conditions: raw.Condition ?? {},
        serviceScope,
    };
}

export function createPolicyDocumentNormalizer(
    options: PolicyDocumentNormalizerOptions,
): PolicyDocumentNormalizer {
    return {
        normalize(source: PolicySource): NormalizedPolicy {
            const parsed = RawPolicyDocumentSchema.safeParse(source.document);
            if (!parsed.success) {
                throw new MalformedStatementError(
                    `Policy document is malformed: ${describeIssues(parsed.error)}`,
                );
            }

            const rawStatements = Array.isArray(parsed.data.Statement)
                ? parsed.data.Statement
                : [parsed.data.Statement];

            const statements: Statement[] = [];
            const diagnostics: Diagnostic[] = [];
            rawStatements.forEach((rawStatement, index) => {
                const statement = RawStatementSchema.safeParse(rawStatement);
                try {
                    if (!statement.success) {
                        throw new MalformedStatementError(
                            `Statement ${index} is malformed: ${describeIssues(statement.error)}`,
                            index,
                        );
                    }
                    statements.push(
                        buildStatement(
                            statement.data,
                            index,
                            options.notActionScope,
                        ),
                    );
                } catch (error) {
                    if (!(error instanceof MalformedStatementError)) {
                        throw error;
                    }
                    diagnostics.push(toDiagnostic(error, source));
                }
            });

            return {
                document: {
                    id: source.id,
                    name: source.name,
                    sourceKind: source.sourceKind,
                    principal: source.principal,
                    statements,
                },
                diagnostics,
            };
        },
    };
}
