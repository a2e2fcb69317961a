import { PolicyAnalysisError } from "../entities/analysis-errors.js";
import { type Diagnostic, toDiagnostic } from "../entities/diagnostic.js";
import type {
    Matcher,
    PolicyDocument,
    Statement,
} from "../entities/policy-document.js";
import type {
    AllowedAction,
    EffectivePermissionSet,
    ResolvedPermission,
} from "../entities/resolved-permission.js";
import {
    compareRiskCategories,
    downgradeSeverity,
    type EscalationPathMatch,
    type RiskFinding,
} from "../entities/risk-finding.js";
import type { UnrestrictedAccessLevels } from "../entities/scan-settings.js";
import {
    compareCodeUnits,
    compileWildcard,
    matchesResourcePattern,
} from "../entities/wildcard-pattern.js";
import type { ActionCatalog } from "./action-catalog.port.js";
import type { StatementResolver } from "./resolve-statement.js";

export interface PolicyEvaluation {
    readonly policyId: string;
    readonly policyName: string;
    readonly access: "granted" | "none";
    readonly effective: EffectivePermissionSet;
    readonly findings: readonly RiskFinding[];
    readonly escalationPaths: readonly EscalationPathMatch[];
    /** Allowed actions granted on every resource, sorted. */
    readonly unrestrictedActions: readonly string[];
    readonly diagnostics: readonly Diagnostic[];
}

export interface PolicyEvaluator {
    evaluate(document: PolicyDocument): PolicyEvaluation;
}

export interface PolicyEvaluatorDeps {
    readonly catalog: ActionCatalog;
    readonly resolver: StatementResolver;
    /** Defaults to `modify`. */
    readonly unrestrictedAccessLevels?: UnrestrictedAccessLevels;
}

interface DenyRule {
    readonly resources: Matcher;
    matchesAction(action: string): boolean;
}

function hasConditions(statement: Statement): boolean {
    return Object.keys(statement.conditions).length > 0;
}

function uniqueSorted(values: Iterable<string>): string[] {
    return [...new Set(values)].sort(compareCodeUnits);
}

function coversResource(
    denied: Matcher,
    permission: ResolvedPermission,
): boolean {
    if (denied.kind === "positive") {
        // An Allow with NotResource spans an open-ended set; only "*" covers it.
        if (permission.excludedResources.length > 0) {
            return denied.patterns.includes("*");
        }
        return denied.patterns.some((pattern) =>
            matchesResourcePattern(pattern, permission.resource),
        );
    }

    if (permission.resource === "*") {
        return false;
    }
    return !denied.patterns.some(
        (pattern) =>
            matchesResourcePattern(pattern, permission.resource) ||
            matchesResourcePattern(permission.resource, pattern),
    );
}

function collectDenyRules(
    statements: readonly Statement[],
    resolvedByIndex: ReadonlyMap<number, readonly ResolvedPermission[]>,
): DenyRule[] {
    const rules: DenyRule[] = [];

    for (const statement of statements) {
        // A conditional Deny may not apply at request time.
        if (statement.effect !== "Deny" || hasConditions(statement)) {
            continue;
        }

        if (statement.actions.kind === "positive") {
            const matchers = statement.actions.patterns.map((pattern) =>
                compileWildcard(pattern, { caseSensitive: false }),
            );
            rules.push({
                resources: statement.resources,
                matchesAction: (action) =>
                    matchers.some((regex) => regex.test(action)),
            });
            continue;
        }

        const resolved = resolvedByIndex.get(statement.index);
        if (!resolved) {
            continue;
        }
        const denied = new Set(resolved.map((p) => p.action.toLowerCase()));
        rules.push({
            resources: statement.resources,
            matchesAction: (action) => denied.has(action.toLowerCase()),
        });
    }

    return rules;
}

function summarizeGrant(
    action: string,
    permissions: readonly ResolvedPermission[],
): AllowedAction {
    return {
        action,
        verified: permissions.some((p) => p.verified),
        resources: uniqueSorted(permissions.map((p) => p.resource)),
        excludedResources: uniqueSorted(
            permissions.flatMap((p) => p.excludedResources),
        ),
        statementIndices: [
            ...new Set(permissions.map((p) => p.statementIndex)),
        ].sort((a, b) => a - b),
        conditionRestricted: permissions.every((p) => p.conditionRestricted),
    };
}

export function createPolicyEvaluator(
    deps: PolicyEvaluatorDeps,
): PolicyEvaluator {
    const { catalog, resolver } = deps;
    const includeReadOnly = deps.unrestrictedAccessLevels === "all";

    return {
        evaluate(document: PolicyDocument): PolicyEvaluation {
            const diagnostics: Diagnostic[] = [];
            const resolvedByIndex = new Map<
                number,
                readonly ResolvedPermission[]
            >();

            for (const statement of document.statements) {
                try {
                    const resolution = resolver.resolve(statement);
                    resolvedByIndex.set(
                        statement.index,
                        resolution.permissions,
                    );
                    for (const issue of resolution.issues) {
                        diagnostics.push(toDiagnostic(issue, document));
                    }
                } catch (error) {
                    if (!(error instanceof PolicyAnalysisError)) {
                        throw error;
                    }
                    diagnostics.push(toDiagnostic(error, document));
                }
            }

            // Pass 1: every Deny is known before any Allow is admitted.
            const denyRules = collectDenyRules(
                document.statements,
                resolvedByIndex,
            );

            // Pass 2: admit Allow permissions no Deny covers.
            const granted = new Map<string, ResolvedPermission[]>();
            const displayNames = new Map<string, string>();
            const revokedKeys = new Set<string>();
            for (const permissions of resolvedByIndex.values()) {
                for (const permission of permissions) {
                    if (permission.effect !== "Allow") {
                        continue;
                    }
                    const key = permission.action.toLowerCase();
                    if (!displayNames.has(key)) {
                        displayNames.set(key, permission.action);
                    }
                    const revoked = denyRules.some(
                        (rule) =>
                            rule.matchesAction(permission.action) &&
                            coversResource(rule.resources, permission),
                    );
                    if (revoked) {
                        revokedKeys.add(key);
                        continue;
                    }
                    const existing = granted.get(key);
                    if (existing) {
                        existing.push(permission);
                    } else {
                        granted.set(key, [permission]);
                    }
                }
            }

            const allowed = new Map<string, AllowedAction>();
            const allowedEntries = [...granted.entries()]
                .map(([key, permissions]) =>
                    summarizeGrant(
                        displayNames.get(key) ?? key,
                        permissions,
                    ),
                )
                .sort((a, b) => compareCodeUnits(a.action, b.action));
            for (const entry of allowedEntries) {
                allowed.set(entry.action, entry);
            }

            const revoked = uniqueSorted(
                [...revokedKeys]
                    .filter((key) => !granted.has(key))
                    .map((key) => displayNames.get(key) ?? key),
            );

            const findings: RiskFinding[] = [];
            for (const entry of allowedEntries) {
                const categories = [...catalog.tags(entry.action)].sort(
                    compareRiskCategories,
                );
                for (const category of categories) {
                    const base = catalog.severityOf(category);
                    findings.push({
                        policyId: document.id,
                        policyName: document.name,
                        sourceKind: document.sourceKind,
                        principal: document.principal,
                        action: entry.action,
                        category,
                        severity: entry.conditionRestricted
                            ? downgradeSeverity(base)
                            : base,
                        resources: entry.resources,
                        excludedResources: entry.excludedResources,
                        statementIndices: entry.statementIndices,
                        suppressed: false,
                        suppressedBy: null,
                    });
                }
            }

            const allowedKeys = new Set(granted.keys());
            const escalationPaths = catalog
                .escalationPaths()
                .filter((path) =>
                    path.actions.every((action) =>
                        allowedKeys.has(action.toLowerCase()),
                    ),
                )
                .map((path) => ({ id: path.id, actions: path.actions }))
                .sort((a, b) => compareCodeUnits(a.id, b.id));

            const unrestrictedActions = allowedEntries
                .filter(
                    (entry) =>
                        entry.resources.includes("*") &&
                        (includeReadOnly || !catalog.isReadOnly(entry.action)),
                )
                .map((entry) => entry.action);

            return {
                policyId: document.id,
                policyName: document.name,
                access: allowed.size > 0 ? "granted" : "none",
                effective: { allowed, revoked },
                findings,
                escalationPaths,
                unrestrictedActions,
                diagnostics,
            };
        },
    };
}
