import {
    AmbiguousNotActionError,
    type PolicyAnalysisError,
    UnknownServiceError,
    UnmatchedActionPatternError,
} from "../entities/analysis-errors.js";
import type { Statement } from "../entities/policy-document.js";
import type { ResolvedPermission } from "../entities/resolved-permission.js";
import {
    compileWildcard,
    hasWildcard,
    matchesActionPattern,
    splitAction,
} from "../entities/wildcard-pattern.js";
import type { ActionCatalog } from "./action-catalog.port.js";
import type { ConditionClassifier } from "./classify-conditions.js";

export interface ExpandedAction {
    readonly action: string;
    readonly verified: boolean;
}

export interface ActionExpansion {
    readonly actions: readonly ExpandedAction[];
    readonly issues: readonly PolicyAnalysisError[];
}

interface ResourceTarget {
    readonly resource: string;
    readonly excludedResources: readonly string[];
}

export interface StatementResolution {
    readonly permissions: readonly ResolvedPermission[];
    /** Non-fatal problems; the permissions are still usable. */
    readonly issues: readonly PolicyAnalysisError[];
}

export interface StatementResolver {
    /**
     * Throws {@link AmbiguousNotActionError} when a `NotAction` statement has
     * no service scope.
     */
    resolve(statement: Statement): StatementResolution;
    expandActions(
        patterns: readonly string[],
        statementIndex: number,
    ): ActionExpansion;
}

export interface StatementResolverDeps {
    readonly catalog: ActionCatalog;
    readonly conditionClassifier: ConditionClassifier;
}

export function createStatementResolver(
    deps: StatementResolverDeps,
): StatementResolver {
    const { catalog } = deps;

    function expandPattern(
        pattern: string,
        statementIndex: number,
    ): ActionExpansion {
        if (!hasWildcard(pattern)) {
            const canonical = catalog.canonicalName(pattern);
            if (canonical !== undefined) {
                return {
                    actions: [{ action: canonical, verified: true }],
                    issues: [],
                };
            }
            const { service } = splitAction(pattern);
            const issues =
                catalog.lookup(service).size === 0
                    ? [new UnknownServiceError(service, pattern, statementIndex)]
                    : [];
            return { actions: [{ action: pattern, verified: false }], issues };
        }

        const servicePattern = pattern.includes(":")
            ? splitAction(pattern).service
            : "*";
        const matcher = compileWildcard(pattern, { caseSensitive: false });
        const actions = catalog
            .services()
            .filter((service) => matchesActionPattern(servicePattern, service))
            .flatMap((service) => [...catalog.lookup(service)])
            .filter((action) => matcher.test(action))
            .map((action) => ({ action, verified: true }));

        if (actions.length === 0) {
            return {
                actions,
                issues: [
                    new UnmatchedActionPatternError(pattern, statementIndex),
                ],
            };
        }
        return { actions, issues: [] };
    }

    function expandActions(
        patterns: readonly string[],
        statementIndex: number,
    ): ActionExpansion {
        const seen = new Set<string>();
        const actions: ExpandedAction[] = [];
        const issues: PolicyAnalysisError[] = [];

        for (const pattern of patterns) {
            const expansion = expandPattern(pattern, statementIndex);
            issues.push(...expansion.issues);
            for (const entry of expansion.actions) {
                const key = entry.action.toLowerCase();
                if (!seen.has(key)) {
                    seen.add(key);
                    actions.push(entry);
                }
            }
        }

        return { actions, issues };
    }

    function expandNotActions(statement: Statement): ExpandedAction[] {
        const negated = statement.actions.patterns;
        if (statement.serviceScope.length === 0) {
            throw new AmbiguousNotActionError(negated, statement.index);
        }

        const excluded = negated.map((pattern) =>
            compileWildcard(pattern, { caseSensitive: false }),
        );
        return catalog
            .services()
            .filter((service) =>
                statement.serviceScope.some((scope) =>
                    matchesActionPattern(scope, service),
                ),
            )
            .flatMap((service) => [...catalog.lookup(service)])
            .filter((action) => !excluded.some((regex) => regex.test(action)))
            .map((action) => ({ action, verified: true }));
    }

    return {
        expandActions,

        resolve(statement: Statement): StatementResolution {
            const { onlyRestrictive } = deps.conditionClassifier.classify(
                statement.conditions,
            );

            let actions: readonly ExpandedAction[];
            let issues: readonly PolicyAnalysisError[] = [];
            if (statement.actions.kind === "positive") {
                const expansion = expandActions(
                    statement.actions.patterns,
                    statement.index,
                );
                actions = expansion.actions;
                issues = expansion.issues;
            } else {
                actions = expandNotActions(statement);
            }

            const targets: readonly ResourceTarget[] =
                statement.resources.kind === "positive"
                    ? statement.resources.patterns.map((resource) => ({
                          resource,
                          excludedResources: [],
                      }))
                    : [
                          {
                              resource: "*",
                              excludedResources: statement.resources.patterns,
                          },
                      ];

            const seen = new Set<string>();
            const permissions: ResolvedPermission[] = [];
            for (const { action, verified } of actions) {
                for (const target of targets) {
                    const key = `${action.toLowerCase()}|${target.resource}`;
                    if (seen.has(key)) {
                        continue;
                    }
                    seen.add(key);
                    permissions.push({
                        action,
                        resource: target.resource,
                        excludedResources: target.excludedResources,
                        effect: statement.effect,
                        statement,
                        statementIndex: statement.index,
                        verified,
                        conditionRestricted: onlyRestrictive,
                    });
                }
            }

            return { permissions, issues };
        },
    };
}
