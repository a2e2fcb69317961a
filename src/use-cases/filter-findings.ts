import type { ExclusionRule } from "../entities/exclusion-rule.js";
import type { PrincipalType } from "../entities/policy-document.js";
import type { RiskFinding } from "../entities/risk-finding.js";
import type { PrincipalPolicyMappingEntry } from "../entities/scan-report.js";

export interface ExclusionFilter {
    /**
     * Marks matched findings as suppressed in place and returns the same
     * finding objects in their original order.
     */
    filter(
        findings: readonly RiskFinding[],
        rules: readonly ExclusionRule[],
    ): RiskFinding[];
    /**
     * Drops the entries whose first applicable rule suppresses them. Rules
     * that set an action, category or role path apply to findings only.
     */
    filterMapping(
        entries: readonly PrincipalPolicyMappingEntry[],
        rules: readonly ExclusionRule[],
    ): PrincipalPolicyMappingEntry[];
}

const MAPPING_PRINCIPAL_TYPES: Readonly<
    Record<PrincipalPolicyMappingEntry["type"], PrincipalType>
> = {
    User: "user",
    Group: "group",
    Role: "role",
};

function matchesPolicy(rule: ExclusionRule, finding: RiskFinding): boolean {
    if (!rule.policy) {
        return true;
    }
    return (
        rule.policy.test(finding.policyName) ||
        rule.policy.test(finding.policyId)
    );
}

function matchesPrincipal(rule: ExclusionRule, finding: RiskFinding): boolean {
    if (!rule.principal && !rule.principalType && !rule.rolePath) {
        return true;
    }
    const { principal } = finding;
    if (!principal) {
        return false;
    }
    if (rule.principal && !rule.principal.test(principal.name)) {
        return false;
    }
    if (rule.principalType && rule.principalType !== principal.type) {
        return false;
    }
    if (rule.rolePath) {
        return principal.type === "role" && rule.rolePath.test(principal.path);
    }
    return true;
}

export function ruleMatches(
    rule: ExclusionRule,
    finding: RiskFinding,
): boolean {
    return (
        matchesPolicy(rule, finding) &&
        matchesPrincipal(rule, finding) &&
        (!rule.action || rule.action.test(finding.action)) &&
        (!rule.category || rule.category === finding.category)
    );
}

function appliesToMapping(rule: ExclusionRule): boolean {
    return !rule.action && !rule.category && !rule.rolePath;
}

function mappingEntryMatches(
    rule: ExclusionRule,
    entry: PrincipalPolicyMappingEntry,
): boolean {
    if (rule.policy && !rule.policy.test(entry.policyName)) {
        return false;
    }
    // An inherited entry also belongs to the group it comes from.
    const holders: { name: string; type: PrincipalType }[] = [
        { name: entry.principal, type: MAPPING_PRINCIPAL_TYPES[entry.type] },
    ];
    if (entry.viaGroup !== null) {
        holders.push({ name: entry.viaGroup, type: "group" });
    }
    return holders.some(
        (holder) =>
            (!rule.principal || rule.principal.test(holder.name)) &&
            (!rule.principalType || rule.principalType === holder.type),
    );
}

export function createExclusionFilter(): ExclusionFilter {
    return {
        filter(
            findings: readonly RiskFinding[],
            rules: readonly ExclusionRule[],
        ): RiskFinding[] {
            for (const finding of findings) {
                if (finding.suppressed) {
                    continue;
                }
                const ruleIndex = rules.findIndex((rule) =>
                    ruleMatches(rule, finding),
                );
                const rule = rules[ruleIndex];
                if (!rule || rule.disposition === "keep") {
                    continue;
                }
                finding.suppressed = true;
                finding.suppressedBy = { ruleIndex, reason: rule.reason };
            }
            return [...findings];
        },
        filterMapping(
            entries: readonly PrincipalPolicyMappingEntry[],
            rules: readonly ExclusionRule[],
        ): PrincipalPolicyMappingEntry[] {
            const applicable = rules.filter(appliesToMapping);
            return entries.filter((entry) => {
                const rule = applicable.find((candidate) =>
                    mappingEntryMatches(candidate, entry),
                );
                return !rule || rule.disposition === "keep";
            });
        },
    };
}
