import type { PolicySourceKind, PrincipalRef } from "./policy-document.js";

export const RISK_CATEGORIES = [
    "privilege-escalation",
    "credentials-exposure",
    "data-exfiltration",
    "resource-exposure",
] as const;

export type RiskCategory = (typeof RISK_CATEGORIES)[number];

export function compareRiskCategories(
    a: RiskCategory,
    b: RiskCategory,
): number {
    return RISK_CATEGORIES.indexOf(a) - RISK_CATEGORIES.indexOf(b);
}

export const SEVERITY_LEVELS = [
    "info",
    "low",
    "medium",
    "high",
    "critical",
] as const;

export type Severity = (typeof SEVERITY_LEVELS)[number];

export function downgradeSeverity(severity: Severity): Severity {
    const index = SEVERITY_LEVELS.indexOf(severity);
    return SEVERITY_LEVELS[Math.max(0, index - 1)] ?? "info";
}

export interface Suppression {
    readonly ruleIndex: number;
    readonly reason: string | null;
}

export interface RiskFinding {
    readonly policyId: string;
    readonly policyName: string;
    readonly sourceKind: PolicySourceKind;
    readonly principal: PrincipalRef | null;
    readonly action: string;
    readonly category: RiskCategory;
    readonly severity: Severity;
    readonly resources: readonly string[];
    readonly excludedResources: readonly string[];
    readonly statementIndices: readonly number[];
    // Written by the exclusion filter only.
    suppressed: boolean;
    suppressedBy: Suppression | null;
}

export interface EscalationPathMatch {
    readonly id: string;
    readonly actions: readonly string[];
}
