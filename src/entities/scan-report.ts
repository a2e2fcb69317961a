import type { Diagnostic } from "./diagnostic.js";
import type { PolicySourceKind, PrincipalRef } from "./policy-document.js";
import type { EscalationPathMatch, RiskFinding } from "./risk-finding.js";

export interface PolicySource {
    readonly id: string;
    readonly name: string;
    readonly sourceKind: PolicySourceKind;
    readonly principal: PrincipalRef | null;
    readonly document: unknown;
}

export type ManagedBy = "AWS" | "Customer";

export interface PrincipalPolicyMappingEntry {
    readonly principal: string;
    readonly type: "User" | "Group" | "Role";
    readonly policyType: "Inline" | "Managed";
    readonly managedBy: ManagedBy;
    readonly policyName: string;
    readonly groupMembership: readonly string[] | null;
    /** The group a user inherits the policy from; null for direct grants. */
    readonly viaGroup: string | null;
}

export interface AccountInventory {
    readonly principalPolicyMapping: readonly PrincipalPolicyMappingEntry[];
    /** Names of customer-managed policies, de-duplicated and sorted. */
    readonly customerManagedPoliciesInUse: readonly string[];
    readonly awsManagedPoliciesInUse: readonly string[];
}

export type PolicyAccess = "granted" | "none" | "unevaluated";

export interface PolicyScanResult {
    readonly policyId: string;
    readonly policyName: string;
    readonly sourceKind: PolicySourceKind;
    readonly principal: PrincipalRef | null;
    readonly access: PolicyAccess;
    readonly allowedActionCount: number;
    readonly revokedActions: readonly string[];
    readonly findings: readonly RiskFinding[];
    readonly escalationPaths: readonly EscalationPathMatch[];
    readonly unrestrictedActions: readonly string[];
    readonly diagnostics: readonly Diagnostic[];
}

export interface ScanSummary {
    readonly policies: number;
    readonly policiesWithoutAccess: number;
    readonly findings: number;
    readonly suppressedFindings: number;
    readonly escalationPaths: number;
    readonly diagnostics: number;
}

export interface ScanReport extends AccountInventory {
    readonly catalogVersion: string;
    readonly summary: ScanSummary;
    readonly policies: readonly PolicyScanResult[];
    /** The mapping without the entries exclusion rules suppress. */
    readonly principalPolicyMappingAfterExclusions: readonly PrincipalPolicyMappingEntry[];
}
