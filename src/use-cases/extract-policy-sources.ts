import type { PrincipalRef, PrincipalType } from "../entities/policy-document.js";
import { stripDangerousKeys } from "../entities/sanitize-json.js";
import type {
    AccountInventory,
    ManagedBy,
    PolicySource,
    PrincipalPolicyMappingEntry,
} from "../entities/scan-report.js";
import { compareCodeUnits } from "../entities/wildcard-pattern.js";
import type {
    AttachedPolicyInput,
    AuthorizationDetailsInput,
    InlinePolicyInput,
} from "./authorization-details.schema.js";

const AWS_MANAGED_ARN_REGEX = /^arn:[^:]+:iam::aws:/;

export interface PolicyExtraction extends AccountInventory {
    readonly sources: readonly PolicySource[];
}

export interface PolicyExtractionOptions {
    readonly includeAwsManagedPolicies: boolean;
}

export interface PolicyExtractor {
    extract(
        details: AuthorizationDetailsInput,
        options: PolicyExtractionOptions,
    ): PolicyExtraction;
}

interface PrincipalDetail {
    readonly ref: PrincipalRef;
    readonly inlinePolicies: readonly InlinePolicyInput[];
    readonly attachedPolicies: readonly AttachedPolicyInput[];
    readonly groups: readonly string[];
}

const MAPPING_TYPE_LABELS: Readonly<
    Record<PrincipalType, PrincipalPolicyMappingEntry["type"]>
> = {
    user: "User",
    group: "Group",
    role: "Role",
};

export function isAwsManagedPolicyArn(arn: string): boolean {
    return AWS_MANAGED_ARN_REGEX.test(arn);
}

/**
 * The IAM API returns policy documents URL-encoded; the CLI decodes them.
 * Undecodable strings are passed through for the normalizer to reject.
 */
function decodeDocument(document: unknown): unknown {
    if (typeof document !== "string") {
        return document;
    }
    try {
        return stripDangerousKeys(parseDocumentString(document));
    } catch {
        return document;
    }
}

// Plain JSON may hold a literal "%" that is not an escape sequence.
function parseDocumentString(document: string): unknown {
    try {
        return JSON.parse(document);
    } catch {
        return JSON.parse(decodeURIComponent(document));
    }
}

function collectPrincipals(
    details: AuthorizationDetailsInput,
): PrincipalDetail[] {
    return [
        ...details.UserDetailList.map((user) => ({
            ref: {
                type: "user" as const,
                name: user.UserName,
                path: user.Path,
                arn: user.Arn ?? null,
            },
            inlinePolicies: user.UserPolicyList,
            attachedPolicies: user.AttachedManagedPolicies,
            groups: user.GroupList,
        })),
        ...details.GroupDetailList.map((group) => ({
            ref: {
                type: "group" as const,
                name: group.GroupName,
                path: group.Path,
                arn: group.Arn ?? null,
            },
            inlinePolicies: group.GroupPolicyList,
            attachedPolicies: group.AttachedManagedPolicies,
            groups: [],
        })),
        ...details.RoleDetailList.map((role) => ({
            ref: {
                type: "role" as const,
                name: role.RoleName,
                path: role.Path,
                arn: role.Arn ?? null,
            },
            inlinePolicies: role.RolePolicyList,
            attachedPolicies: role.AttachedManagedPolicies,
            groups: [],
        })),
    ];
}

function managedBy(arn: string): ManagedBy {
    return isAwsManagedPolicyArn(arn) ? "AWS" : "Customer";
}

function mappingEntries(
    principal: PrincipalDetail,
    policyHolder: PrincipalDetail,
    groupMembership: readonly string[] | null,
): PrincipalPolicyMappingEntry[] {
    const base = {
        principal: principal.ref.name,
        type: MAPPING_TYPE_LABELS[principal.ref.type],
        groupMembership,
        viaGroup: policyHolder === principal ? null : policyHolder.ref.name,
    };
    return [
        ...policyHolder.inlinePolicies.map((policy) => ({
            ...base,
            policyType: "Inline" as const,
            managedBy: "Customer" as const,
            policyName: policy.PolicyName,
        })),
        ...policyHolder.attachedPolicies.map((policy) => ({
            ...base,
            policyType: "Managed" as const,
            managedBy: managedBy(policy.PolicyArn),
            policyName: policy.PolicyName,
        })),
    ];
}

function buildPrincipalPolicyMapping(
    principals: readonly PrincipalDetail[],
): PrincipalPolicyMappingEntry[] {
    const groupsByName = new Map<string, PrincipalDetail>();
    for (const principal of principals) {
        if (principal.ref.type === "group") {
            groupsByName.set(principal.ref.name, principal);
        }
    }

    const entries: PrincipalPolicyMappingEntry[] = [];
    for (const principal of principals) {
        entries.push(...mappingEntries(principal, principal, null));
        if (principal.ref.type !== "user") {
            continue;
        }
        // Users also carry what their groups grant.
        for (const groupName of principal.groups) {
            const group = groupsByName.get(groupName);
            if (group) {
                entries.push(
                    ...mappingEntries(principal, group, principal.groups),
                );
            }
        }
    }

    return entries.sort(
        (a, b) =>
            compareCodeUnits(a.type, b.type) ||
            compareCodeUnits(a.principal, b.principal) ||
            compareCodeUnits(a.policyType, b.policyType) ||
            compareCodeUnits(a.policyName, b.policyName),
    );
}

function policiesInUse(
    details: AuthorizationDetailsInput,
    principals: readonly PrincipalDetail[],
): Omit<AccountInventory, "principalPolicyMapping"> {
    const customer = new Set<string>();
    const aws = new Set<string>();
    const record = (arn: string, name: string) => {
        (isAwsManagedPolicyArn(arn) ? aws : customer).add(name);
    };

    for (const policy of details.Policies) {
        record(policy.Arn, policy.PolicyName);
    }
    for (const principal of principals) {
        for (const policy of principal.attachedPolicies) {
            record(policy.PolicyArn, policy.PolicyName);
        }
    }

    return {
        customerManagedPoliciesInUse: [...customer].sort(compareCodeUnits),
        awsManagedPoliciesInUse: [...aws].sort(compareCodeUnits),
    };
}

export function createPolicyExtractor(): PolicyExtractor {
    return {
        extract(
            details: AuthorizationDetailsInput,
            options: PolicyExtractionOptions,
        ): PolicyExtraction {
            const principals = collectPrincipals(details);
            const sources: PolicySource[] = [];

            for (const principal of principals) {
                for (const policy of principal.inlinePolicies) {
                    sources.push({
                        id: `inline:${principal.ref.type}/${principal.ref.name}/${policy.PolicyName}`,
                        name: policy.PolicyName,
                        sourceKind: "inline",
                        principal: principal.ref,
                        document: decodeDocument(policy.PolicyDocument),
                    });
                }
            }

            for (const policy of details.Policies) {
                if (
                    isAwsManagedPolicyArn(policy.Arn) &&
                    !options.includeAwsManagedPolicies
                ) {
                    continue;
                }
                const version =
                    policy.PolicyVersionList.find((v) => v.IsDefaultVersion) ??
                    policy.PolicyVersionList.find(
                        (v) => v.VersionId === policy.DefaultVersionId,
                    );
                sources.push({
                    id: policy.Arn,
                    name: policy.PolicyName,
                    sourceKind: "managed",
                    principal: null,
                    document: decodeDocument(version?.Document),
                });
            }

            return {
                sources,
                principalPolicyMapping: buildPrincipalPolicyMapping(principals),
                ...policiesInUse(details, principals),
            };
        },
    };
}
