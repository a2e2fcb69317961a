import { describe, expect, it } from "vitest";
import { compileGlob } from "../entities/glob-pattern.js";
import type { ExclusionRule } from "../entities/exclusion-rule.js";
import type {
    AccountInventory,
    PolicySource,
} from "../entities/scan-report.js";
import { buildCatalog } from "../lib/test-catalog-builder.js";
import { createScanSettingsParser } from "./parse-scan-settings.js";
import { buildPolicyScanner } from "./scan-policies.js";

function allow(...actions: string[]) {
    return { Effect: "Allow", Action: actions, Resource: "*" };
}

function buildSources(): PolicySource[] {
    return [
        {
            id: "inline:role/ci/deploy",
            name: "deploy",
            sourceKind: "inline",
            principal: { type: "role", name: "ci", path: "/", arn: null },
            document: {
                Version: "2012-10-17",
                Statement: [allow("iam:CreateAccessKey", "iam:PassRole")],
            },
        },
        {
            id: "arn:aws:iam::111122223333:policy/broken",
            name: "broken",
            sourceKind: "managed",
            principal: null,
            document: "not a policy",
        },
        {
            id: "arn:aws:iam::111122223333:policy/deny-only",
            name: "deny-only",
            sourceKind: "managed",
            principal: null,
            document: {
                Statement: [{ Effect: "Deny", Action: "*", Resource: "*" }],
            },
        },
    ];
}

describe("PolicyScanner", () => {
    const scanner = buildPolicyScanner(
        buildCatalog(),
        createScanSettingsParser().defaults(),
    );

    describe("given several policies and an exclusion rule", () => {
        const report = scanner.scan(buildSources(), [
            {
                policy: null,
                principal: null,
                principalType: null,
                rolePath: null,
                action: compileGlob("iam:PassRole"),
                category: null,
                disposition: "suppress",
                reason: "reviewed",
            },
        ]);

        it("should summarize the scan", () => {
            expect(report.catalogVersion).toBe("test-1");
            expect(report.summary).toEqual({
                policies: 3,
                policiesWithoutAccess: 1,
                findings: 1,
                suppressedFindings: 1,
                escalationPaths: 1,
                diagnostics: 1,
            });
            expect(report.principalPolicyMapping).toEqual([]);
            expect(report.principalPolicyMappingAfterExclusions).toEqual([]);
            expect(report.customerManagedPoliciesInUse).toEqual([]);
            expect(report.awsManagedPoliciesInUse).toEqual([]);
        });

        it("should list the actions each policy grants on every resource", () => {
            expect(report.policies.map((p) => p.unrestrictedActions)).toEqual([
                ["iam:CreateAccessKey", "iam:PassRole"],
                [],
                [],
            ]);
        });

        it("should report findings with their suppression", () => {
            const [deploy] = report.policies;

            expect(deploy?.access).toBe("granted");
            expect(deploy?.allowedActionCount).toBe(2);
            expect(
                deploy?.findings.map((f) => [f.action, f.suppressed, f.suppressedBy]),
            ).toEqual([
                ["iam:CreateAccessKey", false, null],
                ["iam:PassRole", true, { ruleIndex: 0, reason: "reviewed" }],
            ]);
            expect(deploy?.escalationPaths.map((p) => p.id)).toEqual([
                "CreateAccessKey",
            ]);
        });

        it("should mark an unreadable policy as unevaluated", () => {
            const broken = report.policies[1];

            expect(broken?.access).toBe("unevaluated");
            expect(broken?.findings).toEqual([]);
            expect(broken?.diagnostics).toEqual([
                {
                    kind: "malformed-statement",
                    policyId: "arn:aws:iam::111122223333:policy/broken",
                    policyName: "broken",
                    statementIndex: null,
                    message:
                        "Policy document is malformed: (root): Expected object, received string",
                },
            ]);
        });

        it("should report a policy that grants nothing", () => {
            const denyOnly = report.policies[2];

            expect(denyOnly?.access).toBe("none");
            expect(denyOnly?.allowedActionCount).toBe(0);
        });
    });

    describe("given a policy with a malformed statement and an unknown service", () => {
        it("should keep both diagnostics in statement order", () => {
            // Arrange
            const source: PolicySource = {
                id: "p",
                name: "p",
                sourceKind: "managed",
                principal: null,
                document: {
                    Statement: [
                        { Effect: "Allow", Action: "s3:GetObject" },
                        allow("ec2:RunInstances"),
                    ],
                },
            };

            // Act
            const report = scanner.scan([source], []);

            // Assert
            expect(
                report.policies[0]?.diagnostics.map((d) => [d.kind, d.statementIndex]),
            ).toEqual([
                ["malformed-statement", 0],
                ["unknown-service", 1],
            ]);
            expect(report.policies[0]?.access).toBe("granted");
        });
    });

    describe("given NotAction with a configured scope", () => {
        it("should resolve it against the scoped services", () => {
            // Arrange
            const scoped = buildPolicyScanner(buildCatalog(), {
                ...createScanSettingsParser().defaults(),
                notActionScope: ["sts"],
            });
            const source: PolicySource = {
                id: "p",
                name: "p",
                sourceKind: "managed",
                principal: null,
                document: {
                    Statement: [
                        { Effect: "Allow", NotAction: "sts:Get*", Resource: "*" },
                    ],
                },
            };

            // Act
            const report = scoped.scan([source], []);

            // Assert
            expect(
                report.policies[0]?.findings.map((f) => [f.action, f.category]),
            ).toEqual([["sts:AssumeRole", "credentials-exposure"]]);
        });
    });

    describe("given an account inventory and a user exclusion", () => {
        it("should report the mapping before and after exclusions", () => {
            // Arrange
            const ciEntry = {
                principal: "ci",
                type: "Role" as const,
                policyType: "Inline" as const,
                managedBy: "Customer" as const,
                policyName: "deploy",
                groupMembership: null,
                viaGroup: null,
            };
            const aliceEntry = {
                ...ciEntry,
                principal: "alice",
                type: "User" as const,
                policyName: "alice-keys",
            };
            const inventory: AccountInventory = {
                principalPolicyMapping: [ciEntry, aliceEntry],
                customerManagedPoliciesInUse: ["ci-deploy"],
                awsManagedPoliciesInUse: ["ReadOnlyAccess"],
            };
            const excludeAlice: ExclusionRule = {
                policy: null,
                principal: compileGlob("alice"),
                principalType: "user",
                rolePath: null,
                action: null,
                category: null,
                disposition: "suppress",
                reason: "user excluded by name",
            };

            // Act
            const report = scanner.scan(buildSources(), [excludeAlice], inventory);

            // Assert
            expect(report.principalPolicyMapping).toEqual([ciEntry, aliceEntry]);
            expect(report.principalPolicyMappingAfterExclusions).toEqual([ciEntry]);
            expect(report.customerManagedPoliciesInUse).toEqual(["ci-deploy"]);
            expect(report.awsManagedPoliciesInUse).toEqual(["ReadOnlyAccess"]);
        });
    });

    describe("given settings that report every access level", () => {
        it("should list read-only actions without resource constraints too", () => {
            // Arrange
            const source: PolicySource = {
                id: "p",
                name: "p",
                sourceKind: "managed",
                principal: null,
                document: { Statement: [allow("s3:GetObject", "s3:PutObject")] },
            };
            const allLevels = buildPolicyScanner(buildCatalog(), {
                ...createScanSettingsParser().defaults(),
                unrestrictedAccessLevels: "all",
            });

            // Act
            const modifyOnly = scanner.scan([source], []);
            const everything = allLevels.scan([source], []);

            // Assert
            expect(modifyOnly.policies[0]?.unrestrictedActions).toEqual([
                "s3:PutObject",
            ]);
            expect(everything.policies[0]?.unrestrictedActions).toEqual([
                "s3:GetObject",
                "s3:PutObject",
            ]);
        });
    });
});
