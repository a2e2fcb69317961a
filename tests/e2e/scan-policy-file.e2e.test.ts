import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it, vi } from "vitest";
import { createScanPolicyFileCommand } from "../../src/commands/scan-policy-file.js";
import { createActionCatalogLoader } from "../../src/gateways/action-catalog.js";
import { createExclusionsParser } from "../../src/use-cases/parse-exclusions.js";
import { createScanSettingsParser } from "../../src/use-cases/parse-scan-settings.js";
import { buildPolicyScanner } from "../../src/use-cases/scan-policies.js";

const FIXTURES_DIR = resolve(dirname(fileURLToPath(import.meta.url)), "fixtures");

function policyPath(name: string): string {
    return resolve(FIXTURES_DIR, "policies", name);
}

function buildCommand() {
    return createScanPolicyFileCommand({
        catalogLoader: createActionCatalogLoader(),
        settingsParser: createScanSettingsParser(),
        exclusionsParser: createExclusionsParser(),
        buildScanner: buildPolicyScanner,
    });
}

describe("scan-policy-file command e2e", () => {
    describe("given a policy that only allows iam:CreateAccessKey", () => {
        it("should report exactly one privilege escalation finding", async () => {
            // Act
            const report = await buildCommand().execute(
                { inputPath: policyPath("create-access-key.json") },
                { log: vi.fn(), warn: vi.fn() },
            );

            // Assert
            const [policy] = report.policies;
            expect(policy?.policyName).toBe("create-access-key");
            expect(
                policy?.findings.map((f) => [f.action, f.category, f.resources]),
            ).toEqual([["iam:CreateAccessKey", "privilege-escalation", ["*"]]]);
            expect(policy?.escalationPaths.map((p) => p.id)).toEqual([
                "CreateAccessKey",
            ]);
        });
    });

    describe("given a NotAction policy without a service scope", () => {
        it("should report the statement as ambiguous", async () => {
            const report = await buildCommand().execute(
                { inputPath: policyPath("not-action.json") },
                { log: vi.fn(), warn: vi.fn() },
            );

            const [policy] = report.policies;
            expect(policy?.access).toBe("none");
            expect(policy?.diagnostics.map((d) => d.kind)).toEqual([
                "ambiguous-not-action",
            ]);
        });
    });

    describe("given a NotAction policy and a settings file that scopes it", () => {
        it("should resolve the complement within that service", async () => {
            // Act
            const report = await buildCommand().execute(
                {
                    inputPath: policyPath("not-action.json"),
                    settingsPath: resolve(FIXTURES_DIR, "settings.json"),
                },
                { log: vi.fn(), warn: vi.fn() },
            );

            // Assert
            const [policy] = report.policies;
            const actions = policy?.findings.map((f) => f.action) ?? [];
            expect(policy?.diagnostics).toEqual([]);
            expect(actions).toHaveLength(21);
            expect(actions).toContain("iam:PassRole");
            expect(actions.some((action) => action.startsWith("s3:"))).toBe(false);
            expect(policy?.escalationPaths.map((p) => p.id)).toContain(
                "CreateNewPolicyVersion",
            );
        });
    });
});
