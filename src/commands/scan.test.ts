import { readFile, writeFile } from "node:fs/promises";
import { beforeEach, describe, expect, it, vi } from "vitest";
import type { ScanSettings } from "../entities/scan-settings.js";
import { buildCatalog } from "../lib/test-catalog-builder.js";
import type { ActionCatalog } from "../use-cases/action-catalog.port.js";
import { createPolicyExtractor } from "../use-cases/extract-policy-sources.js";
import { createAuthorizationDetailsParser } from "../use-cases/parse-authorization-details.js";
import { createExclusionsParser } from "../use-cases/parse-exclusions.js";
import { createScanSettingsParser } from "../use-cases/parse-scan-settings.js";
import { buildPolicyScanner } from "../use-cases/scan-policies.js";
import { createScanCommand } from "./scan.js";

vi.mock("node:fs/promises");

const DETAILS_JSON = JSON.stringify({
    RoleDetailList: [
        {
            RoleName: "ci",
            RolePolicyList: [
                {
                    PolicyName: "keys",
                    PolicyDocument: {
                        Statement: [
                            {
                                Effect: "Allow",
                                Action: "iam:CreateAccessKey",
                                Resource: "*",
                            },
                        ],
                    },
                },
            ],
        },
    ],
    Policies: [
        {
            PolicyName: "ReadOnlyAccess",
            Arn: "arn:aws:iam::aws:policy/ReadOnlyAccess",
            PolicyVersionList: [
                {
                    VersionId: "v1",
                    IsDefaultVersion: true,
                    Document: {
                        Statement: [
                            { Effect: "Allow", Action: "s3:List*", Resource: "*" },
                        ],
                    },
                },
            ],
        },
    ],
});

function buildCommand() {
    const catalogLoader = {
        load: vi.fn(async (_path?: string) => buildCatalog()),
    };
    const buildScanner = vi.fn(
        (catalog: ActionCatalog, settings: ScanSettings) =>
            buildPolicyScanner(catalog, settings),
    );
    const command = createScanCommand({
        catalogLoader,
        settingsParser: createScanSettingsParser(),
        exclusionsParser: createExclusionsParser(),
        detailsParser: createAuthorizationDetailsParser(),
        extractor: createPolicyExtractor(),
        buildScanner,
    });
    return { command, catalogLoader, buildScanner };
}

describe("ScanCommand", () => {
    beforeEach(() => {
        vi.mocked(readFile).mockReset();
        vi.mocked(writeFile).mockReset();
    });

    describe("given an authorization details file", () => {
        it("should log the report and a findings summary", async () => {
            // Arrange
            vi.mocked(readFile).mockResolvedValueOnce(DETAILS_JSON);
            const { command } = buildCommand();
            const mockConsole = { log: vi.fn(), warn: vi.fn() };

            // Act
            const report = await command.execute(
                { inputPath: "details.json" },
                mockConsole,
            );

            // Assert
            expect(readFile).toHaveBeenCalledWith("details.json", "utf-8");
            expect(report.policies.map((p) => p.policyId)).toEqual([
                "inline:role/ci/keys",
            ]);
            expect(mockConsole.log).toHaveBeenCalledWith(
                JSON.stringify(report, null, 2),
            );
            expect(mockConsole.warn).toHaveBeenCalledWith(
                "Found 1 risk finding(s) (0 suppressed) and 1 privilege escalation path(s)",
            );
        });
    });

    describe("given an exclusions file", () => {
        it("should suppress the matching findings", async () => {
            // Arrange
            vi.mocked(readFile)
                .mockResolvedValueOnce("exclude-actions: ['iam:CreateAccessKey']\n")
                .mockResolvedValueOnce(DETAILS_JSON);
            const { command } = buildCommand();
            const mockConsole = { log: vi.fn(), warn: vi.fn() };

            // Act
            const report = await command.execute(
                { inputPath: "details.json", exclusionsPath: "exclusions.yml" },
                mockConsole,
            );

            // Assert
            expect(report.summary.findings).toBe(0);
            expect(report.summary.suppressedFindings).toBe(1);
            expect(mockConsole.warn).toHaveBeenCalledWith(
                "Found 0 risk finding(s) (1 suppressed) and 1 privilege escalation path(s)",
            );
        });
    });

    describe("given the include-aws-managed flag", () => {
        it("should scan AWS-managed policies too", async () => {
            vi.mocked(readFile).mockResolvedValueOnce(DETAILS_JSON);
            const { command } = buildCommand();

            const report = await command.execute(
                { inputPath: "details.json", includeAwsManagedPolicies: true },
                { log: vi.fn(), warn: vi.fn() },
            );

            expect(report.policies.map((p) => p.policyName)).toEqual([
                "keys",
                "ReadOnlyAccess",
            ]);
        });
    });

    describe("given a settings file and overriding flags", () => {
        it("should let the flags win", async () => {
            // Arrange
            vi.mocked(readFile)
                .mockResolvedValueOnce(
                    JSON.stringify({
                        catalog_path: "settings-catalog.json",
                        not_action_scope: ["iam"],
                        restrictive_condition_keys: ["aws:SourceIp"],
                    }),
                )
                .mockResolvedValueOnce(DETAILS_JSON);
            const { command, catalogLoader, buildScanner } = buildCommand();

            // Act
            await command.execute(
                {
                    inputPath: "details.json",
                    settingsPath: "settings.json",
                    catalogPath: "flag-catalog.json",
                    notActionScope: "sts, s3,",
                },
                { log: vi.fn(), warn: vi.fn() },
            );

            // Assert
            expect(catalogLoader.load).toHaveBeenCalledWith("flag-catalog.json");
            expect(buildScanner.mock.calls[0]?.[1]).toEqual({
                restrictiveConditionKeys: ["aws:SourceIp"],
                notActionScope: ["sts", "s3"],
                includeAwsManagedPolicies: false,
                catalogPath: "flag-catalog.json",
                unrestrictedAccessLevels: "modify",
            });
        });
    });

    describe("given no catalog path anywhere", () => {
        it("should load the bundled catalog", async () => {
            vi.mocked(readFile).mockResolvedValueOnce(DETAILS_JSON);
            const { command, catalogLoader } = buildCommand();

            await command.execute(
                { inputPath: "details.json" },
                { log: vi.fn(), warn: vi.fn() },
            );

            expect(catalogLoader.load).toHaveBeenCalledWith(undefined);
        });
    });

    describe("given an output path", () => {
        it("should write the report there instead of logging it", async () => {
            // Arrange
            vi.mocked(readFile).mockResolvedValueOnce(DETAILS_JSON);
            vi.mocked(writeFile).mockResolvedValue();
            const { command } = buildCommand();
            const mockConsole = { log: vi.fn(), warn: vi.fn() };

            // Act
            const report = await command.execute(
                { inputPath: "details.json", outputPath: "report.json" },
                mockConsole,
            );

            // Assert
            expect(writeFile).toHaveBeenCalledWith(
                "report.json",
                JSON.stringify(report, null, 2),
                "utf-8",
            );
            expect(mockConsole.log).not.toHaveBeenCalled();
        });
    });

    describe("given an invalid settings value on the command line", () => {
        it("should reject it", async () => {
            const { command } = buildCommand();

            await expect(
                command.execute(
                    { inputPath: "details.json", notActionScope: "IAM" },
                    { log: vi.fn(), warn: vi.fn() },
                ),
            ).rejects.toThrow("not_action_scope entries must be lowercase");
        });
    });

    describe("given an unreadable input file", () => {
        it("should propagate the error", async () => {
            vi.mocked(readFile).mockRejectedValue(
                new Error("ENOENT: no such file or directory"),
            );
            const { command } = buildCommand();

            await expect(
                command.execute(
                    { inputPath: "missing.json" },
                    { log: vi.fn(), warn: vi.fn() },
                ),
            ).rejects.toThrow("ENOENT");
        });
    });
});
