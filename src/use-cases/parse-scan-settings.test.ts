import { describe, expect, it } from "vitest";
import { DEFAULT_RESTRICTIVE_CONDITION_KEYS } from "../entities/scan-settings.js";
import { createScanSettingsParser } from "./parse-scan-settings.js";

describe("ScanSettingsParser", () => {
    const parser = createScanSettingsParser();

    describe("when asked for defaults", () => {
        it("should return the built-in settings", () => {
            expect(parser.defaults()).toEqual({
                restrictiveConditionKeys: [...DEFAULT_RESTRICTIVE_CONDITION_KEYS],
                notActionScope: [],
                includeAwsManagedPolicies: false,
                catalogPath: null,
                unrestrictedAccessLevels: "modify",
            });
        });
    });

    describe("given snake_case keys", () => {
        it("should map them to settings", () => {
            const result = parser.parse(
                JSON.stringify({
                    restrictive_condition_keys: ["aws:SourceVpce", "aws:ResourceTag/env"],
                    not_action_scope: ["iam", "s3"],
                    include_aws_managed_policies: true,
                    catalog_path: "./catalog.json",
                    unrestricted_access_levels: "all",
                }),
            );

            expect(result).toEqual({
                restrictiveConditionKeys: ["aws:SourceVpce", "aws:ResourceTag/env"],
                notActionScope: ["iam", "s3"],
                includeAwsManagedPolicies: true,
                catalogPath: "./catalog.json",
                unrestrictedAccessLevels: "all",
            });
        });
    });

    describe("given camelCase keys", () => {
        it("should accept them as they are", () => {
            const result = parser.parse(JSON.stringify({ notActionScope: ["*"] }));

            expect(result.notActionScope).toEqual(["*"]);
            expect(result.catalogPath).toBeNull();
        });
    });

    describe("given an unknown key", () => {
        it("should reject the file", () => {
            expect(() =>
                parser.parse(JSON.stringify({ severity_floor: "low" })),
            ).toThrow(/Unrecognized key/);
        });
    });

    describe("given a malformed condition key", () => {
        it("should reject it", () => {
            expect(() =>
                parser.parse(JSON.stringify({ restrictive_condition_keys: ["SourceIp"] })),
            ).toThrow("condition keys must look like service:KeyName");
        });
    });

    describe("given an uppercase service scope", () => {
        it("should reject it", () => {
            expect(() =>
                parser.parse(JSON.stringify({ not_action_scope: ["IAM"] })),
            ).toThrow("not_action_scope entries must be lowercase service prefixes or wildcards");
        });
    });

    describe("given invalid JSON", () => {
        it("should name the file in the error", () => {
            expect(() => parser.parse("{")).toThrow(
                /^Invalid JSON: settings file is not valid JSON/,
            );
        });
    });
});
