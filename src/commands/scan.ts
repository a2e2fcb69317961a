import { readFile, writeFile } from "node:fs/promises";
import { defineCommand } from "citty";
import { consola } from "consola";
import type { ScanReport } from "../entities/scan-report.js";
import type { ScanSettings } from "../entities/scan-settings.js";
import type { ActionCatalog } from "../use-cases/action-catalog.port.js";
import type { PolicyExtractor } from "../use-cases/extract-policy-sources.js";
import type { AuthorizationDetailsParser } from "../use-cases/parse-authorization-details.js";
import type { PolicyScanner } from "../use-cases/scan-policies.js";
import {
    type ConsoleOutput,
    loadScanContext,
    reportSummary,
    type ScanContextDeps,
    type ScanContextOptions,
} from "./scan-context.js";

export interface ScanCommandDeps extends ScanContextDeps {
    readonly detailsParser: AuthorizationDetailsParser;
    readonly extractor: PolicyExtractor;
    readonly buildScanner: (
        catalog: ActionCatalog,
        settings: ScanSettings,
    ) => PolicyScanner;
}

export interface ScanCommandOptions extends ScanContextOptions {
    readonly inputPath: string;
    readonly outputPath?: string | undefined;
}

export interface ScanCommand {
    execute(
        options: ScanCommandOptions,
        console: ConsoleOutput,
    ): Promise<ScanReport>;
}

export function createScanCommand(deps: ScanCommandDeps): ScanCommand {
    return {
        async execute(
            options: ScanCommandOptions,
            output: ConsoleOutput,
        ): Promise<ScanReport> {
            const { catalog, settings, rules } = await loadScanContext(
                deps,
                options,
            );

            const content = await readFile(options.inputPath, "utf-8");
            const details = deps.detailsParser.parse(content);
            const { sources, ...inventory } = deps.extractor.extract(
                details,
                {
                    includeAwsManagedPolicies:
                        settings.includeAwsManagedPolicies,
                },
            );

            const report = deps
                .buildScanner(catalog, settings)
                .scan(sources, rules, inventory);

            const serialized = JSON.stringify(report, null, 2);
            if (options.outputPath) {
                await writeFile(options.outputPath, serialized, "utf-8");
            } else {
                output.log(serialized);
            }
            reportSummary(report.summary, output);

            return report;
        },
    };
}

export function createScanCittyCommand(deps: ScanCommandDeps) {
    const scanCommand = createScanCommand(deps);

    return defineCommand({
        meta: {
            name: "scan",
            description:
                "Scan the output of `aws iam get-account-authorization-details` for risky IAM permissions",
        },
        args: {
            input: {
                type: "string",
                description: "Path to the account authorization details JSON file",
                required: true,
            },
            exclusions: {
                type: "string",
                description: "Path to an exclusions YAML file",
                required: false,
            },
            settings: {
                type: "string",
                description: "Path to a scan settings JSON file",
                required: false,
            },
            catalog: {
                type: "string",
                description: "Path to an alternative action catalog JSON file",
                required: false,
            },
            "include-aws-managed": {
                type: "boolean",
                description: "Also scan AWS-managed policies",
                required: false,
            },
            "not-action-scope": {
                type: "string",
                description:
                    "Comma-separated services to resolve NotAction against (use * for the whole catalog)",
                required: false,
            },
            output: {
                type: "string",
                description: "Path to write the JSON report to",
                required: false,
            },
        },
        async run({ args }) {
            await scanCommand.execute(
                {
                    inputPath: args.input,
                    exclusionsPath: args.exclusions,
                    settingsPath: args.settings,
                    catalogPath: args.catalog,
                    includeAwsManagedPolicies: args["include-aws-managed"],
                    notActionScope: args["not-action-scope"],
                    outputPath: args.output,
                },
                {
                    log: (msg) => consola.log(msg),
                    warn: (msg) => consola.warn(msg),
                },
            );
        },
    });
}
