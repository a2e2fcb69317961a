import { readFile, writeFile } from "node:fs/promises";
import { basename, extname } from "node:path";
import { defineCommand } from "citty";
import { consola } from "consola";
import { parseJsonInput } from "../entities/sanitize-json.js";
import type { ScanReport } from "../entities/scan-report.js";
import type { ScanSettings } from "../entities/scan-settings.js";
import type { ActionCatalog } from "../use-cases/action-catalog.port.js";
import { PolicySourceKindSchema } from "../use-cases/policy-document.schema.js";
import type { PolicyScanner } from "../use-cases/scan-policies.js";
import {
    type ConsoleOutput,
    loadScanContext,
    reportSummary,
    type ScanContextDeps,
    type ScanContextOptions,
} from "./scan-context.js";

export interface ScanPolicyFileCommandDeps extends ScanContextDeps {
    readonly buildScanner: (
        catalog: ActionCatalog,
        settings: ScanSettings,
    ) => PolicyScanner;
}

export interface ScanPolicyFileCommandOptions extends ScanContextOptions {
    readonly inputPath: string;
    /** Defaults to the file name without its extension. */
    readonly name?: string | undefined;
    /** Defaults to `managed`. */
    readonly kind?: string | undefined;
    readonly outputPath?: string | undefined;
}

export interface ScanPolicyFileCommand {
    execute(
        options: ScanPolicyFileCommandOptions,
        console: ConsoleOutput,
    ): Promise<ScanReport>;
}

export function createScanPolicyFileCommand(
    deps: ScanPolicyFileCommandDeps,
): ScanPolicyFileCommand {
    return {
        async execute(
            options: ScanPolicyFileCommandOptions,
            output: ConsoleOutput,
        ): Promise<ScanReport> {
            const sourceKind = PolicySourceKindSchema.parse(
                options.kind ?? "managed",
            );
            const { catalog, settings, rules } = await loadScanContext(
                deps,
                options,
            );

            const content = await readFile(options.inputPath, "utf-8");
            const document = parseJsonInput(content, "policy file");
            const name =
                options.name ??
                basename(options.inputPath, extname(options.inputPath));

            const report = deps
                .buildScanner(catalog, settings)
                .scan(
                    [
                        {
                            id: options.inputPath,
                            name,
                            sourceKind,
                            principal: null,
                            document,
                        },
                    ],
                    rules,
                );

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

export function createScanPolicyFileCittyCommand(
    deps: ScanPolicyFileCommandDeps,
) {
    const scanPolicyFileCommand = createScanPolicyFileCommand(deps);

    return defineCommand({
        meta: {
            name: "scan-policy-file",
            description: "Scan a single IAM policy JSON file for risky permissions",
        },
        args: {
            input: {
                type: "string",
                description: "Path to the IAM policy JSON file",
                required: true,
            },
            name: {
                type: "string",
                description: "Policy name used in the report and by exclusions",
                required: false,
            },
            kind: {
                type: "string",
                description: "Policy source kind: inline, managed or resource-based",
                required: false,
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
            await scanPolicyFileCommand.execute(
                {
                    inputPath: args.input,
                    name: args.name,
                    kind: args.kind,
                    exclusionsPath: args.exclusions,
                    settingsPath: args.settings,
                    catalogPath: args.catalog,
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
