import { readFile } from "node:fs/promises";
import type { ExclusionRule } from "../entities/exclusion-rule.js";
import type { ScanSummary } from "../entities/scan-report.js";
import type { ScanSettings } from "../entities/scan-settings.js";
import type {
    ActionCatalog,
    ActionCatalogLoader,
} from "../use-cases/action-catalog.port.js";
import type { ExclusionsParser } from "../use-cases/parse-exclusions.js";
import type { ScanSettingsParser } from "../use-cases/parse-scan-settings.js";
import { ScanSettingsSchema } from "../use-cases/scan-settings.schema.js";

export interface ConsoleOutput {
    log(message: string): void;
    warn(message: string): void;
}

export interface ScanContextDeps {
    readonly catalogLoader: ActionCatalogLoader;
    readonly settingsParser: ScanSettingsParser;
    readonly exclusionsParser: ExclusionsParser;
}

export interface ScanContextOptions {
    readonly settingsPath?: string | undefined;
    readonly exclusionsPath?: string | undefined;
    readonly catalogPath?: string | undefined;
    readonly includeAwsManagedPolicies?: boolean | undefined;
    /** Comma-separated service prefixes. */
    readonly notActionScope?: string | undefined;
}

export interface ScanContext {
    readonly catalog: ActionCatalog;
    readonly settings: ScanSettings;
    readonly rules: readonly ExclusionRule[];
}

function splitList(value: string): string[] {
    return value
        .split(",")
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0);
}

async function loadSettings(
    deps: ScanContextDeps,
    options: ScanContextOptions,
): Promise<ScanSettings> {
    const base = options.settingsPath
        ? deps.settingsParser.parse(
              await readFile(options.settingsPath, "utf-8"),
          )
        : deps.settingsParser.defaults();

    return ScanSettingsSchema.parse({
        ...base,
        ...(options.catalogPath ? { catalogPath: options.catalogPath } : {}),
        ...(options.includeAwsManagedPolicies
            ? { includeAwsManagedPolicies: true }
            : {}),
        ...(options.notActionScope !== undefined
            ? { notActionScope: splitList(options.notActionScope) }
            : {}),
    });
}

export async function loadScanContext(
    deps: ScanContextDeps,
    options: ScanContextOptions,
): Promise<ScanContext> {
    const settings = await loadSettings(deps, options);

    const rules = options.exclusionsPath
        ? deps.exclusionsParser.parse(
              await readFile(options.exclusionsPath, "utf-8"),
          )
        : [];

    const catalog = await deps.catalogLoader.load(
        settings.catalogPath ?? undefined,
    );

    return { catalog, settings, rules };
}

export function reportSummary(
    summary: ScanSummary,
    output: ConsoleOutput,
): void {
    if (summary.diagnostics > 0) {
        output.warn(
            `${summary.diagnostics} statement(s) could not be fully analyzed; see diagnostics in the report`,
        );
    }
    if (summary.findings > 0 || summary.escalationPaths > 0) {
        output.warn(
            `Found ${summary.findings} risk finding(s) (${summary.suppressedFindings} suppressed) and ${summary.escalationPaths} privilege escalation path(s)`,
        );
    }
}
