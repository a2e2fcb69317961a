import { parseJsonInput } from "../entities/sanitize-json.js";
import type { ScanSettings } from "../entities/scan-settings.js";
import { ScanSettingsSchema } from "./scan-settings.schema.js";

export interface ScanSettingsParser {
    parse(jsonString: string): ScanSettings;
    defaults(): ScanSettings;
}

const KEY_MAP: Readonly<Record<string, string>> = {
    restrictive_condition_keys: "restrictiveConditionKeys",
    not_action_scope: "notActionScope",
    include_aws_managed_policies: "includeAwsManagedPolicies",
    catalog_path: "catalogPath",
    unrestricted_access_levels: "unrestrictedAccessLevels",
};

function transformSnakeToCamel(data: unknown): unknown {
    if (typeof data !== "object" || data === null || Array.isArray(data)) {
        return data;
    }

    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
        result[KEY_MAP[key] ?? key] = value;
    }
    return result;
}

export function createScanSettingsParser(): ScanSettingsParser {
    return {
        parse(jsonString: string): ScanSettings {
            const sanitized = parseJsonInput(jsonString, "settings file");
            return ScanSettingsSchema.parse(transformSnakeToCamel(sanitized));
        },
        defaults(): ScanSettings {
            return ScanSettingsSchema.parse({});
        },
    };
}
