import { z } from "zod";
import { DEFAULT_RESTRICTIVE_CONDITION_KEYS } from "../entities/scan-settings.js";

const CONDITION_KEY_REGEX = /^[A-Za-z0-9-]+:[A-Za-z0-9_\-\/]+$/;
const SERVICE_SCOPE_REGEX = /^[a-z0-9*?-]+$/;

export const ScanSettingsSchema = z
    .object({
        restrictiveConditionKeys: z
            .array(
                z
                    .string()
                    .regex(
                        CONDITION_KEY_REGEX,
                        "condition keys must look like service:KeyName",
                    ),
            )
            .default([...DEFAULT_RESTRICTIVE_CONDITION_KEYS]),
        notActionScope: z
            .array(
                z
                    .string()
                    .regex(
                        SERVICE_SCOPE_REGEX,
                        "not_action_scope entries must be lowercase service prefixes or wildcards",
                    ),
            )
            .default([]),
        includeAwsManagedPolicies: z.boolean().default(false),
        catalogPath: z.string().min(1).nullable().default(null),
        unrestrictedAccessLevels: z.enum(["modify", "all"]).default("modify"),
    })
    .strict();
