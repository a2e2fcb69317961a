import { z } from "zod";
import { RISK_CATEGORIES } from "../entities/risk-finding.js";

const MAX_RULES = 1000;

const ExclusionRuleSchema = z
    .object({
        policy: z.string().optional(),
        principal: z.string().optional(),
        principalType: z.enum(["user", "group", "role"]).optional(),
        rolePath: z.string().optional(),
        action: z.string().optional(),
        category: z.enum(RISK_CATEGORIES).optional(),
        disposition: z.enum(["suppress", "keep"]).default("suppress"),
        reason: z.string().optional(),
    })
    .strict();

const PatternListSchema = z.array(z.string()).max(MAX_RULES).default([]);

export const ExclusionsFileSchema = z
    .object({
        rules: z.array(ExclusionRuleSchema).max(MAX_RULES).default([]),
        policies: PatternListSchema,
        roles: PatternListSchema,
        users: PatternListSchema,
        groups: PatternListSchema,
        "include-actions": PatternListSchema,
        "exclude-actions": PatternListSchema,
    })
    .strict();

export type ExclusionRuleInput = z.infer<typeof ExclusionRuleSchema>;
export type ExclusionsFileInput = z.infer<typeof ExclusionsFileSchema>;
