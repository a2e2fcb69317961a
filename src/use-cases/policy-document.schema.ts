import { z } from "zod";
import { POLICY_SOURCE_KINDS } from "../entities/policy-document.js";

const MAX_STATEMENTS = 500;
const MAX_PATTERNS_PER_MATCHER = 1000;

const PatternListSchema = z.union([
    z.string(),
    z.array(z.string()).max(MAX_PATTERNS_PER_MATCHER),
]);

const ConditionScalarSchema = z.union([z.string(), z.number(), z.boolean()]);

const ConditionBlockSchema = z.record(
    z.string(),
    z.record(
        z.string(),
        z.union([ConditionScalarSchema, z.array(ConditionScalarSchema)]),
    ),
);

export const PolicySourceKindSchema = z.enum(POLICY_SOURCE_KINDS, {
    errorMap: () => ({
        message: `source kind must be one of: ${POLICY_SOURCE_KINDS.join(", ")}`,
    }),
});

export const RawStatementSchema = z.object({
    Sid: z.string().optional(),
    Effect: z.string().optional(),
    Action: PatternListSchema.optional(),
    NotAction: PatternListSchema.optional(),
    Resource: PatternListSchema.optional(),
    NotResource: PatternListSchema.optional(),
    Condition: ConditionBlockSchema.optional(),
    Principal: z.unknown().optional(),
    NotPrincipal: z.unknown().optional(),
});

export const RawPolicyDocumentSchema = z.object({
    Version: z.string().optional(),
    Id: z.string().optional(),
    // Statements are validated one at a time so one bad statement does not
    // reject the whole document.
    Statement: z.union([
        z.array(z.unknown()).max(MAX_STATEMENTS),
        z.record(z.string(), z.unknown()),
    ]),
});

export type RawStatement = z.infer<typeof RawStatementSchema>;
export type RawPolicyDocument = z.infer<typeof RawPolicyDocumentSchema>;
