import { z } from "zod";
import { RISK_CATEGORIES, SEVERITY_LEVELS } from "../entities/risk-finding.js";

const ACTION_NAME_REGEX = /^[A-Za-z0-9_-]+$/;
const SERVICE_PREFIX_REGEX = /^[a-z0-9-]+$/;
const QUALIFIED_ACTION_REGEX = /^[a-z0-9-]+:[A-Za-z0-9_-]+$/;

const RiskCategorySchema = z.enum(RISK_CATEGORIES);

const CategoryDefinitionSchema = z.object({
    severity: z.enum(SEVERITY_LEVELS),
    description: z.string(),
});

const ServiceDefinitionSchema = z
    .object({
        name: z.string(),
        actions: z.record(
            z
                .string()
                .regex(ACTION_NAME_REGEX, "action names must not be qualified"),
            z.array(RiskCategorySchema),
        ),
        readOnly: z.array(z.string()).default([]),
    })
    .refine(
        (service) =>
            service.readOnly.every((name) =>
                Object.hasOwn(service.actions, name),
            ),
        {
            message: "readOnly entries must name actions of the same service",
            path: ["readOnly"],
        },
    );

const EscalationPathSchema = z.object({
    id: z.string().min(1),
    actions: z
        .array(
            z
                .string()
                .regex(
                    QUALIFIED_ACTION_REGEX,
                    "escalation path actions must be service:Action",
                ),
        )
        .min(1),
});

export const ActionCatalogDatasetSchema = z.object({
    version: z.string().min(1),
    categories: z.object({
        "privilege-escalation": CategoryDefinitionSchema,
        "credentials-exposure": CategoryDefinitionSchema,
        "data-exfiltration": CategoryDefinitionSchema,
        "resource-exposure": CategoryDefinitionSchema,
    }),
    services: z.record(
        z
            .string()
            .regex(SERVICE_PREFIX_REGEX, "service prefixes must be lowercase"),
        ServiceDefinitionSchema,
    ),
    escalationPaths: z.array(EscalationPathSchema).default([]),
});

export type ActionCatalogDatasetInput = z.infer<
    typeof ActionCatalogDatasetSchema
>;
