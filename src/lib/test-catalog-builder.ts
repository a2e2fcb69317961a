import type { ActionCatalogDataset } from "../entities/action-catalog.js";
import type {
    Matcher,
    PolicyDocument,
    Statement,
} from "../entities/policy-document.js";
import { createActionCatalog } from "../gateways/action-catalog.js";
import type { ActionCatalog } from "../use-cases/action-catalog.port.js";

export function buildCatalogDataset(
    overrides?: Partial<ActionCatalogDataset>,
): ActionCatalogDataset {
    return {
        version: "test-1",
        categories: {
            "privilege-escalation": {
                severity: "high",
                description: "Grants more permissions",
            },
            "credentials-exposure": {
                severity: "high",
                description: "Returns credentials",
            },
            "data-exfiltration": {
                severity: "medium",
                description: "Reads sensitive data",
            },
            "resource-exposure": {
                severity: "medium",
                description: "Changes resource policies",
            },
        },
        services: {
            iam: {
                name: "IAM",
                actions: {
                    CreateAccessKey: ["privilege-escalation"],
                    CreatePolicyVersion: ["privilege-escalation"],
                    GetUser: [],
                    ListUsers: [],
                    PassRole: ["privilege-escalation"],
                },
                readOnly: ["GetUser", "ListUsers"],
            },
            lambda: {
                name: "Lambda",
                actions: {
                    CreateFunction: [],
                    InvokeFunction: [],
                },
            },
            s3: {
                name: "S3",
                actions: {
                    GetObject: ["data-exfiltration"],
                    ListBucket: [],
                    PutBucketPolicy: ["resource-exposure"],
                    PutObject: [],
                },
                readOnly: ["GetObject", "ListBucket"],
            },
            sts: {
                name: "STS",
                actions: {
                    AssumeRole: ["credentials-exposure"],
                    GetCallerIdentity: [],
                },
                readOnly: ["GetCallerIdentity"],
            },
        },
        escalationPaths: [
            { id: "CreateAccessKey", actions: ["iam:CreateAccessKey"] },
            {
                id: "PassExistingRoleToNewLambdaThenInvoke",
                actions: [
                    "iam:PassRole",
                    "lambda:CreateFunction",
                    "lambda:InvokeFunction",
                ],
            },
        ],
        ...overrides,
    };
}

export function buildCatalog(
    overrides?: Partial<ActionCatalogDataset>,
): ActionCatalog {
    return createActionCatalog(buildCatalogDataset(overrides));
}

export function positive(...patterns: string[]): Matcher {
    return { kind: "positive", patterns };
}

export function negated(...patterns: string[]): Matcher {
    return { kind: "negated", patterns };
}

export function buildStatement(overrides?: Partial<Statement>): Statement {
    return {
        index: 0,
        sid: null,
        effect: "Allow",
        actions: positive("*"),
        resources: positive("*"),
        conditions: {},
        serviceScope: [],
        ...overrides,
    };
}

/** Assigns each statement its position as `index`. */
export function buildPolicyDocument(
    statements: readonly Partial<Statement>[],
    overrides?: Partial<PolicyDocument>,
): PolicyDocument {
    return {
        id: "policy-under-test",
        name: "policy-under-test",
        sourceKind: "managed",
        principal: null,
        statements: statements.map((statement, index) =>
            buildStatement({ index, ...statement }),
        ),
        ...overrides,
    };
}
