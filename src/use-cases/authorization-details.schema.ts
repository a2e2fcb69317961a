import { z } from "zod";

const PolicyDocumentFieldSchema = z.union([
    z.string(),
    z.record(z.string(), z.unknown()),
]);

const InlinePolicySchema = z.object({
    PolicyName: z.string(),
    PolicyDocument: PolicyDocumentFieldSchema,
});

const AttachedPolicySchema = z.object({
    PolicyName: z.string(),
    PolicyArn: z.string(),
});

const UserDetailSchema = z.object({
    UserName: z.string(),
    Path: z.string().default("/"),
    Arn: z.string().optional(),
    UserPolicyList: z.array(InlinePolicySchema).default([]),
    AttachedManagedPolicies: z.array(AttachedPolicySchema).default([]),
    GroupList: z.array(z.string()).default([]),
});

const GroupDetailSchema = z.object({
    GroupName: z.string(),
    Path: z.string().default("/"),
    Arn: z.string().optional(),
    GroupPolicyList: z.array(InlinePolicySchema).default([]),
    AttachedManagedPolicies: z.array(AttachedPolicySchema).default([]),
});

const RoleDetailSchema = z.object({
    RoleName: z.string(),
    Path: z.string().default("/"),
    Arn: z.string().optional(),
    RolePolicyList: z.array(InlinePolicySchema).default([]),
    AttachedManagedPolicies: z.array(AttachedPolicySchema).default([]),
});

const PolicyVersionSchema = z.object({
    Document: PolicyDocumentFieldSchema,
    VersionId: z.string(),
    IsDefaultVersion: z.boolean().default(false),
});

const ManagedPolicySchema = z.object({
    PolicyName: z.string(),
    Arn: z.string(),
    Path: z.string().default("/"),
    DefaultVersionId: z.string().optional(),
    PolicyVersionList: z.array(PolicyVersionSchema).default([]),
});

export const AuthorizationDetailsSchema = z.object({
    UserDetailList: z.array(UserDetailSchema).default([]),
    GroupDetailList: z.array(GroupDetailSchema).default([]),
    RoleDetailList: z.array(RoleDetailSchema).default([]),
    Policies: z.array(ManagedPolicySchema).default([]),
});

export type InlinePolicyInput = z.infer<typeof InlinePolicySchema>;
export type AttachedPolicyInput = z.infer<typeof AttachedPolicySchema>;
export type AuthorizationDetailsInput = z.infer<
    typeof AuthorizationDetailsSchema
>;
