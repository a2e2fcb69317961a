import { dump } from "js-yaml";

const HEADER = [
    "# iam-riskscan exclusions",
    "#",
    "# Patterns are case-insensitive globs: * matches any run of characters,",
    "# ? matches one character and [seq] / [!seq] match a character class.",
    "# Rules are checked in order and the first matching rule decides. A rule",
    "# with `disposition: keep` stops evaluation and leaves the finding reported.",
    "#",
    "# The list keys below `rules` are shorthands. They are applied after",
    "# `rules`, with include-actions first and exclude-actions last.",
    "",
].join("\n");

const STARTER = {
    rules: [
        {
            principal: "AWSServiceRoleFor*",
            principal_type: "role",
            reason: "service-linked roles are managed by AWS",
        },
        {
            action: "s3:GetObject",
            category: "data-exfiltration",
            role_path: "/service-role/*",
            reason: "service roles read their own buckets",
        },
        {
            action: "iam:PassRole",
            disposition: "keep",
            reason: "always review PassRole",
        },
    ],
    policies: [""],
    roles: [""],
    users: [""],
    groups: [""],
    "include-actions": [""],
    "exclude-actions": [""],
};

export interface ExclusionsTemplateBuilder {
    build(): string;
}

export function createExclusionsTemplateBuilder(): ExclusionsTemplateBuilder {
    return {
        build(): string {
            return `${HEADER}${dump(STARTER, { lineWidth: 100 })}`;
        },
    };
}
