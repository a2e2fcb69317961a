export type StatementEffect = "Allow" | "Deny";

export const POLICY_SOURCE_KINDS = [
    "inline",
    "managed",
    "resource-based",
] as const;

export type PolicySourceKind = (typeof POLICY_SOURCE_KINDS)[number];

export type PrincipalType = "user" | "group" | "role";

export interface PrincipalRef {
    readonly type: PrincipalType;
    readonly name: string;
    readonly path: string;
    readonly arn: string | null;
}

export type ConditionValue =
    | string
    | number
    | boolean
    | readonly (string | number | boolean)[];

export type ConditionBlock = Readonly<
    Record<string, Readonly<Record<string, ConditionValue>>>
>;

/**
 * `positive` matchers come from `Action`/`Resource`, `negated` ones from
 * `NotAction`/`NotResource`. Patterns are never empty.
 */
export interface Matcher {
    readonly kind: "positive" | "negated";
    readonly patterns: readonly string[];
}

export interface Statement {
    /** Position in the source document's Statement list. */
    readonly index: number;
    readonly sid: string | null;
    readonly effect: StatementEffect;
    readonly actions: Matcher;
    readonly resources: Matcher;
    readonly conditions: ConditionBlock;
    /** Services a `NotAction` matcher is resolved against. */
    readonly serviceScope: readonly string[];
}

export interface PolicyDocument {
    readonly id: string;
    readonly name: string;
    readonly sourceKind: PolicySourceKind;
    readonly principal: PrincipalRef | null;
    readonly statements: readonly Statement[];
}
