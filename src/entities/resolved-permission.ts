import type { Statement, StatementEffect } from "./policy-document.js";

export interface ResolvedPermission {
    readonly action: string;
    readonly resource: string;
    readonly excludedResources: readonly string[];
    readonly effect: StatementEffect;
    readonly statement: Statement;
    readonly statementIndex: number;
    readonly verified: boolean;
    readonly conditionRestricted: boolean;
}

export interface AllowedAction {
    readonly action: string;
    readonly verified: boolean;
    readonly resources: readonly string[];
    readonly excludedResources: readonly string[];
    readonly statementIndices: readonly number[];
    /** True only when every granting statement is condition-restricted. */
    readonly conditionRestricted: boolean;
}

export interface EffectivePermissionSet {
    readonly allowed: ReadonlyMap<string, AllowedAction>;
    readonly revoked: readonly string[];
}
