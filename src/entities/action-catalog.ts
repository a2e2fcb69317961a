import type { RiskCategory, Severity } from "./risk-finding.js";

export interface CategoryDefinition {
    readonly severity: Severity;
    readonly description: string;
}

export interface ServiceDefinition {
    readonly name: string;
    /** Action name (without the service prefix) to its risk categories. */
    readonly actions: Readonly<Record<string, readonly RiskCategory[]>>;
    /** Actions at the Read or List access level. */
    readonly readOnly?: readonly string[];
}

export interface EscalationPath {
    readonly id: string;
    readonly actions: readonly string[];
}

export interface ActionCatalogDataset {
    readonly version: string;
    readonly categories: Readonly<Record<RiskCategory, CategoryDefinition>>;
    readonly services: Readonly<Record<string, ServiceDefinition>>;
    readonly escalationPaths: readonly EscalationPath[];
}
