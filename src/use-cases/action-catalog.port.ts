import type { EscalationPath } from "../entities/action-catalog.js";
import type { RiskCategory, Severity } from "../entities/risk-finding.js";

export interface ActionCatalog {
    readonly version: string;
    /** Service prefixes, sorted. */
    services(): readonly string[];
    /** Canonical `service:Action` names; empty for an unknown service. */
    lookup(service: string): ReadonlySet<string>;
    tags(action: string): ReadonlySet<RiskCategory>;
    /** False for actions the catalog does not know. */
    isReadOnly(action: string): boolean;
    canonicalName(action: string): string | undefined;
    severityOf(category: RiskCategory): Severity;
    escalationPaths(): readonly EscalationPath[];
}

export interface ActionCatalogLoader {
    load(path?: string): Promise<ActionCatalog>;
}
