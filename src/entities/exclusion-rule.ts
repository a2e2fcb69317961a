import type { GlobPattern } from "./glob-pattern.js";
import type { PrincipalType } from "./policy-document.js";
import type { RiskCategory } from "./risk-finding.js";

export type ExclusionDisposition = "suppress" | "keep";

export interface ExclusionRule {
    readonly policy: GlobPattern | null;
    readonly principal: GlobPattern | null;
    readonly principalType: PrincipalType | null;
    readonly rolePath: GlobPattern | null;
    readonly action: GlobPattern | null;
    readonly category: RiskCategory | null;
    readonly disposition: ExclusionDisposition;
    readonly reason: string | null;
}
