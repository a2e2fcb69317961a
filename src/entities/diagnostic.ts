import type {
    DiagnosticKind,
    PolicyAnalysisError,
} from "./analysis-errors.js";

export interface Diagnostic {
    readonly kind: DiagnosticKind;
    readonly policyId: string;
    readonly policyName: string;
    readonly statementIndex: number | null;
    readonly message: string;
}

export function toDiagnostic(
    error: PolicyAnalysisError,
    policy: { readonly id: string; readonly name: string },
): Diagnostic {
    return {
        kind: error.kind,
        policyId: policy.id,
        policyName: policy.name,
        statementIndex: error.statementIndex,
        message: error.message,
    };
}
