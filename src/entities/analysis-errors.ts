export type DiagnosticKind =
    | "unknown-service"
    | "ambiguous-not-action"
    | "unmatched-action-pattern"
    | "malformed-statement"
    | "invalid-exclusion-pattern";

export abstract class PolicyAnalysisError extends Error {
    abstract readonly kind: DiagnosticKind;
    readonly statementIndex: number | null;

    constructor(message: string, statementIndex: number | null = null) {
        super(message);
        this.name = new.target.name;
        this.statementIndex = statementIndex;
    }
}

export class UnknownServiceError extends PolicyAnalysisError {
    readonly kind = "unknown-service";

    constructor(
        readonly service: string,
        readonly action: string,
        statementIndex: number | null = null,
    ) {
        super(
            `Action "${action}" references service "${service}", which has no actions in the catalog`,
            statementIndex,
        );
    }
}

export class AmbiguousNotActionError extends PolicyAnalysisError {
    readonly kind = "ambiguous-not-action";

    constructor(
        readonly notActions: readonly string[],
        statementIndex: number | null = null,
    ) {
        super(
            `NotAction [${notActions.join(", ")}] cannot be resolved without a service scope`,
            statementIndex,
        );
    }
}

export class UnmatchedActionPatternError extends PolicyAnalysisError {
    readonly kind = "unmatched-action-pattern";

    constructor(
        readonly pattern: string,
        statementIndex: number | null = null,
    ) {
        super(
            `Action pattern "${pattern}" matches no action in the catalog`,
            statementIndex,
        );
    }
}

export class MalformedStatementError extends PolicyAnalysisError {
    readonly kind = "malformed-statement";
}

export class InvalidExclusionPatternError extends PolicyAnalysisError {
    readonly kind = "invalid-exclusion-pattern";

    constructor(
        readonly pattern: string,
        reason: string,
    ) {
        super(`Invalid exclusion pattern "${pattern}": ${reason}`);
    }
}
