import { UnmatchedActionPatternError } from "../entities/analysis-errors.js";
import { type Diagnostic, toDiagnostic } from "../entities/diagnostic.js";
import type {
    ConditionBlock,
    PolicyDocument,
    Statement,
} from "../entities/policy-document.js";
import type { StatementResolver } from "./resolve-statement.js";

export interface ExpandedStatement {
    readonly Sid?: string;
    readonly Effect: "Allow" | "Deny";
    readonly Action?: readonly string[];
    readonly NotAction?: readonly string[];
    readonly Resource?: readonly string[];
    readonly NotResource?: readonly string[];
    readonly Condition?: ConditionBlock;
}

export interface ExpandedPolicy {
    readonly policy: {
        readonly Version: "2012-10-17";
        readonly Statement: readonly ExpandedStatement[];
    };
    readonly diagnostics: readonly Diagnostic[];
}

export interface PolicyExpander {
    expand(document: PolicyDocument): ExpandedPolicy;
}

function hasConditions(statement: Statement): boolean {
    return Object.keys(statement.conditions).length > 0;
}

export function createPolicyExpander(
    resolver: StatementResolver,
): PolicyExpander {
    return {
        expand(document: PolicyDocument): ExpandedPolicy {
            const diagnostics: Diagnostic[] = [];

            const statements = document.statements.map(
                (statement): ExpandedStatement => {
                    // NotAction is left as written: its complement is open-ended.
                    let actionField: Pick<
                        ExpandedStatement,
                        "Action" | "NotAction"
                    > = { NotAction: statement.actions.patterns };
                    if (statement.actions.kind === "positive") {
                        const expansion = resolver.expandActions(
                            statement.actions.patterns,
                            statement.index,
                        );
                        const unmatched: string[] = [];
                        for (const issue of expansion.issues) {
                            diagnostics.push(toDiagnostic(issue, document));
                            if (issue instanceof UnmatchedActionPatternError) {
                                unmatched.push(issue.pattern);
                            }
                        }
                        // Unmatched patterns stay so the Action list is never empty.
                        actionField = {
                            Action: [
                                ...expansion.actions.map((entry) => entry.action),
                                ...unmatched,
                            ].sort(),
                        };
                    }

                    const resourceField =
                        statement.resources.kind === "positive"
                            ? { Resource: statement.resources.patterns }
                            : { NotResource: statement.resources.patterns };

                    return {
                        ...(statement.sid === null
                            ? {}
                            : { Sid: statement.sid }),
                        Effect: statement.effect,
                        ...actionField,
                        ...resourceField,
                        ...(hasConditions(statement)
                            ? { Condition: statement.conditions }
                            : {}),
                    };
                },
            );

            return {
                policy: { Version: "2012-10-17", Statement: statements },
                diagnostics,
            };
        },
    };
}
