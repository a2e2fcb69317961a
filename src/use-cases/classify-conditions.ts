import type { ConditionBlock } from "../entities/policy-document.js";

export interface ConditionClassification {
    readonly restrictiveKeys: readonly string[];
    readonly nonRestrictiveKeys: readonly string[];
    /** At least one condition key, and every key is restrictive. */
    readonly onlyRestrictive: boolean;
}

export interface ConditionClassifier {
    classify(conditions: ConditionBlock): ConditionClassification;
}

function isPermissiveOperator(operator: string): boolean {
    // IfExists passes when the key is absent; Null only tests presence.
    return operator.endsWith("IfExists") || operator === "Null";
}

export function createConditionClassifier(
    restrictiveKeys: Iterable<string>,
): ConditionClassifier {
    const known = new Set<string>();
    for (const key of restrictiveKeys) {
        known.add(key.toLowerCase());
    }

    return {
        classify(conditions: ConditionBlock): ConditionClassification {
            const restrictive: string[] = [];
            const nonRestrictive: string[] = [];

            for (const [operator, block] of Object.entries(conditions)) {
                for (const key of Object.keys(block)) {
                    if (
                        !isPermissiveOperator(operator) &&
                        known.has(key.toLowerCase())
                    ) {
                        restrictive.push(key);
                    } else {
                        nonRestrictive.push(key);
                    }
                }
            }

            return {
                restrictiveKeys: restrictive,
                nonRestrictiveKeys: nonRestrictive,
                onlyRestrictive:
                    restrictive.length > 0 && nonRestrictive.length === 0,
            };
        },
    };
}
