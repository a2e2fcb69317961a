import { PolicyAnalysisError } from "../entities/analysis-errors.js";
import { toDiagnostic } from "../entities/diagnostic.js";
import type { ExclusionRule } from "../entities/exclusion-rule.js";
import type {
    AccountInventory,
    PolicyScanResult,
    PolicySource,
    ScanReport,
    ScanSummary,
} from "../entities/scan-report.js";
import type { ScanSettings } from "../entities/scan-settings.js";
import type { ActionCatalog } from "./action-catalog.port.js";
import { createConditionClassifier } from "./classify-conditions.js";
import {
    createPolicyEvaluator,
    type PolicyEvaluator,
} from "./evaluate-policy.js";
import {
    createExclusionFilter,
    type ExclusionFilter,
} from "./filter-findings.js";
import {
    createPolicyDocumentNormalizer,
    type NormalizedPolicy,
    type PolicyDocumentNormalizer,
} from "./normalize-policy-document.js";
import { createStatementResolver } from "./resolve-statement.js";

export interface PolicyScannerDeps {
    readonly catalog: ActionCatalog;
    readonly normalizer: PolicyDocumentNormalizer;
    readonly evaluator: PolicyEvaluator;
    readonly filter: ExclusionFilter;
}

export interface PolicyScanner {
    scan(
        sources: readonly PolicySource[],
        rules: readonly ExclusionRule[],
        inventory?: AccountInventory,
    ): ScanReport;
}

const EMPTY_INVENTORY: AccountInventory = {
    principalPolicyMapping: [],
    customerManagedPoliciesInUse: [],
    awsManagedPoliciesInUse: [],
};

function unevaluated(
    source: PolicySource,
    error: PolicyAnalysisError,
): PolicyScanResult {
    return {
        policyId: source.id,
        policyName: source.name,
        sourceKind: source.sourceKind,
        principal: source.principal,
        access: "unevaluated",
        allowedActionCount: 0,
        revokedActions: [],
        findings: [],
        escalationPaths: [],
        unrestrictedActions: [],
        diagnostics: [toDiagnostic(error, source)],
    };
}

function summarize(results: readonly PolicyScanResult[]): ScanSummary {
    const findings = results.flatMap((r) => r.findings);
    const suppressed = findings.filter((f) => f.suppressed).length;
    return {
        policies: results.length,
        policiesWithoutAccess: results.filter((r) => r.access === "none")
            .length,
        findings: findings.length - suppressed,
        suppressedFindings: suppressed,
        escalationPaths: results.reduce(
            (sum, r) => sum + r.escalationPaths.length,
            0,
        ),
        diagnostics: results.reduce((sum, r) => sum + r.diagnostics.length, 0),
    };
}

export function createPolicyScanner(deps: PolicyScannerDeps): PolicyScanner {
    return {
        scan(
            sources: readonly PolicySource[],
            rules: readonly ExclusionRule[],
            inventory: AccountInventory = EMPTY_INVENTORY,
        ): ScanReport {
            const results: PolicyScanResult[] = [];

            for (const source of sources) {
                let normalized: NormalizedPolicy;
                try {
                    normalized = deps.normalizer.normalize(source);
                } catch (error) {
                    if (!(error instanceof PolicyAnalysisError)) {
                        throw error;
                    }
                    results.push(unevaluated(source, error));
                    continue;
                }

                const evaluation = deps.evaluator.evaluate(normalized.document);
                results.push({
                    policyId: source.id,
                    policyName: source.name,
                    sourceKind: source.sourceKind,
                    principal: source.principal,
                    access: evaluation.access,
                    allowedActionCount: evaluation.effective.allowed.size,
                    revokedActions: evaluation.effective.revoked,
                    findings: deps.filter.filter(evaluation.findings, rules),
                    escalationPaths: evaluation.escalationPaths,
                    unrestrictedActions: evaluation.unrestrictedActions,
                    diagnostics: [
                        ...normalized.diagnostics,
                        ...evaluation.diagnostics,
                    ],
                });
            }

            return {
                catalogVersion: deps.catalog.version,
                summary: summarize(results),
                policies: results,
                principalPolicyMapping: inventory.principalPolicyMapping,
                principalPolicyMappingAfterExclusions: deps.filter.filterMapping(
                    inventory.principalPolicyMapping,
                    rules,
                ),
                customerManagedPoliciesInUse:
                    inventory.customerManagedPoliciesInUse,
                awsManagedPoliciesInUse: inventory.awsManagedPoliciesInUse,
            };
        },
    };
}

export function buildPolicyScanner(
    catalog: ActionCatalog,
    settings: ScanSettings,
): PolicyScanner {
    const resolver = createStatementResolver({
        catalog,
        conditionClassifier: createConditionClassifier(
            settings.restrictiveConditionKeys,
        ),
    });
    return createPolicyScanner({
        catalog,
        normalizer: createPolicyDocumentNormalizer({
            notActionScope: settings.notActionScope,
        }),
        evaluator: createPolicyEvaluator({
            catalog,
            resolver,
            unrestrictedAccessLevels: settings.unrestrictedAccessLevels,
        }),
        filter: createExclusionFilter(),
    });
}
