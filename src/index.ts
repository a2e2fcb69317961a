import { defineCommand, runMain } from "citty";
import { createCreateExclusionsFileCittyCommand } from "./commands/create-exclusions-file.js";
import { createExpandPolicyCittyCommand } from "./commands/expand-policy.js";
import { createScanCittyCommand } from "./commands/scan.js";
import { createScanPolicyFileCittyCommand } from "./commands/scan-policy-file.js";
import { createActionCatalogLoader } from "./gateways/action-catalog.js";
import { createExclusionsTemplateBuilder } from "./use-cases/build-exclusions-template.js";
import { createConditionClassifier } from "./use-cases/classify-conditions.js";
import { createPolicyExpander } from "./use-cases/expand-policy.js";
import { createPolicyExtractor } from "./use-cases/extract-policy-sources.js";
import { createPolicyDocumentNormalizer } from "./use-cases/normalize-policy-document.js";
import { createAuthorizationDetailsParser } from "./use-cases/parse-authorization-details.js";
import { createExclusionsParser } from "./use-cases/parse-exclusions.js";
import { createScanSettingsParser } from "./use-cases/parse-scan-settings.js";
import { createStatementResolver } from "./use-cases/resolve-statement.js";
import { buildPolicyScanner } from "./use-cases/scan-policies.js";

const catalogLoader = createActionCatalogLoader();
const settingsParser = createScanSettingsParser();
const exclusionsParser = createExclusionsParser();

const scan = createScanCittyCommand({
    catalogLoader,
    settingsParser,
    exclusionsParser,
    detailsParser: createAuthorizationDetailsParser(),
    extractor: createPolicyExtractor(),
    buildScanner: buildPolicyScanner,
});

const scanPolicyFile = createScanPolicyFileCittyCommand({
    catalogLoader,
    settingsParser,
    exclusionsParser,
    buildScanner: buildPolicyScanner,
});

const expandPolicy = createExpandPolicyCittyCommand({
    catalogLoader,
    normalizer: createPolicyDocumentNormalizer({ notActionScope: [] }),
    buildExpander: (catalog) =>
        createPolicyExpander(
            createStatementResolver({
                catalog,
                conditionClassifier: createConditionClassifier(
                    settingsParser.defaults().restrictiveConditionKeys,
                ),
            }),
        ),
});

const createExclusionsFile = createCreateExclusionsFileCittyCommand({
    builder: createExclusionsTemplateBuilder(),
    parser: exclusionsParser,
});

const main = defineCommand({
    meta: {
        name: "iam-riskscan",
        description:
            "Evaluate AWS IAM policies for privilege escalation, credential exposure, data exfiltration and resource exposure risks",
    },
    subCommands: {
        scan,
        "scan-policy-file": scanPolicyFile,
        "expand-policy": expandPolicy,
        "create-exclusions-file": createExclusionsFile,
    },
});

runMain(main);
