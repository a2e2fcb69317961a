import { readFile } from "node:fs/promises";
import { basename, extname } from "node:path";
import { defineCommand } from "citty";
import { consola } from "consola";
import { parseJsonInput } from "../entities/sanitize-json.js";
import type {
    ActionCatalog,
    ActionCatalogLoader,
} from "../use-cases/action-catalog.port.js";
import type {
    ExpandedPolicy,
    PolicyExpander,
} from "../use-cases/expand-policy.js";
import type { PolicyDocumentNormalizer } from "../use-cases/normalize-policy-document.js";
import type { ConsoleOutput } from "./scan-context.js";

export interface ExpandPolicyCommandDeps {
    readonly catalogLoader: ActionCatalogLoader;
    readonly normalizer: PolicyDocumentNormalizer;
    readonly buildExpander: (catalog: ActionCatalog) => PolicyExpander;
}

export interface ExpandPolicyCommandOptions {
    readonly inputPath: string;
    readonly catalogPath?: string | undefined;
}

export interface ExpandPolicyCommand {
    execute(
        options: ExpandPolicyCommandOptions,
        console: ConsoleOutput,
    ): Promise<ExpandedPolicy>;
}

export function createExpandPolicyCommand(
    deps: ExpandPolicyCommandDeps,
): ExpandPolicyCommand {
    return {
        async execute(
            options: ExpandPolicyCommandOptions,
            output: ConsoleOutput,
        ): Promise<ExpandedPolicy> {
            const catalog = await deps.catalogLoader.load(options.catalogPath);
            const content = await readFile(options.inputPath, "utf-8");
            const { document, diagnostics } = deps.normalizer.normalize({
                id: options.inputPath,
                name: basename(options.inputPath, extname(options.inputPath)),
                sourceKind: "managed",
                principal: null,
                document: parseJsonInput(content, "policy file"),
            });

            const expanded = deps.buildExpander(catalog).expand(document);
            const result: ExpandedPolicy = {
                policy: expanded.policy,
                diagnostics: [...diagnostics, ...expanded.diagnostics],
            };

            output.log(JSON.stringify(result.policy, null, 2));
            for (const diagnostic of result.diagnostics) {
                output.warn(diagnostic.message);
            }

            return result;
        },
    };
}

export function createExpandPolicyCittyCommand(deps: ExpandPolicyCommandDeps) {
    const expandPolicyCommand = createExpandPolicyCommand(deps);

    return defineCommand({
        meta: {
            name: "expand-policy",
            description:
                "Print an IAM policy with action wildcards replaced by the matching actions",
        },
        args: {
            input: {
                type: "string",
                description: "Path to the IAM policy JSON file",
                required: true,
            },
            catalog: {
                type: "string",
                description: "Path to an alternative action catalog JSON file",
                required: false,
            },
        },
        async run({ args }) {
            await expandPolicyCommand.execute(
                { inputPath: args.input, catalogPath: args.catalog },
                {
                    log: (msg) => consola.log(msg),
                    warn: (msg) => consola.warn(msg),
                },
            );
        },
    });
}
