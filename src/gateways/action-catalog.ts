import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import type { ActionCatalogDataset } from "../entities/action-catalog.js";
import {
    compareRiskCategories,
    type RiskCategory,
} from "../entities/risk-finding.js";
import { parseJsonInput } from "../entities/sanitize-json.js";
import {
    compareCodeUnits,
    splitAction,
} from "../entities/wildcard-pattern.js";
import { ActionCatalogDatasetSchema } from "../use-cases/action-catalog.schema.js";
import type {
    ActionCatalog,
    ActionCatalogLoader,
} from "../use-cases/action-catalog.port.js";

export const DEFAULT_CATALOG_PATH = fileURLToPath(
    new URL("../../data/action-catalog.json", import.meta.url),
);

const EMPTY_ACTIONS: ReadonlySet<string> = new Set();
const EMPTY_TAGS: ReadonlySet<RiskCategory> = new Set();

export function createActionCatalog(
    dataset: ActionCatalogDataset,
): ActionCatalog {
    const actionsByService = new Map<string, ReadonlySet<string>>();
    const canonicalByLowerName = new Map<string, string>();
    const tagsByLowerName = new Map<string, ReadonlySet<RiskCategory>>();
    const readOnlyLowerNames = new Set<string>();

    for (const [prefix, service] of Object.entries(dataset.services)) {
        const qualified = Object.keys(service.actions)
            .map((name) => `${prefix}:${name}`)
            .sort(compareCodeUnits);
        actionsByService.set(prefix.toLowerCase(), new Set(qualified));

        for (const [name, categories] of Object.entries(service.actions)) {
            const canonical = `${prefix}:${name}`;
            const key = canonical.toLowerCase();
            canonicalByLowerName.set(key, canonical);
            if (categories.length > 0) {
                tagsByLowerName.set(
                    key,
                    new Set([...categories].sort(compareRiskCategories)),
                );
            }
        }
        for (const name of service.readOnly ?? []) {
            readOnlyLowerNames.add(`${prefix}:${name}`.toLowerCase());
        }
    }

    const services = [...actionsByService.keys()].sort(compareCodeUnits);

    return {
        version: dataset.version,
        services(): readonly string[] {
            return services;
        },
        lookup(service: string): ReadonlySet<string> {
            return actionsByService.get(service.toLowerCase()) ?? EMPTY_ACTIONS;
        },
        tags(action: string): ReadonlySet<RiskCategory> {
            return tagsByLowerName.get(action.toLowerCase()) ?? EMPTY_TAGS;
        },
        isReadOnly(action: string): boolean {
            return readOnlyLowerNames.has(action.toLowerCase());
        },
        canonicalName(action: string): string | undefined {
            const { service } = splitAction(action);
            if (service.length === 0) {
                return undefined;
            }
            return canonicalByLowerName.get(action.toLowerCase());
        },
        severityOf(category: RiskCategory) {
            return dataset.categories[category].severity;
        },
        escalationPaths() {
            return dataset.escalationPaths;
        },
    };
}

export function createActionCatalogLoader(): ActionCatalogLoader {
    return {
        async load(path = DEFAULT_CATALOG_PATH): Promise<ActionCatalog> {
            const content = await readFile(path, "utf-8");
            const raw = parseJsonInput(content, "action catalog");
            const dataset = ActionCatalogDatasetSchema.parse(raw);
            return createActionCatalog(dataset);
        },
    };
}
