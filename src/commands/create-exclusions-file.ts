import { writeFile } from "node:fs/promises";
import { defineCommand } from "citty";
import { consola } from "consola";
import type { ExclusionsTemplateBuilder } from "../use-cases/build-exclusions-template.js";
import type { ExclusionsParser } from "../use-cases/parse-exclusions.js";
import type { ConsoleOutput } from "./scan-context.js";

export const DEFAULT_EXCLUSIONS_PATH = "exclusions.yml";

export interface CreateExclusionsFileCommandDeps {
    readonly builder: ExclusionsTemplateBuilder;
    readonly parser: ExclusionsParser;
}

export interface CreateExclusionsFileCommandOptions {
    readonly outputPath?: string | undefined;
    /** Overwrite an existing file. */
    readonly force?: boolean | undefined;
}

export interface CreateExclusionsFileCommand {
    execute(
        options: CreateExclusionsFileCommandOptions,
        console: ConsoleOutput,
    ): Promise<string>;
}

export function createCreateExclusionsFileCommand(
    deps: CreateExclusionsFileCommandDeps,
): CreateExclusionsFileCommand {
    return {
        async execute(
            options: CreateExclusionsFileCommandOptions,
            output: ConsoleOutput,
        ): Promise<string> {
            const outputPath = options.outputPath ?? DEFAULT_EXCLUSIONS_PATH;
            const template = deps.builder.build();
            deps.parser.parse(template);

            await writeFile(outputPath, template, {
                encoding: "utf-8",
                flag: options.force ? "w" : "wx",
            });
            output.log(`Exclusions template written to ${outputPath}`);

            return outputPath;
        },
    };
}

export function createCreateExclusionsFileCittyCommand(
    deps: CreateExclusionsFileCommandDeps,
) {
    const createExclusionsFileCommand = createCreateExclusionsFileCommand(deps);

    return defineCommand({
        meta: {
            name: "create-exclusions-file",
            description: "Write a starter exclusions YAML file",
        },
        args: {
            output: {
                type: "string",
                description: `Path to write the exclusions file to (default: ${DEFAULT_EXCLUSIONS_PATH})`,
                required: false,
            },
            force: {
                type: "boolean",
                description: "Overwrite the file if it already exists",
                required: false,
            },
        },
        async run({ args }) {
            await createExclusionsFileCommand.execute(
                { outputPath: args.output, force: args.force },
                {
                    log: (msg) => consola.log(msg),
                    warn: (msg) => consola.warn(msg),
                },
            );
        },
    });
}
