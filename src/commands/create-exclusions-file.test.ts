import { writeFile } from "node:fs/promises";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { createExclusionsTemplateBuilder } from "../use-cases/build-exclusions-template.js";
import { createExclusionsParser } from "../use-cases/parse-exclusions.js";
import {
    createCreateExclusionsFileCommand,
    DEFAULT_EXCLUSIONS_PATH,
} from "./create-exclusions-file.js";

vi.mock("node:fs/promises");

function buildCommand() {
    return createCreateExclusionsFileCommand({
        builder: createExclusionsTemplateBuilder(),
        parser: createExclusionsParser(),
    });
}

describe("CreateExclusionsFileCommand", () => {
    beforeEach(() => {
        vi.mocked(writeFile).mockReset();
        vi.mocked(writeFile).mockResolvedValue();
    });

    describe("given no output path", () => {
        it("should write the template to the default path without overwriting", async () => {
            // Arrange
            const mockConsole = { log: vi.fn(), warn: vi.fn() };

            // Act
            const path = await buildCommand().execute({}, mockConsole);

            // Assert
            expect(path).toBe(DEFAULT_EXCLUSIONS_PATH);
            expect(writeFile).toHaveBeenCalledWith(
                "exclusions.yml",
                createExclusionsTemplateBuilder().build(),
                { encoding: "utf-8", flag: "wx" },
            );
            expect(mockConsole.log).toHaveBeenCalledWith(
                "Exclusions template written to exclusions.yml",
            );
        });
    });

    describe("given force", () => {
        it("should overwrite the target", async () => {
            await buildCommand().execute(
                { outputPath: "config/exclusions.yml", force: true },
                { log: vi.fn(), warn: vi.fn() },
            );

            expect(writeFile).toHaveBeenCalledWith(
                "config/exclusions.yml",
                expect.any(String),
                { encoding: "utf-8", flag: "w" },
            );
        });
    });

    describe("given an existing file", () => {
        it("should fail", async () => {
            vi.mocked(writeFile).mockRejectedValue(
                new Error("EEXIST: file already exists"),
            );

            await expect(
                buildCommand().execute({}, { log: vi.fn(), warn: vi.fn() }),
            ).rejects.toThrow("EEXIST");
        });
    });
});
