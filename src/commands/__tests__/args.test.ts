/**
 * Tests for CLI argument parsing
 */

import { describe, expect, it } from "vitest";
import { HELP_TEXT, parseArgs, validateArgs } from "../args.js";

describe("parseArgs", () => {
    it("should collect repeated inputs in order", () => {
        const args = parseArgs(["analyze", "--input", "a.txt", "--input", "b.txt"]);

        expect(args.command).toBe("analyze");
        expect(args.inputs).toEqual(["a.txt", "b.txt"]);
    });

    it("should read context, config and debug options", () => {
        const args = parseArgs([
            "analyze",
            "--context",
            "thread.txt",
            "--config",
            "custom.json",
            "--debug",
            "--input",
            "mail.txt",
        ]);

        expect(args).toEqual({
            command: "analyze",
            inputs: ["mail.txt"],
            context: "thread.txt",
            config: "custom.json",
            debug: true,
            help: false,
            version: false,
        });
    });

    it("should recognize help and version flags", () => {
        expect(parseArgs(["-h"]).help).toBe(true);
        expect(parseArgs(["--help"]).help).toBe(true);
        expect(parseArgs(["-v"]).version).toBe(true);
        expect(parseArgs(["--version"]).version).toBe(true);
    });

    it("should ignore an option without a value", () => {
        expect(parseArgs(["analyze", "--input"]).inputs).toEqual([]);
    });
});

describe("validateArgs", () => {
    it("should require a command", () => {
        expect(validateArgs(parseArgs([]))).toContain("No command specified");
    });

    it("should reject unknown commands", () => {
        expect(validateArgs(parseArgs(["extract"]))).toBe(
            'Unknown command "extract". Use "offerlens --help" for usage.',
        );
    });

    it("should require at least one input", () => {
        expect(validateArgs(parseArgs(["analyze"]))).toBe("--input is required");
    });

    it("should accept a complete analyze command", () => {
        expect(validateArgs(parseArgs(["analyze", "--input", "mail.txt"]))).toBeUndefined();
    });
});

describe("HELP_TEXT", () => {
    it("should document every option", () => {
        for (const option of ["--input", "--context", "--config", "--debug", "--version", "--help"]) {
            expect(HELP_TEXT).toContain(option);
        }
    });
});
