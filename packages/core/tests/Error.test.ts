import {
    CompilerError,
    LexicalError,
    ParseError,
    formatDiagnostic,
} from "../src/utils/Error";

describe("Errors", () => {
    test("errors form one hierarchy", () => {
        const lexical = new LexicalError("#", 0);
        const parse = new ParseError("unexpected token", 3);

        expect(lexical).toBeInstanceOf(CompilerError);
        expect(lexical).toBeInstanceOf(Error);
        expect(lexical.name).toBe("LexicalError");
        expect(parse).toBeInstanceOf(CompilerError);
        expect(parse.name).toBe("ParseError");
    });

    test("diagnostic points at the position", () => {
        const output = formatDiagnostic("(2+3", new ParseError("expected ')'", 4));

        expect(output).toBe(
            [
                "Error: expected ')'",
                " --> position 4",
                "  |",
                "  | (2+3",
                "  |     ^",
            ].join("\n"),
        );
    });

    test("diagnostic for a lexical error", () => {
        const output = formatDiagnostic("2@3", new LexicalError("@", 1), {
            color: false,
        });

        expect(output.split("\n")[0]).toBe("Error: Unrecognized character '@'");
        expect(output.split("\n")[4]).toBe("  |  ^");
    });

    test("diagnostic shows only the line holding the position", () => {
        const output = formatDiagnostic("1+\n@", new LexicalError("@", 3));

        expect(output).toBe(
            [
                "Error: Unrecognized character '@'",
                " --> position 3",
                "  |",
                "  | @",
                "  | ^",
            ].join("\n"),
        );
    });

    test("diagnostic on a middle line ignores the lines around it", () => {
        const output = formatDiagnostic(
            "1 +\n2 $ 3\n+ 4",
            new LexicalError("$", 6),
        );

        expect(output.split("\n").slice(3)).toEqual(["  | 2 $ 3", "  |   ^"]);
    });

    test("caret padding keeps tabs", () => {
        const output = formatDiagnostic("\t@", new LexicalError("@", 1));

        expect(output.split("\n").slice(3)).toEqual(["  | \t@", "  | \t^"]);
    });

    test("diagnostic without a position is only the header", () => {
        const output = formatDiagnostic("", new ParseError("expression is empty"));
        expect(output).toBe("Error: expression is empty");
    });

    test("custom header label", () => {
        const output = formatDiagnostic("2+", new ParseError("invalid factor"), {
            label: "Syntax error",
        });
        expect(output).toBe("Syntax error: invalid factor");
    });

    test("colored diagnostic still carries the message", () => {
        const output = formatDiagnostic("2@3", new LexicalError("@", 1), {
            color: true,
        });

        expect(output).toContain("\u001b[");
        expect(output.replace(/\x1B\[[0-9;]*m/g, "").split("\n")[0]).toBe(
            "Error: Unrecognized character '@'",
        );
    });
});
