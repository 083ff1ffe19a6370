import chalk from "chalk";
import {
    CompilationResult,
    CompilerError,
    LexicalError,
    ParseError,
    formatAst,
    formatDiagnostic,
    formatInstruction,
    formatSymbolEntry,
    formatTokens,
    formatTypeEntry,
} from "@arithc/core";
import { SECTIONS, Section } from "./config";

export interface RenderOptions {
    sections?: readonly Section[];
    color?: boolean;
}

const TITLES: Record<Section, string> = {
    tokens: "Tokens",
    ast: "AST",
    symbols: "Symbol table",
    types: "Type table",
    code: "Three-address code",
};

function sectionBody(section: Section, result: CompilationResult): string[] {
    switch (section) {
        case "tokens":
            return [formatTokens(result.tokens)];
        case "ast":
            return formatAst(result.ast).split("\n");
        case "symbols":
            return result.symbols.map(formatSymbolEntry);
        case "types":
            return result.types.map(formatTypeEntry);
        case "code":
            return result.instructions.map(formatInstruction);
    }
}

/**
 * Console report of a successful compilation: one titled block per section,
 * each preceded by a blank line, then the final result reference.
 */
export function renderResult(
    result: CompilationResult,
    options: RenderOptions = {},
): string {
    const paint = new chalk.Instance({ level: options.color ? 1 : 0 });
    const lines: string[] = [];

    for (const section of options.sections ?? SECTIONS) {
        lines.push("", paint.bold(`=== ${TITLES[section]} ===`));
        lines.push(...sectionBody(section, result));
    }

    lines.push(`Final result in: ${paint.green(result.result)}`);
    return lines.join("\n");
}

function errorLabel(error: CompilerError): string {
    if (error instanceof LexicalError) return "Lexical error";
    if (error instanceof ParseError) return "Syntax error";
    return "Error";
}

export function renderError(
    source: string,
    error: CompilerError,
    options: RenderOptions = {},
): string {
    return formatDiagnostic(source, error, {
        color: options.color,
        label: errorLabel(error),
    });
}
