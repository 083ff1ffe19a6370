import chalk from "chalk";

/**
 * Base class for every error raised by a compilation phase.
 * `rawMessage` is the bare diagnostic; `message` appends the position when known.
 */
export class CompilerError extends Error {
    public rawMessage: string;
    public position?: number;

    constructor(message: string, position?: number) {
        super(
            position === undefined
                ? message
                : `${message} at position ${position}`,
        );
        this.name = "CompilerError";
        this.rawMessage = message;
        this.position = position;
    }
}

export class LexicalError extends CompilerError {
    public character: string;
    declare position: number;

    constructor(character: string, position: number) {
        super(`Unrecognized character '${character}'`, position);
        this.name = "LexicalError";
        this.character = character;
    }
}

export class ParseError extends CompilerError {
    constructor(message: string, position?: number) {
        super(message, position);
        this.name = "ParseError";
    }
}

export interface DiagnosticOptions {
    color?: boolean;
    /** Header prefix, `Error` unless given. */
    label?: string;
}

/**
 * Renders an error as a caret diagnostic pointing into the source line.
 *
 * Error: expected ')'
 *  --> position 4
 *   |
 *   | (2+3
 *   |     ^
 */
export function formatDiagnostic(
    source: string,
    error: CompilerError,
    options: DiagnosticOptions = {},
): string {
    const paint = new chalk.Instance({ level: options.color ? 1 : 0 });

    const label = options.label ?? "Error";
    const errorHeader = `${paint.red.bold(`${label}:`)} ${paint.bold(error.rawMessage)}`;
    if (error.position === undefined) {
        return errorHeader;
    }

    const { line, column } = lineAt(source, error.position);

    const locationLine = ` ${paint.blue("-->")} position ${error.position}`;
    const pipeLine = `  ${paint.blue("|")}`;
    const codeLine = `  ${paint.blue("|")} ${line}`;
    // Tabs are kept so the caret lines up under the same columns.
    const pointerSpace = line.slice(0, column).replace(/[^\t]/g, " ");
    const pointerLine = `  ${paint.blue("|")} ${pointerSpace}${paint.red.bold("^")}`;

    return [errorHeader, locationLine, pipeLine, codeLine, pointerLine].join(
        "\n",
    );
}

/** The source line containing `position`, and the offset within it. */
function lineAt(
    source: string,
    position: number,
): { line: string; column: number } {
    const start =
        position === 0 ? 0 : source.lastIndexOf("\n", position - 1) + 1;
    const newline = source.indexOf("\n", position);
    const end = newline === -1 ? source.length : newline;
    return {
        line: source.slice(start, end).replace(/\r$/, ""),
        column: position - start,
    };
}
