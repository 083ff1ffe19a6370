import chalk from "chalk";
import { compile, CompilerError, serializeResult } from "@arithc/core";
import { loadConfig } from "../config";
import { ConfigError, errorMessage } from "../errors";
import { promptExpression } from "../prompt";
import { renderError, renderResult } from "../render";

export interface CompileOptions {
    expression?: string;
    json?: boolean;
    color?: boolean;
    config?: string;
}

/**
 * Compiles one expression and reports it on the console.
 * Resolves to the process exit code.
 */
export async function runCompile(options: CompileOptions): Promise<number> {
    let source = "";
    let color = options.color ?? Boolean(process.stdout.isTTY);

    try {
        const config = await loadConfig(options.config);
        color = options.color ?? config.color ?? color;
        const json = options.json ?? config.json ?? false;

        source = options.expression ?? (await promptExpression());
        const result = compile(source);

        if (json) {
            console.log(JSON.stringify(serializeResult(result), null, 2));
        } else {
            console.log(
                renderResult(result, { sections: config.sections, color }),
            );
        }
        return 0;
    } catch (e) {
        const paint = new chalk.Instance({ level: color ? 1 : 0 });

        if (e instanceof CompilerError) {
            console.error(renderError(source, e, { color }));
        } else if (e instanceof ConfigError) {
            console.error(paint.red(`Config error: ${e.message}`));
        } else {
            console.error(paint.red(`Error: ${errorMessage(e)}`));
        }
        return 1;
    }
}
