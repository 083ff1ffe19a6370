import * as readline from "node:readline";
import { InputError } from "./errors";

export const PROMPT = "Enter an arithmetic expression: ";

/**
 * Reads a single line, the way the driver does when no expression is passed.
 * Rejects when the input ends before a line arrives.
 */
export function promptExpression(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout,
): Promise<string> {
    return new Promise((resolve, reject) => {
        const rl = readline.createInterface({ input, output });
        let answered = false;

        rl.once("close", () => {
            if (!answered) reject(new InputError("no expression given"));
        });
        rl.once("line", (answer: string) => {
            answered = true;
            rl.close();
            resolve(answer);
        });

        rl.setPrompt(PROMPT);
        rl.prompt();
    });
}
