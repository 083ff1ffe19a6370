#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { runCompile } from "./commands/compile";

yargs(hideBin(process.argv))
    .scriptName("arithc")
    .usage("$0 [expression]")
    .command(
        "$0 [expression]",
        "Compile an arithmetic expression to three-address code",
        (yargs) => {
            return yargs
                .positional("expression", {
                    describe: "Expression to compile; prompted for when omitted",
                    type: "string",
                })
                .option("json", {
                    describe: "Print the compilation result as JSON",
                    type: "boolean",
                })
                .option("color", {
                    describe: "Colorize output (--no-color to disable)",
                    type: "boolean",
                })
                .option("config", {
                    describe: "Path to a YAML config file (default: ./arithc.yml)",
                    type: "string",
                });
        },
        async (argv) => {
            process.exitCode = await runCompile({
                expression: argv.expression,
                json: argv.json,
                color: argv.color,
                config: argv.config,
            });
        },
    )
    .strict()
    .help()
    .parseAsync()
    .catch((e: unknown) => {
        console.error(e);
        process.exitCode = 1;
    });
