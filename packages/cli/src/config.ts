import * as fs from "node:fs/promises";
import * as nodePath from "node:path";
import * as yaml from "js-yaml";
import { ConfigError, errorMessage } from "./errors";

export const DEFAULT_CONFIG_FILE = "arithc.yml";

export const SECTIONS = ["tokens", "ast", "symbols", "types", "code"] as const;

export type Section = (typeof SECTIONS)[number];

export interface CliConfig {
    color?: boolean;
    json?: boolean;
    sections?: Section[];
}

function isMissingFile(e: unknown): boolean {
    return e instanceof Error && "code" in e && e.code === "ENOENT";
}

function isSection(value: unknown): value is Section {
    return SECTIONS.some((section) => section === value);
}

function readBoolean(value: unknown, key: string, origin: string): boolean {
    if (typeof value !== "boolean") {
        throw new ConfigError(`${origin}: '${key}' must be true or false`);
    }
    return value;
}

/**
 * Validates the YAML document of a config file. An empty document is an
 * empty config.
 */
export function parseConfig(content: string, origin: string): CliConfig {
    let raw: unknown;
    try {
        raw = yaml.load(content);
    } catch (e) {
        throw new ConfigError(`${origin}: ${errorMessage(e)}`);
    }

    if (raw === undefined || raw === null) return {};
    if (typeof raw !== "object" || Array.isArray(raw)) {
        throw new ConfigError(`${origin}: expected a mapping at the top level`);
    }

    const config: CliConfig = {};

    if ("color" in raw && raw.color !== undefined) {
        config.color = readBoolean(raw.color, "color", origin);
    }
    if ("json" in raw && raw.json !== undefined) {
        config.json = readBoolean(raw.json, "json", origin);
    }
    if ("sections" in raw && raw.sections !== undefined) {
        const sections = raw.sections;
        if (!Array.isArray(sections)) {
            throw new ConfigError(`${origin}: 'sections' must be a list`);
        }
        config.sections = sections.map((section: unknown) => {
            if (!isSection(section)) {
                throw new ConfigError(
                    `${origin}: unknown section '${String(section)}'. ` +
                        `Valid sections: ${SECTIONS.join(", ")}`,
                );
            }
            return section;
        });
    }

    return config;
}

/**
 * Loads the config at `path`, or `arithc.yml` in `cwd` when no path is given.
 * Only an explicitly requested file is required to exist.
 */
export async function loadConfig(
    path?: string,
    cwd: string = process.cwd(),
): Promise<CliConfig> {
    const configPath = nodePath.resolve(cwd, path ?? DEFAULT_CONFIG_FILE);

    let content: string;
    try {
        content = await fs.readFile(configPath, "utf-8");
    } catch (e) {
        if (path === undefined && isMissingFile(e)) {
            return {};
        }
        throw new ConfigError(
            `Cannot read config file ${configPath}: ${errorMessage(e)}`,
        );
    }

    return parseConfig(content, configPath);
}
