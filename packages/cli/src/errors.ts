export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

export function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

export class InputError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "InputError";
    }
}
