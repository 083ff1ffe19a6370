import * as fs from "fs";
import * as path from "path";

const root = path.resolve(__dirname, "../../..");

function readJson(file: string) {
    return JSON.parse(fs.readFileSync(file, "utf-8"));
}

// Workspace packages are symlinked into node_modules, so Node resolves
// `main` and `bin` relative to each package's own directory.
describe("workspace entry points", () => {
    const packages = ["core", "cli"];

    test.each(packages)("%s main is its own build output", (name) => {
        const packageDir = path.join(root, "packages", name);
        const manifest = readJson(path.join(packageDir, "package.json"));
        const build = readJson(path.join(packageDir, "tsconfig.build.json"));

        const main = path.resolve(packageDir, manifest.main);
        const emitted = path.resolve(
            packageDir,
            build.compilerOptions.outDir,
            path
                .relative(build.compilerOptions.rootDir, "src/index.ts")
                .replace(/\.ts$/, ".js"),
        );

        expect(main).toBe(emitted);
        expect(main.startsWith(packageDir + path.sep)).toBe(true);
        expect(fs.existsSync(path.join(packageDir, "src/index.ts"))).toBe(true);
    });

    test("core typings point at its sources", () => {
        const packageDir = path.join(root, "packages", "core");
        const manifest = readJson(path.join(packageDir, "package.json"));

        expect(fs.existsSync(path.resolve(packageDir, manifest.types))).toBe(
            true,
        );
    });

    test("cli build reads core from core's build output", () => {
        const cliDir = path.join(root, "packages", "cli");
        const coreDir = path.join(root, "packages", "core");
        const cliBuild = readJson(path.join(cliDir, "tsconfig.build.json"));
        const coreBuild = readJson(path.join(coreDir, "tsconfig.build.json"));

        const [typings] = cliBuild.compilerOptions.paths["@arithc/core"];
        expect(path.resolve(cliDir, typings)).toBe(
            path.resolve(coreDir, coreBuild.compilerOptions.outDir, "index.d.ts"),
        );
        expect(coreBuild.compilerOptions.declaration).toBe(true);
    });

    test("the arithc bin runs the cli build output", () => {
        const rootManifest = readJson(path.join(root, "package.json"));
        const cliDir = path.join(root, "packages", "cli");
        const cliManifest = readJson(path.join(cliDir, "package.json"));

        expect(path.resolve(root, rootManifest.bin.arithc)).toBe(
            path.resolve(cliDir, cliManifest.main),
        );
        expect(path.resolve(cliDir, cliManifest.bin.arithc)).toBe(
            path.resolve(cliDir, cliManifest.main),
        );
    });
});
