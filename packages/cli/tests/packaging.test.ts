/**
 * Tests for workspace packaging: what Node loads at run time.
 *
 * Tooling resolves workspace packages through the "source" condition;
 * Node does not know that condition and must land on compiled output.
 */

import { describe, it, expect } from "vitest";
import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { join, posix } from "node:path";
import { z } from "zod";

const ROOT = fileURLToPath(new URL("../../../", import.meta.url));
const PACKAGES = ["types", "ledger", "cli"] as const;

/** Conditions Node 20 matches for an ESM import. */
const NODE_CONDITIONS = ["node", "import"];

type ExportTarget = string | { [condition: string]: ExportTarget };

const ExportTargetSchema: z.ZodType<ExportTarget> = z.lazy(() =>
  z.union([z.string(), z.record(ExportTargetSchema)]),
);

const PackageJsonSchema = z.object({
  name: z.string(),
  exports: z.object({ ".": ExportTargetSchema }),
  bin: z.record(z.string()).optional(),
});

const BuildConfigSchema = z.object({
  compilerOptions: z.object({ rootDir: z.string(), outDir: z.string() }),
});

async function readJson<T>(path: string, schema: z.ZodType<T>): Promise<T> {
  return schema.parse(JSON.parse(await readFile(path, "utf-8")));
}

/** Walk conditional exports in key order, the way Node's resolver does. */
function resolveExport(target: ExportTarget, conditions: readonly string[]): string | undefined {
  if (typeof target === "string") {
    return target;
  }
  for (const [condition, next] of Object.entries(target)) {
    if (condition === "default" || conditions.includes(condition)) {
      const resolved = resolveExport(next, conditions);
      if (resolved !== undefined) {
        return resolved;
      }
    }
  }
  return undefined;
}

/** Where the package build writes the JavaScript for a source file. */
async function emittedPath(pkg: string, source: string): Promise<string> {
  const { compilerOptions } = await readJson(
    join(ROOT, "packages", pkg, "tsconfig.build.json"),
    BuildConfigSchema,
  );
  const relative = posix.relative(compilerOptions.rootDir, source);
  return `./${posix.join(compilerOptions.outDir, relative).replace(/\.ts$/, ".js")}`;
}

describe.each(PACKAGES)("@tally/%s", (pkg) => {
  const manifest = join(ROOT, "packages", pkg, "package.json");

  it("resolves to compiled JavaScript under Node's conditions", async () => {
    const { exports } = await readJson(manifest, PackageJsonSchema);

    const runtime = resolveExport(exports["."], NODE_CONDITIONS);

    expect(runtime).toBe("./dist/index.js");
    expect(runtime).toBe(await emittedPath(pkg, "src/index.ts"));
  });

  it("resolves to its TypeScript entry under the source condition", async () => {
    const { exports } = await readJson(manifest, PackageJsonSchema);

    const source = resolveExport(exports["."], ["source", ...NODE_CONDITIONS]);

    expect(source).toBe("./src/index.ts");
    expect(existsSync(join(ROOT, "packages", pkg, "src/index.ts"))).toBe(true);
  });
});

describe("tally executable", () => {
  it("points the package bin at the compiled entry point", async () => {
    const { bin } = await readJson(join(ROOT, "packages/cli/package.json"), PackageJsonSchema);

    expect(bin).toEqual({ tally: await emittedPath("cli", "src/main.ts") });
  });

  it("points the root bin at the same file", async () => {
    const { bin } = await readJson(join(ROOT, "package.json"), z.object({ bin: z.record(z.string()) }));

    expect(bin).toEqual({ tally: "./packages/cli/dist/main.js" });
  });

  it("keeps the shebang on the entry point", async () => {
    const source = await readFile(join(ROOT, "packages/cli/src/main.ts"), "utf-8");

    expect(source.startsWith("#!/usr/bin/env node\n")).toBe(true);
  });
});
