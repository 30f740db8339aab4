/**
 * L0 Tests: worker entry point wiring
 */

import { describe, expect, test } from "vitest";
import { z } from "zod";
import * as fs from "fs";
import * as path from "path";

const ROOT = path.resolve(__dirname, "../../../..");

const PackageJsonSchema = z.object({
  scripts: z.record(z.string()),
  devDependencies: z.record(z.string()),
});

describe("L0: worker entry point", () => {
  test("npm start runs main.ts from source", () => {
    const pkg = PackageJsonSchema.parse(JSON.parse(fs.readFileSync(path.join(ROOT, "package.json"), "utf-8")));
    const [runner, entry] = pkg.scripts.start.split(" ");

    expect(runner).toBe("tsx");
    expect(pkg.devDependencies).toHaveProperty("tsx");
    expect(entry).toBe("packages/worker/src/main.ts");
    expect(fs.existsSync(path.join(ROOT, entry))).toBe(true);
  });
});
