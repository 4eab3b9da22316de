/**
 * cli.test.ts — How the CLI is launched.
 *
 * The script carries a tsx shebang, so it is run from source through the
 * `sync` npm script rather than installed as a compiled bin.
 */

import { describe, it, expect } from "vitest";
import { readFileSync } from "node:fs";

function readRepoFile(relative: string): string {
  return readFileSync(new URL(`../${relative}`, import.meta.url), "utf8");
}

describe("order-sync CLI", () => {
  it("runs from source through tsx", () => {
    expect(readRepoFile("scripts/order-sync.ts").split("\n")[0]).toBe("#!/usr/bin/env tsx");
  });

  it("is exposed as the sync script, not as a compiled bin", () => {
    const pkg: unknown = JSON.parse(readRepoFile("package.json"));
    expect(pkg).not.toHaveProperty("bin");
    expect(pkg).toHaveProperty(["scripts", "sync"], "tsx scripts/order-sync.ts run");
  });
});
