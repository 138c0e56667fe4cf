import { describe, it, expect } from "vitest";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { VERSION } from "../version.js";

describe("entry", () => {
  it("declares the CLI commands", async () => {
    // Read the entry file instead of importing it: importing would parse argv and run a command.
    const entryPath = resolve(process.cwd(), "src", "entry.ts");
    const content = await readFile(entryPath, "utf-8");

    expect(content).toContain('.name("opsdesk")');
    expect(content).toContain('.command("serve")');
    expect(content).toContain('.command("db:init")');
    expect(content).toContain('.command("bootstrap-owner")');
  });

  it("reads its version from package.json", async () => {
    const pkg: unknown = JSON.parse(await readFile(resolve(process.cwd(), "package.json"), "utf-8"));
    expect(pkg).toMatchObject({ name: "opsdesk", version: VERSION });
  });

  it("runs on a supported Node.js version", () => {
    const nodeMajor = Number.parseInt(process.versions.node.split(".")[0] ?? "0", 10);
    // entry.ts requires Node >= 20
    expect(nodeMajor).toBeGreaterThanOrEqual(20);
  });
});
