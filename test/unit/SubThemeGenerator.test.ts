/**
 * Tests for SubThemeGenerator and token replacement.
 *
 * @module
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import { SubThemeGenerator, replaceTokens } from "../../src/core/generate/SubThemeGenerator.js";

// =============================================================================
// Test Helpers
// =============================================================================

async function writeFile(root: string, relativePath: string, content: string | Buffer): Promise<void> {
  const filePath = path.join(root, relativePath);
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content);
}

async function read(root: string, relativePath: string): Promise<string> {
  return fs.readFile(path.join(root, relativePath), "utf-8");
}

// =============================================================================
// replaceTokens
// =============================================================================

describe("replaceTokens", () => {
  it("replaces every occurrence", () => {
    expect(replaceTokens("whisk and whisk", { whisk: "my_theme" })).toBe(
      "my_theme and my_theme",
    );
  });

  it("replaces longer keys before the keys they contain", () => {
    expect(
      replaceTokens("whisk_base whisk", { whisk: "my_theme", whisk_base: "base" }),
    ).toBe("base my_theme");
  });

  it("treats keys literally", () => {
    expect(replaceTokens("a.b a+b", { "a.b": "x" })).toBe("x a+b");
  });

  it("does not rescan text a replacement inserted", () => {
    expect(replaceTokens("Whisk whisk", { Whisk: "whisk lovers", whisk: "acme" })).toBe(
      "whisk lovers acme",
    );
  });

  it("ignores empty keys", () => {
    expect(replaceTokens("whisk", { "": "boom" })).toBe("whisk");
  });
});

// =============================================================================
// SubThemeGenerator
// =============================================================================

describe("SubThemeGenerator", () => {
  let dir: string;
  const generator = new SubThemeGenerator({ machineName: "whisk", displayName: "Whisk" });

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "themebake-generate-test-"));
    await writeFile(dir, "whisk.info.yml", "name: Whisk\ntype: theme\nbase theme: emulsify\n");
    await writeFile(dir, "whisk.libraries.yml", "global:\n  css: {}\n");
    await writeFile(dir, "templates/page.twig", "{{ attach_library('whisk/global') }}\n");
    await writeFile(dir, "README.md", "A starter.\n");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("rewrites machine and display name placeholders", async () => {
    await generator.generate({
      destinationDir: dir,
      machineName: "my_theme",
      displayName: "My Theme",
    });

    expect(await read(dir, "my_theme.info.yml")).toBe(
      "name: My Theme\ntype: theme\nbase theme: emulsify\n",
    );
    expect(await read(dir, "templates/page.twig")).toBe(
      "{{ attach_library('my_theme/global') }}\n",
    );
    expect(await read(dir, "README.md")).toBe("A starter.\n");
  });

  it("reports rewritten files in sorted order by their original path", async () => {
    const result = await generator.generate({
      destinationDir: dir,
      machineName: "my_theme",
      displayName: "My Theme",
    });

    expect(result.filesRewritten).toEqual(["templates/page.twig", "whisk.info.yml"]);
  });

  it("renames files carrying the machine-name placeholder", async () => {
    const result = await generator.generate({
      destinationDir: dir,
      machineName: "my_theme",
      displayName: "My Theme",
    });

    expect(result.filesRenamed).toEqual([
      { from: "whisk.info.yml", to: "my_theme.info.yml" },
      { from: "whisk.libraries.yml", to: "my_theme.libraries.yml" },
    ]);
    await expect(fs.access(path.join(dir, "whisk.info.yml"))).rejects.toThrow();
    expect(await read(dir, "my_theme.libraries.yml")).toBe("global:\n  css: {}\n");
  });

  it("leaves binary files untouched", async () => {
    const binary = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x00, ...Buffer.from("whisk")]);
    await writeFile(dir, "images/logo.png", binary);

    const result = await generator.generate({
      destinationDir: dir,
      machineName: "my_theme",
      displayName: "My Theme",
    });

    expect(await fs.readFile(path.join(dir, "images/logo.png"))).toEqual(binary);
    expect(result.filesRewritten).not.toContain("images/logo.png");
  });

  it("skips node_modules and includes dotfiles", async () => {
    await writeFile(dir, "node_modules/pkg/index.js", "// whisk\n");
    await writeFile(dir, ".storybook/main.js", "// whisk\n");

    const result = await generator.generate({
      destinationDir: dir,
      machineName: "my_theme",
      displayName: "My Theme",
    });

    expect(await read(dir, "node_modules/pkg/index.js")).toBe("// whisk\n");
    expect(await read(dir, ".storybook/main.js")).toBe("// my_theme\n");
    expect(result.filesRewritten).toContain(".storybook/main.js");
    expect(result.filesRewritten).not.toContain("node_modules/pkg/index.js");
  });

  it("keeps a display name that contains the machine-name placeholder", async () => {
    await generator.generate({
      destinationDir: dir,
      machineName: "whisky_bar",
      displayName: "whisk lovers",
    });

    expect(await read(dir, "whisky_bar.info.yml")).toBe(
      "name: whisk lovers\ntype: theme\nbase theme: emulsify\n",
    );
  });

  it("honours custom placeholders", async () => {
    const custom = new SubThemeGenerator({ machineName: "starterkit", displayName: "Starter Kit" });
    await writeFile(dir, "starterkit.info.yml", "name: Starter Kit\n");

    await custom.generate({ destinationDir: dir, machineName: "acme", displayName: "Acme" });

    expect(await read(dir, "acme.info.yml")).toBe("name: Acme\n");
    expect(await read(dir, "whisk.info.yml")).toBe(
      "name: Whisk\ntype: theme\nbase theme: emulsify\n",
    );
  });
});
