import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { defaultSettings, loadSettings } from "@echopost/core";
import { SETTINGS_TEMPLATE } from "../commands/init.js";

describe("SETTINGS_TEMPLATE", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "echopost-init-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("spells out exactly the default settings", async () => {
    const path = join(dir, "settings.yml");
    await writeFile(path, SETTINGS_TEMPLATE);

    expect(await loadSettings(path)).toEqual(defaultSettings());
  });
});
