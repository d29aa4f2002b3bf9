import * as fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigManager } from "./config.js";

describe("ConfigManager", () => {
  let home: string;
  let cwd: string;

  beforeEach(async () => {
    home = await fs.mkdtemp(path.join(os.tmpdir(), "sous-home-"));
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "sous-cwd-"));
  });

  afterEach(async () => {
    await fs.rm(home, { recursive: true, force: true });
    await fs.rm(cwd, { recursive: true, force: true });
  });

  it("falls back to defaults without a config file", async () => {
    const config = await ConfigManager.load({ env: { HOME: home }, cwd });
    expect(config).toEqual({
      ai: {
        provider: "claude",
        anthropicKey: undefined,
        geminiKey: undefined,
      },
      storage: { recipesFile: "saved_recipes.json" },
      defaults: { maxSuggestions: 5, servings: 4, units: "metric" },
    });
  });

  it("prefers the local config file over the home one", async () => {
    await fs.mkdir(path.join(home, ".sous"));
    await fs.writeFile(
      path.join(home, ".sous", "config.json"),
      JSON.stringify({ defaults: { servings: 6 } })
    );
    await fs.writeFile(
      path.join(cwd, "sous.config.json"),
      JSON.stringify({ ai: { provider: "gemini", geminiKey: "test-key" } })
    );

    const config = await ConfigManager.load({ env: { HOME: home }, cwd });
    expect(config.ai.provider).toBe("gemini");
    expect(config.ai.geminiKey).toBe("test-key");
    expect(config.defaults.servings).toBe(4);
  });

  it("lets environment variables override the file", async () => {
    await fs.writeFile(
      path.join(cwd, "sous.config.json"),
      JSON.stringify({ ai: { anthropicKey: "file-key" } })
    );

    const config = await ConfigManager.load({
      env: {
        HOME: home,
        SOUS_PROVIDER: "Gemini",
        ANTHROPIC_API_KEY: "env-key",
        GOOGLE_API_KEY: "google-key",
        SOUS_RECIPES_FILE: "/tmp/book.json",
      },
      cwd,
    });
    expect(config.ai).toEqual({
      provider: "gemini",
      anthropicKey: "env-key",
      geminiKey: "google-key",
    });
    expect(config.storage.recipesFile).toBe("/tmp/book.json");
  });

  it("rejects an unknown provider from the environment", async () => {
    await expect(
      ConfigManager.load({ env: { HOME: home, SOUS_PROVIDER: "gpt4" }, cwd })
    ).rejects.toThrow('Invalid SOUS_PROVIDER="gpt4"');
  });

  it("reports invalid configuration", async () => {
    await fs.writeFile(
      path.join(cwd, "sous.config.json"),
      JSON.stringify({ defaults: { maxSuggestions: 50 } })
    );
    await expect(
      ConfigManager.load({ env: { HOME: home }, cwd })
    ).rejects.toThrow("Invalid configuration");
  });

  it("reports unreadable JSON with the file path", async () => {
    const configPath = path.join(cwd, "sous.config.json");
    await fs.writeFile(configPath, "{");
    await expect(
      ConfigManager.load({ env: { HOME: home }, cwd })
    ).rejects.toThrow(`Failed to load config from ${configPath}`);
  });

  it("saves to the home directory and loads it back", async () => {
    const savedPath = await ConfigManager.save(
      { ai: { provider: "gemini", geminiKey: "test-secret" } },
      { env: { HOME: home } }
    );
    expect(savedPath).toBe(path.join(home, ".sous", "config.json"));

    const config = await ConfigManager.load({ env: { HOME: home }, cwd });
    expect(config.ai.provider).toBe("gemini");
    expect(config.ai.geminiKey).toBe("test-secret");
    expect(config.defaults.units).toBe("metric");
  });
});
