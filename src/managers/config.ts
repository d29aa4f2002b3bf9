import * as fs from "fs/promises";
import path from "path";
import {
  ConfigSchema,
  PROVIDERS,
  type Config,
  type ConfigInput,
  type ProviderName,
} from "../types/config.js";

type Env = Record<string, string | undefined>;

export interface ConfigLocation {
  env?: Env;
  cwd?: string;
}

function isProviderName(value: string): value is ProviderName {
  return PROVIDERS.some((provider) => provider === value);
}

export class ConfigManager {
  static CONFIG_FILE_NAME = "config.json";
  static LOCAL_CONFIG_FILE_NAME = "sous.config.json";
  static CONFIG_DIR_NAME = ".sous";

  private static homeDir(env: Env): string | undefined {
    return env.HOME || env.USERPROFILE;
  }

  private static async findConfigFile(
    env: Env,
    cwd: string
  ): Promise<string | null> {
    const candidates = [path.join(cwd, this.LOCAL_CONFIG_FILE_NAME)];
    const home = this.homeDir(env);
    if (home) {
      candidates.push(
        path.join(home, this.CONFIG_DIR_NAME, this.CONFIG_FILE_NAME)
      );
    }

    for (const candidate of candidates) {
      try {
        await fs.access(candidate);
        return candidate;
      } catch {
        // not here, try the next location
      }
    }
    return null;
  }

  /**
   * Loads `./sous.config.json`, then `~/.sous/config.json`. Without either
   * file every setting takes its default. Environment variables win over the
   * file.
   */
  static async load({
    env = process.env,
    cwd = process.cwd(),
  }: ConfigLocation = {}): Promise<Config> {
    const configPath = await this.findConfigFile(env, cwd);

    let fileConfig: unknown = {};
    if (configPath) {
      try {
        fileConfig = JSON.parse(await fs.readFile(configPath, "utf-8"));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Failed to load config from ${configPath}: ${message}`);
      }
    }

    const result = ConfigSchema.safeParse(fileConfig);
    if (!result.success) {
      throw new Error(`Invalid configuration: ${result.error.message}`);
    }

    return this.applyEnv(result.data, env);
  }

  static applyEnv(config: Config, env: Env): Config {
    let provider = config.ai.provider;
    const requested = env.SOUS_PROVIDER?.toLowerCase().trim();
    if (requested) {
      if (!isProviderName(requested)) {
        throw new Error(
          `Invalid SOUS_PROVIDER="${requested}". Must be one of: ${PROVIDERS.join(", ")}`
        );
      }
      provider = requested;
    }

    return {
      ...config,
      ai: {
        ...config.ai,
        provider,
        anthropicKey: env.ANTHROPIC_API_KEY || config.ai.anthropicKey,
        geminiKey:
          env.GEMINI_API_KEY || env.GOOGLE_API_KEY || config.ai.geminiKey,
      },
      storage: {
        ...config.storage,
        recipesFile: env.SOUS_RECIPES_FILE || config.storage.recipesFile,
      },
    };
  }

  /**
   * Validates and writes the configuration to `~/.sous/config.json`.
   * Returns the path written.
   */
  static async save(
    config: ConfigInput,
    { env = process.env }: Pick<ConfigLocation, "env"> = {}
  ): Promise<string> {
    const result = ConfigSchema.safeParse(config);
    if (!result.success) {
      throw new Error(`Invalid configuration: ${result.error.message}`);
    }

    const homePath = this.homeDir(env);
    if (!homePath) {
      throw new Error("Could not determine home directory");
    }

    const configDir = path.join(homePath, this.CONFIG_DIR_NAME);
    const configPath = path.join(configDir, this.CONFIG_FILE_NAME);

    await fs.mkdir(configDir, { recursive: true });
    await fs.writeFile(
      configPath,
      JSON.stringify(result.data, null, 2),
      "utf-8"
    );
    return configPath;
  }
}
