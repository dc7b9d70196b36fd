import path from "path";
import { ConfigError } from "./errors.js";

export type AutomationConfig = {
  /** Directory the pipeline step runs in; staging and status files live here. */
  workingDir: string;
  /** Directory holding the per-format image scripts. */
  automationDir?: string;
  buildSrcDir?: string;
  buildDevopsDir?: string;
  deploymentUnits: string[];
  codeCommits: string[];
  imageFormats: string[];
  imageFormatSeparators: string;
  s3DataStage?: string;
  debug: boolean;
  statusFile: string;
  statusUrl?: string;
  statusSecret?: string;
};

export type Env = Record<string, string | undefined>;

const CONFIG_ENV_NAMES = {
  automationDir: "AUTOMATION_DIR",
  buildSrcDir: "AUTOMATION_BUILD_SRC_DIR",
  buildDevopsDir: "AUTOMATION_BUILD_DEVOPS_DIR",
  s3DataStage: "S3_DATA_STAGE",
  statusUrl: "AUTOMATION_STATUS_URL",
  statusSecret: "AUTOMATION_STATUS_SECRET",
} as const;

type OptionalKey = keyof typeof CONFIG_ENV_NAMES;

function value(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

function list(env: Env, name: string): string[] {
  return (env[name] ?? "").split(/\s+/).filter((entry) => entry.length > 0);
}

export function loadConfig(
  env: Env = process.env,
  cwd: string = process.cwd()
): AutomationConfig {
  const workingDir = path.resolve(cwd, value(env, "AUTOMATION_BUILD_DIR") ?? ".");

  return {
    workingDir,
    automationDir: value(env, "AUTOMATION_DIR"),
    buildSrcDir: value(env, "AUTOMATION_BUILD_SRC_DIR"),
    buildDevopsDir: value(env, "AUTOMATION_BUILD_DEVOPS_DIR"),
    deploymentUnits: list(env, "DEPLOYMENT_UNIT_LIST"),
    codeCommits: list(env, "CODE_COMMIT_LIST"),
    imageFormats: list(env, "IMAGE_FORMATS_LIST"),
    imageFormatSeparators: env.IMAGE_FORMAT_SEPARATORS || ",",
    s3DataStage: value(env, "S3_DATA_STAGE"),
    debug: Boolean(value(env, "GENERATION_DEBUG") ?? value(env, "AUTOMATION_DEBUG")),
    statusFile: path.resolve(
      workingDir,
      value(env, "AUTOMATION_STATUS_FILE") ?? "STATUS.txt"
    ),
    statusUrl: value(env, "AUTOMATION_STATUS_URL"),
    statusSecret: value(env, "AUTOMATION_STATUS_SECRET"),
  };
}

type Configured<K extends OptionalKey> = AutomationConfig & {
  [P in K]-?: string;
};

function isConfigured<K extends OptionalKey>(
  config: AutomationConfig,
  keys: K[]
): config is Configured<K> {
  return keys.every((key) => Boolean(config[key]));
}

/**
 * Narrows the optional settings a command depends on, listing every missing
 * environment variable at once.
 */
export function requireConfig<K extends OptionalKey>(
  config: AutomationConfig,
  keys: K[]
): Configured<K> {
  if (!isConfigured(config, keys)) {
    const missing = keys
      .filter((key) => !config[key])
      .map((key) => CONFIG_ENV_NAMES[key]);
    throw new ConfigError(
      `Automation environment is not fully configured. Missing: ${missing.join(", ")}`
    );
  }
  return config;
}
