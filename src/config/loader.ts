import { readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { ProjectConfigSchema, type ProjectConfig } from "./types.js";
import { ConfigError } from "../errors.js";
import { createLogger, isLogLevel } from "../util/logger.js";

const log = createLogger("config-loader");

export const CONFIG_FILE = ".ruleshare.yaml";
export const LOG_LEVEL_ENV = "RULESHARE_LOG_LEVEL";

export function parseProjectConfig(raw: string, filePath: string): ProjectConfig {
  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (e) {
    throw new ConfigError(filePath, `unparseable YAML: ${String(e)}`, e);
  }
  const result = ProjectConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const reason = result.error.issues.map((i) => `${i.path.join(".") || "root"}: ${i.message}`).join("; ");
    throw new ConfigError(filePath, reason, result.error);
  }

  const config = result.data;
  const envLevel = process.env[LOG_LEVEL_ENV];
  if (envLevel && isLogLevel(envLevel)) {
    config.logLevel = envLevel;
  }
  return config;
}

export function loadProjectConfig(filePath: string): ProjectConfig {
  log.info("Loading project config", { filePath });
  let raw: string;
  try {
    raw = readFileSync(filePath, "utf-8");
  } catch (e) {
    throw new ConfigError(filePath, `cannot read file: ${String(e)}`, e);
  }
  const config = parseProjectConfig(raw, filePath);
  log.info("Loaded project config", { remote: config.remote.url, kind: config.remote.kind });
  return config;
}
