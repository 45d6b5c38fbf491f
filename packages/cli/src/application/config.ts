import type { ReportFormat, TimeZoneMode } from "@commitlens/reporter";
import type { BasicCredentials } from "@commitlens/repository-client";

export const USERNAME_ENV = "COMMITLENS_USERNAME";
export const PASSWORD_ENV = "COMMITLENS_PASSWORD";
export const LOG_LEVEL_ENV = "COMMITLENS_LOG_LEVEL";

export class ConfigurationError extends Error {
  readonly option: string;

  constructor(option: string, message: string) {
    super(message);
    this.name = "ConfigurationError";
    this.option = option;
  }
}

export type AnalyzeCliOptions = {
  url: string;
  project: string;
  repo: string;
  branch: string;
  username?: string;
  password?: string;
  format: string;
  output?: string;
  exclude?: readonly string[];
  cumulative: boolean;
  utc?: boolean;
  fileConcurrency: string;
};

export type AnalyzeConfig = {
  connection: {
    baseUrl: string;
    projectKey: string;
    repositorySlug: string;
    credentials: BasicCredentials;
  };
  branch: string;
  format: ReportFormat;
  outputPath: string | null;
  excludedExtensions: readonly string[];
  showCumulative: boolean;
  timeZone: TimeZoneMode;
  fileDiffConcurrency: number;
};

type Environment = Readonly<Record<string, string | undefined>>;

const requireText = (option: string, value: string | undefined): string => {
  const trimmed = value?.trim() ?? "";
  if (trimmed.length === 0) {
    throw new ConfigurationError(option, `--${option} must not be empty`);
  }

  return trimmed;
};

const parseServerUrl = (value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new ConfigurationError("url", `--url is not a valid URL: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigurationError("url", `--url must use http or https: ${value}`);
  }

  return value;
};

const resolveCredential = (
  option: string,
  envName: string,
  value: string | undefined,
  env: Environment,
): string => {
  const resolved = value ?? env[envName];
  if (resolved === undefined || resolved.length === 0) {
    throw new ConfigurationError(option, `missing ${option}: pass --${option} or set ${envName}`);
  }

  return resolved;
};

const parseFormat = (value: string): ReportFormat => {
  if (value === "text" || value === "json") {
    return value;
  }

  throw new ConfigurationError("format", `--format must be text or json: ${value}`);
};

const parseConcurrency = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigurationError(
      "file-concurrency",
      `--file-concurrency must be a positive integer: ${value}`,
    );
  }

  return parsed;
};

export const resolveAnalyzeConfig = (
  options: AnalyzeCliOptions,
  env: Environment = process.env,
): AnalyzeConfig => ({
  connection: {
    baseUrl: parseServerUrl(requireText("url", options.url)),
    projectKey: requireText("project", options.project),
    repositorySlug: requireText("repo", options.repo),
    credentials: {
      username: resolveCredential("username", USERNAME_ENV, options.username, env),
      password: resolveCredential("password", PASSWORD_ENV, options.password, env),
    },
  },
  branch: requireText("branch", options.branch),
  format: parseFormat(options.format),
  outputPath: options.output ?? null,
  excludedExtensions: options.exclude ?? [],
  showCumulative: options.cumulative,
  timeZone: options.utc === true ? "utc" : "local",
  fileDiffConcurrency: parseConcurrency(options.fileConcurrency),
});
