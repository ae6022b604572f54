/**
 * Environment utilities for runtime/stage detection and safe env var access.
 */

export function getNodeEnv(): string {
  return process.env.NODE_ENV || "development";
}

export function getStage(): string {
  // Prefer SST stage when available; fall back to explicit STAGE; derive from NODE_ENV otherwise
  const sstStage = process.env.SST_STAGE || process.env.STAGE;
  if (sstStage && sstStage.length > 0) return sstStage;
  return getNodeEnv() === "production" ? "prod" : "dev";
}

export function isProduction(): boolean {
  const stage = getStage();
  return stage === "prod" || getNodeEnv() === "production";
}

export function isTest(): boolean {
  return getNodeEnv() === "test" || Boolean(process.env.JEST_WORKER_ID);
}

export function isLocal(): boolean {
  // SST dev flags or absence of Lambda execution env implies local
  const sstDev =
    process.env.SST_DEV === "true" || process.env.IS_LOCAL === "true";
  const isLambda = Boolean(
    process.env.AWS_LAMBDA_FUNCTION_NAME || process.env.AWS_EXECUTION_ENV
  );
  return sstDev || !isLambda;
}

export interface GetEnvVarOptions<T> {
  defaultValue?: T;
  required?: boolean;
  parse: (raw: string) => T;
  stageAware?: boolean; // if true, prefer NAME__<stage> before NAME
}

/**
 * Returns the raw value of an env var, checking NAME__<stage> first unless
 * `stageAware` is false. Empty strings count as unset.
 */
export function readEnvVar(
  name: string,
  stageAware = true
): string | undefined {
  const stageKey = `${name}__${getStage()}`;
  const candidate = stageAware
    ? process.env[stageKey] ?? process.env[name]
    : process.env[name];
  return candidate != null && candidate !== "" ? candidate : undefined;
}

/**
 * Reads an environment variable with fallbacks and parsing.
 * - If `stageAware` is true (default), checks NAME__<stage> first (e.g., OPENAI_API_KEY__prod), then NAME.
 * - If not found, returns `defaultValue` when provided; otherwise throws when `required` is true.
 */
export function getEnvVar<T>(
  name: string,
  options: GetEnvVarOptions<T>
): T | undefined {
  const stageAware = options.stageAware !== false;
  const candidate = readEnvVar(name, stageAware);

  if (candidate !== undefined) {
    return options.parse(candidate);
  }

  if (options.defaultValue !== undefined) {
    return options.defaultValue;
  }

  if (options.required) {
    const tried = stageAware ? `${name}__${getStage()} or ${name}` : name;
    throw new Error(`Missing required env var: ${tried}`);
  }

  return undefined;
}

export function requireString(name: string): string {
  const value = getEnvVar(name, { parse: (raw) => raw, required: true });
  if (value === undefined) {
    throw new Error(`Missing required env var: ${name}`);
  }
  return value;
}

export function getString(name: string): string | undefined;
export function getString(name: string, defaultValue: string): string;
export function getString(
  name: string,
  defaultValue?: string
): string | undefined {
  return getEnvVar(name, { defaultValue, parse: (raw) => raw });
}

export function getNumber(name: string): number | undefined;
export function getNumber(name: string, defaultValue: number): number;
export function getNumber(
  name: string,
  defaultValue?: number
): number | undefined {
  return getEnvVar(name, {
    defaultValue,
    parse: (raw) => {
      const n = Number(raw);
      if (Number.isNaN(n))
        throw new Error(`Env var ${name} is not a number: ${raw}`);
      return n;
    },
  });
}

export function getBoolean(name: string): boolean | undefined;
export function getBoolean(name: string, defaultValue: boolean): boolean;
export function getBoolean(
  name: string,
  defaultValue?: boolean
): boolean | undefined {
  return getEnvVar(name, {
    defaultValue,
    parse: (raw) => {
      const lowered = raw.toLowerCase();
      if (["1", "true", "yes", "y"].includes(lowered)) return true;
      if (["0", "false", "no", "n"].includes(lowered)) return false;
      throw new Error(`Env var ${name} is not a boolean: ${raw}`);
    },
  });
}
