/**
 * Environment Variable Validation
 *
 * Fail-fast startup validation to prevent misconfigured deployments.
 * Tier 1 (FATAL): Core platform requirements - server exits if misconfigured
 * Tier 2 (NON-FATAL): Optional settings - warns but allows startup
 */

import { logger, LOG_LEVELS } from "./logger";

type Env = Record<string, string | undefined>;

interface EnvCheck {
  name: string;
  required: boolean;
  tier: 1 | 2; // 1 = FATAL (exit), 2 = NON-FATAL (warn)
  validator?: (value: string | undefined, env: Env) => string | null; // Returns error message or null if valid
  productionOnly?: boolean;
}

const TIER1_CHECKS: EnvCheck[] = [
  {
    name: "DATABASE_URL",
    required: true,
    tier: 1,
    validator: (value) => {
      if (!value) return "DATABASE_URL must be set";
      try {
        const url = new URL(value);
        if (!url.protocol.startsWith("postgres")) {
          return "DATABASE_URL must be a PostgreSQL connection string";
        }
        return null;
      } catch {
        return "DATABASE_URL must be a valid PostgreSQL connection string";
      }
    },
  },
];

const TIER2_CHECKS: EnvCheck[] = [
  {
    name: "PORT",
    required: false,
    tier: 2,
    validator: (value) => {
      if (!value) return null;
      const port = Number(value);
      if (!Number.isInteger(port) || port <= 0 || port > 65535) {
        return `PORT must be an integer between 1 and 65535 (got "${value}"); falling back to 5000`;
      }
      return null;
    },
  },
  {
    name: "LOG_LEVEL",
    required: false,
    tier: 2,
    validator: (value) => {
      if (!value) return null;
      if (!(LOG_LEVELS as readonly string[]).includes(value.trim().toLowerCase())) {
        return `LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")} (got "${value}")`;
      }
      return null;
    },
  },
];

export interface ValidationResult {
  valid: boolean;
  tier1Errors: Array<{ var: string; message: string }>;
  tier2Warnings: Array<{ var: string; message: string }>;
}

export function validateEnvironment(env: Env = process.env): ValidationResult {
  const tier1Errors: Array<{ var: string; message: string }> = [];
  const tier2Warnings: Array<{ var: string; message: string }> = [];
  const isProduction = (env.NODE_ENV || "development").trim() === "production";

  for (const check of TIER1_CHECKS) {
    if (check.productionOnly && !isProduction) continue;

    const value = env[check.name];

    if (check.required && !value) {
      tier1Errors.push({ var: check.name, message: `${check.name} is required but not set` });
      continue;
    }

    const validationError = check.validator?.(value, env);
    if (validationError) {
      tier1Errors.push({ var: check.name, message: validationError });
    }
  }

  for (const check of TIER2_CHECKS) {
    if (check.productionOnly && !isProduction) continue;

    const validationError = check.validator?.(env[check.name], env);
    if (validationError) {
      tier2Warnings.push({ var: check.name, message: validationError });
    }
  }

  return {
    valid: tier1Errors.length === 0,
    tier1Errors,
    tier2Warnings,
  };
}

export function resolvePort(env: Env = process.env): number {
  const port = Number(env.PORT);
  return Number.isInteger(port) && port > 0 && port <= 65535 ? port : 5000;
}

/**
 * Validates process.env and exits on tier 1 failures.
 */
export function validateEnvironmentOrExit(): void {
  const result = validateEnvironment();

  for (const warning of result.tier2Warnings) {
    logger.warn("Environment warning", { variable: warning.var, detail: warning.message });
  }

  if (!result.valid) {
    for (const error of result.tier1Errors) {
      logger.error("Environment validation failed", { variable: error.var, detail: error.message });
    }
    logger.error("Server cannot start with invalid core configuration. Fix the errors above and restart.");
    process.exit(1);
  }

  logger.info("Environment validation passed", { warnings: result.tier2Warnings.length });
}
