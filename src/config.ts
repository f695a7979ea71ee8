import { DEFAULT_FEE_BPS, DEFAULT_MINIMUM_LIQUIDITY, MAX_UINT256 } from "./constants";
import { PoolError } from "./errors";
import { isLogLevel, type LogLevel } from "./logger";
import { validateFeeBps } from "./math";

export interface PoolConfig {
  // Input-side swap fee (30 = 0.3%, the 997/1000 formula; 0 = fee-less pricing)
  feeBps: bigint;

  // Claim tokens locked forever on the first deposit
  minimumLiquidity: bigint;

  logLevel: LogLevel;
}

export type Env = Record<string, string | undefined>;

export const defaultPoolConfig: PoolConfig = {
  feeBps: DEFAULT_FEE_BPS,
  minimumLiquidity: DEFAULT_MINIMUM_LIQUIDITY,
  logLevel: "info",
};

function parseBigIntEnv(env: Env, key: string): bigint | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return undefined;
  if (!/^\d+$/.test(raw.trim())) {
    throw new PoolError("InvalidConfig", `${key} must be a non-negative integer (got "${raw}")`);
  }
  return BigInt(raw.trim());
}

function parseLogLevelEnv(env: Env, key: string): LogLevel | undefined {
  const raw = env[key];
  if (raw === undefined || raw === "") return undefined;
  if (!isLogLevel(raw)) {
    throw new PoolError("InvalidConfig", `${key} must be one of debug, info, warn, error, silent (got "${raw}")`);
  }
  return raw;
}

/**
 * Build the effective pool configuration
 *
 * Precedence: explicit overrides, then AMM_FEE_BPS / AMM_MINIMUM_LIQUIDITY /
 * AMM_LOG_LEVEL from the environment, then defaults.
 *
 * @throws PoolError(InvalidConfig) for out-of-range values
 */
export function resolvePoolConfig(overrides: Partial<PoolConfig> = {}, env: Env = process.env): PoolConfig {
  const config: PoolConfig = {
    feeBps: overrides.feeBps ?? parseBigIntEnv(env, "AMM_FEE_BPS") ?? defaultPoolConfig.feeBps,
    minimumLiquidity:
      overrides.minimumLiquidity ??
      parseBigIntEnv(env, "AMM_MINIMUM_LIQUIDITY") ??
      defaultPoolConfig.minimumLiquidity,
    logLevel: overrides.logLevel ?? parseLogLevelEnv(env, "AMM_LOG_LEVEL") ?? defaultPoolConfig.logLevel,
  };

  validateFeeBps(config.feeBps);
  if (config.minimumLiquidity < 0n || config.minimumLiquidity > MAX_UINT256) {
    throw new PoolError(
      "InvalidConfig",
      `Invalid minimumLiquidity: ${config.minimumLiquidity}. Must be a uint256 value`
    );
  }
  if (!isLogLevel(config.logLevel)) {
    throw new PoolError("InvalidConfig", `Invalid logLevel: ${config.logLevel}`);
  }

  return config;
}
