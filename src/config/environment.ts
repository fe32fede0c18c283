/**
 * Environment variable configuration and validation
 */

import dotenv from 'dotenv';
import Joi from 'joi';
import { DEFAULT_MAX_ROUNDS } from './pools';

// Load environment variables
dotenv.config();

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

const address = (defaultValue: string) =>
  Joi.string().pattern(ADDRESS_PATTERN).default(defaultValue);

/**
 * Environment configuration schema
 */
const envSchema = Joi.object<EnvironmentConfig>({
  // RPC endpoints
  ETH_RPC_URL: Joi.string().uri({ scheme: ['http', 'https'] }).default('https://eth.llamarpc.com'),
  POL_RPC_URL: Joi.string().uri({ scheme: ['http', 'https'] }).default('https://polygon.llamarpc.com'),

  // Ethereum mainnet pool (USDC/ZERC, Uniswap V2)
  ETH_LP_ADDRESS: address('0x29eBA991F9D9E71C6bBd69cb71c074193fd877Fd'),
  ETH_USDC_ADDRESS: address('0xA0b86991c6218b36c1d19D4a2e9Eb0cE3606eB48'),
  ETH_ZERC_ADDRESS: address('0xf8428A5a99cb452Ea50B6Ea70b052DaA3dF4934F'),
  ETH_ROUTER_ADDRESS: address('0x7a250d5630B4cF539739dF2C5dAcb4c659F2488D'),

  // Polygon pool (USDC/ZERC, QuickSwap)
  POL_LP_ADDRESS: address('0x514480cF3eD104B5c34A17A15859a190E38E97AF'),
  POL_USDC_ADDRESS: address('0x3c499c542cEF5E3811e1192ce70d8cC03d5c3359'),
  POL_ZERC_ADDRESS: address('0xE1b3eb06806601828976e491914e3De18B5d6b28'),
  POL_ROUTER_ADDRESS: address('0xa5E0829CaCEd8fFDD4De3c43696c57F7D7A678ff'),

  // Simulation
  SIMULATION_MODE: Joi.string()
    .valid('single-round', 'multi-round')
    .default('multi-round'),
  MAX_ROUNDS: Joi.number().integer().min(0).max(100).default(DEFAULT_MAX_ROUNDS),
  MIN_PRICE_DIFF_PERCENT: Joi.number().min(0).default(0.5),

  // RPC retry policy
  RPC_RETRY_ATTEMPTS: Joi.number().integer().min(1).max(10).default(3),
  RPC_RETRY_DELAY_MS: Joi.number().integer().min(0).default(500),

  // Logging
  LOG_LEVEL: Joi.string()
    .valid('debug', 'info', 'warn', 'error')
    .default('info'),
  LOG_DIR: Joi.string().default('logs'),
});

/**
 * Validated environment configuration
 */
export interface EnvironmentConfig {
  // RPC endpoints
  ETH_RPC_URL: string;
  POL_RPC_URL: string;

  // Ethereum mainnet pool
  ETH_LP_ADDRESS: string;
  ETH_USDC_ADDRESS: string;
  ETH_ZERC_ADDRESS: string;
  ETH_ROUTER_ADDRESS: string;

  // Polygon pool
  POL_LP_ADDRESS: string;
  POL_USDC_ADDRESS: string;
  POL_ZERC_ADDRESS: string;
  POL_ROUTER_ADDRESS: string;

  // Simulation
  SIMULATION_MODE: 'single-round' | 'multi-round';
  MAX_ROUNDS: number;
  MIN_PRICE_DIFF_PERCENT: number;

  // RPC retry policy
  RPC_RETRY_ATTEMPTS: number;
  RPC_RETRY_DELAY_MS: number;

  // Logging
  LOG_LEVEL: 'debug' | 'info' | 'warn' | 'error';
  LOG_DIR: string;
}

/**
 * Validate and load environment configuration
 */
export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const result = envSchema.validate(env, {
    abortEarly: false,
    stripUnknown: true,
  });

  if (result.error !== undefined) {
    const errorMessages = result.error.details.map((detail) => detail.message).join(', ');
    throw new Error(`Environment validation failed: ${errorMessages}`);
  }

  return result.value;
}

/**
 * Global environment configuration
 */
let cachedConfig: EnvironmentConfig | null = null;

/**
 * Get validated environment configuration
 */
export function getConfig(): EnvironmentConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvironment();
  }
  return cachedConfig;
}
