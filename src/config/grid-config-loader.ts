import { readFileSync } from 'fs';
import { isAddress, type Address } from 'viem';
import { z } from 'zod';
import { GridConfig } from '../types';
import { GridBotError, errorMessage } from '../core/errors';
import { parseAmount, parsePrice } from '../utils';
import { DEFAULT_GRID_SETTINGS } from './defaults';

const decimalString = z
  .string()
  .trim()
  .regex(/^\d+(\.\d+)?$/, 'must be a non-negative decimal string');

const addressSchema = z.custom<Address>(
  value => typeof value === 'string' && isAddress(value),
  'must be a 20-byte hex address'
);

const tokenSchema = z.object({
  symbol: z.string().trim().min(1),
  address: addressSchema,
  decimals: z.number().int().min(0).max(36),
});

const feeTierSchema = z.union([z.literal(100), z.literal(500), z.literal(3000), z.literal(10000)]);

const gridFileSchema = z.object({
  tokenA: tokenSchema,
  tokenB: tokenSchema,
  lowerPrice: decimalString.default(DEFAULT_GRID_SETTINGS.lowerPrice),
  upperPrice: decimalString.default(DEFAULT_GRID_SETTINGS.upperPrice),
  levelCount: z.number().int().default(DEFAULT_GRID_SETTINGS.levelCount),
  orderSizeA: decimalString.default(DEFAULT_GRID_SETTINGS.orderSizeA),
  orderSizeB: decimalString.default(DEFAULT_GRID_SETTINGS.orderSizeB),
  feeTier: feeTierSchema.default(DEFAULT_GRID_SETTINGS.feeTier),
  maxSlippageBps: z.number().int().default(DEFAULT_GRID_SETTINGS.maxSlippageBps),
});

export type TokenInfo = z.infer<typeof tokenSchema>;

export interface LoadedGridConfig {
  tokenA: TokenInfo;
  tokenB: TokenInfo;
  config: GridConfig;
}

/**
 * Turns a parsed grid file into a GridConfig. Prices are decimal strings in
 * tokenB per tokenA; order sizes are decimal strings in whole tokens. Range
 * checks on the result are left to configureGrid.
 */
export function parseGridConfig(raw: unknown, source = 'grid config'): LoadedGridConfig {
  const parsed = gridFileSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new GridBotError('INVALID_CONFIG', `Invalid ${source}: ${problems.join('; ')}`);
  }

  const file = parsed.data;
  return {
    tokenA: file.tokenA,
    tokenB: file.tokenB,
    config: {
      tokenA: file.tokenA.address,
      tokenB: file.tokenB.address,
      lowerPrice: parsePrice(file.lowerPrice),
      upperPrice: parsePrice(file.upperPrice),
      levelCount: file.levelCount,
      orderSizeA: parseAmount(file.orderSizeA, file.tokenA.decimals),
      orderSizeB: parseAmount(file.orderSizeB, file.tokenB.decimals),
      feeTier: file.feeTier,
      maxSlippageBps: file.maxSlippageBps,
    },
  };
}

export function readJsonFile(path: string): unknown {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new GridBotError('INVALID_CONFIG', `Cannot read ${path}: ${errorMessage(error)}`, { cause: error });
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new GridBotError('INVALID_CONFIG', `${path} is not valid JSON: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

export function loadGridConfigFile(path: string): LoadedGridConfig {
  return parseGridConfig(readJsonFile(path), path);
}

const pricePathSchema = z.array(decimalString).min(1, 'must contain at least one price');

/** A JSON array of decimal price strings, as 18-decimal prices. */
export function loadPricePath(path: string): bigint[] {
  const parsed = pricePathSchema.safeParse(readJsonFile(path));
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new GridBotError('INVALID_CONFIG', `Invalid price path ${path}: ${problems.join('; ')}`);
  }
  return parsed.data.map(price => parsePrice(price));
}
