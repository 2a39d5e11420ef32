import { readFileSync } from 'fs';
import { resolve } from 'path';
import type { Logger } from 'pino';
import type { AppConfig } from './app.config.js';
import { logger as rootLogger } from './logger.js';
import { generateKeyPair, keyPairFromBase64, type WalletKeyPair } from '@ledger/keys.js';

/**
 * Ledger Configuration
 * Version table (difficulty per block version) and the node wallet keys
 */

export interface LedgerSettings {
  currentVersion: string;
  // block version -> number of leading zero hex digits a proof must produce
  versions: Record<string, number>;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a parsed ledger file.
 * @throws Error naming every problem found
 */
export function parseLedgerSettings(value: unknown): LedgerSettings {
  if (!isObject(value)) {
    throw new Error('Ledger configuration must be a JSON object');
  }

  const errors: string[] = [];
  const versions: Record<string, number> = {};

  if (!isObject(value.versions) || Object.keys(value.versions).length === 0) {
    errors.push('versions must map at least one version to its settings');
  } else {
    for (const [version, settings] of Object.entries(value.versions)) {
      const difficulty = isObject(settings) ? settings.difficulty : undefined;
      if (typeof difficulty !== 'number' || !Number.isSafeInteger(difficulty) || difficulty < 0 || difficulty > 64) {
        errors.push(`versions.${version}.difficulty must be an integer between 0 and 64`);
        continue;
      }
      versions[version] = difficulty;
    }
  }

  const currentVersion = value.currentVersion;
  if (typeof currentVersion !== 'string' || currentVersion === '') {
    errors.push('currentVersion must be a non-empty string');
  } else if (isObject(value.versions) && !(currentVersion in value.versions)) {
    errors.push(`currentVersion ${currentVersion} is not listed under versions`);
  }

  if (errors.length > 0 || typeof currentVersion !== 'string') {
    throw new Error(`Invalid ledger configuration: ${errors.join('; ')}`);
  }

  return { currentVersion, versions };
}

export function loadLedgerSettings(path: string): LedgerSettings {
  const file = resolve(process.cwd(), path);
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(file, 'utf8'));
  } catch (error) {
    throw new Error(`Could not read ledger configuration from ${file}`, { cause: error });
  }
  return parseLedgerSettings(parsed);
}

/**
 * Resolve the node wallet. Without a configured private key an ephemeral
 * pair is generated; coins paid to it are lost on restart.
 */
export function resolveWalletKeys(config: AppConfig, log: Logger = rootLogger): WalletKeyPair {
  if (config.walletPrivateKey) {
    return keyPairFromBase64(config.walletPrivateKey, config.walletPublicKey || undefined);
  }

  if (config.walletPublicKey) {
    throw new Error('WALLET_PUBLIC_KEY is set without WALLET_PRIVATE_KEY');
  }

  log.warn('No wallet key configured, generated an ephemeral key pair');
  return generateKeyPair();
}
