/**
 * TOML-based configuration loader for pipestep.
 *
 * Reads `pipestep.toml` (or the file named by `$PIPESTEP_CONFIG`), parses
 * it with smol-toml, validates it and returns a fully typed
 * `EngineConfig`. `initialize()` also applies the logging section to the
 * global logger.
 */

import { parse as parseTOML } from 'smol-toml';
import { existsSync, readFileSync } from 'node:fs';
import { parseConfig, resolveConfigPath, DEFAULT_CONFIG } from '../types/config.js';
import type { EngineConfig } from '../types/config.js';
import { configureLogging } from './logger.js';

// ---------------------------------------------------------------------------
// loadConfig()
// ---------------------------------------------------------------------------

function defaults(): EngineConfig {
  return {
    logging: { ...DEFAULT_CONFIG.logging },
    errors: { ...DEFAULT_CONFIG.errors },
    performance: { ...DEFAULT_CONFIG.performance },
  };
}

/**
 * Load and validate a pipestep config file.
 *
 * If the file does not exist or is empty, returns the defaults.
 * Throws on invalid TOML syntax or schema validation errors.
 */
export function loadConfig(configPath: string = resolveConfigPath()): EngineConfig {
  if (!existsSync(configPath)) {
    return defaults();
  }

  const content = readFileSync(configPath, 'utf-8');
  if (content.trim().length === 0) {
    return defaults();
  }

  return parseConfig(parseTOML(content));
}

// ---------------------------------------------------------------------------
// initialize()
// ---------------------------------------------------------------------------

/**
 * Load the config and apply its logging level. Safe to call on every
 * startup.
 */
export function initialize(configPath?: string): EngineConfig {
  const config = loadConfig(configPath);
  configureLogging({ level: config.logging.level });
  return config;
}
