#!/usr/bin/env node
/**
 * Configuration check
 *
 * Loads the environment the way the service does and reports errors and warnings.
 *
 * Usage: npm run validate-config
 */

import { existsSync } from 'fs';
import { pathToFileURL } from 'url';
import { loadConfig, type Config } from '../src/infrastructure/config/config.js';

interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export function validateConfig(env: NodeJS.ProcessEnv = process.env): ValidationResult {
  const result: ValidationResult = {
    valid: true,
    errors: [],
    warnings: [],
  };

  let config: Config;
  try {
    config = loadConfig(env);
  } catch (error) {
    result.valid = false;
    result.errors.push(error instanceof Error ? error.message : 'Unknown error while loading configuration');
    return result;
  }

  validateDialogueConfig(config, result);
  validateIntegrationsConfig(config, result);
  validateRedisConfig(config, result);
  validateDevToolsConfig(config, result);

  return result;
}

function validateDialogueConfig(config: Config, result: ValidationResult): void {
  if (config.interruptConfidenceThreshold < config.intentConfidenceThreshold) {
    result.warnings.push(
      'INTERRUPT_CONFIDENCE_THRESHOLD is below INTENT_CONFIDENCE_THRESHOLD - low-confidence messages can interrupt a request in progress'
    );
  }
}

function validateIntegrationsConfig(config: Config, result: ValidationResult): void {
  if (!config.intentGatewayUrl) {
    result.warnings.push('INTENT_GATEWAY_URL not set - using the built-in keyword classifier');
  }

  if (config.knowledgeBaseSource === 'local' && !existsSync(config.knowledgeBaseDir)) {
    result.errors.push(`KNOWLEDGE_BASE_DIR does not exist: ${config.knowledgeBaseDir}`);
    result.valid = false;
  }

  if (config.nodeEnv === 'production' && !config.servicenowInstanceUrl.startsWith('https://')) {
    result.warnings.push('SERVICENOW_INSTANCE_URL is not https in production');
  }
}

function validateRedisConfig(config: Config, result: ValidationResult): void {
  if (config.redisEnabled && !config.redisUrl) {
    result.warnings.push('REDIS_ENABLED=true but REDIS_URL is not set - sessions are kept in memory');
  }

  if (!config.redisEnabled && config.nodeEnv === 'production') {
    result.warnings.push('Redis disabled in production - sessions are lost on restart and not shared between instances');
  }
}

function validateDevToolsConfig(config: Config, result: ValidationResult): void {
  if (config.devToolsEnabled && config.nodeEnv === 'production') {
    result.warnings.push('DEVTOOLS_ENABLED=true is ignored in production');
  }

  if (config.devToolsEnabled && !config.devToolsToken) {
    result.warnings.push('DEVTOOLS_ENABLED=true without DEVTOOLS_TOKEN - the endpoint is unauthenticated');
  }
}

function main(): void {
  console.log('Validating configuration...\n');

  const result = validateConfig();

  if (result.warnings.length > 0) {
    console.log('Warnings:');
    result.warnings.forEach((warning) => console.log(`  - ${warning}`));
  }

  if (result.errors.length > 0) {
    console.log('\nErrors:');
    result.errors.forEach((error) => console.log(`  - ${error}`));
    console.log('\nFix the errors above and try again (see .env.example).\n');
    process.exit(1);
  }

  console.log('\nConfiguration is valid.');
  if (result.warnings.length > 0) {
    console.log('Review the warnings above before deploying.\n');
  }
  process.exit(0);
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main();
}
