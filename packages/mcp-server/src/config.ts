/**
 * Configuration management for the manuscript assembler MCP server
 * Loads settings from environment variables with sensible defaults
 */

import * as fs from 'fs';
import * as path from 'path';
import { CITATION_STYLE_NAMES, isCitationStyleName, parseLogLevel } from '@manuscript-assembler/core';
import type { ErrorResponse } from './types/index.js';
import { createConfigurationError } from './utils/errors.js';

export interface Config {
  workspaceRoot: string;
  templatesDir: string;
  defaultTemplate: string;
  defaultCitationStyle: string;
  outputDir: string;
  logLevel: string;
}

/**
 * Template folders shipped with the server: beside the sources, or the
 * source tree's copy when running from the compiled output.
 */
function findBundledTemplatesDir(): string {
  const candidates = [
    path.resolve(__dirname, '..', 'templates'),
    path.resolve(__dirname, '..', '..', '..', '..', 'packages', 'mcp-server', 'templates'),
  ];
  return candidates.find(candidate => fs.existsSync(candidate)) ?? candidates[0];
}

/**
 * Load .env file into the environment. Variables already set win.
 */
export function loadEnvFile(env: NodeJS.ProcessEnv = process.env): void {
  const workspaceRoot = env.MANUSCRIPT_WORKSPACE_ROOT || process.cwd();
  const envPath = path.join(workspaceRoot, '.env');

  if (fs.existsSync(envPath)) {
    const envContent = fs.readFileSync(envPath, 'utf-8');
    const lines = envContent.split('\n');

    for (const line of lines) {
      const trimmed = line.trim();
      if (!trimmed || trimmed.startsWith('#')) continue;

      const [key, ...valueParts] = trimmed.split('=');
      const value = valueParts.join('=').trim();

      if (key && !env[key.trim()]) {
        env[key.trim()] = value;
      }
    }
  }
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  // Load .env file first
  loadEnvFile(env);

  return {
    workspaceRoot: env.MANUSCRIPT_WORKSPACE_ROOT || process.cwd(),
    templatesDir: env.TEMPLATES_DIR || findBundledTemplatesDir(),
    defaultTemplate: env.DEFAULT_TEMPLATE ?? 'medical-article',
    defaultCitationStyle: env.DEFAULT_CITATION_STYLE ?? 'numeric',
    outputDir: env.OUTPUT_DIR ?? 'build',
    logLevel: env.LOG_LEVEL ?? 'info',
  };
}

export interface ConfigProblem {
  key: string;                   // Environment variable name
  issue: string;
}

/**
 * Find configuration values the server cannot use.
 */
export function findConfigProblems(config: Config): ConfigProblem[] {
  const problems: ConfigProblem[] = [];

  if (!config.workspaceRoot) {
    problems.push({ key: 'MANUSCRIPT_WORKSPACE_ROOT', issue: 'is required' });
  }

  if (!config.templatesDir) {
    problems.push({ key: 'TEMPLATES_DIR', issue: 'cannot be empty' });
  }

  if (!config.defaultTemplate.trim()) {
    problems.push({ key: 'DEFAULT_TEMPLATE', issue: 'cannot be empty' });
  }

  if (!config.outputDir.trim()) {
    problems.push({ key: 'OUTPUT_DIR', issue: 'cannot be empty' });
  }

  if (!isCitationStyleName(config.defaultCitationStyle)) {
    problems.push({ key: 'DEFAULT_CITATION_STYLE', issue: `must be one of: ${CITATION_STYLE_NAMES.join(', ')}` });
  }

  if (parseLogLevel(config.logLevel) === null) {
    problems.push({ key: 'LOG_LEVEL', issue: 'must be one of: debug, info, warn, error, silent' });
  }

  return problems;
}

/**
 * Validate configuration, one message per problem
 */
export function validateConfig(config: Config): string[] {
  return findConfigProblems(config).map(problem => `${problem.key} ${problem.issue}`);
}

/**
 * Configuration problems as error responses, for startup reporting.
 */
export function describeConfigProblems(config: Config): ErrorResponse[] {
  return findConfigProblems(config).map(problem => createConfigurationError(problem.key, problem.issue));
}
