/**
 * Constants for project generation
 */

import type { FeatureToggles } from './types.js';

export const CLI_NAME = 'fastapi-scaffold';
export const CLI_VERSION = '1.0.0';

// Defaults applied when neither the command line nor defaults.toml set a value
export const DEFAULT_AUTHOR = 'Your Name';
export const DEFAULT_EMAIL = 'your.email@example.com';
export const DEFAULT_DESCRIPTION = 'A FastAPI project';

export const DEFAULT_FEATURES: FeatureToggles = Object.freeze({
  database: true,
  cache: true,
  containerize: true,
  backgroundTasks: false
});

// 32 bytes -> 64 hex characters, 256 bits of entropy
export const SECRET_BYTES = 32;

// User defaults
export const CONFIG_VERSION = 1;
export const CONFIG_DIR_ENV = 'FASTAPI_SCAFFOLD_HOME';
export const CONFIG_DIR_NAME = '.fastapi-scaffold';
export const CONFIG_FILE_NAME = 'defaults.toml';

// Version control
export const GIT_COMMIT_MESSAGE = 'Initial commit: FastAPI project boilerplate';
export const GIT_COMMAND_TIMEOUT_MS = 30000;

// Values shared by several generated artifacts
export const API_PORT = 8000;
export const API_V1_PREFIX = '/api/v1';
export const PYTHON_VERSION = '3.11';
