/**
 * Shared Application Configuration
 *
 * Centralizes all environment variable access for the checklist generator.
 *
 * Environment variables:
 * - APP_ENV: 'production' disables development-only output (default: development)
 * - CHECKLIST_OUTPUT_DIR: Directory workbooks are written to (default: current directory)
 * - CHECKLIST_DEFAULT_LANGUAGE: EN or PT, picked when the language prompt is left empty (default: EN)
 */

import 'dotenv/config';
import { LANGUAGES } from './checklist/types/index.js';
import type { Language } from './checklist/types/index.js';

export interface AppConfig {
  isDev: boolean;
  output: {
    /** Directory generated workbooks are written to */
    dir: string;
  };
  defaults: {
    language: Language;
  };
}

function optionalEnv(key: string, fallback = ''): string {
  return process.env[key] ?? fallback;
}

function languageEnv(key: string, fallback: Language): Language {
  const value = optionalEnv(key, fallback).trim().toUpperCase();
  const match = LANGUAGES.find((language) => language === value);
  if (!match) {
    throw new Error(
      `Invalid ${key}: "${value}". Must be one of ${LANGUAGES.join(', ')}. ` +
      `Copy .env.example to .env and fix the value.`
    );
  }
  return match;
}

const isDev = (optionalEnv('APP_ENV', 'development')) !== 'production';

export const appConfig: AppConfig = {
  isDev,
  output: {
    dir: optionalEnv('CHECKLIST_OUTPUT_DIR', '.'),
  },
  defaults: {
    language: languageEnv('CHECKLIST_DEFAULT_LANGUAGE', 'EN'),
  },
};
