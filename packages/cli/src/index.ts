#!/usr/bin/env tsx
/**
 * Content Intel CLI
 */

import { config as loadEnv } from 'dotenv';
import { createProgram } from './program.js';

// Load environment variables from .env (fallback)
loadEnv();

createProgram()
  .parseAsync()
  .catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
  });
