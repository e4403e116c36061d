/**
 * Command runtime
 *
 * Each data command opens the intel runtime, runs, and closes it again.
 * Failures print the message and exit with status 1.
 */

import { getErrorMessage, toAppError, type ContentIntelService } from '@content-intel/core';
import { startIntelRuntime, stopIntelRuntime } from '@content-intel/gateway';

export async function withIntel(fn: (intel: ContentIntelService) => Promise<void>): Promise<void> {
  let failure: unknown = null;
  try {
    const runtime = await startIntelRuntime();
    await fn(runtime.intel);
  } catch (error) {
    failure = error;
  }

  try {
    await stopIntelRuntime();
  } catch (error) {
    console.warn(`Warning: cleanup failed: ${getErrorMessage(error)}`);
  }

  if (failure !== null) {
    fail(failure);
  }
}

export function fail(error: unknown): never {
  console.error(`Error: ${toAppError(error).message}`);
  process.exit(1);
}
