/**
 * Logging utility, re-exported from @content-intel/core
 *
 * Usage:
 *   import { getLog } from '../services/log.js';
 *   const log = getLog('Entities');
 *   log.info('Loaded entity', { entityType: 'node', id: '1' });
 */

export { getLog } from '@content-intel/core';
