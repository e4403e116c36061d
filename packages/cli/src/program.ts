/**
 * Command tree for the content-intel CLI
 */

import { Command, Option } from 'commander';
import { DEFAULT_BATCH_LIMIT, DEFAULT_LIST_LIMIT, DEFAULT_SEARCH_QUERY_LIMIT, VERSION } from '@content-intel/core';
import {
  batchIntel,
  contentGaps,
  listBundles,
  listEntities,
  listFields,
  listPlugins,
  listTypes,
  serverStart,
  settingsPlugins,
  settingsReset,
  settingsShow,
  showEntityIntel,
  showEntitySummary,
  topQueries,
} from './commands/index.js';
import { OUTPUT_FORMATS } from './output.js';
import { parseNonNegativeInt, parsePositiveInt } from './options.js';

function formatOption(): Option {
  return new Option('-f, --format <format>', 'Output format').choices(OUTPUT_FORMATS);
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('content-intel')
    .description('Content intelligence for CMS entities')
    .version(VERSION);

  // Schema
  program
    .command('types')
    .alias('cit')
    .description('List content entity types')
    .addOption(formatOption())
    .action((options) => listTypes(options));

  program
    .command('bundles <type>')
    .alias('cib')
    .description('List bundles of an entity type')
    .addOption(formatOption())
    .action((type: string, options) => listBundles(type, options));

  program
    .command('fields <type> [bundle]')
    .alias('cif')
    .description('List fields of an entity type, optionally for one bundle')
    .addOption(formatOption())
    .action((type: string, bundle: string | undefined, options) => listFields(type, bundle, options));

  program
    .command('plugins')
    .alias('cip')
    .description('List intel plugins and whether they are available')
    .addOption(formatOption())
    .action((options) => listPlugins(options));

  // Entities
  program
    .command('list <type> [bundle]')
    .alias('cil')
    .description('List entities, newest first')
    .option('-l, --limit <n>', 'Maximum number of entities', parsePositiveInt, DEFAULT_LIST_LIMIT)
    .option('-o, --offset <n>', 'Number of entities to skip', parseNonNegativeInt, 0)
    .addOption(formatOption())
    .action((type: string, bundle: string | undefined, options) => listEntities(type, bundle, options));

  program
    .command('entity <type> <id>')
    .alias('cie')
    .description('Collect intel for one entity')
    .option('--fields <names>', 'Comma-separated field names to include')
    .option('--plugins <ids>', 'Comma-separated plugin ids to run')
    .addOption(formatOption())
    .action((type: string, id: string, options) => showEntityIntel(type, id, options));

  program
    .command('summary <type> <id>')
    .alias('cis')
    .description('Show the summary of one entity')
    .addOption(formatOption())
    .action((type: string, id: string, options) => showEntitySummary(type, id, options));

  program
    .command('batch <type>')
    .alias('cibt')
    .description('Collect intel for several entities')
    .option('-b, --bundle <bundle>', 'Only entities of this bundle')
    .option('--ids <ids>', 'Comma-separated entity ids (overrides --bundle and --limit)')
    .option('-l, --limit <n>', 'Maximum number of entities', parsePositiveInt, DEFAULT_BATCH_LIMIT)
    .option('--fields <names>', 'Comma-separated field names to include')
    .option('--plugins <ids>', 'Comma-separated plugin ids to run')
    .addOption(formatOption())
    .action((type: string, options) => batchIntel(type, options));

  // Search
  const searchCmd = program.command('search').description('Search log intel');

  searchCmd
    .command('top')
    .description('Most frequent search queries')
    .option('-l, --limit <n>', 'Maximum number of queries', parsePositiveInt, DEFAULT_SEARCH_QUERY_LIMIT)
    .addOption(formatOption())
    .action((options) => topQueries(options));

  searchCmd
    .command('gaps')
    .description('Frequent queries that return few or no results')
    .option('-l, --limit <n>', 'Maximum number of queries', parsePositiveInt, DEFAULT_SEARCH_QUERY_LIMIT)
    .option('-m, --max-results <n>', 'Highest average result count that counts as a gap', parseNonNegativeInt, 0)
    .addOption(formatOption())
    .action((options) => contentGaps(options));

  // Settings
  const settingsCmd = program.command('settings').description('Manage the enabled-plugin allow-list');

  settingsCmd
    .command('show')
    .description('Show which plugins are enabled')
    .addOption(formatOption())
    .action((options) => settingsShow(options));

  settingsCmd
    .command('plugins [ids]')
    .description('Enable only the given comma-separated plugins (prompts when omitted)')
    .action((ids: string | undefined) => settingsPlugins(ids));

  settingsCmd
    .command('reset')
    .description('Enable every available plugin')
    .action(() => settingsReset());

  // Server
  program
    .command('server')
    .description('Start the HTTP API server')
    .option('-p, --port <port>', 'Port to listen on (default: PORT or 8080)')
    .option('-H, --host <host>', 'Host to bind to (default: HOST or 127.0.0.1)')
    .action((options) => serverStart(options));

  return program;
}
