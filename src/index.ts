#!/usr/bin/env node

/**
 * @file index.ts
 * @module index
 * @author modsearch contributors
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview CLI entry point: interactive search of Modrinth projects with
 * release browsing and file downloads.
 */

/**
 * @example
 * ```bash
 * # Start at the search prompt
 * modsearch
 *
 * # Run a query straight away, downloading into ./mods
 * modsearch "sodium +fabric +v1.20.1" -o ./mods
 * ```
 */

import { program } from 'commander';

import { ModrinthGateway } from './api/ModrinthGateway.js';
import { buildHelpText } from './cli/help.js';
import { ProgressReporter } from './cli/progress.js';
import { createTerminalIO, runSession } from './cli/session.js';
import { FileDownloader } from './downloader/FileDownloader.js';
import { NavigationMachine } from './navigation/NavigationMachine.js';
import { resolveConfig, type CliOptions } from './shared/config.js';
import { createLogger } from './shared/logger.js';

/**
 * Start an interactive session.
 *
 * @param query - Optional query words to run immediately
 * @param options - Parsed command-line options
 */
async function start(query: string[], options: CliOptions) {
    const config = resolveConfig(options, process.env);
    if (!config.ok) {
        createLogger(options.verbose ?? false).error(`Error: ${config.error.message}`, config.error);
        process.exitCode = 1;
        return;
    }

    const { apiUrl, downloadDir, pageSize, verbose } = config.value;
    const logger = createLogger(verbose);
    logger.debug(`API: ${apiUrl}`);
    logger.debug(`Download directory: ${downloadDir}`);

    const gateway = new ModrinthGateway({ apiUrl, logger });
    const downloader = new FileDownloader(gateway, { rootDir: downloadDir, logger });
    const progress = new ProgressReporter();
    const machine = new NavigationMachine({
        gateway,
        downloader,
        pageSize,
        helpText: buildHelpText(),
        onProgress: progress.update,
        logger,
    });

    await runSession(machine, createTerminalIO(() => progress.finish()), {
        pageSize,
        initialQuery: query.join(' '),
    });
}

/**
 * CLI entry point.
 */
async function main() {
    program
        .name('modsearch')
        .description('Search Modrinth projects, browse their releases and download files')
        .version('1.0.0')
        .argument('[query...]', 'Query to run right away (filters and sort rules allowed)')
        .option('-o, --output <dir>', 'Download directory (env: MODSEARCH_DOWNLOAD_DIR, default: ./downloads)')
        .option('--api-url <url>', 'API root (env: MODSEARCH_API_URL)')
        .option('-n, --page-size <n>', 'Results per page, 1-100 (env: MODSEARCH_PAGE_SIZE, default: 20)')
        .option('-v, --verbose', 'Print requests, timings and byte counts')
        .addHelpText('after', `\n${buildHelpText()}`)
        .action(start);

    await program.parseAsync();
}

main().catch(error => {
    console.error('Fatal error:', error);
    process.exitCode = 1;
});
