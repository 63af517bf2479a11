#!/usr/bin/env node

/**
 * guidegen CLI
 *
 * Scan a codebase and generate a Deployer & Developer Guide with Gemini.
 */

import { Command } from 'commander';
import { writeFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { createRequire } from 'module';
import { runGuide } from './pipeline.js';
import { loadConfig, CONFIG_TEMPLATE, type CliConfig } from './ai/config.js';
import { DEFAULT_OUTPUT, PRIMARY_MODEL, FALLBACK_MODEL } from './ai/constants.js';

interface GenerateCliOptions {
    path: string;
    output: string;
    model?: string;
    configPath?: string;
    onlyContext?: boolean;
    verbose?: boolean;
}

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

const program = new Command();

program
    .name('guidegen')
    .description('Generate deployer and developer training documentation from a codebase')
    .version(pkg.version);

/**
 * Generate command - scan, build context, call the model, write the guide
 */
program
    .command('generate', { isDefault: true })
    .description('Scan a repository and generate the Deployer & Developer Guide')
    .option('-p, --path <dir>', 'Path to the repository root', '.')
    .option('-o, --output <file>', `Output file path ("-" for stdout)`, DEFAULT_OUTPUT)
    .option('-m, --model <model>', `Specific model to use. If omitted, tries ${PRIMARY_MODEL} then ${FALLBACK_MODEL}.`)
    .option('--config-path <path>', 'Path to config JSON file')
    .option('--only-context', 'Only gather and print the context, do not call the model')
    .option('--verbose', 'Verbose output')
    .action(async (options: GenerateCliOptions, command: Command) => {
        try {
            const startTime = Date.now();

            // Priority: CLI flags > config file > hardcoded defaults
            let config: CliConfig = {};
            if (options.configPath) {
                config = loadConfig(options.configPath);

                const src = (name: string) => command.getOptionValueSource(name);

                if (config.path !== undefined && src('path') !== 'cli') options.path = config.path;
                if (config.output !== undefined && src('output') !== 'cli') options.output = config.output;
                if (config.model !== undefined && src('model') !== 'cli') options.model = config.model;
                if (config.verbose !== undefined && src('verbose') !== 'cli') options.verbose = config.verbose;

                if (options.verbose) {
                    console.log(`📄 Config loaded from: ${resolve(options.configPath)}`);
                }
            }

            const result = await runGuide({
                path: options.path,
                output: options.output,
                model: options.model,
                timeoutMs: config.timeoutSecs !== undefined ? config.timeoutSecs * 1000 : undefined,
                verbose: options.verbose,
                onlyContext: options.onlyContext,
            });

            if (options.onlyContext) {
                console.log('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━');
                console.log(result.gather.context);
                console.log('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━');
                return;
            }

            if (result.outputPath) {
                const totalTime = Date.now() - startTime;
                console.log(`✅ Documentation saved to: ${result.outputPath}`);
                if (result.generation) console.log(`🤖 Model: ${result.generation.model}`);
                console.log(`⏱️  Total time: ${(totalTime / 1000).toFixed(2)}s`);
                console.log('\n⚠️  AI-generated documentation - Human review recommended.');
            }
        } catch (error) {
            console.error('\n❌ Error:', error instanceof Error ? error.message : error);
            process.exit(1);
        }
    });

/**
 * Init command - create a starter config file
 */
program
    .command('init')
    .description('Create a starter config file')
    .argument('[path]', 'Output path for config file', 'guidegen.config.json')
    .action((outputPath: string) => {
        try {
            const absolutePath = resolve(outputPath);
            if (existsSync(absolutePath)) {
                console.error(`Error: File already exists: ${absolutePath}`);
                console.error('Delete it first or choose a different path.');
                process.exit(1);
            }
            const content = JSON.stringify(CONFIG_TEMPLATE, null, 2) + '\n';
            writeFileSync(absolutePath, content, 'utf-8');
            console.log(`Created config file: ${absolutePath}`);
            console.log(`Use it with: guidegen --config-path ${outputPath}`);
        } catch (error) {
            console.error('Error:', error instanceof Error ? error.message : error);
            process.exit(1);
        }
    });

await program.parseAsync();
