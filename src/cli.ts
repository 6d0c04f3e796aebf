#!/usr/bin/env node

/**
 * code-context CLI
 *
 * Turn a project (or one file of it) into a single markdown document for LLM chats.
 */

import { Command } from 'commander';
import { readFileSync, writeFileSync, existsSync } from 'fs';
import { basename, resolve } from 'path';
import { createRequire } from 'module';
import { createInterface } from 'readline';
import { generateContext, writeDocument, type ContextSettings, type WalkEvent } from './context/index.js';
import { loadConfig, resolveSettings, CONFIG_TEMPLATE, type CliConfig } from './config/config.js';
import { InteractiveSession } from './interactive/session.js';
import { dispatch, helpLines } from './interactive/commands.js';

const require = createRequire(import.meta.url);
const pkg: unknown = require('../package.json');
const version =
    typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
        ? pkg.version
        : '0.0.0';

const program = new Command();

function collect(value: string, previous: string[]): string[] {
    return previous.concat([value]);
}

function noValues(): string[] {
    return [];
}

function parsePositiveInt(value: string, flag: string): number {
    const n = Number(value);
    if (!Number.isInteger(n) || n <= 0) {
        console.error(`Error: ${flag} must be a positive integer, got: ${value}`);
        process.exit(1);
    }
    return n;
}

interface SettingsFlags {
    excludeDir: string[];
    ext: string[];
    allExtensions?: boolean;
    gitignore: boolean;
    maxDepth?: string;
}

interface GenerateOptions extends SettingsFlags {
    output: string;
    maxChars?: string;
    file?: boolean;
    prompt?: string;
    promptFile?: string;
    stdin?: boolean;
    configPath?: string;
    verbose?: boolean;
}

interface InteractiveOptions {
    output: string;
    maxChars?: string;
    configPath?: string;
    verbose?: boolean;
}

/**
 * Apply rule flags over config-resolved settings.
 * --exclude-dir adds, --ext replaces the allowed list, --all-extensions empties it.
 */
function applyFlags(settings: ContextSettings, flags: SettingsFlags, command: Command, output: string): ContextSettings {
    const next: ContextSettings = { ...settings };
    if (flags.excludeDir.length > 0) next.excludeDirs = [...settings.excludeDirs, ...flags.excludeDir];
    if (flags.ext.length > 0) next.allowedExtensions = flags.ext;
    if (flags.allExtensions) next.allowedExtensions = [];
    if (command.getOptionValueSource('gitignore') === 'cli') next.useGitignore = flags.gitignore;
    if (flags.maxDepth !== undefined) next.maxDepth = parsePositiveInt(flags.maxDepth, '--max-depth');

    // Never feed a previous run's output back into the next one
    if (output !== '-') {
        const name = basename(output);
        if (!next.excludeFiles.includes(name)) next.excludeFiles = [...next.excludeFiles, name];
    }
    return next;
}

function loadCliConfig(configPath: string | undefined, verbose: boolean): CliConfig {
    if (!configPath) return {};
    const config = loadConfig(configPath);
    if (verbose) {
        console.log(`📄 Config loaded from: ${resolve(configPath)}`);
    }
    return config;
}

function readPrompt(options: GenerateOptions, config: CliConfig): string {
    if (options.prompt !== undefined) return options.prompt;
    if (options.promptFile) return readFileSync(resolve(options.promptFile), 'utf-8');
    if (options.stdin) return readFileSync(0, 'utf-8'); // Read from stdin
    return config.prompt ?? '';
}

function progressLogger(verbose: boolean): ((event: WalkEvent) => void) | undefined {
    if (!verbose) return undefined;
    return event => {
        switch (event.type) {
            case 'dir':
                console.log(`  📂 ${event.path || '.'}`);
                break;
            case 'file':
                console.log(`  📄 ${event.path}`);
                break;
            case 'skip':
                console.log(`  ⏭️  ${event.path} (${event.reason})`);
                break;
            case 'warning':
                console.warn(`  ⚠️  ${event.warning.kind}: ${event.warning.path}: ${event.warning.message}`);
                break;
        }
    };
}

program
    .name('code-context')
    .description('Generate a markdown context document of a project for LLM chats')
    .version(version);

/**
 * Generate command - the default
 */
program
    .command('generate', { isDefault: true })
    .description('Generate the context document')
    .argument('[path]', 'Project directory or single file (default: current directory)', '.')
    .option('-o, --output <file>', 'Output file path ("-" for stdout)', 'context.md')
    .option('-m, --max-chars <n>', 'Character limit per file')
    .option('--file', 'The path is a single file (single file mode)')
    .option('-p, --prompt <text>', 'Prompt appended to the document')
    .option('--prompt-file <file>', 'Read the prompt from a file')
    .option('--stdin', 'Read the prompt from stdin')
    .option('-x, --exclude-dir <name>', 'Extra directory name to exclude (can be used multiple times)', collect, noValues())
    .option('-e, --ext <ext>', 'Allowed extension, replaces the default list (can be used multiple times)', collect, noValues())
    .option('--all-extensions', 'Do not filter by extension')
    .option('--no-gitignore', 'Ignore the project .gitignore')
    .option('--max-depth <n>', 'Do not enter directories deeper than this')
    .option('--config-path <path>', 'Path to config JSON file')
    .option('--verbose', 'Verbose output')
    .action((targetPath: string, options: GenerateOptions, command: Command) => {
        try {
            const startTime = Date.now();
            const src = (name: string) => command.getOptionValueSource(name);

            // Priority: CLI flags > config file > defaults
            const config = loadCliConfig(options.configPath, options.verbose ?? false);
            const verbose = src('verbose') === 'cli' ? true : config.verbose ?? false;
            const output = src('output') !== 'cli' && config.output !== undefined ? config.output : options.output;
            const settings = applyFlags(resolveSettings(config), options, command, output);
            const maxChars = options.maxChars === undefined ? undefined : parsePositiveInt(options.maxChars, '--max-chars');
            const prompt = readPrompt(options, config);

            const result = generateContext({
                rootPath: targetPath,
                mode: options.file ? 'single-file' : 'project',
                settings,
                maxCharsOverride: maxChars,
                prompt,
                onEvent: progressLogger(verbose),
                verbose,
            });

            const written = writeDocument(result.document, output);
            if (output === '-') return;

            const totalTime = Date.now() - startTime;
            console.log(`✅ File generated: ${written}`);
            if (result.mode === 'single-file' && result.selectedPath) {
                console.log(`📄 File processed: ${result.selectedPath}`);
            } else {
                console.log(`📁 ${result.fileCount} files included (${result.truncatedCount} truncated)`);
            }
            console.log(`📦 Size: ${(Buffer.byteLength(result.document, 'utf-8') / 1024).toFixed(1)}KB`);
            if (result.warnings.length > 0) {
                console.warn(`⚠️  ${result.warnings.length} warning(s), listed at the end of the document`);
            }
            if (verbose) {
                const t = result.timing;
                console.log(`⏱️  walk: ${t.walkMs}ms, extract: ${t.extractMs}ms, total: ${totalTime}ms`);
            }
            console.log('📋 Copy the content and paste it in the chat!');
        } catch (error) {
            console.error('❌ Error:', error instanceof Error ? error.message : error);
            process.exit(1);
        }
    });

/**
 * Interactive command - line-based session (generate / reset / change dir / exit)
 */
program
    .command('interactive')
    .description('Start an interactive session')
    .argument('[path]', 'Starting directory', '.')
    .option('-o, --output <file>', 'Output file path', 'context.md')
    .option('-m, --max-chars <n>', 'Character limit per file')
    .option('--config-path <path>', 'Path to config JSON file')
    .option('--verbose', 'Verbose output')
    .action(async (startPath: string, options: InteractiveOptions) => {
        try {
            const config = loadCliConfig(options.configPath, options.verbose ?? false);
            const output = options.output;
            const settings = resolveSettings(config);
            if (!settings.excludeFiles.includes(basename(output))) {
                settings.excludeFiles.push(basename(output));
            }

            const session = new InteractiveSession({
                directory: startPath,
                settings,
                output,
                maxChars: options.maxChars === undefined ? undefined : parsePositiveInt(options.maxChars, '--max-chars'),
                prompt: config.prompt,
                verbose: options.verbose ?? config.verbose ?? false,
            });
            if (!session.changeDirectory('.')) process.exit(1);

            console.log('✅ Code context session started');
            console.log('⚡ Commands:');
            for (const line of helpLines()) console.log(line);

            await runSession(session);
        } catch (error) {
            console.error('❌ Error:', error instanceof Error ? error.message : error);
            process.exit(1);
        }
    });

function runSession(session: InteractiveSession): Promise<void> {
    const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: '> ' });

    return new Promise<void>((resolveSession, rejectSession) => {
        rl.on('line', line => {
            try {
                if (dispatch(session, line) === 'exit') {
                    rl.close();
                    return;
                }
                rl.prompt();
            } catch (error) {
                rl.close();
                rejectSession(error);
            }
        });
        rl.on('close', () => resolveSession());
        rl.prompt();
    });
}

/**
 * Init command - create a starter config file
 */
program
    .command('init')
    .description('Create a starter config file')
    .argument('[path]', 'Output path for config file', 'code-context.config.json')
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
            console.log(`Use it with: code-context --config-path ${outputPath}`);
        } catch (error) {
            console.error('Error:', error instanceof Error ? error.message : error);
            process.exit(1);
        }
    });

// Parse arguments and run
program.parseAsync().catch((error: unknown) => {
    console.error('❌ Error:', error instanceof Error ? error.message : error);
    process.exit(1);
});
