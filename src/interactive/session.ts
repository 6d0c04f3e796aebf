/**
 * Interactive session state: current directory, selected file, mode and prompt.
 * Commands in ./commands.ts drive it; the readline loop lives in cli.ts.
 */

import { existsSync, statSync } from 'fs';
import { basename, relative, resolve } from 'path';
import { generateContext, writeDocument, type ContextSettings, type ContextResult, type GenerateRequest } from '../context/generate.js';
import { ContextError } from '../context/errors.js';

export interface SessionOptions {
    directory: string;
    settings: ContextSettings;
    output: string;
    maxChars?: number;
    prompt?: string;
    verbose?: boolean;
    log?: (line: string) => void;
    /** Injectable for tests */
    generate?: (request: GenerateRequest) => ContextResult;
    write?: (document: string, outputPath: string) => string;
}

export class InteractiveSession {
    directory: string;
    selectedFile?: string;
    singleFile = false;
    prompt: string;

    private readonly settings: ContextSettings;
    private readonly output: string;
    private readonly maxChars?: number;
    private readonly verbose: boolean;
    private readonly generateFn: (request: GenerateRequest) => ContextResult;
    private readonly writeFn: (document: string, outputPath: string) => string;
    readonly log: (line: string) => void;

    constructor(options: SessionOptions) {
        this.directory = resolve(options.directory);
        this.settings = options.settings;
        this.output = options.output;
        this.maxChars = options.maxChars;
        this.prompt = options.prompt ?? '';
        this.verbose = options.verbose ?? false;
        this.log = options.log ?? ((line: string) => console.log(line));
        this.generateFn = options.generate ?? generateContext;
        this.writeFn = options.write ?? writeDocument;
    }

    /** Switch project directory. Clears the file selection. */
    changeDirectory(target: string): boolean {
        const abs = resolve(this.directory, target);
        if (!existsSync(abs) || !statSync(abs).isDirectory()) {
            this.log(`❌ Not a directory: ${abs}`);
            return false;
        }
        this.directory = abs;
        this.selectedFile = undefined;
        this.log(`📂 Directory selected: ${abs}`);
        return true;
    }

    /** Pick a file inside the current directory; turns single-file mode on. */
    selectFile(target: string): boolean {
        const abs = resolve(this.directory, target);
        if (!existsSync(abs) || !statSync(abs).isFile()) {
            this.log(`❌ Not a file: ${abs}`);
            return false;
        }
        const rel = relative(this.directory, abs);
        if (rel.startsWith('..')) {
            this.log(`❌ File is outside ${this.directory}: ${abs}`);
            return false;
        }
        this.selectedFile = abs;
        this.singleFile = true;
        this.log(`📄 File selected: ${basename(abs)}`);
        return true;
    }

    toggleMode(): void {
        this.singleFile = !this.singleFile;
        if (this.singleFile) {
            this.log('📄 Single file mode activated');
            if (this.selectedFile) {
                this.log(`📄 Current file: ${basename(this.selectedFile)}`);
            } else {
                this.log('👆 Select a file with: f <path>');
            }
        } else {
            this.selectedFile = undefined;
            this.log('📁 Complete project mode activated');
        }
    }

    setPrompt(text: string): void {
        this.prompt = text;
        this.log(text ? `💡 Prompt set (${text.length} characters)` : '💡 Prompt cleared');
    }

    /** Back to whole-project mode with no file selected. The prompt is kept. */
    reset(): void {
        this.selectedFile = undefined;
        this.singleFile = false;
        this.log('🗑️  Selection reset');
    }

    info(): string[] {
        const lines = [
            `📁 Project: ${basename(this.directory)}`,
            `📍 Path: ${this.directory}`,
        ];
        if (this.singleFile && this.selectedFile) {
            lines.push(`📄 Selected file: ${basename(this.selectedFile)}`);
            lines.push('🎯 Mode: Single file');
        } else {
            lines.push('🎯 Mode: Complete project');
        }
        lines.push(`💡 Prompt: ${this.prompt || '(empty)'}`);
        return lines;
    }

    /**
     * Generate and write the document.
     * Context errors are reported and the session keeps going.
     */
    generate(): ContextResult | undefined {
        if (this.singleFile && !this.selectedFile) {
            this.log('⚠️  Single file mode is on but no file is selected');
            return undefined;
        }

        const request: GenerateRequest = this.singleFile && this.selectedFile
            ? { rootPath: this.selectedFile, mode: 'single-file', projectRoot: this.directory, settings: this.settings }
            : { rootPath: this.directory, mode: 'project', settings: this.settings };

        try {
            const result = this.generateFn({
                ...request,
                maxCharsOverride: this.maxChars,
                prompt: this.prompt,
                verbose: this.verbose,
            });
            const written = this.writeFn(result.document, this.output);
            this.log(`✅ File generated: ${written}`);
            if (result.mode === 'single-file' && result.selectedPath) {
                this.log(`📄 File processed: ${result.selectedPath}`);
            } else {
                this.log(`📁 ${result.fileCount} files included`);
            }
            if (result.warnings.length > 0) {
                this.log(`⚠️  ${result.warnings.length} warning(s), listed in the document`);
            }
            return result;
        } catch (error) {
            if (error instanceof ContextError) {
                this.log(`❌ ${error.message}`);
                return undefined;
            }
            throw error;
        }
    }
}
