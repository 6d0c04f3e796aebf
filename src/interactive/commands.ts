/**
 * Command dispatch table for the interactive session.
 * Each input line is "<command> [argument]"; single letters are shortcuts.
 */

import type { InteractiveSession } from './session.js';

export type CommandOutcome = 'continue' | 'exit';

export type CommandName =
    | 'generate'
    | 'reset'
    | 'change-dir'
    | 'select-file'
    | 'toggle-mode'
    | 'prompt'
    | 'info'
    | 'help'
    | 'exit';

export interface Command {
    name: CommandName;
    /** Words and shortcuts that trigger the command, lower-case */
    keys: readonly string[];
    usage: string;
    description: string;
    run: (session: InteractiveSession, arg: string) => CommandOutcome;
}

export const COMMANDS: readonly Command[] = [
    {
        name: 'generate',
        keys: ['g', 'generate'],
        usage: 'g',
        description: 'Generate the context file',
        run: session => {
            session.generate();
            return 'continue';
        },
    },
    {
        name: 'reset',
        keys: ['r', 'reset'],
        usage: 'r',
        description: 'Clear the selected file and return to complete project mode',
        run: session => {
            session.reset();
            return 'continue';
        },
    },
    {
        name: 'change-dir',
        keys: ['c', 'cd'],
        usage: 'c <dir>',
        description: 'Change the project directory',
        run: (session, arg) => {
            if (!arg) {
                session.log('Usage: c <dir>');
                return 'continue';
            }
            session.changeDirectory(arg);
            return 'continue';
        },
    },
    {
        name: 'select-file',
        keys: ['f', 'file'],
        usage: 'f <file>',
        description: 'Select a single file (turns single file mode on)',
        run: (session, arg) => {
            if (!arg) {
                session.log('Usage: f <file>');
                return 'continue';
            }
            session.selectFile(arg);
            return 'continue';
        },
    },
    {
        name: 'toggle-mode',
        keys: ['m', 'mode'],
        usage: 'm',
        description: 'Toggle single file / complete project mode',
        run: session => {
            session.toggleMode();
            return 'continue';
        },
    },
    {
        name: 'prompt',
        keys: ['p', 'prompt'],
        usage: 'p <text>',
        description: 'Set the prompt (empty clears it)',
        run: (session, arg) => {
            session.setPrompt(arg);
            return 'continue';
        },
    },
    {
        name: 'info',
        keys: ['i', 'info'],
        usage: 'i',
        description: 'Show the current project, mode and prompt',
        run: session => {
            for (const line of session.info()) session.log(line);
            return 'continue';
        },
    },
    {
        name: 'help',
        keys: ['h', 'help', '?'],
        usage: 'h',
        description: 'List commands',
        run: session => {
            for (const line of helpLines()) session.log(line);
            return 'continue';
        },
    },
    {
        name: 'exit',
        keys: ['q', 'quit', 'exit'],
        usage: 'q',
        description: 'Exit',
        run: () => 'exit',
    },
];

const BY_KEY: ReadonlyMap<string, Command> = new Map(
    COMMANDS.flatMap(command => command.keys.map(key => [key, command] as const)),
);

export function helpLines(): string[] {
    const width = Math.max(...COMMANDS.map(c => c.usage.length));
    return COMMANDS.map(c => `  ${c.usage.padEnd(width)}  ${c.description}`);
}

/** Split "f src/app.ts" into the command and its argument. */
export function parseInput(line: string): { command?: Command; arg: string } {
    const trimmed = line.trim();
    const space = trimmed.search(/\s/);
    const word = (space === -1 ? trimmed : trimmed.slice(0, space)).toLowerCase();
    const arg = space === -1 ? '' : trimmed.slice(space).trim();
    return { command: BY_KEY.get(word), arg };
}

/**
 * Run one line of input against the session.
 * Blank lines do nothing; unknown commands print a hint.
 */
export function dispatch(session: InteractiveSession, line: string): CommandOutcome {
    if (line.trim() === '') return 'continue';

    const { command, arg } = parseInput(line);
    if (!command) {
        session.log(`Unknown command: ${line.trim()}. Type "h" for help.`);
        return 'continue';
    }
    return command.run(session, arg);
}
