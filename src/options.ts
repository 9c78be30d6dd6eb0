import * as colors from "@colors/colors/safe";

export type LogLevel = "info" | "warn" | "error";

export interface CompilerOptions {
    verbose: number;
    printInfo: (message: string, verbosity?: number) => void;
    printWarn: (message: string, verbosity?: number) => void;
    printErr: (message: string, verbosity?: number) => void;
}

export interface LogWriter {
    write(text: string): unknown;
}

/**
 * Options printing coloured messages up to the given verbosity.
 */
export function consoleOptions(verbose: number = 0, stream: LogWriter = process.stderr): CompilerOptions {
    return {
        verbose,
        printInfo(msg: string, verbosity: number = 0) {
            if (verbosity <= this.verbose) {
                stream.write(colors.cyan(`Info: ${msg}`) + "\n");
            }
        },
        printWarn(msg: string, verbosity: number = 0) {
            if (verbosity <= this.verbose) {
                stream.write(colors.yellow(`Warning: ${msg}`) + "\n");
            }
        },
        printErr(msg: string, verbosity: number = 0) {
            if (verbosity <= this.verbose) {
                stream.write(colors.red(`Error: ${msg}`) + "\n");
            }
        },
    };
}

export interface RecordedMessage {
    level: LogLevel;
    message: string;
    verbosity: number;
}

/**
 * Silent options keeping every message, for tests and library use.
 */
export function quietOptions(): CompilerOptions & { messages: RecordedMessage[] } {
    let messages: RecordedMessage[] = [];
    let record = (level: LogLevel) => (message: string, verbosity: number = 0) => {
        messages.push({ level, message, verbosity });
    };
    return {
        verbose: 0,
        messages,
        printInfo: record("info"),
        printWarn: record("warn"),
        printErr: record("error"),
    };
}
