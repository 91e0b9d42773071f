import chalk from 'chalk';

export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
}

// Every level writes to stderr: stdout is reserved for manifest lines.
export class Logger {
    private static level: LogLevel = LogLevel.INFO;

    static setLevel(level: LogLevel) {
        this.level = level;
    }

    static info(message: string) {
        if (this.level <= LogLevel.INFO) {
            console.error(chalk.blue('info: ') + message);
        }
    }

    static warn(message: string) {
        if (this.level <= LogLevel.WARN) {
            console.error(chalk.yellow('warn: ') + message);
        }
    }

    static error(message: string, error?: unknown) {
        if (this.level <= LogLevel.ERROR) {
            console.error(chalk.red('error: ') + message);
            if (error) {
                console.error(error);
            }
        }
    }

    static debug(message: string) {
        if (this.level <= LogLevel.DEBUG) {
            console.error(chalk.dim('debug: ') + message);
        }
    }
}
