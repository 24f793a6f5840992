import chalk from 'chalk';
import { config } from './config';

const LEVELS = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 } as const;
type Level = keyof typeof LEVELS;

function isLevel(value: string): value is Level {
    return value in LEVELS;
}

const threshold: number = LEVELS[isLevel(config.logLevel) ? config.logLevel : 'info'];

/**
 * Console logger with a `[Tag]` prefix per component. Debug lines carry raw
 * payloads and only show with LOG_LEVEL=debug.
 */
export function createLogger(tag: string) {
    const prefix = `[${tag}]`;
    return {
        debug(message: string): void {
            if (threshold <= LEVELS.debug) console.log(chalk.gray(`${prefix} ${message}`));
        },
        info(message: string): void {
            if (threshold <= LEVELS.info) console.log(chalk.cyan(prefix), message);
        },
        success(message: string): void {
            if (threshold <= LEVELS.info) console.log(chalk.green(`${prefix} ${message}`));
        },
        warn(message: string): void {
            if (threshold <= LEVELS.warn) console.warn(chalk.yellow(`${prefix} ${message}`));
        },
        error(message: string): void {
            if (threshold <= LEVELS.error) console.error(chalk.red(`${prefix} ${message}`));
        },
    };
}
