import chalk from 'chalk';
import { Diagnostic } from './types';

export interface ILogger {
    readonly verbose: boolean;

    info(message: string): void;

    success(message: string): void;

    warn(message: string): void;

    error(message: string): void;

    debug(message: string): void;
}

const loggerMap: Record<string, ILogger> = {};

class Logger implements ILogger {
    constructor(
        readonly name: string,
        readonly verbose = false,
    ) {}

    info(message: string) {
        console.log(chalk.blue(`[INFO] ${this.name} :: ${message}`));
    }

    success(message: string) {
        console.log(chalk.green(`[SUCCESS] ${this.name} :: ${message}`));
    }

    warn(message: string) {
        console.warn(chalk.yellow(`[WARNING] ${this.name} :: ${message}`));
    }

    error(message: string) {
        console.error(chalk.red(`[ERROR] ${this.name} :: ${message}`));
    }

    debug(message: string) {
        if (this.verbose) {
            console.log(chalk.magenta(`[DEBUG] ${this.name} :: ${message}`));
        }
    }
}

export function getLogger(name: string, verbose = false): ILogger {
    let logger = loggerMap[name];
    if (!logger) {
        logger = new Logger(name, verbose);
        loggerMap[name] = logger;
    }
    return logger;
}

export function logDiagnostics(logger: ILogger, source: string, diagnostics: readonly Diagnostic[]): void {
    for (const d of diagnostics) {
        const where = d.position === undefined ? '' : ` @${d.position}`;
        const line = `${source}${where} [${d.code}] ${d.message}`;
        switch (d.severity) {
            case 'error':
                logger.error(line);
                break;
            case 'warning':
                logger.warn(line);
                break;
            case 'info':
                logger.debug(line);
                break;
        }
    }
}
