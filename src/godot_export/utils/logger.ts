import type { ExportSettings } from '../types.js';

/**
 * Console logger. A child logger tags its lines with the scene (or object)
 * it works on, e.g. `[WARN] [Level] Unable to find 'crate.tscn' in project`.
 */
export class Logger {
    constructor(private settings: Pick<ExportSettings, 'verbose'>, readonly context: string | null = null) {}

    /** A logger for `context`, nested under this logger's own context. */
    child(context: string): Logger {
        return new Logger(this.settings, this.context === null ? context : `${this.context}/${context}`);
    }

    format(level: string, message: string): string {
        return this.context === null ? `[${level}] ${message}` : `[${level}] [${this.context}] ${message}`;
    }

    info(message: string): void {
        console.log(this.format('INFO', message));
    }

    warn(message: string): void {
        console.log(this.format('WARN', message));
    }

    error(message: string): void {
        console.error(this.format('ERROR', message));
    }

    debug(message: string): void {
        if (this.settings.verbose) {
            console.log(this.format('DEBUG', message));
        }
    }

    progress(current: number, total: number, message: string): void {
        const percent = total > 0 ? ((current / total) * 100).toFixed(1) : '100.0';
        console.log(`[${percent}%] ${message}`);
    }
}
