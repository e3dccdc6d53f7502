import { supabaseAdmin } from '../config/supabase';

export interface LogEntry {
    TransactionID?: string;
    ParentTransactionID?: string;
    Category?: string;
    Endpoint?: string;
    RequestPayload?: unknown;
    ResponsePayload?: unknown;
    Exception?: string;
    ExceptionStackTrace?: string;
    RelatedTo?: string;
    Status?: string;
}

function serialize(payload: unknown): string | null {
    if (payload === undefined || payload === null) return null;
    return typeof payload === 'string' ? payload : JSON.stringify(payload);
}

function writeToConsole(entry: LogEntry) {
    if (process.env.NODE_ENV === 'test') return;

    const line = `[${entry.Category ?? 'App'}] ${entry.Status ?? 'INFO'} ${entry.Endpoint ?? ''}`.trim();
    const detail = entry.Exception ?? serialize(entry.ResponsePayload) ?? '';
    if (entry.Status === 'ERROR' || entry.Exception) {
        console.error(line, detail, entry.TransactionID ?? '');
    } else {
        console.log(line, detail, entry.TransactionID ?? '');
    }
}

export class Logger {
    static async log(entry: LogEntry) {
        if (!supabaseAdmin) {
            writeToConsole(entry);
            return;
        }

        try {
            const { error } = await supabaseAdmin
                .from('Application_Log')
                .insert([
                    {
                        TransactionID: entry.TransactionID,
                        ParentTransactionID: entry.ParentTransactionID,
                        Category: entry.Category,
                        Endpoint: entry.Endpoint,
                        RequestPayload: serialize(entry.RequestPayload),
                        ResponsePayload: serialize(entry.ResponsePayload),
                        Exception: entry.Exception,
                        ExceptionStackTrace: entry.ExceptionStackTrace,
                        RelatedTo: entry.RelatedTo,
                        Status: entry.Status,
                    },
                ]);

            if (error) {
                console.error('Failed to write to Application_Log:', error);
                writeToConsole(entry);
            }
        } catch (err) {
            console.error('Unexpected error writing to Application_Log:', err);
            writeToConsole(entry);
        }
    }

    static async logInfo(
        category: string,
        message: string,
        metadata?: Partial<LogEntry>
    ) {
        await this.log({
            Category: category,
            Status: 'INFO',
            ResponsePayload: message, // generic info messages live in ResponsePayload
            ...metadata,
        });
    }

    static async logWarning(
        category: string,
        message: string,
        metadata?: Partial<LogEntry>
    ) {
        await this.log({
            Category: category,
            Status: 'WARNING',
            ResponsePayload: message,
            ...metadata,
        });
    }

    static async logError(
        category: string,
        error: unknown,
        metadata?: Partial<LogEntry>
    ) {
        await this.log({
            Category: category,
            Status: 'ERROR',
            Exception: error instanceof Error ? error.message : String(error),
            ExceptionStackTrace: error instanceof Error ? error.stack : undefined,
            ...metadata,
        });
    }

    /**
     * Error raised while serving a request. Callers pass their own Status
     * (VALIDATION_ERROR, LLM_ERROR, ...) in the metadata.
     */
    static async logBackendError(
        category: string,
        error: unknown,
        metadata?: Partial<LogEntry>
    ) {
        await this.logError(category, error, {
            Status: 'ERROR',
            ...metadata,
        });
    }
}
