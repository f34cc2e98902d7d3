export type ExportErrorCode = 'CONFIG' | 'BINDING' | 'RESOLUTION' | 'LAYOUT' | 'IO';

/**
 * Base class of every error raised by the engine
 */
export class ExportError extends Error {
    readonly code: ExportErrorCode;

    constructor(code: ExportErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/** Malformed declarative document or builder configuration */
export class ConfigError extends ExportError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('CONFIG', message, options);
    }
}

/** Data bound or streamed to a section that is unknown or already passed */
export class BindingError extends ExportError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('BINDING', message, options);
    }
}

/** A cross-section reference that cannot be resolved */
export class ResolutionError extends ExportError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('RESOLUTION', message, options);
    }
}

export class LayoutError extends ExportError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('LAYOUT', message, options);
    }
}

/** Underlying stream or file failure */
export class IOError extends ExportError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('IO', message, options);
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
