/**
 * Failure that must stop the whole run instead of a single item
 */
export class PipelineFatalError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'PipelineFatalError';
    }
}

export class DatabaseInitializationError extends PipelineFatalError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'DatabaseInitializationError';
    }
}

export class PlaceExtractionUnavailableError extends PipelineFatalError {
    constructor(message: string) {
        super(message);
        this.name = 'PlaceExtractionUnavailableError';
    }
}
