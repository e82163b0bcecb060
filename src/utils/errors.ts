/**
 * Error taxonomy.
 *
 * Ingestion errors (SchemaValidationError, EmptyDatasetError) are batch-fatal
 * and reach the caller whole. Query-time errors (EntityExtractionAmbiguous,
 * GraphUnavailable, GenerationTimeout, GenerationError) are caught inside the
 * hybrid retriever and turned into a narrower result.
 */

export type ErrorCode =
    | 'SCHEMA_VALIDATION'
    | 'EMPTY_DATASET'
    | 'ENTITY_EXTRACTION_AMBIGUOUS'
    | 'GRAPH_UNAVAILABLE'
    | 'GRAPH_QUERY_REJECTED'
    | 'GENERATION_TIMEOUT'
    | 'GENERATION_ERROR'
    | 'UNSUPPORTED_FILE'
    | 'DATASET_NOT_FOUND';

/**
 * Base class carrying a stable code for logs and CLI output.
 */
export class BiblioRagError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'BiblioRagError';
    }

    toJSON(): Record<string, unknown> {
        return { name: this.name, code: this.code, message: this.message };
    }
}

/**
 * Uploaded table lacks required columns. Raised before any row is indexed.
 */
export class SchemaValidationError extends BiblioRagError {
    constructor(
        public readonly missingFields: string[],
        public readonly foundColumns: string[]
    ) {
        super(
            'SCHEMA_VALIDATION',
            `Missing required columns: ${missingFields.join(', ')}. Found columns: ${foundColumns.join(', ') || '(none)'}`
        );
        this.name = 'SchemaValidationError';
    }
}

/**
 * Every row was dropped by normalization.
 */
export class EmptyDatasetError extends BiblioRagError {
    constructor(public readonly rowCount: number) {
        super('EMPTY_DATASET', `No valid papers found: all ${rowCount} row(s) lack a DOI, title or abstract`);
        this.name = 'EmptyDatasetError';
    }
}

/**
 * Entity extraction found no usable author/topic for a template.
 */
export class EntityExtractionAmbiguous extends BiblioRagError {
    constructor(public readonly entity: 'author' | 'topic' | 'year', query: string) {
        super('ENTITY_EXTRACTION_AMBIGUOUS', `Could not extract ${entity} from query: ${query}`);
        this.name = 'EntityExtractionAmbiguous';
    }
}

/**
 * The graph store cannot be opened or queried.
 */
export class GraphUnavailable extends BiblioRagError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('GRAPH_UNAVAILABLE', message, options);
        this.name = 'GraphUnavailable';
    }
}

/**
 * A graph query was refused before or during execution: not a single
 * read-only statement, or invalid SQL. The store itself is still usable.
 */
export class GraphQueryRejected extends BiblioRagError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('GRAPH_QUERY_REJECTED', message, options);
        this.name = 'GraphQueryRejected';
    }
}

export class GenerationTimeout extends BiblioRagError {
    constructor(public readonly timeoutMs: number) {
        super('GENERATION_TIMEOUT', `Generation timed out after ${timeoutMs}ms`);
        this.name = 'GenerationTimeout';
    }
}

export class GenerationError extends BiblioRagError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('GENERATION_ERROR', message, options);
        this.name = 'GenerationError';
    }
}

/**
 * Render an unknown caught value for logs.
 */
export function describeError(error: unknown): string {
    if (error instanceof Error) return `${error.name}: ${error.message}`;
    return String(error);
}

/**
 * Race a promise against a deadline. The timer is always cleared, so a
 * settled race leaves nothing scheduled.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new GenerationTimeout(timeoutMs)), timeoutMs);
    });

    try {
        return await Promise.race([promise, deadline]);
    } finally {
        clearTimeout(timer);
    }
}
