/**
 * Fixed metadata record stored next to every vector.
 */
export interface DocumentMetadata {
    title: string;
    /** Raw author string as exported */
    authors: string;
    /** Split author list */
    author_list: string[];
    journal: string;
    year: number | null;
    doi: string;
    /** Record URL, or https://doi.org/<doi> when the export had none */
    url: string;
    /** First 200 characters of the abstract, "..." appended when cut */
    abstract_snippet: string;
    rankings: {
        vhb: string | null;
        abdc: string | null;
    };
    citations: number | null;
    keywords: string[];
}

/**
 * IndexedDocument: the vector-index unit.
 */
export interface IndexedDocument {
    /** Same as the record's document_id (DOI) */
    id: string;
    /** Unit-normalized embedding */
    embedding: number[];
    /** The text that was embedded */
    text_block: string;
    metadata: DocumentMetadata;
}

/**
 * One nearest-neighbour hit. `distance` is cosine distance (1 - similarity).
 */
export interface VectorHit {
    id: string;
    distance: number;
    metadata: DocumentMetadata;
}
