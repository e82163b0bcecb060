import type { CanonicalRecord, DocumentMetadata, EmbeddingProvider, IndexedDocument, VectorIndex } from '../types/index.js';
import { parseKeywords, splitAuthors } from '../sources/normalizer.js';
import { normalizeVector } from '../nlp/similarity.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

const SNIPPET_LENGTH = 200;

/**
 * Render the text that gets embedded. Field order is fixed:
 * title, abstract, authors, journal, year, then non-empty extras on one
 * line as `key: value` pairs joined by " | ".
 */
export function buildTextBlock(record: CanonicalRecord): string {
    const lines = [
        `Title: ${record.title}`,
        `Abstract: ${record.abstract}`,
        `Authors: ${record.authors}`,
        `Journal: ${record.journal_name}`,
        `Year: ${record.year !== null ? String(record.year) : record.publication_date}`,
    ];

    const extras = Object.entries(record.extras)
        .filter(([, value]) => value.trim() !== '')
        .map(([key, value]) => `${key}: ${value}`);
    if (extras.length > 0) lines.push(extras.join(' | '));

    return lines.join('\n');
}

/**
 * First 200 characters of the abstract, with "..." when it was cut.
 */
export function abstractSnippet(abstract: string): string {
    if (abstract.length <= SNIPPET_LENGTH) return abstract.trim();
    return `${abstract.slice(0, SNIPPET_LENGTH).trim()}...`;
}

/**
 * Fixed metadata stored beside each vector and returned with every hit.
 */
export function buildMetadata(record: CanonicalRecord): DocumentMetadata {
    return {
        title: record.title,
        authors: record.authors,
        author_list: splitAuthors(record.authors),
        journal: record.journal_name,
        year: record.year,
        doi: record.document_id,
        url: record.url ?? `https://doi.org/${record.document_id}`,
        abstract_snippet: abstractSnippet(record.abstract),
        rankings: {
            vhb: record.vhb_ranking,
            abdc: record.abdc_ranking,
        },
        citations: record.citations,
        keywords: mergeKeywords(parseKeywords(record.author_keywords), parseKeywords(record.index_keywords)),
    };
}

function mergeKeywords(...lists: string[][]): string[] {
    const seen = new Set<string>();
    const out: string[] = [];
    for (const keyword of lists.flat()) {
        const key = keyword.toLowerCase();
        if (seen.has(key)) continue;
        seen.add(key);
        out.push(keyword);
    }
    return out;
}

/**
 * Embed every record in one batch call, normalize each vector to unit
 * length and write the documents to the index.
 *
 * @returns Number of documents written
 */
export async function embedAndStore(
    records: CanonicalRecord[],
    index: VectorIndex,
    embedder: EmbeddingProvider
): Promise<number> {
    if (records.length === 0) return 0;

    const textBlocks = records.map(buildTextBlock);
    const startTime = Date.now();
    const vectors = await embedder.embed(textBlocks);

    if (vectors.length !== records.length) {
        throw new Error(`Embedding provider returned ${vectors.length} vectors for ${records.length} documents`);
    }

    const documents: IndexedDocument[] = records.map((record, i) => ({
        id: record.document_id,
        embedding: normalizeVector(vectors[i] ?? []),
        text_block: textBlocks[i] ?? '',
        metadata: buildMetadata(record),
    }));

    await index.upsert(documents);

    logger.info(
        { documents: documents.length, provider: embedder.name, durationMs: Date.now() - startTime },
        'Vector index populated'
    );
    return documents.length;
}
