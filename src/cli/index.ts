#!/usr/bin/env node

import { join } from 'node:path';
import { Command } from 'commander';
import { z } from 'zod';
import { resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { getHttpClient } from '../utils/http-client.js';
import { BiblioRagError, describeError } from '../utils/errors.js';
import { ingestFile } from '../builder/dataset-builder.js';
import { createEmbeddingProvider } from '../embedding/index.js';
import { createLlmProvider } from '../llm/index.js';
import { HybridRetriever } from '../retrieval/hybrid-retriever.js';
import { QueryService } from '../retrieval/query-service.js';
import { DatasetRegistry } from '../storage/dataset-registry.js';
import { GraphDatabase } from '../storage/graph-database.js';
import { GRAPH_FILE, listGenerations, openActiveGeneration, readActivePointer, generationDir } from '../storage/generations.js';
import type { BiblioRagConfig, HybridAnswer } from '../types/index.js';
import { VERSION } from '../version.js';

const program = new Command();

program
    .name('bibliorag')
    .description('Hybrid graph and vector question answering over bibliographic exports.')
    .version(VERSION)
    .option('--data-dir <dir>', 'Directory holding dataset generations')
    .option('--config <dir>', 'Directory to search for bibliorag.config.json')
    .option('--log-level <level>', 'Log level: debug | info | warn | error | silent')
    .option('--json-logs', 'Output JSON logs');

const GlobalOptionsSchema = z.object({
    dataDir: z.string().optional(),
    config: z.string().optional(),
    logLevel: z.enum(['error', 'warn', 'info', 'debug', 'silent']).optional(),
    jsonLogs: z.boolean().optional(),
});

const intFlag = z.coerce.number().int().positive();

/**
 * Resolve configuration (flags > env > file > defaults) and set up logging.
 */
async function setup(overrides: ConfigOverrides = {}): Promise<BiblioRagConfig> {
    const global = GlobalOptionsSchema.parse(program.opts());
    const config = await resolveConfig(
        { ...overrides, dataDir: global.dataDir, logLevel: global.logLevel, jsonLogs: global.jsonLogs },
        { searchFrom: global.config }
    );
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    getHttpClient({ timeout: config.llm.timeoutMs, version: VERSION });
    return config;
}

function fail(error: unknown): void {
    const logger = getLogger();
    if (error instanceof BiblioRagError) {
        logger.error({ code: error.code }, error.message);
    } else {
        logger.error({ error: describeError(error) }, 'Command failed');
    }
    process.exitCode = 1;
}

// ─── INGEST command ───────────────────────────────────────

const IngestOptionsSchema = z.object({
    keep: intFlag.optional(),
    embedding: z.enum(['hashing', 'ollama', 'openai']).optional(),
});

program
    .command('ingest')
    .description('Ingest a CSV, TSV or JSON export as a new dataset generation')
    .argument('<file>', 'Export file (.csv, .tsv or .json)')
    .option('--keep <n>', 'Generations to keep on disk')
    .option('--embedding <provider>', 'Embedding provider: hashing | ollama | openai')
    .action(async (file: string, rawOptions: unknown) => {
        try {
            const opts = IngestOptionsSchema.parse(rawOptions);
            const config = await setup({
                keepGenerations: opts.keep,
                embedding: { provider: opts.embedding },
            });
            const embedder = createEmbeddingProvider(config.embedding);
            const result = await ingestFile(file, { config, embedder });

            console.log(`\nIngested ${result.documents} paper(s) from ${result.rows} row(s) as generation ${result.generation}`);
            console.log(`  Dropped (missing DOI/title/abstract): ${result.dropped.missingRequired}`);
            console.log(`  Dropped (duplicate DOI):              ${result.dropped.duplicate}`);
            console.log('  Nodes:');
            for (const [label, count] of Object.entries(result.nodes)) {
                console.log(`    ${label}: ${count}`);
            }
            console.log(`  Relationships: ${result.relationships}\n`);
        } catch (error) {
            fail(error);
        }
    });

// ─── ASK command ──────────────────────────────────────────

const AskOptionsSchema = z.object({
    json: z.boolean().optional(),
    llm: z.boolean().optional(),
    topK: intFlag.optional(),
    threshold: z.coerce.number().min(-1).max(1).optional(),
});

program
    .command('ask')
    .description('Ask a question against the active dataset generation')
    .argument('<question...>', 'Question text')
    .option('--json', 'Print the full response object as JSON')
    .option('--no-llm', 'Skip answer generation and intent classification')
    .option('-k, --top-k <n>', 'Nearest neighbours to retrieve')
    .option('--threshold <value>', 'Minimum cosine similarity')
    .action(async (words: string[], rawOptions: unknown) => {
        try {
            const opts = AskOptionsSchema.parse(rawOptions);
            const config = await setup({
                retrieval: { topK: opts.topK, threshold: opts.threshold },
                llm: opts.llm === false ? { enabled: false } : {},
            });

            const embedder = createEmbeddingProvider(config.embedding);
            const llm = createLlmProvider(config.llm);
            const registry = new DatasetRegistry();
            registry.publish(openActiveGeneration(config.dataDir));

            const service = new QueryService(
                registry,
                (dataset) => new HybridRetriever({ dataset, embedder, llm, config })
            );

            try {
                const answer = await service.ask(words.join(' '));
                if (opts.json) {
                    console.log(JSON.stringify(answer, null, 2));
                } else {
                    printAnswer(answer);
                }
            } finally {
                registry.close();
            }
        } catch (error) {
            fail(error);
        }
    });

function printAnswer(answer: HybridAnswer): void {
    console.log(`\n${answer.answer}\n`);

    if (answer.sources.length > 0) {
        console.log('Sources:');
        answer.sources.forEach((source, index) => {
            const meta = source.metadata;
            const year = meta.year !== null ? ` (${meta.year})` : '';
            console.log(`  [${index + 1}] ${meta.title}${year}`);
            console.log(`      ${meta.authors || 'Unknown authors'} · ${meta.journal || 'Unknown journal'}`);
            console.log(`      ${meta.url}  similarity ${source.similarity.toFixed(3)} (${source.origin})`);
        });
        console.log('');
    }

    const graph = answer.graph_used ? `graph: ${answer.graph_template ?? 'n/a'}` : 'graph: not used';
    console.log(`intent: ${answer.intent} · ${graph} · outcome: ${answer.outcome} · generation ${answer.generation}\n`);
}

// ─── INSPECT command ──────────────────────────────────────

program
    .command('inspect')
    .description('Show statistics of the active dataset generation')
    .action(async () => {
        try {
            const config = await setup();
            const pointer = readActivePointer(config.dataDir);
            if (!pointer) {
                throw new BiblioRagError('DATASET_NOT_FOUND', `No dataset has been ingested into ${config.dataDir} yet`);
            }

            const db = GraphDatabase.openReadonly(join(generationDir(config.dataDir, pointer.generation), GRAPH_FILE));
            const stats = db.getStats();
            const imports = db.getImports();
            db.close();

            console.log('\n📊 BiblioRAG Dataset\n');
            console.log(`  Active generation: ${pointer.generation} (published ${pointer.published_at})`);
            console.log(`  On disk:           ${listGenerations(config.dataDir).join(', ')}`);
            console.log('\n  Nodes:');
            for (const [label, count] of Object.entries(stats.nodes)) {
                console.log(`    ${label}: ${count}`);
            }
            console.log(`\n  Relationships: ${stats.edges}`);
            for (const [type, count] of Object.entries(stats.edgesByType)) {
                console.log(`    ${type}: ${count}`);
            }

            const latest = imports[imports.length - 1];
            if (latest) {
                console.log(`\n  Imported from ${latest.source_file} at ${latest.created_at} (v${latest.bibliorag_version})`);
            }
            console.log('');
        } catch (error) {
            fail(error);
        }
    });

program.parseAsync().catch(fail);
