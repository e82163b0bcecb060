import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { CanonicalRecord, LlmCompletionParams, LlmCompletionResult, LlmProvider } from '../types/index.js';

/**
 * Canonical record with placeholder values for every field not given.
 */
export function makeRecord(overrides: Partial<CanonicalRecord> = {}): CanonicalRecord {
    return {
        document_id: '10.1000/test',
        title: 'Test title',
        abstract: 'Test abstract',
        authors: '',
        journal_name: '',
        publication_date: '',
        year: null,
        author_keywords: '',
        index_keywords: '',
        vhb_ranking: null,
        abdc_ranking: null,
        citations: null,
        url: null,
        issn: null,
        eissn: null,
        extras: {},
        ...overrides,
    };
}

export function makeTmpDir(prefix = 'bibliorag-test-'): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Scripted text-generation stand-in. Each call takes the next reply: a
 * string answers, an Error rejects, 'hang' never settles.
 */
export class FakeLlm implements LlmProvider {
    readonly name = 'fake';
    readonly model = 'fake-model';
    readonly prompts: string[] = [];
    readonly params: LlmCompletionParams[] = [];

    constructor(private readonly replies: Array<string | Error | 'hang'>) {}

    async complete(prompt: string, params: LlmCompletionParams = {}): Promise<LlmCompletionResult> {
        this.prompts.push(prompt);
        this.params.push(params);
        const reply = this.replies.shift() ?? '';
        if (reply === 'hang') return new Promise<LlmCompletionResult>(() => undefined);
        if (reply instanceof Error) throw reply;
        return { text: reply, usage: null, model: this.model, provider: this.name };
    }

    async isAvailable(): Promise<boolean> {
        return true;
    }
}
