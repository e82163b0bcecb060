import { describe, it, expect } from 'vitest';
import { tokenize } from '../nlp/tokenizer.js';
import { isFillerWord } from '../nlp/stopwords.js';
import {
    HeuristicEntityExtractor,
    detectTopicConstraint,
    extractAuthorName,
    extractQuotedMentions,
    extractTopicPhrase,
    extractYearMention,
    relaxAuthorName,
    relaxTopic,
} from '../nlp/entity-extraction.js';
import {
    IntentClassifier,
    buildClassifierPrompt,
    inferIntentFromText,
    parseIntentLabel,
    shouldUseGraph,
} from '../retrieval/intent-classifier.js';
import { FakeLlm } from './helpers.js';

describe('tokenize', () => {
    it('should lowercase, strip punctuation, stopwords and numbers', () => {
        expect(tokenize('The Service-Dominant logic, 2020!')).toEqual(['service-dominant', 'logic']);
    });

    it('should return nothing for empty text', () => {
        expect(tokenize('')).toEqual([]);
    });

    it('should treat question words as filler', () => {
        expect(isFillerWord('Which')).toBe(true);
        expect(isFillerWord('papers')).toBe(true);
        expect(isFillerWord('Klaus')).toBe(false);
    });
});

describe('entity extraction', () => {
    it('should find quoted mentions in straight and curly quotes', () => {
        expect(extractQuotedMentions('papers by "Smith, J." and “Doe, A.”')).toEqual(['Smith, J.', 'Doe, A.']);
    });

    it('should find a name after a preposition', () => {
        expect(extractAuthorName('Which papers were written by Klaus?')).toBe('Klaus');
        expect(extractAuthorName('papers by Smith, John')).toBe('Smith, John');
    });

    it('should find names that start with a non-ASCII capital', () => {
        expect(extractAuthorName('Which papers were written by Öztürk, E.?')).toBe('Öztürk, E.');
        expect(extractAuthorName('What topics does Ülker research?')).toBe('Ülker');
    });

    it('should find a name before a research verb', () => {
        expect(extractAuthorName('What topics does Maklan research?')).toBe('Maklan');
    });

    it('should return null when nothing is name-like', () => {
        expect(extractAuthorName('Show me papers')).toBeNull();
    });

    it('should extract topic phrases and cut trailing qualifiers', () => {
        expect(extractTopicPhrase('papers about machine learning by Smith')).toBe('machine learning');
        expect(extractTopicPhrase('research on brand trust from 2020?')).toBe('brand trust');
        expect(extractTopicPhrase('papers by Smith')).toBeNull();
    });

    it('should detect a topic constraint on an author query', () => {
        expect(detectTopicConstraint('papers about machine learning by Smith')).toEqual({
            topic: 'machine learning',
            author: 'Smith',
        });
        expect(detectTopicConstraint('papers by Smith')).toBeNull();
    });

    it('should find a year phrase', () => {
        expect(extractYearMention('papers from 2020')).toBe(2020);
        expect(extractYearMention('what was published in 1999?')).toBe(1999);
        expect(extractYearMention('papers 2020')).toBeNull();
    });

    it('should relax author names once', () => {
        expect(relaxAuthorName('Smith, J.')).toBe('Smith');
        expect(relaxAuthorName('John Nobody')).toBe('Nobody');
        expect(relaxAuthorName('Smith')).toBeNull();
    });

    it('should relax topics to their longest token', () => {
        expect(relaxTopic('brand trust')).toBe('brand');
        expect(relaxTopic('customer loyalty')).toBe('customer');
        expect(relaxTopic('trust')).toBeNull();
    });

    it('should treat quoted mentions as authors only with an authorship cue', () => {
        const extractor = new HeuristicEntityExtractor();
        expect(extractor.extract('Did "Smith, J." and "Doe, A." collaborate?')).toEqual({
            authors: ['Smith, J.', 'Doe, A.'],
            topics: [],
        });
        expect(extractor.extract('papers about "brand trust"')).toEqual({ authors: [], topics: ['brand trust'] });
    });
});

describe('intent classification', () => {
    it('should parse labels from loose model output', () => {
        expect(parseIntentLabel('PAPERS_BY_AUTHOR')).toBe('PAPERS_BY_AUTHOR');
        expect(parseIntentLabel('Label: papers by author.')).toBe('PAPERS_BY_AUTHOR');
        expect(parseIntentLabel('I think LIST_TOPICS, or maybe LIST_AUTHORS')).toBe('LIST_TOPICS');
        expect(parseIntentLabel('topics by author')).toBe('TOPICS_BY_AUTHOR');
        expect(parseIntentLabel('no idea')).toBe('OTHER');
    });

    it('should infer labels from wording', () => {
        expect(inferIntentFromText('Who collaborated with Maklan?')).toBe('COLLABORATIONS');
        expect(inferIntentFromText('What topics does Klaus research?')).toBe('TOPICS_BY_AUTHOR');
        expect(inferIntentFromText('List all topics')).toBe('LIST_TOPICS');
        expect(inferIntentFromText('Show me all authors')).toBe('LIST_AUTHORS');
        expect(inferIntentFromText('Which papers were written by Klaus?')).toBe('PAPERS_BY_AUTHOR');
        expect(inferIntentFromText('papers by Smith')).toBe('PAPERS_BY_AUTHOR');
        expect(inferIntentFromText('papers about machine learning')).toBe('PAPERS_BY_TOPIC');
        expect(inferIntentFromText('What is service-dominant logic?')).toBe('CONCEPT_QUESTION');
        expect(inferIntentFromText('hello there')).toBe('OTHER');
    });

    it('should pre-filter graph-worthy questions', () => {
        expect(shouldUseGraph('papers by Smith')).toBe(true);
        expect(shouldUseGraph('papers from 2020')).toBe(true);
        expect(shouldUseGraph('Who collaborated with Maklan?')).toBe(true);
        expect(shouldUseGraph('What is service-dominant logic?')).toBe(false);
        expect(shouldUseGraph('Explain brand equity')).toBe(false);
    });

    it('should list every label in the prompt', () => {
        const prompt = buildClassifierPrompt('papers by Smith');
        expect(prompt).toContain('- COLLABORATIONS: who collaborated or co-authored with whom');
        expect(prompt).toContain('Question: papers by Smith');
    });

    it('should classify with temperature 0 and a short reply', async () => {
        const llm = new FakeLlm(['COLLABORATIONS\n']);
        const classifier = new IntentClassifier(llm, { timeoutMs: 1000 });

        expect(await classifier.classify('Who worked with Doe?')).toBe('COLLABORATIONS');
        expect(llm.params[0]).toEqual({ temperature: 0, maxTokens: 12, timeoutMs: 1000 });
    });

    it('should fall back to OTHER on failure or timeout', async () => {
        expect(await new IntentClassifier(new FakeLlm([new Error('down')]), { timeoutMs: 1000 }).classify('x')).toBe('OTHER');
        expect(await new IntentClassifier(new FakeLlm(['hang']), { timeoutMs: 20 }).classify('x')).toBe('OTHER');
    });

    it('should use the lexical label without a model', async () => {
        expect(await new IntentClassifier(null, { timeoutMs: 1000 }).classify('papers by Smith')).toBe('PAPERS_BY_AUTHOR');
    });
});
