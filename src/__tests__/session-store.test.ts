import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createRecord } from '../core/record.js';
import {
    addCitationsToSession,
    addRecordsToSession,
    createSession,
    listSessions,
    loadSession,
    saveSession,
    sessionKey,
    slugify,
} from '../session/session-store.js';
import { MalformedInputError } from '../utils/errors.js';

const NOW = new Date('2024-03-05T10:00:00Z');
const LATER = new Date('2024-03-06T08:30:00Z');

describe('Session store', () => {
    describe('createSession', () => {
        it('should name the file after the topic and the day', () => {
            const session = createSession('COVID-19 & ICU outcomes', NOW);

            expect(session.filename).toBe('research_session_covid_19_icu_outcomes_2024-03-05.json');
            expect(session.created_at).toBe('2024-03-05T10:00:00.000Z');
            expect(session.updated_at).toBe(session.created_at);
            expect(session.session_id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
            expect(session.papers).toEqual({});
            expect(session.searches_performed).toEqual([]);
        });

        it('should fall back to "untitled" for a topic without letters or digits', () => {
            expect(slugify('  ***  ')).toBe('');
            expect(createSession('***', NOW).filename).toBe('research_session_untitled_2024-03-05.json');
        });
    });

    describe('sessionKey', () => {
        it('should prefer DOI, then PMID, then Semantic Scholar id, then title', () => {
            expect(sessionKey(createRecord('crossref', { doi: '10.5555/A', pmid: '1', title: 'T' }))).toBe('10.5555/a');
            expect(sessionKey(createRecord('pubmed', { pmid: '1', source_id: 'x', title: 'T' }))).toBe('pmid:1');
            expect(sessionKey(createRecord('semantic_scholar', { source_id: 'x', title: 'T' }))).toBe('s2:x');
            expect(sessionKey(createRecord('crossref', { title: 'The Big Trial.' }))).toBe('title:big trial');
            expect(sessionKey(createRecord('crossref', {}))).toBeNull();
        });
    });

    describe('addRecordsToSession', () => {
        const byPmid = createRecord('pubmed', { title: 'Sleep and mood', authors: ['Ann Lee'], year: 2020, pmid: '111' });
        const byDoi = createRecord('crossref', {
            title: 'Sleep and Mood',
            authors: ['Ann Lee'],
            year: 2020,
            doi: '10.5555/sm.1',
            pmid: '111',
        });

        it('should store new records and log the search', () => {
            const empty = createSession('sleep', NOW);

            const session = addRecordsToSession(empty, [byPmid], 'sleep mood', 'pubmed', { now: LATER });

            expect(Object.keys(session.papers)).toEqual(['pmid:111']);
            expect(session.updated_at).toBe('2024-03-06T08:30:00.000Z');
            expect(session.searches_performed).toEqual([
                { source: 'pubmed', query: 'sleep mood', timestamp: '2024-03-06T08:30:00.000Z', result_count: 1 },
            ]);
            expect(empty.papers).toEqual({});
        });

        it('should merge a matching record and re-key it under the better identifier', () => {
            const first = addRecordsToSession(createSession('sleep', NOW), [byPmid], 'q1', 'pubmed', { now: NOW });

            const second = addRecordsToSession(first, [byDoi], 'q2', 'crossref', { now: LATER });

            expect(Object.keys(second.papers)).toEqual(['10.5555/sm.1']);
            expect(second.papers['10.5555/sm.1']?.origin).toEqual(['crossref', 'pubmed']);
            expect(second.papers['10.5555/sm.1']?.title).toBe('Sleep and Mood');
            expect(second.searches_performed).toHaveLength(2);
            expect(Object.keys(first.papers)).toEqual(['pmid:111']);
        });

        it('should never merge a different paper stored under the same title key', () => {
            const a = createRecord('crossref', { title: 'Sleep and mood', year: 2019 });
            const b = createRecord('pubmed', { title: 'Sleep and mood', year: 2021 });

            const session = addRecordsToSession(createSession('sleep', NOW), [a, b], 'q', 'search', { now: NOW });

            expect(Object.keys(session.papers)).toEqual(['title:sleep and mood']);
            expect(session.papers['title:sleep and mood']?.year).toBe(2019);
        });

        it('should not re-key onto a key held by a different paper', () => {
            const held = createRecord('semantic_scholar', { title: 'Sleep in teenagers', year: 2018, source_id: 'abc' });
            const stored = createRecord('crossref', { title: 'Mood in older adults', year: 2019 });
            const storedKey = sessionKey(stored) ?? '';
            const session = { ...createSession('mood', NOW), papers: { 's2:abc': held, [storedKey]: stored } };
            const incoming = createRecord('semantic_scholar', { title: 'Mood in older adults', year: 2019, source_id: 'abc' });

            const updated = addRecordsToSession(session, [incoming], 'mood', 'semantic_scholar', { now: LATER });

            expect(Object.keys(updated.papers).sort()).toEqual([storedKey, 's2:abc'].sort());
            expect(updated.papers['s2:abc']).toEqual(held);
            expect(updated.papers[storedKey]?.source_id).toBe('abc');
            expect(updated.papers[storedKey]?.origin).toEqual(['crossref', 'semantic_scholar']);
        });

        it('should skip records without any key but still count them', () => {
            const session = addRecordsToSession(createSession('x', NOW), [createRecord('crossref', {})], 'q', 'crossref', { now: NOW });

            expect(session.papers).toEqual({});
            expect(session.searches_performed[0]?.result_count).toBe(1);
        });
    });

    describe('addCitationsToSession', () => {
        it('should store citing papers by Semantic Scholar id, else DOI', () => {
            const records = [
                createRecord('semantic_scholar', { source_id: 'c1', doi: '10.5555/c.1' }),
                createRecord('crossref', { doi: '10.5555/c.2' }),
                createRecord('crossref', { title: 'No identifiers' }),
            ];

            const session = addCitationsToSession(createSession('x', NOW), 'p1', 'citedBy', records, LATER);

            expect(session.citation_graph).toEqual({ p1: { cites: [], cited_by: ['c1', '10.5555/c.2'] } });
            expect(session.updated_at).toBe('2024-03-06T08:30:00.000Z');
        });

        it('should keep the other direction when adding references', () => {
            const withCitations = addCitationsToSession(
                createSession('x', NOW),
                'p1',
                'citedBy',
                [createRecord('semantic_scholar', { source_id: 'c1' })],
                NOW
            );

            const session = addCitationsToSession(
                withCitations,
                'p1',
                'references',
                [createRecord('semantic_scholar', { source_id: 'r1' })],
                NOW
            );

            expect(session.citation_graph['p1']).toEqual({ cites: ['r1'], cited_by: ['c1'] });
        });
    });

    describe('files', () => {
        let dir: string;

        beforeEach(() => {
            dir = mkdtempSync(join(tmpdir(), 'paper-reconcile-session-'));
        });

        afterEach(() => {
            rmSync(dir, { recursive: true, force: true });
        });

        it('should save and load a session unchanged', () => {
            const record = createRecord('pubmed', { title: 'Sleep and mood', pmid: '111', year: 2020 });
            const session = addRecordsToSession(createSession('sleep', NOW), [record], 'q', 'pubmed', { now: NOW });

            const path = saveSession(session, dir);

            expect(path).toBe(join(dir, 'research_session_sleep_2024-03-05.json'));
            expect(readdirSync(dir)).toEqual(['research_session_sleep_2024-03-05.json']);
            expect(loadSession(path)).toEqual(session);
        });

        it('should fill in defaults for fields older files lack', () => {
            const path = join(dir, 'research_session_old_2023-01-01.json');
            writeFileSync(path, JSON.stringify({
                session_id: 'abc',
                topic: 'old',
                created_at: '2023-01-01T00:00:00.000Z',
                updated_at: '2023-01-01T00:00:00.000Z',
                filename: 'research_session_old_2023-01-01.json',
                papers: { 'pmid:1': { title: 'Old paper', pmid: '1', origin: ['pubmed'] } },
            }));

            const session = loadSession(path);

            expect(session.searches_performed).toEqual([]);
            expect(session.citation_graph).toEqual({});
            expect(session.papers['pmid:1']?.provenance).toEqual({});
            expect(session.papers['pmid:1']?.authors).toEqual([]);
            expect(session.papers['pmid:1']?.citation_count).toBe(0);
        });

        it('should reject files that are missing, not JSON, or not sessions', () => {
            const notJson = join(dir, 'broken.json');
            writeFileSync(notJson, '{ nope');
            const notSession = join(dir, 'other.json');
            writeFileSync(notSession, JSON.stringify({ topic: 'x' }));

            expect(() => loadSession(join(dir, 'missing.json'))).toThrow(MalformedInputError);
            expect(() => loadSession(notJson)).toThrow('session file is not valid JSON');
            expect(() => loadSession(notSession)).toThrow(/not a session file at session_id/);
        });

        it('should list sessions by file name and skip unreadable ones', () => {
            saveSession(createSession('beta', NOW), dir);
            saveSession(createSession('alpha', NOW), dir);
            writeFileSync(join(dir, 'research_session_broken_2024-01-01.json'), '{');
            writeFileSync(join(dir, 'notes.json'), '{}');

            const summaries = listSessions(dir);

            expect(summaries.map((s) => s.topic)).toEqual(['alpha', 'beta']);
            expect(summaries[0]).toMatchObject({ paper_count: 0, updated_at: '2024-03-05T10:00:00.000Z' });
        });

        it('should list nothing for a missing directory', () => {
            expect(listSessions(join(dir, 'nope'))).toEqual([]);
        });
    });
});
