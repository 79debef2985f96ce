/**
 * Session Context Tests
 *
 * Profile validation and derived attributes, the two history views over
 * the single turn log, summaries and exports.
 */

import * as fc from 'fast-check';
import {
    SessionContext,
    categorizeCompanySize,
    isInitializedSummary,
    programStage,
} from '../sessionContext';
import { ValidationError } from '../errors';
import { CompanySizeCategory } from '../../../shared/types';

const ACME = { name: 'Acme', sector: 'Varejo', employeeCount: 15, hasProgram: false };

function captureError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    return undefined;
}

describe('categorizeCompanySize', () => {
    const bands: Array<[number, CompanySizeCategory]> = [
        [0, 'micro'],
        [19, 'micro'],
        [20, 'small'],
        [99, 'small'],
        [100, 'medium'],
        [499, 'medium'],
        [500, 'large'],
        [12000, 'large'],
    ];

    it.each(bands)('should place %d employees in the %s band', (employeeCount, expected) => {
        expect(categorizeCompanySize(employeeCount)).toBe(expected);
    });
});

describe('SessionContext', () => {
    let current: Date;
    let context: SessionContext;

    beforeEach(() => {
        current = new Date('2026-03-02T10:00:00.000Z');
        context = new SessionContext(() => current);
    });

    describe('setProfile', () => {
        it('should derive size category and stage from the profile', () => {
            context.setProfile(ACME);

            expect(context.getSizeCategory()).toBe('micro');
            expect(context.getStage()).toBe('beginner');
            expect(context.hasProfile()).toBe(true);
        });

        it('should name exactly the missing fields', () => {
            const error = captureError(() => context.setProfile({ name: 'Acme', sector: 'Varejo' }));

            expect(error).toBeInstanceOf(ValidationError);
            expect(error).toMatchObject({ fields: ['employeeCount', 'hasProgram'] });
            expect(context.hasProfile()).toBe(false);
        });

        it('should treat null values as missing', () => {
            const error = captureError(() => context.setProfile({ ...ACME, sector: null }));

            expect(error).toMatchObject({ fields: ['sector'] });
        });

        it('should report every field when the input is not an object', () => {
            const error = captureError(() => context.setProfile('Acme'));

            expect(error).toBeInstanceOf(ValidationError);
            expect(error).toMatchObject({ fields: ['name', 'sector', 'employeeCount', 'hasProgram'] });
        });

        it('should reject ill-typed fields', () => {
            const error = captureError(() =>
                context.setProfile({ name: 'Acme', sector: 'Varejo', employeeCount: -3, hasProgram: 'no' })
            );

            expect(error).toBeInstanceOf(ValidationError);
            expect(error).toMatchObject({ fields: ['employeeCount', 'hasProgram'] });
        });

        it('should reject a fractional employee count', () => {
            const error = captureError(() => context.setProfile({ ...ACME, employeeCount: 10.5 }));

            expect(error).toMatchObject({ fields: ['employeeCount'] });
        });

        it('should replace the previous profile wholesale', () => {
            context.setProfile({ ...ACME, extra: { city: 'Recife' } });
            context.setProfile({ name: 'Beta', sector: 'Indústria', employeeCount: 800, hasProgram: true });

            expect(context.getProfile()).toEqual({
                name: 'Beta',
                sector: 'Indústria',
                employeeCount: 800,
                hasProgram: true,
                extra: {},
            });
            expect(context.getSizeCategory()).toBe('large');
            expect(context.getStage()).toBe('experienced');
        });

        it('should keep a copy independent of the caller input', () => {
            const input = { ...ACME, extra: { city: 'Recife' } };
            context.setProfile(input);
            input.extra.city = 'Natal';
            input.name = 'Changed';

            expect(context.getProfile()).toMatchObject({ name: 'Acme', extra: { city: 'Recife' } });
        });
    });

    describe('appendTurn', () => {
        it('should record a trimmed question and answer in both views', () => {
            context.appendTurn('  Qual a idade mínima?  ', ' 14 anos. \n');

            expect(context.entries()).toEqual([
                { question: 'Qual a idade mínima?', answer: '14 anos.', timestamp: current },
            ]);
            expect(context.messages().map((turn) => [turn.role, turn.content])).toEqual([
                ['user', 'Qual a idade mínima?'],
                ['assistant', '14 anos.'],
            ]);
        });

        it('should reject non-text arguments without recording anything', () => {
            const error = captureError(() => context.appendTurn('Pergunta', 42));

            expect(error).toBeInstanceOf(ValidationError);
            expect(error).toMatchObject({ fields: ['answer'] });
            expect(context.messages()).toEqual([]);
        });
    });

    describe('recent', () => {
        it('should default to the last five entries', () => {
            for (let i = 0; i < 7; i++) {
                context.appendTurn(`q${i}`, `a${i}`);
            }

            const { entries, turns } = context.recent();

            expect(entries.map((entry) => entry.question)).toEqual(['q2', 'q3', 'q4', 'q5', 'q6']);
            expect(turns).toHaveLength(10);
            expect(turns[0]?.content).toBe('q2');
        });

        it.each([0, -1, 2.5, Number.NaN])('should reject limit %p', (limit) => {
            expect(() => context.recent(limit)).toThrow(ValidationError);
        });
    });

    describe('summary', () => {
        it('should return the fixed shape when no profile is set', () => {
            expect(context.summary()).toEqual({
                error: 'Company context not initialized',
                interactionCount: 0,
                lastInteraction: null,
                contextAgeMinutes: 0,
            });
        });

        it('should report the last interaction and the context age in whole minutes', () => {
            context.setProfile(ACME);
            context.appendTurn('Oi', 'Olá!');
            current = new Date('2026-03-02T10:07:30.000Z');

            const summary = context.summary();

            expect(isInitializedSummary(summary)).toBe(true);
            expect(summary).toMatchObject({
                interactionCount: 1,
                lastInteraction: { question: 'Oi', answer: 'Olá!' },
                contextAgeMinutes: 7,
                sizeCategory: 'micro',
                stage: 'beginner',
            });
        });
    });

    describe('clear', () => {
        it('should empty the history and keep the profile', () => {
            context.setProfile(ACME);
            context.appendTurn('Oi', 'Olá!');
            current = new Date('2026-03-02T11:00:00.000Z');

            context.clear();

            expect(context.entries()).toEqual([]);
            expect(context.messages()).toEqual([]);
            expect(context.getProfile()).toMatchObject({ name: 'Acme' });
            expect(context.summary()).toMatchObject({ contextAgeMinutes: 0 });
        });
    });

    describe('export', () => {
        it('should produce a serializable snapshot', () => {
            context.setProfile(ACME);
            context.appendTurn('Oi', 'Olá!');
            current = new Date('2026-03-02T10:05:00.000Z');

            const snapshot = context.export();

            expect(snapshot).toEqual({
                profile: { ...ACME, extra: {} },
                sizeCategory: 'micro',
                stage: 'beginner',
                conversationHistory: [
                    { question: 'Oi', answer: 'Olá!', timestamp: '2026-03-02T10:00:00.000Z' },
                ],
                lastUpdate: '2026-03-02T10:00:00.000Z',
                metadata: {
                    exportTime: '2026-03-02T10:05:00.000Z',
                    interactionCount: 1,
                    schemaVersion: '1.1',
                },
            });
            expect(JSON.parse(JSON.stringify(snapshot))).toEqual(snapshot);
        });

        it('should export nulls without a profile', () => {
            expect(context.export()).toMatchObject({ profile: null, sizeCategory: null, stage: null });
        });
    });
});

describe('Property-Based Tests', () => {
    const validProfile = fc.record({
        name: fc.string({ minLength: 1 }),
        sector: fc.string({ minLength: 1 }),
        employeeCount: fc.nat({ max: 100000 }),
        hasProgram: fc.boolean(),
    });

    describe('Property 1: Derived attributes are pure functions of the profile', () => {
        it('should recompute size category and stage identically on every set', () => {
            fc.assert(
                fc.property(validProfile, (profile) => {
                    const context = new SessionContext();
                    const expectedSize =
                        profile.employeeCount < 20
                            ? 'micro'
                            : profile.employeeCount < 100
                                ? 'small'
                                : profile.employeeCount < 500
                                    ? 'medium'
                                    : 'large';

                    context.setProfile(profile);
                    context.setProfile(profile);

                    expect(context.getSizeCategory()).toBe(expectedSize);
                    expect(context.getStage()).toBe(programStage(profile.hasProgram));
                    expect(context.getStage()).toBe(profile.hasProgram ? 'experienced' : 'beginner');
                }),
                { numRuns: 100 }
            );
        });
    });

    describe('Property 2: Both history views grow together', () => {
        it('should hold N entries and 2N chat turns after N appends', () => {
            fc.assert(
                fc.property(fc.array(fc.tuple(fc.string(), fc.string()), { maxLength: 30 }), (pairs) => {
                    const context = new SessionContext();
                    for (const [question, answer] of pairs) {
                        context.appendTurn(question, answer);
                    }

                    expect(context.entries()).toHaveLength(pairs.length);
                    expect(context.messages()).toHaveLength(pairs.length * 2);
                }),
                { numRuns: 100 }
            );
        });
    });

    describe('Property 3: recent() respects its limit', () => {
        it('should return min(N, limit) entries and min(2N, 2 * limit) turns', () => {
            fc.assert(
                fc.property(fc.nat({ max: 20 }), fc.integer({ min: 1, max: 25 }), (count, limit) => {
                    const context = new SessionContext();
                    for (let i = 0; i < count; i++) {
                        context.appendTurn(`q${i}`, `a${i}`);
                    }

                    const { entries, turns } = context.recent(limit);

                    expect(entries).toHaveLength(Math.min(count, limit));
                    expect(turns).toHaveLength(Math.min(2 * count, 2 * limit));
                }),
                { numRuns: 100 }
            );
        });
    });
});
