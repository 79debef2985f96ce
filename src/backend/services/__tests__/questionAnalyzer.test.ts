/**
 * Question Analyzer Tests
 */

import * as fc from 'fast-check';
import { DEFAULT_ANALYZER_CONFIG, QuestionAnalyzer, createQuestionAnalyzer } from '../questionAnalyzer';

describe('QuestionAnalyzer', () => {
    let analyzer: QuestionAnalyzer;

    beforeEach(() => {
        analyzer = createQuestionAnalyzer();
    });

    describe('isGreeting', () => {
        it('should accept a greeting token with punctuation', () => {
            expect(analyzer.classify('Olá!').isGreeting).toBe(true);
        });

        it('should not match a greeting inside a longer question', () => {
            expect(analyzer.classify('Olá, qual o valor do salário do aprendiz?').isGreeting).toBe(false);
        });

        it('should normalize case and inner whitespace', () => {
            expect(analyzer.isGreeting('  Bom   dia!! ')).toBe(true);
        });

        it('should use a custom greeting set', () => {
            const custom = createQuestionAnalyzer({ greetingTokens: ['salve'] });

            expect(custom.isGreeting('Salve!')).toBe(true);
            expect(custom.isGreeting('oi')).toBe(false);
        });
    });

    describe('splitQuestions', () => {
        it('should split on a conjunction followed by an interrogative', () => {
            expect(analyzer.splitQuestions('Qual a idade mínima e qual o salário?')).toEqual([
                'Qual a idade mínima?',
                'qual o salário?',
            ]);
        });

        it('should split on question marks', () => {
            expect(analyzer.splitQuestions('Qual a cota? Como contratar?')).toEqual([
                'Qual a cota?',
                'Como contratar?',
            ]);
        });

        it('should not split a conjunction joining nouns', () => {
            expect(analyzer.splitQuestions('Qual a diferença entre aprendiz e estagiário?')).toEqual([
                'Qual a diferença entre aprendiz e estagiário?',
            ]);
        });

        it('should return nothing for blank text', () => {
            expect(analyzer.splitQuestions('   ')).toEqual([]);
        });
    });

    describe('classify', () => {
        it('should flag the pattern-based signals', () => {
            const profile = analyzer.classify('Preciso saber o que diz a CLT sobre 6 horas?');

            expect(profile).toMatchObject({
                isGreeting: false,
                hasMultipleParts: false,
                isRequirement: true,
                hasLegalReference: true,
                containsNumbers: true,
                isInterrogative: false,
            });
        });

        it('should rate a single short question as simple', () => {
            expect(analyzer.classify('Qual a idade mínima?').complexity).toBe('simple');
        });

        it('should rate a comparison with a legal reference as medium', () => {
            const profile = analyzer.classify('Qual a diferença entre o artigo 428 e o 429?');

            expect(profile.isComparison).toBe(true);
            expect(profile.hasLegalReference).toBe(true);
            expect(profile.complexity).toBe('medium');
        });

        it('should rate a multi-part comparison as complex', () => {
            const profile = analyzer.classify(
                'Qual a diferença entre contrato de aprendiz e estágio? E o que diz a lei sobre isso?'
            );

            expect(profile.hasMultipleParts).toBe(true);
            expect(profile.subQuestions).toHaveLength(2);
            expect(profile.complexity).toBe('complex');
        });
    });

    describe('extractKeywords', () => {
        it('should report domain keywords in vocabulary order', () => {
            expect(
                analyzer.extractKeywords('Qual o SALÁRIO do aprendiz e a duração do contrato?')
            ).toEqual(['aprendiz', 'contrato', 'salário']);
        });

        it('should match whole words only', () => {
            expect(analyzer.extractKeywords('Programa de aprendizagem')).toEqual([]);
        });
    });

    describe('analyzeHistory', () => {
        it('should classify user turns and count assistant words', () => {
            const timestamp = new Date('2026-03-02T10:00:00.000Z');
            const analysis = analyzer.analyzeHistory([
                { role: 'user', content: 'Oi', timestamp },
                { role: 'assistant', content: 'Olá, tudo bem?', timestamp },
            ]);

            expect(analysis).toHaveLength(2);
            expect(analysis[0]).toMatchObject({ type: 'user', content: 'Oi', analysis: { isGreeting: true } });
            expect(analysis[1]).toEqual({ type: 'assistant', content: 'Olá, tudo bem?', wordCount: 3 });
        });
    });
});

describe('Property-Based Tests', () => {
    const token = fc.constantFrom(...DEFAULT_ANALYZER_CONFIG.greetingTokens);
    const padding = fc.stringOf(fc.constantFrom(' ', '!', '.', ',', '?'));

    describe('Property 7: Greeting classification is exact', () => {
        it('should accept any greeting token surrounded by whitespace and punctuation', () => {
            const analyzer = createQuestionAnalyzer();
            fc.assert(
                fc.property(token, padding, padding, (greeting, before, after) => {
                    expect(analyzer.isGreeting(`${before}${greeting}${after}`)).toBe(true);
                }),
                { numRuns: 100 }
            );
        });

        it('should reject a greeting followed by a question', () => {
            const analyzer = createQuestionAnalyzer();
            fc.assert(
                fc.property(token, (greeting) => {
                    expect(analyzer.isGreeting(`${greeting}, qual o salário do aprendiz?`)).toBe(false);
                }),
                { numRuns: 100 }
            );
        });
    });

    describe('Property 8: Every sub-question ends in a question mark', () => {
        it('should end every part with "?" and never return an empty part', () => {
            const analyzer = createQuestionAnalyzer();
            fc.assert(
                fc.property(fc.string(), (text) => {
                    for (const part of analyzer.splitQuestions(text)) {
                        expect(part.endsWith('?')).toBe(true);
                        expect(part.length).toBeGreaterThan(1);
                    }
                }),
                { numRuns: 100 }
            );
        });
    });
});
