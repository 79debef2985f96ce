/**
 * Question Analyzer Service
 *
 * Classifies incoming questions so the pipeline can short-circuit greetings
 * and the prompt can adapt to multi-part or comparison questions.
 * All vocabularies are Portuguese, the language the assistant is used in.
 */

import { ConversationTurn, QuestionComplexity, QuestionProfile } from '../../shared/types';

export interface QuestionAnalyzerConfig {
    /** Closed set of greeting tokens, matched exactly after trimming */
    greetingTokens: string[];
    /** Domain vocabulary for keyword extraction, in reporting order */
    domainKeywords: string[];
    /** Interrogative words that may start a sub-question */
    interrogatives: string[];
    /** Coordinating conjunctions that may join two questions */
    conjunctions: string[];
}

export const DEFAULT_ANALYZER_CONFIG: QuestionAnalyzerConfig = {
    greetingTokens: [
        'oi', 'olá', 'ola', 'hi', 'hello', 'ei',
        'bom dia', 'boa tarde', 'boa noite', 'hey',
    ],
    domainKeywords: [
        'aprendiz', 'contrato', 'idade', 'salário', 'curso',
        'escola', 'horário', 'férias', 'direitos', 'deveres',
        'cota', 'contratação', 'rescisão', 'benefícios',
    ],
    interrogatives: ['como', 'qual', 'quando', 'onde', 'por que', 'porque', 'quem', 'quanto'],
    conjunctions: ['e', 'ou'],
};

const QUESTION_PATTERNS = {
    multiPart: /\?.*\?/,
    numerical: /\d+/,
    comparison: /diferença|versus|comparação|entre/i,
    requirement: /preciso|necessário|obrigatório/i,
    legal: /lei|artigo|legislação|clt/i,
} as const;

/**
 * Analysis of one turn of a conversation.
 */
export type TurnAnalysis =
    | { type: 'user'; content: string; analysis: QuestionProfile }
    | { type: 'assistant'; content: string; wordCount: number };

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function countWords(text: string): number {
    return text.split(/\s+/).filter((word) => word.length > 0).length;
}

export class QuestionAnalyzer {
    private readonly config: QuestionAnalyzerConfig;
    private readonly greetings: Set<string>;
    private readonly interrogativePattern: RegExp;
    private readonly splitPattern: RegExp;
    private readonly keywordPatterns: Array<{ keyword: string; pattern: RegExp }>;

    constructor(config: Partial<QuestionAnalyzerConfig> = {}) {
        this.config = { ...DEFAULT_ANALYZER_CONFIG, ...config };
        this.greetings = new Set(this.config.greetingTokens.map((token) => token.toLowerCase()));

        const interrogatives = this.config.interrogatives.map(escapeRegExp).join('|');
        const conjunctions = this.config.conjunctions.map(escapeRegExp).join('|');
        this.interrogativePattern = new RegExp(interrogatives, 'i');
        this.splitPattern = new RegExp(`\\s+(?:${conjunctions})\\s+(?=${interrogatives})`, 'gi');

        // Unicode-aware whole-word match: \b only knows ASCII letters
        this.keywordPatterns = this.config.domainKeywords.map((keyword) => ({
            keyword,
            pattern: new RegExp(`(?<![\\p{L}\\p{N}_])${escapeRegExp(keyword)}(?![\\p{L}\\p{N}_])`, 'iu'),
        }));
    }

    classify(question: string): QuestionProfile {
        const subQuestions = this.splitQuestions(question);
        const hasMultipleParts = QUESTION_PATTERNS.multiPart.test(question);
        const isComparison = QUESTION_PATTERNS.comparison.test(question);
        const hasLegalReference = QUESTION_PATTERNS.legal.test(question);

        return {
            isGreeting: this.isGreeting(question),
            hasMultipleParts,
            isComparison,
            isRequirement: QUESTION_PATTERNS.requirement.test(question),
            hasLegalReference,
            isInterrogative: this.interrogativePattern.test(question),
            containsNumbers: QUESTION_PATTERNS.numerical.test(question),
            subQuestions,
            complexity: this.evaluateComplexity({
                hasMultipleParts,
                isComparison,
                hasLegalReference,
                wordCount: countWords(question),
                subQuestionCount: subQuestions.length,
            }),
            keywords: this.extractKeywords(question),
        };
    }

    /**
     * Exact match against the greeting set after trimming surrounding
     * whitespace and punctuation. "Olá!" is a greeting, "Olá, qual ..." is not.
     */
    isGreeting(text: string): boolean {
        const normalized = text
            .toLowerCase()
            .replace(/^[\s!.,?;:]+|[\s!.,?;:]+$/g, '')
            .replace(/\s+/g, ' ');
        return this.greetings.has(normalized);
    }

    /**
     * Splits a text into its individual questions, each ending in "?".
     * A conjunction directly followed by an interrogative word starts a new
     * question: "Qual a idade mínima e qual o salário?" yields two.
     */
    splitQuestions(text: string): string[] {
        return text
            .replace(this.splitPattern, '? ')
            .split('?')
            .map((part) => part.trim())
            .filter((part) => part.length > 0)
            .map((part) => `${part}?`);
    }

    extractKeywords(text: string): string[] {
        return this.keywordPatterns
            .filter(({ pattern }) => pattern.test(text))
            .map(({ keyword }) => keyword);
    }

    /**
     * Annotates a turn list: user turns with their classification, assistant
     * turns with their length in words.
     */
    analyzeHistory(turns: ConversationTurn[]): TurnAnalysis[] {
        return turns.map((turn): TurnAnalysis =>
            turn.role === 'user'
                ? { type: 'user', content: turn.content, analysis: this.classify(turn.content) }
                : { type: 'assistant', content: turn.content, wordCount: countWords(turn.content) }
        );
    }

    private evaluateComplexity(signals: {
        hasMultipleParts: boolean;
        isComparison: boolean;
        hasLegalReference: boolean;
        wordCount: number;
        subQuestionCount: number;
    }): QuestionComplexity {
        let score = 0;

        if (signals.hasMultipleParts) {
            score += 2;
        }
        if (signals.isComparison) {
            score += 2;
        }
        if (signals.wordCount > 20) {
            score += 1;
        }
        if (signals.hasLegalReference) {
            score += 1;
        }
        if (signals.subQuestionCount > 1) {
            score += 2;
        }

        if (score <= 2) {
            return 'simple';
        }
        if (score <= 4) {
            return 'medium';
        }
        return 'complex';
    }
}

export function createQuestionAnalyzer(config?: Partial<QuestionAnalyzerConfig>): QuestionAnalyzer {
    return new QuestionAnalyzer(config);
}
