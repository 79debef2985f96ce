/**
 * Session Context Service
 *
 * Holds everything one conversation knows about itself:
 * - the company profile and the attributes derived from it
 * - the conversation history
 *
 * The history is one append-only log of typed turns. The two views callers
 * need (question/answer entries and chat turns) are computed from that log
 * on read, so an entry can never exist in one view without the other.
 *
 * State axes:
 * - profile: uninitialized → initialized (replaced wholesale on resubmission)
 * - history: empty ⇄ non-empty (clear() keeps the profile)
 */

import {
    CompanyProfile,
    CompanySizeCategory,
    ContextExport,
    ContextSummary,
    ConversationEntry,
    ConversationTurn,
    ProgramStage,
    UninitializedContextSummary,
} from '../../shared/types';
import { ValidationError } from './errors';

export const CONTEXT_SCHEMA_VERSION = '1.1';

export const REQUIRED_PROFILE_FIELDS = ['name', 'sector', 'employeeCount', 'hasProgram'] as const;

export const DEFAULT_HISTORY_LIMIT = 5;

/**
 * Size band of a company by employee count.
 */
export function categorizeCompanySize(employeeCount: number): CompanySizeCategory {
    if (employeeCount < 20) {
        return 'micro';
    }
    if (employeeCount < 100) {
        return 'small';
    }
    if (employeeCount < 500) {
        return 'medium';
    }
    return 'large';
}

export function programStage(hasProgram: boolean): ProgramStage {
    return hasProgram ? 'experienced' : 'beginner';
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates raw company data and returns a detached copy.
 *
 * @throws ValidationError naming exactly the missing fields, or, when none
 * is missing, the fields with the wrong type
 */
export function parseCompanyProfile(data: unknown): CompanyProfile {
    if (!isRecord(data)) {
        throw new ValidationError('Company profile must be an object', [...REQUIRED_PROFILE_FIELDS]);
    }

    const missing = REQUIRED_PROFILE_FIELDS.filter(
        (field) => data[field] === undefined || data[field] === null
    );
    if (missing.length > 0) {
        throw new ValidationError(`Missing required profile fields: ${missing.join(', ')}`, missing);
    }

    const { name, sector, employeeCount, hasProgram, extra } = data;
    const invalid: string[] = [];

    if (typeof name !== 'string') {
        invalid.push('name');
    }
    if (typeof sector !== 'string') {
        invalid.push('sector');
    }
    if (typeof employeeCount !== 'number' || !Number.isInteger(employeeCount) || employeeCount < 0) {
        invalid.push('employeeCount');
    }
    if (typeof hasProgram !== 'boolean') {
        invalid.push('hasProgram');
    }
    if (extra !== undefined && !isRecord(extra)) {
        invalid.push('extra');
    }

    if (
        invalid.length > 0 ||
        typeof name !== 'string' ||
        typeof sector !== 'string' ||
        typeof employeeCount !== 'number' ||
        typeof hasProgram !== 'boolean'
    ) {
        throw new ValidationError(`Invalid profile fields: ${invalid.join(', ')}`, invalid);
    }

    return {
        name,
        sector,
        employeeCount,
        hasProgram,
        extra: isRecord(extra) ? structuredClone(extra) : {},
    };
}

function copyProfile(profile: CompanyProfile): CompanyProfile {
    return { ...profile, extra: structuredClone(profile.extra) };
}

/**
 * Profile together with the attributes derived from it. Always written as a
 * whole, so the derived values never outlive the profile they came from.
 */
interface CompanyState {
    profile: CompanyProfile;
    sizeCategory: CompanySizeCategory;
    stage: ProgramStage;
}

/**
 * The two history views returned by recent().
 */
export interface RecentHistory {
    entries: ConversationEntry[];
    turns: ConversationTurn[];
}

export class SessionContext {
    private company: CompanyState | null = null;
    private turns: ConversationTurn[] = [];
    private lastUpdate: Date;

    constructor(private readonly now: () => Date = () => new Date()) {
        this.lastUpdate = now();
    }

    /**
     * Replaces the company profile (no merge with the previous one).
     *
     * @throws ValidationError when required fields are missing or ill-typed
     */
    setProfile(data: unknown): void {
        const profile = parseCompanyProfile(data);
        this.company = {
            profile,
            sizeCategory: categorizeCompanySize(profile.employeeCount),
            stage: programStage(profile.hasProgram),
        };
        this.lastUpdate = this.now();
    }

    hasProfile(): boolean {
        return this.company !== null;
    }

    getProfile(): CompanyProfile | null {
        return this.company ? copyProfile(this.company.profile) : null;
    }

    getSizeCategory(): CompanySizeCategory | null {
        return this.company?.sizeCategory ?? null;
    }

    getStage(): ProgramStage | null {
        return this.company?.stage ?? null;
    }

    /**
     * Records a question and its answer as one user turn plus one assistant turn.
     *
     * @throws ValidationError if either argument is not a string
     */
    appendTurn(question: unknown, answer: unknown): void {
        if (typeof question !== 'string' || typeof answer !== 'string') {
            const fields: string[] = [];
            if (typeof question !== 'string') {
                fields.push('question');
            }
            if (typeof answer !== 'string') {
                fields.push('answer');
            }
            throw new ValidationError('Question and answer must be strings', fields);
        }

        const timestamp = this.now();
        this.turns.push(
            { role: 'user', content: question.trim(), timestamp },
            { role: 'assistant', content: answer.trim(), timestamp }
        );
        this.lastUpdate = timestamp;
    }

    /**
     * Chat-turn view of the whole history, oldest first.
     */
    messages(): ConversationTurn[] {
        return this.turns.map((turn) => ({ ...turn, timestamp: new Date(turn.timestamp) }));
    }

    /**
     * Question/answer view of the whole history, oldest first.
     */
    entries(): ConversationEntry[] {
        const entries: ConversationEntry[] = [];
        for (let i = 0; i + 1 < this.turns.length; i += 2) {
            const user = this.turns[i];
            const assistant = this.turns[i + 1];
            if (user && assistant) {
                entries.push({
                    question: user.content,
                    answer: assistant.content,
                    timestamp: new Date(user.timestamp),
                });
            }
        }
        return entries;
    }

    interactionCount(): number {
        return Math.floor(this.turns.length / 2);
    }

    /**
     * The last `limit` entries and the last `2 * limit` chat turns.
     *
     * @throws ValidationError unless limit is an integer ≥ 1
     */
    recent(limit: number = DEFAULT_HISTORY_LIMIT): RecentHistory {
        if (!Number.isInteger(limit) || limit < 1) {
            throw new ValidationError('Limit must be a positive integer', ['limit']);
        }

        return {
            entries: this.entries().slice(-limit),
            turns: this.messages().slice(-limit * 2),
        };
    }

    summary(): ContextSummary | UninitializedContextSummary {
        if (!this.company) {
            return {
                error: 'Company context not initialized',
                interactionCount: 0,
                lastInteraction: null,
                contextAgeMinutes: 0,
            };
        }

        const entries = this.entries();
        return {
            profile: copyProfile(this.company.profile),
            interactionCount: entries.length,
            lastInteraction: entries[entries.length - 1] ?? null,
            contextAgeMinutes: Math.floor((this.now().getTime() - this.lastUpdate.getTime()) / 60000),
            sizeCategory: this.company.sizeCategory,
            stage: this.company.stage,
        };
    }

    /**
     * Empties the history, keeps the profile.
     */
    clear(): void {
        this.turns = [];
        this.lastUpdate = this.now();
    }

    export(): ContextExport {
        const entries = this.entries();
        return {
            profile: this.company ? copyProfile(this.company.profile) : null,
            sizeCategory: this.company?.sizeCategory ?? null,
            stage: this.company?.stage ?? null,
            conversationHistory: entries.map((entry) => ({
                question: entry.question,
                answer: entry.answer,
                timestamp: entry.timestamp.toISOString(),
            })),
            lastUpdate: this.lastUpdate.toISOString(),
            metadata: {
                exportTime: this.now().toISOString(),
                interactionCount: entries.length,
                schemaVersion: CONTEXT_SCHEMA_VERSION,
            },
        };
    }
}

export function isInitializedSummary(
    summary: ContextSummary | UninitializedContextSummary
): summary is ContextSummary {
    return !('error' in summary);
}
