/**
 * Session Registry Service
 *
 * Process-local map of conversation sessions, keyed by UUID.
 * Sessions live only as long as the process; there is no persistence.
 *
 * Requests against one session are serialized through runExclusive(), so a
 * question's answer is recorded before the next question of the same session
 * reads the history. Different sessions never wait on each other.
 */

import { v4 as uuidv4 } from 'uuid';
import { SessionContext } from './sessionContext';

export interface Session {
    id: string;
    createdAt: Date;
    context: SessionContext;
}

export class SessionRegistry {
    private sessions: Map<string, Session> = new Map();
    private queues: Map<string, Promise<unknown>> = new Map();

    constructor(private readonly now: () => Date = () => new Date()) {}

    create(): Session {
        const session: Session = {
            id: uuidv4(),
            createdAt: this.now(),
            context: new SessionContext(this.now),
        };
        this.sessions.set(session.id, session);
        return session;
    }

    get(id: string): Session | undefined {
        return this.sessions.get(id);
    }

    /**
     * @returns true if the session existed
     */
    delete(id: string): boolean {
        this.queues.delete(id);
        return this.sessions.delete(id);
    }

    size(): number {
        return this.sessions.size;
    }

    /**
     * Runs `task` after every task previously queued for the same session has
     * settled. A failing task does not block the ones queued after it.
     */
    runExclusive<T>(id: string, task: () => Promise<T>): Promise<T> {
        const previous = this.queues.get(id) ?? Promise.resolve();
        const result = previous.then(task, task);
        const tail = result.then(
            () => undefined,
            () => undefined
        );
        this.queues.set(id, tail);

        void tail.then(() => {
            if (this.queues.get(id) === tail) {
                this.queues.delete(id);
            }
        });

        return result;
    }
}

export function createSessionRegistry(): SessionRegistry {
    return new SessionRegistry();
}
