import { v4 as uuidv4 } from 'uuid';
import { describeError } from './ErrorMapping';

export type RequestPhase = 'received' | 'authorized' | 'validated' | 'dispatched' | 'completed' | 'failed';

const NEXT_PHASE: Readonly<Record<RequestPhase, readonly RequestPhase[]>> = {
    received: ['authorized', 'failed'],
    authorized: ['validated', 'failed'],
    validated: ['dispatched', 'failed'],
    dispatched: ['completed', 'failed'],
    completed: [],
    failed: [],
};

/**
 * Lifecycle of one request: received → authorized → validated → dispatched →
 * completed | failed. Owned by the call handling that request.
 */
export class RequestTrace {
    readonly id: string;
    private current: RequestPhase = 'received';
    private readonly startedAt = Date.now();

    constructor(readonly operation: string, id: string = uuidv4()) {
        this.id = id;
    }

    get phase(): RequestPhase {
        return this.current;
    }

    advance(next: Exclude<RequestPhase, 'received' | 'failed'>, detail?: string): void {
        this.transition(next);
        if (next === 'completed') {
            console.log(`[${this.id}] ${this.operation} completed in ${Date.now() - this.startedAt}ms`);
        } else if (detail) {
            console.log(`[${this.id}] ${this.operation} ${next}: ${detail}`);
        }
    }

    fail(error: unknown): void {
        if (this.current === 'completed' || this.current === 'failed') {
            return;
        }
        const failedIn = this.current;
        this.transition('failed');
        const { kind, message } = describeError(error);
        console.warn(`[${this.id}] ${this.operation} failed after ${failedIn} (${kind}): ${message}`);
    }

    private transition(next: RequestPhase): void {
        if (!NEXT_PHASE[this.current].includes(next)) {
            throw new Error(`Invalid request transition ${this.current} -> ${next}`);
        }
        this.current = next;
    }
}
