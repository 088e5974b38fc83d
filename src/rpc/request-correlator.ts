/**
 * Request Correlator
 *
 * Maps outstanding request ids to the promise awaiting their response.
 * Each slot completes exactly once: the first of response, timeout or
 * transport failure wins, and anything arriving later for that id finds no
 * slot and is dropped.
 */

import { RequestTimeoutError } from '../errors.js';
import { withTimeout } from '../utils/timeout.js';

interface PendingCall<T> {
    method:  string
    resolve: (value: T) => void
    reject:  (error: Error) => void
}

export interface IssuedCall<T> {
    id:       number
    response: Promise<T>
}

export class RequestCorrelator<T> {
    private nextId = 1;
    private readonly pending = new Map<number, PendingCall<T>>();

    constructor(private readonly timeoutMs: number) {}

    /**
     * Allocate the next id and register its slot. Registration happens before
     * the caller sends anything, so even an immediate reply finds the slot.
     *
     * `response` rejects with RequestTimeoutError once the deadline passes and
     * the slot is removed at that point.
     */
    issue(method: string): IssuedCall<T> {
        const id = this.nextId++;

        const settled = new Promise<T>((resolve, reject) => {
            this.pending.set(id, { method, resolve, reject });
        });

        const response = withTimeout(settled, this.timeoutMs, () => new RequestTimeoutError(method, this.timeoutMs))
            .finally(() => {
                this.pending.delete(id);
            });

        return { id, response };
    }

    /**
     * Deliver a response. Returns false when no slot is waiting for `id`
     * (already resolved, timed out, or never issued).
     */
    resolve(id: number, value: T): boolean {
        const call = this.pending.get(id);
        if(!call) {
            return false;
        }
        this.pending.delete(id);
        call.resolve(value);
        return true;
    }

    /** Fail one pending call, e.g. when its request could not be written */
    reject(id: number, error: Error): boolean {
        const call = this.pending.get(id);
        if(!call) {
            return false;
        }
        this.pending.delete(id);
        call.reject(error);
        return true;
    }

    /** Fail every pending call; used when the transport closes */
    rejectAll(error: Error): number {
        const calls = [...this.pending.values()];
        this.pending.clear();
        for(const call of calls) {
            call.reject(error);
        }
        return calls.length;
    }

    get pendingCount(): number {
        return this.pending.size;
    }
}
