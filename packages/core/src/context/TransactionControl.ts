import { randomUUID } from 'node:crypto';
import { InvalidStateError } from '../errors.js';

/** Lifecycle of a {@link TransactionControl}. */
export type TransactionStatus = 'active' | 'committed' | 'aborted';

/**
 * Handle governing the lifetime and outcome of one transactional
 * pipeline execution.
 *
 * The transaction starts `active`. Exactly one of {@link complete} or
 * {@link abort} settles it; {@link dispose} aborts it if nobody did.
 *
 * @example
 * ```typescript
 * const tx = wrapper.enableTransactions();
 * try {
 *     // run the pipeline under test ...
 *     tx.complete();
 * } finally {
 *     tx.dispose();
 * }
 * tx.status; // "committed"
 * ```
 */
export class TransactionControl {
    public readonly id: string = randomUUID();
    private _status: TransactionStatus = 'active';

    public get status(): TransactionStatus {
        return this._status;
    }

    public get isActive(): boolean {
        return this._status === 'active';
    }

    /**
     * Vote to commit.
     *
     * @throws {InvalidStateError} If the transaction was already settled
     */
    public complete(): void {
        this.settle('committed');
    }

    /**
     * Vote to roll back.
     *
     * @throws {InvalidStateError} If the transaction was already settled
     */
    public abort(): void {
        this.settle('aborted');
    }

    /** Aborts an active transaction; no-op once settled. */
    public dispose(): void {
        if (this._status === 'active') this._status = 'aborted';
    }

    private settle(outcome: Exclude<TransactionStatus, 'active'>): void {
        if (this._status !== 'active') {
            throw new InvalidStateError(`Transaction ${this.id} is already ${this._status}`);
        }
        this._status = outcome;
    }
}
