/**
 * PipelineContext — Per-Execution State
 *
 * Carries what components look up while a pipeline runs: the
 * document-spec registry (keyed by type name and by root name), the
 * group signing certificate, and the current transaction.
 *
 * @example
 * ```typescript
 * const ctx = new PipelineContext();
 *
 * ctx.registerDocSpecByType('urn:acme:orders#Order', spec);
 * ctx.registerDocSpecByName('Acme.Schemas.OrderSchema', spec);
 *
 * ctx.getDocumentSpecByType('urn:acme:orders#Order'); // spec
 * ctx.getDocumentSpecByName('Missing');               // throws DocumentSpecNotFoundError
 * ```
 *
 * @module
 */
import { type DocumentSpec } from '../schema/DocumentSpec.js';
import { DocumentSpecNotFoundError } from '../errors.js';
import { TransactionControl } from './TransactionControl.js';

export class PipelineContext {
    private readonly _specsByName = new Map<string, DocumentSpec>();
    private readonly _specsByType = new Map<string, DocumentSpec>();
    private _groupSigningCertificate: string | undefined;
    private _transaction: TransactionControl | undefined;

    // ── Document spec registry ──

    /** Register a spec under a type name. Overwrites an earlier entry. */
    registerDocSpecByName(name: string, spec: DocumentSpec): void {
        this._specsByName.set(name, spec);
    }

    /** Register a spec under a root name. Overwrites an earlier entry. */
    registerDocSpecByType(rootName: string, spec: DocumentSpec): void {
        this._specsByType.set(rootName, spec);
    }

    /** @throws {DocumentSpecNotFoundError} If nothing is registered under `name` */
    getDocumentSpecByName(name: string): DocumentSpec {
        const spec = this._specsByName.get(name);
        if (spec === undefined) throw new DocumentSpecNotFoundError(name, 'name');
        return spec;
    }

    /** @throws {DocumentSpecNotFoundError} If nothing is registered under `rootName` */
    getDocumentSpecByType(rootName: string): DocumentSpec {
        const spec = this._specsByType.get(rootName);
        if (spec === undefined) throw new DocumentSpecNotFoundError(rootName, 'type');
        return spec;
    }

    hasDocumentSpecByName(name: string): boolean {
        return this._specsByName.has(name);
    }

    hasDocumentSpecByType(rootName: string): boolean {
        return this._specsByType.has(rootName);
    }

    // ── Group signing certificate ──

    /** Thumbprint of the group signing certificate; `undefined` by default. */
    getGroupSigningCertificate(): string | undefined {
        return this._groupSigningCertificate;
    }

    setGroupSigningCertificate(thumbprint: string | undefined): void {
        this._groupSigningCertificate = thumbprint;
    }

    // ── Transactions ──

    /**
     * Switch the context into transactional mode and return a handle
     * for a new transaction. Each call starts a fresh transaction and
     * makes it the current one.
     */
    enableTransactionSupport(): TransactionControl {
        this._transaction = new TransactionControl();
        return this._transaction;
    }

    /** `true` once {@link enableTransactionSupport} has been called. */
    get isTransactional(): boolean {
        return this._transaction !== undefined;
    }

    /** The most recently started transaction, if any. */
    get transactionControl(): TransactionControl | undefined {
        return this._transaction;
    }
}
