/**
 * DebugObserver — Opt-In Tracing for Pipeline Setup
 *
 * Structured, typed events emitted while a wrapper assembles a
 * pipeline: stage lookups, component attachment, document spec
 * registration and transaction activation. Nothing is emitted unless
 * an observer is passed in.
 *
 * @example
 * ```typescript
 * import { createDebugObserver } from '@pipeline-harness/core';
 *
 * // Default: compact console.debug output
 * const debug = createDebugObserver();
 *
 * // Custom handler (e.g. collect events for assertions)
 * const events: DebugEvent[] = [];
 * const collect = createDebugObserver((event) => events.push(event));
 *
 * const wrapper = new ReceivePipelineWrapper(pipeline, { debug });
 * ```
 *
 * @module
 */

// ============================================================================
// Event Types (Discriminated Union)
// ============================================================================

/**
 * Emitted when a stage descriptor is resolved against the pipeline.
 * `created` is `true` when the stage did not exist and was appended.
 */
export interface StageEvent {
    readonly type: 'stage';
    readonly stageId: string;
    readonly stageName: string;
    readonly created: boolean;
    readonly timestamp: number;
}

/** Emitted after a component is appended to a stage. */
export interface ComponentEvent {
    readonly type: 'component';
    readonly component: string;
    readonly stageName: string;
    /** Number of components in the stage after the addition */
    readonly position: number;
    readonly timestamp: number;
}

/** Emitted once per schema root registered in the context. */
export interface DocSpecEvent {
    readonly type: 'docspec';
    readonly rootName: string;
    /** Type names the document spec was registered under */
    readonly names: readonly string[];
    readonly timestamp: number;
}

/** Emitted when transactional support is switched on. */
export interface TransactionEvent {
    readonly type: 'transaction';
    readonly transactionId: string;
    readonly timestamp: number;
}

/** Emitted when a wrapper call is rejected. */
export interface ErrorEvent {
    readonly type: 'error';
    /** The wrapper operation that failed */
    readonly operation:
        | 'addComponent'
        | 'addDocSpec'
        | 'findOrCreateStage'
        | 'enableTransactions'
        | 'construct';
    readonly error: string;
    readonly timestamp: number;
}

/**
 * Union of all debug event types.
 *
 * Use a `switch` on `event.type` for exhaustive handling.
 */
export type DebugEvent =
    | StageEvent
    | ComponentEvent
    | DocSpecEvent
    | TransactionEvent
    | ErrorEvent;

/** Observer function that receives debug events. */
export type DebugObserverFn = (event: DebugEvent) => void;

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a debug observer with compact console output.
 *
 * If a custom handler is provided, events are forwarded to it instead.
 * The default handler prints:
 *
 * ```
 * [pipeline-harness] stage     Decode (created)
 * [pipeline-harness] component MimeDecoder → Decode #1
 * [pipeline-harness] docspec   urn:acme:orders#Order (Acme.Schemas.OrderSchema, OrderSchema)
 * ```
 *
 * @param handler - Optional custom event handler. If omitted, uses `console.debug`.
 */
export function createDebugObserver(handler?: DebugObserverFn): DebugObserverFn {
    if (handler) return handler;

    return (event: DebugEvent): void => {
        const prefix = '[pipeline-harness]';

        switch (event.type) {
            case 'stage':
                console.debug(`${prefix} stage     ${event.stageName} (${event.created ? 'created' : 'found'})`);
                break;

            case 'component':
                console.debug(`${prefix} component ${event.component} → ${event.stageName} #${event.position}`);
                break;

            case 'docspec':
                console.debug(`${prefix} docspec   ${event.rootName} (${event.names.join(', ')})`);
                break;

            case 'transaction':
                console.debug(`${prefix} tx        ${event.transactionId}`);
                break;

            case 'error':
                console.debug(`${prefix} ERROR     [${event.operation}] ${event.error}`);
                break;
        }
    };
}
