/**
 * Pipeline Harness Errors — Typed Failure Taxonomy
 *
 * Every failure raised by the harness is a {@link PipelineHarnessError}
 * carrying a stable `code`, so tests can assert on the kind of failure
 * without matching message text.
 *
 * @example
 * ```typescript
 * try {
 *     wrapper.addComponent(decoder, PipelineStages.ASSEMBLE);
 * } catch (e) {
 *     if (e instanceof DirectionMismatchError) {
 *         console.log(e.code);            // "DIRECTION_MISMATCH"
 *         console.log(e.subjectDirection); // "send"
 *     }
 * }
 * ```
 *
 * @module
 */
import { type ZodError } from 'zod';
import { type PipelineDirection } from './domain/PipelineDirection.js';

/** Stable discriminator for every harness failure. */
export type PipelineHarnessErrorCode =
    | 'INVALID_ARGUMENT'
    | 'DIRECTION_MISMATCH'
    | 'NOT_FOUND'
    | 'INVALID_STATE';

/**
 * Base class for all harness errors.
 */
export class PipelineHarnessError extends Error {
    readonly code: PipelineHarnessErrorCode;

    constructor(code: PipelineHarnessErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'PipelineHarnessError';
        this.code = code;
    }
}

/**
 * A required input was missing or malformed.
 *
 * When a zod schema rejected the value, the original `ZodError` is kept
 * as `cause` and its issues are folded into the message.
 */
export class InvalidArgumentError extends PipelineHarnessError {
    /** Name of the offending parameter */
    readonly argument: string;

    constructor(argument: string, reason: string, zodError?: ZodError) {
        const issues = zodError
            ? '\n' + zodError.issues
                .map(issue => {
                    const path = issue.path.length > 0
                        ? `'${issue.path.join('.')}'`
                        : '(root)';
                    return `  • ${path}: ${issue.message}`;
                })
                .join('\n')
            : '';
        super('INVALID_ARGUMENT', `Invalid argument '${argument}': ${reason}${issues}`, zodError ? { cause: zodError } : undefined);
        this.name = 'InvalidArgumentError';
        this.argument = argument;
    }
}

/**
 * A receive-side stage was used with a send pipeline, or the reverse.
 */
export class DirectionMismatchError extends PipelineHarnessError {
    /** Direction the pipeline or wrapper expected */
    readonly pipelineDirection: PipelineDirection;
    /** Direction of the stage or pipeline that was offered */
    readonly subjectDirection: PipelineDirection;

    constructor(pipelineDirection: PipelineDirection, subjectDirection: PipelineDirection, subject: string) {
        super(
            'DIRECTION_MISMATCH',
            `${subject} belongs to the ${subjectDirection} side and cannot be used with a ${pipelineDirection} pipeline`,
        );
        this.name = 'DirectionMismatchError';
        this.pipelineDirection = pipelineDirection;
        this.subjectDirection = subjectDirection;
    }
}

/** Which registry a failed document spec lookup went to. */
export type DocumentSpecKeyKind = 'name' | 'type';

/**
 * No document spec was registered under the requested key.
 */
export class DocumentSpecNotFoundError extends PipelineHarnessError {
    readonly key: string;
    readonly keyKind: DocumentSpecKeyKind;

    constructor(key: string, keyKind: DocumentSpecKeyKind) {
        super('NOT_FOUND', `No document spec registered by ${keyKind} "${key}"`);
        this.name = 'DocumentSpecNotFoundError';
        this.key = key;
        this.keyKind = keyKind;
    }
}

/**
 * An operation was attempted on an object that can no longer accept it,
 * such as completing a transaction that was already aborted.
 */
export class InvalidStateError extends PipelineHarnessError {
    constructor(message: string) {
        super('INVALID_STATE', message);
        this.name = 'InvalidStateError';
    }
}
