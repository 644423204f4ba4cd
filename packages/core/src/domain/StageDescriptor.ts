/**
 * StageDescriptor — Caller-Supplied Stage Identity
 *
 * A plain value naming a stage slot: the wrapper uses it to locate an
 * existing {@link Stage} by `id` or to materialize a new one. Descriptors
 * carry no components and are never mutated.
 *
 * @module
 */
import { z } from 'zod';
import { ExecutionMethod } from './ExecutionMethod.js';
import { InvalidArgumentError } from '../errors.js';

export interface StageDescriptor {
    /** Stage identifier, unique within a pipeline */
    readonly id: string;
    /** Display name used when the stage has to be created */
    readonly name: string;
    /** Execution-order tag used when the stage has to be created */
    readonly executionMethod: ExecutionMethod;
    /** `true` for receive-side stages, `false` for send-side stages */
    readonly isReceiveStage: boolean;
}

export const StageDescriptorSchema = z.object({
    id: z.string().min(1),
    name: z.string().min(1),
    executionMethod: z.nativeEnum(ExecutionMethod),
    isReceiveStage: z.boolean(),
});

/**
 * Validate a stage descriptor, throwing {@link InvalidArgumentError}
 * when it is absent or malformed.
 *
 * Returns the caller's own object, not a parsed copy.
 */
export function assertStageDescriptor(
    descriptor: StageDescriptor | null | undefined,
    argument = 'stage',
): StageDescriptor {
    if (descriptor === null || descriptor === undefined) {
        throw new InvalidArgumentError(argument, 'a stage descriptor is required');
    }
    const result = StageDescriptorSchema.safeParse(descriptor);
    if (!result.success) {
        throw new InvalidArgumentError(argument, 'malformed stage descriptor', result.error);
    }
    return descriptor;
}
