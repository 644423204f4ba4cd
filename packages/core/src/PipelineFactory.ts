/**
 * PipelineFactory — Empty Pipeline Construction
 *
 * Builds pipelines with no components, optionally pre-populated with
 * the stages a pipeline definition would declare.
 *
 * @example
 * ```typescript
 * // Empty: the wrapper creates stages on demand
 * const pipeline = createReceivePipeline();
 *
 * // Pre-populated with the standard receive template
 * const templated = createReceivePipeline({ stages: RECEIVE_STAGES });
 * templated.stages.map(s => s.name); // ["Decode", "Disassemble", "Validate", "ResolveParty"]
 * ```
 *
 * @module
 */
import { Pipeline } from './domain/Pipeline.js';
import { Stage } from './domain/Stage.js';
import { type PipelineDirection, directionOf } from './domain/PipelineDirection.js';
import { type StageDescriptor, assertStageDescriptor } from './domain/StageDescriptor.js';
import { DirectionMismatchError } from './errors.js';

export interface PipelineFactoryOptions {
    /** Display name of the pipeline */
    readonly name?: string;
    /** Definition stages to create up front, in order */
    readonly stages?: readonly StageDescriptor[];
}

/**
 * Create a pipeline for the given direction.
 *
 * @throws {DirectionMismatchError} If a definition stage belongs to the other direction
 * @throws {InvalidArgumentError} If a definition stage is malformed or its id repeats
 */
export function createPipeline(direction: PipelineDirection, options: PipelineFactoryOptions = {}): Pipeline {
    const pipeline = new Pipeline(direction, options.name);
    for (const descriptor of options.stages ?? []) {
        assertStageDescriptor(descriptor);
        const stageDirection = directionOf(descriptor.isReceiveStage);
        if (stageDirection !== direction) {
            throw new DirectionMismatchError(direction, stageDirection, `Stage "${descriptor.name}"`);
        }
        pipeline.addStage(new Stage(descriptor.name, descriptor.executionMethod, descriptor.id, pipeline));
    }
    return pipeline;
}

export function createReceivePipeline(options?: PipelineFactoryOptions): Pipeline {
    return createPipeline('receive', options);
}

export function createSendPipeline(options?: PipelineFactoryOptions): Pipeline {
    return createPipeline('send', options);
}
