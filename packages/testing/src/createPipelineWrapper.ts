import { type Pipeline, InvalidArgumentError } from '@pipeline-harness/core';
import { type PipelineWrapper } from './PipelineWrapper.js';
import { ReceivePipelineWrapper } from './ReceivePipelineWrapper.js';
import { SendPipelineWrapper } from './SendPipelineWrapper.js';
import type { PipelineWrapperOptions } from './types.js';

/**
 * Create the wrapper matching the pipeline's direction.
 *
 * The direction is read once here and fixed for the wrapper's lifetime.
 *
 * @example
 * ```typescript
 * const wrapper = createPipelineWrapper(createSendPipeline(), {
 *     debug: createDebugObserver(),
 * });
 * wrapper.isReceivePipeline; // false
 * ```
 *
 * @throws {InvalidArgumentError} If `pipeline` is absent
 */
export function createPipelineWrapper(
    pipeline: Pipeline | null | undefined,
    options?: PipelineWrapperOptions,
): PipelineWrapper {
    if (pipeline === null || pipeline === undefined) {
        const error = new InvalidArgumentError('pipeline', 'a pipeline is required');
        options?.debug?.({ type: 'error', operation: 'construct', error: error.message, timestamp: Date.now() });
        throw error;
    }
    return pipeline.direction === 'receive'
        ? new ReceivePipelineWrapper(pipeline, options)
        : new SendPipelineWrapper(pipeline, options);
}
