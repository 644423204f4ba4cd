/**
 * Which side of the messaging host a pipeline runs on.
 *
 * Receive pipelines decode and disassemble inbound documents; send
 * pipelines assemble and encode outbound ones. Stages belong to exactly
 * one side.
 */
export type PipelineDirection = 'receive' | 'send';

/** Maps the boolean receive flag used by stage descriptors to a direction. */
export function directionOf(isReceive: boolean): PipelineDirection {
    return isReceive ? 'receive' : 'send';
}
