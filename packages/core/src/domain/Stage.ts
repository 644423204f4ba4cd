import { type ExecutionMethod } from './ExecutionMethod.js';
import { type PipelineComponent } from './PipelineComponent.js';
import type { Pipeline } from './Pipeline.js';

/**
 * Read-only face of a {@link Stage}. Wrappers hand these out so that
 * components can only be added through their checked methods.
 */
export interface StageView extends Iterable<PipelineComponent> {
    readonly id: string;
    readonly name: string;
    readonly executionMethod: ExecutionMethod;
    readonly components: readonly PipelineComponent[];
}

/**
 * An ordered slot in a {@link Pipeline} holding zero or more components.
 *
 * Components are kept in the order they were added. A stage's
 * direction is the direction of its owning pipeline; it is not stored
 * separately.
 *
 * @example
 * ```typescript
 * const pipeline = createReceivePipeline();
 * const stage = new Stage('Decode', ExecutionMethod.ALL, PipelineStages.DECODE.id, pipeline);
 * pipeline.addStage(stage);
 *
 * stage.addComponent(createComponent({ name: 'MimeDecoder' }));
 * stage.components.length; // 1
 * ```
 *
 * @see {@link Pipeline} for the owning container
 */
export class Stage implements StageView {
    public readonly name: string;
    public readonly executionMethod: ExecutionMethod;
    /** Identifier, unique within the owning pipeline */
    public readonly id: string;
    public readonly pipeline: Pipeline;
    private readonly _components: PipelineComponent[] = [];

    public constructor(name: string, executionMethod: ExecutionMethod, id: string, pipeline: Pipeline) {
        this.name = name;
        this.executionMethod = executionMethod;
        this.id = id;
        this.pipeline = pipeline;
    }

    /** Components in insertion order (read-only view). */
    public get components(): readonly PipelineComponent[] {
        return this._components;
    }

    /**
     * Append a component. The same component may be added more than
     * once; each addition is a separate slot.
     */
    public addComponent(component: PipelineComponent): void {
        this._components.push(component);
    }

    public [Symbol.iterator](): Iterator<PipelineComponent> {
        return this._components[Symbol.iterator]();
    }
}
