import { type PipelineDirection } from './PipelineDirection.js';
import { type Stage } from './Stage.js';
import { InvalidArgumentError } from '../errors.js';

/**
 * An ordered sequence of {@link Stage}s for one side of the host.
 *
 * Stages keep insertion order and their ids are unique. A pipeline can
 * already hold stages from its definition before a wrapper adds more.
 *
 * @example
 * ```typescript
 * const pipeline = new Pipeline('receive', 'OrdersIn');
 * pipeline.addStage(new Stage('Decode', ExecutionMethod.ALL, 'decode', pipeline));
 *
 * pipeline.findStage('decode'); // Stage
 * pipeline.stages.length;       // 1
 * ```
 */
export class Pipeline {
    public readonly direction: PipelineDirection;
    public readonly name: string | undefined;
    private readonly _stages: Stage[] = [];

    public constructor(direction: PipelineDirection, name?: string) {
        this.direction = direction;
        this.name = name;
    }

    /** `true` for receive pipelines */
    public get isReceive(): boolean {
        return this.direction === 'receive';
    }

    /** Stages in insertion order (read-only view). */
    public get stages(): readonly Stage[] {
        return this._stages;
    }

    /**
     * Append a stage.
     *
     * @throws {InvalidArgumentError} If the stage belongs to another
     *   pipeline or its id is already present
     */
    public addStage(stage: Stage): void {
        if (stage.pipeline !== this) {
            throw new InvalidArgumentError('stage', `stage "${stage.name}" belongs to another pipeline`);
        }
        if (this.findStage(stage.id) !== undefined) {
            throw new InvalidArgumentError('stage', `a stage with id "${stage.id}" already exists`);
        }
        this._stages.push(stage);
    }

    /** Returns the stage with the given id, or `undefined`. */
    public findStage(id: string): Stage | undefined {
        return this._stages.find(stage => stage.id === id);
    }
}
