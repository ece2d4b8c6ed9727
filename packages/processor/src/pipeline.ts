import {createNoopLogger, type StructuredLogger} from '@edge-router/logging';
import {PipelineStageSchema, type PipelineStage} from '@edge-router/schemas';

const STAGE_ORDER: readonly PipelineStage[] = PipelineStageSchema.options;

const stageIndex = (stage: PipelineStage) => STAGE_ORDER.indexOf(stage);

export type PipelineTracker = {
  readonly current: PipelineStage | null;
  readonly history: readonly PipelineStage[];
  advance: (stage: PipelineStage) => void;
};

/**
 * Tracks one request through the pipeline. Stages may be skipped (the edge hands off after
 * `routing`) but never revisited; a backward or repeated step throws.
 */
export const createPipelineTracker = ({
  logger = createNoopLogger(),
  component = 'pipeline'
}: {
  logger?: StructuredLogger;
  component?: string;
} = {}): PipelineTracker => {
  const history: PipelineStage[] = [];

  return {
    get current() {
      return history.at(-1) ?? null;
    },
    get history() {
      return [...history];
    },
    advance: stage => {
      const previous = history.at(-1);
      if (previous !== undefined && stageIndex(stage) <= stageIndex(previous)) {
        throw new Error(`Pipeline cannot move from ${previous} to ${stage}`);
      }

      history.push(stage);
      logger.debug({
        event: 'pipeline.stage',
        component,
        message: `Entered ${stage}`,
        metadata: {stage, previous_stage: previous ?? null}
      });
    }
  };
};
