export {
  PIPELINE_STAGES,
  STAGE_DESCRIPTIONS,
  isStageName,
  parseStageName,
  stageRange,
  type StageName,
} from './stages.js';
export { scriptLayout, finalVideoPath, defaultScriptId, type ScriptLayout } from './layout.js';
export {
  Pipeline,
  createPipeline,
  type PipelineProviders,
  type PipelineOptions,
  type RunOptions,
  type PipelineRunResult,
} from './pipeline.js';
