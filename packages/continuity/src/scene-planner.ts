import {
  OracleParseError,
  listEntities,
  parseOracleJson,
  persistFailedResponse,
  scenePlanSchema,
  type BrandBrief,
  type ElementType,
  type ImageManifest,
  type Logger,
  type ScenePlan,
  type TextOracle,
  type UniverseRecord,
} from '@adreel/shared';
import { findBestMatch } from './matcher.js';
import { REFERENCE_LABELS } from './scene-prompt.js';

// ─── Clip layout ───

const SORA_DURATIONS = [4, 8, 12] as const;
const VEO_DURATIONS = [4, 6, 8] as const;

export function validClipDurations(videoModel: string): readonly number[] {
  return videoModel.toLowerCase().includes('sora') ? SORA_DURATIONS : VEO_DURATIONS;
}

/** Nearest duration the model accepts; an exact tie goes to the shorter one. */
export function snapClipDuration(requested: number, videoModel: string): number {
  const valid = validClipDurations(videoModel);
  let best = valid[0];
  for (const d of valid) {
    if (Math.abs(d - requested) < Math.abs(best - requested)) best = d;
  }
  return best;
}

export interface ClipLayout {
  clipCount: number;
  clipDurationSec: number;
  /** Before snapping to a model-supported value. */
  requestedClipDurationSec: number;
  totalDurationSec: number;
}

/**
 * An explicit clip duration fixes the clip count from the total duration;
 * otherwise the total is spread over `scenesCount` clips.
 */
export function planClipLayout(brief: BrandBrief, videoModel: string): ClipLayout {
  let clipCount: number;
  let requested: number;

  if (brief.clipDurationSec !== undefined) {
    requested = brief.clipDurationSec;
    clipCount = Math.max(1, Math.round(brief.totalDurationSec / brief.clipDurationSec));
  } else {
    clipCount = brief.scenesCount;
    requested = brief.totalDurationSec / brief.scenesCount;
  }

  const clipDurationSec = snapClipDuration(requested, videoModel);
  return {
    clipCount,
    clipDurationSec,
    requestedClipDurationSec: requested,
    totalDurationSec: clipDurationSec * clipCount,
  };
}

// ─── Prompt ───

export interface AllowedElement {
  type: ElementType;
  /** The reference image's name when one exists, else the entity name. */
  name: string;
  canonicalState: string;
}

/** Element names the planner may use, preferring the names images were saved under. */
export function allowedElements(universe: UniverseRecord, manifest: ImageManifest | null): AllowedElement[] {
  return listEntities(universe).map(({ type, entity }) => {
    const images = manifest?.elements.filter((e) => e.element_type === type) ?? [];
    const image = findBestMatch(entity.name, images, (e) => e.element_name);
    return { type, name: image?.name ?? entity.name, canonicalState: entity.canonical_state };
  });
}

function shotBlocks(durationSec: number): string[] {
  const blocks: string[] = [];
  const pad = (n: number) => `00:${String(n).padStart(2, '0')}`;
  for (let start = 0; start < durationSec; start += 2) {
    blocks.push(`${pad(start)}-${pad(Math.min(start + 2, durationSec))}`);
  }
  return blocks;
}

export interface ScenePlanPromptInput {
  script: string;
  brief: BrandBrief;
  elements: AllowedElement[];
  layout: ClipLayout;
}

export function buildScenePlanPrompt(input: ScenePlanPromptInput): string {
  const { script, brief, elements, layout } = input;

  const elementList = elements.length > 0
    ? elements
        .map((e) => `- ${e.name} [${REFERENCE_LABELS[e.type]}] (canonical state: ${e.canonicalState || 'neutral'})`)
        .join('\n')
    : '- (none: every scene is generated without reference images)';

  const blocks = shotBlocks(layout.clipDurationSec);

  return `You are a commercial director turning an ad script into ${layout.clipCount} independently generated video clips of ${layout.clipDurationSec} seconds each (${layout.totalDurationSec} seconds total).

## Brand
- Brand: ${brief.brandName}
- Product: ${brief.productDescription}
- Creative direction: ${brief.creativeDirection || 'N/A'}
- Visual style (restate in every prompt): ${brief.style}

## Script
${script}

## Reference Elements
Each element below has exactly one canonical reference image. Use these EXACT names in "elements_used" and "element_states".
${elementList}

## Rules
1. Produce exactly ${layout.clipCount} scenes numbered 1 to ${layout.clipCount}.
2. Every scene is rendered in isolation: never refer to "the same" or "as before"; restate who, where and the style each time.
3. "shots" splits the clip into 2-second blocks: ${blocks.join(', ')}.
4. "first_frame_image_prompt" is a still of the first shot: same camera, lens, composition, lighting and mood.
5. "elements_used" lists only reference elements visible in the scene.
6. "element_states" maps an element name to how it differs from its canonical state in this scene. Leave an element out when it appears exactly as its reference.
7. Audio should carry smoothly into the next scene.

## Output Format (JSON only)
{
  "scenes": [
    {
      "scene_number": 1,
      "duration_seconds": ${layout.clipDurationSec},
      "video_summary": "One sentence overview",
      "audio_summary": "One sentence audio journey",
      "first_frame_image_prompt": "Full still-image prompt",
      "video_prompt": "Motion and action for the whole clip",
      "shots": [
        { "timestamp": "${blocks[0] ?? '00:00-00:02'}", "description": "Visual action, camera shot, lens, lighting, mood" }
      ],
      "camera": "Camera movement summary",
      "dialogue": "Character: line, or empty",
      "music": "Instrumentation, tempo, dynamics",
      "sfx": "Sound effects",
      "ambience": "Ambient sound",
      "elements_used": ["Element Name"],
      "element_states": { "Element Name": "Scene-specific change" }
    }
  ]
}`;
}

// ─── Planner ───

export interface PlanOptions {
  videoModel: string;
  debugDir: string;
}

export class ScenePlanner {
  constructor(
    private oracle: TextOracle,
    private logger: Logger,
  ) {}

  async plan(
    script: string,
    universe: UniverseRecord,
    manifest: ImageManifest | null,
    brief: BrandBrief,
    options: PlanOptions,
  ): Promise<ScenePlan> {
    const layout = planClipLayout(brief, options.videoModel);
    if (layout.clipDurationSec !== layout.requestedClipDurationSec) {
      this.logger.warn(
        { requested: layout.requestedClipDurationSec, snapped: layout.clipDurationSec, model: options.videoModel },
        'Clip duration adjusted to a supported value',
      );
    }

    const prompt = buildScenePlanPrompt({
      script,
      brief,
      elements: allowedElements(universe, manifest),
      layout,
    });

    this.logger.info(
      { model: this.oracle.modelId, clips: layout.clipCount, clipDuration: layout.clipDurationSec },
      'Planning scenes',
    );
    const raw = await this.oracle.complete(prompt, { maxTokens: 16_000 });

    let plan: ScenePlan;
    try {
      plan = parseOracleJson(raw, scenePlanSchema, { label: 'scene plan' });
    } catch (err) {
      if (err instanceof OracleParseError) {
        const path = await persistFailedResponse(options.debugDir, err);
        this.logger.error({ reason: err.reason, debugFile: path }, 'Scene plan could not be parsed');
      }
      throw err;
    }

    if (plan.scenes.length !== layout.clipCount) {
      this.logger.warn(
        { expected: layout.clipCount, received: plan.scenes.length },
        'Scene count differs from the requested clip count',
      );
    }
    return plan;
  }
}
