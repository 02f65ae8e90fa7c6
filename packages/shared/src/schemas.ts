import { z } from 'zod';

/** Persisted pipeline documents. Every artifact read from disk or from an
 * oracle goes through one of these schemas exactly once. */

// ─── Entities ───

/** Class priority order: characters outrank props, props outrank locations. */
export const ELEMENT_TYPES = ['character', 'prop', 'location'] as const;
export type ElementType = (typeof ELEMENT_TYPES)[number];

const sceneIndexList = z.array(z.coerce.number().int().positive());

/** Ascending, de-duplicated scene indices. */
function normalizeScenes(scenes: readonly number[]): number[] {
  return [...new Set(scenes)].sort((a, b) => a - b);
}

const entityVersionSchema = z.object({
  version_name: z.string().default(''),
  scenes_used: sceneIndexList.default([]),
  description: z.string().optional(),
  image_generation_prompt: z.string().optional(),
  is_original: z.boolean().optional(),
  references_original_version: z.string().optional(),
});

const versionedEntitySchema = z.object({
  name: z.string().min(1),
  scenes_used: sceneIndexList.optional(),
  versions: z.array(entityVersionSchema).min(1),
});

const singleStateEntitySchema = z.object({
  name: z.string().min(1),
  scenes_used: sceneIndexList.default([]),
  canonical_state: z.string().optional(),
  description: z.string().optional(),
  image_generation_prompt: z.string().optional(),
});

export interface Entity {
  name: string;
  scenes_used: number[];
  canonical_state: string;
  image_generation_prompt: string;
  description?: string;
}

/**
 * Accepts the single-state form and the versioned form. A versioned entity
 * collapses to the state of its original version (the first version when none
 * is flagged); its scenes are the union of every version's scenes.
 */
export const entitySchema: z.ZodType<Entity, z.ZodTypeDef, unknown> = z
  .union([versionedEntitySchema, singleStateEntitySchema])
  .transform((raw): Entity => {
    if ('versions' in raw) {
      const original = raw.versions.find((v) => v.is_original) ?? raw.versions[0];
      const scenes = raw.scenes_used ?? raw.versions.flatMap((v) => v.scenes_used);
      return {
        name: raw.name,
        scenes_used: normalizeScenes(scenes),
        canonical_state: original.description ?? '',
        image_generation_prompt: original.image_generation_prompt ?? '',
        ...(original.description !== undefined ? { description: original.description } : {}),
      };
    }

    return {
      name: raw.name,
      scenes_used: normalizeScenes(raw.scenes_used),
      canonical_state: raw.canonical_state ?? raw.description ?? '',
      image_generation_prompt: raw.image_generation_prompt ?? '',
      ...(raw.description !== undefined ? { description: raw.description } : {}),
    };
  });

export const universeRecordSchema = z.object({
  characters: z.array(entitySchema).default([]),
  universe: z
    .object({
      locations: z.array(entitySchema).default([]),
      props: z.array(entitySchema).default([]),
    })
    .default({}),
});

export type UniverseRecord = z.infer<typeof universeRecordSchema>;

export interface TypedEntity {
  type: ElementType;
  entity: Entity;
}

/** Every entity of the universe, in class priority order. */
export function listEntities(universe: UniverseRecord): TypedEntity[] {
  return [
    ...universe.characters.map((entity) => ({ type: 'character' as const, entity })),
    ...universe.universe.props.map((entity) => ({ type: 'prop' as const, entity })),
    ...universe.universe.locations.map((entity) => ({ type: 'location' as const, entity })),
  ];
}

// ─── Reference image manifest ───

export const manifestElementSchema = z.object({
  element_name: z.string().min(1),
  element_type: z.enum(ELEMENT_TYPES),
  /** Relative to the manifest's directory unless absolute. */
  filepath: z.string().min(1),
  url: z.string().optional(),
});

export type ManifestElement = z.infer<typeof manifestElementSchema>;

export const imageManifestSchema = z.object({
  script_id: z.string(),
  generated_at: z.string(),
  elements: z.array(manifestElementSchema).default([]),
});

export type ImageManifest = z.infer<typeof imageManifestSchema>;

export const IMAGE_MANIFEST_FILE = 'image_generation_summary.json';

/** Hard limit of the image and video APIs on attached reference images. */
export const MAX_REFERENCE_IMAGES = 5;

// ─── Scene plan ───

export const shotSchema = z.object({
  timestamp: z.string().default(''),
  description: z.string().default(''),
});

export type Shot = z.infer<typeof shotSchema>;

export const sceneSchema = z.object({
  scene_number: z.coerce.number().int().positive(),
  duration_seconds: z.coerce.number().positive().default(6),
  video_summary: z.string().default(''),
  audio_summary: z.string().default(''),
  first_frame_image_prompt: z.string().default(''),
  video_prompt: z.string().default(''),
  shots: z.array(shotSchema).default([]),
  elements_used: z.array(z.string()).default([]),
  /** Element name → scene-specific change to its canonical state. */
  element_states: z.record(z.string()).default({}),
  camera: z.string().optional(),
  music: z.string().optional(),
  sfx: z.string().optional(),
  ambience: z.string().optional(),
  dialogue: z.string().optional(),
});

export type Scene = z.infer<typeof sceneSchema>;

/** Scenes come back sorted; numbering must run 1..n without gaps or repeats. */
export const scenePlanSchema = z
  .object({ scenes: z.array(sceneSchema).min(1) })
  .superRefine((plan, ctx) => {
    const numbers = plan.scenes.map((s) => s.scene_number).sort((a, b) => a - b);
    if (numbers.some((n, i) => n !== i + 1)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['scenes'],
        message: `scene numbers must be contiguous from 1, got [${numbers.join(', ')}]`,
      });
    }
  })
  .transform((plan) => ({
    scenes: [...plan.scenes].sort((a, b) => a.scene_number - b.scene_number),
  }));

export type ScenePlan = z.infer<typeof scenePlanSchema>;

// ─── First frames ───

export const firstFramesSummarySchema = z.object({
  resolution: z.string(),
  aspect_ratio: z.string(),
  total_scenes: z.number().int(),
  generated_frames: z.number().int(),
  /** Scene number → file name inside the summary's directory. */
  first_frames: z.record(z.string()),
});

export type FirstFramesSummary = z.infer<typeof firstFramesSummarySchema>;

export const FIRST_FRAMES_SUMMARY_FILE = 'first_frames_summary.json';

// ─── Stage reports ───

export const stageFailureSchema = z.object({
  key: z.string(),
  error: z.string(),
});

export type StageFailure = z.infer<typeof stageFailureSchema>;

export const stageReportSchema = z.object({
  stage: z.string(),
  expected: z.number().int().nonnegative(),
  produced: z.number().int().nonnegative(),
  failures: z.array(stageFailureSchema),
});

export type StageReport = z.infer<typeof stageReportSchema>;
