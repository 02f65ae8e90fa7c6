import type { ElementType, Scene } from '@adreel/shared';
import { findBestMatch } from './matcher.js';
import type { ResolvedReference } from './resolver.js';

export const REFERENCE_LABELS: Record<ElementType, string> = {
  character: 'CHARACTER REFERENCE',
  prop: 'PRODUCT REFERENCE',
  location: 'LOCATION REFERENCE',
};

export interface AssembledScenePrompt {
  sceneNumber: number;
  imagePrompt: string;
  videoPrompt: string;
  /** Reference image files, in the order the prompt numbers them. */
  imagePaths: string[];
}

const REFERENCE_CONTEXT =
  'You are receiving reference images showing the CANONICAL APPEARANCE of characters, locations and props ' +
  'from this advertisement. Each image shows an element in its base, neutral state. Use them as the visual ' +
  'foundation and transform them as instructed below to fit this scene.';

/**
 * The scene-specific change for a reference, looked up by the name the scene
 * used, then the entity and image names, then any closely matching key.
 */
export function findElementState(scene: Scene, ref: ResolvedReference): string | null {
  const states = scene.element_states;
  for (const key of [ref.query, ref.entity.name, ref.manifestName]) {
    const state = states[key];
    if (state !== undefined) return state.trim() || null;
  }

  const match = findBestMatch(ref.entity.name, Object.keys(states), (key) => key);
  if (match && match.tier !== 'overlap') return states[match.name].trim() || null;
  return null;
}

function referenceLine(index: number, scene: Scene, ref: ResolvedReference): string {
  const canonical = ref.entity.canonical_state || ref.entity.description || 'its canonical appearance';
  const change = findElementState(scene, ref);
  const usage = change
    ? `USE THIS REFERENCE IMAGE AS BASE AND MODIFY IT TO: ${change}`
    : 'USE THIS REFERENCE IMAGE AS-IS';
  return `${index + 1}. ${ref.manifestName} [${REFERENCE_LABELS[ref.type]}] (reference image shows: ${canonical}) - ${usage}`;
}

function audioLines(scene: Scene): string[] {
  const fields: [string, string | undefined][] = [
    ['DIALOGUE', scene.dialogue],
    ['MUSIC', scene.music],
    ['SFX', scene.sfx],
    ['AMBIENCE', scene.ambience],
  ];
  const lines = fields.filter(([, value]) => value?.trim()).map(([label, value]) => `${label}: ${value}`);
  if (lines.length === 0 && scene.audio_summary) lines.push(`AUDIO: ${scene.audio_summary}`);
  return lines;
}

/** Builds the self-contained image and video prompts of one scene. */
export class ScenePromptAssembler {
  assemble(scene: Scene, references: readonly ResolvedReference[], style: string): AssembledScenePrompt {
    const referenceBlock =
      references.length > 0
        ? [
            'REFERENCE IMAGES CONTEXT:',
            REFERENCE_CONTEXT,
            '',
            `REFERENCE IMAGES ATTACHED (${references.length} image file${references.length === 1 ? '' : 's'}, numbered in attachment order):`,
            ...references.map((ref, i) => referenceLine(i, scene, ref)),
          ]
        : [];

    const opening = scene.shots[0];
    const imageSections = [
      `STYLE: ${style}`,
      scene.first_frame_image_prompt || scene.video_summary,
      opening ? `OPENING SHOT (${opening.timestamp}): ${opening.description}` : '',
      referenceBlock.join('\n'),
    ];

    const videoSections = [
      `STYLE: ${style}`,
      scene.video_prompt || scene.video_summary,
      scene.shots.length > 0
        ? ['SHOTS:', ...scene.shots.map((shot) => `${shot.timestamp}: ${shot.description}`)].join('\n')
        : '',
      scene.camera ? `CAMERA: ${scene.camera}` : '',
      audioLines(scene).join('\n'),
      references.length > 0
        ? [
            'ELEMENTS (keep each consistent with its reference):',
            ...references.map((ref) => {
              const change = findElementState(scene, ref);
              return `- ${ref.manifestName}: ${ref.entity.canonical_state}${change ? `; in this scene: ${change}` : ''}`;
            }),
          ].join('\n')
        : '',
    ];

    return {
      sceneNumber: scene.scene_number,
      imagePrompt: imageSections.filter(Boolean).join('\n\n'),
      videoPrompt: videoSections.filter(Boolean).join('\n\n'),
      imagePaths: references.map((ref) => ref.filepath),
    };
  }
}
