import type { TrialSpec } from "../schemas/trial.js";
import type { ScaleTableT } from "./locale.js";

/**
 * Inclusive integer scale; one label per step from min to max
 */
export interface RatingScale {
  readonly min: number;
  readonly max: number;
  readonly default: number;
  readonly level_labels: readonly string[];
}

/**
 * A selectable answer. The UI posts `value` back; labels are display only.
 */
export interface ScaleOption {
  readonly value: number;
  readonly label: string;
}

export interface TrialInstructions {
  readonly title: string;
  readonly paragraphs: readonly string[];
  readonly points: readonly string[];
  /** Correct-answer hint, present on instruction trials */
  readonly hint: string | null;
}

/**
 * Per-trial view of a test type: what to tell the participant, which audio
 * slots to show and which scores to accept.
 */
export interface TrialDescriptor {
  readonly testType: string;
  readonly trial: TrialSpec;
  instructions(): TrialInstructions;
  ratingScale(): RatingScale;
  needsReferenceAudio(): boolean;
  validate(score: number): boolean;
  /** Second, independent scale (edit-fidelity only) */
  editingScale(): RatingScale | null;
  editedTranscript(): string | null;
}

export function toRatingScale(table: ScaleTableT): RatingScale {
  return {
    min: table.min,
    max: table.max,
    default: table.default,
    level_labels: [...table.labels],
  };
}

export function scaleOptions(scale: RatingScale): ScaleOption[] {
  return scale.level_labels.map((label, i) => ({ value: scale.min + i, label }));
}

export function isWithinScale(scale: RatingScale, score: number): boolean {
  return Number.isInteger(score) && score >= scale.min && score <= scale.max;
}

export interface DescriptorTexts {
  instructions: Omit<TrialInstructions, "hint">;
  /** Extra opening paragraph for instruction trials */
  intro?: string;
  hint?: string;
  scale: RatingScale;
  editingScale?: RatingScale;
}

export interface DescriptorOptions {
  testType: string;
  texts: DescriptorTexts;
  needsReference: boolean;
  isInstruction: boolean;
}

/**
 * Descriptor backed by a locale table. Every built-in test type is an
 * instance of this class; languages differ only in the texts passed in.
 */
export class LocalizedTrialDescriptor implements TrialDescriptor {
  readonly testType: string;

  constructor(
    readonly trial: TrialSpec,
    private readonly options: DescriptorOptions
  ) {
    this.testType = options.testType;
  }

  instructions(): TrialInstructions {
    const { instructions, intro, hint } = this.options.texts;
    if (!this.options.isInstruction) {
      return { ...instructions, hint: null };
    }
    return {
      title: instructions.title,
      paragraphs: intro ? [intro, ...instructions.paragraphs] : instructions.paragraphs,
      points: instructions.points,
      hint: hint ?? null,
    };
  }

  ratingScale(): RatingScale {
    return this.options.texts.scale;
  }

  needsReferenceAudio(): boolean {
    return this.options.needsReference;
  }

  validate(score: number): boolean {
    return isWithinScale(this.ratingScale(), score);
  }

  editingScale(): RatingScale | null {
    return this.options.texts.editingScale ?? null;
  }

  editedTranscript(): string | null {
    if (!this.options.texts.editingScale) {
      return null;
    }
    return this.trial.edited_transcript ?? "";
  }
}
