/**
 * Trial descriptor registry
 *
 * Maps test type tags to descriptor factories. Open for extension: callers
 * may register new tags (or replace built-in ones) without touching the
 * existing variants.
 */

import { UnknownTrialTypeError } from "../domain/errors.js";
import { REFERENCE_FREE_FAMILIES, canonicalTag, type TestFamily, type TrialSpec } from "../schemas/trial.js";
import { LocalizedTrialDescriptor, toRatingScale, type DescriptorTexts, type TrialDescriptor } from "./descriptor.js";
import type { LocaleTableT } from "./locale.js";

export type DescriptorFactory = (trial: TrialSpec) => TrialDescriptor;

export class TrialDescriptorRegistry {
  private readonly factories = new Map<string, DescriptorFactory>();

  constructor(readonly language: string) {}

  register(tag: string, factory: DescriptorFactory): this {
    this.factories.set(tag, factory);
    return this;
  }

  has(tag: string): boolean {
    return this.factories.has(canonicalTag(tag));
  }

  tags(): string[] {
    return [...this.factories.keys()];
  }

  /**
   * Construct the descriptor for a trial
   *
   * @throws UnknownTrialTypeError when no factory is registered for the tag
   */
  create(trial: TrialSpec): TrialDescriptor {
    const tag = canonicalTag(trial.type);
    const factory = this.factories.get(tag);
    if (!factory) {
      throw new UnknownTrialTypeError(trial.type, this.language);
    }
    return factory(trial);
  }
}

/**
 * Build the built-in registry for one locale. Each scored family present in
 * the table contributes its scored tag and its `-instruction` tag; attention
 * borrows the comparative scale and is registered only alongside it.
 */
export function createDefaultRegistry(locale: LocaleTableT): TrialDescriptorRegistry {
  const registry = new TrialDescriptorRegistry(locale.language);
  const { families } = locale;

  const scored: Array<[TestFamily, DescriptorTexts | undefined]> = [
    ["similarity", families.similarity && textsOf(families.similarity)],
    ["comparative", families.comparative && textsOf(families.comparative)],
    ["quality", families.quality && textsOf(families.quality)],
    ["naturalness", families.naturalness && textsOf(families.naturalness)],
    [
      "edit-fidelity",
      families["edit-fidelity"] && {
        ...textsOf(families["edit-fidelity"]),
        editingScale: toRatingScale(families["edit-fidelity"].editing_scale),
      },
    ],
  ];

  for (const [family, texts] of scored) {
    if (!texts) continue;
    const needsReference = !REFERENCE_FREE_FAMILIES.has(family);
    registry.register(family, (trial) =>
      new LocalizedTrialDescriptor(trial, { testType: family, texts, needsReference, isInstruction: false })
    );
    registry.register(`${family}-instruction`, (trial) =>
      new LocalizedTrialDescriptor(trial, {
        testType: `${family}-instruction`,
        texts,
        needsReference,
        isInstruction: true,
      })
    );
  }

  const attention = families.attention;
  const comparative = families.comparative;
  if (attention && comparative) {
    const texts: DescriptorTexts = {
      instructions: attention.instructions,
      scale: toRatingScale(comparative.scale),
    };
    registry.register("attention", (trial) =>
      new LocalizedTrialDescriptor(trial, { testType: "attention", texts, needsReference: true, isInstruction: false })
    );
  }

  return registry;
}

function textsOf(family: {
  instructions: DescriptorTexts["instructions"];
  instruction_intro?: string;
  instruction_hint?: string;
  scale: Parameters<typeof toRatingScale>[0];
}): DescriptorTexts {
  return {
    instructions: family.instructions,
    intro: family.instruction_intro,
    hint: family.instruction_hint,
    scale: toRatingScale(family.scale),
  };
}
