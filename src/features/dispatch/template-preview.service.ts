import { createSeededRandom } from "@core/utils/random";
import {
  ContentPersonalizer,
  EmailTemplate,
  PersonalizedContent,
  RecipientProfile,
} from "@features/email/content/personalization.service";
import { SpintaxExpander } from "@features/email/content/spintax.service";

type TemplateField = "subject" | "html" | "text";

export interface TemplatePreview {
  valid: boolean;
  errors: Record<TemplateField, string[]>;
  variations: Record<TemplateField, number>;
  /** Absent when any field fails validation. */
  sample?: PersonalizedContent;
  seed: number;
}

const SAMPLE_RECIPIENT: RecipientProfile = {
  id: "preview",
  email: "jane.doe@example.com",
  firstName: "Jane",
  lastName: "Doe",
  company: "Example Co",
  city: "Springfield",
  country: "US",
};

const FIELDS: readonly TemplateField[] = ["subject", "html", "text"];

export class TemplatePreviewService {
  constructor(
    private readonly spintax: SpintaxExpander,
    private readonly personalizer: ContentPersonalizer,
    private readonly now: () => Date = () => new Date(),
  ) {}

  preview(template: EmailTemplate, recipient: RecipientProfile = SAMPLE_RECIPIENT, seed?: number): TemplatePreview {
    const errors: Record<TemplateField, string[]> = { subject: [], html: [], text: [] };
    const variations: Record<TemplateField, number> = { subject: 1, html: 1, text: 1 };

    for (const field of FIELDS) {
      errors[field] = this.spintax.validate(template[field]);
      if (errors[field].length === 0) {
        variations[field] = this.spintax.countVariations(template[field]);
      }
    }

    const effectiveSeed = seed ?? this.now().getTime() % 2147483647;
    const valid = FIELDS.every((field) => errors[field].length === 0);
    if (!valid) {
      return { valid, errors, variations, seed: effectiveSeed };
    }

    const sample = this.personalizer.personalize(template, recipient, {
      now: this.now(),
      random: createSeededRandom(effectiveSeed),
    });
    return { valid, errors, variations, sample, seed: effectiveSeed };
  }
}
