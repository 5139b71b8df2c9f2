import { EMPHASIS_GUIDELINES } from './constants';
import { ILLUSTRATION_FAMILIES } from './illustrations';
import type { ConstraintSpec, FieldConstraint, GenerationRequest, IllustrationType, ValidationReport } from './types';

export interface BuiltPrompt {
  promptText: string;
  fieldSchema: string[];
}

function buildRoleSection(type: IllustrationType): string {
  return `<role>
You are an expert presentation content writer specialising in ${ILLUSTRATION_FAMILIES[type].displayName.toLowerCase()} infographics.
Every word you write must fit inside a fixed visual slot, so character limits are hard limits.
</role>`;
}

function buildStructureSection(type: IllustrationType, shape: number): string {
  switch (type) {
    case 'pyramid':
      return `<structure>
Create a ${shape}-level hierarchical pyramid.
1. Level 1 is the base: the foundation or most basic elements.
2. Each higher level builds on the level below it.
3. Level ${shape} is the peak: the ultimate goal or achievement.
4. Labels are concise, impactful phrases like section headers. The top label is 1-2 words; if 2 words, separate them with <br>.
5. Descriptions give clear, meaningful explanations of each level.
6. If overview fields are requested, write a heading and an explanatory paragraph tying the levels together.
</structure>`;
    case 'funnel':
      return `<structure>
Create a ${shape}-stage funnel.
1. Stage 1 (top, widest) is the broadest or initial stage (e.g. Awareness, Leads).
2. Each following stage narrows the focus (e.g. Consideration, Decision).
3. Stage ${shape} (bottom, narrowest) is the final outcome or conversion.
4. Stage names are simple labels, not sentences.
5. Each stage has exactly 3 bullets describing key actions, characteristics or metrics.
</structure>`;
    case 'concentric_circles':
      return `<structure>
Create a ${shape}-circle concentric circles diagram.
1. Circle 1 is the core: the most fundamental concept.
2. Middle circles are the building blocks and supporting layers.
3. Circle ${shape} is the outermost: the broadest context or application.
4. Circle labels are very short and progress from specific (core) to general (outer).
5. Each legend explains its circle with substantive bullets, never generic filler.
</structure>`;
    case 'round_table':
      return `<structure>
Create a round table diagram with ${shape} seats around a shared centre.
1. The centre label names what brings the participants together.
2. Each seat is one participant, perspective or pillar with a short title.
3. Each seat description states what that participant contributes to the centre.
4. Seats are peers: avoid implying order or hierarchy between them.
</structure>`;
  }
}

function buildContextSection(request: GenerationRequest): string {
  const { context } = request;
  const lines = [
    `<topic>${request.topic}</topic>`,
    context.presentation_title ? `<presentation_title>${context.presentation_title}</presentation_title>` : '',
    context.slide_purpose ? `<slide_purpose>${context.slide_purpose}</slide_purpose>` : '',
    context.key_message ? `<key_message>${context.key_message}</key_message>` : '',
    context.industry ? `<industry>${context.industry}</industry>` : '',
    `<tone>${request.tone}</tone>`,
    `<audience>${request.audience}</audience>`
  ].filter(Boolean);

  return `<context>
${lines.join('\n')}
</context>`;
}

function buildTargetPointsSection(targetPoints?: string[]): string {
  if (!targetPoints || targetPoints.length === 0) return '';
  return `<key_points>
Work these points into the content:
${targetPoints.map(point => `- ${point}`).join('\n')}
</key_points>`;
}

function buildContinuitySection(request: GenerationRequest): string {
  const previous = request.context.previous_slides;
  if (previous.length === 0) return '';

  // Sort a copy; the request stays untouched
  const ordered = [...previous].sort((a, b) => a.slide_number - b.slide_number);
  const slides = ordered.map(slide => {
    const summary = slide.summary ? `\n  ${slide.summary}` : '';
    return `- Slide ${slide.slide_number}: ${slide.slide_title}${summary}`;
  });

  return `<previous_slides>
Earlier slides in this presentation:
${slides.join('\n')}

IMPORTANT: Build on the narrative established in these slides. Do not repeat their terminology or restate their points; advance the story instead.
</previous_slides>`;
}

function describeField(field: FieldConstraint): string {
  return `- ${field.name}: ${field.min}-${field.max} characters`;
}

function buildConstraintsSection(spec: ConstraintSpec): string {
  return `<character_constraints>
Every field MUST have a visible length (tags excluded, spaces included) within its range:
${spec.fields.map(describeField).join('\n')}
</character_constraints>`;
}

function buildCorrectionSection(spec: ConstraintSpec, attemptNumber: number, previousReport?: ValidationReport): string {
  if (attemptNumber <= 1 || !previousReport || previousReport.valid) return '';

  const inSpec = new Set(spec.fields.map(field => field.name));
  const corrections = previousReport.violations
    .filter(violation => inSpec.has(violation.field))
    .map(violation => {
      const fix = violation.direction === 'under'
        ? `add at least ${violation.min - violation.actual_length} characters`
        : `remove at least ${violation.actual_length - violation.max} characters`;
      return `- ${violation.field}: you previously wrote ${violation.actual_length} characters, the limit is [${violation.min}, ${violation.max}]; ${fix}.`;
    });
  if (corrections.length === 0) return '';

  return `<corrections>
Attempt ${attemptNumber}. Your previous answer broke these limits:
${corrections.join('\n')}
Rewrite these fields to fit. Keep fields that were already within range.
</corrections>`;
}

function buildOutputFormatSection(fieldSchema: string[]): string {
  const example: Record<string, string> = {};
  fieldSchema.forEach(name => {
    example[name] = `text for ${name}`;
  });

  return `<output_format>
Return ONLY a valid JSON object with exactly these keys, all string values. Do not include markdown code fences.
${JSON.stringify(example, null, 2)}
</output_format>`;
}

/**
 * Builds the full generation prompt. `fieldSchema` always equals the spec's field set.
 */
export function buildIllustrationPrompt(
  request: GenerationRequest,
  spec: ConstraintSpec,
  attemptNumber: number,
  previousReport?: ValidationReport
): BuiltPrompt {
  const fieldSchema = spec.fields.map(field => field.name);

  const sections = [
    buildRoleSection(request.illustrationType),
    buildContextSection(request),
    buildTargetPointsSection(request.targetPoints),
    buildContinuitySection(request),
    buildStructureSection(request.illustrationType, request.variantShape),
    EMPHASIS_GUIDELINES.trim(),
    buildConstraintsSection(spec),
    buildCorrectionSection(spec, attemptNumber, previousReport),
    buildOutputFormatSection(fieldSchema)
  ].filter(section => section.length > 0);

  return {
    promptText: sections.join('\n\n').trim(),
    fieldSchema
  };
}
