import type {
  AnalysisResult,
  CheckpointStage,
  ParsedIssue,
  ProcessingContext,
  TransformedRequirements,
  UnsafeInference,
} from './types.js';

const UNSAFE_TOPICS: Record<keyof UnsafeInference, RegExp> = {
  legal: /\b(?:legal|compliance|regulation|law)\b/,
  financial: /\b(?:financial|payment|transaction|accounting)\b/,
  security: /\b(?:security|authentication|authorization|encrypt\w*)\b/,
  regulatory: /\b(?:regulatory|gdpr|hipaa|sox)\b/,
};

const CHECKPOINTS: Record<CheckpointStage, 1 | 2 | 3> = {
  parse: 1,
  analyze: 2,
  transform: 3,
};

/**
 * Derive the checkpoint snapshot from the stage outputs produced so far.
 * Pure: the same inputs always give the same context.
 */
export function buildProcessingContext(
  stage: CheckpointStage,
  parsed: ParsedIssue,
  analysis: AnalysisResult | null,
  transformed: TransformedRequirements | null
): ProcessingContext {
  return {
    checkpoint: CHECKPOINTS[stage],
    stage,
    parsed,
    analysis,
    transformed,
    sectionRewriteCounts: countSections(parsed),
    acceptanceCriteriaCount: transformed?.acceptanceCriteria.length ?? 0,
    openQuestionsCount: transformed
      ? transformed.openQuestions.length
      : analysis?.ambiguities.length ?? 0,
    unsafeInference: detectUnsafeInference(analysis),
  };
}

function countSections(parsed: ParsedIssue): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const section of parsed.sections) {
    const key = section.heading.trim().toLowerCase();
    counts[key] = (counts[key] ?? 0) + 1;
  }
  return counts;
}

/**
 * Topics that need human expertise, read from the intent, actors,
 * functional requirements and business rules
 */
export function detectUnsafeInference(analysis: AnalysisResult | null): UnsafeInference {
  if (!analysis) {
    return { legal: false, financial: false, security: false, regulatory: false };
  }

  const text = [
    analysis.intent,
    ...analysis.actors,
    ...analysis.functionalRequirements.map((r) => r.text),
    ...analysis.businessRules.map((r) => r.text),
  ]
    .join(' ')
    .toLowerCase();

  return {
    legal: UNSAFE_TOPICS.legal.test(text),
    financial: UNSAFE_TOPICS.financial.test(text),
    security: UNSAFE_TOPICS.security.test(text),
    regulatory: UNSAFE_TOPICS.regulatory.test(text),
  };
}
