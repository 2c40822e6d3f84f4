import { toEars } from './ears.js';
import { toScenario } from './gherkin.js';
import type {
  AnalysisResult,
  ParsedIssue,
  RequirementsTransformer,
  TransformedRequirements,
} from './types.js';

const TITLE_TAG = /\[[^\]]*\]\s*/g;

/**
 * Rewrites analysis output as EARS statements and Gherkin scenarios.
 * One scenario per functional requirement, then one per error flow.
 */
export class EarsGherkinTransformer implements RequirementsTransformer {
  transformRequirements(analysis: AnalysisResult, parsed: ParsedIssue): TransformedRequirements {
    const title = parsed.title.replace(TITLE_TAG, '').trim() || `Issue #${parsed.number}`;

    return {
      header: `Strengthened Story: ${title}`,
      intent: analysis.intent,
      actors: analysis.stakeholders.length > 0 ? [...analysis.stakeholders] : [...analysis.actors],
      preconditions: analysis.preconditions.map(toEars),
      functionalRequirements: analysis.functionalRequirements.map(toEars),
      alternateFlows: analysis.errorFlows.map(toEars),
      businessRules: analysis.businessRules.map(toEars),
      dataRequirements: analysis.dataRequirements.map(
        (field) =>
          `${field.fieldName}: ${field.description}${field.required ? ' (required)' : ''}`
      ),
      acceptanceCriteria: [...analysis.functionalRequirements, ...analysis.errorFlows].map(
        toScenario
      ),
      observability: analysis.errorFlows.length > 0
        ? ['Log each alternate flow with the request identifier and failure reason']
        : [],
      openQuestions: [...analysis.ambiguities],
    };
  }
}
