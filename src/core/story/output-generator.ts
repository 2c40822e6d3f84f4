import { formatScenario } from './gherkin.js';
import type { OutputGenerator, TransformedRequirements } from './types.js';

const NONE = '- None identified';

/**
 * Renders the strengthened story as markdown. Section order is fixed and
 * the original body is appended verbatim.
 */
export class MarkdownOutputGenerator implements OutputGenerator {
  generateOutput(transformed: TransformedRequirements, originalBody: string): string {
    const sections = [
      `# ${transformed.header}`,
      section('Intent', transformed.intent),
      section('Actors & Stakeholders', bullets(transformed.actors)),
      section('Preconditions', bullets(transformed.preconditions)),
      section('Functional Requirements', bullets(transformed.functionalRequirements)),
      section('Alternate / Error Flows', bullets(transformed.alternateFlows)),
      section('Business Rules', bullets(transformed.businessRules)),
      section('Data Requirements', bullets(transformed.dataRequirements)),
      section(
        'Acceptance Criteria',
        transformed.acceptanceCriteria.length > 0
          ? ['```gherkin', transformed.acceptanceCriteria.map(formatScenario).join('\n\n'), '```'].join('\n')
          : NONE
      ),
      section('Observability', bullets(transformed.observability)),
      section(
        'Open Questions',
        transformed.openQuestions.length > 0
          ? transformed.openQuestions
              .map(
                (q, i) =>
                  `### Q${i + 1}: ${q.question}\n- Why it matters: ${q.whyItMatters}\n- Impact: ${q.impact}`
              )
              .join('\n\n')
          : NONE
      ),
      section('Original Story', originalBody),
    ];

    return `${sections.join('\n\n')}\n`;
  }
}

function section(title: string, content: string): string {
  return `## ${title}\n\n${content}`;
}

function bullets(items: string[]): string {
  return items.length > 0 ? items.map((item) => `- ${item}`).join('\n') : NONE;
}
