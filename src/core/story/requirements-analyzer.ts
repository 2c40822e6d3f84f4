import type {
  AnalysisResult,
  DataRequirement,
  EarsPattern,
  IssueSection,
  OpenQuestion,
  ParsedIssue,
  Requirement,
  RequirementsAnalyzer,
} from './types.js';

const INTENT_PATTERN =
  /(?:I want to|I need to|I can|should be able to|must be able to) ([^,.]+)/i;
const ACTOR_PATTERN = /as an? ([a-z][a-z0-9 ]+?)(?:,| I | so )/gi;
const DATA_FIELD_PATTERN = /\b(?:field|attribute|property|column)\s*:?\s*([a-z][a-z0-9_]*)/gi;

const VAGUE_TERMS = [
  'quickly',
  'slowly',
  'fast',
  'slow',
  'adequate',
  'reasonable',
  'user-friendly',
  'easy',
  'simple',
  'appropriate',
  'suitable',
  'efficient',
  'optimal',
  'good',
  'bad',
  'nice',
  'better',
];

const ERROR_KEYWORDS = [
  'error',
  'fail',
  'exception',
  'invalid',
  'reject',
  'denied',
  'unauthorized',
  'forbidden',
  'timeout',
  'unavailable',
];

const ROLE_KEYWORDS: Array<[keyword: string, actor: string]> = [
  ['user', 'User'],
  ['admin', 'Administrator'],
  ['customer', 'Customer'],
  ['developer', 'Developer'],
  ['system', 'System'],
];

const INTENT_NOT_SPECIFIED = 'Intent not clearly specified';

/**
 * Keyword and heading driven extraction of requirement elements.
 * Structural only: nothing here interprets meaning.
 */
export class HeuristicRequirementsAnalyzer implements RequirementsAnalyzer {
  analyzeRequirements(parsed: ParsedIssue): AnalysisResult {
    const { body, sections } = parsed;

    const intent = extractIntent(body, sections);
    const actors = identifyActors(body, sections);

    return {
      intent,
      actors,
      stakeholders: identifyStakeholders(actors),
      preconditions: detectPreconditions(body, sections),
      functionalRequirements: fromSections(
        sections,
        ['requirement', 'acceptance', 'criteria', 'feature'],
        'UBIQUITOUS'
      ),
      errorFlows: detectErrorFlows(body, sections),
      businessRules: fromSections(
        sections,
        ['rule', 'constraint', 'policy', 'validation'],
        'UBIQUITOUS'
      ),
      dataRequirements: identifyDataRequirements(body, sections),
      ambiguities: flagAmbiguities(body, intent, actors),
    };
  }
}

// ============================================================================
// Extraction
// ============================================================================

function matchingSections(sections: IssueSection[], keywords: string[]): IssueSection[] {
  return sections.filter((section) => {
    const heading = section.heading.toLowerCase();
    return keywords.some((keyword) => heading.includes(keyword));
  });
}

function sentences(text: string): string[] {
  return text
    .split(/[.!?]/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

function extractIntent(body: string, sections: IssueSection[]): string {
  const described = matchingSections(sections, [
    'description',
    'overview',
    'intent',
    'purpose',
  ]).find((section) => section.content.length > 0);

  return intentFromText(described ? described.content : body);
}

function intentFromText(text: string): string {
  const match = INTENT_PATTERN.exec(text);
  if (match) {
    return match[1].trim();
  }
  const [first] = sentences(text);
  return first ?? INTENT_NOT_SPECIFIED;
}

function identifyActors(body: string, sections: IssueSection[]): string[] {
  const text = [body, ...sections.map((section) => section.content)].join(' ');
  const actors = new Set<string>();

  for (const match of text.matchAll(ACTOR_PATTERN)) {
    actors.add(titleCase(match[1].trim()));
  }

  const lower = text.toLowerCase();
  for (const [keyword, actor] of ROLE_KEYWORDS) {
    if (lower.includes(keyword)) {
      actors.add(actor);
    }
  }

  if (actors.size === 0) {
    actors.add('User');
  }
  return [...actors];
}

function identifyStakeholders(actors: string[]): string[] {
  const stakeholders = new Set(actors);
  if (actors.some((actor) => actor.toLowerCase().includes('customer'))) {
    stakeholders.add('Business Owner');
  }
  if (actors.some((actor) => actor.toLowerCase().includes('admin'))) {
    stakeholders.add('System Administrator');
  }
  return [...stakeholders];
}

function detectPreconditions(body: string, sections: IssueSection[]): Requirement[] {
  const preconditions = fromSections(
    sections,
    ['precondition', 'prerequisite', 'assumption', 'given'],
    'STATE_DRIVEN'
  );

  for (const sentence of sentences(body)) {
    const lower = sentence.toLowerCase();
    const inMode = /\bin .*\bmode\b/.test(lower);
    const inState = /\b(?:when|while|during)\b.*\b(?:state|status|mode)\b/.test(lower);
    if (inMode || inState) {
      preconditions.push({ text: sentence, pattern: 'STATE_DRIVEN', verifiable: true });
    }
  }

  return preconditions;
}

function detectErrorFlows(body: string, sections: IssueSection[]): Requirement[] {
  const errorFlows = fromSections(
    sections,
    ['error', 'exception', 'failure', 'alternate'],
    'UNWANTED'
  );

  for (const sentence of sentences(body)) {
    if (containsErrorKeyword(sentence)) {
      errorFlows.push({ text: sentence, pattern: 'UNWANTED', verifiable: true });
    }
  }

  return errorFlows;
}

function identifyDataRequirements(body: string, sections: IssueSection[]): DataRequirement[] {
  const fields = new Map<string, DataRequirement>();

  for (const section of matchingSections(sections, ['data', 'field', 'model', 'schema'])) {
    for (const rawLine of section.content.split('\n')) {
      const line = stripListMarker(rawLine.trim());
      const separator = line.indexOf(':');
      if (separator <= 0) {
        continue;
      }
      const fieldName = line.slice(0, separator).trim();
      const description = line.slice(separator + 1).trim();
      const lower = description.toLowerCase();
      fields.set(fieldName, {
        fieldName,
        description,
        required: lower.includes('required') || lower.includes('mandatory'),
      });
    }
  }

  for (const match of body.matchAll(DATA_FIELD_PATTERN)) {
    const fieldName = match[1];
    if (!fields.has(fieldName)) {
      fields.set(fieldName, {
        fieldName,
        description: 'Field mentioned in requirements',
        required: false,
      });
    }
  }

  return [...fields.values()];
}

function flagAmbiguities(body: string, intent: string, actors: string[]): OpenQuestion[] {
  const lower = body.toLowerCase();
  const questions: OpenQuestion[] = [];

  const vagueTerm = VAGUE_TERMS.find((term) => new RegExp(`\\b${term}\\b`).test(lower));
  if (vagueTerm) {
    questions.push({
      question: `What specific criteria define '${vagueTerm}'?`,
      whyItMatters: 'Vague terms make requirements unverifiable',
      impact: 'High - affects testability and acceptance criteria',
    });
  }

  if (intent === INTENT_NOT_SPECIFIED || intent.length < 10) {
    questions.push({
      question: 'What is the primary business intent of this feature?',
      whyItMatters: 'The intent defines the purpose and value of the feature',
      impact: 'Critical - affects entire implementation direction',
    });
  }

  if (actors.length === 1 && actors[0] === 'User') {
    questions.push({
      question: 'Who are the specific actors/users for this feature?',
      whyItMatters: 'Actors define permissions, workflows and user experience',
      impact: 'High - affects security and UX design',
    });
  }

  if (!lower.includes('data') && !lower.includes('field')) {
    questions.push({
      question: 'What data fields and structures are required?',
      whyItMatters: 'Data requirements drive the data model and API contracts',
      impact: 'High - affects data model and persistence layer',
    });
  }

  if (!containsErrorKeyword(body)) {
    questions.push({
      question: 'How should errors and edge cases be handled?',
      whyItMatters: 'Error handling determines reliability and recovery behavior',
      impact: 'Medium - affects error recovery',
    });
  }

  return questions;
}

// ============================================================================
// Helpers
// ============================================================================

function fromSections(
  sections: IssueSection[],
  keywords: string[],
  defaultPattern: EarsPattern
): Requirement[] {
  return matchingSections(sections, keywords).flatMap((section) =>
    requirementsFromText(section.content, defaultPattern)
  );
}

/**
 * One requirement per list item or line of at least 10 characters.
 * STATE_DRIVEN and UNWANTED defaults are kept; otherwise the pattern is
 * inferred from the wording.
 */
export function requirementsFromText(text: string, defaultPattern: EarsPattern): Requirement[] {
  const requirements: Requirement[] = [];

  for (const rawLine of text.split('\n')) {
    const trimmed = rawLine.trim();
    if (trimmed.length < 10 || trimmed.startsWith('```') || trimmed.startsWith('~~~')) {
      continue;
    }
    const line = stripListMarker(trimmed);
    if (!line) {
      continue;
    }

    const pattern =
      defaultPattern === 'UNWANTED' || defaultPattern === 'STATE_DRIVEN'
        ? defaultPattern
        : determinePattern(line);

    requirements.push({ text: line, pattern, verifiable: isVerifiable(line) });
  }

  return requirements;
}

export function determinePattern(text: string): EarsPattern {
  const lower = text.toLowerCase();
  if (/\b(?:when|if)\s/.test(lower)) {
    return lower.includes('error') || lower.includes('fail') ? 'UNWANTED' : 'EVENT_DRIVEN';
  }
  if (/\b(?:while|during)\s/.test(lower)) {
    return 'STATE_DRIVEN';
  }
  return 'UBIQUITOUS';
}

function isVerifiable(text: string): boolean {
  const lower = text.toLowerCase();
  return !VAGUE_TERMS.some((term) => new RegExp(`\\b${term}\\b`).test(lower));
}

function containsErrorKeyword(text: string): boolean {
  const lower = text.toLowerCase();
  return ERROR_KEYWORDS.some((keyword) => lower.includes(keyword));
}

function stripListMarker(line: string): string {
  return line.replace(/^[-*•]\s*/, '').replace(/^\d+\.\s*/, '').replace(/^\[[ xX]\]\s*/, '');
}

function titleCase(text: string): string {
  return text
    .split(/\s+/)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}
